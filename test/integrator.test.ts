/**
 * Integrator Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { clampState, integrateStep } from '../src/integrator.js';
import { DEFAULT_EQUILIBRIUM, DEFAULT_PLANT, cloneControls } from '../src/config.js';
import { DivergenceError } from '../src/errors.js';
import { createRandom } from '../src/noise.js';
import type { ControlChannels, IntegrationMethod, PlantConfig, ProcessState } from '../src/types.js';
import { PROCESS_TANK_IDS, TANK_IDS } from '../src/types.js';

function equilibriumState(): ProcessState {
  return {
    levels: { ...DEFAULT_EQUILIBRIUM.levels },
    concentrations: { ...DEFAULT_EQUILIBRIUM.concentrations },
  };
}

function allClosed(): ControlChannels {
  return {
    A: { supplyValve: 0 },
    B: { supplyValve: 0 },
    C: { waterPump: 0, brinePump: 0, outletValve: 0 },
    D: { waterPump: 0, brinePump: 0, outletValve: 0 },
    E: { waterPump: 0, brinePump: 0, outletValve: 0 },
  };
}

const METHODS: IntegrationMethod[] = ['euler', 'rk4'];

// =============================================================================
// Schemes
// =============================================================================

describe('integrateStep', () => {
  for (const method of METHODS) {
    it(`${method}: should integrate a constant rate exactly`, () => {
      const controls = allClosed();
      controls.A.supplyValve = 1;

      const { state, clamps } = integrateStep(equilibriumState(), controls, 2, {
        plant: DEFAULT_PLANT,
        method,
      });

      assert.ok(Math.abs(state.levels.A - 1.509978040513843) < 1e-12);
      assert.strictEqual(state.levels.B, 1.5);
      assert.strictEqual(state.levels.C, 1.5);
      assert.strictEqual(clamps.length, 0);
    });

    it(`${method}: should stay within 1e-4 of equilibrium over 5 s`, () => {
      let state = equilibriumState();
      for (let i = 0; i < 10; i++) {
        state = integrateStep(state, DEFAULT_EQUILIBRIUM.controls, 0.5, {
          plant: DEFAULT_PLANT,
          method,
        }).state;
      }
      for (const id of TANK_IDS) {
        assert.ok(Math.abs(state.levels[id] - 1.5) < 1e-4, `${id} level ${state.levels[id]}`);
      }
      for (const id of PROCESS_TANK_IDS) {
        assert.ok(Math.abs(state.concentrations[id] - 180) < 1e-4);
      }
    });
  }

  it('should not mutate the input state', () => {
    const state = equilibriumState();
    integrateStep(state, allClosed(), 1, { plant: DEFAULT_PLANT, method: 'rk4' });
    assert.deepStrictEqual(state, equilibriumState());
  });

  it('should agree between Euler and RK4 for small steps', () => {
    const state = equilibriumState();
    state.levels.C = 0.8;
    state.concentrations.C = 40;
    const controls = cloneControls(DEFAULT_EQUILIBRIUM.controls);
    controls.C = { waterPump: 0.2, brinePump: 1, outletValve: 0.9 };

    const euler = integrateStep(state, controls, 0.01, { plant: DEFAULT_PLANT, method: 'euler' });
    const rk4 = integrateStep(state, controls, 0.01, { plant: DEFAULT_PLANT, method: 'rk4' });

    assert.ok(Math.abs(euler.state.levels.C - rk4.state.levels.C) < 1e-7);
    assert.ok(Math.abs(euler.state.concentrations.C - rk4.state.concentrations.C) < 1e-4);
  });
});

// =============================================================================
// Clamping
// =============================================================================

describe('Clamping', () => {
  it('should clamp a draining tank at zero and report it', () => {
    const state = equilibriumState();
    state.levels.C = 0.001;
    const controls = allClosed();
    controls.C.outletValve = 1;

    const { state: next, clamps } = integrateStep(state, controls, 5, {
      plant: DEFAULT_PLANT,
      method: 'euler',
    });

    assert.strictEqual(next.levels.C, 0);
    assert.strictEqual(clamps.length, 1);
    assert.strictEqual(clamps[0].tank, 'C');
    assert.strictEqual(clamps[0].variable, 'level');
    assert.strictEqual(clamps[0].bound, 0);
    assert.ok(clamps[0].value < 0);
  });

  it('should clamp an overfilling tank at its max level', () => {
    const state = equilibriumState();
    state.levels.D = 2.999;
    const controls = allClosed();
    controls.D.waterPump = 1;
    controls.D.brinePump = 1;

    const { state: next, clamps } = integrateStep(state, controls, 5, {
      plant: DEFAULT_PLANT,
      method: 'euler',
    });

    assert.strictEqual(next.levels.D, 3);
    assert.deepStrictEqual(
      clamps.map((c) => [c.tank, c.variable, c.bound]),
      [['D', 'level', 3]]
    );
  });

  it('should clamp concentration overshoot at the maximum', () => {
    const state = equilibriumState();
    state.levels.E = 0.0002;
    state.concentrations.E = 359;
    const controls = allClosed();
    controls.E.brinePump = 1;

    const { state: next, clamps } = integrateStep(state, controls, 50, {
      plant: DEFAULT_PLANT,
      method: 'euler',
    });

    assert.strictEqual(next.concentrations.E, 360);
    assert.ok(clamps.some((c) => c.tank === 'E' && c.variable === 'concentration' && c.bound === 360));
  });

  it('should leave in-range values untouched', () => {
    const { state, clamps } = clampState(equilibriumState(), DEFAULT_PLANT);
    assert.deepStrictEqual(state, equilibriumState());
    assert.strictEqual(clamps.length, 0);
  });

  it('should keep every value finite and in bounds under randomized extreme inputs', () => {
    const random = createRandom(2024);
    const extreme = () => (random() < 0.5 ? 0 : 1);

    for (let trial = 0; trial < 300; trial++) {
      const state = equilibriumState();
      for (const id of TANK_IDS) {
        state.levels[id] = random() < 0.3 ? 0 : random() < 0.5 ? 3 : random() * 3;
      }
      for (const id of PROCESS_TANK_IDS) {
        state.concentrations[id] = random() * 360;
      }

      const controls: ControlChannels = {
        A: { supplyValve: extreme() },
        B: { supplyValve: extreme() },
        C: { waterPump: extreme(), brinePump: extreme(), outletValve: extreme() },
        D: { waterPump: extreme(), brinePump: extreme(), outletValve: extreme() },
        E: { waterPump: extreme(), brinePump: extreme(), outletValve: extreme() },
      };
      const method = METHODS[trial % 2];
      const dt = 0.1 + random() * 4.9;

      const { state: next } = integrateStep(state, controls, dt, { plant: DEFAULT_PLANT, method });

      for (const id of TANK_IDS) {
        const level = next.levels[id];
        assert.ok(Number.isFinite(level) && level >= 0 && level <= 3, `trial ${trial}: ${id} level ${level}`);
      }
      for (const id of PROCESS_TANK_IDS) {
        const c = next.concentrations[id];
        assert.ok(Number.isFinite(c) && c >= 0 && c <= 360, `trial ${trial}: ${id} concentration ${c}`);
      }
    }
  });
});

// =============================================================================
// Divergence
// =============================================================================

describe('Divergence', () => {
  const degenerate: PlantConfig = {
    ...DEFAULT_PLANT,
    tanks: { ...DEFAULT_PLANT.tanks, C: { ...DEFAULT_PLANT.tanks.C, baseRadius: 0, topRadius: 0 } },
  };

  it('should raise DivergenceError at the first RK4 stage', () => {
    assert.throws(
      () => integrateStep(equilibriumState(), DEFAULT_EQUILIBRIUM.controls, 0.5, { plant: degenerate, method: 'rk4' }),
      (error: unknown) => {
        assert.ok(error instanceof DivergenceError);
        assert.strictEqual(error.tank, 'C');
        assert.strictEqual(error.variable, 'level');
        assert.strictEqual(error.stage, 'rk4:k1');
        assert.strictEqual(error.value, Infinity);
        return true;
      }
    );
  });

  it('should raise DivergenceError under Euler', () => {
    assert.throws(
      () => integrateStep(equilibriumState(), DEFAULT_EQUILIBRIUM.controls, 0.5, { plant: degenerate, method: 'euler' }),
      { name: 'DivergenceError', message: 'Integration diverged: C.level = Infinity (euler)' }
    );
  });
});
