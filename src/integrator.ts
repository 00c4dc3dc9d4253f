/**
 * Integrator
 *
 * Advances the plant state by one simulated increment with explicit Euler
 * or classic fourth-order Runge-Kutta, controls held constant over the
 * increment. The provisional state is clamped to physical bounds; any
 * non-finite rate or value raises DivergenceError.
 */

import { computeRates } from './model.js';
import { DivergenceError } from './errors.js';
import type {
  ControlChannels,
  IntegrationMethod,
  PlantConfig,
  ProcessState,
  TankId,
  TankVector,
  VariableKind,
} from './types.js';
import { PROCESS_TANK_IDS, TANK_IDS } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ClampEvent {
  tank: TankId;
  variable: VariableKind;
  value: number;   // provisional value before clamping
  bound: number;   // value it was clamped to
}

export interface StepResult {
  state: ProcessState;
  clamps: ClampEvent[];
}

export interface IntegratorOptions {
  plant: PlantConfig;
  method: IntegrationMethod;
}

// =============================================================================
// Vector Helpers
// =============================================================================

export function cloneVector(vector: TankVector): TankVector {
  return {
    levels: { ...vector.levels },
    concentrations: { ...vector.concentrations },
  };
}

/**
 * base + scale · rates, as a new vector
 */
export function addScaled(base: TankVector, rates: TankVector, scale: number): TankVector {
  const out = cloneVector(base);
  for (const id of TANK_IDS) {
    out.levels[id] += rates.levels[id] * scale;
  }
  for (const id of PROCESS_TANK_IDS) {
    out.concentrations[id] += rates.concentrations[id] * scale;
  }
  return out;
}

export function assertFinite(vector: TankVector, stage: string): void {
  for (const id of TANK_IDS) {
    const value = vector.levels[id];
    if (!Number.isFinite(value)) {
      throw new DivergenceError(id, 'level', value, stage);
    }
  }
  for (const id of PROCESS_TANK_IDS) {
    const value = vector.concentrations[id];
    if (!Number.isFinite(value)) {
      throw new DivergenceError(id, 'concentration', value, stage);
    }
  }
}

// =============================================================================
// Clamping
// =============================================================================

export function clampState(state: ProcessState, plant: PlantConfig): StepResult {
  const clamped = cloneVector(state);
  const clamps: ClampEvent[] = [];

  const bound = (tank: TankId, variable: VariableKind, value: number, max: number): number => {
    const limited = Math.min(Math.max(value, 0), max);
    if (limited !== value) {
      clamps.push({ tank, variable, value, bound: limited });
    }
    return limited;
  };

  for (const id of TANK_IDS) {
    clamped.levels[id] = bound(id, 'level', state.levels[id], plant.tanks[id].maxLevel);
  }
  for (const id of PROCESS_TANK_IDS) {
    clamped.concentrations[id] = bound(
      id,
      'concentration',
      state.concentrations[id],
      plant.maxConcentration
    );
  }

  return { state: clamped, clamps };
}

// =============================================================================
// Schemes
// =============================================================================

function eulerStep(
  state: ProcessState,
  controls: ControlChannels,
  dt: number,
  plant: PlantConfig
): ProcessState {
  const k1 = computeRates(state, controls, plant);
  assertFinite(k1, 'euler');
  return addScaled(state, k1, dt);
}

function rk4Step(
  state: ProcessState,
  controls: ControlChannels,
  dt: number,
  plant: PlantConfig
): ProcessState {
  const k1 = computeRates(state, controls, plant);
  assertFinite(k1, 'rk4:k1');

  const k2 = computeRates(addScaled(state, k1, dt * 0.5), controls, plant);
  assertFinite(k2, 'rk4:k2');

  const k3 = computeRates(addScaled(state, k2, dt * 0.5), controls, plant);
  assertFinite(k3, 'rk4:k3');

  const k4 = computeRates(addScaled(state, k3, dt), controls, plant);
  assertFinite(k4, 'rk4:k4');

  const scale = dt / 6;
  const next = cloneVector(state);
  for (const id of TANK_IDS) {
    next.levels[id] +=
      scale * (k1.levels[id] + 2 * k2.levels[id] + 2 * k3.levels[id] + k4.levels[id]);
  }
  for (const id of PROCESS_TANK_IDS) {
    next.concentrations[id] +=
      scale *
      (k1.concentrations[id] +
        2 * k2.concentrations[id] +
        2 * k3.concentrations[id] +
        k4.concentrations[id]);
  }
  return next;
}

/**
 * Advance `state` by `dt` simulated seconds. The input is not mutated.
 */
export function integrateStep(
  state: ProcessState,
  controls: ControlChannels,
  dt: number,
  options: IntegratorOptions
): StepResult {
  const provisional =
    options.method === 'euler'
      ? eulerStep(state, controls, dt, options.plant)
      : rk4Step(state, controls, dt, options.plant);

  assertFinite(provisional, options.method);
  return clampState(provisional, options.plant);
}
