/**
 * Configuration Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DEFAULT_EQUILIBRIUM,
  DEFAULT_GAINS,
  DEFAULT_PLANT,
  DEFAULT_SESSION_CONFIG,
  cloneEquilibrium,
  clonePlant,
  readEnvironment,
  resolveSessionConfig,
} from '../src/config.js';

describe('Default plant', () => {
  it('should carry the nominal geometry', () => {
    assert.strictEqual(DEFAULT_PLANT.tanks.A.radius, 1.75);
    assert.strictEqual(DEFAULT_PLANT.tanks.C.baseRadius, 0.75);
    assert.strictEqual(DEFAULT_PLANT.tanks.C.topRadius, 1.25);
    assert.ok(Math.abs(DEFAULT_PLANT.tanks.E.dischargeCoefficient - 0.0036122) < 1e-7);
  });

  it('should give every process tank its own spec object', () => {
    assert.notStrictEqual(DEFAULT_PLANT.tanks.C, DEFAULT_PLANT.tanks.D);
  });
});

describe('resolveSessionConfig', () => {
  it('should return the defaults without overrides', () => {
    assert.deepStrictEqual(resolveSessionConfig(), DEFAULT_SESSION_CONFIG);
  });

  it('should merge partial gains over the defaults', () => {
    const config = resolveSessionConfig({ method: 'euler', gains: { waterPump: 2 } });
    assert.strictEqual(config.method, 'euler');
    assert.deepStrictEqual(config.gains, { ...DEFAULT_GAINS, waterPump: 2 });
    assert.strictEqual(DEFAULT_GAINS.waterPump, 5);
  });

  it('should layer over a custom base', () => {
    const base = resolveSessionConfig({ timeScale: 10 });
    assert.strictEqual(resolveSessionConfig({ slewRate: 0.2 }, base).timeScale, 10);
  });
});

describe('Cloning', () => {
  it('should deep copy the plant', () => {
    const plant = clonePlant(DEFAULT_PLANT);
    plant.tanks.C.baseRadius = 0;
    plant.safeLevel.max = 1;
    assert.strictEqual(DEFAULT_PLANT.tanks.C.baseRadius, 0.75);
    assert.strictEqual(DEFAULT_PLANT.safeLevel.max, 2.7);
  });

  it('should deep copy the equilibrium point', () => {
    const point = cloneEquilibrium(DEFAULT_EQUILIBRIUM);
    point.levels.A = 2;
    point.controls.E.outletValve = 1;
    assert.strictEqual(DEFAULT_EQUILIBRIUM.levels.A, 1.5);
    assert.strictEqual(DEFAULT_EQUILIBRIUM.controls.E.outletValve, 0.5);
  });
});

describe('readEnvironment', () => {
  it('should read TANK_SIM_* variables', () => {
    assert.deepStrictEqual(
      readEnvironment({
        TANK_SIM_LOG_LEVEL: 'DEBUG',
        TANK_SIM_SAMPLING_INTERVAL: '0.5',
        TANK_SIM_METHOD: 'Euler',
        TANK_SIM_TIME_SCALE: '20',
      }),
      { logLevel: 'debug', samplingInterval: 0.5, method: 'euler', timeScale: 20 }
    );
  });

  it('should ignore missing and unparseable values', () => {
    assert.deepStrictEqual(
      readEnvironment({
        TANK_SIM_LOG_LEVEL: 'loud',
        TANK_SIM_SAMPLING_INTERVAL: '-1',
        TANK_SIM_METHOD: 'midpoint',
        TANK_SIM_TIME_SCALE: 'fast',
      }),
      { logLevel: null, samplingInterval: null, method: null, timeScale: null }
    );
    assert.deepStrictEqual(readEnvironment({}), {
      logLevel: null,
      samplingInterval: null,
      method: null,
      timeScale: null,
    });
  });
});
