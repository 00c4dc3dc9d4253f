/**
 * Input Validation
 *
 * Each check collects issues instead of failing fast, so one
 * ValidationError reports every offending field.
 */

import { ValidationError, type ValidationIssue } from './errors.js';
import type {
  ControlChannels,
  EquilibriumPoint,
  NoiseSettings,
  PlantConfig,
  SessionConfig,
  TankId,
  VariableKind,
} from './types.js';
import { PROCESS_TANK_IDS, TANK_IDS, UTILITY_TANK_IDS } from './types.js';

// =============================================================================
// Helpers
// =============================================================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class Issues {
  readonly list: ValidationIssue[] = [];

  add(path: string, message: string): void {
    this.list.push({ path, message });
  }

  finite(path: string, value: unknown): value is number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.add(path, 'must be a finite number');
      return false;
    }
    return true;
  }

  range(path: string, value: unknown, min: number, max: number): value is number {
    if (!this.finite(path, value)) return false;
    if (value < min || value > max) {
      this.add(path, `must be within [${min}, ${max}], got ${value}`);
      return false;
    }
    return true;
  }

  positive(path: string, value: unknown): value is number {
    if (!this.finite(path, value)) return false;
    if (value <= 0) {
      this.add(path, `must be > 0, got ${value}`);
      return false;
    }
    return true;
  }

  fail(context: string): never {
    throw new ValidationError(this.list, context);
  }

  throwIfAny(context: string): void {
    if (this.list.length > 0) this.fail(context);
  }
}

// =============================================================================
// Session Parameters
// =============================================================================

// Longest delay a Node.js timer honours; larger delays fire after 1 ms
export const MAX_SAMPLING_INTERVAL = (2 ** 31 - 1) / 1000;

export function validateSamplingInterval(value: unknown): number {
  const issues = new Issues();
  if (issues.positive('samplingInterval', value)) {
    if (value <= MAX_SAMPLING_INTERVAL) return value;
    issues.add('samplingInterval', `must be <= ${MAX_SAMPLING_INTERVAL}, got ${value}`);
  }
  return issues.fail('Invalid session');
}

export function validateNoise(enabled: unknown, level: unknown, seed?: unknown): NoiseSettings {
  const issues = new Issues();
  if (typeof enabled !== 'boolean') issues.add('noiseEnabled', 'must be a boolean');
  issues.range('noiseLevel', level, 0, 1);
  if (seed !== undefined && (typeof seed !== 'number' || !Number.isInteger(seed))) {
    issues.add('noiseSeed', 'must be an integer');
  }
  issues.throwIfAny('Invalid noise settings');

  const settings: NoiseSettings = {
    enabled: enabled === true,
    level: typeof level === 'number' ? level : 0,
  };
  if (typeof seed === 'number') settings.seed = seed;
  return settings;
}

export function validateSessionConfig(config: SessionConfig): SessionConfig {
  const issues = new Issues();
  issues.positive('config.integrationStep', config.integrationStep);
  issues.positive('config.timeScale', config.timeScale);
  if (config.method !== 'euler' && config.method !== 'rk4') {
    issues.add('config.method', `must be 'euler' or 'rk4'`);
  }
  issues.finite('config.gains.supplyValve', config.gains.supplyValve);
  issues.finite('config.gains.waterPump', config.gains.waterPump);
  issues.finite('config.gains.brinePump', config.gains.brinePump);
  issues.finite('config.gains.outletValve', config.gains.outletValve);
  if (config.slewRate !== null) issues.positive('config.slewRate', config.slewRate);
  if (!Number.isInteger(config.streamCapacity) || config.streamCapacity < 1) {
    issues.add('config.streamCapacity', 'must be a positive integer');
  }
  issues.throwIfAny('Invalid session config');
  return config;
}

// =============================================================================
// Plant
// =============================================================================

/**
 * Radii may be zero; degenerate geometry surfaces as divergence at run time.
 */
export function validatePlant(plant: PlantConfig): PlantConfig {
  const issues = new Issues();
  issues.positive('plant.gravity', plant.gravity);
  issues.range('plant.waterConcentration', plant.waterConcentration, 0, plant.maxConcentration);
  issues.range('plant.brineConcentration', plant.brineConcentration, 0, plant.maxConcentration);
  issues.positive('plant.maxConcentration', plant.maxConcentration);
  issues.positive('plant.levelEpsilon', plant.levelEpsilon);

  for (const id of UTILITY_TANK_IDS) {
    const tank = plant.tanks[id];
    issues.range(`plant.tanks.${id}.radius`, tank.radius, 0, Infinity);
    issues.positive(`plant.tanks.${id}.maxLevel`, tank.maxLevel);
    issues.range(`plant.tanks.${id}.supplyGain`, tank.supplyGain, 0, Infinity);
  }
  for (const id of PROCESS_TANK_IDS) {
    const tank = plant.tanks[id];
    issues.range(`plant.tanks.${id}.baseRadius`, tank.baseRadius, 0, Infinity);
    issues.range(`plant.tanks.${id}.topRadius`, tank.topRadius, 0, Infinity);
    issues.positive(`plant.tanks.${id}.maxLevel`, tank.maxLevel);
    issues.range(`plant.tanks.${id}.waterPumpGain`, tank.waterPumpGain, 0, Infinity);
    issues.range(`plant.tanks.${id}.brinePumpGain`, tank.brinePumpGain, 0, Infinity);
    issues.range(`plant.tanks.${id}.dischargeCoefficient`, tank.dischargeCoefficient, 0, Infinity);
  }

  const { min, max } = plant.safeLevel;
  if (issues.finite('plant.safeLevel.min', min) && issues.finite('plant.safeLevel.max', max) && min > max) {
    issues.add('plant.safeLevel', 'min must not exceed max');
  }

  issues.throwIfAny('Invalid plant');
  return plant;
}

// =============================================================================
// Equilibrium
// =============================================================================

/**
 * Check an untyped equilibrium point against the plant bounds and
 * return it typed.
 */
export function parseEquilibrium(input: unknown, plant: PlantConfig): EquilibriumPoint {
  const issues = new Issues();
  if (!isRecord(input)) {
    issues.add('equilibrium', 'must be an object');
    return issues.fail('Invalid equilibrium');
  }
  const source = input;

  const levelsIn = isRecord(source.levels) ? source.levels : {};
  const concIn = isRecord(source.concentrations) ? source.concentrations : {};
  const controlsIn = isRecord(source.controls) ? source.controls : {};
  if (!isRecord(source.levels)) issues.add('equilibrium.levels', 'must be an object');
  if (!isRecord(source.concentrations)) issues.add('equilibrium.concentrations', 'must be an object');
  if (!isRecord(source.controls)) issues.add('equilibrium.controls', 'must be an object');

  const read = (path: string, value: unknown, max: number): number =>
    issues.range(path, value, 0, max) ? value : 0;

  const channelsOf = (id: TankId): Record<string, unknown> => {
    const channels = controlsIn[id];
    if (!isRecord(channels)) {
      if (isRecord(source.controls)) issues.add(`equilibrium.controls.${id}`, 'must be an object');
      return {};
    }
    return channels;
  };

  const levels = {
    A: read('equilibrium.levels.A', levelsIn.A, plant.tanks.A.maxLevel),
    B: read('equilibrium.levels.B', levelsIn.B, plant.tanks.B.maxLevel),
    C: read('equilibrium.levels.C', levelsIn.C, plant.tanks.C.maxLevel),
    D: read('equilibrium.levels.D', levelsIn.D, plant.tanks.D.maxLevel),
    E: read('equilibrium.levels.E', levelsIn.E, plant.tanks.E.maxLevel),
  };

  const concentrations = {
    C: read('equilibrium.concentrations.C', concIn.C, plant.maxConcentration),
    D: read('equilibrium.concentrations.D', concIn.D, plant.maxConcentration),
    E: read('equilibrium.concentrations.E', concIn.E, plant.maxConcentration),
  };

  const utility = (id: 'A' | 'B') => {
    const channels = channelsOf(id);
    return { supplyValve: read(`equilibrium.controls.${id}.supplyValve`, channels.supplyValve, 1) };
  };
  const process = (id: 'C' | 'D' | 'E') => {
    const channels = channelsOf(id);
    return {
      waterPump: read(`equilibrium.controls.${id}.waterPump`, channels.waterPump, 1),
      brinePump: read(`equilibrium.controls.${id}.brinePump`, channels.brinePump, 1),
      outletValve: read(`equilibrium.controls.${id}.outletValve`, channels.outletValve, 1),
    };
  };

  const controls: ControlChannels = {
    A: utility('A'),
    B: utility('B'),
    C: process('C'),
    D: process('D'),
    E: process('E'),
  };

  issues.throwIfAny('Invalid equilibrium');
  return { levels, concentrations, controls };
}

// =============================================================================
// Setpoints
// =============================================================================

/**
 * Utility tanks take level setpoints only; levels must sit inside the
 * safe operating band.
 */
export function validateSetpoint(
  tank: TankId,
  variable: VariableKind,
  value: unknown,
  plant: PlantConfig
): number {
  const issues = new Issues();

  if ((tank === 'A' || tank === 'B') && variable === 'concentration') {
    issues.add('variable', `tank ${tank} accepts level setpoints only`);
    return issues.fail('Invalid setpoint');
  }

  const [min, max] =
    variable === 'level'
      ? [plant.safeLevel.min, Math.min(plant.safeLevel.max, plant.tanks[tank].maxLevel)]
      : [0, plant.maxConcentration];

  if (issues.range('value', value, min, max)) return value;
  return issues.fail('Invalid setpoint');
}

export function assertKnownTank(value: unknown, path = 'tank'): TankId {
  const match = TANK_IDS.find((id) => id === value);
  if (match === undefined) {
    throw new ValidationError([{ path, message: `must be one of ${TANK_IDS.join(', ')}` }], 'Invalid command');
  }
  return match;
}
