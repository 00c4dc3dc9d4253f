/**
 * Configuration
 *
 * Plant parameters, the nominal operating point and session defaults.
 * Callers override through Partial<...> objects or TANK_SIM_* variables.
 */

import type {
  ControlChannels,
  ControlGains,
  EquilibriumPoint,
  IntegrationMethod,
  PlantConfig,
  ProcessChannels,
  SessionConfig,
} from './types.js';
import { parseLogLevel, type LogLevel } from './logger.js';

const GRAVITY = 9.81;

// Chosen so that Q = u · Cd · √(2gh) reduces to Q = 0.016 · u · √h
const DISCHARGE_COEFFICIENT = 0.016 / Math.sqrt(2 * GRAVITY);

// =============================================================================
// Plant
// =============================================================================

export const DEFAULT_PLANT: PlantConfig = {
  gravity: GRAVITY,
  tanks: {
    A: { geometry: 'cylindrical', radius: 1.75, maxLevel: 3.0, supplyGain: 0.048 },
    B: { geometry: 'cylindrical', radius: 1.75, maxLevel: 3.0, supplyGain: 0.048 },
    C: conicalTank(),
    D: conicalTank(),
    E: conicalTank(),
  },
  waterConcentration: 0,
  brineConcentration: 360,
  maxConcentration: 360,
  levelEpsilon: 1e-4,
  safeLevel: { min: 0.3, max: 2.7 },
};

function conicalTank() {
  return {
    geometry: 'frusto-conical' as const,
    baseRadius: 0.75,
    topRadius: 1.25,
    maxLevel: 3.0,
    waterPumpGain: 0.008,
    brinePumpGain: 0.008,
    dischargeCoefficient: DISCHARGE_COEFFICIENT,
  };
}

// =============================================================================
// Operating Point
// =============================================================================

const NOMINAL_PROCESS_CHANNELS: ProcessChannels = {
  waterPump: 0.6125,
  brinePump: 0.6125,
  outletValve: 0.5,
};

export const DEFAULT_EQUILIBRIUM: EquilibriumPoint = {
  levels: { A: 1.5, B: 1.5, C: 1.5, D: 1.5, E: 1.5 },
  concentrations: { C: 180, D: 180, E: 180 },
  controls: {
    A: { supplyValve: 0.306 },
    B: { supplyValve: 0.306 },
    C: { ...NOMINAL_PROCESS_CHANNELS },
    D: { ...NOMINAL_PROCESS_CHANNELS },
    E: { ...NOMINAL_PROCESS_CHANNELS },
  },
};

// =============================================================================
// Session
// =============================================================================

export const DEFAULT_GAINS: ControlGains = {
  supplyValve: 0.5,   // per m
  waterPump: 5,       // per m
  brinePump: 0.01,    // per kg/m³
  outletValve: -1,    // per m, reverse acting
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  integrationStep: 0.5,
  method: 'rk4',
  timeScale: 1,
  gains: DEFAULT_GAINS,
  slewRate: null,
  streamCapacity: 64,
};

export const DEFAULT_SAMPLING_INTERVAL = 1.0; // s

// =============================================================================
// Resolution
// =============================================================================

export interface SessionConfigOverrides extends Partial<Omit<SessionConfig, 'gains'>> {
  gains?: Partial<ControlGains>;
}

export function resolveSessionConfig(
  overrides: SessionConfigOverrides = {},
  base: SessionConfig = DEFAULT_SESSION_CONFIG
): SessionConfig {
  return {
    ...base,
    ...overrides,
    gains: { ...base.gains, ...overrides.gains },
  };
}

/**
 * Deep copy so a session owns its plant and operating point outright.
 */
export function clonePlant(plant: PlantConfig): PlantConfig {
  return {
    ...plant,
    tanks: {
      A: { ...plant.tanks.A },
      B: { ...plant.tanks.B },
      C: { ...plant.tanks.C },
      D: { ...plant.tanks.D },
      E: { ...plant.tanks.E },
    },
    safeLevel: { ...plant.safeLevel },
  };
}

export function cloneControls(controls: ControlChannels): ControlChannels {
  return {
    A: { ...controls.A },
    B: { ...controls.B },
    C: { ...controls.C },
    D: { ...controls.D },
    E: { ...controls.E },
  };
}

export function cloneEquilibrium(point: EquilibriumPoint): EquilibriumPoint {
  return {
    levels: { ...point.levels },
    concentrations: { ...point.concentrations },
    controls: cloneControls(point.controls),
  };
}

// =============================================================================
// Environment
// =============================================================================

export interface EnvironmentConfig {
  logLevel: LogLevel | null;
  samplingInterval: number | null;
  method: IntegrationMethod | null;
  timeScale: number | null;
}

/**
 * Read TANK_SIM_* variables. Unparseable values are ignored.
 */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const method = env.TANK_SIM_METHOD?.toLowerCase();
  return {
    logLevel: env.TANK_SIM_LOG_LEVEL ? parseLogLevel(env.TANK_SIM_LOG_LEVEL) : null,
    samplingInterval: positiveNumber(env.TANK_SIM_SAMPLING_INTERVAL),
    method: method === 'euler' || method === 'rk4' ? method : null,
    timeScale: positiveNumber(env.TANK_SIM_TIME_SCALE),
  };
}

function positiveNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
}
