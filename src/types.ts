/**
 * Core Types
 *
 * Five-tank mixing plant: two cylindrical utility tanks (A water, B brine)
 * feeding three frusto-conical process tanks (C, D, E).
 */

// =============================================================================
// Identifiers
// =============================================================================

export type Timestamp = string; // ISO 8601

export type UtilityTankId = 'A' | 'B';
export type ProcessTankId = 'C' | 'D' | 'E';
export type TankId = UtilityTankId | ProcessTankId;

export type VariableKind = 'level' | 'concentration';

export const UTILITY_TANK_IDS: readonly UtilityTankId[] = ['A', 'B'];
export const PROCESS_TANK_IDS: readonly ProcessTankId[] = ['C', 'D', 'E'];
export const TANK_IDS: readonly TankId[] = [...UTILITY_TANK_IDS, ...PROCESS_TANK_IDS];

export function isTankId(value: unknown): value is TankId {
  return TANK_IDS.some((id) => id === value);
}

export function isProcessTankId(value: unknown): value is ProcessTankId {
  return PROCESS_TANK_IDS.some((id) => id === value);
}

export function isVariableKind(value: unknown): value is VariableKind {
  return value === 'level' || value === 'concentration';
}

// =============================================================================
// Geometry
// =============================================================================

export interface CylindricalTankSpec {
  geometry: 'cylindrical';
  radius: number;        // m
  maxLevel: number;      // m
  supplyGain: number;    // m³/s at supply valve = 1
}

export interface ConicalTankSpec {
  geometry: 'frusto-conical';
  baseRadius: number;    // m, at level 0
  topRadius: number;     // m, at maxLevel
  maxLevel: number;      // m
  waterPumpGain: number; // m³/s at pump = 1
  brinePumpGain: number; // m³/s at pump = 1
  dischargeCoefficient: number; // m², Q = u · Cd · √(2gh)
}

export type TankSpec = CylindricalTankSpec | ConicalTankSpec;

export interface PlantConfig {
  gravity: number;
  tanks: Record<UtilityTankId, CylindricalTankSpec> & Record<ProcessTankId, ConicalTankSpec>;
  waterConcentration: number;  // kg/m³ in tank A
  brineConcentration: number;  // kg/m³ in tank B
  maxConcentration: number;
  levelEpsilon: number;        // below this level concentration is frozen
  safeLevel: { min: number; max: number };
}

// =============================================================================
// State and Controls
// =============================================================================

/**
 * Levels of every tank and concentrations of the process tanks.
 * Rates of change share the same shape.
 */
export interface TankVector {
  levels: Record<TankId, number>;
  concentrations: Record<ProcessTankId, number>;
}

export type ProcessState = TankVector;
export type ProcessRates = TankVector;

export interface UtilityChannels {
  supplyValve: number;
}

export interface ProcessChannels {
  waterPump: number;
  brinePump: number;
  outletValve: number;
}

export type ControlChannels = Record<UtilityTankId, UtilityChannels> & Record<ProcessTankId, ProcessChannels>;

export interface EquilibriumPoint {
  levels: Record<TankId, number>;
  concentrations: Record<ProcessTankId, number>;
  controls: ControlChannels;
}

// =============================================================================
// Setpoints
// =============================================================================

export type SetpointKey = `${TankId}:${VariableKind}`;

export interface Setpoint {
  tank: TankId;
  variable: VariableKind;
  value: number;
  issuedAt: number; // simulated seconds
}

export function setpointKey(tank: TankId, variable: VariableKind): SetpointKey {
  return `${tank}:${variable}`;
}

// =============================================================================
// Session
// =============================================================================

export type SessionStatus = 'initialized' | 'running' | 'paused' | 'reset' | 'closed';

export type IntegrationMethod = 'euler' | 'rk4';

export type CloseReason = 'requested' | 'transport' | 'diverged' | 'fault';

export interface NoiseSettings {
  enabled: boolean;
  level: number;   // relative standard deviation
  seed?: number;
}

export interface ControlGains {
  supplyValve: number;
  waterPump: number;
  brinePump: number;
  outletValve: number;
}

export interface SessionConfig {
  integrationStep: number;     // simulated s per sub-step
  method: IntegrationMethod;
  timeScale: number;           // simulated s per wall-clock s
  gains: ControlGains;
  slewRate: number | null;     // max control change per simulated s
  streamCapacity: number;
}

export interface StateSnapshot {
  sessionId: string;
  sequence: number;
  simulatedTime: number;
  status: SessionStatus;
  levels: Record<TankId, number>;
  concentrations: Record<ProcessTankId, number>;
  controlChannels: ControlChannels;
  activeSetpoints: Setpoint[];
  noisy: boolean;
  emittedAt: Timestamp;
}

export interface SessionStatusReport {
  id: string;
  status: SessionStatus;
  samplingInterval: number;
  simulatedTime: number;
  ticks: number;
  snapshotsEmitted: number;
  pendingCommands: number;
  clampEvents: number;
  droppedSnapshots: number;
  subscribers: number;
  noise: NoiseSettings;
  method: IntegrationMethod;
  controller: string;
}
