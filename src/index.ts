/**
 * Tank-Mixing Simulation
 *
 * Real-time simulation and control core for a five-tank mixing plant.
 */

export * from './types.js';
export {
  ValidationError,
  DivergenceError,
  UnknownCommandError,
  TransportError,
  SessionClosedError,
  type ValidationIssue,
} from './errors.js';
export {
  DEFAULT_PLANT,
  DEFAULT_EQUILIBRIUM,
  DEFAULT_GAINS,
  DEFAULT_SESSION_CONFIG,
  DEFAULT_SAMPLING_INTERVAL,
  resolveSessionConfig,
  readEnvironment,
  type SessionConfigOverrides,
  type EnvironmentConfig,
} from './config.js';
export {
  computeRates,
  computeFlows,
  crossSectionArea,
  liquidVolume,
  radiusAt,
  dischargeFlow,
} from './model.js';
export { integrateStep, clampState, type ClampEvent, type StepResult } from './integrator.js';
export {
  ProportionalController,
  HoldController,
  createController,
  type Controller,
  type ControlContext,
} from './controller.js';
export { NoiseInjector, createRandom, gaussian } from './noise.js';
export { parseCommand, CommandQueue, type Command, type QueuedCommand } from './commands.js';
export * from './session/index.js';
export { createMCPServer, startMCPServer } from './mcp/server.js';
export {
  Logger,
  createLogger,
  configureLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  type LogLevel,
} from './logger.js';
export { VERSION } from './version.js';
