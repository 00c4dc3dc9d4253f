/**
 * Controller
 *
 * Feedback strategies that map the measured plant state to control
 * channel values. The session loop depends only on the Controller
 * interface; the proportional law is one implementation.
 */

import type {
  ControlChannels,
  ControlGains,
  EquilibriumPoint,
  ProcessChannels,
  ProcessState,
  Setpoint,
  SetpointKey,
  TankId,
  UtilityChannels,
  VariableKind,
} from './types.js';
import { PROCESS_TANK_IDS, UTILITY_TANK_IDS, setpointKey } from './types.js';
import { cloneControls } from './config.js';

// =============================================================================
// Types
// =============================================================================

export interface ControlContext {
  state: ProcessState;              // noise-free measurement
  equilibrium: EquilibriumPoint;
  setpoints: ReadonlyMap<SetpointKey, Setpoint>;
  previous: ControlChannels;
  dt: number;                       // simulated s since the previous update
}

export interface Controller {
  readonly name: string;
  compute(context: ControlContext): ControlChannels;
}

/**
 * Fixed pairing of each channel with the variable it regulates
 */
export const UTILITY_CHANNEL_TARGETS: Record<keyof UtilityChannels, VariableKind> = {
  supplyValve: 'level',
};

export const PROCESS_CHANNEL_TARGETS: Record<keyof ProcessChannels, VariableKind> = {
  waterPump: 'level',
  brinePump: 'concentration',
  outletValve: 'level',
};

const UTILITY_CHANNELS: readonly (keyof UtilityChannels)[] = ['supplyValve'];
const PROCESS_CHANNELS: readonly (keyof ProcessChannels)[] = ['waterPump', 'brinePump', 'outletValve'];

// =============================================================================
// Helpers
// =============================================================================

export function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

export function measured(state: ProcessState, tank: TankId, variable: VariableKind): number {
  if (variable === 'level') return state.levels[tank];
  if (tank === 'A' || tank === 'B') return 0;
  return state.concentrations[tank];
}

/**
 * Active setpoint for (tank, variable), otherwise the equilibrium value
 */
export function targetFor(
  context: Pick<ControlContext, 'equilibrium' | 'setpoints'>,
  tank: TankId,
  variable: VariableKind
): number {
  const setpoint = context.setpoints.get(setpointKey(tank, variable));
  if (setpoint) return setpoint.value;
  return measured(context.equilibrium, tank, variable);
}

// =============================================================================
// Proportional Controller
// =============================================================================

export interface ProportionalOptions {
  gains: ControlGains;
  slewRate?: number | null;  // max change per simulated second
}

/**
 * u = clamp(u_eq + Kp · (target − measured), 0, 1)
 */
export class ProportionalController implements Controller {
  readonly name = 'proportional';
  private gains: ControlGains;
  private slewRate: number | null;

  constructor(options: ProportionalOptions) {
    this.gains = { ...options.gains };
    this.slewRate = options.slewRate ?? null;
  }

  compute(context: ControlContext): ControlChannels {
    const next = cloneControls(context.equilibrium.controls);

    for (const tank of UTILITY_TANK_IDS) {
      for (const channel of UTILITY_CHANNELS) {
        next[tank][channel] = this.law(
          context,
          tank,
          UTILITY_CHANNEL_TARGETS[channel],
          context.equilibrium.controls[tank][channel],
          this.gains[channel],
          context.previous[tank][channel]
        );
      }
    }

    for (const tank of PROCESS_TANK_IDS) {
      for (const channel of PROCESS_CHANNELS) {
        next[tank][channel] = this.law(
          context,
          tank,
          PROCESS_CHANNEL_TARGETS[channel],
          context.equilibrium.controls[tank][channel],
          this.gains[channel],
          context.previous[tank][channel]
        );
      }
    }

    return next;
  }

  private law(
    context: ControlContext,
    tank: TankId,
    variable: VariableKind,
    base: number,
    gain: number,
    previous: number
  ): number {
    const error = targetFor(context, tank, variable) - measured(context.state, tank, variable);
    const desired = clampUnit(base + gain * error);

    if (this.slewRate === null) return desired;

    const maxDelta = this.slewRate * context.dt;
    return clampUnit(Math.min(Math.max(desired, previous - maxDelta), previous + maxDelta));
  }
}

// =============================================================================
// Hold Controller
// =============================================================================

/**
 * Keeps every channel at its equilibrium value (open loop)
 */
export class HoldController implements Controller {
  readonly name = 'hold';

  compute(context: ControlContext): ControlChannels {
    return cloneControls(context.equilibrium.controls);
  }
}

export function createController(kind: 'proportional' | 'hold', options: ProportionalOptions): Controller {
  return kind === 'hold' ? new HoldController() : new ProportionalController(options);
}
