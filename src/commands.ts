/**
 * Operator Commands
 *
 * Parsing of untyped transport input into typed commands, and the FIFO
 * queue a session drains at the start of each tick.
 */

import { UnknownCommandError, ValidationError, type ValidationIssue } from './errors.js';
import type { PlantConfig, TankId, VariableKind } from './types.js';
import { isVariableKind } from './types.js';
import { assertKnownTank, isRecord, validateSetpoint } from './validate.js';

// =============================================================================
// Types
// =============================================================================

export type Command =
  | { type: 'setpoint'; tank: TankId; variable: VariableKind; value: number }
  | { type: 'clear-setpoint'; tank: TankId; variable: VariableKind }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'reset' }
  | { type: 'noise'; enabled: boolean; level?: number };

export type CommandType = Command['type'];

export const COMMAND_TYPES: readonly CommandType[] = [
  'setpoint',
  'clear-setpoint',
  'pause',
  'resume',
  'reset',
  'noise',
];

export interface QueuedCommand {
  seq: number;
  command: Command;
  receivedAt: number; // ms since epoch
}

// =============================================================================
// Parsing
// =============================================================================

function commandType(value: unknown): CommandType | undefined {
  return COMMAND_TYPES.find((type) => type === value);
}

function readVariable(value: unknown): VariableKind {
  if (!isVariableKind(value)) {
    throw new ValidationError(
      [{ path: 'variable', message: `must be 'level' or 'concentration'` }],
      'Invalid command'
    );
  }
  return value;
}

/**
 * Parse a command received from a transport.
 *
 * A bare string is shorthand for a command without arguments ("pause").
 * Unrecognised shapes or types raise UnknownCommandError; recognised
 * commands with bad arguments raise ValidationError.
 */
export function parseCommand(input: unknown, plant: PlantConfig): Command {
  const source = typeof input === 'string' ? { type: input } : input;
  if (!isRecord(source)) throw new UnknownCommandError(input);

  const type = commandType(source.type);
  if (type === undefined) throw new UnknownCommandError(source.type ?? input);

  switch (type) {
    case 'setpoint': {
      const tank = assertKnownTank(source.tank);
      const variable = readVariable(source.variable);
      const value = validateSetpoint(tank, variable, source.value, plant);
      return { type, tank, variable, value };
    }
    case 'clear-setpoint':
      return { type, tank: assertKnownTank(source.tank), variable: readVariable(source.variable) };
    case 'noise': {
      const issues: ValidationIssue[] = [];
      if (typeof source.enabled !== 'boolean') {
        issues.push({ path: 'enabled', message: 'must be a boolean' });
      }
      const level = source.level;
      if (
        level !== undefined &&
        (typeof level !== 'number' || !Number.isFinite(level) || level < 0 || level > 1)
      ) {
        issues.push({ path: 'level', message: 'must be within [0, 1]' });
      }
      if (issues.length > 0) throw new ValidationError(issues, 'Invalid command');

      const enabled = source.enabled === true;
      return typeof level === 'number' ? { type, enabled, level } : { type, enabled };
    }
    case 'pause':
    case 'resume':
    case 'reset':
      return { type };
  }
}

// =============================================================================
// Queue
// =============================================================================

/**
 * Producers enqueue from any callback; the loop drains the whole queue
 * in one call at tick start.
 */
export class CommandQueue {
  private items: QueuedCommand[] = [];
  private nextSeq = 1;

  enqueue(command: Command, receivedAt: number = Date.now()): QueuedCommand {
    const queued: QueuedCommand = { seq: this.nextSeq++, command, receivedAt };
    this.items.push(queued);
    return queued;
  }

  drain(): QueuedCommand[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  clear(): number {
    const discarded = this.items.length;
    this.items = [];
    return discarded;
  }

  get size(): number {
    return this.items.length;
  }
}
