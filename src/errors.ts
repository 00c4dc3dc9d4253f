/**
 * Error taxonomy
 *
 * ValidationError and UnknownCommandError are per-request and leave the
 * session running. DivergenceError is fatal to the session that raised it.
 */

import type { TankId, VariableKind } from './types.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], context = 'Invalid input') {
    super(`${context}: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class DivergenceError extends Error {
  readonly tank: TankId;
  readonly variable: VariableKind;
  readonly value: number;
  readonly stage: string;
  simulatedTime: number | null = null;

  constructor(tank: TankId, variable: VariableKind, value: number, stage: string) {
    super(`Integration diverged: ${tank}.${variable} = ${value} (${stage})`);
    this.name = 'DivergenceError';
    this.tank = tank;
    this.variable = variable;
    this.value = value;
    this.stage = stage;
  }
}

export class UnknownCommandError extends Error {
  readonly received: unknown;

  constructor(received: unknown) {
    super(`Unknown command: ${describe(received)}`);
    this.name = 'UnknownCommandError';
    this.received = received;
  }
}

export class TransportError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message = 'Owning connection lost') {
    super(`${message} (session ${sessionId})`);
    this.name = 'TransportError';
    this.sessionId = sessionId;
  }
}

export class SessionClosedError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} is closed or unknown`);
    this.name = 'SessionClosedError';
    this.sessionId = sessionId;
  }
}

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
