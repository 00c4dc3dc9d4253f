/**
 * Session Registry
 *
 * Maps session ids to their loops and implements the external session
 * operations. Sessions share nothing but this map; each loop owns copies
 * of its plant, operating point and configuration.
 */

import { randomUUID } from 'crypto';
import { parseCommand, type QueuedCommand } from '../commands.js';
import {
  DEFAULT_EQUILIBRIUM,
  DEFAULT_PLANT,
  DEFAULT_SESSION_CONFIG,
  resolveSessionConfig,
  type SessionConfigOverrides,
} from '../config.js';
import type { Controller } from '../controller.js';
import { SessionClosedError, TransportError, UnknownCommandError } from '../errors.js';
import { Logger, loggers } from '../logger.js';
import type {
  CloseReason,
  EquilibriumPoint,
  PlantConfig,
  SessionConfig,
  SessionStatusReport,
  StateSnapshot,
} from '../types.js';
import {
  parseEquilibrium,
  validateNoise,
  validatePlant,
  validateSamplingInterval,
  validateSessionConfig,
} from '../validate.js';
import { SessionLoop, type SessionDriver } from './loop.js';
import type { SnapshotStream } from './stream.js';

// =============================================================================
// Types
// =============================================================================

export interface InitializeRequest {
  samplingInterval: number;
  noiseEnabled: boolean;
  noiseLevel: number;
  noiseSeed?: number;
  equilibrium?: EquilibriumPoint;
  plant?: PlantConfig;
  config?: SessionConfigOverrides;
  controller?: Controller;
  driver?: SessionDriver;
  autoStart?: boolean;          // default true
}

export interface SessionHandle {
  readonly id: string;
  readonly createdAt: string;
}

export type SessionRef = SessionHandle | string;

export interface SubscribeOptions {
  capacity?: number;
}

export interface RegistryOptions {
  config?: SessionConfigOverrides;   // defaults applied under each request's overrides
  logger?: Logger;
}

function idOf(ref: SessionRef): string {
  return typeof ref === 'string' ? ref : ref.id;
}

// =============================================================================
// Registry
// =============================================================================

export class SessionRegistry {
  private sessions = new Map<string, SessionLoop>();
  private defaults: SessionConfig;
  private log: Logger;

  constructor(options: RegistryOptions = {}) {
    this.defaults = resolveSessionConfig(options.config, DEFAULT_SESSION_CONFIG);
    this.log = options.logger ?? loggers.registry;
  }

  /**
   * Validate the request, create a session at its equilibrium point and
   * start it. Throws ValidationError without creating anything.
   */
  initialize(request: InitializeRequest): SessionHandle {
    const samplingInterval = validateSamplingInterval(request.samplingInterval);
    const noise = validateNoise(request.noiseEnabled, request.noiseLevel, request.noiseSeed);
    const plant = validatePlant(request.plant ?? DEFAULT_PLANT);
    const equilibrium = parseEquilibrium(request.equilibrium ?? DEFAULT_EQUILIBRIUM, plant);
    const config = validateSessionConfig(resolveSessionConfig(request.config, this.defaults));

    const handle: SessionHandle = { id: randomUUID(), createdAt: new Date().toISOString() };
    const loop = new SessionLoop({
      id: handle.id,
      plant,
      equilibrium,
      samplingInterval,
      noise,
      config,
      controller: request.controller,
      driver: request.driver,
    });

    loop.on('closed', () => {
      this.sessions.delete(handle.id);
    });
    this.sessions.set(handle.id, loop);

    this.log.info('Session initialized', {
      id: handle.id,
      samplingInterval,
      noise: noise.enabled ? noise.level : false,
      driver: loop.driver,
    });

    if (request.autoStart !== false) loop.start();
    return handle;
  }

  /**
   * Parse and enqueue an operator command. Applied at the start of the
   * session's next tick.
   */
  submitCommand(ref: SessionRef, input: unknown): QueuedCommand {
    const loop = this.require(ref);

    try {
      return loop.submit(parseCommand(input, loop.plantConfig));
    } catch (error) {
      if (error instanceof UnknownCommandError) {
        this.log.warn(error.message, { session: loop.id });
      }
      throw error;
    }
  }

  subscribe(ref: SessionRef, options: SubscribeOptions = {}): SnapshotStream {
    return this.require(ref).subscribe(options.capacity);
  }

  /**
   * Close a session. Returns false when it was already closed or unknown.
   */
  close(ref: SessionRef, reason: CloseReason = 'requested'): boolean {
    const loop = this.sessions.get(idOf(ref));
    if (!loop || loop.closed) return false;
    loop.close(reason);
    return true;
  }

  /**
   * The owning connection went away: close with reason `transport`
   */
  connectionLost(ref: SessionRef): boolean {
    const loop = this.sessions.get(idOf(ref));
    if (!loop) return false;

    const error = new TransportError(loop.id);
    this.log.warn(error.message);
    return this.close(ref, 'transport');
  }

  status(ref: SessionRef): SessionStatusReport {
    return this.require(ref).getStatus();
  }

  snapshot(ref: SessionRef): StateSnapshot {
    return this.require(ref).currentSnapshot();
  }

  /**
   * Last snapshot delivered to subscribers (with noise when enabled), or
   * null before the first tick
   */
  lastSnapshot(ref: SessionRef): StateSnapshot | null {
    return this.require(ref).lastSnapshot();
  }

  /**
   * Direct access to a session's loop (manual drivers, event listeners)
   */
  loop(ref: SessionRef): SessionLoop {
    return this.require(ref);
  }

  list(): SessionStatusReport[] {
    return [...this.sessions.values()].map((loop) => loop.getStatus());
  }

  has(ref: SessionRef): boolean {
    return this.sessions.has(idOf(ref));
  }

  get size(): number {
    return this.sessions.size;
  }

  closeAll(reason: CloseReason = 'requested'): number {
    let closed = 0;
    for (const id of [...this.sessions.keys()]) {
      if (this.close(id, reason)) closed++;
    }
    return closed;
  }

  private require(ref: SessionRef): SessionLoop {
    const id = idOf(ref);
    const loop = this.sessions.get(id);
    if (!loop || loop.closed) throw new SessionClosedError(id);
    return loop;
  }
}
