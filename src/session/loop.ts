/**
 * Session Loop
 *
 * One simulation session: owns the plant state, control channels,
 * setpoints, command queue and subscriber streams. Each tick drains the
 * queue, advances simulated time by samplingInterval × timeScale in
 * controller/integrator sub-steps, and emits one snapshot.
 *
 * Status: initialized → running ⇄ paused; running | paused → reset →
 * running; any → closed.
 */

import { EventEmitter } from 'events';
import { CommandQueue, type Command, type QueuedCommand } from '../commands.js';
import { cloneControls, cloneEquilibrium, clonePlant } from '../config.js';
import { ProportionalController, type Controller } from '../controller.js';
import { DivergenceError, SessionClosedError } from '../errors.js';
import { cloneVector, integrateStep, type ClampEvent } from '../integrator.js';
import { Logger, loggers } from '../logger.js';
import { NoiseInjector } from '../noise.js';
import type {
  CloseReason,
  ControlChannels,
  EquilibriumPoint,
  NoiseSettings,
  PlantConfig,
  ProcessState,
  SessionConfig,
  SessionStatus,
  SessionStatusReport,
  Setpoint,
  SetpointKey,
  StateSnapshot,
} from '../types.js';
import { setpointKey } from '../types.js';
import { SnapshotStream } from './stream.js';

// =============================================================================
// Types
// =============================================================================

export type SessionDriver = 'timer' | 'manual';

export interface SessionLoopOptions {
  id: string;
  plant: PlantConfig;
  equilibrium: EquilibriumPoint;
  samplingInterval: number;     // wall-clock s between ticks
  noise: NoiseSettings;
  config: SessionConfig;
  controller?: Controller;
  driver?: SessionDriver;
  logger?: Logger;
}

export interface ClosedEvent {
  sessionId: string;
  reason: CloseReason;
  error?: Error;
  discardedCommands: number;
}

export interface FaultEvent {
  sessionId: string;
  error: Error;
}

interface PendingClose {
  reason: CloseReason;
  error?: Error;
}

// Guards the last sub-step against floating point remainders
const TIME_EPSILON = 1e-9;

// =============================================================================
// Session Loop
// =============================================================================

export class SessionLoop extends EventEmitter {
  readonly id: string;
  readonly driver: SessionDriver;
  readonly samplingInterval: number;

  private plant: PlantConfig;
  private equilibrium: EquilibriumPoint;
  private config: SessionConfig;
  private controller: Controller;
  private noise: NoiseInjector;
  private log: Logger;

  private status: SessionStatus = 'initialized';
  private state: ProcessState;
  private controls: ControlChannels;
  private setpoints = new Map<SetpointKey, Setpoint>();
  private simulatedTime = 0;
  private ticks = 0;
  private sequence = 0;
  private clampEvents = 0;
  private droppedByClosedStreams = 0;

  private queue = new CommandQueue();
  private streams = new Set<SnapshotStream>();
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private pendingClose: PendingClose | null = null;
  private lastEmitted: StateSnapshot | null = null;

  constructor(options: SessionLoopOptions) {
    super();
    this.id = options.id;
    this.driver = options.driver ?? 'timer';
    this.samplingInterval = options.samplingInterval;
    this.plant = clonePlant(options.plant);
    this.equilibrium = cloneEquilibrium(options.equilibrium);
    this.config = { ...options.config, gains: { ...options.config.gains } };
    this.controller =
      options.controller ??
      new ProportionalController({ gains: this.config.gains, slewRate: this.config.slewRate });
    this.noise = new NoiseInjector(options.noise);
    this.log = (options.logger ?? loggers.session).child(this.id.slice(0, 8));

    this.state = this.equilibriumState();
    this.controls = cloneControls(this.equilibrium.controls);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  start(): { success: boolean; message: string } {
    if (this.status !== 'initialized') {
      return { success: false, message: `Session already ${this.status}` };
    }

    this.setStatus('running');
    if (this.driver === 'timer') {
      this.timer = setInterval(() => this.tick(), this.samplingInterval * 1000);
    }

    this.log.info('Session started', {
      samplingInterval: this.samplingInterval,
      method: this.config.method,
      driver: this.driver,
    });
    return { success: true, message: `Session ${this.id} running` };
  }

  /**
   * Close the session. Inside a tick the close takes effect once the
   * tick completes. Idempotent.
   */
  close(reason: CloseReason = 'requested', error?: Error): void {
    if (this.status === 'closed') return;

    if (this.ticking) {
      this.pendingClose ??= { reason, error };
      return;
    }
    this.finishClose(reason, error);
  }

  get closed(): boolean {
    return this.status === 'closed';
  }

  get plantConfig(): PlantConfig {
    return this.plant;
  }

  // ===========================================================================
  // Producers
  // ===========================================================================

  submit(command: Command): QueuedCommand {
    if (this.status === 'closed') throw new SessionClosedError(this.id);

    const queued = this.queue.enqueue(command);
    this.log.debug('Command queued', { seq: queued.seq, type: command.type });
    return queued;
  }

  subscribe(capacity: number = this.config.streamCapacity): SnapshotStream {
    if (this.status === 'closed') throw new SessionClosedError(this.id);

    const stream = new SnapshotStream(capacity, (detached) => {
      if (this.streams.delete(detached)) {
        this.droppedByClosedStreams += detached.dropped;
      }
    });
    this.streams.add(stream);
    return stream;
  }

  // ===========================================================================
  // Tick
  // ===========================================================================

  /**
   * Run one tick. Returns the emitted snapshot, or null when none was
   * emitted (paused, not started, closed, or faulted).
   */
  tick(): StateSnapshot | null {
    if (this.status === 'initialized' || this.status === 'closed') return null;

    this.ticking = true;
    try {
      for (const queued of this.queue.drain()) {
        this.apply(queued.command);
      }
      this.ticks++;

      if (this.status === 'paused') return null;

      if (this.status === 'reset') {
        const snapshot = this.emitSnapshot();
        this.setStatus('running');
        return snapshot;
      }

      this.advance(this.samplingInterval * this.config.timeScale);
      return this.emitSnapshot();
    } catch (error) {
      this.handleFault(error);
      return null;
    } finally {
      this.ticking = false;
      const pending = this.pendingClose;
      this.pendingClose = null;
      if (pending) this.finishClose(pending.reason, pending.error);
    }
  }

  private advance(span: number): void {
    const step = this.config.integrationStep;
    const count = Math.max(1, Math.ceil(span / step - TIME_EPSILON));

    let state = this.state;
    let controls = this.controls;

    for (let i = 0; i < count; i++) {
      const dt = i < count - 1 ? step : span - step * (count - 1);

      controls = this.controller.compute({
        state,
        equilibrium: this.equilibrium,
        setpoints: this.setpoints,
        previous: controls,
        dt,
      });

      const result = integrateStep(state, controls, dt, {
        plant: this.plant,
        method: this.config.method,
      });
      if (result.clamps.length > 0) this.recordClamps(result.clamps);
      state = result.state;
    }

    // Commit only after every sub-step succeeded
    this.state = state;
    this.controls = controls;
    this.simulatedTime += span;
  }

  private recordClamps(clamps: ClampEvent[]): void {
    this.clampEvents += clamps.length;
    for (const clamp of clamps) {
      this.log.debug('Clamped', clamp);
      this.notify('clamp', clamp);
    }
  }

  private handleFault(error: unknown): void {
    const fault = error instanceof Error ? error : new Error(String(error));

    if (fault instanceof DivergenceError) {
      fault.simulatedTime = this.simulatedTime;
      this.log.error('Integration diverged', {
        tank: fault.tank,
        variable: fault.variable,
        value: fault.value,
        stage: fault.stage,
        simulatedTime: this.simulatedTime,
      });
    } else {
      this.log.error(`Tick failed: ${fault.message}`);
    }

    this.pendingClose = { reason: fault instanceof DivergenceError ? 'diverged' : 'fault', error: fault };
    const event: FaultEvent = { sessionId: this.id, error: fault };
    this.notify('fault', event);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private apply(command: Command): void {
    switch (command.type) {
      case 'setpoint': {
        const setpoint: Setpoint = {
          tank: command.tank,
          variable: command.variable,
          value: command.value,
          issuedAt: this.simulatedTime,
        };
        this.setpoints.set(setpointKey(command.tank, command.variable), setpoint);
        this.log.info('Setpoint applied', setpoint);
        break;
      }
      case 'clear-setpoint':
        this.setpoints.delete(setpointKey(command.tank, command.variable));
        break;
      case 'pause':
        if (this.status === 'running' || this.status === 'reset') this.setStatus('paused');
        break;
      case 'resume':
        if (this.status === 'paused') this.setStatus('running');
        break;
      case 'reset':
        this.state = this.equilibriumState();
        this.controls = cloneControls(this.equilibrium.controls);
        this.setpoints.clear();
        this.simulatedTime = 0;
        this.setStatus('reset');
        break;
      case 'noise':
        this.noise.configure(command.enabled, command.level);
        break;
    }
  }

  // ===========================================================================
  // Snapshots
  // ===========================================================================

  private emitSnapshot(): StateSnapshot {
    this.sequence++;
    const noisy = this.noise.active;
    const snapshot = this.buildSnapshot(this.noise.apply(this.state, this.plant), noisy);

    for (const stream of this.streams) {
      stream.push(snapshot);
    }
    this.lastEmitted = snapshot;
    this.notify('snapshot', snapshot);
    return snapshot;
  }

  /**
   * Last snapshot delivered to subscribers, noise included. Null before
   * the first emission.
   */
  lastSnapshot(): StateSnapshot | null {
    return this.lastEmitted;
  }

  /**
   * Latest noise-free view; does not advance the sequence
   */
  currentSnapshot(): StateSnapshot {
    return this.buildSnapshot(this.state, false);
  }

  private buildSnapshot(reported: ProcessState, noisy: boolean): StateSnapshot {
    return {
      sessionId: this.id,
      sequence: this.sequence,
      simulatedTime: this.simulatedTime,
      status: this.status,
      levels: { ...reported.levels },
      concentrations: { ...reported.concentrations },
      controlChannels: cloneControls(this.controls),
      activeSetpoints: [...this.setpoints.values()].map((setpoint) => ({ ...setpoint })),
      noisy,
      emittedAt: new Date().toISOString(),
    };
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  getStatus(): SessionStatusReport {
    let dropped = this.droppedByClosedStreams;
    for (const stream of this.streams) {
      dropped += stream.dropped;
    }

    return {
      id: this.id,
      status: this.status,
      samplingInterval: this.samplingInterval,
      simulatedTime: this.simulatedTime,
      ticks: this.ticks,
      snapshotsEmitted: this.sequence,
      pendingCommands: this.queue.size,
      clampEvents: this.clampEvents,
      droppedSnapshots: dropped,
      subscribers: this.streams.size,
      noise: this.noise.settings,
      method: this.config.method,
      controller: this.controller.name,
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private equilibriumState(): ProcessState {
    return cloneVector(this.equilibrium);
  }

  private setStatus(status: SessionStatus): void {
    if (this.status === status) return;
    const previous = this.status;
    this.status = status;
    this.log.debug(`Status ${previous} → ${status}`);
    this.notify('status', status, previous);
  }

  private finishClose(reason: CloseReason, error?: Error): void {
    if (this.status === 'closed') return;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const discardedCommands = this.queue.clear();
    this.setStatus('closed');

    for (const stream of [...this.streams]) {
      if (error) {
        stream.fail(error);
      } else {
        stream.end();
      }
    }

    this.log.info('Session closed', { reason, discardedCommands });

    const event: ClosedEvent = { sessionId: this.id, reason, discardedCommands };
    if (error) event.error = error;
    this.notify('closed', event);
  }

  /**
   * Emit to listeners. A throwing listener is logged and never reaches
   * the tick.
   */
  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.log.error(`Listener for '${event}' failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
