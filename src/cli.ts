#!/usr/bin/env node
/**
 * tank-sim CLI
 *
 *   tank-sim run [options]   stream snapshots of one session to the console
 *   tank-sim mcp             serve the MCP boundary on stdio
 *   tank-sim help
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { readEnvironment, DEFAULT_PLANT, DEFAULT_SAMPLING_INTERVAL, type EnvironmentConfig } from './config.js';
import { ValidationError } from './errors.js';
import { configureLogger, loggers, parseLogLevel, setLogLevel, type LogLevel } from './logger.js';
import { startMCPServer } from './mcp/server.js';
import { SessionRegistry } from './session/registry.js';
import type { IntegrationMethod, StateSnapshot, TankId, VariableKind } from './types.js';
import { PROCESS_TANK_IDS, TANK_IDS, isTankId, isVariableKind } from './types.js';
import { validateSetpoint } from './validate.js';
import { VERSION } from './version.js';

const log = loggers.cli;

// =============================================================================
// Types
// =============================================================================

/**
 * Setpoint change applied at a given tick, e.g. `C:level=2.0@10`
 */
export interface SetpointStep {
  tank: TankId;
  variable: VariableKind;
  value: number;
  atTick: number;
}

export interface RunOptions {
  samplingInterval: number;
  method: IntegrationMethod;
  timeScale: number;
  noiseLevel: number;
  noiseSeed?: number;
  ticks: number | null;
  steps: SetpointStep[];
  json: boolean;
  logLevel: LogLevel | null;
}

export type CliCommand =
  | { command: 'run'; options: RunOptions }
  | { command: 'mcp'; logLevel: LogLevel | null }
  | { command: 'help' };

// =============================================================================
// Argument Parsing
// =============================================================================

function invalid(path: string, message: string): ValidationError {
  return new ValidationError([{ path, message }], 'Invalid arguments');
}

function numberFlag(flag: string, raw: string | undefined, min = 0, exclusive = true): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    throw invalid(flag, 'expects a number');
  }
  if (exclusive ? value <= min : value < min) {
    throw invalid(flag, `must be ${exclusive ? '>' : '>='} ${min}`);
  }
  return value;
}

function countFlag(flag: string, raw: string | undefined): number {
  const value = numberFlag(flag, raw, 1, false);
  if (!Number.isInteger(value)) throw invalid(flag, 'must be a whole number');
  return value;
}

/**
 * Parse `<tank>:<variable>=<value>@<tick>`. The value is checked against
 * the default plant's setpoint bounds.
 */
export function parseStep(raw: string): SetpointStep {
  const match = /^([A-E]):(level|concentration)=([^@]+)@(\d+)$/.exec(raw.trim());
  const tank = match?.[1];
  const variable = match?.[2];
  if (!match || !isTankId(tank) || !isVariableKind(variable)) {
    throw invalid('--step', `expected <tank>:<level|concentration>=<value>@<tick>, got "${raw}"`);
  }

  const value = numberFlag('--step', match[3], -Infinity);
  return {
    tank,
    variable,
    value: validateSetpoint(tank, variable, value, DEFAULT_PLANT),
    atTick: countFlag('--step', match[4]),
  };
}

export function parseArgs(argv: string[], env: EnvironmentConfig = readEnvironment()): CliCommand {
  const [command = 'help', ...rest] = argv;

  if (command === 'help' || command === '--help' || command === '-h') return { command: 'help' };

  const options: RunOptions = {
    samplingInterval: env.samplingInterval ?? DEFAULT_SAMPLING_INTERVAL,
    method: env.method ?? 'rk4',
    timeScale: env.timeScale ?? 1,
    noiseLevel: 0,
    ticks: null,
    steps: [],
    json: false,
    logLevel: env.logLevel,
  };

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const value = (): string | undefined => rest[++i];

    switch (flag) {
      case '--interval':
        options.samplingInterval = numberFlag(flag, value());
        break;
      case '--method': {
        const method = value();
        if (method !== 'euler' && method !== 'rk4') throw invalid(flag, `expects 'euler' or 'rk4'`);
        options.method = method;
        break;
      }
      case '--time-scale':
        options.timeScale = numberFlag(flag, value());
        break;
      case '--noise':
        options.noiseLevel = numberFlag(flag, value(), 0, false);
        break;
      case '--seed':
        options.noiseSeed = Math.trunc(numberFlag(flag, value(), -Infinity));
        break;
      case '--ticks':
        options.ticks = countFlag(flag, value());
        break;
      case '--step':
        options.steps.push(parseStep(value() ?? ''));
        break;
      case '--json':
        options.json = true;
        break;
      case '--log-level': {
        const level = parseLogLevel(value() ?? '');
        if (!level) throw invalid(flag, 'expects debug, info, warn, error or silent');
        options.logLevel = level;
        break;
      }
      default:
        throw invalid(flag ?? '', 'unknown option');
    }
  }

  if (command === 'run') return { command: 'run', options };
  if (command === 'mcp') return { command: 'mcp', logLevel: options.logLevel };
  throw invalid('command', `unknown command "${command}"`);
}

// =============================================================================
// Output
// =============================================================================

export function formatSnapshot(snapshot: StateSnapshot): string {
  const levels = TANK_IDS.map((id) => `${id} ${snapshot.levels[id].toFixed(3)}`).join('  ');
  const concentrations = PROCESS_TANK_IDS.map(
    (id) => `${id} ${snapshot.concentrations[id].toFixed(1)}`
  ).join('  ');
  const setpoints = snapshot.activeSetpoints
    .map((s) => `${s.tank}.${s.variable}=${s.value}`)
    .join(',');

  return [
    `#${String(snapshot.sequence).padStart(4)}`,
    `t=${snapshot.simulatedTime.toFixed(1).padStart(7)}s`,
    `h[m] ${levels}`,
    `c[kg/m3] ${concentrations}`,
    setpoints ? `sp ${setpoints}` : '',
    snapshot.noisy ? '~' : '',
  ]
    .filter(Boolean)
    .join(' | ');
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Run one timer-driven session until `ticks` snapshots were printed, or
 * until interrupted.
 */
export async function run(
  options: RunOptions,
  output: (line: string) => void = console.log,
  registry: SessionRegistry = new SessionRegistry()
): Promise<number> {
  // Steps are submitted from inside ticks; reject bad ones before the session exists
  for (const step of options.steps) {
    validateSetpoint(step.tank, step.variable, step.value, DEFAULT_PLANT);
  }

  const handle = registry.initialize({
    samplingInterval: options.samplingInterval,
    noiseEnabled: options.noiseLevel > 0,
    noiseLevel: options.noiseLevel,
    noiseSeed: options.noiseSeed,
    config: { method: options.method, timeScale: options.timeScale },
  });
  const stream = registry.subscribe(handle);

  // A step for tick N is queued right after tick N-1 so it lands in tick N
  const pending = [...options.steps].sort((a, b) => a.atTick - b.atTick);
  const submitDue = (nextTick: number) => {
    while (pending.length > 0 && pending[0].atTick <= nextTick) {
      const step = pending.shift();
      if (step) {
        registry.submitCommand(handle, { type: 'setpoint', ...step });
        log.info(`Step ${step.tank}.${step.variable} → ${step.value} at tick ${step.atTick}`);
      }
    }
  };
  submitDue(1);
  registry.loop(handle).on('snapshot', (snapshot: StateSnapshot) => submitDue(snapshot.sequence + 1));

  const interrupt = () => registry.close(handle);
  process.once('SIGINT', interrupt);

  let printed = 0;
  try {
    for await (const snapshot of stream) {
      output(options.json ? JSON.stringify(snapshot) : formatSnapshot(snapshot));
      printed++;
      if (options.ticks !== null && printed >= options.ticks) break;
    }
  } finally {
    process.removeListener('SIGINT', interrupt);
    registry.close(handle);
  }

  return printed;
}

const HELP = `
tank-sim ${VERSION} - tank-mixing process simulation

Commands:
  run         Stream snapshots of one session to the console
  mcp         Serve the session API over MCP on stdio
  help        Show this help

Run options:
  --interval <s>        Wall-clock seconds between snapshots (default ${DEFAULT_SAMPLING_INTERVAL})
  --method <m>          euler | rk4 (default rk4)
  --time-scale <x>      Simulated seconds per wall-clock second (default 1)
  --noise <level>       Relative measurement noise, 0 disables (default 0)
  --seed <n>            Seed for reproducible noise
  --ticks <n>           Stop after n snapshots
  --step <step>         Setpoint change, e.g. C:level=2.0@10 (repeatable)
  --json                Print snapshots as JSON lines
  --log-level <level>   debug | info | warn | error | silent

Environment:
  TANK_SIM_LOG_LEVEL, TANK_SIM_SAMPLING_INTERVAL, TANK_SIM_METHOD, TANK_SIM_TIME_SCALE
`;

/**
 * CLI handler. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.command) {
      case 'run':
        if (parsed.options.logLevel) setLogLevel(parsed.options.logLevel);
        await run(parsed.options);
        return 0;

      case 'mcp':
        // stdout carries the protocol
        configureLogger({
          colors: false,
          sink: (_entry, formatted) => process.stderr.write(`${formatted}\n`),
        });
        if (parsed.logLevel) setLogLevel(parsed.logLevel);
        await startMCPServer();
        return 0;

      case 'help':
        console.log(HELP);
        return 0;
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}

// Run if executed directly
const entry = process.argv[1];
const isMain = entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href;
if (isMain) {
  main().then(
    (code) => {
      if (code !== 0) process.exit(code);
    },
    (error: unknown) => {
      console.error('Fatal:', error);
      process.exit(1);
    }
  );
}
