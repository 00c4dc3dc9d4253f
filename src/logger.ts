/**
 * Logger Module
 *
 * Levelled console logging with per-module prefixes. Loggers follow the
 * global level unless one was set on the instance.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  module: string;
  message: string;
  data?: unknown;
}

export type LogSink = (entry: LogEntry, formatted: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
  sink: LogSink | null;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const LABELS: Record<LogEntry['level'], string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
};

const LEVEL_COLORS: Record<LogEntry['level'], string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  timestamps: true,
  colors: true,
  sink: null,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private overrides: Partial<LoggerConfig>;
  private module: string;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = { ...overrides };
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private format(entry: LogEntry, config: LoggerConfig): string {
    const paint = (color: string, text: string) =>
      config.colors ? `${color}${text}${COLORS.reset}` : text;

    const parts = [
      config.timestamps ? paint(COLORS.dim, `[${entry.timestamp}]`) : '',
      paint(LEVEL_COLORS[entry.level], `[${LABELS[entry.level]}]`),
      paint(COLORS.cyan, `[${entry.module}]`),
      entry.message,
    ].filter(Boolean);

    let output = parts.join(' ');

    if (entry.data !== undefined) {
      if (typeof entry.data === 'object' && entry.data !== null) {
        output += ' ' + JSON.stringify(entry.data);
      } else {
        output += ` ${String(entry.data)}`;
      }
    }

    return output;
  }

  private write(level: LogEntry['level'], message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      data,
    };
    const formatted = this.format(entry, config);

    if (config.sink) {
      config.sink(entry, formatted);
    } else if (level === 'error') {
      console.error(formatted);
    } else if (level === 'warn') {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Create a child logger with a sub-module name
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  getModule(): string {
    return this.module;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Pin the level of this instance, detaching it from the global level
   */
  setLevel(level: LogLevel): void {
    this.overrides.level = level;
  }
}

// =============================================================================
// Global Functions
// =============================================================================

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

export function resetLoggerConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

export function setLogLevel(level: LogLevel): void {
  globalConfig.level = level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.level;
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/**
 * Parse log level from string (CLI flags, environment)
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function getAvailableLevels(): LogLevel[] {
  return ['debug', 'info', 'warn', 'error', 'silent'];
}

// =============================================================================
// Pre-configured Loggers
// =============================================================================

export const loggers = {
  session: createLogger('session'),
  registry: createLogger('registry'),
  integrator: createLogger('integrator'),
  controller: createLogger('controller'),
  mcp: createLogger('mcp'),
  cli: createLogger('cli'),
};

export default Logger;
