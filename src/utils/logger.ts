/**
 * Structured Logging Utility
 *
 * Module-scoped loggers for the synthesis engine. Every synthesizer owns one
 * (`emg`, `ecg`, `eog`, `noise`) and derives children for its variants.
 *
 * - Log levels: DEBUG, INFO, WARN, ERROR, SILENT
 * - Text or JSON output, pluggable output handler
 * - Level read from BIOSYNTH_LOG_LEVEL (or LOG_LEVEL) on module load
 * - Loggers follow the global level unless given their own
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevelName;
  /** Module path, e.g. `ecg:arrhythmia` */
  module: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum level to output */
  minLevel: LogLevel;

  /** Emit one JSON object per line instead of bracketed text */
  jsonOutput: boolean;

  /** Prefix text output with the timestamp */
  includeTimestamp: boolean;

  /** Replaces console output when set */
  outputHandler?: (entry: LogEntry) => void;
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

let globalConfig: LoggerConfig = {
  minLevel: LogLevel.WARN,
  jsonOutput: false,
  includeTimestamp: true,
};

/**
 * Parse a level name; unknown names fall back to WARN
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  switch (level?.trim().toLowerCase()) {
    case 'debug':
    case 'trace':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'off':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.WARN;
  }
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Read the level from BIOSYNTH_LOG_LEVEL, then LOG_LEVEL
 */
export function configureFromEnvironment(env: Record<string, string | undefined> = process.env): void {
  const level = env.BIOSYNTH_LOG_LEVEL ?? env.LOG_LEVEL;
  if (level) {
    globalConfig.minLevel = parseLogLevel(level);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

function formatText(entry: LogEntry, includeTimestamp: boolean): string {
  const parts: string[] = [];
  if (includeTimestamp) parts.push(`[${entry.timestamp}]`);
  parts.push(`[${entry.level.toUpperCase()}]`, `[${entry.module}]`, entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }
  return parts.join(' ');
}

function writeToConsole(entry: LogEntry, config: LoggerConfig): void {
  const line = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatText(entry, config.includeTimestamp);

  switch (entry.level) {
    case 'error':
      console.error(line);
      if (entry.error) console.error(entry.error);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

/**
 * Module-specific logger
 */
export class Logger {
  readonly module: string;
  private readonly overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  /** Effective configuration: per-logger overrides over the current global one */
  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.config.minLevel;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isEnabled(level)) return;

    const config = this.config;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      writeToConsole(entry, config);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Run `work` and log its wall time at DEBUG.
   * Errors propagate unchanged; nothing is logged for a failed run.
   */
  timed<T>(message: string, context: Record<string, unknown>, work: () => T): T {
    if (!this.isEnabled(LogLevel.DEBUG)) return work();

    const started = performance.now();
    const result = work();
    const elapsedMs = Math.round((performance.now() - started) * 100) / 100;
    this.debug(message, { ...context, elapsedMs });
    return result;
  }

  /**
   * Child logger named `parent:sub`, sharing this logger's overrides
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }
}

export function createLogger(module: string): Logger {
  return new Logger(module);
}

/**
 * Logger that never outputs (for tests)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

export const defaultLogger = createLogger('biosynth');

configureFromEnvironment();
