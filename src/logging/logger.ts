// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON output for production, pretty-print for development
// - Component-based child loggers
// - Credential redaction on every entry
//
// Usage:
//   import { getLogger } from '../logging/index.js';
//
//   const logger = getLogger({ component: 'batch' });
//   logger.info('Chunk processed', { chunk: 2, of: 3 });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Enable credential redaction */
  redact?: boolean;

  /** Additional redaction options */
  redactionOptions?: RedactionOptions;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context merged into every entry */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redact: true,
  serviceName: 'takeoff-converter',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
  rootLogger = null;
}

/**
 * LOG_LEVEL wins over the configured level.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component ? { component } : {}),
    ...context,
  };

  if (globalConfig.redact) {
    return redact(entry, globalConfig.redactionOptions);
  }

  return entry;
}

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const colors: Record<LogLevel, string> = {
    trace: '\x1b[90m',
    debug: '\x1b[36m',
    info: '\x1b[32m',
    warn: '\x1b[33m',
    error: '\x1b[31m',
    fatal: '\x1b[35m',
  };
  const reset = '\x1b[0m';
  const dim = '\x1b[2m';

  const time = typeof entry.time === 'string' ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const component = typeof entry.component === 'string' ? `[${entry.component}]` : '';
  const msg = String(entry.msg);

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      contextFields[key] = value;
    }
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${dim}${JSON.stringify(contextFields)}${reset}`
    : '';

  return `${dim}${time}${reset} ${colors[level]}${level.toUpperCase().padEnd(5)}${reset} ${component} ${msg}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const output = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (level === 'error' || level === 'fatal') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  // Resolved per call so module-level loggers follow configureLogger()
  const levelNum = (): number => LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (LOG_LEVELS[level] < levelNum()) {
      return;
    }
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (LOG_LEVELS[level] < levelNum()) {
      return;
    }
    const errorContext = error !== undefined ? formatError(error) : {};
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => createLoggerImpl({
      component: childOptions.component ?? component,
      context: { ...baseContext, ...childOptions.context },
    }),

    isLevelEnabled: (level: LogLevel): boolean => LOG_LEVELS[level] >= levelNum(),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Measure and log execution time.
 */
export async function withTiming<T>(
  name: string,
  fn: () => Promise<T>,
  logger?: ILogger
): Promise<T> {
  const log = logger ?? getLogger({ component: 'perf' });
  const start = performance.now();

  try {
    const result = await fn();
    log.debug(`${name} completed`, { durationMs: Number((performance.now() - start).toFixed(2)) });
    return result;
  } catch (error) {
    log.error(`${name} failed`, error, { durationMs: Number((performance.now() - start).toFixed(2)) });
    throw error;
  }
}
