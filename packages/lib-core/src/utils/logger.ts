/**
 * Structured Logger
 *
 * JSON-structured logging shared by every ClaimShield package.
 * Each entry is a single line so that log shippers can parse it without
 * multi-line handling.
 *
 * Output format:
 * {"timestamp":"2025-01-01T00:00:00.000Z","level":"info","service":"claimshield","module":"POLICY_ENGINE","message":"..."}
 */

/**
 * Log levels in order of severity (lowest to highest).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log output format.
 */
export type LogFormat = 'json' | 'pretty';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];

/**
 * Logger configuration for level filtering and output format.
 */
export interface LoggerConfig {
  /** Minimum log level to output (default: 'info') */
  level: LogLevel;
  /** 'json' for structured logs, 'pretty' for human-readable (default: 'json') */
  format: LogFormat;
  /** If true, hash userId in logs (default: false) */
  hashUserId: boolean;
  /** Per-module level overrides, keyed by module name */
  moduleOverrides?: Record<string, { level?: LogLevel }>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  format: 'json',
  hashUserId: false,
};

export const DEFAULT_SERVICE_NAME = 'claimshield';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalLoggerConfig: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

/**
 * Set global logger configuration.
 * @param config - Partial configuration merged over the defaults
 */
export function setLoggerConfig(config: Partial<LoggerConfig>): void {
  globalLoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalLoggerConfig };
}

/**
 * Context included with every log entry.
 */
export interface LogContext {
  /** Service name (defaults to 'claimshield') */
  service: string;
  /** Request identifier for correlation */
  requestId?: string;
  /** Subject identifier the entry concerns */
  userId?: string;
  /** Hashed subject identifier (used when hashUserId is enabled) */
  userIdHash?: string;
  /** Module/component name */
  module?: string;
  /** Action being performed */
  action?: string;
  /** Operation duration in milliseconds */
  durationMs?: number;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>, error?: Error): void;
  error(message: string, context?: Partial<LogContext>, error?: Error): void;
  debug(message: string, context?: Partial<LogContext>): void;
  /** Create a child logger with additional context merged in */
  child(additionalContext: Partial<LogContext>): Logger;
  /** Create a child logger with the module name set */
  module(moduleName: string): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  module?: string;
  durationMs?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

function shouldLog(level: LogLevel, moduleName: string | undefined, config: LoggerConfig): boolean {
  const override = moduleName ? config.moduleOverrides?.[moduleName] : undefined;
  const effectiveLevel = override?.level ?? config.level;
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[effectiveLevel];
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

function formatLogEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'pretty') {
    const reset = '\x1b[0m';
    const time = entry.timestamp.substring(11, 23); // HH:mm:ss.SSS
    const moduleTag = entry.module ? `[${entry.module}] ` : '';
    const duration = entry.durationMs !== undefined ? ` (${entry.durationMs}ms)` : '';
    return `${LEVEL_COLORS[entry.level]}${time} ${entry.level.toUpperCase().padEnd(5)}${reset} ${moduleTag}${entry.message}${duration}`;
  }
  return JSON.stringify(entry);
}

/**
 * djb2 hash for log correlation; not a cryptographic hash.
 */
export function hashUserIdForLog(userId: string): string {
  let hash = 5381;
  for (let i = 0; i < userId.length; i++) {
    hash = (hash * 33) ^ userId.charCodeAt(i);
  }
  return 'uid_' + (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a logger instance with base context.
 *
 * @example
 * const log = createLogger({ requestId: 'req-1' }).module('POLICY_ENGINE');
 * log.info('Policy added', { policyId: 'claim-owner-edit' });
 */
export function createLogger(
  baseContext: Partial<LogContext> = {},
  config?: Partial<LoggerConfig>
): Logger {
  const ctx: LogContext = {
    service: DEFAULT_SERVICE_NAME,
    ...baseContext,
  };

  const write = (
    level: LogLevel,
    message: string,
    extra?: Partial<LogContext>,
    error?: Error
  ): void => {
    // Resolved per call so setLoggerConfig() applies to loggers created earlier.
    const effectiveConfig = config ? { ...globalLoggerConfig, ...config } : globalLoggerConfig;
    if (!shouldLog(level, ctx.module, effectiveConfig)) {
      return;
    }

    const { service, userId, userIdHash, ...rest } = ctx;
    let effectiveUserId = userId;
    let effectiveHash = userIdHash;
    if (effectiveConfig.hashUserId && effectiveUserId && !effectiveHash) {
      effectiveHash = hashUserIdForLog(effectiveUserId);
      effectiveUserId = undefined;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      ...(effectiveUserId ? { userId: effectiveUserId } : {}),
      ...(effectiveHash ? { userIdHash: effectiveHash } : {}),
      ...rest,
      ...extra,
      ...(error
        ? {
            error: {
              name: error.name,
              message: error.message,
              stack: error.stack,
            },
          }
        : {}),
    };

    const output = formatLogEntry(entry, effectiveConfig.format);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  };

  return {
    info: (msg, extra) => write('info', msg, extra),
    warn: (msg, extra, err) => write('warn', msg, extra, err),
    error: (msg, extra, err) => write('error', msg, extra, err),
    debug: (msg, extra) => write('debug', msg, extra),
    child: (additionalContext) => createLogger({ ...ctx, ...additionalContext }, config),
    module: (moduleName) => createLogger({ ...ctx, module: moduleName }, config),
  };
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Initialize logger configuration from environment variables.
 * Call once at startup, from the composition root.
 *
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" (default: "info")
 * - LOG_FORMAT: "json" | "pretty" (default: "json")
 * - LOG_HASH_USER_ID: "true" to hash user IDs (default: false)
 */
export function initLoggerFromEnv(env: {
  LOG_LEVEL?: string;
  LOG_FORMAT?: string;
  LOG_HASH_USER_ID?: string;
}): void {
  setLoggerConfig({
    level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : DEFAULT_LOGGER_CONFIG.level,
    format: isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : DEFAULT_LOGGER_CONFIG.format,
    hashUserId: env.LOG_HASH_USER_ID === 'true',
  });
}
