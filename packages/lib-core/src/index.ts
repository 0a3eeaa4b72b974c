/**
 * @claimshield/lib-core
 *
 * Shared infrastructure for the ClaimShield packages: structured logging and
 * the access control error hierarchy.
 */

export {
  createLogger,
  setLoggerConfig,
  getLoggerConfig,
  initLoggerFromEnv,
  hashUserIdForLog,
  DEFAULT_LOGGER_CONFIG,
  DEFAULT_SERVICE_NAME,
  LOG_LEVELS,
  LOG_FORMATS,
} from './utils/logger';
export type { Logger, LogContext, LoggerConfig, LogLevel, LogFormat } from './utils/logger';

export {
  AccessControlError,
  PolicyNotFoundError,
  PolicyValidationError,
  PolicyStoreError,
  isAccessControlError,
  toError,
  ERROR_CODES,
} from './utils/errors';
export type { ErrorCode, ErrorResponseBody } from './utils/errors';
