/**
 * Ratio Kit Shared Package - Main Entry Point
 *
 * For specialized functionality, use subpath imports:
 * - @ratio-kit/shared/fundamental-analysis
 * - @ratio-kit/shared/errors
 * - @ratio-kit/shared/config
 * - @ratio-kit/shared/utils/logger
 */

// ===== CONFIGURATION EXPORTS =====
export type { AppConfig, DisplayConfig, NormalizerConfig } from './config';
export { getConfig, resetConfig, setConfig } from './config';

// ===== ERROR EXPORTS =====
export {
  AliasTableError,
  AmbiguousPeriodError,
  BadRequestError,
  ConflictError,
  ConflictingFieldError,
  getErrorMessage,
  InternalError,
  InvalidPeriodError,
  InvariantViolationError,
  isRatioKitError,
  RatioKitError,
} from './errors';

// ===== FUNDAMENTAL ANALYSIS EXPORTS =====
export * from './fundamental-analysis';

// ===== LOGGING EXPORTS =====
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface';
export { logger } from './utils/logger';
