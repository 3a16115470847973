/**
 * @stratgate/utils - Shared utilities package
 *
 * Logger, error taxonomy, error handling, retry policy and environment
 * configuration. No domain logic lives here.
 */

// Logger
export { logger, Logger, LogLevel, winstonLogger, createLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
export { handleError, safeAsync, classifyProviderError, extractStatusCode } from './error-handler.js';
export type { ErrorHandlerResult } from './error-handler.js';
export { RetryPolicy } from './retry-policy.js';
export type { RetryPolicyOptions, SleepFn } from './retry-policy.js';
