/**
 * Error Handler
 * =============
 * Centralized error handling utilities.
 */

import {
  AppError,
  ProviderAuthError,
  ProviderTransientError,
  isRetryableError,
} from './errors.js';
import { logger } from './logger.js';

/**
 * Error handler result
 */
export interface ErrorHandlerResult {
  handled: boolean;
  message: string;
  shouldRetry: boolean;
  retryAfterMs?: number;
}

/**
 * Handle and log error appropriately
 */
export function handleError(error: unknown, context?: Record<string, unknown>): ErrorHandlerResult {
  // Convert unknown errors to Error instances
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AppError) {
    // Operational errors - log as warn
    if (err.isOperational) {
      logger.warn('Operational error occurred', {
        ...err.context,
        ...context,
        error: {
          name: err.name,
          message: err.message,
          code: err.code,
          statusCode: err.statusCode,
        },
      });
    } else {
      // Programming errors - log as error
      logger.error('Application error occurred', err, {
        ...err.context,
        ...context,
      });
    }
  } else {
    logger.error('Unknown error occurred', err, context);
  }

  return {
    handled: true,
    message: err.message,
    shouldRetry: isRetryableError(err),
    retryAfterMs: err instanceof ProviderTransientError ? err.retryAfterMs : undefined,
  };
}

/**
 * Safe async wrapper - catches and logs errors without throwing
 */
export async function safeAsync<T>(
  fn: () => Promise<T>,
  defaultValue: T,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    handleError(error, context);
    return defaultValue;
  }
}

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const AUTH_STATUS_CODES = new Set([401, 403]);
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);
const TRANSIENT_MESSAGE = /rate.?limit|quota|too many requests/i;
const AUTH_MESSAGE = /unauthori[sz]ed|forbidden|invalid api key|credential/i;

function readField(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    const field: unknown = Reflect.get(value, key);
    return field;
  }
  return undefined;
}

/**
 * Extract an HTTP status code from an HTTP-client error (axios shape: error.response.status)
 */
export function extractStatusCode(error: unknown): number | undefined {
  const status = readField(readField(error, 'response'), 'status');
  return typeof status === 'number' ? status : undefined;
}

function extractRetryAfterMs(error: unknown): number | undefined {
  const header = readField(readField(readField(error, 'response'), 'headers'), 'retry-after');
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

/**
 * Map a raw provider failure onto the error taxonomy.
 *
 * Already-classified AppErrors pass through untouched; anything not recognised
 * as transient or auth comes back as-is (and is therefore not retried).
 */
export function classifyProviderError(error: unknown, provider: string): unknown {
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = extractStatusCode(error);
  const code = readField(error, 'code');

  if (status !== undefined && AUTH_STATUS_CODES.has(status)) {
    return new ProviderAuthError(`${provider} rejected the request (HTTP ${status})`, provider);
  }
  if (status === undefined && AUTH_MESSAGE.test(message)) {
    return new ProviderAuthError(`${provider} rejected the credentials: ${message}`, provider);
  }
  if (
    (status !== undefined && TRANSIENT_STATUS_CODES.has(status)) ||
    (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) ||
    TRANSIENT_MESSAGE.test(message)
  ) {
    return new ProviderTransientError(
      `${provider} transient failure: ${message}`,
      provider,
      status,
      extractRetryAfterMs(error)
    );
  }

  return error;
}
