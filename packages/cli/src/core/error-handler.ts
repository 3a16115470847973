/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, createLogger } from '@stratgate/utils';

const logger = createLogger('cli');

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [/api[_-]?key/i, /secret/i, /password/i, /bearer/i, /authorization/i];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Log error with full context (for debugging); context values that look sensitive are redacted
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error, {
    ...(error instanceof AppError ? { code: error.code } : {}),
    ...(sanitizedContext ? { context: sanitizedContext } : {}),
  });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return formatError(error);
}

/**
 * Process exit code for an error: 2 for invalid input, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AppError && (error.code === 'VALIDATION_ERROR' || error.code === 'CONFIGURATION_ERROR')
    ? 2
    : 1;
}
