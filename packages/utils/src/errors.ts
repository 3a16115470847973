/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the evaluation and execution pipeline.
 *
 * Risk violations are deliberately absent: a rejected order is data on the
 * RiskAssessment, not an exception.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Configuration error - fatal, surfaced immediately, never retried
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Data quality error - advisory; carries the failing report summary
 */
export class DataQualityError extends AppError {
  public readonly status: string;

  constructor(message: string, status: string, context?: Record<string, unknown>) {
    super(message, 'DATA_QUALITY_ERROR', 422, { status, ...context });
    this.status = status;
  }
}

/**
 * Transient provider error (rate limit, quota, 5xx, network) - retryable
 */
export class ProviderTransientError extends AppError {
  public readonly provider: string;
  public readonly providerStatusCode?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    provider: string,
    providerStatusCode?: number,
    retryAfterMs?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'PROVIDER_TRANSIENT_ERROR', 503, {
      provider,
      providerStatusCode,
      retryAfterMs,
      ...context,
    });
    this.provider = provider;
    this.providerStatusCode = providerStatusCode;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Provider authentication/configuration error - never retried
 */
export class ProviderAuthError extends AppError {
  public readonly provider: string;
  public readonly remediation: string;

  constructor(
    message: string,
    provider: string,
    remediation: string = 'Check the provider credentials in the environment configuration',
    context?: Record<string, unknown>
  ) {
    super(`${message}. ${remediation}`, 'PROVIDER_AUTH_ERROR', 401, { provider, ...context });
    this.provider = provider;
    this.remediation = remediation;
  }
}

/**
 * No configured broker (primary or failover) is healthy
 */
export class BrokerUnavailableError extends AppError {
  public readonly attempted: string[];

  constructor(attempted: string[], context?: Record<string, unknown>) {
    super(
      `No available broker (attempted: ${attempted.length > 0 ? attempted.join(', ') : 'none'})`,
      'BROKER_UNAVAILABLE',
      503,
      { attempted, ...context }
    );
    this.attempted = attempted;
  }
}

/**
 * Environment safety guard refused order submission
 */
export class ExecutionGuardBlockedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'EXECUTION_GUARD_BLOCKED', 403, context);
  }
}

/**
 * Kill switch is active; a run must not start
 */
export class KillSwitchActiveError extends AppError {
  constructor(reason?: string, context?: Record<string, unknown>) {
    super(
      `Kill switch is active${reason ? `: ${reason}` : ''}`,
      'KILL_SWITCH_ACTIVE',
      423,
      { reason, ...context }
    );
  }
}

/**
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(message: string = 'Operation timed out', timeoutMs?: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Check if error is a retryable error
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ProviderTransientError;
}
