/**
 * Execution Guard
 *
 * Order submission is only allowed in production unless explicitly overridden
 * with ALLOW_NON_PROD_EXECUTION.
 */

import { ExecutionGuardBlockedError, createLogger, getAppSettings } from '@stratgate/utils';

const logger = createLogger('trading:execution-guard');

export interface ExecutionGuardOptions {
  env?: string;
  allowNonProdExecution?: boolean;
}

export class ExecutionGuard {
  readonly env: string;
  readonly allowNonProdExecution: boolean;

  constructor(options: ExecutionGuardOptions = {}) {
    const needsSettings = options.env === undefined || options.allowNonProdExecution === undefined;
    const app = needsSettings ? getAppSettings() : undefined;
    this.env = options.env ?? app?.env ?? 'development';
    this.allowNonProdExecution = options.allowNonProdExecution ?? app?.allowNonProdExecution ?? false;
  }

  isAllowed(): boolean {
    return this.env === 'production' || this.allowNonProdExecution;
  }

  /**
   * Throw ExecutionGuardBlockedError when submission is not allowed
   */
  assertAllowed(context?: Record<string, unknown>): void {
    if (this.isAllowed()) {
      if (this.env !== 'production') {
        logger.warn('Submitting orders outside production (override enabled)', { env: this.env, ...context });
      }
      return;
    }
    throw new ExecutionGuardBlockedError(
      `Order submission is blocked in the ${this.env} environment; set ALLOW_NON_PROD_EXECUTION=true to override`,
      { env: this.env, ...context }
    );
  }
}
