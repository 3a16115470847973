/**
 * Alpaca Broker
 * =============
 * REST client for the Alpaca trading API (paper endpoint by default).
 *
 * Every request runs through a RetryPolicy: 429, 5xx and network failures are
 * retried with backoff, 401/403 fail immediately with a ProviderAuthError.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import {
  RetryPolicy,
  classifyProviderError,
  createLogger,
  extractStatusCode,
  getAlpacaSettings,
  getBrokerSettings,
  getRetrySettings,
  type SleepFn,
} from '@stratgate/utils';
import type { Fill, Order, PortfolioPosition, PortfolioState } from '@stratgate/core';
import {
  TERMINAL_UNFILLED_STATES,
  type Broker,
  type BrokerAccount,
  type BrokerHealthStatus,
  type BrokerOrderState,
  type BrokerOrderStatus,
  type CancelAllResult,
  type ExecuteOrdersOptions,
} from '../types.js';

const logger = createLogger('trading:alpaca');

const PROVIDER = 'alpaca';

// Alpaca sends most numbers as strings
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());
const optionalNumeric = z.union([z.number(), z.string()]).nullish().transform((value) => {
  if (value === null || value === undefined || value === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
});

const AccountResponseSchema = z.object({
  id: z.string(),
  status: z.string().default('unknown'),
  cash: numeric,
  equity: optionalNumeric,
  trading_blocked: z.boolean().optional(),
});

const PositionResponseSchema = z.object({
  symbol: z.string(),
  qty: numeric,
  avg_entry_price: numeric,
});

const OrderResponseSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  status: z.string(),
  qty: optionalNumeric,
  filled_qty: optionalNumeric,
  filled_avg_price: optionalNumeric,
  limit_price: optionalNumeric,
  filled_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  created_at: z.string().nullish(),
});

type OrderResponse = z.infer<typeof OrderResponseSchema>;

const ORDER_STATES: readonly BrokerOrderState[] = [
  'new',
  'accepted',
  'pending_new',
  'partially_filled',
  'filled',
  'canceled',
  'expired',
  'rejected',
];

function toOrderState(status: string): BrokerOrderState {
  const normalized = status.toLowerCase();
  return ORDER_STATES.find((state) => state === normalized) ?? 'unknown';
}

function parseTime(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed.toMillis() : undefined;
}

/**
 * Strip a trailing slash and `/v2` so paths can always start with `/v2`
 */
export function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v2') ? trimmed.slice(0, -3) : trimmed;
}

export interface AlpacaBrokerOptions {
  apiKey?: string;
  secretKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
  retryPolicy?: RetryPolicy;
  fillTimeoutMs?: number;
  fillPollIntervalMs?: number;
  sleep?: SleepFn;
  now?: () => number;
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class AlpacaBroker implements Broker {
  readonly name = PROVIDER;
  private readonly http: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;
  private readonly fillTimeoutMs: number;
  private readonly fillPollIntervalMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(options: AlpacaBrokerOptions = {}) {
    const settings = getAlpacaSettings();
    const apiKey = options.apiKey ?? settings.apiKey;
    const secretKey = options.secretKey ?? settings.secretKey;

    if (!options.axiosInstance && (!apiKey || !secretKey)) {
      logger.warn('Alpaca API credentials are not fully configured; broker calls will fail');
    }

    // Use injected axios instance or create a new one
    this.http =
      options.axiosInstance ??
      axios.create({
        baseURL: normalizeBaseUrl(options.baseUrl ?? settings.baseUrl),
        timeout: options.timeoutMs ?? 30_000,
        headers: {
          'Content-Type': 'application/json',
          'APCA-API-KEY-ID': apiKey ?? '',
          'APCA-API-SECRET-KEY': secretKey ?? '',
        },
      });

    if (options.retryPolicy) {
      this.retryPolicy = options.retryPolicy;
    } else {
      const retry = getRetrySettings();
      this.retryPolicy = new RetryPolicy({
        maxAttempts: retry.maxAttempts,
        baseDelayMs: retry.baseDelayMs,
        maxDelayMs: retry.maxDelayMs,
      });
    }

    const needsBrokerSettings = options.fillTimeoutMs === undefined || options.fillPollIntervalMs === undefined;
    const brokerSettings = needsBrokerSettings ? getBrokerSettings() : undefined;
    this.fillTimeoutMs = options.fillTimeoutMs ?? brokerSettings?.fillTimeoutMs ?? 30_000;
    this.fillPollIntervalMs = options.fillPollIntervalMs ?? brokerSettings?.fillPollIntervalMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async getAccount(): Promise<BrokerAccount> {
    const account = AccountResponseSchema.parse(await this.request({ method: 'GET', url: '/v2/account' }));
    return {
      id: account.id,
      status: account.status,
      cash: account.cash,
      ...(account.equity !== undefined ? { equity: account.equity } : {}),
      tradingBlocked: account.trading_blocked ?? false,
    };
  }

  async getPositions(): Promise<PortfolioState> {
    const raw = await this.request({ method: 'GET', url: '/v2/positions' });
    const positions = z.array(PositionResponseSchema).parse(raw).map(
      (item): PortfolioPosition => ({
        symbol: item.symbol,
        quantity: item.qty,
        average_price: item.avg_entry_price,
      })
    );
    const account = await this.getAccount();
    return { cash: account.cash, positions };
  }

  async getPosition(symbol: string): Promise<PortfolioPosition | undefined> {
    try {
      const item = PositionResponseSchema.parse(
        await this.request({ method: 'GET', url: `/v2/positions/${encodeURIComponent(symbol)}` })
      );
      return { symbol: item.symbol, quantity: item.qty, average_price: item.avg_entry_price };
    } catch (error) {
      // No position for this symbol
      if (extractStatusCode(error) === 404) return undefined;
      throw error;
    }
  }

  async executeOrders(orders: Order[], options: ExecuteOrdersOptions = {}): Promise<Fill[]> {
    const verifyFills = options.verifyFills ?? true;
    const fillTimeoutMs = options.fillTimeoutMs ?? this.fillTimeoutMs;
    const fills: Fill[] = [];

    for (const order of orders) {
      if (order.type === 'limit' && order.limit_price === undefined) {
        logger.warn('Limit order has no limit price, skipping', { symbol: order.symbol });
        continue;
      }

      try {
        const submitted = OrderResponseSchema.parse(
          await this.request({
            method: 'POST',
            url: '/v2/orders',
            data: {
              symbol: order.symbol,
              qty: String(order.quantity),
              side: order.side,
              type: order.type,
              time_in_force: 'day',
              ...(order.limit_price !== undefined ? { limit_price: String(order.limit_price) } : {}),
            },
          })
        );

        logger.info('Submitted order', {
          orderId: submitted.id,
          symbol: order.symbol,
          side: order.side,
          type: order.type,
        });

        const status = this.toStatus(submitted);
        if (status.status === 'filled') {
          fills.push(this.toFill(status));
        } else if (verifyFills) {
          const fill = await this.verifyFill(submitted.id, fillTimeoutMs);
          if (fill) {
            fills.push(fill);
          } else {
            logger.warn('Order was not filled within timeout', {
              orderId: submitted.id,
              symbol: order.symbol,
              timeoutMs: fillTimeoutMs,
            });
          }
        } else {
          // Submission accepted; recorded without waiting for the fill
          fills.push({
            order_id: status.id,
            symbol: status.symbol,
            side: status.side,
            quantity: status.quantity,
            price: status.filledAveragePrice ?? status.limitPrice ?? 0,
            timestamp: status.updatedAt ?? this.now(),
          });
        }
      } catch (error) {
        // Continue with other orders even if one fails
        logger.error('Failed to execute order', error, { symbol: order.symbol, side: order.side });
      }
    }

    return fills;
  }

  async getOrderStatus(orderId: string): Promise<BrokerOrderStatus> {
    const raw = await this.request({ method: 'GET', url: `/v2/orders/${encodeURIComponent(orderId)}` });
    return this.toStatus(OrderResponseSchema.parse(raw));
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    try {
      await this.request({ method: 'DELETE', url: `/v2/orders/${encodeURIComponent(orderId)}` });
      logger.info('Cancelled order', { orderId });
      return true;
    } catch (error) {
      if (extractStatusCode(error) === 404) {
        logger.warn('Order not found (may already be cancelled)', { orderId });
        return false;
      }
      throw error;
    }
  }

  async cancelAllOrders(): Promise<CancelAllResult> {
    const raw = await this.request({ method: 'GET', url: '/v2/orders', params: { status: 'open' } });
    const open = z.array(OrderResponseSchema).parse(raw);

    let cancelledCount = 0;
    const errors: string[] = [];
    for (const order of open) {
      try {
        if (await this.cancelOrder(order.id)) cancelledCount++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(`Failed to cancel order ${order.id}: ${message}`);
        logger.error('Failed to cancel order', error, { orderId: order.id });
      }
    }

    logger.info('Cancelled open orders', { cancelled: cancelledCount, total: open.length, errors: errors.length });
    return { cancelledCount, totalOrders: open.length, errors };
  }

  async verifyFill(
    orderId: string,
    timeoutMs: number = this.fillTimeoutMs,
    pollIntervalMs: number = this.fillPollIntervalMs
  ): Promise<Fill | undefined> {
    const start = this.now();

    for (;;) {
      if (this.now() - start > timeoutMs) {
        logger.warn('Timeout waiting for order to fill', { orderId, timeoutMs });
        return undefined;
      }

      try {
        const status = await this.getOrderStatus(orderId);
        if (status.status === 'filled') {
          return this.toFill(status);
        }
        if (TERMINAL_UNFILLED_STATES.includes(status.status)) {
          logger.info('Order closed without a fill', { orderId, status: status.status });
          return undefined;
        }
      } catch (error) {
        // Keep polling until the timeout
        logger.warn('Error checking order status', {
          orderId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await this.sleep(pollIntervalMs);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.getAccount();
      return true;
    } catch (error) {
      logger.warn('Broker health check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async getHealthStatus(): Promise<BrokerHealthStatus> {
    try {
      const account = await this.getAccount();
      return { healthy: true, accountStatus: account.status, tradingBlocked: account.tradingBlocked ?? false };
    } catch (error) {
      return { healthy: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Make a request with retry logic; failures are mapped onto the provider error taxonomy
   */
  private async request(config: AxiosRequestConfig): Promise<unknown> {
    return this.retryPolicy.execute(
      async () => {
        try {
          const response = await this.http.request<unknown>(config);
          return response.data;
        } catch (error) {
          throw classifyProviderError(error, PROVIDER);
        }
      },
      { broker: PROVIDER, method: config.method, url: config.url }
    );
  }

  private toStatus(order: OrderResponse): BrokerOrderStatus {
    const updatedAt = parseTime(order.filled_at) ?? parseTime(order.updated_at) ?? parseTime(order.created_at);
    return {
      id: order.id,
      symbol: order.symbol,
      side: order.side,
      status: toOrderState(order.status),
      quantity: order.qty ?? 0,
      filledQuantity: order.filled_qty ?? 0,
      ...(order.filled_avg_price !== undefined ? { filledAveragePrice: order.filled_avg_price } : {}),
      ...(order.limit_price !== undefined ? { limitPrice: order.limit_price } : {}),
      ...(updatedAt !== undefined ? { updatedAt } : {}),
    };
  }

  private toFill(status: BrokerOrderStatus): Fill {
    return {
      order_id: status.id,
      symbol: status.symbol,
      side: status.side,
      quantity: status.filledQuantity > 0 ? status.filledQuantity : status.quantity,
      price: status.filledAveragePrice ?? status.limitPrice ?? 0,
      timestamp: status.updatedAt ?? this.now(),
    };
  }
}
