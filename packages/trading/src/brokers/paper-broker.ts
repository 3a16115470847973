/**
 * Paper Broker
 *
 * In-process simulated venue. Market orders fill immediately at the current
 * quote; limit orders fill once the quote crosses the limit. Used as the
 * failover venue and as a stand-in for a real broker in tests.
 */

import { ProviderTransientError, createLogger, type SleepFn } from '@stratgate/utils';
import type { Fill, Order, PortfolioPosition, PortfolioState } from '@stratgate/core';
import { round2 } from '../positions/portfolio-value.js';
import {
  TERMINAL_UNFILLED_STATES,
  type Broker,
  type BrokerAccount,
  type BrokerHealthStatus,
  type BrokerOrderStatus,
  type CancelAllResult,
  type ExecuteOrdersOptions,
  type PriceMap,
} from '../types.js';

const logger = createLogger('trading:paper-broker');

export interface PaperBrokerOptions {
  name?: string;
  cash?: number;
  positions?: PortfolioPosition[];
  quotes?: PriceMap;
  healthy?: boolean;
  now?: () => number;
  sleep?: SleepFn;
}

interface PaperOrder {
  status: BrokerOrderStatus;
  order: Order;
}

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class PaperBroker implements Broker {
  readonly name: string;
  private cash: number;
  private readonly positions = new Map<string, PortfolioPosition>();
  private readonly quotes = new Map<string, number>();
  private readonly orders = new Map<string, PaperOrder>();
  private healthy: boolean;
  private sequence = 0;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(options: PaperBrokerOptions = {}) {
    this.name = options.name ?? 'paper';
    this.cash = options.cash ?? 100_000;
    this.healthy = options.healthy ?? true;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    for (const position of options.positions ?? []) {
      this.positions.set(position.symbol, { ...position });
    }
    for (const [symbol, price] of Object.entries(options.quotes ?? {})) {
      this.quotes.set(symbol, price);
    }
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  /**
   * Update a quote and fill any open limit orders it makes marketable
   */
  setQuote(symbol: string, price: number): void {
    this.quotes.set(symbol, price);
    for (const entry of this.orders.values()) {
      if (entry.status.symbol === symbol && entry.status.status === 'new') {
        this.tryFill(entry);
      }
    }
  }

  async getAccount(): Promise<BrokerAccount> {
    this.assertOnline();
    let equity = this.cash;
    for (const position of this.positions.values()) {
      equity += position.quantity * (this.quotes.get(position.symbol) ?? position.average_price);
    }
    return { id: `${this.name}-account`, status: 'ACTIVE', cash: this.cash, equity, tradingBlocked: false };
  }

  async getPositions(): Promise<PortfolioState> {
    this.assertOnline();
    return {
      cash: this.cash,
      positions: Array.from(this.positions.values()).map((position) => ({ ...position })),
    };
  }

  async getPosition(symbol: string): Promise<PortfolioPosition | undefined> {
    this.assertOnline();
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  async executeOrders(orders: Order[], options: ExecuteOrdersOptions = {}): Promise<Fill[]> {
    this.assertOnline();
    const verifyFills = options.verifyFills ?? true;
    const fills: Fill[] = [];

    for (const order of orders) {
      if (order.type === 'limit' && order.limit_price === undefined) {
        logger.warn('Limit order has no limit price, skipping', { symbol: order.symbol });
        continue;
      }

      const entry = this.submit(order);
      this.tryFill(entry);

      if (entry.status.status === 'filled') {
        fills.push(this.toFill(entry.status));
      } else if (verifyFills && entry.status.status === 'new') {
        const fill = await this.verifyFill(entry.status.id, options.fillTimeoutMs);
        if (fill) fills.push(fill);
      } else {
        logger.info('Order not filled', { orderId: entry.status.id, status: entry.status.status });
      }
    }

    return fills;
  }

  async getOrderStatus(orderId: string): Promise<BrokerOrderStatus> {
    this.assertOnline();
    const entry = this.orders.get(orderId);
    if (!entry) {
      throw new Error(`Order ${orderId} not found`);
    }
    return { ...entry.status };
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    const entry = this.orders.get(orderId);
    if (!entry || entry.status.status !== 'new') {
      return false;
    }
    entry.status = { ...entry.status, status: 'canceled', updatedAt: this.now() };
    logger.info('Cancelled order', { orderId });
    return true;
  }

  async cancelAllOrders(): Promise<CancelAllResult> {
    const open = Array.from(this.orders.values()).filter((entry) => entry.status.status === 'new');
    let cancelledCount = 0;
    for (const entry of open) {
      if (await this.cancelOrder(entry.status.id)) cancelledCount++;
    }
    return { cancelledCount, totalOrders: open.length, errors: [] };
  }

  async verifyFill(orderId: string, timeoutMs: number = 30_000, pollIntervalMs: number = 1000): Promise<Fill | undefined> {
    const start = this.now();
    for (;;) {
      const entry = this.orders.get(orderId);
      if (!entry) return undefined;
      if (entry.status.status === 'filled') return this.toFill(entry.status);
      if (TERMINAL_UNFILLED_STATES.includes(entry.status.status)) return undefined;
      if (this.now() - start >= timeoutMs) {
        logger.warn('Timeout waiting for order to fill', { orderId, timeoutMs });
        return undefined;
      }
      await this.sleep(pollIntervalMs);
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async getHealthStatus(): Promise<BrokerHealthStatus> {
    return this.healthy
      ? { healthy: true, accountStatus: 'ACTIVE', tradingBlocked: false }
      : { healthy: false, error: `${this.name} venue is offline` };
  }

  private assertOnline(): void {
    if (!this.healthy) {
      throw new ProviderTransientError(`${this.name} venue is offline`, this.name);
    }
  }

  private submit(order: Order): PaperOrder {
    this.sequence += 1;
    const entry: PaperOrder = {
      order,
      status: {
        id: `${this.name}-${this.sequence}`,
        symbol: order.symbol,
        side: order.side,
        status: 'new',
        quantity: order.quantity,
        filledQuantity: 0,
        ...(order.limit_price !== undefined ? { limitPrice: order.limit_price } : {}),
        updatedAt: this.now(),
      },
    };
    this.orders.set(entry.status.id, entry);
    return entry;
  }

  private tryFill(entry: PaperOrder): void {
    const { order } = entry;
    const quote = this.quotes.get(order.symbol);
    if (quote === undefined || quote <= 0) {
      this.reject(entry, 'no quote');
      return;
    }

    if (order.type === 'limit' && order.limit_price !== undefined) {
      const marketable = order.side === 'buy' ? quote <= order.limit_price : quote >= order.limit_price;
      if (!marketable) return;
    }

    const held = this.positions.get(order.symbol);
    const cost = order.quantity * quote;

    if (order.side === 'buy') {
      if (cost > this.cash) {
        this.reject(entry, 'insufficient cash');
        return;
      }
      this.cash -= cost;
      const quantity = round2((held?.quantity ?? 0) + order.quantity);
      const averagePrice = held ? (held.quantity * held.average_price + cost) / quantity : quote;
      this.positions.set(order.symbol, { symbol: order.symbol, quantity, average_price: averagePrice });
    } else {
      if (!held || held.quantity < order.quantity) {
        this.reject(entry, 'insufficient position');
        return;
      }
      this.cash += cost;
      const remaining = round2(held.quantity - order.quantity);
      if (remaining > 0) {
        this.positions.set(order.symbol, { ...held, quantity: remaining });
      } else {
        this.positions.delete(order.symbol);
      }
    }

    entry.status = {
      ...entry.status,
      status: 'filled',
      filledQuantity: order.quantity,
      filledAveragePrice: quote,
      updatedAt: this.now(),
    };
  }

  private reject(entry: PaperOrder, reason: string): void {
    entry.status = { ...entry.status, status: 'rejected', updatedAt: this.now() };
    logger.warn('Paper order rejected', { orderId: entry.status.id, symbol: entry.order.symbol, reason });
  }

  private toFill(status: BrokerOrderStatus): Fill {
    return {
      order_id: status.id,
      symbol: status.symbol,
      side: status.side,
      quantity: status.filledQuantity,
      price: status.filledAveragePrice ?? 0,
      timestamp: status.updatedAt ?? this.now(),
    };
  }
}
