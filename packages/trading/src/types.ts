/**
 * Core types for the trading package
 */

import type { Fill, Order, PortfolioPosition, PortfolioState, Side } from '@stratgate/core';

/**
 * Latest price per symbol
 */
export type PriceMap = Record<string, number>;

/**
 * Account summary reported by a broker
 */
export interface BrokerAccount {
  id: string;
  status: string;
  cash: number;
  equity?: number;
  tradingBlocked?: boolean;
}

export type BrokerOrderState =
  | 'new'
  | 'accepted'
  | 'pending_new'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'expired'
  | 'rejected'
  | 'unknown';

/**
 * Broker-side view of a submitted order
 */
export interface BrokerOrderStatus {
  id: string;
  symbol: string;
  side: Side;
  status: BrokerOrderState;
  quantity: number;
  filledQuantity: number;
  filledAveragePrice?: number;
  limitPrice?: number;
  /** Epoch ms of the fill, or of the last update when not filled */
  updatedAt?: number;
}

export interface CancelAllResult {
  cancelledCount: number;
  totalOrders: number;
  errors: string[];
}

export interface BrokerHealthStatus {
  healthy: boolean;
  accountStatus?: string;
  tradingBlocked?: boolean;
  error?: string;
}

export interface ExecuteOrdersOptions {
  /** Poll each submitted order until it fills or the timeout passes */
  verifyFills?: boolean;
  fillTimeoutMs?: number;
}

/**
 * Execution venue capability interface.
 *
 * Status reads and cancellations never consult the kill switch, so an operator
 * can always flatten open orders.
 */
export interface Broker {
  readonly name: string;
  getAccount(): Promise<BrokerAccount>;
  getPositions(): Promise<PortfolioState>;
  getPosition(symbol: string): Promise<PortfolioPosition | undefined>;
  /** One fill per filled order; orders that fail are logged and skipped */
  executeOrders(orders: Order[], options?: ExecuteOrdersOptions): Promise<Fill[]>;
  getOrderStatus(orderId: string): Promise<BrokerOrderStatus>;
  /** False when the order is unknown or already closed */
  cancelOrder(orderId: string): Promise<boolean>;
  cancelAllOrders(): Promise<CancelAllResult>;
  /** Resolves undefined when the order is not filled within the timeout */
  verifyFill(orderId: string, timeoutMs?: number, pollIntervalMs?: number): Promise<Fill | undefined>;
  healthCheck(): Promise<boolean>;
  getHealthStatus(): Promise<BrokerHealthStatus>;
}

/**
 * Order states after which a fill can no longer happen
 */
export const TERMINAL_UNFILLED_STATES: readonly BrokerOrderState[] = ['canceled', 'expired', 'rejected'];
