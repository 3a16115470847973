/**
 * Alpaca Broker Unit Tests
 *
 * HTTP is served by an in-process axios adapter.
 */

import { describe, it, expect } from 'vitest';
import axios, {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { ProviderAuthError, RetryPolicy } from '@stratgate/utils';
import { AlpacaBroker, normalizeBaseUrl } from '../../src/brokers/alpaca-broker.js';
import { fakeClock } from '../helpers/fixtures.js';

interface StubReply {
  status: number;
  data: unknown;
}

type Handler = (config: InternalAxiosRequestConfig) => StubReply;

function stubHttp(handler: Handler) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }
    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      null,
      response
    );
  };
  return { http: axios.create({ adapter }), calls };
}

function route(config: InternalAxiosRequestConfig): string {
  return `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
}

function makeBroker(handler: Handler) {
  const stub = stubHttp(handler);
  const clock = fakeClock();
  const broker = new AlpacaBroker({
    apiKey: 'test-key',
    secretKey: 'test-secret',
    axiosInstance: stub.http,
    retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, sleep: async () => {} }),
    fillTimeoutMs: 2000,
    fillPollIntervalMs: 1000,
    now: clock.now,
    sleep: clock.sleep,
  });
  return { broker, calls: stub.calls, clock };
}

const ACCOUNT = { id: 'acct-1', status: 'ACTIVE', cash: '25000.50', equity: '30000', trading_blocked: false };

describe('AlpacaBroker', () => {
  it('parses string amounts in the account response', async () => {
    const { broker } = makeBroker(() => ({ status: 200, data: ACCOUNT }));

    expect(await broker.getAccount()).toEqual({
      id: 'acct-1',
      status: 'ACTIVE',
      cash: 25000.5,
      equity: 30000,
      tradingBlocked: false,
    });
  });

  it('retries a rate-limited request', async () => {
    let attempts = 0;
    const { broker, calls } = makeBroker(() => {
      attempts += 1;
      return attempts === 1 ? { status: 429, data: { message: 'too many requests' } } : { status: 200, data: ACCOUNT };
    });

    expect((await broker.getAccount()).id).toBe('acct-1');
    expect(calls).toHaveLength(2);
  });

  it('does not retry authentication failures', async () => {
    const { broker, calls } = makeBroker(() => ({ status: 401, data: { message: 'unauthorized' } }));

    await expect(broker.getAccount()).rejects.toBeInstanceOf(ProviderAuthError);
    expect(calls).toHaveLength(1);
  });

  it('maps positions and the account cash into a portfolio', async () => {
    const { broker } = makeBroker((config) =>
      route(config) === 'GET /v2/positions'
        ? { status: 200, data: [{ symbol: 'AAPL', qty: '3', avg_entry_price: '150.25' }] }
        : { status: 200, data: ACCOUNT }
    );

    expect(await broker.getPositions()).toEqual({
      cash: 25000.5,
      positions: [{ symbol: 'AAPL', quantity: 3, average_price: 150.25 }],
    });
  });

  it('returns undefined for a symbol with no position', async () => {
    const { broker } = makeBroker(() => ({ status: 404, data: { message: 'position does not exist' } }));

    expect(await broker.getPosition('AAPL')).toBeUndefined();
  });

  it('submits a market order and records an immediate fill', async () => {
    const { broker, calls } = makeBroker(() => ({
      status: 200,
      data: {
        id: 'ord-1',
        symbol: 'AAPL',
        side: 'buy',
        status: 'filled',
        qty: '10',
        filled_qty: '10',
        filled_avg_price: '101.5',
        filled_at: '2024-01-02T15:30:00Z',
      },
    }));

    const fills = await broker.executeOrders([{ symbol: 'AAPL', side: 'buy', quantity: 10, type: 'market' }]);

    expect(fills).toEqual([
      {
        order_id: 'ord-1',
        symbol: 'AAPL',
        side: 'buy',
        quantity: 10,
        price: 101.5,
        timestamp: Date.UTC(2024, 0, 2, 15, 30),
      },
    ]);
    expect(calls.map(route)[0]).toBe('POST /v2/orders');
    expect(JSON.parse(String(calls[0]?.data))).toEqual({
      symbol: 'AAPL',
      qty: '10',
      side: 'buy',
      type: 'market',
      time_in_force: 'day',
    });
  });

  it('polls an accepted order until it fills', async () => {
    let polls = 0;
    const { broker, clock } = makeBroker((config) => {
      if (route(config) === 'POST /v2/orders') {
        return { status: 200, data: { id: 'ord-2', symbol: 'AAPL', side: 'buy', status: 'accepted', qty: '4' } };
      }
      polls += 1;
      return polls < 2
        ? { status: 200, data: { id: 'ord-2', symbol: 'AAPL', side: 'buy', status: 'accepted', qty: '4' } }
        : {
            status: 200,
            data: {
              id: 'ord-2',
              symbol: 'AAPL',
              side: 'buy',
              status: 'filled',
              qty: '4',
              filled_qty: '4',
              filled_avg_price: '99',
              filled_at: '2024-01-03T14:00:00Z',
            },
          };
    });

    const fills = await broker.executeOrders([{ symbol: 'AAPL', side: 'buy', quantity: 4, type: 'market' }]);

    expect(fills).toEqual([
      { order_id: 'ord-2', symbol: 'AAPL', side: 'buy', quantity: 4, price: 99, timestamp: Date.UTC(2024, 0, 3, 14) },
    ]);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('gives up on a fill after the timeout', async () => {
    const { broker, calls, clock } = makeBroker(() => ({
      status: 200,
      data: { id: 'ord-3', symbol: 'AAPL', side: 'buy', status: 'new', qty: '1' },
    }));

    expect(await broker.verifyFill('ord-3')).toBeUndefined();
    expect(calls).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 1000, 1000]);
  });

  it('stops polling when the order is cancelled', async () => {
    const { broker, clock } = makeBroker(() => ({
      status: 200,
      data: { id: 'ord-4', symbol: 'AAPL', side: 'sell', status: 'canceled', qty: '1' },
    }));

    expect(await broker.verifyFill('ord-4')).toBeUndefined();
    expect(clock.sleeps).toEqual([]);
  });

  it('skips an order the venue rejects and continues with the rest', async () => {
    const { broker } = makeBroker((config) => {
      const payload: unknown = JSON.parse(String(config.data));
      const symbol = typeof payload === 'object' && payload !== null ? Reflect.get(payload, 'symbol') : undefined;
      if (symbol === 'BAD') {
        return { status: 422, data: { message: 'asset not tradable' } };
      }
      return {
        status: 200,
        data: {
          id: 'ord-5',
          symbol: 'AAPL',
          side: 'buy',
          status: 'filled',
          qty: '1',
          filled_qty: '1',
          filled_avg_price: '10',
          filled_at: '2024-01-02T15:30:00Z',
        },
      };
    });

    const fills = await broker.executeOrders([
      { symbol: 'BAD', side: 'buy', quantity: 1, type: 'market' },
      { symbol: 'AAPL', side: 'buy', quantity: 1, type: 'market' },
    ]);

    expect(fills.map((fill) => fill.order_id)).toEqual(['ord-5']);
  });

  it('treats cancelling an unknown order as false', async () => {
    const { broker } = makeBroker(() => ({ status: 404, data: { message: 'order not found' } }));

    expect(await broker.cancelOrder('missing')).toBe(false);
  });

  it('cancels every open order', async () => {
    const { broker, calls } = makeBroker((config) =>
      route(config) === 'GET /v2/orders'
        ? {
            status: 200,
            data: [
              { id: 'a', symbol: 'AAPL', side: 'buy', status: 'new' },
              { id: 'b', symbol: 'MSFT', side: 'sell', status: 'new' },
            ],
          }
        : { status: 204, data: '' }
    );

    expect(await broker.cancelAllOrders()).toEqual({ cancelledCount: 2, totalOrders: 2, errors: [] });
    expect(calls.map(route)).toEqual(['GET /v2/orders', 'DELETE /v2/orders/a', 'DELETE /v2/orders/b']);
    expect(calls[0]?.params).toEqual({ status: 'open' });
  });

  it('reports unhealthy after retries are exhausted', async () => {
    const { broker, calls } = makeBroker(() => ({ status: 503, data: { message: 'unavailable' } }));

    expect(await broker.healthCheck()).toBe(false);
    expect(calls).toHaveLength(3);
  });
});

describe('normalizeBaseUrl', () => {
  it('strips a trailing slash and the version segment', () => {
    expect(normalizeBaseUrl('https://paper-api.alpaca.markets/v2/')).toBe('https://paper-api.alpaca.markets');
    expect(normalizeBaseUrl('https://paper-api.alpaca.markets')).toBe('https://paper-api.alpaca.markets');
  });
});
