import { getGlobalDispatcher, MockAgent, setGlobalDispatcher, type Dispatcher } from 'undici';

import type { BrokerEnv } from '../src/config/env.js';
import type { BracketOrderRequest } from '../src/execution/brokerAdapter.js';
import { BrokerSubmissionError } from '../src/execution/brokerAdapter.js';
import { buildOrderGroup, buildOsiSymbol, TradeStationClient } from '../src/tradestation/client.js';

const ORIGIN = 'https://broker.test';
const TOKEN_PATH = '/v3/security/authorize';
const ORDERS_PATH = '/v3/orderexecution/ordergroups';

const env: BrokerEnv = {
  TS_BASE_URL: `${ORIGIN}/v3`,
  TS_CLIENT_ID: 'test-client',
  TS_CLIENT_SECRET: 'test-secret',
  TS_REFRESH_TOKEN: 'test-refresh',
  TS_ACCOUNT_KEY: 'SIM0001',
  TS_REQUEST_TIMEOUT_MS: 1000
};

const optionRequest: BracketOrderRequest = {
  idempotencyKey: 'alert-sig-1',
  symbol: 'AAPL',
  direction: 'buy',
  quantity: 2,
  entryPrice: 1.29,
  stopPrice: 1,
  targetPrice: 2,
  option: { strike: 250, expiration: '2025-10-10', optionType: 'call' }
};

function client(requestTimeoutMs?: number) {
  return new TradeStationClient({ env, rateLimitRps: 100, retryCount: 2, retryMinTimeoutMs: 1, requestTimeoutMs });
}

function socketError(code: string) {
  return Object.assign(new Error(`socket failure ${code}`), { code });
}

describe('buildOsiSymbol', () => {
  it('pads the root and encodes the strike in thousandths', () => {
    expect(buildOsiSymbol('AAPL', '2025-10-10', 'call', 250)).toBe('AAPL  251010C00250000');
    expect(buildOsiSymbol('SPY', '2025-12-19', 'put', 1.5)).toBe('SPY   251219P00001500');
  });
});

describe('buildOrderGroup', () => {
  it('builds entry, stop and target legs for an option', () => {
    const leg = { AccountKey: 'SIM0001', Symbol: 'AAPL  251010C00250000', Quantity: '2', TimeInForce: { Duration: 'DAY' }, Route: 'Intelligent' };

    expect(buildOrderGroup('SIM0001', optionRequest)).toEqual({
      Type: 'BRK',
      Orders: [
        { ...leg, OrderType: 'Limit', TradeAction: 'BUYTOOPEN', LimitPrice: '1.29' },
        { ...leg, OrderType: 'StopMarket', TradeAction: 'SELLTOCLOSE', StopPrice: '1.00' },
        { ...leg, OrderType: 'Limit', TradeAction: 'SELLTOCLOSE', LimitPrice: '2.00' }
      ]
    });
  });

  it('uses a market entry and short-sale actions for an equity sell without an entry price', () => {
    const group = buildOrderGroup('SIM0001', {
      idempotencyKey: 'alert-sig-2',
      symbol: 'TSLA',
      direction: 'sell',
      quantity: 5,
      stopPrice: 260
    });

    expect(group.Orders.map((order) => [order.OrderType, order.TradeAction, order.Symbol])).toEqual([
      ['Market', 'SELLSHORT', 'TSLA'],
      ['StopMarket', 'BUYTOCOVER', 'TSLA']
    ]);
  });
});

describe('TradeStationClient', () => {
  let originalDispatcher: Dispatcher;
  let agent: MockAgent;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await agent.close();
  });

  function tokenOk() {
    agent.get(ORIGIN).intercept({ path: TOKEN_PATH, method: 'POST' }).reply(200, { access_token: 'token-1', expires_in: 1200 });
  }

  it('refreshes a token and submits the order group', async () => {
    const tokenBodies: string[] = [];
    const orderBodies: string[] = [];
    agent
      .get(ORIGIN)
      .intercept({
        path: TOKEN_PATH,
        method: 'POST',
        body: (body) => {
          tokenBodies.push(body);
          return true;
        }
      })
      .reply(200, { access_token: 'token-1', expires_in: 1200 });
    agent
      .get(ORIGIN)
      .intercept({
        path: ORDERS_PATH,
        method: 'POST',
        body: (body) => {
          orderBodies.push(body);
          return true;
        }
      })
      .reply(200, { Orders: [{ OrderID: '7001', Message: 'Sent' }, { OrderID: '7002' }, { OrderID: '7003' }] });

    const ack = await client().submitBracketOrder(optionRequest);

    expect(ack).toEqual({ orderId: '7001' });
    expect(new URLSearchParams(tokenBodies[0]).get('grant_type')).toBe('refresh_token');
    expect(new URLSearchParams(tokenBodies[0]).get('refresh_token')).toBe('test-refresh');
    expect(JSON.parse(orderBodies[0] ?? '{}')).toEqual(buildOrderGroup('SIM0001', optionRequest));
  });

  it('reuses the cached token and acknowledgement for the same idempotency key', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '8001' }] });

    const broker = client();
    const first = await broker.submitBracketOrder(optionRequest);
    const repeat = await broker.submitBracketOrder(optionRequest);
    const other = await broker.submitBracketOrder({ ...optionRequest, idempotencyKey: 'alert-sig-9' });

    expect(first).toEqual({ orderId: '7001' });
    expect(repeat).toEqual({ orderId: '7001' });
    expect(other).toEqual({ orderId: '8001' });
  });

  it('shares one token refresh between concurrent submissions', async () => {
    const tokenBodies: string[] = [];
    const pool = agent.get(ORIGIN);
    pool
      .intercept({
        path: TOKEN_PATH,
        method: 'POST',
        body: (body) => {
          tokenBodies.push(body);
          return true;
        }
      })
      .reply(200, { access_token: 'token-1', expires_in: 1200, refresh_token: 'test-refresh-2' });
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '8001' }] });

    const broker = client();
    const acks = await Promise.all([
      broker.submitBracketOrder(optionRequest),
      broker.submitBracketOrder({ ...optionRequest, idempotencyKey: 'alert-sig-2' })
    ]);

    expect(acks.map((ack) => ack.orderId).sort()).toEqual(['7001', '8001']);
    expect(tokenBodies).toHaveLength(1);
    expect(new URLSearchParams(tokenBodies[0]).get('refresh_token')).toBe('test-refresh');
  });

  it('retries the order group after a 429', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(429, 'slow down');
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });

    await expect(client().submitBracketOrder(optionRequest)).resolves.toEqual({ orderId: '7001' });
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });

  it('does not resend the order group after a 503', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(503, 'unavailable');
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });

    await expect(client().submitBracketOrder(optionRequest)).rejects.toMatchObject({
      fatal: false,
      statusCode: 503,
      message: 'TradeStation responded 503: unavailable'
    });
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('reports a timed-out order group as transient without resending it', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] }).delay(200);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '8001' }] });

    const failure = client(20).submitBracketOrder(optionRequest);

    await expect(failure).rejects.toBeInstanceOf(BrokerSubmissionError);
    await expect(failure).rejects.toMatchObject({ fatal: false, message: 'Request timeout reached' });
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('resends the order group when the connection was refused', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).replyWithError(socketError('ECONNREFUSED'));
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });

    await expect(client().submitBracketOrder(optionRequest)).resolves.toEqual({ orderId: '7001' });
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });

  it('does not resend the order group when the connection dropped mid-request', async () => {
    tokenOk();
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).replyWithError(socketError('ECONNRESET'));
    pool.intercept({ path: ORDERS_PATH, method: 'POST' }).reply(200, { Orders: [{ OrderID: '7001' }] });

    await expect(client().submitBracketOrder(optionRequest)).rejects.toMatchObject({
      fatal: false,
      message: 'fetch failed (ECONNRESET)'
    });
    expect(agent.pendingInterceptors()).toHaveLength(1);
  });

  it('retries the token refresh after a 503', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: TOKEN_PATH, method: 'POST' }).reply(503, 'unavailable');
    pool.intercept({ path: TOKEN_PATH, method: 'POST' }).reply(200, { access_token: 'token-1', expires_in: 1200 });

    await expect(client().getAccessToken()).resolves.toBe('token-1');
  });

  it('marks 401 responses as fatal without retrying', async () => {
    tokenOk();
    agent.get(ORIGIN).intercept({ path: ORDERS_PATH, method: 'POST' }).reply(401, 'expired token');

    const failure = client().submitBracketOrder(optionRequest);

    await expect(failure).rejects.toBeInstanceOf(BrokerSubmissionError);
    await expect(failure).rejects.toMatchObject({ fatal: true, statusCode: 401, message: 'TradeStation responded 401: expired token' });
  });

  it('treats other client errors as non-fatal', async () => {
    tokenOk();
    agent.get(ORIGIN).intercept({ path: ORDERS_PATH, method: 'POST' }).reply(400, 'bad symbol');

    await expect(client().submitBracketOrder(optionRequest)).rejects.toMatchObject({ fatal: false, statusCode: 400 });
  });

  it('marks a rejected token refresh as fatal', async () => {
    agent.get(ORIGIN).intercept({ path: TOKEN_PATH, method: 'POST' }).reply(400, 'invalid_grant');

    await expect(client().submitBracketOrder(optionRequest)).rejects.toMatchObject({
      fatal: true,
      statusCode: 400,
      message: 'Token refresh rejected (400): invalid_grant'
    });
  });

  it('reports a leg rejected by the broker', async () => {
    tokenOk();
    agent
      .get(ORIGIN)
      .intercept({ path: ORDERS_PATH, method: 'POST' })
      .reply(200, { Orders: [{ Error: 'FAILED', Message: 'Insufficient buying power' }] });

    await expect(client().submitBracketOrder(optionRequest)).rejects.toMatchObject({
      fatal: false,
      message: 'Order group rejected: Insufficient buying power'
    });
  });
});
