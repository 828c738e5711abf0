import { BrokerSubmissionError, PaperBroker, toBrokerSubmissionError, type BracketOrderRequest } from '../src/execution/index.js';

const request: BracketOrderRequest = {
  idempotencyKey: 'alert-sig-1',
  symbol: 'TSLA',
  direction: 'buy',
  quantity: 10,
  entryPrice: 250.5,
  stopPrice: 245,
  targetPrice: 262
};

describe('PaperBroker', () => {
  it('accepts orders with sequential ids', async () => {
    const broker = new PaperBroker({ now: () => 7 });

    const first = await broker.submitBracketOrder(request);
    const second = await broker.submitBracketOrder({ ...request, idempotencyKey: 'alert-sig-2' });

    expect([first.orderId, second.orderId]).toEqual(['paper-1', 'paper-2']);
    expect(broker.getOrder('paper-1')).toEqual({ id: 'paper-1', request, createdAt: 7 });
  });

  it('deduplicates by idempotency key', async () => {
    const broker = new PaperBroker();

    await broker.submitBracketOrder(request);
    const repeat = await broker.submitBracketOrder(request);

    expect(repeat.orderId).toBe('paper-1');
    expect(broker.listOrders()).toHaveLength(1);
  });
});

describe('toBrokerSubmissionError', () => {
  it('keeps broker errors and wraps everything else as transient', () => {
    const fatal = new BrokerSubmissionError('forbidden', { fatal: true, statusCode: 403 });
    const wrapped = toBrokerSubmissionError(new Error('socket hang up'));

    expect(toBrokerSubmissionError(fatal)).toBe(fatal);
    expect(wrapped).toMatchObject({ name: 'BrokerSubmissionError', message: 'socket hang up', fatal: false });
    expect(wrapped.cause).toBeInstanceOf(Error);
  });
});
