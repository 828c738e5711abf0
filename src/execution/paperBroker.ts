import type { BracketOrderRequest, BrokerOrderAck, IBrokerClient } from './brokerAdapter.js';

export type PaperOrder = {
  id: string;
  request: BracketOrderRequest;
  createdAt: number;
};

export type PaperBrokerOptions = {
  now?: () => number;
};

/** Accepts every bracket order. Orders are never filled. */
export class PaperBroker implements IBrokerClient {
  private readonly orders = new Map<string, PaperOrder>();
  private readonly orderIdsByKey = new Map<string, string>();
  private readonly now: () => number;
  private sequence = 0;

  constructor(options?: PaperBrokerOptions) {
    this.now = options?.now ?? Date.now;
  }

  async submitBracketOrder(request: BracketOrderRequest): Promise<BrokerOrderAck> {
    const existing = this.orderIdsByKey.get(request.idempotencyKey);
    if (existing) {
      return { orderId: existing };
    }

    this.sequence += 1;
    const order: PaperOrder = {
      id: `paper-${this.sequence}`,
      request: { ...request },
      createdAt: this.now()
    };

    this.orders.set(order.id, order);
    this.orderIdsByKey.set(request.idempotencyKey, order.id);

    return { orderId: order.id };
  }

  getOrder(orderId: string): PaperOrder | undefined {
    return this.orders.get(orderId);
  }

  listOrders(): PaperOrder[] {
    return [...this.orders.values()];
  }
}
