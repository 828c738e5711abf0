import type { Direction, OptionType, TradeSignal } from '../domain/models.js';
import { isOptionSignal } from '../domain/models.js';

export type OptionLegDetails = {
  strike: number;
  expiration: string;
  optionType: OptionType;
};

/** Entry plus protective stop and profit target, submitted as one group. */
export type BracketOrderRequest = {
  idempotencyKey: string;
  symbol: string;
  direction: Direction;
  quantity: number;
  entryPrice?: number;
  stopPrice?: number;
  targetPrice?: number;
  option?: OptionLegDetails;
};

export type BrokerOrderAck = {
  orderId: string;
};

export interface IBrokerClient {
  submitBracketOrder(request: BracketOrderRequest): Promise<BrokerOrderAck>;
}

export type BrokerSubmissionErrorOptions = {
  fatal?: boolean;
  statusCode?: number;
  cause?: unknown;
};

/**
 * Submission failure reported by a broker client. `fatal` marks failures a
 * retry cannot fix, such as rejected credentials.
 */
export class BrokerSubmissionError extends Error {
  readonly fatal: boolean;
  readonly statusCode?: number;

  constructor(message: string, options: BrokerSubmissionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'BrokerSubmissionError';
    this.fatal = options.fatal ?? false;
    this.statusCode = options.statusCode;
  }
}

export function toBrokerSubmissionError(error: unknown): BrokerSubmissionError {
  if (error instanceof BrokerSubmissionError) {
    return error;
  }

  if (error instanceof Error) {
    return new BrokerSubmissionError(error.message, { cause: error });
  }

  return new BrokerSubmissionError(`Unknown broker failure: ${String(error)}`);
}

export function brokerIdempotencyKey(signal: TradeSignal): string {
  return `alert-${signal.id}`;
}

export function buildBracketOrder(signal: TradeSignal): BracketOrderRequest {
  const request: BracketOrderRequest = {
    idempotencyKey: brokerIdempotencyKey(signal),
    symbol: signal.symbol,
    direction: signal.direction,
    quantity: signal.quantity,
    entryPrice: signal.entryPrice,
    stopPrice: signal.stopPrice,
    targetPrice: signal.targetPrice
  };

  if (isOptionSignal(signal)) {
    request.option = {
      strike: signal.strike,
      expiration: signal.expiration,
      optionType: signal.optionType
    };
  }

  return request;
}
