import Bottleneck from 'bottleneck';
import pRetry from 'p-retry';
import type { Logger } from 'pino';
import pino from 'pino';
import { fetch, type RequestInit } from 'undici';
import { z } from 'zod';

import type { BrokerEnv } from '../config/env.js';
import type { Direction, OptionType } from '../domain/models.js';
import type { BracketOrderRequest, BrokerOrderAck, IBrokerClient } from '../execution/brokerAdapter.js';
import { BrokerSubmissionError } from '../execution/brokerAdapter.js';

export type TradeStationClientOptions = {
  env: BrokerEnv;
  logger?: Logger;
  rateLimitRps?: number;
  requestTimeoutMs?: number;
  retryCount?: number;
  retryMinTimeoutMs?: number;
  now?: () => number;
};

export type TradeStationOrder = {
  AccountKey: string;
  Symbol: string;
  Quantity: string;
  OrderType: 'Limit' | 'Market' | 'StopMarket';
  TradeAction: string;
  LimitPrice?: string;
  StopPrice?: string;
  TimeInForce: { Duration: 'DAY' };
  Route: 'Intelligent';
};

export type TradeStationOrderGroup = {
  Type: 'BRK';
  Orders: TradeStationOrder[];
};

const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_RATE_LIMIT_RPS = 4;
const DEFAULT_RETRY_MIN_TIMEOUT_MS = 100;
const TOKEN_REFRESH_MARGIN_MS = 60_000;
const ORDER_GROUPS_PATH = '/orderexecution/ordergroups';
/** Connection failures raised before any request bytes were written. */
const UNSENT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_CONNECT_TIMEOUT']);

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().nonnegative().default(0),
  refresh_token: z.string().min(1).optional()
});

const orderGroupResponseSchema = z.object({
  Orders: z
    .array(
      z
        .object({
          OrderID: z.string().optional(),
          Message: z.string().optional(),
          Error: z.string().optional()
        })
        .passthrough()
    )
    .default([])
});

/**
 * OSI option symbol: root padded to six characters, `YYMMDD`, `C`/`P`, and
 * the strike in thousandths padded to eight digits.
 */
export function buildOsiSymbol(symbol: string, expiration: string, optionType: OptionType, strike: number): string {
  const [year = '', month = '', day = ''] = expiration.split('-');
  const root = symbol.padEnd(6, ' ');
  const typeCode = optionType === 'call' ? 'C' : 'P';
  const strikeCode = String(Math.round(strike * 1000)).padStart(8, '0');

  return `${root}${year.slice(-2)}${month}${day}${typeCode}${strikeCode}`;
}

export function buildOrderGroup(accountKey: string, request: BracketOrderRequest): TradeStationOrderGroup {
  const symbol = request.option
    ? buildOsiSymbol(request.symbol, request.option.expiration, request.option.optionType, request.option.strike)
    : request.symbol;
  const actions = tradeActions(request.direction, request.option !== undefined);
  const base = {
    AccountKey: accountKey,
    Symbol: symbol,
    Quantity: String(request.quantity),
    TimeInForce: { Duration: 'DAY' as const },
    Route: 'Intelligent' as const
  };

  const orders: TradeStationOrder[] = [
    request.entryPrice === undefined
      ? { ...base, OrderType: 'Market', TradeAction: actions.open }
      : { ...base, OrderType: 'Limit', TradeAction: actions.open, LimitPrice: formatPrice(request.entryPrice) }
  ];

  if (request.stopPrice !== undefined) {
    orders.push({ ...base, OrderType: 'StopMarket', TradeAction: actions.close, StopPrice: formatPrice(request.stopPrice) });
  }

  if (request.targetPrice !== undefined) {
    orders.push({ ...base, OrderType: 'Limit', TradeAction: actions.close, LimitPrice: formatPrice(request.targetPrice) });
  }

  return { Type: 'BRK', Orders: orders };
}

export class TradeStationClient implements IBrokerClient {
  private readonly env: BrokerEnv;
  private readonly logger: Logger;
  private readonly limiter: Bottleneck;
  private readonly requestTimeoutMs: number;
  private readonly retryCount: number;
  private readonly retryMinTimeoutMs: number;
  private readonly now: () => number;
  private readonly baseUrl: string;
  private readonly acknowledged = new Map<string, BrokerOrderAck>();
  private accessToken: string | null = null;
  private refreshing: Promise<string> | null = null;
  private tokenExpiresAt = 0;
  private refreshToken: string;

  constructor(options: TradeStationClientOptions) {
    this.env = options.env;
    this.logger = (options.logger ?? pino({ name: 'tradestation-client', enabled: false })).child({
      component: 'tradestation-client'
    });
    this.requestTimeoutMs = options.requestTimeoutMs ?? options.env.TS_REQUEST_TIMEOUT_MS;
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.retryMinTimeoutMs = options.retryMinTimeoutMs ?? DEFAULT_RETRY_MIN_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.baseUrl = options.env.TS_BASE_URL.replace(/\/+$/, '');
    this.refreshToken = options.env.TS_REFRESH_TOKEN;

    const rateLimitRps = options.rateLimitRps ?? DEFAULT_RATE_LIMIT_RPS;
    const minTimeMs = Math.ceil(1000 / Math.max(1, rateLimitRps));
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  }

  async submitBracketOrder(request: BracketOrderRequest): Promise<BrokerOrderAck> {
    const previous = this.acknowledged.get(request.idempotencyKey);
    if (previous) {
      this.logger.info({ idempotencyKey: request.idempotencyKey, orderId: previous.orderId }, 'order group already acknowledged');
      return previous;
    }

    try {
      const token = await this.getAccessToken();
      const group = buildOrderGroup(this.env.TS_ACCOUNT_KEY, request);
      const raw = await this.withRetry(
        () =>
          this.scheduleRequest(`${this.baseUrl}${ORDER_GROUPS_PATH}`, {
            method: 'POST',
            headers: {
              Authorization: `Bearer ${token}`,
              'Content-Type': 'application/json'
            },
            body: JSON.stringify(group)
          }),
        'submitBracketOrder',
        isSafeToResend
      );

      const ack = this.parseOrderGroupResponse(raw);
      this.acknowledged.set(request.idempotencyKey, ack);
      this.logger.info({ idempotencyKey: request.idempotencyKey, orderId: ack.orderId, legs: group.Orders.length }, 'order group accepted');

      return ack;
    } catch (error: unknown) {
      throw this.toSubmissionError(error);
    }
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && this.now() < this.tokenExpiresAt) {
      return this.accessToken;
    }

    // The refresh token may rotate, so concurrent callers share one refresh.
    if (!this.refreshing) {
      this.refreshing = this.refreshAccessToken().finally(() => {
        this.refreshing = null;
      });
    }

    return this.refreshing;
  }

  private async refreshAccessToken(): Promise<string> {
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.env.TS_CLIENT_ID,
      client_secret: this.env.TS_CLIENT_SECRET,
      refresh_token: this.refreshToken
    });
    if (this.env.TS_REDIRECT_URI) {
      form.set('redirect_uri', this.env.TS_REDIRECT_URI);
    }

    let raw: unknown;
    try {
      raw = await this.withRetry(
        () =>
          this.scheduleRequest(this.env.TS_TOKEN_URL ?? `${this.baseUrl}/security/authorize`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: form.toString()
          }),
        'refreshAccessToken',
        isTransientError
      );
    } catch (error: unknown) {
      // Rejected credentials are fatal.
      if (error instanceof TradeStationHttpError && error.statusCode >= 400 && error.statusCode < 500 && error.statusCode !== 429) {
        throw new BrokerSubmissionError(`Token refresh rejected (${error.statusCode}): ${error.message}`, {
          fatal: true,
          statusCode: error.statusCode,
          cause: error
        });
      }

      throw error;
    }

    const parsed = tokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BrokerSubmissionError(`Invalid token response: ${parsed.error.message}`, { fatal: true });
    }

    this.accessToken = parsed.data.access_token;
    this.tokenExpiresAt = this.now() + parsed.data.expires_in * 1000 - TOKEN_REFRESH_MARGIN_MS;
    if (parsed.data.refresh_token) {
      this.refreshToken = parsed.data.refresh_token;
    }

    this.logger.info({ expiresInSeconds: parsed.data.expires_in }, 'access token refreshed');
    return this.accessToken;
  }

  private parseOrderGroupResponse(raw: unknown): BrokerOrderAck {
    const parsed = orderGroupResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new BrokerSubmissionError(`Invalid order group response: ${parsed.error.message}`);
    }

    const rejected = parsed.data.Orders.find((order) => order.Error !== undefined);
    if (rejected) {
      throw new BrokerSubmissionError(`Order group rejected: ${rejected.Message ?? rejected.Error ?? 'unknown reason'}`);
    }

    const orderId = parsed.data.Orders.find((order) => order.OrderID !== undefined)?.OrderID;
    if (!orderId) {
      throw new BrokerSubmissionError('Order group response carried no order id');
    }

    return { orderId };
  }

  private async withRetry<T>(fn: () => Promise<T>, action: string, isRetryable: (error: unknown) => boolean): Promise<T> {
    return pRetry(
      async () => {
        try {
          return await fn();
        } catch (error: unknown) {
          if (isRetryable(error)) {
            throw error;
          }

          throw new pRetry.AbortError(error instanceof Error ? error : String(error));
        }
      },
      {
        retries: this.retryCount,
        factor: 2,
        minTimeout: this.retryMinTimeoutMs,
        maxTimeout: 2000,
        onFailedAttempt: (error) => {
          this.logger.warn(
            {
              action,
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              errorMessage: error.message
            },
            'TradeStation request attempt failed'
          );
        }
      }
    );
  }

  private async scheduleRequest(url: string, init: RequestInit): Promise<unknown> {
    return this.limiter.schedule(async () => {
      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), this.requestTimeoutMs);

      try {
        this.logger.debug({ method: init.method, url }, 'Sending TradeStation request');

        const response = await fetch(url, {
          ...init,
          signal: controller.signal
        });

        if (!response.ok) {
          const bodyText = await response.text();
          throw new TradeStationHttpError(response.status, bodyText || response.statusText);
        }

        const body: unknown = await response.json();
        return body;
      } catch (error: unknown) {
        if (isAbortError(error)) {
          throw new TradeStationNetworkError('Request timeout reached', { requestSent: true });
        }

        // undici reports transport failures as TypeError('fetch failed') with the socket error as cause.
        if (errorName(error) === 'TypeError') {
          const code = causeCode(error);
          throw new TradeStationNetworkError(code ? `fetch failed (${code})` : 'fetch failed', {
            requestSent: code === undefined || !UNSENT_ERROR_CODES.has(code)
          });
        }

        throw error;
      } finally {
        clearTimeout(timeoutHandle);
      }
    });
  }

  private toSubmissionError(error: unknown): BrokerSubmissionError {
    if (error instanceof BrokerSubmissionError) {
      return error;
    }

    if (error instanceof TradeStationHttpError) {
      const fatal = error.statusCode === 401 || error.statusCode === 403;
      if (fatal) {
        this.accessToken = null;
      }

      return new BrokerSubmissionError(`TradeStation responded ${error.statusCode}: ${error.message}`, {
        fatal,
        statusCode: error.statusCode,
        cause: error
      });
    }

    if (error instanceof Error) {
      return new BrokerSubmissionError(error.message, { cause: error });
    }

    return new BrokerSubmissionError(`Unknown TradeStation failure: ${String(error)}`);
  }
}

function tradeActions(direction: Direction, isOption: boolean): { open: string; close: string } {
  if (isOption) {
    return direction === 'buy' ? { open: 'BUYTOOPEN', close: 'SELLTOCLOSE' } : { open: 'SELLTOOPEN', close: 'BUYTOCLOSE' };
  }

  return direction === 'buy' ? { open: 'BUY', close: 'SELL' } : { open: 'SELLSHORT', close: 'BUYTOCOVER' };
}

function formatPrice(value: number): string {
  return value.toFixed(2);
}

export class TradeStationHttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'TradeStationHttpError';
    this.statusCode = statusCode;
  }
}

export class TradeStationNetworkError extends Error {
  /** False only when the connection failed before the request could reach the broker. */
  readonly requestSent: boolean;

  constructor(message: string, options: { requestSent: boolean }) {
    super(message);
    this.name = 'TradeStationNetworkError';
    this.requestSent = options.requestSent;
  }
}

function isTransientError(error: unknown): boolean {
  if (error instanceof TradeStationHttpError) {
    return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  }

  return error instanceof TradeStationNetworkError;
}

/**
 * An order group is only re-sent when the broker cannot have seen it: a 429
 * or a connection that never opened. Timeouts and 5xx responses are
 * ambiguous and a second POST could place a second bracket.
 */
function isSafeToResend(error: unknown): boolean {
  if (error instanceof TradeStationHttpError) {
    return error.statusCode === 429;
  }

  return error instanceof TradeStationNetworkError && !error.requestSent;
}

// Errors thrown by fetch may come from another realm, so they are matched by name.
function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }

  return undefined;
}

function causeCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('cause' in error)) {
    return undefined;
  }

  const cause = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }

  return undefined;
}

function isAbortError(error: unknown): boolean {
  const name = errorName(error);
  return name === 'AbortError' || name === 'TimeoutError';
}
