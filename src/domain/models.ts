import { createHash } from 'node:crypto';

import { z } from 'zod';

const positiveNumber = z.number().finite().positive();
const epochMsSchema = z.number().int().nonnegative();
const nonEmptyString = z.string().min(1);
const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const directionSchema = z.enum(['buy', 'sell']);
export const instrumentSchema = z.enum(['equity', 'option']);
export const optionTypeSchema = z.enum(['call', 'put']);

/**
 * Example:
 * {
 *   "channel": "alerts",
 *   "messageId": "1299001",
 *   "author": "desk"
 * }
 */
export const alertSourceSchema = z
  .object({
    channel: nonEmptyString,
    messageId: nonEmptyString.optional(),
    author: nonEmptyString.optional()
  })
  .strict();

const signalBaseSchema = z.object({
  id: nonEmptyString,
  symbol: z.string().regex(/^[A-Z]{1,5}(\.[A-Z])?$/),
  direction: directionSchema,
  quantity: z.number().int().positive(),
  entryPrice: positiveNumber.optional(),
  stopPrice: positiveNumber.optional(),
  targetPrice: positiveNumber.optional(),
  receivedAt: epochMsSchema,
  source: alertSourceSchema,
  rawText: z.string()
});

/**
 * Example:
 * {
 *   "id": "sig-5b1c...",
 *   "symbol": "AAPL",
 *   "direction": "buy",
 *   "instrument": "option",
 *   "strike": 250,
 *   "expiration": "2025-10-10",
 *   "optionType": "call",
 *   "quantity": 1,
 *   "entryPrice": 1.29,
 *   "stopPrice": 1,
 *   "receivedAt": 1759665600000,
 *   "source": { "channel": "alerts" },
 *   "rawText": "AAPL - $250 CALLS EXPIRATION 10/10 $1.29 STOP LOSS AT $1.00"
 * }
 */
export const tradeSignalSchema = z.discriminatedUnion('instrument', [
  signalBaseSchema.extend({ instrument: z.literal('equity') }).strict(),
  signalBaseSchema
    .extend({
      instrument: z.literal('option'),
      strike: positiveNumber,
      expiration: isoDateSchema,
      optionType: optionTypeSchema
    })
    .strict()
]);

export const riskRejectionReasonSchema = z.enum([
  'TooManyOpenPositions',
  'PerTradeRiskExceeded',
  'AggregateRiskExceeded'
]);

export const rejectionReasonSchema = z.union([riskRejectionReasonSchema, z.literal('Suppressed')]);

export const breakerStatusSchema = z.enum(['Closed', 'Open', 'HalfOpen']);

export const auditLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

/**
 * Example:
 * {
 *   "id": "audit-1759665600000-3f9a12cd",
 *   "ts": 1759665600000,
 *   "step": "events.handler.alert.validated",
 *   "level": "error",
 *   "message": "broker unreachable",
 *   "inputsHash": "9dbb9f...",
 *   "outputsHash": "a0d1f2...",
 *   "metadata": { "sourceEvent": "alert.validated" }
 * }
 */
export const auditEventSchema = z
  .object({
    id: nonEmptyString,
    ts: epochMsSchema,
    step: nonEmptyString,
    level: auditLevelSchema,
    message: nonEmptyString,
    reason: z.string().optional(),
    inputsHash: nonEmptyString,
    outputsHash: nonEmptyString,
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type Direction = z.infer<typeof directionSchema>;
export type Instrument = z.infer<typeof instrumentSchema>;
export type OptionType = z.infer<typeof optionTypeSchema>;
export type AlertSource = z.infer<typeof alertSourceSchema>;
export type TradeSignal = z.infer<typeof tradeSignalSchema>;
export type OptionSignal = Extract<TradeSignal, { instrument: 'option' }>;
export type EquitySignal = Extract<TradeSignal, { instrument: 'equity' }>;
export type RiskRejectionReason = z.infer<typeof riskRejectionReasonSchema>;
export type RejectionReason = z.infer<typeof rejectionReasonSchema>;
export type BreakerStatus = z.infer<typeof breakerStatusSchema>;
export type AuditLevel = z.infer<typeof auditLevelSchema>;
export type AuditEvent = z.infer<typeof auditEventSchema>;

export type RiskLimits = {
  readonly maxOpenPositions: number;
  readonly maxRiskPerTrade: number;
  readonly maxAggregateRisk: number;
};

export type PositionExposure = {
  readonly id: string;
  readonly signal: TradeSignal;
  readonly riskAmount: number;
  readonly brokerOrderId: string;
  readonly openedAt: number;
};

export type BreakerSnapshot = {
  breakerState: BreakerStatus;
  killSwitchEngaged: boolean;
  killSwitchReason: string | null;
  consecutiveFailures: number;
  openedAt: number | null;
  trialInFlight: boolean;
};

function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, item]) => item !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));
  const serialized = entries.map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);

  return `{${serialized.join(',')}}`;
}

export function hashObject(obj: unknown): string {
  const payload = stableStringify(obj);
  return createHash('sha256').update(payload).digest('hex');
}

export function isOptionSignal(signal: TradeSignal): signal is OptionSignal {
  return signal.instrument === 'option';
}

export function describeSignal(signal: TradeSignal): string {
  const side = signal.direction.toUpperCase();
  if (isOptionSignal(signal)) {
    return `${side} ${signal.quantity} ${signal.symbol} ${signal.expiration} ${signal.strike}${signal.optionType === 'call' ? 'C' : 'P'}`;
  }

  return `${side} ${signal.quantity} ${signal.symbol}`;
}
