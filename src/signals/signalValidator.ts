import { SignalValidationError } from '../domain/errors.js';
import type { Direction, OptionType, TradeSignal } from '../domain/models.js';
import { hashObject, tradeSignalSchema } from '../domain/models.js';

import type { RawAlert } from './alertParser.js';

export type ValidationContext = {
  /** Processing time; the only clock the validator reads. */
  now: Date;
  defaultQuantity?: number;
};

type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

const STRICT_DECIMAL = /^\$?(?:\d+(?:\.\d+)?|\.\d+)$/;
const STRICT_INTEGER = /^\d+$/;
const SYMBOL_FORMAT = /^[A-Z]{1,5}(\.[A-Z])?$/;
const MONTH_DAY = /^(\d{1,2})[/-](\d{1,2})(?:[/-](\d{2}|\d{4}))?$/;
const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const MAX_ROLL_FORWARD_YEARS = 8;

export function validateAlert(raw: RawAlert, context: ValidationContext): TradeSignal {
  const symbol = raw.symbol.trim().toUpperCase();
  if (!SYMBOL_FORMAT.test(symbol)) {
    throw new SignalValidationError('INVALID_SYMBOL', `Unrecognized symbol format: ${JSON.stringify(raw.symbol)}`);
  }

  const direction = parseDirection(raw.direction);
  const quantity = raw.quantity === undefined ? (context.defaultQuantity ?? 1) : parseQuantity(raw.quantity);
  const entryPrice = parseOptionalPrice('entry', raw.entryPrice);
  const stopPrice = parseOptionalPrice('stop', raw.stopPrice);
  const targetPrice = parseOptionalPrice('target', raw.targetPrice);

  assertPriceOrdering(direction, { stopPrice, entryPrice, targetPrice });

  const receivedAt = context.now.getTime();
  const common = {
    symbol,
    direction,
    quantity,
    entryPrice,
    stopPrice,
    targetPrice,
    receivedAt,
    source: raw.source,
    rawText: raw.rawText
  };

  let candidate: Record<string, unknown>;
  if (raw.instrument === 'option') {
    if (raw.strike === undefined || raw.optionType === undefined || raw.expiration === undefined) {
      throw new SignalValidationError('MISSING_OPTION_FIELDS', 'Option alerts need a strike, a call/put type and an expiration');
    }

    candidate = {
      ...common,
      instrument: 'option',
      strike: parsePrice('strike', raw.strike),
      optionType: parseOptionType(raw.optionType),
      expiration: resolveExpiration(raw.expiration, context.now)
    };
  } else {
    candidate = { ...common, instrument: 'equity' };
  }

  candidate.id = signalId(candidate);

  const parsed = tradeSignalSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new SignalValidationError('SCHEMA_MISMATCH', parsed.error.message);
  }

  return Object.freeze({ ...parsed.data, source: Object.freeze({ ...parsed.data.source }) });
}

/** Stable identity of a signal; also the broker idempotency seed. */
export function signalId(fields: Record<string, unknown>): string {
  return `sig-${hashObject(fields).slice(0, 24)}`;
}

export function parseStrictDecimal(field: string, text: string): number {
  const trimmed = text.trim();
  if (!STRICT_DECIMAL.test(trimmed)) {
    throw new SignalValidationError('INVALID_NUMBER', `${field} is not a number: ${JSON.stringify(text)}`);
  }

  return Number(trimmed.replace('$', ''));
}

function parsePrice(field: string, text: string): number {
  const value = parseStrictDecimal(field, text);
  if (value <= 0) {
    throw new SignalValidationError('INVALID_NUMBER', `${field} must be positive`);
  }

  return value;
}

function parseOptionalPrice(field: string, text: string | undefined): number | undefined {
  return text === undefined ? undefined : parsePrice(field, text);
}

function parseQuantity(text: string): number {
  const trimmed = text.trim();
  if (!STRICT_INTEGER.test(trimmed)) {
    throw new SignalValidationError('INVALID_QUANTITY', `quantity is not a whole number: ${JSON.stringify(text)}`);
  }

  const quantity = Number(trimmed);
  if (quantity <= 0 || !Number.isSafeInteger(quantity)) {
    throw new SignalValidationError('INVALID_QUANTITY', `quantity must be positive: ${trimmed}`);
  }

  return quantity;
}

function parseDirection(text: string | undefined): Direction {
  if (text === undefined) {
    return 'buy';
  }

  const normalized = text.trim().toLowerCase();
  if (normalized === 'buy' || normalized === 'bto') {
    return 'buy';
  }

  if (normalized === 'sell' || normalized === 'sto') {
    return 'sell';
  }

  throw new SignalValidationError('UNRECOGNIZED_FORMAT', `Unknown direction: ${JSON.stringify(text)}`);
}

function parseOptionType(text: string): OptionType {
  const normalized = text.trim().toLowerCase();
  if (normalized.startsWith('c')) {
    return 'call';
  }

  if (normalized.startsWith('p')) {
    return 'put';
  }

  throw new SignalValidationError('UNRECOGNIZED_FORMAT', `Option type must be a call or a put: ${JSON.stringify(text)}`);
}

function assertPriceOrdering(
  direction: Direction,
  prices: { stopPrice?: number; entryPrice?: number; targetPrice?: number }
): void {
  // Low to high for a buy; a sell mirrors it.
  const present: Array<{ label: string; value: number }> = [];
  if (prices.stopPrice !== undefined) {
    present.push({ label: 'stop', value: prices.stopPrice });
  }
  if (prices.entryPrice !== undefined) {
    present.push({ label: 'entry', value: prices.entryPrice });
  }
  if (prices.targetPrice !== undefined) {
    present.push({ label: 'target', value: prices.targetPrice });
  }

  for (let index = 1; index < present.length; index += 1) {
    const lower = present[index - 1];
    const upper = present[index];
    if (!lower || !upper) {
      continue;
    }

    const ordered = direction === 'buy' ? lower.value < upper.value : lower.value > upper.value;
    if (!ordered) {
      const relation = direction === 'buy' ? 'below' : 'above';
      throw new SignalValidationError(
        'INCONSISTENT_PRICES',
        `For a ${direction}, ${lower.label} (${lower.value}) must be ${relation} ${upper.label} (${upper.value})`
      );
    }
  }
}

/**
 * Resolves an alert expiration to `YYYY-MM-DD`. Without a year, the earliest
 * occurrence of the month/day strictly after the local calendar date of
 * `now` is chosen; with a year, the date must already be after it.
 */
export function resolveExpiration(text: string, now: Date): string {
  const trimmed = text.trim();
  const today: CalendarDate = { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };

  const iso = ISO_DATE.exec(trimmed);
  const monthDay = iso ? null : MONTH_DAY.exec(trimmed);

  let explicit: CalendarDate | null = null;
  let month: number;
  let day: number;

  if (iso) {
    explicit = { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) };
    month = explicit.month;
    day = explicit.day;
  } else if (monthDay) {
    month = Number(monthDay[1]);
    day = Number(monthDay[2]);
    const yearText = monthDay[3];
    if (yearText !== undefined) {
      const year = Number(yearText);
      explicit = { year: yearText.length === 2 ? 2000 + year : year, month, day };
    }
  } else {
    throw new SignalValidationError('INVALID_EXPIRATION', `Invalid expiration format: ${JSON.stringify(text)}`);
  }

  if (explicit) {
    if (!isCalendarDate(explicit)) {
      throw new SignalValidationError('INVALID_EXPIRATION', `Not a calendar date: ${trimmed}`);
    }

    if (dateKey(explicit) <= dateKey(today)) {
      throw new SignalValidationError('EXPIRED', `Expiration ${formatDate(explicit)} is not after ${formatDate(today)}`);
    }

    return formatDate(explicit);
  }

  for (let offset = 0; offset <= MAX_ROLL_FORWARD_YEARS; offset += 1) {
    const candidate = { year: today.year + offset, month, day };
    if (isCalendarDate(candidate) && dateKey(candidate) > dateKey(today)) {
      return formatDate(candidate);
    }
  }

  throw new SignalValidationError('INVALID_EXPIRATION', `Not a calendar date: ${trimmed}`);
}

function isCalendarDate(date: CalendarDate): boolean {
  if (date.month < 1 || date.month > 12 || date.day < 1) {
    return false;
  }

  const candidate = new Date(date.year, date.month - 1, date.day);
  return candidate.getFullYear() === date.year && candidate.getMonth() === date.month - 1 && candidate.getDate() === date.day;
}

function dateKey(date: CalendarDate): number {
  return date.year * 10_000 + date.month * 100 + date.day;
}

function formatDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${String(date.month).padStart(2, '0')}-${String(date.day).padStart(2, '0')}`;
}

/** Today's local calendar date as `YYYY-MM-DD`. */
export function localDateString(now: Date): string {
  return formatDate({ year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() });
}
