import { SignalValidationError } from '../domain/errors.js';
import type { AlertSource, Instrument } from '../domain/models.js';

/**
 * Field values lifted out of a chat message, still as text. Numeric and
 * calendar validation happens in `validateAlert`.
 */
export type RawAlert = {
  instrument: Instrument;
  symbol: string;
  direction?: string;
  strike?: string;
  optionType?: string;
  expiration?: string;
  quantity?: string;
  entryPrice?: string;
  stopPrice?: string;
  targetPrice?: string;
  rawText: string;
  source: AlertSource;
};

const TOKEN = String.raw`[^\s]+`;
const EXIT_LEGS =
  String.raw`(?:\s+STOP(?:\s*LOSS)?(?:\s*AT)?\s*\$?(?<stop>${TOKEN}))?` +
  String.raw`(?:\s+(?:TARGET|TP|PT)(?:\s*AT)?\s*\$?(?<target>${TOKEN}))?` +
  String.raw`(?:\s+(?:QTY|X)\s*(?<quantity>${TOKEN}))?`;

// AAPL - $250 CALLS EXPIRATION 10/10 $1.29 STOP LOSS AT $1.00 TARGET $2.00
const OPTION_PATTERN = new RegExp(
  String.raw`(?:\b(?<direction>BUY|SELL|BTO|STO)\s+)?\b(?<symbol>[A-Z][A-Z.]*)\s*-\s*\$?(?<strike>[^\s$]+?)\s*(?<otype>CALLS?|PUTS?)` +
    String.raw`\s+EXP(?:IRATION|IRY|\.)?\s*(?<expiry>[0-9/-]+)\s+\$?(?<entry>${TOKEN})` +
    EXIT_LEGS,
  'i'
);

// BUY TSLA @ 250.50 STOP 245 TARGET 262 QTY 10
const EQUITY_PATTERN = new RegExp(
  String.raw`\b(?<direction>BUY|SELL|BTO|STO)\s+(?<symbol>[A-Z][A-Z.]*)\s+(?:@|AT)\s*\$?(?<entry>${TOKEN})` + EXIT_LEGS,
  'i'
);

export function cleanAlertText(text: string): string {
  return text
    .replace(/<[^>]+>/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join(' ');
}

export function parseAlertText(text: string, source: AlertSource): RawAlert {
  const cleaned = cleanAlertText(text);

  const option = OPTION_PATTERN.exec(cleaned);
  if (option?.groups) {
    const groups = option.groups;
    return {
      instrument: 'option',
      symbol: groups.symbol ?? '',
      direction: groups.direction,
      strike: groups.strike,
      optionType: groups.otype,
      expiration: groups.expiry,
      quantity: groups.quantity,
      entryPrice: groups.entry,
      stopPrice: groups.stop,
      targetPrice: groups.target,
      rawText: text,
      source
    };
  }

  const equity = EQUITY_PATTERN.exec(cleaned);
  if (equity?.groups) {
    const groups = equity.groups;
    return {
      instrument: 'equity',
      symbol: groups.symbol ?? '',
      direction: groups.direction,
      quantity: groups.quantity,
      entryPrice: groups.entry,
      stopPrice: groups.stop,
      targetPrice: groups.target,
      rawText: text,
      source
    };
  }

  throw new SignalValidationError('UNRECOGNIZED_FORMAT', `Message does not match a known alert format: ${JSON.stringify(text)}`);
}
