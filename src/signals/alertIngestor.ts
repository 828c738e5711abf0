import type { Logger } from 'pino';
import pino from 'pino';

import { SignalValidationError, type SignalValidationCode } from '../domain/errors.js';
import type { AlertSource, TradeSignal } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import { createEvent } from '../events/events.js';

import { parseAlertText } from './alertParser.js';
import { validateAlert } from './signalValidator.js';

export type AlertMetadata = {
  channel?: string;
  messageId?: string;
  author?: string;
  receivedAt?: Date;
};

export type IngestResult =
  | { status: 'ACCEPTED'; signal: TradeSignal }
  | { status: 'REJECTED'; code: SignalValidationCode; reason: string };

export type AlertIngestorOptions = {
  eventBus: EventBus;
  logger?: Logger;
  defaultChannel?: string;
  defaultQuantity?: number;
  now?: () => Date;
};

/** Entry point for alert sources: text in, `alert.validated` or `alert.rejected` out. */
export class AlertIngestor {
  private readonly eventBus: EventBus;
  private readonly logger: Logger;
  private readonly defaultChannel: string;
  private readonly defaultQuantity: number;
  private readonly now: () => Date;

  constructor(options: AlertIngestorOptions) {
    this.eventBus = options.eventBus;
    this.logger = (options.logger ?? pino({ name: 'alert-ingestor', enabled: false })).child({ component: 'alert-ingestor' });
    this.defaultChannel = options.defaultChannel ?? 'alerts';
    this.defaultQuantity = options.defaultQuantity ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  onRawAlert(text: string, metadata: AlertMetadata = {}): IngestResult {
    const source: AlertSource = {
      channel: metadata.channel ?? this.defaultChannel,
      ...(metadata.messageId ? { messageId: metadata.messageId } : {}),
      ...(metadata.author ? { author: metadata.author } : {})
    };
    const receivedAt = metadata.receivedAt ?? this.now();

    let signal: TradeSignal;
    try {
      const raw = parseAlertText(text, source);
      signal = validateAlert(raw, { now: receivedAt, defaultQuantity: this.defaultQuantity });
    } catch (error: unknown) {
      if (!(error instanceof SignalValidationError)) {
        throw error;
      }

      this.logger.warn({ code: error.code, reason: error.message, channel: source.channel }, 'alert dropped');
      this.eventBus.publish(
        createEvent('alert.rejected', { text, source, code: error.code, reason: error.message }, receivedAt.getTime())
      );
      return { status: 'REJECTED', code: error.code, reason: error.message };
    }

    this.logger.info({ signalId: signal.id, symbol: signal.symbol, instrument: signal.instrument }, 'alert validated');
    this.eventBus.publish(createEvent('alert.validated', { signal }, receivedAt.getTime()));
    return { status: 'ACCEPTED', signal };
  }
}
