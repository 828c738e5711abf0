import { EventEmitter } from 'node:events';

import type { Logger } from 'pino';
import pino from 'pino';

import { InvariantViolationError } from '../domain/errors.js';
import type { AuditEvent } from '../domain/models.js';
import { hashObject } from '../domain/models.js';

import type { EventHandler, TradingEvent, TradingEventName, TradingEventOf } from './events.js';
import { createEvent } from './events.js';

export type EventBusOptions = {
  /** Events published from inside a handler wait until the current event reached every subscriber. Defaults to true. */
  queueEmits?: boolean;
  logger?: Logger;
};

const ANY_EVENT = Symbol('any-event');

export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly queueEmits: boolean;
  private readonly logger: Logger;
  private readonly queue: TradingEvent[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private isFlushingQueue = false;

  constructor(options?: EventBusOptions) {
    this.queueEmits = options?.queueEmits ?? true;
    this.logger = (options?.logger ?? pino({ name: 'event-bus', enabled: false })).child({ component: 'event-bus' });
    this.emitter.setMaxListeners(0);
  }

  subscribe<TName extends TradingEventName>(type: TName, handler: EventHandler<TradingEventOf<TName>>): () => void {
    const wrapped = (event: TradingEventOf<TName>): void => {
      this.invoke(type, event, () => handler(event));
    };

    this.emitter.on(type, wrapped);

    return () => {
      this.emitter.off(type, wrapped);
    };
  }

  /** Receives every event after the handlers registered for its kind. */
  subscribeAll(handler: EventHandler<TradingEvent>): () => void {
    const wrapped = (event: TradingEvent): void => {
      this.invoke(event.type, event, () => handler(event));
    };

    this.emitter.on(ANY_EVENT, wrapped);

    return () => {
      this.emitter.off(ANY_EVENT, wrapped);
    };
  }

  publish(event: TradingEvent): void {
    const frozen = Object.isFrozen(event) ? event : Object.freeze({ ...event });

    if (!this.queueEmits) {
      this.dispatch(frozen);
      return;
    }

    this.queue.push(frozen);
    this.flushQueue();
  }

  getPendingCount(): number {
    return this.queue.length;
  }

  /** Resolves once every asynchronous handler started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private dispatch(event: TradingEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit(ANY_EVENT, event);
  }

  private flushQueue(): void {
    if (this.isFlushingQueue) {
      return;
    }

    this.isFlushingQueue = true;
    try {
      while (this.queue.length > 0) {
        const item = this.queue.shift();
        if (!item) {
          continue;
        }

        this.dispatch(item);
      }
    } finally {
      this.isFlushingQueue = false;
    }
  }

  private invoke(type: TradingEventName, event: unknown, run: () => void | Promise<void>): void {
    let result: void | Promise<void>;
    try {
      result = run();
    } catch (error: unknown) {
      this.reportHandlerError(type, event, error);
      return;
    }

    if (!(result instanceof Promise)) {
      return;
    }

    const tracked = result.then(
      () => undefined,
      (error: unknown) => this.reportHandlerError(type, event, error)
    );
    this.inFlight.add(tracked);
    void tracked.then(() => this.inFlight.delete(tracked));
  }

  private reportHandlerError(sourceEvent: TradingEventName, sourcePayload: unknown, error: unknown): void {
    const message = error instanceof Error ? error.message : 'Unknown handler error';
    const fatal = error instanceof InvariantViolationError;

    if (error instanceof InvariantViolationError) {
      this.logger.fatal({ err: error, sourceEvent, context: error.context }, 'invariant violated in event handler');
    } else {
      this.logger.error({ err: error, sourceEvent }, 'event handler failed');
    }

    if (sourceEvent === 'audit.event') {
      return;
    }

    const audit: AuditEvent = {
      id: `audit-${Date.now()}-${Math.random().toString(16).slice(2, 10)}`,
      ts: Date.now(),
      step: `events.handler.${sourceEvent}`,
      level: fatal ? 'fatal' : 'error',
      message,
      inputsHash: hashObject(sourcePayload),
      outputsHash: hashObject({ sourceEvent, message }),
      metadata: {
        sourceEvent,
        errorName: error instanceof Error ? error.name : 'UnknownError'
      }
    };

    this.publish(createEvent('audit.event', { audit }));
  }
}
