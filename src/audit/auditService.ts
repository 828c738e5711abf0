import { randomUUID } from 'node:crypto';

import type { Logger } from 'pino';
import pino from 'pino';

import type { AuditEvent, AuditLevel } from '../domain/models.js';
import { hashObject } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import type { TradingEvent } from '../events/events.js';
import { describeEvent } from '../events/events.js';

export type AuditLogInput = {
  step: string;
  level: AuditLevel;
  message: string;
  reason?: string;
  inputs: unknown;
  outputs: unknown;
  metadata?: Record<string, unknown>;
};

export type AuditServiceOptions = {
  logger?: Logger;
  capacity?: number;
  now?: () => number;
};

const DEFAULT_CAPACITY = 500;

/** Structured audit trail: every entry goes to the log and to a bounded in-memory buffer. */
export class AuditService {
  private readonly logger: Logger;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly entries: AuditEvent[] = [];

  constructor(options?: AuditServiceOptions) {
    this.logger = (options?.logger ?? pino({ name: 'audit', enabled: false })).child({ component: 'audit' });
    this.capacity = Math.max(1, options?.capacity ?? DEFAULT_CAPACITY);
    this.now = options?.now ?? Date.now;
  }

  subscribe(eventBus: EventBus): () => void {
    return eventBus.subscribeAll((event) => {
      this.record(event);
    });
  }

  log(input: AuditLogInput): AuditEvent {
    const entry: AuditEvent = {
      id: randomUUID(),
      ts: this.now(),
      step: input.step,
      level: input.level,
      message: input.message,
      reason: input.reason,
      inputsHash: hashObject(input.inputs),
      outputsHash: hashObject(input.outputs),
      metadata: input.metadata ?? {}
    };

    this.store(entry);
    this.logger[entry.level]({ audit: entry }, entry.message);
    return entry;
  }

  recent(limit = this.capacity): AuditEvent[] {
    return this.entries.slice(-limit);
  }

  private record(event: TradingEvent): void {
    if (event.type === 'audit.event') {
      // Already logged by whoever raised it.
      this.store(event.audit);
      return;
    }

    this.log({
      step: event.type,
      level: levelFor(event),
      message: describeEvent(event),
      reason: reasonFor(event),
      inputs: event,
      outputs: { type: event.type, ts: event.ts },
      metadata: { eventTs: event.ts }
    });
  }

  private store(entry: AuditEvent): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }
}

function levelFor(event: TradingEvent): AuditLevel {
  switch (event.type) {
    case 'alert.validated':
    case 'risk.approved':
    case 'order.submitted':
    case 'emergency.reset':
    case 'position.closed':
    case 'position.released':
      return 'info';
    case 'alert.rejected':
    case 'risk.rejected':
    case 'breaker.transition':
      return 'warn';
    case 'order.failed':
    case 'emergency.stop':
      return 'error';
    case 'audit.event':
      return event.audit.level;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}

function reasonFor(event: TradingEvent): string | undefined {
  switch (event.type) {
    case 'alert.rejected':
      return event.code;
    case 'risk.rejected':
      return event.reason;
    case 'emergency.stop':
      return event.reason;
    case 'position.closed':
    case 'position.released':
      return event.reason;
    default:
      return undefined;
  }
}
