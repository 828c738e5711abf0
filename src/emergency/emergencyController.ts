import type { Logger } from 'pino';
import pino from 'pino';

import type { BreakerConfig } from '../config/schema.js';
import type { BreakerSnapshot, BreakerStatus } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import { createEvent } from '../events/events.js';

import type { BreakerTrigger } from './breakerStateMachine.js';
import { nextBreakerState } from './breakerStateMachine.js';

export type SubmissionOutcome = 'submitted' | 'failed';

export type OutcomeDetails = {
  /** Correlates the outcome with the permit handed out by `mayProceed`. */
  ticket?: string;
  /** A fatal failure opens the breaker without waiting for the threshold. */
  fatal?: boolean;
};

export type EmergencyControllerOptions = {
  config?: Partial<BreakerConfig>;
  eventBus?: EventBus;
  logger?: Logger;
  now?: () => number;
};

const DEFAULT_CONFIG: BreakerConfig = {
  failureThreshold: 3,
  failureWindowMs: 300_000,
  cooldownMs: 600_000,
  killSwitchInitiallyEngaged: false
};

/**
 * Circuit breaker over broker outcomes plus a manual kill switch. The kill
 * switch overrides the breaker; neither touches open positions.
 */
export class EmergencyController {
  private readonly config: BreakerConfig;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;
  private readonly now: () => number;
  private status: BreakerStatus = 'Closed';
  private failureTimes: number[] = [];
  private openedAt: number | null = null;
  private trialInFlight = false;
  private trialTicket: string | undefined;
  private killSwitchEngaged = false;
  private killSwitchReason: string | null = null;

  constructor(options?: EmergencyControllerOptions) {
    this.config = { ...DEFAULT_CONFIG, ...options?.config };
    this.eventBus = options?.eventBus;
    this.logger = (options?.logger ?? pino({ name: 'emergency-controller', enabled: false })).child({
      component: 'emergency-controller'
    });
    this.now = options?.now ?? Date.now;

    if (this.config.killSwitchInitiallyEngaged) {
      this.killSwitchEngaged = true;
      this.killSwitchReason = 'engaged by configuration at startup';
      this.logger.warn({ reason: this.killSwitchReason }, 'kill switch engaged');
    }
  }

  /**
   * Whether a new signal may enter risk evaluation. In HalfOpen the first
   * caller receives the single trial permit; later callers are refused until
   * it resolves.
   */
  mayProceed(ticket?: string): boolean {
    this.refresh();

    if (this.killSwitchEngaged) {
      return false;
    }

    switch (this.status) {
      case 'Closed':
        return true;
      case 'Open':
        return false;
      case 'HalfOpen':
        if (this.trialInFlight) {
          return false;
        }

        this.trialInFlight = true;
        this.trialTicket = ticket;
        this.logger.info({ ticket }, 'half-open trial granted');
        return true;
      default: {
        const unreachable: never = this.status;
        return unreachable;
      }
    }
  }

  recordOutcome(outcome: SubmissionOutcome, details: OutcomeDetails = {}): void {
    const now = this.now();

    switch (this.status) {
      case 'Closed':
        this.recordClosedOutcome(outcome, details, now);
        return;
      case 'Open':
        this.logger.info({ outcome, ticket: details.ticket }, 'late outcome recorded while open');
        return;
      case 'HalfOpen':
        if (!this.isTrialOutcome(details.ticket)) {
          this.logger.info({ outcome, ticket: details.ticket }, 'late outcome recorded while half-open');
          return;
        }

        this.trialInFlight = false;
        this.trialTicket = undefined;

        if (outcome === 'submitted') {
          this.failureTimes = [];
          this.openedAt = null;
          this.transition('TRIAL_SUCCEEDED');
          this.eventBus?.publish(createEvent('emergency.reset', { source: 'circuit_breaker' }, now));
          return;
        }

        this.failureTimes = [now];
        this.openedAt = now;
        this.transition('TRIAL_FAILED');
        this.eventBus?.publish(
          createEvent('emergency.stop', { reason: 'half-open trial failed', source: 'circuit_breaker' }, now)
        );
        return;
      default: {
        const unreachable: never = this.status;
        return unreachable;
      }
    }
  }

  /** Frees the HalfOpen trial slot when the trial signal never reached the broker. */
  abandonTrial(ticket?: string): void {
    if (this.status !== 'HalfOpen' || !this.isTrialOutcome(ticket)) {
      return;
    }

    this.trialInFlight = false;
    this.trialTicket = undefined;
    this.logger.info({ ticket }, 'half-open trial abandoned');
  }

  engageKillSwitch(reason: string): void {
    if (this.killSwitchEngaged) {
      this.logger.info({ reason, existingReason: this.killSwitchReason }, 'kill switch already engaged');
      return;
    }

    this.killSwitchEngaged = true;
    this.killSwitchReason = reason;
    this.logger.warn({ reason }, 'kill switch engaged');
    this.eventBus?.publish(createEvent('emergency.stop', { reason, source: 'kill_switch' }, this.now()));
  }

  clearKillSwitch(): void {
    if (!this.killSwitchEngaged) {
      return;
    }

    this.killSwitchEngaged = false;
    this.killSwitchReason = null;
    this.logger.warn('kill switch cleared');
    this.eventBus?.publish(createEvent('emergency.reset', { source: 'kill_switch' }, this.now()));
  }

  currentState(): BreakerSnapshot {
    this.refresh();
    this.pruneFailures(this.now());

    return {
      breakerState: this.status,
      killSwitchEngaged: this.killSwitchEngaged,
      killSwitchReason: this.killSwitchReason,
      consecutiveFailures: this.failureTimes.length,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight
    };
  }

  private recordClosedOutcome(outcome: SubmissionOutcome, details: OutcomeDetails, now: number): void {
    if (outcome === 'submitted') {
      if (this.failureTimes.length > 0) {
        this.logger.debug({ cleared: this.failureTimes.length }, 'failure streak reset');
      }
      this.failureTimes = [];
      return;
    }

    this.pruneFailures(now);
    this.failureTimes.push(now);
    const consecutiveFailures = this.failureTimes.length;

    this.logger.warn({ consecutiveFailures, threshold: this.config.failureThreshold, fatal: details.fatal === true }, 'broker failure recorded');

    if (details.fatal !== true && consecutiveFailures < this.config.failureThreshold) {
      return;
    }

    this.openedAt = now;
    this.transition('FAILURE_THRESHOLD');

    const reason =
      details.fatal === true
        ? 'fatal broker failure'
        : `${consecutiveFailures} consecutive broker failures within ${Math.round(this.config.failureWindowMs / 1000)}s`;
    this.eventBus?.publish(createEvent('emergency.stop', { reason, source: 'circuit_breaker' }, now));
  }

  private pruneFailures(now: number): void {
    const windowStart = now - this.config.failureWindowMs;
    this.failureTimes = this.failureTimes.filter((ts) => ts > windowStart);
  }

  /** Open → HalfOpen once the cooldown has elapsed. */
  private refresh(): void {
    if (this.status !== 'Open' || this.openedAt === null) {
      return;
    }

    if (this.now() - this.openedAt >= this.config.cooldownMs) {
      this.transition('COOLDOWN_ELAPSED');
    }
  }

  private isTrialOutcome(ticket: string | undefined): boolean {
    if (!this.trialInFlight) {
      return false;
    }

    return ticket === undefined || this.trialTicket === undefined || ticket === this.trialTicket;
  }

  private transition(trigger: BreakerTrigger): void {
    const from = this.status;
    const to = nextBreakerState(from, trigger);
    if (from === to) {
      return;
    }

    this.status = to;
    const consecutiveFailures = this.failureTimes.length;
    if (to === 'Open') {
      this.logger.warn({ from, to, trigger, consecutiveFailures }, 'breaker transition');
    } else {
      this.logger.info({ from, to, trigger, consecutiveFailures }, 'breaker transition');
    }

    this.eventBus?.publish(createEvent('breaker.transition', { from, to, consecutiveFailures }, this.now()));
  }
}
