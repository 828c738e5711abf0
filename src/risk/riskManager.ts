import type { Logger } from 'pino';
import pino from 'pino';

import { InvariantViolationError } from '../domain/errors.js';
import type { PositionExposure, RiskLimits, RiskRejectionReason, TradeSignal } from '../domain/models.js';
import { isOptionSignal } from '../domain/models.js';
import type { EventBus } from '../events/eventBus.js';
import { createEvent } from '../events/events.js';
import { localDateString } from '../signals/signalValidator.js';

export type RiskConfig = {
  /** Shares per option contract. Equity signals always use 1. */
  contractMultiplier: number;
};

export type RiskDecision =
  | {
      status: 'APPROVE';
      signal: TradeSignal;
      riskAmount: number;
    }
  | {
      status: 'REJECT';
      signal: TradeSignal;
      reason: RiskRejectionReason;
      detail: string;
      riskAmount: number;
    };

export type RiskManagerOptions = {
  limits: RiskLimits;
  config?: Partial<RiskConfig>;
  eventBus?: EventBus;
  logger?: Logger;
  now?: () => number;
};

type Reservation = {
  signal: TradeSignal;
  riskCents: number;
};

const DEFAULT_CONFIG: RiskConfig = {
  contractMultiplier: 100
};

/**
 * Sole owner of open-position exposure. Approval reserves capacity in the
 * same synchronous step as the limit check; the reservation becomes a
 * position on `commit` or is dropped on `cancel`. Amounts are tracked in
 * whole cents.
 */
export class RiskManager {
  private readonly limits: RiskLimits;
  private readonly config: RiskConfig;
  private readonly eventBus?: EventBus;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly positionsById = new Map<string, PositionExposure>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly committedSignalIds = new Set<string>();
  private aggregateCents = 0;
  private reservedCents = 0;
  private sequence = 0;

  constructor(options: RiskManagerOptions) {
    this.limits = Object.freeze({ ...options.limits });
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.eventBus = options.eventBus;
    this.logger = (options.logger ?? pino({ name: 'risk-manager', enabled: false })).child({ component: 'risk-manager' });
    this.now = options.now ?? Date.now;
  }

  subscribe(): () => void {
    if (!this.eventBus) {
      throw new Error('RiskManager.subscribe requires an eventBus');
    }

    return this.eventBus.subscribe('position.closed', (event) => {
      this.release(event.positionId, event.reason);
    });
  }

  evaluate(signal: TradeSignal): RiskDecision {
    if (this.reservations.has(signal.id) || this.committedSignalIds.has(signal.id)) {
      throw new InvariantViolationError('signal evaluated twice', { signalId: signal.id });
    }

    const riskAmount = computeRiskAmount(signal, this.config.contractMultiplier);
    const occupied = this.positionsById.size + this.reservations.size;

    if (occupied + 1 > this.limits.maxOpenPositions) {
      return this.reject(signal, riskAmount, 'TooManyOpenPositions', `max open positions reached (${this.limits.maxOpenPositions})`);
    }

    if (!(riskAmount <= this.limits.maxRiskPerTrade)) {
      const shown = Number.isFinite(riskAmount) ? riskAmount.toFixed(2) : 'unbounded (no entry/stop)';
      return this.reject(
        signal,
        riskAmount,
        'PerTradeRiskExceeded',
        `trade risk ${shown} exceeds per-trade max ${this.limits.maxRiskPerTrade.toFixed(2)}`
      );
    }

    const riskCents = toCents(riskAmount);
    const projectedCents = this.aggregateCents + this.reservedCents + riskCents;
    if (projectedCents > toCents(this.limits.maxAggregateRisk)) {
      return this.reject(
        signal,
        riskAmount,
        'AggregateRiskExceeded',
        `aggregate risk after trade ${fromCents(projectedCents).toFixed(2)} exceeds limit ${this.limits.maxAggregateRisk.toFixed(2)}`
      );
    }

    this.reservations.set(signal.id, { signal, riskCents });
    this.reservedCents += riskCents;

    this.logger.info(
      { signalId: signal.id, riskAmount, reservedRisk: this.reservedRisk(), aggregateRisk: this.currentAggregateRisk() },
      'risk approved, capacity reserved'
    );

    return { status: 'APPROVE', signal, riskAmount };
  }

  commit(signal: TradeSignal, brokerOrderId: string): PositionExposure {
    if (this.committedSignalIds.has(signal.id)) {
      throw new InvariantViolationError('signal committed twice', { signalId: signal.id, brokerOrderId });
    }

    const reservation = this.reservations.get(signal.id);
    if (!reservation) {
      throw new InvariantViolationError('commit without an approved reservation', { signalId: signal.id, brokerOrderId });
    }

    this.reservations.delete(signal.id);
    this.reservedCents -= reservation.riskCents;
    this.aggregateCents += reservation.riskCents;

    if (this.aggregateCents > toCents(this.limits.maxAggregateRisk)) {
      throw new InvariantViolationError('aggregate risk above limit after commit', {
        signalId: signal.id,
        aggregateRisk: this.currentAggregateRisk()
      });
    }

    this.sequence += 1;
    const position: PositionExposure = Object.freeze({
      id: `pos-${this.sequence}`,
      signal,
      riskAmount: fromCents(reservation.riskCents),
      brokerOrderId,
      openedAt: this.now()
    });

    this.positionsById.set(position.id, position);
    this.committedSignalIds.add(signal.id);

    this.logger.info(
      {
        positionId: position.id,
        signalId: signal.id,
        riskAmount: position.riskAmount,
        aggregateRisk: this.currentAggregateRisk(),
        openPositions: this.positionsById.size
      },
      'position committed'
    );

    return position;
  }

  /** Drops the reservation of a signal whose order never reached the broker book. */
  cancel(signal: TradeSignal): boolean {
    const reservation = this.reservations.get(signal.id);
    if (!reservation) {
      return false;
    }

    this.reservations.delete(signal.id);
    this.reservedCents -= reservation.riskCents;

    this.logger.info({ signalId: signal.id, reservedRisk: this.reservedRisk() }, 'reservation cancelled');
    return true;
  }

  release(positionId: string, reason = 'closed'): PositionExposure | undefined {
    const position = this.positionsById.get(positionId);
    if (!position) {
      this.logger.warn({ positionId, reason }, 'release requested for unknown position');
      return undefined;
    }

    this.positionsById.delete(positionId);
    this.committedSignalIds.delete(position.signal.id);
    this.aggregateCents -= toCents(position.riskAmount);

    if (this.aggregateCents < 0) {
      throw new InvariantViolationError('aggregate risk went negative', { positionId, aggregateCents: this.aggregateCents });
    }

    const aggregateRisk = this.currentAggregateRisk();
    this.logger.info({ positionId, reason, riskAmount: position.riskAmount, aggregateRisk }, 'position released');
    this.eventBus?.publish(createEvent('position.released', { position, reason, aggregateRisk }, this.now()));

    return position;
  }

  /** Releases option positions whose expiration date is before the local date of `now`. */
  releaseExpired(now: Date): PositionExposure[] {
    const today = localDateString(now);
    const expired = [...this.positionsById.values()].filter(
      (position) => isOptionSignal(position.signal) && position.signal.expiration < today
    );

    return expired.flatMap((position) => this.release(position.id, 'expired') ?? []);
  }

  currentAggregateRisk(): number {
    return fromCents(this.aggregateCents);
  }

  reservedRisk(): number {
    return fromCents(this.reservedCents);
  }

  openPositionCount(): number {
    return this.positionsById.size;
  }

  pendingReservationCount(): number {
    return this.reservations.size;
  }

  positions(): PositionExposure[] {
    return [...this.positionsById.values()];
  }

  getLimits(): RiskLimits {
    return this.limits;
  }

  private reject(signal: TradeSignal, riskAmount: number, reason: RiskRejectionReason, detail: string): RiskDecision {
    this.logger.warn({ signalId: signal.id, reason, detail, riskAmount }, 'risk rejected');
    return { status: 'REJECT', signal, reason, detail, riskAmount };
  }
}

/**
 * quantity × |entry − stop| × multiplier, rounded to cents. A signal without
 * both an entry and a stop has no bounded loss and yields `Infinity`.
 */
export function computeRiskAmount(signal: TradeSignal, contractMultiplier: number): number {
  if (signal.entryPrice === undefined || signal.stopPrice === undefined) {
    return Number.POSITIVE_INFINITY;
  }

  const multiplier = isOptionSignal(signal) ? contractMultiplier : 1;
  const raw = signal.quantity * Math.abs(signal.entryPrice - signal.stopPrice) * multiplier;
  return fromCents(toCents(raw));
}

function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function fromCents(cents: number): number {
  return cents / 100;
}
