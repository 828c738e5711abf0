import type { SignalValidationCode } from '../domain/errors.js';
import type {
  AlertSource,
  AuditEvent,
  BreakerStatus,
  PositionExposure,
  RejectionReason,
  TradeSignal
} from '../domain/models.js';
import { describeSignal } from '../domain/models.js';

export type EmergencySource = 'circuit_breaker' | 'kill_switch';

export type AlertValidatedPayload = {
  signal: TradeSignal;
};

export type AlertRejectedPayload = {
  text: string;
  source: AlertSource;
  code: SignalValidationCode;
  reason: string;
};

export type RiskApprovedPayload = {
  signal: TradeSignal;
  riskAmount: number;
};

export type RiskRejectedPayload = {
  signal: TradeSignal;
  reason: RejectionReason;
  detail: string;
};

export type OrderSubmittedPayload = {
  signal: TradeSignal;
  brokerOrderId: string;
  positionId: string;
};

export type OrderFailedPayload = {
  signal: TradeSignal;
  error: {
    name: string;
    message: string;
    fatal: boolean;
  };
};

export type EmergencyStopPayload = {
  reason: string;
  source: EmergencySource;
};

export type EmergencyResetPayload = {
  source: EmergencySource;
};

export type BreakerTransitionPayload = {
  from: BreakerStatus;
  to: BreakerStatus;
  consecutiveFailures: number;
};

export type PositionClosedPayload = {
  positionId: string;
  reason: string;
};

export type PositionReleasedPayload = {
  position: PositionExposure;
  reason: string;
  aggregateRisk: number;
};

export type AuditRecordedPayload = {
  audit: AuditEvent;
};

export type TradingEventMap = {
  'alert.validated': AlertValidatedPayload;
  'alert.rejected': AlertRejectedPayload;
  'risk.approved': RiskApprovedPayload;
  'risk.rejected': RiskRejectedPayload;
  'order.submitted': OrderSubmittedPayload;
  'order.failed': OrderFailedPayload;
  'emergency.stop': EmergencyStopPayload;
  'emergency.reset': EmergencyResetPayload;
  'breaker.transition': BreakerTransitionPayload;
  'position.closed': PositionClosedPayload;
  'position.released': PositionReleasedPayload;
  'audit.event': AuditRecordedPayload;
};

export type TradingEventName = keyof TradingEventMap;

export type TradingEventOf<TName extends TradingEventName> = Readonly<{ type: TName; ts: number } & TradingEventMap[TName]>;

export type TradingEvent = { [TName in TradingEventName]: TradingEventOf<TName> }[TradingEventName];

export type EventHandler<TEvent> = (event: TEvent) => void | Promise<void>;

export function createEvent<TName extends TradingEventName>(
  type: TName,
  payload: TradingEventMap[TName],
  ts = Date.now()
): TradingEventOf<TName> {
  return Object.freeze(Object.assign({ type, ts }, payload));
}

/** One-line summary used by the audit sink. */
export function describeEvent(event: TradingEvent): string {
  switch (event.type) {
    case 'alert.validated':
      return `alert validated: ${describeSignal(event.signal)}`;
    case 'alert.rejected':
      return `alert rejected (${event.code}): ${event.reason}`;
    case 'risk.approved':
      return `risk approved: ${describeSignal(event.signal)} risk=${event.riskAmount}`;
    case 'risk.rejected':
      return `risk rejected (${event.reason}): ${describeSignal(event.signal)}`;
    case 'order.submitted':
      return `order submitted: ${describeSignal(event.signal)} brokerOrderId=${event.brokerOrderId}`;
    case 'order.failed':
      return `order failed: ${describeSignal(event.signal)} ${event.error.name}: ${event.error.message}`;
    case 'emergency.stop':
      return `emergency stop (${event.source}): ${event.reason}`;
    case 'emergency.reset':
      return `emergency reset (${event.source})`;
    case 'breaker.transition':
      return `breaker ${event.from} -> ${event.to}`;
    case 'position.closed':
      return `position close requested: ${event.positionId} (${event.reason})`;
    case 'position.released':
      return `position released: ${event.position.id} aggregateRisk=${event.aggregateRisk}`;
    case 'audit.event':
      return `audit ${event.audit.step}: ${event.audit.message}`;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
