export { EventBus, type EventBusOptions } from './eventBus.js';

export { createEvent, describeEvent } from './events.js';

export type {
  AlertRejectedPayload,
  AlertValidatedPayload,
  AuditRecordedPayload,
  BreakerTransitionPayload,
  EmergencyResetPayload,
  EmergencySource,
  EmergencyStopPayload,
  EventHandler,
  OrderFailedPayload,
  OrderSubmittedPayload,
  PositionClosedPayload,
  PositionReleasedPayload,
  RiskApprovedPayload,
  RiskRejectedPayload,
  TradingEvent,
  TradingEventMap,
  TradingEventName,
  TradingEventOf
} from './events.js';
