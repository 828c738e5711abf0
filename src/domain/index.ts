export {
  alertSourceSchema,
  auditEventSchema,
  auditLevelSchema,
  breakerStatusSchema,
  directionSchema,
  instrumentSchema,
  optionTypeSchema,
  rejectionReasonSchema,
  riskRejectionReasonSchema,
  tradeSignalSchema,
  describeSignal,
  hashObject,
  isOptionSignal
} from './models.js';

export type {
  AlertSource,
  AuditEvent,
  AuditLevel,
  BreakerSnapshot,
  BreakerStatus,
  Direction,
  EquitySignal,
  Instrument,
  OptionSignal,
  OptionType,
  PositionExposure,
  RejectionReason,
  RiskLimits,
  RiskRejectionReason,
  TradeSignal
} from './models.js';

export { InvariantViolationError, SignalValidationError, type SignalValidationCode } from './errors.js';
