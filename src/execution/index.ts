export {
  BrokerSubmissionError,
  brokerIdempotencyKey,
  buildBracketOrder,
  toBrokerSubmissionError,
  type BracketOrderRequest,
  type BrokerOrderAck,
  type IBrokerClient
} from './brokerAdapter.js';
export { ExecutionOrchestrator, type ExecutionOrchestratorOptions, type ExecutionOutcome } from './executionOrchestrator.js';
export { PaperBroker, type PaperBrokerOptions, type PaperOrder } from './paperBroker.js';
