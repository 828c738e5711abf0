import type { Logger } from 'pino';
import pino from 'pino';

import type { RiskRejectionReason, TradeSignal } from '../domain/models.js';
import type { EmergencyController } from '../emergency/emergencyController.js';
import type { EventBus } from '../events/eventBus.js';
import { createEvent } from '../events/events.js';
import type { RiskManager } from '../risk/riskManager.js';

import type { BrokerSubmissionError, IBrokerClient } from './brokerAdapter.js';
import { buildBracketOrder, toBrokerSubmissionError } from './brokerAdapter.js';

export type ExecutionOutcome =
  | { status: 'DUPLICATE'; signalId: string }
  | { status: 'SUPPRESSED'; signalId: string }
  | { status: 'REJECTED'; signalId: string; reason: RiskRejectionReason; detail: string }
  | { status: 'SUBMITTED'; signalId: string; brokerOrderId: string; positionId: string }
  | { status: 'FAILED'; signalId: string; error: BrokerSubmissionError };

export type ExecutionOrchestratorOptions = {
  eventBus: EventBus;
  riskManager: RiskManager;
  emergencyController: EmergencyController;
  broker: IBrokerClient;
  logger?: Logger;
  now?: () => number;
  /** How many handled signal ids are remembered for duplicate detection. */
  handledSignalCapacity?: number;
};

const DEFAULT_HANDLED_SIGNAL_CAPACITY = 10_000;

/**
 * Drives each validated signal through breaker check, risk evaluation and
 * a single broker submission, publishing exactly one terminal event.
 */
export class ExecutionOrchestrator {
  private readonly eventBus: EventBus;
  private readonly riskManager: RiskManager;
  private readonly emergencyController: EmergencyController;
  private readonly broker: IBrokerClient;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly handledSignalCapacity: number;
  private readonly handledSignalIds = new Set<string>();
  private readonly inFlight = new Set<Promise<ExecutionOutcome>>();

  constructor(options: ExecutionOrchestratorOptions) {
    this.eventBus = options.eventBus;
    this.riskManager = options.riskManager;
    this.emergencyController = options.emergencyController;
    this.broker = options.broker;
    this.logger = (options.logger ?? pino({ name: 'execution-orchestrator', enabled: false })).child({
      component: 'execution-orchestrator'
    });
    this.now = options.now ?? Date.now;
    this.handledSignalCapacity = Math.max(1, options.handledSignalCapacity ?? DEFAULT_HANDLED_SIGNAL_CAPACITY);
  }

  subscribe(): () => void {
    return this.eventBus.subscribe('alert.validated', async (event) => {
      await this.handleSignal(event.signal);
    });
  }

  async handleSignal(signal: TradeSignal): Promise<ExecutionOutcome> {
    if (this.handledSignalIds.has(signal.id)) {
      this.logger.warn({ signalId: signal.id }, 'signal already handled, ignoring');
      return { status: 'DUPLICATE', signalId: signal.id };
    }
    this.rememberHandled(signal.id);

    if (!this.emergencyController.mayProceed(signal.id)) {
      const state = this.emergencyController.currentState();
      const detail = state.killSwitchEngaged
        ? `kill switch engaged: ${state.killSwitchReason ?? 'no reason given'}`
        : `circuit breaker ${state.breakerState}`;

      this.logger.warn({ signalId: signal.id, detail }, 'signal suppressed');
      this.eventBus.publish(createEvent('risk.rejected', { signal, reason: 'Suppressed', detail }, this.now()));
      return { status: 'SUPPRESSED', signalId: signal.id };
    }

    const decision = this.riskManager.evaluate(signal);
    if (decision.status === 'REJECT') {
      this.emergencyController.abandonTrial(signal.id);
      this.eventBus.publish(
        createEvent('risk.rejected', { signal, reason: decision.reason, detail: decision.detail }, this.now())
      );
      return { status: 'REJECTED', signalId: signal.id, reason: decision.reason, detail: decision.detail };
    }

    this.eventBus.publish(createEvent('risk.approved', { signal, riskAmount: decision.riskAmount }, this.now()));

    const pending = this.submit(signal);
    this.inFlight.add(pending);
    try {
      return await pending;
    } finally {
      this.inFlight.delete(pending);
    }
  }

  /** Resolves once every submission started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  private rememberHandled(signalId: string): void {
    this.handledSignalIds.add(signalId);
    if (this.handledSignalIds.size <= this.handledSignalCapacity) {
      return;
    }

    const oldest = this.handledSignalIds.values().next();
    if (!oldest.done) {
      this.handledSignalIds.delete(oldest.value);
    }
  }

  private async submit(signal: TradeSignal): Promise<ExecutionOutcome> {
    const request = buildBracketOrder(signal);

    let brokerOrderId: string;
    try {
      const ack = await this.broker.submitBracketOrder(request);
      brokerOrderId = ack.orderId;
    } catch (error: unknown) {
      const failure = toBrokerSubmissionError(error);

      this.riskManager.cancel(signal);
      this.emergencyController.recordOutcome('failed', { ticket: signal.id, fatal: failure.fatal });

      this.logger.error(
        { signalId: signal.id, err: failure, fatal: failure.fatal, statusCode: failure.statusCode },
        'bracket order submission failed'
      );
      this.eventBus.publish(
        createEvent(
          'order.failed',
          { signal, error: { name: failure.name, message: failure.message, fatal: failure.fatal } },
          this.now()
        )
      );
      return { status: 'FAILED', signalId: signal.id, error: failure };
    }

    const position = this.riskManager.commit(signal, brokerOrderId);
    this.emergencyController.recordOutcome('submitted', { ticket: signal.id });

    this.logger.info({ signalId: signal.id, brokerOrderId, positionId: position.id }, 'bracket order submitted');
    this.eventBus.publish(createEvent('order.submitted', { signal, brokerOrderId, positionId: position.id }, this.now()));

    return { status: 'SUBMITTED', signalId: signal.id, brokerOrderId, positionId: position.id };
  }
}
