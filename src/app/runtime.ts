import type { Logger } from 'pino';

import { AuditService } from '../audit/auditService.js';
import { loadBrokerEnv } from '../config/env.js';
import { loadConfig, toBreakerConfig, toRiskLimits, type AppConfig } from '../config/index.js';
import { createLogger } from '../config/logger.js';
import { EmergencyController } from '../emergency/emergencyController.js';
import { EventBus } from '../events/eventBus.js';
import type { IBrokerClient } from '../execution/brokerAdapter.js';
import { ExecutionOrchestrator } from '../execution/executionOrchestrator.js';
import { PaperBroker } from '../execution/paperBroker.js';
import { RiskManager } from '../risk/riskManager.js';
import { AlertIngestor } from '../signals/alertIngestor.js';
import { TradeStationClient } from '../tradestation/client.js';

import { OperatorConsole } from './operatorCommands.js';

export type RuntimeOptions = {
  config?: AppConfig;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  broker?: IBrokerClient;
  now?: () => number;
};

export type RuntimeContext = {
  config: AppConfig;
  logger: Logger;
  eventBus: EventBus;
  auditService: AuditService;
  riskManager: RiskManager;
  emergencyController: EmergencyController;
  broker: IBrokerClient;
  orchestrator: ExecutionOrchestrator;
  ingestor: AlertIngestor;
  operatorConsole: OperatorConsole;
  shutdown: () => Promise<void>;
};

export async function bootRuntime(options: RuntimeOptions = {}): Promise<RuntimeContext> {
  const env = options.env ?? process.env;
  const config = options.config ?? loadConfig(env);
  const logger = options.logger ?? createLogger(config);
  const now = options.now ?? Date.now;

  const boot = (step: string) => logger.info({ step }, `boot: ${step}`);

  try {
    boot('1.EventBus');
    const eventBus = new EventBus({ queueEmits: true, logger });

    boot('2.AuditService');
    const auditService = new AuditService({ logger, now });

    boot('3.RiskManager');
    const riskManager = new RiskManager({
      limits: toRiskLimits(config),
      config: { contractMultiplier: config.CONTRACT_MULTIPLIER },
      eventBus,
      logger,
      now
    });

    boot('4.EmergencyController');
    const emergencyController = new EmergencyController({ config: toBreakerConfig(config), eventBus, logger, now });

    boot('5.Broker');
    const broker = options.broker ?? createBroker(config, env, logger, now);

    boot('6.ExecutionOrchestrator');
    const orchestrator = new ExecutionOrchestrator({ eventBus, riskManager, emergencyController, broker, logger, now });

    boot('7.AlertIngestor');
    const ingestor = new AlertIngestor({
      eventBus,
      logger,
      defaultChannel: config.ALERT_CHANNEL,
      defaultQuantity: config.DEFAULT_QUANTITY,
      now: () => new Date(now())
    });
    const operatorConsole = new OperatorConsole({ eventBus, riskManager, emergencyController, logger, now });

    const unsubscribers = [auditService.subscribe(eventBus), riskManager.subscribe(), orchestrator.subscribe()];

    let sweepHandle: NodeJS.Timeout | null = null;
    if (config.EXPIRY_SWEEP_INTERVAL_SECONDS > 0) {
      sweepHandle = setInterval(() => {
        const released = riskManager.releaseExpired(new Date(now()));
        if (released.length > 0) {
          logger.info({ released: released.map((position) => position.id) }, 'expired positions released');
        }
      }, config.EXPIRY_SWEEP_INTERVAL_SECONDS * 1000);
      sweepHandle.unref();
    }

    const shutdown = async (): Promise<void> => {
      if (sweepHandle) {
        clearInterval(sweepHandle);
        sweepHandle = null;
      }

      await orchestrator.whenIdle();
      await eventBus.drain();
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }

      logger.info('runtime stopped');
    };

    logger.info(
      {
        brokerMode: options.broker ? 'injected' : config.BROKER_MODE,
        limits: riskManager.getLimits(),
        killSwitchEngaged: emergencyController.currentState().killSwitchEngaged
      },
      'runtime ready'
    );

    return {
      config,
      logger,
      eventBus,
      auditService,
      riskManager,
      emergencyController,
      broker,
      orchestrator,
      ingestor,
      operatorConsole,
      shutdown
    };
  } catch (error) {
    logger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}

function createBroker(config: AppConfig, env: NodeJS.ProcessEnv, logger: Logger, now: () => number): IBrokerClient {
  if (config.BROKER_MODE === 'live') {
    return new TradeStationClient({ env: loadBrokerEnv(env), logger, now });
  }

  return new PaperBroker({ now });
}
