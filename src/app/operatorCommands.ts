import type { Logger } from 'pino';
import pino from 'pino';

import type { EmergencyController } from '../emergency/emergencyController.js';
import type { EventBus } from '../events/eventBus.js';
import { createEvent } from '../events/events.js';
import type { RiskManager } from '../risk/riskManager.js';

export type OperatorCommand =
  | { kind: 'kill'; reason: string }
  | { kind: 'resume' }
  | { kind: 'status' }
  | { kind: 'close'; positionId: string }
  | { kind: 'unknown'; text: string };

export type OperatorConsoleOptions = {
  eventBus: EventBus;
  riskManager: RiskManager;
  emergencyController: EmergencyController;
  logger?: Logger;
  now?: () => number;
};

const DEFAULT_KILL_REASON = 'operator request';

/** Returns `null` for lines that are not commands (no leading `/`). */
export function parseOperatorCommand(line: string): OperatorCommand | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const [head = '', ...rest] = trimmed.slice(1).split(/\s+/);
  const argument = rest.join(' ').trim();

  switch (head.toLowerCase()) {
    case 'kill':
      return { kind: 'kill', reason: argument || DEFAULT_KILL_REASON };
    case 'resume':
      return { kind: 'resume' };
    case 'status':
      return { kind: 'status' };
    case 'close':
      return argument ? { kind: 'close', positionId: argument } : { kind: 'unknown', text: trimmed };
    default:
      return { kind: 'unknown', text: trimmed };
  }
}

export class OperatorConsole {
  private readonly eventBus: EventBus;
  private readonly riskManager: RiskManager;
  private readonly emergencyController: EmergencyController;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: OperatorConsoleOptions) {
    this.eventBus = options.eventBus;
    this.riskManager = options.riskManager;
    this.emergencyController = options.emergencyController;
    this.logger = (options.logger ?? pino({ name: 'operator', enabled: false })).child({ component: 'operator' });
    this.now = options.now ?? Date.now;
  }

  /** Runs `line` if it is a command and returns the reply; `null` otherwise. */
  handle(line: string): string | null {
    const command = parseOperatorCommand(line);
    if (!command) {
      return null;
    }

    this.logger.info({ command }, 'operator command');
    return this.execute(command);
  }

  execute(command: OperatorCommand): string {
    switch (command.kind) {
      case 'kill':
        this.emergencyController.engageKillSwitch(command.reason);
        return `kill switch engaged: ${command.reason}`;
      case 'resume':
        this.emergencyController.clearKillSwitch();
        return 'kill switch cleared';
      case 'status':
        return this.status();
      case 'close': {
        if (!this.riskManager.positions().some((position) => position.id === command.positionId)) {
          return `unknown position ${command.positionId}`;
        }

        this.eventBus.publish(createEvent('position.closed', { positionId: command.positionId, reason: 'operator' }, this.now()));
        return `close requested for ${command.positionId}`;
      }
      case 'unknown':
        return `unknown command: ${command.text} (try /kill <reason>, /resume, /status, /close <positionId>)`;
      default: {
        const unreachable: never = command;
        return unreachable;
      }
    }
  }

  private status(): string {
    const state = this.emergencyController.currentState();
    const limits = this.riskManager.getLimits();
    const killSwitch = state.killSwitchEngaged ? `engaged (${state.killSwitchReason ?? 'no reason given'})` : 'off';

    return [
      `breaker=${state.breakerState} failures=${state.consecutiveFailures} killSwitch=${killSwitch}`,
      `positions=${this.riskManager.openPositionCount()}/${limits.maxOpenPositions}` +
        ` aggregateRisk=${this.riskManager.currentAggregateRisk().toFixed(2)}/${limits.maxAggregateRisk.toFixed(2)}` +
        ` reserved=${this.riskManager.reservedRisk().toFixed(2)}`
    ].join('\n');
  }
}
