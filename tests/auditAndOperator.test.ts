import { parseOperatorCommand, OperatorConsole } from '../src/app/operatorCommands.js';
import { AuditService } from '../src/audit/auditService.js';
import type { EquitySignal } from '../src/domain/models.js';
import { hashObject } from '../src/domain/models.js';
import { EmergencyController } from '../src/emergency/emergencyController.js';
import { EventBus } from '../src/events/eventBus.js';
import { createEvent } from '../src/events/events.js';
import { RiskManager } from '../src/risk/riskManager.js';

const signal: EquitySignal = {
  id: 'sig-op',
  instrument: 'equity',
  symbol: 'TSLA',
  direction: 'buy',
  quantity: 10,
  entryPrice: 50,
  stopPrice: 45,
  receivedAt: 1_700_000_000_000,
  source: { channel: 'alerts' },
  rawText: 'BUY TSLA @ 50 STOP 45 QTY 10'
};

describe('AuditService', () => {
  it('records every published event with an input hash', () => {
    const bus = new EventBus();
    const audit = new AuditService({ now: () => 99 });
    audit.subscribe(bus);

    const stop = createEvent('emergency.stop', { reason: 'manual', source: 'kill_switch' }, 5);
    bus.publish(stop);
    bus.publish(createEvent('risk.rejected', { signal, reason: 'Suppressed', detail: 'kill switch engaged: manual' }, 6));

    const entries = audit.recent();
    expect(entries.map((entry) => [entry.step, entry.level, entry.reason, entry.message])).toEqual([
      ['emergency.stop', 'error', 'manual', 'emergency stop (kill_switch): manual'],
      ['risk.rejected', 'warn', 'Suppressed', 'risk rejected (Suppressed): BUY 10 TSLA']
    ]);
    expect(entries[0]?.inputsHash).toBe(hashObject(stop));
    expect(entries[0]?.ts).toBe(99);
  });

  it('keeps only the most recent entries', () => {
    const audit = new AuditService({ capacity: 2 });

    for (const step of ['a', 'b', 'c']) {
      audit.log({ step, level: 'info', message: step, inputs: {}, outputs: {} });
    }

    expect(audit.recent().map((entry) => entry.step)).toEqual(['b', 'c']);
    expect(audit.recent(1).map((entry) => entry.step)).toEqual(['c']);
  });
});

describe('parseOperatorCommand', () => {
  it('parses known commands and ignores plain text', () => {
    expect(parseOperatorCommand('/kill  earnings   run-up ')).toEqual({ kind: 'kill', reason: 'earnings run-up' });
    expect(parseOperatorCommand('/KILL')).toEqual({ kind: 'kill', reason: 'operator request' });
    expect(parseOperatorCommand('/resume')).toEqual({ kind: 'resume' });
    expect(parseOperatorCommand(' /status')).toEqual({ kind: 'status' });
    expect(parseOperatorCommand('/close pos-3')).toEqual({ kind: 'close', positionId: 'pos-3' });
    expect(parseOperatorCommand('/close')).toEqual({ kind: 'unknown', text: '/close' });
    expect(parseOperatorCommand('/flatten')).toEqual({ kind: 'unknown', text: '/flatten' });
    expect(parseOperatorCommand('BUY TSLA @ 250')).toBeNull();
  });
});

describe('OperatorConsole', () => {
  function setup() {
    const bus = new EventBus();
    const riskManager = new RiskManager({ limits: { maxOpenPositions: 5, maxRiskPerTrade: 1000, maxAggregateRisk: 2000 }, eventBus: bus });
    riskManager.subscribe();
    const emergencyController = new EmergencyController({ eventBus: bus });
    const operator = new OperatorConsole({ eventBus: bus, riskManager, emergencyController });
    return { riskManager, emergencyController, operator };
  }

  it('engages and clears the kill switch', () => {
    const { emergencyController, operator } = setup();

    expect(operator.handle('/kill desk closed')).toBe('kill switch engaged: desk closed');
    expect(emergencyController.mayProceed()).toBe(false);
    expect(operator.handle('/resume')).toBe('kill switch cleared');
    expect(emergencyController.mayProceed()).toBe(true);
  });

  it('reports status', () => {
    const { riskManager, operator } = setup();
    riskManager.evaluate(signal);
    riskManager.commit(signal, 'paper-1');

    expect(operator.handle('/status')).toBe(
      'breaker=Closed failures=0 killSwitch=off\npositions=1/5 aggregateRisk=50.00/2000.00 reserved=0.00'
    );
  });

  it('closes a known position through the bus', () => {
    const { riskManager, operator } = setup();
    riskManager.evaluate(signal);
    riskManager.commit(signal, 'paper-1');

    expect(operator.handle('/close pos-9')).toBe('unknown position pos-9');
    expect(operator.handle('/close pos-1')).toBe('close requested for pos-1');
    expect(riskManager.openPositionCount()).toBe(0);
  });

  it('returns null for alert text', () => {
    const { operator } = setup();

    expect(operator.handle('BUY TSLA @ 250')).toBeNull();
  });
});
