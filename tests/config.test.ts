import { loadBrokerEnv } from '../src/config/env.js';
import { loadConfig, toBreakerConfig, toRiskLimits } from '../src/config/index.js';
import { envSchema } from '../src/config/schema.js';

describe('envSchema', () => {
  it('applies defaults for every option', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      BROKER_MODE: 'paper',
      ALERT_CHANNEL: 'alerts',
      CONTRACT_MULTIPLIER: 100,
      DEFAULT_QUANTITY: 1,
      KILL_SWITCH_INITIALLY_ENGAGED: false,
      EXPIRY_SWEEP_INTERVAL_SECONDS: 0
    });
    expect(toRiskLimits(config)).toEqual({ maxOpenPositions: 5, maxRiskPerTrade: 100, maxAggregateRisk: 300 });
    expect(toBreakerConfig(config)).toEqual({
      failureThreshold: 3,
      failureWindowMs: 300_000,
      cooldownMs: 600_000,
      killSwitchInitiallyEngaged: false
    });
  });

  it('coerces numeric and boolean environment strings', () => {
    const config = loadConfig({
      MAX_OPEN_POSITIONS: '4',
      MAX_RISK_PER_TRADE: '1000',
      MAX_AGGREGATE_RISK: '2000.50',
      BREAKER_FAILURE_THRESHOLD: '5',
      BREAKER_COOLDOWN_SECONDS: '0',
      KILL_SWITCH_INITIALLY_ENGAGED: '1'
    });

    expect(toRiskLimits(config)).toEqual({ maxOpenPositions: 4, maxRiskPerTrade: 1000, maxAggregateRisk: 2000.5 });
    expect(config.BREAKER_FAILURE_THRESHOLD).toBe(5);
    expect(config.BREAKER_COOLDOWN_SECONDS).toBe(0);
    expect(config.KILL_SWITCH_INITIALLY_ENGAGED).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(envSchema.safeParse({ MAX_OPEN_POSITIONS: '0' }).success).toBe(false);
    expect(envSchema.safeParse({ KILL_SWITCH_INITIALLY_ENGAGED: 'yes' }).success).toBe(false);
    expect(() => loadConfig({ BROKER_MODE: 'margin' })).toThrow(/^Invalid configuration/);
  });
});

describe('loadBrokerEnv', () => {
  it('requires credentials', () => {
    expect(() => loadBrokerEnv({})).toThrow(/^Invalid broker environment configuration/);
  });

  it('defaults the simulation endpoint', () => {
    const env = loadBrokerEnv({
      TS_CLIENT_ID: 'test-client',
      TS_CLIENT_SECRET: 'test-secret',
      TS_REFRESH_TOKEN: 'test-refresh',
      TS_ACCOUNT_KEY: 'SIM0001'
    });

    expect(env.TS_BASE_URL).toBe('https://sim-api.tradestation.com/v3');
    expect(env.TS_REQUEST_TIMEOUT_MS).toBe(5000);
  });
});
