import { z } from 'zod';

import type { RiskLimits } from '../domain/models.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BROKER_MODE: z.enum(['paper', 'live']).default('paper'),
  ALERT_CHANNEL: z.string().min(1).default('alerts'),
  MAX_OPEN_POSITIONS: positiveInt.default(5),
  MAX_RISK_PER_TRADE: z.coerce.number().positive().default(100),
  MAX_AGGREGATE_RISK: z.coerce.number().positive().default(300),
  CONTRACT_MULTIPLIER: positiveInt.default(100),
  DEFAULT_QUANTITY: positiveInt.default(1),
  BREAKER_FAILURE_THRESHOLD: positiveInt.default(3),
  BREAKER_FAILURE_WINDOW_SECONDS: positiveInt.default(300),
  BREAKER_COOLDOWN_SECONDS: nonNegativeInt.default(600),
  KILL_SWITCH_INITIALLY_ENGAGED: booleanFlag,
  EXPIRY_SWEEP_INTERVAL_SECONDS: nonNegativeInt.default(0)
});

export type AppConfig = z.infer<typeof envSchema>;

export type BreakerConfig = {
  failureThreshold: number;
  failureWindowMs: number;
  cooldownMs: number;
  killSwitchInitiallyEngaged: boolean;
};

export function toRiskLimits(config: AppConfig): RiskLimits {
  return {
    maxOpenPositions: config.MAX_OPEN_POSITIONS,
    maxRiskPerTrade: config.MAX_RISK_PER_TRADE,
    maxAggregateRisk: config.MAX_AGGREGATE_RISK
  };
}

export function toBreakerConfig(config: AppConfig): BreakerConfig {
  return {
    failureThreshold: config.BREAKER_FAILURE_THRESHOLD,
    failureWindowMs: config.BREAKER_FAILURE_WINDOW_SECONDS * 1000,
    cooldownMs: config.BREAKER_COOLDOWN_SECONDS * 1000,
    killSwitchInitiallyEngaged: config.KILL_SWITCH_INITIALLY_ENGAGED
  };
}
