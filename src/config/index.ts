import * as dotenv from 'dotenv';

import { envSchema, type AppConfig } from './schema.js';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  return result.data;
}

export { envSchema, toBreakerConfig, toRiskLimits, type AppConfig, type BreakerConfig } from './schema.js';
