import pino, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from './schema.js';

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL' | 'NODE_ENV'>): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: {
      service: 'alert-trader',
      env: config.NODE_ENV
    }
  };

  return pino(options);
}
