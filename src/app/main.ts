#!/usr/bin/env node
import { createInterface } from 'node:readline';

import { bootRuntime } from './runtime.js';

/** Reads alerts and `/` operator commands from stdin, one per line. */
export async function bootstrap(): Promise<void> {
  const runtime = await bootRuntime();
  const { logger, ingestor, operatorConsole } = runtime;

  const lines = createInterface({ input: process.stdin, terminal: false });

  lines.on('line', (line) => {
    if (line.trim().length === 0) {
      return;
    }

    const reply = operatorConsole.handle(line);
    if (reply !== null) {
      process.stdout.write(`${reply}\n`);
      return;
    }

    const result = ingestor.onRawAlert(line, { channel: runtime.config.ALERT_CHANNEL });
    if (result.status === 'REJECTED') {
      process.stdout.write(`rejected (${result.code}): ${result.reason}\n`);
    }
  });

  await new Promise<void>((resolve) => {
    lines.once('close', resolve);
  });

  await runtime.shutdown();
  logger.info('Alert trader stopped');
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    console.error('Failed to boot alert trader', error);
    process.exit(1);
  });
}
