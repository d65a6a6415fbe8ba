#!/usr/bin/env tsx
import { logger } from '@ecsrun/shared';
import { runCli } from './cli.js';

const log = logger.child({ module: 'main' });

async function main() {
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    log.warn({ signal }, 'cancelling run');
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    signal: controller.signal,
  });
}

main().catch((err) => {
  log.fatal({ err }, 'ecsrun failed');
  process.exit(1);
});
