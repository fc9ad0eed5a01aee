#!/usr/bin/env node
import dotenv from 'dotenv';
import { createServices } from './bootstrap.js';
import { WORKER_USAGE, parseWorkerArgs } from './cli.js';
import { loadConfig } from './config.js';
import { ValidationError, toError } from './errors.js';
import { createLogger } from './logger.js';
import { Worker } from './queue/worker.js';

dotenv.config();

const logger = createLogger('Worker');

async function main(): Promise<void> {
  const config = loadConfig();
  const options = parseWorkerArgs(process.argv.slice(2), config);
  const services = createServices(config);

  const worker = new Worker({ store: services.store, registry: services.registry, logger }, options);

  process.once('SIGTERM', () => worker.shutdown('SIGTERM'));
  process.once('SIGINT', () => worker.shutdown('SIGINT'));

  try {
    await worker.run();
  } finally {
    services.db.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ValidationError) {
    console.error(`${error.message}\n\n${WORKER_USAGE}`);
  } else {
    logger.error('Worker crashed', { error: toError(error) });
  }
  process.exitCode = 1;
});
