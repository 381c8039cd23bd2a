#!/usr/bin/env tsx
import { loadEnvFiles } from './config.js';
import { createCliLogger, serializeError } from './logger.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  loadEnvFiles();
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const logger = createCliLogger();
  logger.error(
    {
      event: 'run_failed',
      error: serializeError(error),
    },
    'Run failed',
  );
  process.exit(1);
});
