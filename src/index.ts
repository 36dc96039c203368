#!/usr/bin/env node
import { getConfig } from './config/config.js';
import { initLogger, getLogger } from './lib/logger.js';
import { MetadataError } from './lib/errors.js';
import { createProgram } from './cli/program.js';

async function main(): Promise<void> {
  const config = getConfig();
  initLogger(config.logging);

  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof MetadataError) {
    getLogger().error({ error }, error.message);
  } else {
    console.error('Fatal error:', error);
  }
  process.exitCode = 1;
});
