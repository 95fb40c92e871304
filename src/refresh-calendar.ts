#!/usr/bin/env node
/**
 * Run one reconciliation and print the result as JSON
 *
 * Usage: refresh-calendar [--sample]
 */

import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger, sendInfoToStderr } from './logger.js';
import { createEngine } from './pipeline.js';

sendInfoToStderr();
const log = createLogger('Refresh');

async function main(): Promise<void> {
  const config = loadConfig();
  const useLive = config.useLive && !process.argv.includes('--sample');
  const run = await createEngine({ ...config, useLive }).reconcile();

  process.stdout.write(`${JSON.stringify(run, null, 2)}\n`);
  log.info(`${run.records.length} ${run.source} record(s), ${run.errors.length} source error(s)`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    log.error(`Configuration error (${error.setting}): ${error.message}`);
  } else {
    log.error('Refresh failed:', error);
  }
  process.exit(1);
});
