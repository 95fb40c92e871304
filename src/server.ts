import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { loadOverrides } from './override-store.js';
import { createCalendarService, createSampleProvider } from './pipeline.js';

const log = createLogger('Server');

function main(): void {
  const config = loadConfig();
  // fail at startup, not on the first request
  loadOverrides(config.overridesPath);
  const sample = createSampleProvider(config);
  log.info(`Sample calendar has ${sample.preload()} record(s)`);

  const app = createApp(createCalendarService(config, { sample }));
  app.listen(config.port, () => {
    log.info(`HK IPO calendar running on port ${config.port}`);
  });
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    log.error(`Configuration error (${error.setting}): ${error.message}`);
    process.exit(1);
  }
  throw error;
}
