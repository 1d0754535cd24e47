import { config as dotenvConfig } from 'dotenv';
import { createConsoleLogger, createEngine, loadSettings } from '@smokerun/core';

import { createApp } from './app.js';

dotenvConfig();

const PORT = Number(process.env.PORT ?? '4000');
const logger = createConsoleLogger();

async function main(): Promise<void> {
  const settings = await loadSettings();
  const engine = await createEngine(settings, { logger });
  const app = createApp(engine);

  app.listen(PORT, () => {
    logger.info(`smokerun server listening on http://localhost:${PORT}`);
  });
}

main().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
