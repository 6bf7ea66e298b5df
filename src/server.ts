/**
 * Longform Translator - HTTP server entry point
 *
 * Jobs and glossaries persist in a LowDB JSON file; generation runs
 * against OpenAI-compatible chat completion endpoints.
 */

import 'dotenv/config';
import { loadConfig, validateConfig } from './config.js';
import { GlossaryStore, JobStore, initDatabase } from './storage/database.js';
import { JobEventHub } from './services/job-events.js';
import { TranslationService } from './services/translation-service.js';
import { createProviderFactory } from './services/engine-integration.js';
import { createApp } from './app.js';
import { logger } from './logger.js';

async function startServer() {
  const config = loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    for (const error of validation.errors) {
      logger.warn(error);
    }
  }

  const database = await initDatabase(config.storage.dataDir);
  const store = new JobStore(database);
  const glossaries = new GlossaryStore(database);
  const events = new JobEventHub();

  const service = new TranslationService({
    appConfig: config,
    store,
    glossaries,
    events,
    providerFactory: createProviderFactory(config),
  });

  const app = createApp({ config, service, glossaries, events });

  app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        provider: config.defaults.provider,
        model: config.defaults.model,
        maxConcurrentJobs: config.jobs.maxConcurrentJobs,
      },
      `Server listening on http://localhost:${config.port}`
    );
  });

  await service.resumeUnfinishedJobs();
}

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Server failed to start');
  process.exit(1);
});
