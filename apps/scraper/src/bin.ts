#!/usr/bin/env node
import 'dotenv/config';
import { DEFAULT_QUERY, loadConfig } from './config.js';
import { createPipelineDeps } from './deps.js';
import { createScraperLogger } from './observability/logger.js';
import { serializeError } from './observability/serialize-error.js';
import { withRunLogger } from './observability/with-run-logger.js';
import { runPipeline } from './pipeline.js';

async function run(): Promise<void> {
  const logger = createScraperLogger();
  const config = loadConfig();
  const query = process.argv.slice(2).join(' ').trim() || DEFAULT_QUERY;
  const deps = createPipelineDeps(config, logger);

  await withRunLogger({
    logger,
    query,
    summary: (result) => ({
      candidates: result.candidates.length,
      extracted: result.extracted.length,
      delta: result.delta.length,
    }),
    run: () => runPipeline(config, deps, query),
  });
}

run().catch((error: unknown) => {
  const logger = createScraperLogger();
  logger.error(
    {
      event: 'scraper_fatal_error',
      error: serializeError(error),
    },
    'Scraper fatal error',
  );
  process.exit(1);
});
