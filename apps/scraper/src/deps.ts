import { CsvDeltaStore } from '@jobdelta/ingestion';
import { AshbyClient } from '@jobdelta/parser-ashby';
import type { Logger } from 'pino';
import { AshbyBoardSource } from './candidates/ashby-board-source.js';
import { StaticCandidateSource } from './candidates/static-source.js';
import type { CandidateSource } from './candidates/types.js';
import type { ScraperConfig } from './config.js';
import { noopEnricher } from './enrichment/noop-enricher.js';
import { WebEnricher } from './enrichment/web-enricher.js';
import { HttpFetcher } from './fetcher.js';
import { LogNotifier, WebhookNotifier, type Notifier } from './notifier.js';
import { createIngestionLogger, createParserLogger } from './observability/component-loggers.js';
import type { PipelineDeps } from './pipeline.js';

function createSources(config: ScraperConfig, logger: Logger, fetchImpl: typeof fetch): CandidateSource[] {
  const sources: CandidateSource[] = [];

  if (config.candidatesFile) {
    sources.push(new StaticCandidateSource({ file: config.candidatesFile }));
  }

  if (config.ashbyCompanies.length > 0) {
    sources.push(
      new AshbyBoardSource({
        client: new AshbyClient({
          userAgent: config.userAgent,
          timeoutMs: config.requestTimeoutMs,
          fetchImpl,
        }),
        companies: config.ashbyCompanies,
        logger,
        delayMs: config.enrichDelayMs,
      }),
    );
  }

  return sources;
}

function createNotifier(config: ScraperConfig, logger: Logger, fetchImpl: typeof fetch): Notifier {
  if (!config.webhookUrl) {
    return new LogNotifier(logger);
  }

  return new WebhookNotifier({
    url: config.webhookUrl,
    logger,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl,
  });
}

/**
 * Wires the production implementations behind every pipeline seam.
 */
export function createPipelineDeps(config: ScraperConfig, logger: Logger, fetchImpl: typeof fetch = fetch): PipelineDeps {
  const parserLogger = createParserLogger(logger);
  const enricher = config.enrichmentEnabled
    ? new WebEnricher({
        userAgent: config.userAgent,
        timeoutMs: config.contactTimeoutMs,
        delayMs: config.enrichDelayMs,
        fetchImpl,
        logger: parserLogger,
      })
    : noopEnricher;

  return {
    sources: createSources(config, logger, fetchImpl),
    fetcher: new HttpFetcher({
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
      fetchImpl,
    }),
    context: {
      enricher,
      logger: parserLogger,
      fetchImpl,
      userAgent: config.userAgent,
      requestTimeoutMs: config.requestTimeoutMs,
    },
    store: new CsvDeltaStore({
      masterPath: config.masterPath,
      deltaPath: config.deltaPath,
      logger: createIngestionLogger(logger),
    }),
    notifier: createNotifier(config, logger, fetchImpl),
    logger,
  };
}
