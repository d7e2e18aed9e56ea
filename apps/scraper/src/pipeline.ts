import type { DeltaStore } from '@jobdelta/ingestion';
import type { JobPosting, ParseContext } from '@jobdelta/parser-sdk';
import type { Logger } from 'pino';
import type { CandidateSource } from './candidates/types.js';
import type { ScraperConfig } from './config.js';
import type { PageFetcher } from './fetcher.js';
import type { Notifier } from './notifier.js';
import { serializeError } from './observability/serialize-error.js';
import { scrapeJobs } from './scrape.js';
import type { Sleep } from './sleep.js';

export interface PipelineDeps {
  sources: CandidateSource[];
  fetcher: PageFetcher;
  context: ParseContext;
  store: DeltaStore;
  notifier: Notifier;
  logger: Logger;
  sleep?: Sleep;
}

export interface PipelineResult {
  candidates: string[];
  extracted: JobPosting[];
  delta: JobPosting[];
}

/**
 * Merges every source's URLs, first occurrence first. A failing source is
 * logged and contributes nothing.
 */
export async function collectCandidates(
  sources: readonly CandidateSource[],
  query: string,
  logger: Logger,
): Promise<string[]> {
  const seen = new Set<string>();

  for (const source of sources) {
    try {
      const urls = await source.collect(query);
      for (const url of urls) {
        seen.add(url);
      }
      logger.info({ event: 'candidates_collected', source: source.name, count: urls.length }, 'Candidates collected');
    } catch (error) {
      logger.warn({ event: 'candidates_failed', source: source.name, error: serializeError(error) }, 'Source failed');
    }
  }

  return [...seen];
}

/**
 * One end-to-end run: collect, scrape, persist the delta, notify.
 * `DeltaStoreError` propagates; the notifier is only called for a non-empty delta.
 */
export async function runPipeline(
  config: Pick<ScraperConfig, 'maxResults' | 'fetchDelayMs'>,
  deps: PipelineDeps,
  query: string,
): Promise<PipelineResult> {
  const { sources, fetcher, context, store, notifier, logger, sleep } = deps;

  const candidates = (await collectCandidates(sources, query, logger)).slice(0, config.maxResults);
  const extracted = await scrapeJobs(candidates, {
    fetcher,
    context,
    logger,
    delayMs: config.fetchDelayMs,
    sleep,
  });

  const delta = await store.ingest(extracted);
  if (delta.length > 0) {
    await notifier.notify(delta);
  }

  return { candidates, extracted, delta };
}
