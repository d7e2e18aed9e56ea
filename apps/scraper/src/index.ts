export { loadConfig, ConfigError, DEFAULT_ASHBY_COMPANIES, DEFAULT_QUERY } from './config.js';
export type { ScraperConfig } from './config.js';
export { runPipeline, collectCandidates } from './pipeline.js';
export type { PipelineDeps, PipelineResult } from './pipeline.js';
export { createPipelineDeps } from './deps.js';
export { scrapeJobs } from './scrape.js';
export type { ScrapeDeps } from './scrape.js';
export { extract } from './extract.js';
export { detectPlatform, getParser, getAllParsers } from './platforms.js';
export { isClosedByRedirect } from './redirect.js';
export { HttpFetcher } from './fetcher.js';
export type { FetchOutcome, PageFetcher, HttpFetcherOptions } from './fetcher.js';
export { WebEnricher } from './enrichment/web-enricher.js';
export type { WebEnricherOptions } from './enrichment/web-enricher.js';
export { noopEnricher } from './enrichment/noop-enricher.js';
export { WebhookNotifier, LogNotifier, buildNotification, formatTimestamp } from './notifier.js';
export type { Notifier, DeltaNotification, WebhookNotifierOptions } from './notifier.js';
export { StaticCandidateSource, parseCandidateList } from './candidates/static-source.js';
export { AshbyBoardSource } from './candidates/ashby-board-source.js';
export { parseQueryKeywords, titleMatches, DEFAULT_KEYWORDS } from './candidates/keywords.js';
export type { CandidateSource } from './candidates/types.js';
export { createScraperLogger } from './observability/logger.js';
export { withRunLogger } from './observability/with-run-logger.js';
