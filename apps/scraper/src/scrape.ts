import { validateJobPostings, type JobPosting, type ParseContext } from '@jobdelta/parser-sdk';
import type { Logger } from 'pino';
import { extract } from './extract.js';
import type { FetchOutcome, PageFetcher } from './fetcher.js';
import { serializeError } from './observability/serialize-error.js';
import { detectPlatform } from './platforms.js';
import { isClosedByRedirect } from './redirect.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export interface ScrapeDeps {
  fetcher: PageFetcher;
  context: ParseContext;
  logger: Logger;
  /** Pause between consecutive page fetches. */
  delayMs: number;
  sleep?: Sleep;
}

/**
 * Fetches, classifies and extracts candidate URLs one at a time.
 * Every failure is scoped to its URL; the loop never aborts.
 */
export async function scrapeJobs(urls: readonly string[], deps: ScrapeDeps): Promise<JobPosting[]> {
  const { fetcher, context, logger, delayMs, sleep = defaultSleep } = deps;
  const extracted: JobPosting[] = [];
  let fetched = 0;

  for (const url of urls) {
    const platform = detectPlatform(url);
    if (!platform) {
      logger.debug({ event: 'job_skipped', url, reason: 'unsupported_platform' }, 'Skipping unsupported URL');
      continue;
    }

    if (fetched > 0) {
      await sleep(delayMs);
    }
    fetched++;

    let outcome: FetchOutcome;
    try {
      outcome = await fetcher.fetch(url);
    } catch (error) {
      logger.warn({ event: 'fetch_failed', url, error: serializeError(error) }, 'Fetch failed');
      continue;
    }

    if (outcome.statusCode !== 200 || outcome.body === undefined) {
      logger.warn({ event: 'fetch_failed', url, statusCode: outcome.statusCode }, 'Unexpected status');
      continue;
    }

    if (isClosedByRedirect(url, outcome.finalUrl)) {
      logger.debug(
        { event: 'job_skipped', url, finalUrl: outcome.finalUrl, reason: 'redirected' },
        'Skipping redirected job',
      );
      continue;
    }

    const job = await extract(platform, url, outcome.body, context);
    if (job) {
      extracted.push(job);
    }
  }

  const valid = validateJobPostings(extracted, {
    onInvalid: (issues, posting) => {
      logger.warn({ event: 'job_invalid', posting, issues }, 'Dropping invalid posting');
    },
  });

  logger.info(
    { event: 'scrape_completed', candidates: urls.length, fetched, extracted: valid.length },
    'Scrape completed',
  );

  return valid;
}
