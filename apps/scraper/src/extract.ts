import { loadPage, type JobPosting, type ParseContext, type Platform } from '@jobdelta/parser-sdk';
import { getParser } from './platforms.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the platform's parser over a fetched page. A parser that throws
 * disqualifies only this URL.
 */
export async function extract(
  platform: Platform,
  url: string,
  html: string,
  context: ParseContext,
): Promise<JobPosting | null> {
  try {
    return await getParser(platform).parse(loadPage(url, html), context);
  } catch (error) {
    context.logger?.warn(`Extraction failed for ${url}: ${describeError(error)}`);
    return null;
  }
}
