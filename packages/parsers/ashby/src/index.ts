import {
  UNKNOWN_TITLE,
  attrOf,
  companyFromUrl,
  defineParser,
  enrichCompany,
  findClosedPhrase,
  firstMatch,
  pathSegments,
  textOf,
  truncateDescription,
  type JobPosting,
  type ParseContext,
  type PostingPage,
} from '@jobdelta/parser-sdk';
import { AshbyClient } from './client.js';
import type { AshbyJobPosting } from './types.js';

export { AshbyClient, AshbyApiError } from './client.js';
export type { AshbyClientOptions } from './client.js';
export type { AshbyJobPosting } from './types.js';

const CLOSED_PHRASES = ['job not found', 'no longer accepting applications', 'job is closed'] as const;
const UNKNOWN_LOCATION = 'Unknown';
const MIN_DESCRIPTION_LENGTH = 50;

const PAGE_TITLE_SOURCES = [attrOf('meta[property="og:title"]', 'content'), textOf('title')];
const DESCRIPTION_SOURCES = [
  textOf('div.job-description'),
  textOf('div[data-testid="job-description"]'),
  textOf('div.posting-description'),
  attrOf('meta[property="og:description"]', 'content'),
];

/**
 * Page titles read "Role @ Company"; keep the role.
 */
export function cleanPageTitle(raw: string | undefined): string {
  if (!raw) {
    return UNKNOWN_TITLE;
  }

  const title = raw.split('@')[0]?.trim();
  return title ? title : UNKNOWN_TITLE;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Ashby postings are verified against the company's live board before the
 * page is trusted. When the board lists the job id its title and location
 * win; when it does not, the page title is used and location is Unknown.
 * When the board cannot be read at all the posting is dropped.
 */
export async function parse(page: PostingPage, context: ParseContext): Promise<JobPosting | null> {
  const { $, url } = page;

  const closedPhrase = findClosedPhrase($, CLOSED_PHRASES);
  if (closedPhrase) {
    context.logger?.debug(`Skipping closed job (text match "${closedPhrase}"): ${url}`);
    return null;
  }

  const [companyName, jobId] = pathSegments(url);
  if (!companyName || !jobId) {
    context.logger?.debug(`Skipping Ashby URL without company and job id: ${url}`);
    return null;
  }

  const client = new AshbyClient({
    fetchImpl: context.fetchImpl,
    userAgent: context.userAgent,
    timeoutMs: context.requestTimeoutMs,
  });
  let board: AshbyJobPosting[];
  try {
    board = await client.listJobPostings(companyName);
  } catch (error) {
    context.logger?.warn(`Ashby verification unavailable for ${url}: ${describeError(error)}`);
    return null;
  }

  const listed = board.find((posting) => posting.id === jobId);
  let title: string;
  let location: string;
  if (listed) {
    title = listed.title ?? UNKNOWN_TITLE;
    location = listed.locationName ?? UNKNOWN_LOCATION;
  } else {
    context.logger?.debug(`Job id ${jobId} not on the ${companyName} board, using page title: ${url}`);
    title = cleanPageTitle(firstMatch($, PAGE_TITLE_SOURCES));
    location = UNKNOWN_LOCATION;
  }

  const description = firstMatch($, DESCRIPTION_SOURCES, (value) => value.length > MIN_DESCRIPTION_LENGTH);
  if (!description) {
    context.logger?.debug(`Skipping job with no meaningful description: ${url}`);
    return null;
  }

  const company = companyFromUrl(url);
  const enrichment = await enrichCompany(context, page, company);

  return {
    title,
    company,
    location,
    description: truncateDescription(description),
    sourceUrl: url,
    ...enrichment,
    platform: 'Ashby',
  };
}

export const ashbyParser = defineParser({
  manifest: {
    platform: 'Ashby',
    name: 'Ashby',
    version: '0.1.0',
    host: 'ashbyhq.com',
  },
  parse,
});
