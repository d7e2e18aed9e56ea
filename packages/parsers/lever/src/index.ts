import {
  UNKNOWN_TITLE,
  companyFromUrl,
  defineParser,
  enrichCompany,
  findClosedPhrase,
  firstMatch,
  firstMatchOr,
  textOf,
  truncateDescription,
  type JobPosting,
  type ParseContext,
  type PostingPage,
} from '@jobdelta/parser-sdk';

const CLOSED_PHRASES = ['no longer open', 'job is closed', 'position has been filled'] as const;
const UNKNOWN_LOCATION = 'Remote/Unknown';

const TITLE_SOURCES = [textOf('h2.posting-headline'), textOf('h2')];
const LOCATION_SOURCES = [textOf('div.location')];
const DESCRIPTION_SOURCES = [textOf('div.content'), textOf('div.posting-description')];

export async function parse(page: PostingPage, context: ParseContext): Promise<JobPosting | null> {
  const { $, url } = page;

  const closedPhrase = findClosedPhrase($, CLOSED_PHRASES);
  if (closedPhrase) {
    context.logger?.debug(`Skipping closed job (text match "${closedPhrase}"): ${url}`);
    return null;
  }

  // A closed posting bounces to the company board, which lists several postings.
  const postingCount = $('div.posting').length;
  if (postingCount > 1) {
    context.logger?.debug(`Skipping closed job (shows ${postingCount} postings): ${url}`);
    return null;
  }

  const description = firstMatch($, DESCRIPTION_SOURCES);
  if (!description) {
    context.logger?.debug(`Skipping job with no description: ${url}`);
    return null;
  }

  const company = companyFromUrl(url);
  const enrichment = await enrichCompany(context, page, company);

  return {
    title: firstMatchOr($, TITLE_SOURCES, UNKNOWN_TITLE),
    company,
    location: firstMatchOr($, LOCATION_SOURCES, UNKNOWN_LOCATION),
    description: truncateDescription(description),
    sourceUrl: url,
    ...enrichment,
    platform: 'Lever',
  };
}

export const leverParser = defineParser({
  manifest: {
    platform: 'Lever',
    name: 'Lever',
    version: '0.1.0',
    host: 'lever.co',
  },
  parse,
});
