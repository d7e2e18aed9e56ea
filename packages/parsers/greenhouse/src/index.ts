import {
  UNKNOWN_TITLE,
  attrOf,
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
const UNKNOWN_LOCATION = 'Unknown';

const TITLE_SOURCES = [textOf('h1.app-title'), textOf('h1'), attrOf('meta[property="og:title"]', 'content')];
const LOCATION_SOURCES = [textOf('div.location'), textOf('span.location')];
const DESCRIPTION_SOURCES = [textOf('div#content'), textOf('div#main')];

export async function parse(page: PostingPage, context: ParseContext): Promise<JobPosting | null> {
  const { $, url } = page;

  const closedPhrase = findClosedPhrase($, CLOSED_PHRASES);
  if (closedPhrase) {
    context.logger?.debug(`Skipping closed job (text match "${closedPhrase}"): ${url}`);
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
    platform: 'Greenhouse',
  };
}

export const greenhouseParser = defineParser({
  manifest: {
    platform: 'Greenhouse',
    name: 'Greenhouse',
    version: '0.1.0',
    host: 'greenhouse.io',
  },
  parse,
});
