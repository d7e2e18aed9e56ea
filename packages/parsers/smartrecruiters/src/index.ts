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

const CLOSED_PHRASES = ['no longer available', 'job is closed', 'position has been filled'] as const;
const UNKNOWN_LOCATION = 'Unknown';

const TITLE_SOURCES = [textOf('h1.job-title'), textOf('h1#st-jobTitle')];
// Location comes from schema.org metadata only.
const LOCATION_SOURCES = [attrOf('meta[itemprop="addressLocality"]', 'content')];
const DESCRIPTION_SOURCES = [textOf('div[itemprop="description"]'), textOf('div.job-sections')];

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
    platform: 'SmartRecruiters',
  };
}

export const smartRecruitersParser = defineParser({
  manifest: {
    platform: 'SmartRecruiters',
    name: 'SmartRecruiters',
    version: '0.1.0',
    host: 'smartrecruiters.com',
  },
  parse,
});
