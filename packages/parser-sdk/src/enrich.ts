import type { JobPosting, ParseContext, PostingPage } from './types.js';

export type Enrichment = Pick<JobPosting, 'companyWebsite' | 'hrEmail' | 'hrName' | 'hrLinkedIn'>;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the enricher for a posting. Failures degrade to absent fields;
 * they never disqualify the posting.
 */
export async function enrichCompany(context: ParseContext, page: PostingPage, company: string): Promise<Enrichment> {
  let companyWebsite: string | undefined;
  try {
    companyWebsite = await context.enricher.findWebsite(page, company);
  } catch (error) {
    context.logger?.warn(`Website lookup failed for ${company}: ${describeError(error)}`);
    return {};
  }

  if (!companyWebsite) {
    return {};
  }

  try {
    const contacts = await context.enricher.findContacts(companyWebsite, company);
    return {
      companyWebsite,
      hrEmail: contacts.email,
      hrName: contacts.name,
      hrLinkedIn: contacts.linkedin,
    };
  } catch (error) {
    context.logger?.warn(`Contact lookup failed for ${company}: ${describeError(error)}`);
    return { companyWebsite };
  }
}
