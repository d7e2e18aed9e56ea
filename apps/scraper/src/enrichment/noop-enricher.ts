import type { CompanyContacts, Enricher } from '@jobdelta/parser-sdk';

/** Used when enrichment is switched off; every posting keeps empty contact fields. */
export const noopEnricher: Enricher = {
  findWebsite: async () => undefined,
  findContacts: async (): Promise<CompanyContacts> => ({}),
};
