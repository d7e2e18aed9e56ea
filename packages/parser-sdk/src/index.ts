export { defineParser } from './factory.js';
export { PLATFORMS } from './types.js';
export type {
  Platform,
  JobPosting,
  PostingPage,
  CompanyContacts,
  Enricher,
  ParserLogger,
  ParseContext,
  ParserManifest,
  Parser,
} from './types.js';
export { jobPostingSchema, validateJobPostings, MAX_DESCRIPTION_LENGTH, ELLIPSIS } from './schema.js';
export type { ValidatedJobPosting, ValidateJobPostingsOptions } from './schema.js';
export {
  UNKNOWN_TITLE,
  UNKNOWN_COMPANY,
  loadPage,
  normalizeWhitespace,
  textOf,
  attrOf,
  firstMatch,
  firstMatchOr,
  truncateDescription,
  pageText,
  findClosedPhrase,
  pathSegments,
  companyFromUrl,
} from './page.js';
export type { TextSource } from './page.js';
export { enrichCompany } from './enrich.js';
export type { Enrichment } from './enrich.js';
