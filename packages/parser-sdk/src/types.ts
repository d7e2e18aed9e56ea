import type { CheerioAPI } from 'cheerio';

export const PLATFORMS = ['Lever', 'Ashby', 'Greenhouse', 'SmartRecruiters'] as const;

export type Platform = (typeof PLATFORMS)[number];

/**
 * Normalized posting. `sourceUrl` is the identity key used for deduplication;
 * two fetches of the same URL always describe the same logical posting.
 */
export interface JobPosting {
  title: string;
  company: string;
  location: string;
  description: string;
  sourceUrl: string;
  companyWebsite?: string;
  hrEmail?: string;
  hrName?: string;
  hrLinkedIn?: string;
  platform: Platform;
}

/**
 * A fetched posting page, parsed once and shared by the parser and the enricher.
 */
export interface PostingPage {
  url: string;
  html: string;
  $: CheerioAPI;
}

export interface CompanyContacts {
  email?: string;
  name?: string;
  linkedin?: string;
}

export interface Enricher {
  findWebsite(page: PostingPage, companyName: string): Promise<string | undefined>;
  findContacts(website: string, companyName: string): Promise<CompanyContacts>;
}

/**
 * Minimal logger the parsers report skip reasons to.
 */
export interface ParserLogger {
  debug(message: string): void;
  warn(message: string): void;
}

export interface ParseContext {
  enricher: Enricher;
  logger?: ParserLogger;
  /** HTTP settings for API calls a parser makes on its own. */
  fetchImpl?: typeof fetch;
  userAgent?: string;
  requestTimeoutMs?: number;
}

export interface ParserManifest {
  platform: Platform;
  name: string;
  version: string;
  /** Host-name substring that routes a URL to this parser. */
  host: string;
}

export interface Parser {
  manifest: ParserManifest;
  parse(page: PostingPage, context: ParseContext): Promise<JobPosting | null>;
}
