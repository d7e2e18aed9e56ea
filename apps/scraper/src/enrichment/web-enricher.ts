import * as cheerio from 'cheerio';
import type { CompanyContacts, Enricher, ParserLogger, PostingPage } from '@jobdelta/parser-sdk';
import { sleep as defaultSleep, type Sleep } from '../sleep.js';

const ATS_HOSTS = ['lever.co', 'ashbyhq.com', 'greenhouse.io', 'smartrecruiters.com'] as const;
const WEBSITE_LINK_KEYWORDS = ['website', 'company site', 'visit us', 'learn more about'] as const;
const HR_EMAIL_KEYWORDS = ['recruit', 'hr', 'talent', 'career', 'hiring', 'jobs', 'people'] as const;
const CONTACT_PAGE_PATHS = ['/careers', '/about'] as const;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const LINKEDIN_PROFILE_PATTERN = /https?:\/\/(?:www\.)?linkedin\.com\/in\/[\w-]+/;

export interface WebEnricherOptions {
  userAgent?: string;
  /** Per contact page request. */
  timeoutMs?: number;
  /** Pause between contact page requests. */
  delayMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
  logger?: ParserLogger;
}

function isAtsUrl(url: string): boolean {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return ATS_HOSTS.some((host) => hostname.includes(host));
  } catch {
    return false;
  }
}

function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * The website itself, then the contact paths resolved against its root.
 */
export function contactPageUrls(website: string): string[] {
  try {
    return [website, ...CONTACT_PAGE_PATHS.map((path) => new URL(path, website).href)];
  } catch {
    return [website];
  }
}

function findHrEmail(text: string): string | undefined {
  const emails = text.match(EMAIL_PATTERN) ?? [];
  return emails.find((email) => {
    const lower = email.toLowerCase();
    return HR_EMAIL_KEYWORDS.some((keyword) => lower.includes(keyword));
  });
}

/**
 * Finds a company's own website from the posting page, then scans a few of
 * its pages for a recruiting email address and a LinkedIn profile.
 */
export class WebEnricher implements Enricher {
  private readonly userAgent?: string;
  private readonly timeoutMs: number;
  private readonly delayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly logger?: ParserLogger;

  constructor(options: WebEnricherOptions = {}) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? 8_000;
    this.delayMs = options.delayMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  async findWebsite(page: PostingPage, companyName: string): Promise<string | undefined> {
    const { $ } = page;

    const ogUrl = $('meta[property="og:url"]').attr('content')?.trim();
    if (ogUrl && isHttpUrl(ogUrl) && !isAtsUrl(ogUrl)) {
      return ogUrl;
    }

    const keywords = [...WEBSITE_LINK_KEYWORDS, companyName.trim().toLowerCase()].filter((keyword) => keyword.length > 0);
    for (const link of $('a[href]').toArray()) {
      const href = $(link).attr('href')?.trim() ?? '';
      const text = $(link).text().toLowerCase();
      if (keywords.some((keyword) => text.includes(keyword)) && isHttpUrl(href) && !isAtsUrl(href)) {
        return href;
      }
    }

    return undefined;
  }

  async findContacts(website: string, _companyName: string): Promise<CompanyContacts> {
    const contacts: CompanyContacts = {};

    for (const [index, url] of contactPageUrls(website).entries()) {
      if (index > 0) {
        await this.sleep(this.delayMs);
      }

      const html = await this.fetchPage(url);
      if (html === undefined) {
        continue;
      }

      const $ = cheerio.load(html);
      contacts.email ??= findHrEmail($('body').text());
      contacts.linkedin ??= html.match(LINKEDIN_PROFILE_PATTERN)?.[0];

      if (contacts.email || contacts.linkedin) {
        break;
      }
    }

    return contacts;
  }

  private async fetchPage(url: string): Promise<string | undefined> {
    try {
      const response = await this.fetchImpl(url, {
        headers: this.userAgent ? { 'User-Agent': this.userAgent } : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (response.status !== 200) {
        await response.body?.cancel();
        return undefined;
      }

      return await response.text();
    } catch (error) {
      this.logger?.debug(`Contact page ${url} unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
