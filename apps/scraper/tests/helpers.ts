import type { Enricher, ParseContext } from '@jobdelta/parser-sdk';
import type { Logger } from 'pino';
import { vi } from 'vitest';
import type { FetchOutcome, PageFetcher } from '../src/fetcher.js';

export function createLoggerMock(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

export function createContext(enricher: Partial<Enricher> = {}): ParseContext {
  return {
    enricher: {
      findWebsite: vi.fn().mockResolvedValue(undefined),
      findContacts: vi.fn().mockResolvedValue({}),
      ...enricher,
    },
    logger: { debug: vi.fn(), warn: vi.fn() },
  };
}

/** A single Lever posting page. */
export function leverPage(title: string): string {
  return `<html><body>
    <div class="posting">
      <h2 class="posting-headline">${title}</h2>
      <div class="location">Remote</div>
      <div class="content">You will build ${title} tooling with a small team.</div>
    </div>
  </body></html>`;
}

/** What Lever serves for a closed posting: the company board. */
export function leverBoardPage(): string {
  return `<html><body>
    <div class="posting"><h2>Designer</h2><div class="content">Design things.</div></div>
    <div class="posting"><h2>Engineer</h2><div class="content">Build things.</div></div>
  </body></html>`;
}

/**
 * Serves `pages` with status 200; any other URL answers 404. An entry may
 * also be a full outcome to simulate redirects or failures.
 */
export function createFetcher(pages: Record<string, string | Partial<FetchOutcome>>) {
  const fetch = vi.fn(async (url: string): Promise<FetchOutcome> => {
    const page = pages[url];
    if (page === undefined) {
      return { requestedUrl: url, finalUrl: url, statusCode: 404 };
    }

    if (typeof page === 'string') {
      return { requestedUrl: url, finalUrl: url, statusCode: 200, body: page };
    }

    return { requestedUrl: url, finalUrl: url, statusCode: 200, ...page };
  });

  const fetcher: PageFetcher = { fetch };
  return { fetcher, fetch };
}
