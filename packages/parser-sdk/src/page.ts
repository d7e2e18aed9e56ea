import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { ELLIPSIS, MAX_DESCRIPTION_LENGTH } from './schema.js';
import type { PostingPage } from './types.js';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_COMPANY = 'Unknown';

/**
 * Reads one candidate value out of a page. Returns undefined when the
 * selector matched nothing.
 */
export type TextSource = ($: CheerioAPI) => string | undefined;

export function loadPage(url: string, html: string): PostingPage {
  return { url, html, $: cheerio.load(html) };
}

/**
 * Trim whitespace and collapse runs of whitespace into single spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Text of the first element matching `selector`. */
export function textOf(selector: string): TextSource {
  return ($) => {
    const element = $(selector).first();
    if (element.length === 0) {
      return undefined;
    }

    return normalizeWhitespace(element.text());
  };
}

/** Attribute value of the first element matching `selector`. */
export function attrOf(selector: string, attribute: string): TextSource {
  return ($) => {
    const value = $(selector).first().attr(attribute);
    return value === undefined ? undefined : normalizeWhitespace(value);
  };
}

function isNonEmpty(value: string): boolean {
  return value.length > 0;
}

/**
 * Tries each source in order and returns the first value `accept` takes.
 */
export function firstMatch(
  $: CheerioAPI,
  sources: readonly TextSource[],
  accept: (value: string) => boolean = isNonEmpty,
): string | undefined {
  for (const source of sources) {
    const value = source($);
    if (value !== undefined && accept(value)) {
      return value;
    }
  }

  return undefined;
}

export function firstMatchOr($: CheerioAPI, sources: readonly TextSource[], fallback: string): string {
  return firstMatch($, sources) ?? fallback;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cuts to at most 500 UTF-16 units plus an ellipsis, never splitting a
 * surrogate pair.
 */
export function truncateDescription(text: string): string {
  if (text.length <= MAX_DESCRIPTION_LENGTH) {
    return text;
  }

  const end = isHighSurrogate(text.charCodeAt(MAX_DESCRIPTION_LENGTH - 1))
    ? MAX_DESCRIPTION_LENGTH - 1
    : MAX_DESCRIPTION_LENGTH;
  return text.slice(0, end) + ELLIPSIS;
}

/**
 * Rendered text of the page, lower-cased, without script and style content.
 */
export function pageText($: CheerioAPI): string {
  const root = $.root().clone();
  root.find('script, style, noscript, template').remove();
  return normalizeWhitespace(root.text()).toLowerCase();
}

export function findClosedPhrase($: CheerioAPI, phrases: readonly string[]): string | undefined {
  const text = pageText($);
  return phrases.find((phrase) => text.includes(phrase));
}

export function pathSegments(url: string): string[] {
  try {
    return new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
  } catch {
    return [];
  }
}

/**
 * Company identity is the first path segment under the ATS host
 * (`jobs.lever.co/acme/123` → `acme`), independent of page content.
 */
export function companyFromUrl(url: string): string {
  return pathSegments(url)[0] ?? UNKNOWN_COMPANY;
}
