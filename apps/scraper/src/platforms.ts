import { ashbyParser } from '@jobdelta/parser-ashby';
import { greenhouseParser } from '@jobdelta/parser-greenhouse';
import { leverParser } from '@jobdelta/parser-lever';
import type { Parser, Platform } from '@jobdelta/parser-sdk';
import { smartRecruitersParser } from '@jobdelta/parser-smartrecruiters';

const allParsers: Parser[] = [leverParser, ashbyParser, greenhouseParser, smartRecruitersParser];

function buildParserMap(parsers: Parser[]): Map<Platform, Parser> {
  const parserMap = new Map<Platform, Parser>();

  for (const parser of parsers) {
    if (parserMap.has(parser.manifest.platform)) {
      throw new Error(`Duplicate parser for platform: ${parser.manifest.platform}`);
    }

    parserMap.set(parser.manifest.platform, parser);
  }

  return parserMap;
}

const parserMap = buildParserMap(allParsers);

export function getAllParsers(): Parser[] {
  return [...allParsers];
}

export function getParser(platform: Platform): Parser {
  const parser = parserMap.get(platform);
  if (!parser) {
    throw new Error(`No parser for platform: ${platform}`);
  }

  return parser;
}

/**
 * Routes a URL by host-name substring. Returns undefined for unsupported
 * hosts and unparseable URLs.
 */
export function detectPlatform(url: string): Platform | undefined {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return undefined;
  }

  return allParsers.find((parser) => hostname.includes(parser.manifest.host))?.manifest.platform;
}
