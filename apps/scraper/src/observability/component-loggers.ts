import type { IngestionLogger } from '@jobdelta/ingestion';
import type { ParserLogger } from '@jobdelta/parser-sdk';
import type { Logger } from 'pino';

export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    info: (message) => logger.info({ event: 'delta_store' }, message),
    warn: (message) => logger.warn({ event: 'delta_store' }, message),
    error: (message) => logger.error({ event: 'delta_store' }, message),
  };
}

export function createParserLogger(logger: Logger): ParserLogger {
  return {
    debug: (message) => logger.debug({ event: 'job_skipped' }, message),
    warn: (message) => logger.warn({ event: 'extract_degraded' }, message),
  };
}
