import type { AshbyClient } from '@jobdelta/parser-ashby';
import type { Logger } from 'pino';
import { serializeError } from '../observability/serialize-error.js';
import { sleep as defaultSleep, type Sleep } from '../sleep.js';
import { parseQueryKeywords, titleMatches } from './keywords.js';
import type { CandidateSource } from './types.js';

const ASHBY_JOBS_BASE_URL = 'https://jobs.ashbyhq.com';

export interface AshbyBoardSourceOptions {
  client: Pick<AshbyClient, 'listJobPostings'>;
  companies: readonly string[];
  logger: Logger;
  /** Pause between company boards. */
  delayMs?: number;
  sleep?: Sleep;
}

/**
 * Searches known Ashby boards directly, keeping postings whose title
 * contains a query keyword.
 */
export class AshbyBoardSource implements CandidateSource {
  readonly name = 'ashby-boards';
  private readonly client: Pick<AshbyClient, 'listJobPostings'>;
  private readonly companies: readonly string[];
  private readonly logger: Logger;
  private readonly delayMs: number;
  private readonly sleep: Sleep;

  constructor(options: AshbyBoardSourceOptions) {
    this.client = options.client;
    this.companies = options.companies;
    this.logger = options.logger;
    this.delayMs = options.delayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async collect(query: string): Promise<string[]> {
    const keywords = parseQueryKeywords(query);
    const urls: string[] = [];

    for (const [index, company] of this.companies.entries()) {
      if (index > 0) {
        await this.sleep(this.delayMs);
      }

      try {
        const postings = await this.client.listJobPostings(company);
        const matching = postings.filter((posting) => posting.title && titleMatches(posting.title, keywords));
        urls.push(...matching.map((posting) => `${ASHBY_JOBS_BASE_URL}/${company}/${posting.id}`));
        this.logger.debug(
          { event: 'ashby_board_searched', company, postings: postings.length, matched: matching.length },
          'Ashby board searched',
        );
      } catch (error) {
        this.logger.warn({ event: 'ashby_board_failed', company, error: serializeError(error) }, 'Ashby board failed');
      }
    }

    return urls;
  }
}
