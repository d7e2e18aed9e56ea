import type { AshbyJobPosting } from './types.js';

const DEFAULT_API_URL = 'https://jobs.ashbyhq.com/api/non-user-graphql?op=ApiJobBoardWithTeams';
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

const JOB_BOARD_QUERY =
  'query ApiJobBoardWithTeams($organizationHostedJobsPageName: String!) { jobBoard: jobBoardWithTeams(organizationHostedJobsPageName: $organizationHostedJobsPageName) { jobPostings { id title locationName } } }';

export interface AshbyClientOptions {
  apiUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class AshbyApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AshbyApiError';
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parseJobPosting(payload: unknown): AshbyJobPosting | null {
  if (!isRecord(payload)) {
    return null;
  }

  const id = asString(payload.id)?.trim();
  if (!id) {
    return null;
  }

  return {
    id,
    title: asString(payload.title)?.trim() || undefined,
    locationName: asString(payload.locationName)?.trim() || undefined,
  };
}

/**
 * Reads job boards from Ashby's public GraphQL endpoint, the same query the
 * hosted board page runs.
 */
export class AshbyClient {
  private readonly apiUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AshbyClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Lists every posting on a company's board.
   * Throws `AshbyApiError` on a non-200 status or a GraphQL error payload.
   */
  async listJobPostings(company: string): Promise<AshbyJobPosting[]> {
    const response = await this.fetchImpl(this.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': this.userAgent,
      },
      body: JSON.stringify({
        operationName: 'ApiJobBoardWithTeams',
        variables: { organizationHostedJobsPageName: company },
        query: JOB_BOARD_QUERY,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new AshbyApiError(`Ashby API returned status ${response.status}`, response.status);
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload)) {
      throw new AshbyApiError('Ashby API returned a non-object payload');
    }

    if (payload.errors !== undefined && payload.errors !== null) {
      throw new AshbyApiError(`Ashby API returned GraphQL errors: ${JSON.stringify(payload.errors)}`);
    }

    const data = isRecord(payload.data) ? payload.data : undefined;
    const jobBoard = data && isRecord(data.jobBoard) ? data.jobBoard : undefined;
    const rawPostings = jobBoard && Array.isArray(jobBoard.jobPostings) ? jobBoard.jobPostings : [];

    return rawPostings.map(parseJobPosting).filter((posting): posting is AshbyJobPosting => posting !== null);
  }
}
