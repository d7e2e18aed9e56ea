import { CSV_COLUMNS } from '@jobdelta/ingestion';
import type { JobPosting } from '@jobdelta/parser-sdk';
import type { Logger } from 'pino';
import { serializeError } from './observability/serialize-error.js';

export interface DeltaNotification {
  /** Rows keyed by persisted column name; absent values are "". */
  jobs: Record<string, string>[];
  count: number;
  /** Local time, `YYYY-MM-DD HH:mm:ss`. */
  timestamp: string;
}

export interface Notifier {
  notify(jobs: readonly JobPosting[]): Promise<void>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function buildNotification(jobs: readonly JobPosting[], now: Date = new Date()): DeltaNotification {
  return {
    jobs: jobs.map((job) =>
      Object.fromEntries(CSV_COLUMNS.map(({ header, field }) => [header, job[field] ?? ''])),
    ),
    count: jobs.length,
    timestamp: formatTimestamp(now),
  };
}

export interface WebhookNotifierOptions {
  url: string;
  logger: Logger;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

/**
 * Posts the delta to a webhook. Delivery failures are logged and swallowed:
 * the delta is already persisted by the time this runs.
 */
export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async notify(jobs: readonly JobPosting[]): Promise<void> {
    const payload = buildNotification(jobs, this.now());

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        this.logger.warn({ event: 'notify_failed', status: response.status, count: payload.count }, 'Webhook rejected');
        return;
      }

      this.logger.info({ event: 'notify_sent', count: payload.count }, 'Webhook notified');
    } catch (error) {
      this.logger.warn({ event: 'notify_failed', count: payload.count, error: serializeError(error) }, 'Webhook failed');
    }
  }
}

/** Stands in for the webhook when none is configured. */
export class LogNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async notify(jobs: readonly JobPosting[]): Promise<void> {
    this.logger.info(
      { event: 'delta_ready', count: jobs.length, urls: jobs.map((job) => job.sourceUrl) },
      `${jobs.length} new jobs`,
    );
  }
}
