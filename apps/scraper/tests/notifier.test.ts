import type { JobPosting } from '@jobdelta/parser-sdk';
import { describe, expect, it, vi } from 'vitest';
import { LogNotifier, WebhookNotifier, buildNotification, formatTimestamp } from '../src/notifier.js';
import { createLoggerMock } from './helpers.js';

const JOB: JobPosting = {
  title: 'AI Engineer',
  company: 'ramp',
  location: 'New York',
  description: 'Build agents.',
  sourceUrl: 'https://jobs.ashbyhq.com/ramp/1',
  hrEmail: 'talent@ramp.test',
  platform: 'Ashby',
};

const NOW = new Date(2026, 2, 7, 9, 5, 3);

describe('buildNotification', () => {
  it('keys rows by column name and fills absent values with empty strings', () => {
    expect(buildNotification([JOB], NOW)).toEqual({
      jobs: [
        {
          'Job Title': 'AI Engineer',
          Company: 'ramp',
          Location: 'New York',
          Description: 'Build agents.',
          'Job URL': 'https://jobs.ashbyhq.com/ramp/1',
          'Company Website': '',
          'HR Contact Email': 'talent@ramp.test',
          'HR Contact Name': '',
          'HR LinkedIn': '',
          Source: 'Ashby',
        },
      ],
      count: 1,
      timestamp: '2026-03-07 09:05:03',
    });
  });

  it('formats local time', () => {
    expect(formatTimestamp(new Date(2026, 11, 31, 23, 59, 0))).toBe('2026-12-31 23:59:00');
  });
});

describe('WebhookNotifier', () => {
  it('posts the payload as JSON', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
    const logger = createLoggerMock();
    const notifier = new WebhookNotifier({
      url: 'https://hooks.example.test/jobs',
      logger,
      fetchImpl: fetchMock as unknown as typeof fetch,
      now: () => NOW,
    });

    await notifier.notify([JOB]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] as unknown as [string, RequestInit];
    expect(url).toBe('https://hooks.example.test/jobs');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual(buildNotification([JOB], NOW));
    expect(vi.mocked(logger.info).mock.calls[0]?.[0]).toMatchObject({ event: 'notify_sent', count: 1 });
  });

  it('logs a rejected delivery without throwing', async () => {
    const fetchMock = vi.fn(async () => new Response('nope', { status: 500 }));
    const logger = createLoggerMock();
    const notifier = new WebhookNotifier({ url: 'https://hooks.example.test/jobs', logger, fetchImpl: fetchMock as unknown as typeof fetch });

    await expect(notifier.notify([JOB])).resolves.toBeUndefined();
    expect(vi.mocked(logger.warn).mock.calls[0]?.[0]).toMatchObject({ event: 'notify_failed', status: 500 });
  });

  it('logs a network failure without throwing', async () => {
    const fetchMock = vi.fn(async () => {
      throw new Error('getaddrinfo ENOTFOUND');
    });
    const logger = createLoggerMock();
    const notifier = new WebhookNotifier({ url: 'https://hooks.example.test/jobs', logger, fetchImpl: fetchMock as unknown as typeof fetch });

    await expect(notifier.notify([JOB])).resolves.toBeUndefined();
    expect(vi.mocked(logger.warn).mock.calls[0]?.[0]).toMatchObject({
      event: 'notify_failed',
      error: { name: 'Error', message: 'getaddrinfo ENOTFOUND' },
    });
  });
});

describe('LogNotifier', () => {
  it('logs the delta', async () => {
    const logger = createLoggerMock();

    await new LogNotifier(logger).notify([JOB]);

    expect(vi.mocked(logger.info)).toHaveBeenCalledWith(
      { event: 'delta_ready', count: 1, urls: ['https://jobs.ashbyhq.com/ramp/1'] },
      '1 new jobs',
    );
  });
});
