import { describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { createPipelineDeps } from '../src/deps.js';
import { WebEnricher } from '../src/enrichment/web-enricher.js';
import { noopEnricher } from '../src/enrichment/noop-enricher.js';
import { LogNotifier, WebhookNotifier } from '../src/notifier.js';
import { createLoggerMock } from './helpers.js';

describe('createPipelineDeps', () => {
  it('passes HTTP settings to parsers through the parse context', () => {
    const fetchMock = vi.fn() as unknown as typeof fetch;
    const config = loadConfig({ USER_AGENT: 'jobdelta-test', REQUEST_TIMEOUT_MS: '4000' });

    const deps = createPipelineDeps(config, createLoggerMock(), fetchMock);

    expect(deps.context.userAgent).toBe('jobdelta-test');
    expect(deps.context.requestTimeoutMs).toBe(4000);
    expect(deps.context.fetchImpl).toBe(fetchMock);
    expect(deps.context.enricher).toBeInstanceOf(WebEnricher);
    expect(deps.notifier).toBeInstanceOf(LogNotifier);
  });

  it('switches enrichment off and posts to a configured webhook', () => {
    const config = loadConfig({ ENRICHMENT_ENABLED: 'false', WEBHOOK_URL: 'https://hooks.example.test/jobs' });

    const deps = createPipelineDeps(config, createLoggerMock(), vi.fn() as unknown as typeof fetch);

    expect(deps.context.enricher).toBe(noopEnricher);
    expect(deps.notifier).toBeInstanceOf(WebhookNotifier);
  });
});
