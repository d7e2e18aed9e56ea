import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_ASHBY_COMPANIES, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      masterPath: 'master_jobs.csv',
      deltaPath: 'delta_jobs.csv',
      maxResults: 20,
      fetchDelayMs: 1000,
      enrichDelayMs: 500,
      requestTimeoutMs: 10_000,
      contactTimeoutMs: 8_000,
      enrichmentEnabled: true,
    });
    expect(config.webhookUrl).toBeUndefined();
    expect(config.candidatesFile).toBeUndefined();
    expect(config.ashbyCompanies).toEqual([...DEFAULT_ASHBY_COMPANIES]);
  });

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      MASTER_CSV: '/data/master.csv',
      MAX_RESULTS: '5',
      WEBHOOK_URL: 'https://hooks.example.test/jobs',
      ASHBY_COMPANIES: ' ramp, , linear ',
      ENRICHMENT_ENABLED: 'off',
      DELTA_CSV: '   ',
    });

    expect(config.masterPath).toBe('/data/master.csv');
    expect(config.deltaPath).toBe('delta_jobs.csv');
    expect(config.maxResults).toBe(5);
    expect(config.webhookUrl).toBe('https://hooks.example.test/jobs');
    expect(config.ashbyCompanies).toEqual(['ramp', 'linear']);
    expect(config.enrichmentEnabled).toBe(false);
  });

  it('names every invalid key', () => {
    let caught: unknown;
    try {
      loadConfig({ MAX_RESULTS: '0', WEBHOOK_URL: 'nope', ENRICHMENT_ENABLED: 'maybe' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.keys : []).toEqual(['MAX_RESULTS', 'WEBHOOK_URL', 'ENRICHMENT_ENABLED']);
  });
});
