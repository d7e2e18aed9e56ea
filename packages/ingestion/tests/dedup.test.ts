import { describe, expect, it } from 'vitest';
import type { JobPosting } from '@jobdelta/parser-sdk';
import { computeDelta } from '../src/dedup.js';

function makePosting(sourceUrl: string, title = 'Engineer'): JobPosting {
  return {
    title,
    company: 'acme',
    location: 'Remote',
    description: 'Build things.',
    sourceUrl,
    platform: 'Lever',
  };
}

describe('computeDelta', () => {
  it('keeps postings the master has not seen, in input order', () => {
    const records = [makePosting('https://x.test/3'), makePosting('https://x.test/1'), makePosting('https://x.test/2')];

    const plan = computeDelta(records, new Set(['https://x.test/1']));

    expect(plan.delta.map((posting) => posting.sourceUrl)).toEqual(['https://x.test/3', 'https://x.test/2']);
    expect(plan.known).toBe(1);
    expect(plan.batchDuplicates).toBe(0);
  });

  it('keeps the first of several postings sharing a URL', () => {
    const records = [makePosting('https://x.test/1', 'First'), makePosting('https://x.test/1', 'Second')];

    const plan = computeDelta(records, new Set());

    expect(plan.delta).toEqual([records[0]]);
    expect(plan.batchDuplicates).toBe(1);
  });

  it('returns an empty delta when everything is known', () => {
    const records = [makePosting('https://x.test/1')];

    expect(computeDelta(records, new Set(['https://x.test/1'])).delta).toEqual([]);
  });
});
