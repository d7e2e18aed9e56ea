import type { JobPosting } from '@jobdelta/parser-sdk';
import type { DeltaPlan } from './types.js';

/**
 * Splits `records` into postings not yet in the master. `sourceUrl` is the
 * only identity: the first record for a URL wins, later ones in the same
 * batch are dropped. Input order is kept.
 */
export function computeDelta(records: readonly JobPosting[], knownUrls: ReadonlySet<string>): DeltaPlan {
  const delta: JobPosting[] = [];
  const seenInBatch = new Set<string>();
  let known = 0;
  let batchDuplicates = 0;

  for (const record of records) {
    if (knownUrls.has(record.sourceUrl)) {
      known++;
      continue;
    }

    if (seenInBatch.has(record.sourceUrl)) {
      batchDuplicates++;
      continue;
    }

    seenInBatch.add(record.sourceUrl);
    delta.push(record);
  }

  return { delta, known, batchDuplicates };
}
