import type { JobPosting } from '@jobdelta/parser-sdk';

/**
 * Minimal logger interface — defaults to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface CsvDeltaStoreOptions {
  /** Accumulated history, appended to on every run. */
  masterPath: string;
  /** Last run's new postings, overwritten on every run. */
  deltaPath: string;
  logger?: IngestionLogger;
}

/**
 * Split of an incoming batch against the master.
 */
export interface DeltaPlan {
  delta: JobPosting[];
  /** Records whose URL the master already holds. */
  known: number;
  /** Records repeating a URL seen earlier in the same batch. */
  batchDuplicates: number;
}

export interface DeltaStore {
  ingest(records: readonly JobPosting[]): Promise<JobPosting[]>;
}
