import { appendFile, readFile, rename, writeFile } from 'node:fs/promises';
import { jobPostingSchema, type JobPosting } from '@jobdelta/parser-sdk';
import { CSV_HEADER, fromCsvRow, resolveColumns, toCsvRow } from './columns.js';
import { parseCsv, stringifyCsv } from './csv.js';
import { computeDelta } from './dedup.js';
import { DeltaStoreError } from './errors.js';
import type { CsvDeltaStoreOptions, DeltaStore, IngestionLogger } from './types.js';

const defaultLogger: IngestionLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

interface MasterSnapshot {
  /** False when no master file exists yet. */
  exists: boolean;
  postings: JobPosting[];
  /** Raw text ends without a line terminator; the next append needs one. */
  needsNewline: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function parsePostingsCsv(text: string, path: string): JobPosting[] {
  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (error) {
    throw new DeltaStoreError(`${path} is not valid CSV: ${describeError(error)}`, path, { cause: error });
  }

  const [header, ...body] = rows;
  if (!header) {
    throw new DeltaStoreError(`${path} has no header row`, path);
  }

  const columns = resolveColumns(header);
  if (!columns.ok) {
    throw new DeltaStoreError(`${path} is missing columns: ${columns.missing.join(', ')}`, path);
  }

  return body.map((row, index) => {
    const result = jobPostingSchema.safeParse(fromCsvRow(row, columns.positions));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      // Row numbers are 1-based and count the header.
      throw new DeltaStoreError(`${path} row ${index + 2} is invalid: ${issues}`, path);
    }
    return result.data;
  });
}

/**
 * Delta store over two CSV files sharing one header: an append-only master
 * keyed by Job URL and a delta file rewritten on every run.
 *
 * Runs must not overlap; the master read-then-append is not locked.
 */
export class CsvDeltaStore implements DeltaStore {
  readonly masterPath: string;
  readonly deltaPath: string;
  private readonly logger: IngestionLogger;

  constructor(options: CsvDeltaStoreOptions) {
    this.masterPath = options.masterPath;
    this.deltaPath = options.deltaPath;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Persists the postings whose URL the master has not seen and returns them.
   * Throws `DeltaStoreError` when the master is unreadable or corrupt, before
   * anything is written.
   */
  async ingest(records: readonly JobPosting[]): Promise<JobPosting[]> {
    if (records.length === 0) {
      this.logger.info('No jobs found');
      return [];
    }

    const master = await this.loadMaster();
    const knownUrls = new Set(master.postings.map((posting) => posting.sourceUrl));
    const { delta, known, batchDuplicates } = computeDelta(records, knownUrls);

    if (batchDuplicates > 0) {
      this.logger.warn(`[delta] ${batchDuplicates} duplicate URL(s) in batch dropped`);
    }

    if (!master.exists) {
      await this.writeAtomically(this.masterPath, stringifyCsv([CSV_HEADER, ...delta.map(toCsvRow)]));
      this.logger.info(`[delta] Created master with ${delta.length} jobs`);
    } else if (delta.length > 0) {
      const prefix = master.needsNewline ? '\n' : '';
      const rows = prefix + stringifyCsv(delta.map(toCsvRow));
      await this.write(this.masterPath, () => appendFile(this.masterPath, rows, 'utf-8'));
      this.logger.info(`[delta] Appended ${delta.length} jobs to master (${known} already known)`);
    } else {
      this.logger.info(`[delta] No new jobs (${known} already known)`);
    }

    await this.writeAtomically(this.deltaPath, stringifyCsv([CSV_HEADER, ...delta.map(toCsvRow)]));
    return delta;
  }

  /** Every posting in the master, in insertion order. Empty when no master exists. */
  async readMaster(): Promise<JobPosting[]> {
    return (await this.loadMaster()).postings;
  }

  /** The last run's delta. Empty when no delta file exists. */
  async readDelta(): Promise<JobPosting[]> {
    const text = await this.readOptional(this.deltaPath);
    return text === undefined ? [] : parsePostingsCsv(text, this.deltaPath);
  }

  private async loadMaster(): Promise<MasterSnapshot> {
    const text = await this.readOptional(this.masterPath);
    if (text === undefined) {
      return { exists: false, postings: [], needsNewline: false };
    }

    return {
      exists: true,
      postings: parsePostingsCsv(text, this.masterPath),
      needsNewline: text.length > 0 && !text.endsWith('\n') && !text.endsWith('\r'),
    };
  }

  private async readOptional(path: string): Promise<string | undefined> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new DeltaStoreError(`Cannot read ${path}: ${describeError(error)}`, path, { cause: error });
    }
  }

  /** Write to a temp file first, then rename over the target. */
  private async writeAtomically(path: string, content: string): Promise<void> {
    const tmp = `${path}.tmp`;
    await this.write(path, async () => {
      await writeFile(tmp, content, 'utf-8');
      await rename(tmp, path);
    });
  }

  private async write(path: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      throw new DeltaStoreError(`Cannot write ${path}: ${describeError(error)}`, path, { cause: error });
    }
  }
}
