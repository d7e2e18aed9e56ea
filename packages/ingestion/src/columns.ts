import type { JobPosting } from '@jobdelta/parser-sdk';

type PostingField = keyof JobPosting;

/**
 * Persisted column order. The `Source` column carries the platform tag.
 */
export const CSV_COLUMNS = [
  { header: 'Job Title', field: 'title' },
  { header: 'Company', field: 'company' },
  { header: 'Location', field: 'location' },
  { header: 'Description', field: 'description' },
  { header: 'Job URL', field: 'sourceUrl' },
  { header: 'Company Website', field: 'companyWebsite' },
  { header: 'HR Contact Email', field: 'hrEmail' },
  { header: 'HR Contact Name', field: 'hrName' },
  { header: 'HR LinkedIn', field: 'hrLinkedIn' },
  { header: 'Source', field: 'platform' },
] as const satisfies readonly { header: string; field: PostingField }[];

export const CSV_HEADER: readonly string[] = CSV_COLUMNS.map((column) => column.header);

/** Absent optional fields become empty cells. */
export function toCsvRow(posting: JobPosting): string[] {
  return CSV_COLUMNS.map(({ field }) => posting[field] ?? '');
}

/**
 * Position of every known column in `header`. Returns the headers that are
 * missing instead when any is.
 */
export function resolveColumns(
  header: readonly string[],
): { ok: true; positions: Map<PostingField, number> } | { ok: false; missing: string[] } {
  const positions = new Map<PostingField, number>();
  const missing: string[] = [];

  for (const { header: name, field } of CSV_COLUMNS) {
    const index = header.findIndex((cell) => cell.trim() === name);
    if (index === -1) {
      missing.push(name);
    } else {
      positions.set(field, index);
    }
  }

  return missing.length > 0 ? { ok: false, missing } : { ok: true, positions };
}

/**
 * Raw field values of a row, empty cells omitted. The result still needs
 * schema validation before it is a posting.
 */
export function fromCsvRow(
  row: readonly string[],
  positions: ReadonlyMap<PostingField, number>,
): Partial<Record<PostingField, string>> {
  const record: Partial<Record<PostingField, string>> = {};

  for (const [field, index] of positions) {
    const value = row[index];
    if (value !== undefined && value !== '') {
      record[field] = value;
    }
  }

  return record;
}
