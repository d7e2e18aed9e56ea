export { CsvDeltaStore, parsePostingsCsv } from './store.js';
export { computeDelta } from './dedup.js';
export { parseCsv, stringifyCsv, formatCsvField } from './csv.js';
export { CSV_COLUMNS, CSV_HEADER, toCsvRow, fromCsvRow, resolveColumns } from './columns.js';
export { DeltaStoreError, CsvFormatError } from './errors.js';
export type { IngestionLogger, CsvDeltaStoreOptions, DeltaPlan, DeltaStore } from './types.js';
