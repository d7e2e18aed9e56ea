import { CsvFormatError } from './errors.js';

const QUOTE = '"';
const SEPARATOR = ',';
const LINE_END = '\n';
const BOM = '\uFEFF';

function needsQuoting(value: string): boolean {
  return /[",\r\n]/.test(value);
}

export function formatCsvField(value: string): string {
  if (!needsQuoting(value)) {
    return value;
  }

  return QUOTE + value.replaceAll(QUOTE, QUOTE + QUOTE) + QUOTE;
}

/**
 * RFC 4180 rows, one per line, each line terminated.
 */
export function stringifyCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(formatCsvField).join(SEPARATOR) + LINE_END).join('');
}

/**
 * Parses RFC 4180 text. Accepts LF, CRLF and CR line endings and skips blank
 * lines. Throws `CsvFormatError` on an unterminated quoted field or a stray quote.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let rowStarted = false;
  let inQuotes = false;
  let quoteOpenedAt = 0;

  const endField = () => {
    row.push(field);
    field = '';
  };

  const endRow = () => {
    if (rowStarted) {
      endField();
      rows.push(row);
    }
    row = [];
    rowStarted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);

    if (inQuotes) {
      if (char !== QUOTE) {
        field += char;
      } else if (input.charAt(i + 1) === QUOTE) {
        field += QUOTE;
        i++;
      } else {
        inQuotes = false;
        const next = input.charAt(i + 1);
        if (next !== '' && next !== SEPARATOR && next !== '\n' && next !== '\r') {
          throw new CsvFormatError('Unexpected character after closing quote', i + 1);
        }
      }
      continue;
    }

    switch (char) {
      case QUOTE:
        if (field.length > 0) {
          throw new CsvFormatError('Unexpected quote in unquoted field', i);
        }
        inQuotes = true;
        quoteOpenedAt = i;
        rowStarted = true;
        break;
      case SEPARATOR:
        rowStarted = true;
        endField();
        break;
      case '\r':
        if (input.charAt(i + 1) === '\n') {
          i++;
        }
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        rowStarted = true;
        field += char;
    }
  }

  if (inQuotes) {
    throw new CsvFormatError('Unterminated quoted field', quoteOpenedAt);
  }

  endRow();
  return rows;
}
