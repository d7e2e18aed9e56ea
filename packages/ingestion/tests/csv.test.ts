import { describe, expect, it } from 'vitest';
import { CsvFormatError } from '../src/errors.js';
import { formatCsvField, parseCsv, stringifyCsv } from '../src/csv.js';

describe('formatCsvField', () => {
  it('leaves plain values unquoted', () => {
    expect(formatCsvField('Remote/Unknown')).toBe('Remote/Unknown');
  });

  it('quotes separators, quotes and line breaks', () => {
    expect(formatCsvField('Berlin, Germany')).toBe('"Berlin, Germany"');
    expect(formatCsvField('the "core" team')).toBe('"the ""core"" team"');
    expect(formatCsvField('line one\nline two')).toBe('"line one\nline two"');
  });
});

describe('stringifyCsv', () => {
  it('terminates every row', () => {
    expect(stringifyCsv([['a', 'b'], ['c', '']])).toBe('a,b\nc,\n');
  });
});

describe('parseCsv', () => {
  it('reads quoted fields with embedded separators and escaped quotes', () => {
    const text = 'Job Title,Location\n"Engineer, Platform","Said ""hi"""\n';

    expect(parseCsv(text)).toEqual([
      ['Job Title', 'Location'],
      ['Engineer, Platform', 'Said "hi"'],
    ]);
  });

  it('keeps line breaks inside quoted fields', () => {
    expect(parseCsv('a,"b\r\nc"\r\nd,e')).toEqual([
      ['a', 'b\r\nc'],
      ['d', 'e'],
    ]);
  });

  it('keeps empty cells and skips blank lines', () => {
    expect(parseCsv('a,,c\n\n,"",\n')).toEqual([
      ['a', '', 'c'],
      ['', '', ''],
    ]);
  });

  it('strips a byte order mark', () => {
    expect(parseCsv('\uFEFFJob URL\nhttps://x.test/1\n')).toEqual([['Job URL'], ['https://x.test/1']]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('rejects an unterminated quoted field', () => {
    expect(() => parseCsv('a,"open\n')).toThrow(CsvFormatError);
    expect(() => parseCsv('a,"open\n')).toThrow('Unterminated quoted field at offset 2');
  });

  it('rejects stray quotes', () => {
    expect(() => parseCsv('ab"c\n')).toThrow('Unexpected quote in unquoted field at offset 2');
    expect(() => parseCsv('"ab"c\n')).toThrow('Unexpected character after closing quote at offset 4');
  });

  it('reads back what it writes', () => {
    const rows = [
      ['Job Title', 'Description'],
      ['ML Engineer', 'Build "agents", ship\nweekly'],
    ];

    expect(parseCsv(stringifyCsv(rows))).toEqual(rows);
  });
});
