import { describe, expect, it } from 'vitest';
import { formatCsv, formatCsvValue, parseCsv } from '../../src/store/csv.js';

describe('parseCsv', () => {
  it('keys rows by header name', () => {
    const result = parseCsv('id_autor,nombre_autor,email\r\n1,Ana,a@x.com\r\n2,Bruno,b@x.com\r\n');

    expect(result.errors).toEqual([]);
    expect(result.header).toEqual(['id_autor', 'nombre_autor', 'email']);
    expect(result.records).toEqual([
      { id_autor: '1', nombre_autor: 'Ana', email: 'a@x.com' },
      { id_autor: '2', nombre_autor: 'Bruno', email: 'b@x.com' },
    ]);
  });

  it('handles quoted fields with commas and escaped quotes', () => {
    const result = parseCsv('a,b\n"x, y","say ""hi"""\n');

    expect(result.records).toEqual([{ a: 'x, y', b: 'say "hi"' }]);
  });

  it('keeps line breaks inside quoted fields', () => {
    const result = parseCsv('a,b\n"line1\nline2",z\n');

    expect(result.records).toEqual([{ a: 'line1\nline2', b: 'z' }]);
  });

  it('fills missing trailing columns with empty strings', () => {
    const result = parseCsv('a,b,c\n1\n');

    expect(result.records).toEqual([{ a: '1', b: '', c: '' }]);
  });

  it('skips blank lines', () => {
    const result = parseCsv('a\n\n1\n\n2\n');

    expect(result.records).toEqual([{ a: '1' }, { a: '2' }]);
  });

  it('strips a leading byte order mark', () => {
    const result = parseCsv('\uFEFFa\n1\n');

    expect(result.header).toEqual(['a']);
    expect(result.records).toEqual([{ a: '1' }]);
  });

  it('returns nothing for empty content', () => {
    const result = parseCsv('');

    expect(result).toEqual({ header: [], records: [], errors: [] });
  });

  it('reports a row with an unclosed quote', () => {
    const result = parseCsv('a,b\n"oops,1\n');

    expect(result.records).toEqual([]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Line 2: Failed to parse row/);
  });
});

describe('formatCsvValue', () => {
  it('leaves plain values alone', () => {
    expect(formatCsvValue('Ana')).toBe('Ana');
  });

  it('quotes values with commas, quotes or line breaks', () => {
    expect(formatCsvValue('Bo, Jr')).toBe('"Bo, Jr"');
    expect(formatCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvValue('a\nb')).toBe('"a\nb"');
  });
});

describe('formatCsv', () => {
  it('writes a header and rows with CRLF line endings', () => {
    const csv = formatCsv(['a', 'b'], [{ a: '1', b: 'x,y' }]);

    expect(csv).toBe('a,b\r\n1,"x,y"\r\n');
  });

  it('writes only the header for no rows', () => {
    expect(formatCsv(['id_autor', 'nombre_autor', 'email'], [])).toBe('id_autor,nombre_autor,email\r\n');
  });

  it('is read back by parseCsv', () => {
    const rows = [
      { id: '1', note: 'multi\nline, "quoted"' },
      { id: '2', note: '' },
    ];

    expect(parseCsv(formatCsv(['id', 'note'], rows)).records).toEqual(rows);
  });
});
