/**
 * RFC 4180 CSV reader/writer - no external dependencies
 * Handles quoted fields, escaped quotes, and multi-line values.
 */

export type CsvRecord = Record<string, string>;

export interface ParseResult {
  header: string[];
  records: CsvRecord[];
  errors: string[];
}

/**
 * Parse CSV content whose first logical line is a header row.
 * Each data row becomes a record keyed by header name; missing trailing
 * columns read as empty strings and surplus columns are dropped.
 */
export function parseCsv(content: string): ParseResult {
  const records: CsvRecord[] = [];
  const errors: string[] = [];

  // A UTF-8 BOM would otherwise end up in the first header name
  const csv = content.startsWith('\uFEFF') ? content.slice(1) : content;

  const lines = splitCsvLines(csv);
  const firstIndex = lines.findIndex((line) => line.trim() !== '');
  if (firstIndex === -1) {
    return { header: [], records, errors };
  }

  const header = parseRow(lines[firstIndex]);
  if (!header) {
    errors.push(`Line ${firstIndex + 1}: Unclosed quote in header row`);
    return { header: [], records, errors };
  }
  const columns = header.map((h) => h.trim());

  for (let i = firstIndex + 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) continue; // Skip empty lines

    const parsed = parseRow(line);
    if (!parsed) {
      errors.push(`Line ${i + 1}: Failed to parse row: ${line.substring(0, 50)}...`);
      continue;
    }

    const record: CsvRecord = {};
    columns.forEach((column, idx) => {
      record[column] = parsed[idx] ?? '';
    });
    records.push(record);
  }

  return { header: columns, records, errors };
}

/**
 * Split CSV content into logical lines, handling multi-line quoted values.
 */
function splitCsvLines(csv: string): string[] {
  const lines: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < csv.length; i++) {
    const char = csv[i];

    if (char === '"') {
      // Check for escaped quote
      if (inQuotes && csv[i + 1] === '"') {
        current += '""';
        i++; // Skip next quote
      } else {
        inQuotes = !inQuotes;
        current += char;
      }
    } else if (char === '\n' && !inQuotes) {
      lines.push(current);
      current = '';
    } else if (char === '\r' && !inQuotes) {
      // Skip carriage returns
      continue;
    } else {
      current += char;
    }
  }

  if (current) {
    lines.push(current);
  }

  return lines;
}

/**
 * Parse a single CSV row into columns.
 * Returns null when a quoted field is never closed.
 */
function parseRow(line: string): string[] | null {
  const columns: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < line.length) {
    const char = line[i];

    if (char === '"') {
      if (!inQuotes) {
        inQuotes = true;
        i++;
        continue;
      }

      if (line[i + 1] === '"') {
        // Escaped quote
        current += '"';
        i += 2;
        continue;
      }

      inQuotes = false;
      i++;
      continue;
    }

    if (char === ',' && !inQuotes) {
      columns.push(current);
      current = '';
      i++;
      continue;
    }

    current += char;
    i++;
  }

  columns.push(current);

  if (inQuotes) {
    return null;
  }

  return columns;
}

/**
 * Quote a field only when it contains a delimiter, a quote or a line break.
 */
export function formatCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize a header and its rows. Every line, including the last, ends with CRLF.
 */
export function formatCsv(header: readonly string[], rows: readonly CsvRecord[]): string {
  const lines = [header.map(formatCsvValue).join(',')];
  for (const row of rows) {
    lines.push(header.map((column) => formatCsvValue(row[column] ?? '')).join(','));
  }
  return lines.map((line) => `${line}\r\n`).join('');
}
