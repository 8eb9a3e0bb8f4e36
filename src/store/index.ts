export { BlogStore } from './blog-store.js';
export type { InitializeResult } from './blog-store.js';

export * from './errors.js';
export * from './schema.js';

export * from './repositories/index.js';

export { formatCsv, formatCsvValue, parseCsv } from './csv.js';
export type { CsvRecord, ParseResult } from './csv.js';
export { ensureFile, readTextFile, writeFileAtomic } from './file-io.js';
export { nextId, normalizeEmail, parseId } from './ids.js';
