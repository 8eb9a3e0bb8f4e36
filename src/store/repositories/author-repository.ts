import { formatCsv, parseCsv } from '../csv.js';
import { DuplicateEmailError, IOFailureError, NotFoundError } from '../errors.js';
import { ensureFile, readTextFile, writeFileAtomic } from '../file-io.js';
import { nextId, normalizeEmail, parseId } from '../ids.js';
import { AUTHOR_COLUMNS, type Author, type AuthorRow, type AuthorUpdate } from '../schema.js';

/**
 * Author persistence. Emails are unique and compared case-insensitively.
 */
export interface AuthorRepository {
  findByEmail(email: string): Author | null;
  findById(id: number): Author | null;
  create(name: string, email: string, reservedIds?: Iterable<number>): Author;
  listAll(): Author[];
  update(id: number, changes: AuthorUpdate): Author;
  delete(id: number): boolean;
}

function toAuthor(row: Record<string, string>): Author {
  return {
    id: parseId(row.id_autor),
    name: (row.nombre_autor ?? '').trim(),
    email: (row.email ?? '').trim(),
  };
}

function toRow(author: Author): AuthorRow {
  return {
    id_autor: String(author.id),
    nombre_autor: author.name,
    email: author.email,
  };
}

/**
 * AuthorRepository over a CSV file, one row per author in insertion order.
 * Every call reads the whole file; every write replaces it atomically.
 */
export class CsvAuthorRepository implements AuthorRepository {
  constructor(private readonly filePath: string) {}

  /**
   * Create the file with just its header row if it is missing.
   */
  initialize(): boolean {
    return ensureFile(this.filePath, formatCsv(AUTHOR_COLUMNS, []));
  }

  findByEmail(email: string): Author | null {
    const wanted = normalizeEmail(email);
    return this.load().find((a) => normalizeEmail(a.email) === wanted) ?? null;
  }

  findById(id: number): Author | null {
    return this.load().find((a) => a.id === id) ?? null;
  }

  /**
   * Append a new author. The email is stored lower-cased.
   * @param reservedIds Ids still referenced elsewhere; the new id is above all of them
   */
  create(name: string, email: string, reservedIds: Iterable<number> = []): Author {
    const authors = this.load();
    const normalized = normalizeEmail(email);

    if (authors.some((a) => normalizeEmail(a.email) === normalized)) {
      throw new DuplicateEmailError(normalized);
    }

    const author: Author = {
      id: nextId([...authors.map((a) => a.id), ...reservedIds]),
      name: name.trim(),
      email: normalized,
    };
    authors.push(author);
    this.save(authors);
    return author;
  }

  listAll(): Author[] {
    return this.load();
  }

  update(id: number, changes: AuthorUpdate): Author {
    const authors = this.load();
    const idx = authors.findIndex((a) => a.id === id);
    if (idx === -1) {
      throw new NotFoundError('author', id);
    }

    const author = { ...authors[idx] };
    if (changes.name !== undefined) {
      author.name = changes.name.trim();
    }
    if (changes.email !== undefined) {
      const normalized = normalizeEmail(changes.email);
      if (authors.some((a) => a.id !== id && normalizeEmail(a.email) === normalized)) {
        throw new DuplicateEmailError(normalized);
      }
      author.email = normalized;
    }

    authors[idx] = author;
    this.save(authors);
    return author;
  }

  delete(id: number): boolean {
    const authors = this.load();
    const remaining = authors.filter((a) => a.id !== id);
    if (remaining.length === authors.length) return false;
    this.save(remaining);
    return true;
  }

  private load(): Author[] {
    this.initialize();
    const { records, errors } = parseCsv(readTextFile(this.filePath));
    if (errors.length > 0) {
      throw new IOFailureError(this.filePath, 'parse', new Error(errors.join('; ')));
    }
    return records.map(toAuthor);
  }

  private save(authors: Author[]): void {
    writeFileAtomic(this.filePath, formatCsv(AUTHOR_COLUMNS, authors.map(toRow)));
  }
}
