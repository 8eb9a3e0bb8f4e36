export type BlogErrorKind =
  | 'Validation'
  | 'DuplicateEmail'
  | 'NotFound'
  | 'ReferentialError'
  | 'Unauthorized'
  | 'IOFailure';

export type EntityName = 'author' | 'post' | 'comment';

/**
 * Base class for every failure the stores and the blog service raise.
 * Callers switch on `kind` rather than on the concrete class.
 */
export abstract class BlogError extends Error {
  abstract readonly kind: BlogErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends BlogError {
  readonly kind = 'Validation';
}

export class DuplicateEmailError extends BlogError {
  readonly kind = 'DuplicateEmail';

  constructor(public readonly email: string) {
    super(`Email "${email}" is already registered.`);
  }
}

export class NotFoundError extends BlogError {
  readonly kind = 'NotFound';

  constructor(
    public readonly entity: EntityName,
    public readonly key: string | number
  ) {
    super(`No ${entity} found for "${key}".`);
  }
}

/**
 * A post was submitted for an author the author store does not know.
 */
export class ReferentialError extends BlogError {
  readonly kind = 'ReferentialError';

  constructor(public readonly authorEmail: string) {
    super(`Cannot create a post for unknown author "${authorEmail}".`);
  }
}

export class UnauthorizedError extends BlogError {
  readonly kind = 'Unauthorized';
}

export type FileOperation = 'read' | 'write' | 'create' | 'parse';

export class IOFailureError extends BlogError {
  readonly kind = 'IOFailure';

  constructor(
    public readonly filePath: string,
    public readonly operation: FileOperation,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} "${filePath}": ${detail}`, { cause });
  }
}

export function isBlogError(error: unknown): error is BlogError {
  return error instanceof BlogError;
}
