import { ValidationError, normalizeEmail } from '../store/index.js';

export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

export type TagsInput = string | readonly string[];

/**
 * Trim `value` and reject it when nothing is left.
 * @param label Field name used in the error message
 */
export function requireText(value: string, label: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} is required.`);
  }
  return trimmed;
}

/**
 * Check the email format and return it normalized (trimmed, lower-cased).
 */
export function validateEmail(email: string): string {
  const normalized = normalizeEmail(email);
  if (!EMAIL_PATTERN.test(normalized)) {
    throw new ValidationError(`"${email}" is not a valid email address.`);
  }
  return normalized;
}

/**
 * Normalize tags: trimmed, lower-cased, empty entries dropped, duplicates removed
 * keeping the first occurrence. A string is split on commas.
 */
export function parseTags(input: TagsInput | undefined): string[] {
  if (input === undefined) return [];
  const raw: readonly unknown[] = typeof input === 'string' ? input.split(',') : input;

  const seen = new Set<string>();
  const tags: string[] = [];
  for (const item of raw) {
    if (typeof item !== 'string') {
      throw new ValidationError('Every tag must be a string.');
    }
    const tag = item.trim().toLowerCase();
    if (tag && !seen.has(tag)) {
      seen.add(tag);
      tags.push(tag);
    }
  }
  return tags;
}
