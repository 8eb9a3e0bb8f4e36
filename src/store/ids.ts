/**
 * Parse a stored decimal id. Anything that is not a positive integer reads as 0,
 * so a damaged id never blocks id allocation.
 */
export function parseId(value: unknown): number {
  const text = typeof value === 'number' ? String(value) : typeof value === 'string' ? value.trim() : '';
  if (!/^\d+$/.test(text)) return 0;
  return Number.parseInt(text, 10);
}

/**
 * Next id after the largest one in use (1 for an empty collection).
 */
export function nextId(ids: Iterable<number>): number {
  let max = 0;
  for (const id of ids) {
    if (id > max) max = id;
  }
  return max + 1;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
