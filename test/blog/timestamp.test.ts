import { describe, expect, it } from 'vitest';
import { formatTimestamp } from '../../src/blog/timestamp.js';

describe('formatTimestamp', () => {
  it('formats local time with zero padding', () => {
    expect(formatTimestamp(new Date(2024, 4, 1, 9, 5, 3))).toBe('2024-05-01 09:05:03');
  });

  it('keeps two-digit fields as they are', () => {
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('2023-12-31 23:59:58');
  });
});
