import { describe, it, expect } from 'vitest';
import { duplicateTitle, escapeLike, startOfUtcMonth } from './helpers';

describe('duplicateTitle', () => {
  it('appends the copy suffix', () => {
    expect(duplicateTitle('Lease Agreement')).toBe('Lease Agreement (Copy)');
  });

  it('keeps long titles within 500 characters', () => {
    const title = duplicateTitle('x'.repeat(500));
    expect(title).toHaveLength(500);
    expect(title.endsWith(' (Copy)')).toBe(true);
  });
});

describe('startOfUtcMonth', () => {
  it('returns midnight UTC on the first of the month', () => {
    expect(startOfUtcMonth(new Date('2025-03-17T22:45:00Z')).toISOString()).toBe('2025-03-01T00:00:00.000Z');
  });
});

describe('escapeLike', () => {
  it('escapes wildcards and backslashes', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });
});
