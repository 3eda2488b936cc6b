import { describe, it, expect } from 'vitest';
import { buildAssignments, toDate, toNullableDate } from '../base-repository';

describe('buildAssignments', () => {
  it('numbers parameters from the start index and skips undefined', () => {
    expect(buildAssignments({ first_name: 'Bob', last_name: undefined, additional_info: null }, 2)).toEqual({
      sql: 'first_name = $2, additional_info = $3',
      params: ['Bob', null],
    });
  });

  it('returns an empty clause when nothing is supplied', () => {
    expect(buildAssignments({ email: undefined })).toEqual({ sql: '', params: [] });
  });
});

describe('toDate', () => {
  it('passes dates through and parses strings', () => {
    const date = new Date('2026-01-01T00:00:00.000Z');
    expect(toDate(date)).toBe(date);
    expect(toDate('2026-01-01T00:00:00.000Z')).toEqual(date);
  });

  it('rejects values that are not timestamps', () => {
    expect(() => toDate('yesterday')).toThrow(TypeError);
    expect(() => toDate(undefined)).toThrow(TypeError);
  });

  it('keeps null as null', () => {
    expect(toNullableDate(null)).toBeNull();
  });
});
