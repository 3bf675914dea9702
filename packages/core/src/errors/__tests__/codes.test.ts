import { describe, test, expect } from 'vitest';
import { ERROR_CATEGORY, ErrorCode, getErrorCategory } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('ERROR_CATEGORY covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(ERROR_CATEGORY)).toHaveLength(enumCodes.length);
    for (const code of enumCodes) {
      expect(['definition', 'usage', 'internal']).toContain(getErrorCategory(code));
    }
  });

  test('codes follow the E### format', () => {
    for (const code of Object.values(ErrorCode)) {
      expect(code).toMatch(/^E\d{3}$/);
    }
  });

  test('categories of representative codes', () => {
    expect(getErrorCategory(ErrorCode.UNKNOWN_OPTION)).toBe('definition');
    expect(getErrorCategory(ErrorCode.ABSTRACT_FACTORY)).toBe('usage');
    expect(getErrorCategory(ErrorCode.INTERNAL_ERROR)).toBe('internal');
  });
});
