import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage, isRecord, wrapError } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error subclasses', () => {
      expect(isErrorWithMessage(new TypeError('Type error'))).toBe(true);
    });

    it('should return false for objects with message property but not Error instances', () => {
      expect(isErrorWithMessage({ message: 'looks like an error' })).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error instances', () => {
      expect(getErrorMessage(new Error('Test error message'))).toBe('Test error message');
    });

    it('should use default message for non-errors when provided', () => {
      expect(getErrorMessage(42, 'fallback')).toBe('fallback');
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('wrapError', () => {
    it('should wrap Error with context', () => {
      const result = wrapError(new Error('disk full'), 'Failed to save lot');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Failed to save lot: disk full');
      }
    });

    it('should wrap string errors', () => {
      const result = wrapError('boom', 'Failed to load ledger');

      expect(result._unsafeUnwrapErr().message).toBe('Failed to load ledger: boom');
    });
  });

  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
    });
  });
});
