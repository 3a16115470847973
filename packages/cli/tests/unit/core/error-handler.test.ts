/**
 * Unit tests for Error Handler
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, KillSwitchActiveError, ValidationError } from '@stratgate/utils';
import { exitCodeFor, formatError, handleError } from '../../../src/core/error-handler.js';

describe('ErrorHandler', () => {
  describe('formatError', () => {
    it('should format Error objects', () => {
      expect(formatError(new Error('Test error message'))).toBe('Test error message');
    });

    it('should format string errors', () => {
      expect(formatError('String error')).toBe('String error');
    });

    it('should handle unknown error types', () => {
      expect(formatError({ unexpected: 'object' })).toBe('An unexpected error occurred');
    });

    it('hides messages that mention credentials', () => {
      expect(formatError(new Error('api-key is invalid: test-secret'))).toBe(
        'An error occurred. Please check your configuration and try again.'
      );
    });
  });

  describe('handleError', () => {
    it('returns the user-facing message', () => {
      expect(handleError(new ValidationError('bad input'), { command: 'evaluate' })).toBe('bad input');
    });
  });

  describe('exitCodeFor', () => {
    it('returns 2 for invalid input or configuration', () => {
      expect(exitCodeFor(new ValidationError('bad'))).toBe(2);
      expect(exitCodeFor(new ConfigurationError('bad'))).toBe(2);
    });

    it('returns 1 for everything else', () => {
      expect(exitCodeFor(new KillSwitchActiveError('maintenance'))).toBe(1);
      expect(exitCodeFor(new Error('boom'))).toBe(1);
      expect(exitCodeFor('boom')).toBe(1);
    });
  });
});
