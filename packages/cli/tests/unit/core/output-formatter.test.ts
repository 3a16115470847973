/**
 * Unit tests for Output Formatter
 */

import { describe, it, expect } from 'vitest';
import { formatJSON, formatOutput, formatTable } from '../../../src/core/output-formatter.js';

describe('OutputFormatter', () => {
  describe('formatJSON', () => {
    it('pretty-prints with two-space indent', () => {
      expect(formatJSON({ name: 'test', value: 123 })).toBe('{\n  "name": "test",\n  "value": 123\n}');
    });
  });

  describe('formatTable', () => {
    it('aligns columns and rounds floats to six decimals', () => {
      const result = formatTable([
        { name: 'a', value: 1.23456789 },
        { name: 'long-name', value: 2 },
      ]);

      expect(result.split('\n')).toEqual([
        'name      | value',
        '----------|---------',
        'a         | 1.234568',
        'long-name | 2',
      ]);
    });

    it('renders nested values as JSON and missing values as blanks', () => {
      const result = formatTable([{ id: 'x', meta: { k: 1 }, note: null }]);

      expect(result.split('\n')[2]).toBe('x  | {"k":1} |');
    });

    it('uses the given columns only', () => {
      const result = formatTable([{ a: 1, b: 2 }], ['b']);

      expect(result).toBe('b\n-\n2');
    });

    it('should handle empty array', () => {
      expect(formatTable([])).toBe('No data to display');
    });
  });

  describe('formatOutput', () => {
    it('falls back to JSON for non-array table output', () => {
      expect(formatOutput({ test: 'value' }, 'table')).toBe('{\n  "test": "value"\n}');
    });

    it('formats arrays as a table', () => {
      expect(formatOutput([{ a: 1 }], 'table')).toBe('a\n-\n1');
    });
  });
});
