/**
 * Unit tests for the Flag Classifier Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  flagsMatch,
  phrasesForPolicy,
  removeByPolicy,
  RENTER_PHRASES,
  OWNER_PHRASES,
} from '../../src/classifier/index.js';
import type { Table } from '../../src/types/index.js';

const table: Table = {
  columns: ['Email', 'Flags'],
  rows: [
    { Email: 'renter@x.com', Flags: 'resident, likely renting' },
    { Email: 'owner@x.com', Flags: 'likely owner, family' },
    { Email: 'unknown@x.com', Flags: null },
    { Email: 'blank@x.com', Flags: '' },
    { Email: 'other@x.com', Flags: 'deceased' },
  ],
};

describe('Flag Classifier Module', () => {
  describe('flagsMatch()', () => {
    test('should match any phrase as a substring', () => {
      expect(flagsMatch('resident, likely renting', RENTER_PHRASES)).toBe(true);
      expect(flagsMatch('former renter', RENTER_PHRASES)).toBe(true);
      expect(flagsMatch('likely owner', OWNER_PHRASES)).toBe(true);
    });

    test('should compare case-insensitively', () => {
      expect(flagsMatch('Resident, Likely Renting', RENTER_PHRASES)).toBe(true);
      expect(flagsMatch('LIKELY OWNER', OWNER_PHRASES)).toBe(true);
    });

    test('should never match missing, empty or non-string flags', () => {
      expect(flagsMatch(null, RENTER_PHRASES)).toBe(false);
      expect(flagsMatch(undefined, OWNER_PHRASES)).toBe(false);
      expect(flagsMatch('', RENTER_PHRASES)).toBe(false);
      expect(flagsMatch(7, OWNER_PHRASES)).toBe(false);
    });

    test('should not match unrelated flags', () => {
      expect(flagsMatch('likely owner, resident', RENTER_PHRASES)).toBe(false);
      expect(flagsMatch('resident, likely renting', OWNER_PHRASES)).toBe(false);
    });
  });

  describe('phrasesForPolicy()', () => {
    test('should pick the excluded phrase set', () => {
      expect(phrasesForPolicy('keep_owners')).toBe(RENTER_PHRASES);
      expect(phrasesForPolicy('keep_renters')).toBe(OWNER_PHRASES);
    });
  });

  describe('removeByPolicy()', () => {
    test('should remove renters when keeping owners', () => {
      const result = removeByPolicy(table, 'keep_owners');

      expect(result.removed).toBe(1);
      expect(result.table.rows.map((row) => row.Email)).toEqual([
        'owner@x.com',
        'unknown@x.com',
        'blank@x.com',
        'other@x.com',
      ]);
    });

    test('should remove likely owners when keeping renters', () => {
      const result = removeByPolicy(table, 'keep_renters');

      expect(result.removed).toBe(1);
      expect(result.table.rows.map((row) => row.Email)).toEqual([
        'renter@x.com',
        'unknown@x.com',
        'blank@x.com',
        'other@x.com',
      ]);
    });

    test('should leave the input table untouched', () => {
      removeByPolicy(table, 'keep_owners');

      expect(table.rows).toHaveLength(5);
    });
  });
});
