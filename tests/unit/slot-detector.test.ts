/**
 * Unit tests for the Slot Detector Module
 */

import { describe, test, expect } from '@jest/globals';
import { detectContactSlots, resolveSlotColumns, slotColumnNames } from '../../src/slot-detector/index.js';

describe('Slot Detector Module', () => {
  describe('detectContactSlots()', () => {
    test('should return sorted distinct indices from email and flags columns', () => {
      const columns = ['property_address', 'contact_3_email', 'contact_1_flags', 'contact_1_email', 'contact_3_flags'];

      expect(detectContactSlots(columns)).toEqual([1, 3]);
    });

    test('should count flags-only and email-only slots', () => {
      expect(detectContactSlots(['contact_2_flags', 'contact_5_email'])).toEqual([2, 5]);
    });

    test('should match case-insensitively', () => {
      expect(detectContactSlots(['Contact_4_Email', 'CONTACT_4_FLAGS'])).toEqual([4]);
    });

    test('should sort numerically, not lexically', () => {
      expect(detectContactSlots(['contact_10_email', 'contact_2_email', 'contact_1_email'])).toEqual([1, 2, 10]);
    });

    test('should ignore near-miss column names', () => {
      const columns = ['contact_email', 'contact_1_phone', 'contact_1_email_2', 'my_contact_1_email', 'contact_x_flags'];

      expect(detectContactSlots(columns)).toEqual([]);
    });

    test('should return an empty list for a header without slots', () => {
      expect(detectContactSlots(['name', 'email'])).toEqual([]);
    });
  });

  describe('resolveSlotColumns()', () => {
    test('should map each slot to its physical columns', () => {
      const columns = ['Contact_1_Email', 'contact_1_flags', 'contact_2_flags'];

      expect(resolveSlotColumns(columns, [1, 2])).toEqual([
        { index: 1, emailColumn: 'Contact_1_Email', flagsColumn: 'contact_1_flags' },
        { index: 2, emailColumn: null, flagsColumn: 'contact_2_flags' },
      ]);
    });
  });

  describe('slotColumnNames()', () => {
    test('should list per-slot columns in header order', () => {
      const columns = ['owner', 'contact_2_flags', 'city', 'contact_1_email'];

      expect(slotColumnNames(columns)).toEqual(['contact_2_flags', 'contact_1_email']);
    });
  });
});
