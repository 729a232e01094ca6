/**
 * Unit tests for the Renderers Module
 */

import { describe, it, expect } from '@jest/globals';
import {
  renderCsv,
  renderPreview,
  renderSummary,
  DEFAULT_OUTPUT_FILENAME,
} from '../../src/renderers/index.js';
import { DEFAULT_OPTIONS } from '../../src/normalizer/index.js';
import type { CleanerReport, Table } from '../../src/types/index.js';

const report: CleanerReport = {
  encoding: 'utf-8',
  slots: [1, 2],
  inputRows: 2,
  outputRows: 1,
  stages: [
    { stage: 'trim', rowsBefore: 2, rowsAfter: 2 },
    { stage: 'explode', rowsBefore: 2, rowsAfter: 4 },
    { stage: 'drop_missing_email', rowsBefore: 4, rowsAfter: 2 },
    { stage: 'filter_valid_emails', rowsBefore: 2, rowsAfter: 2 },
    { stage: 'classify', rowsBefore: 2, rowsAfter: 1 },
    { stage: 'dedupe', rowsBefore: 1, rowsAfter: 1 },
  ],
  warnings: [],
  options: { ...DEFAULT_OPTIONS },
};

describe('Renderers Module', () => {
  describe('renderCsv()', () => {
    it('should write a header and quote only fields that need it', () => {
      const table: Table = {
        columns: ['name', 'Email', 'Flags'],
        rows: [
          { name: 'Doe, Jane', Email: 'a@b.com', Flags: null },
          { name: 'Say "hi"', Email: 'c@d.com', Flags: 'likely owner' },
        ],
      };

      expect(renderCsv(table)).toBe(
        'name,Email,Flags\n' +
        '"Doe, Jane",a@b.com,\n' +
        '"Say ""hi""",c@d.com,likely owner\n'
      );
    });

    it('should keep column names containing dots intact', () => {
      const table: Table = {
        columns: ['id', 'id.1', 'Email', 'Flags'],
        rows: [{ id: '1', 'id.1': '2', Email: 'a@b.com', Flags: 'renter' }],
      };

      expect(renderCsv(table)).toBe('id,id.1,Email,Flags\n1,2,a@b.com,renter\n');
    });

    it('should quote embedded line breaks', () => {
      const table: Table = { columns: ['note'], rows: [{ note: 'line one\nline two' }] };

      expect(renderCsv(table)).toBe('note\n"line one\nline two"\n');
    });
  });

  describe('renderPreview()', () => {
    it('should keep the first rows only', () => {
      const table: Table = {
        columns: ['n'],
        rows: Array.from({ length: 60 }, (_, i) => ({ n: String(i) })),
      };

      const preview = renderPreview(table);

      expect(preview.rows).toHaveLength(50);
      expect(preview.rows[49]).toEqual({ n: '49' });
      expect(renderPreview(table, 2).rows).toEqual([{ n: '0' }, { n: '1' }]);
    });
  });

  describe('renderSummary()', () => {
    it('should describe every stage in order', () => {
      expect(renderSummary(report).split('\n')).toEqual([
        'Read 2 rows (utf-8)',
        'Detected contact slots: [1, 2]',
        'Trimmed spaces in text fields → 2 rows',
        'Exploded by contacts → rows: 2 → 4',
        'Dropped rows without Email → 2 rows remain',
        'Filtered invalid-looking emails → removed 0 rows',
        'Removed 1 renter rows based on Flags.',
        'De-duplicated by Email → removed 0 rows',
        'Done. 1 rows ready for verification.',
      ]);
    });

    it('should name the owner removal under keep_renters', () => {
      const renterReport: CleanerReport = {
        ...report,
        stages: [{ stage: 'classify', rowsBefore: 3, rowsAfter: 1 }],
        options: { ...DEFAULT_OPTIONS, policy: 'keep_renters' },
      };

      expect(renderSummary(renterReport)).toContain("Removed 2 'Likely Owner…' rows. Renters kept.");
    });

    it('should surface schema warnings and group thousands', () => {
      const bigReport: CleanerReport = {
        ...report,
        slots: [],
        inputRows: 12345,
        outputRows: 12345,
        stages: [],
        warnings: [{ code: 'SCHEMA_MISMATCH', message: 'No contact_N_email columns found.' }],
      };

      expect(renderSummary(bigReport).split('\n')).toEqual([
        'Read 12,345 rows (utf-8)',
        'Warning: No contact_N_email columns found.',
        'Done. 12,345 rows ready for verification.',
      ]);
    });
  });

  it('should use the documented download name', () => {
    expect(DEFAULT_OUTPUT_FILENAME).toBe('dealmachine_cleaned_emails.csv');
  });
});
