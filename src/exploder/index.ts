/**
 * Exploder Module
 *
 * Turns each property row into one row per (contact slot, email) pair.
 *
 * For every source row and every slot, ascending:
 * - no address in the slot's email cell -> one row, Email missing
 * - k addresses -> k rows, one per address
 * Each derived row carries the slot's flags (trimmed, lowercased) in Flags.
 * The per-slot source columns are dropped from the result.
 *
 * A source row with m_i addresses in slot i yields sum(max(m_i, 1)) rows,
 * so the output is never shorter than the input.
 */

import { EMAIL_COLUMN, FLAGS_COLUMN } from '../types/index.js';
import type { CellValue, Row, Table } from '../types/index.js';
import { extractEmails } from '../extractor/index.js';
import { normalizeFlags } from '../normalizer/index.js';
import { resolveSlotColumns, slotColumnNames } from '../slot-detector/index.js';

/**
 * Output schema: source columns without per-slot columns, then Email and Flags.
 * Email/Flags keep their position if the source already had them.
 */
export function explodedColumns(columns: readonly string[]): string[] {
  const slotColumns = new Set(slotColumnNames(columns));
  const kept = columns.filter((column) => !slotColumns.has(column));
  for (const added of [EMAIL_COLUMN, FLAGS_COLUMN]) {
    if (!kept.includes(added)) {
      kept.push(added);
    }
  }
  return kept;
}

/**
 * Build an owned copy of a source row restricted to the output schema
 */
function deriveRow(source: Row, columns: readonly string[], email: CellValue, flags: CellValue): Row {
  return Object.fromEntries(
    columns.map((column): [string, CellValue] => {
      if (column === EMAIL_COLUMN) {
        return [column, email];
      }
      if (column === FLAGS_COLUMN) {
        return [column, flags];
      }
      return [column, source[column] ?? null];
    })
  );
}

/**
 * Guarantee the Email and Flags columns exist without touching anything else
 */
export function ensureContactColumns(table: Table): Table {
  const columns = [...table.columns];
  for (const added of [EMAIL_COLUMN, FLAGS_COLUMN]) {
    if (!columns.includes(added)) {
      columns.push(added);
    }
  }

  return {
    columns,
    rows: table.rows.map((row) =>
      Object.fromEntries(columns.map((column): [string, CellValue] => [column, row[column] ?? null]))
    ),
  };
}

/**
 * Explode a table by its contact slots
 *
 * @param table - Source table
 * @param slots - Sorted slot indices from detectContactSlots()
 * @returns New table with one row per slot email
 */
export function explodeByContacts(table: Table, slots: readonly number[]): Table {
  if (slots.length === 0) {
    return ensureContactColumns(table);
  }

  const columns = explodedColumns(table.columns);
  const slotColumns = resolveSlotColumns(table.columns, slots);
  const derived: Row[] = [];

  for (const source of table.rows) {
    let emitted = false;

    for (const slot of slotColumns) {
      const emailCell = slot.emailColumn ? source[slot.emailColumn] ?? null : null;
      const flagsCell = slot.flagsColumn ? source[slot.flagsColumn] ?? null : null;
      const flags = normalizeFlags(flagsCell);
      const emails = extractEmails(emailCell);

      if (emails.length === 0) {
        derived.push(deriveRow(source, columns, null, flags));
      } else {
        for (const email of emails) {
          derived.push(deriveRow(source, columns, email, flags));
        }
      }
      emitted = true;
    }

    if (!emitted) {
      derived.push(deriveRow(source, columns, null, null));
    }
  }

  return { columns, rows: derived };
}
