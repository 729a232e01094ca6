/**
 * Slot Detector Module
 *
 * DealMachine exports one pair of columns per property contact:
 * contact_<n>_email and contact_<n>_flags. Either column may be present
 * without the other, so both suffixes count toward the slot set.
 */

const EMAIL_COLUMN_PATTERN = /^contact_(\d+)_email$/i;
const FLAGS_COLUMN_PATTERN = /^contact_(\d+)_flags$/i;

/**
 * Physical column names backing one contact slot (null when absent)
 */
export interface SlotColumns {
  index: number;
  emailColumn: string | null;
  flagsColumn: string | null;
}

function matchSlotIndex(column: string, pattern: RegExp): number | null {
  const match = pattern.exec(column);
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Collect the contact-slot indices present in a header
 *
 * @param columns - Column names from the parsed table
 * @returns Sorted, distinct slot indices
 */
export function detectContactSlots(columns: readonly string[]): number[] {
  const indices = new Set<number>();

  for (const column of columns) {
    for (const pattern of [EMAIL_COLUMN_PATTERN, FLAGS_COLUMN_PATTERN]) {
      const index = matchSlotIndex(column, pattern);
      if (index !== null) {
        indices.add(index);
      }
    }
  }

  return [...indices].sort((a, b) => a - b);
}

/**
 * Map each slot index to the header's actual column names.
 * Matching is case-insensitive, so "Contact_1_Email" belongs to slot 1.
 */
export function resolveSlotColumns(columns: readonly string[], slots: readonly number[]): SlotColumns[] {
  const emailColumns = new Map<number, string>();
  const flagsColumns = new Map<number, string>();

  for (const column of columns) {
    const emailIndex = matchSlotIndex(column, EMAIL_COLUMN_PATTERN);
    if (emailIndex !== null && !emailColumns.has(emailIndex)) {
      emailColumns.set(emailIndex, column);
    }
    const flagsIndex = matchSlotIndex(column, FLAGS_COLUMN_PATTERN);
    if (flagsIndex !== null && !flagsColumns.has(flagsIndex)) {
      flagsColumns.set(flagsIndex, column);
    }
  }

  return slots.map((index) => ({
    index,
    emailColumn: emailColumns.get(index) ?? null,
    flagsColumn: flagsColumns.get(index) ?? null,
  }));
}

/**
 * Every physical per-slot column, in header order
 */
export function slotColumnNames(columns: readonly string[]): string[] {
  return columns.filter(
    (column) => EMAIL_COLUMN_PATTERN.test(column) || FLAGS_COLUMN_PATTERN.test(column)
  );
}
