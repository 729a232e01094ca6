/**
 * Flag Classifier Module
 *
 * DealMachine flags are free text such as "Resident, Likely Renting" or
 * "Likely Owner, Family". Rows are classified by substring checks only.
 * The active policy picks exactly one phrase set to remove.
 */

import { FLAGS_COLUMN } from '../types/index.js';
import type { Policy, Table } from '../types/index.js';

export const RENTER_PHRASES: readonly string[] = [
  'resident, likely renting',
  'likely renting',
  'renter',
];

export const OWNER_PHRASES: readonly string[] = [
  'likely owner, resident',
  'likely owner',
  'likely owner, family',
];

export interface ClassificationResult {
  table: Table;
  removed: number;
}

/**
 * True when any phrase occurs in the flags text.
 * Missing, empty or non-string flags never match.
 */
export function flagsMatch(flags: unknown, phrases: readonly string[]): boolean {
  if (typeof flags !== 'string' || flags.length === 0) {
    return false;
  }
  const text = flags.toLowerCase();
  return phrases.some((phrase) => text.includes(phrase));
}

/**
 * Phrase set whose matches are removed under a policy
 */
export function phrasesForPolicy(policy: Policy): readonly string[] {
  return policy === 'keep_owners' ? RENTER_PHRASES : OWNER_PHRASES;
}

/**
 * Drop every row whose Flags match the policy's excluded phrase set
 */
export function removeByPolicy(table: Table, policy: Policy): ClassificationResult {
  const phrases = phrasesForPolicy(policy);
  const rows = table.rows.filter((row) => !flagsMatch(row[FLAGS_COLUMN], phrases));

  return {
    table: { columns: [...table.columns], rows },
    removed: table.rows.length - rows.length,
  };
}
