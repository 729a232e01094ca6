/**
 * Email Extractor Module
 *
 * Pulls every address-shaped token out of a free-text cell, e.g.
 * "Jane Doe <jane@x.com>, john@y.org" -> ["jane@x.com", "john@y.org"].
 */

/**
 * Liberal address shape shared with the validator:
 * local part of [A-Za-z0-9._%+-], domain of [A-Za-z0-9.-], alphabetic TLD of 2+
 */
export const EMAIL_PATTERN_SOURCE = '[A-Za-z0-9._%+\\-]+@[A-Za-z0-9.\\-]+\\.[A-Za-z]{2,}';

/**
 * Extract the distinct lowercased addresses found anywhere in a cell
 *
 * @param cell - Raw cell text; missing or non-string input yields []
 * @returns Addresses in first-seen order
 */
export function extractEmails(cell: unknown): string[] {
  if (typeof cell !== 'string' || cell.length === 0) {
    return [];
  }

  const found = cell.match(new RegExp(EMAIL_PATTERN_SOURCE, 'gi')) ?? [];
  return [...new Set(found.map((email) => email.toLowerCase()))];
}
