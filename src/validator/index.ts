/**
 * Email Validator Module
 *
 * Syntax-only check for "looks like a real address". No DNS or SMTP lookups.
 *
 * Rules, in evaluation order:
 * 1. Whole string matches the extraction pattern
 * 2. No leading or trailing dot
 * 3. No consecutive dots
 * 4. Non-empty local and domain parts around the first "@"
 * 5. Neither part starts or ends with "." or "-"
 * 6. Domain has a dot; every label is non-empty and not hyphen-bounded
 * 7. Final label is at least two characters
 */

import { EMAIL_PATTERN_SOURCE } from '../extractor/index.js';
import { normalizeEmail } from '../normalizer/index.js';

export type EmailRejection =
  | 'not_a_string'
  | 'pattern_mismatch'
  | 'dot_boundary'
  | 'consecutive_dots'
  | 'empty_part'
  | 'part_boundary'
  | 'bad_domain_label'
  | 'short_tld';

export interface EmailCheck {
  valid: boolean;
  reason: EmailRejection | null;
}

const FULL_EMAIL_PATTERN = new RegExp(`^${EMAIL_PATTERN_SOURCE}$`, 'i');

function reject(reason: EmailRejection): EmailCheck {
  return { valid: false, reason };
}

function hasBoundary(part: string, chars: readonly string[]): boolean {
  return chars.some((c) => part.startsWith(c) || part.endsWith(c));
}

/**
 * Run every structural rule and report the first one that fails
 */
export function checkEmail(value: unknown): EmailCheck {
  if (typeof value !== 'string') {
    return reject('not_a_string');
  }

  const email = normalizeEmail(value) ?? '';

  if (!FULL_EMAIL_PATTERN.test(email)) {
    return reject('pattern_mismatch');
  }
  if (hasBoundary(email, ['.'])) {
    return reject('dot_boundary');
  }
  if (email.includes('..')) {
    return reject('consecutive_dots');
  }

  const at = email.indexOf('@');
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  if (!local || !domain) {
    return reject('empty_part');
  }
  if (hasBoundary(local, ['.', '-']) || hasBoundary(domain, ['.', '-'])) {
    return reject('part_boundary');
  }

  const labels = domain.split('.');
  if (!domain.includes('.') || labels.some((label) => label.length === 0 || hasBoundary(label, ['-']))) {
    return reject('bad_domain_label');
  }

  const tld = labels[labels.length - 1] ?? '';
  if (tld.length < 2) {
    return reject('short_tld');
  }

  return { valid: true, reason: null };
}

/**
 * Boolean form of checkEmail. Never throws; non-strings are invalid.
 */
export function looksValidEmail(value: unknown): boolean {
  return checkEmail(value).valid;
}
