/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Canonicalize the caller's options record (defaults + validation)
 * - Cell-level text normalization shared by the other stages
 *
 * Usage:
 * const { normalizeOptions } = await import('dealmachine-contact-cleaner/normalizer');
 * const result = normalizeOptions({ policy: 'keep_renters' });
 */

import { z } from 'zod';
import type { CellValue, CleanerOptions, ModuleResult, Policy } from '../types/index.js';

export const POLICIES = ['keep_owners', 'keep_renters'] as const satisfies readonly Policy[];

/**
 * Defaults: every filter on, renters removed
 */
export const DEFAULT_OPTIONS: Readonly<CleanerOptions> = Object.freeze({
  trim: true,
  dropMissingEmail: true,
  filterValidEmails: true,
  dedupeByEmail: true,
  policy: 'keep_owners',
});

/**
 * Zod schema for the raw options record
 * Every field is optional; unknown keys are rejected so typos surface
 */
const RawOptionsSchema = z
  .object({
    trim: z.boolean().optional(),
    dropMissingEmail: z.boolean().optional(),
    filterValidEmails: z.boolean().optional(),
    dedupeByEmail: z.boolean().optional(),
    policy: z.enum(POLICIES).optional(),
  })
  .strict();

export type RawOptions = z.input<typeof RawOptionsSchema>;

/**
 * Strip surrounding whitespace from a cell.
 * Blank and absent cells both come back as null.
 */
function trimString(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Candidate addresses are compared in lowercase; a blank cell has no address.
 */
function normalizeEmail(email: string | null | undefined): string | null {
  return trimString(email)?.toLowerCase() ?? null;
}

/**
 * Flags text is compared by substring only, so it is stored trimmed and lowercased.
 * Missing stays missing.
 */
function normalizeFlags(flags: CellValue | undefined): CellValue {
  if (flags === null || flags === undefined) {
    return null;
  }
  return flags.trim().toLowerCase();
}

/**
 * Parse a boolean-ish configuration string.
 * Returns undefined for unset or unrecognized values.
 */
function parseBooleanFlag(value: string | null | undefined): boolean | undefined {
  const normalized = trimString(value)?.toLowerCase();
  if (normalized === undefined) {
    return undefined;
  }
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Validate a raw options record and fill in defaults
 *
 * @param rawOptions - Partial options from the caller (undefined means all defaults)
 * @returns ModuleResult containing the canonical options or validation errors
 */
export function normalizeOptions(rawOptions: unknown = {}): ModuleResult<CleanerOptions> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  const parseResult = RawOptionsSchema.safeParse(rawOptions ?? {});

  if (!parseResult.success) {
    const errors = parseResult.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    return {
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Options validation failed',
        details: errors,
      },
      metadata: {
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const raw = parseResult.data;

  return {
    success: true,
    data: {
      trim: raw.trim ?? DEFAULT_OPTIONS.trim,
      dropMissingEmail: raw.dropMissingEmail ?? DEFAULT_OPTIONS.dropMissingEmail,
      filterValidEmails: raw.filterValidEmails ?? DEFAULT_OPTIONS.filterValidEmails,
      dedupeByEmail: raw.dedupeByEmail ?? DEFAULT_OPTIONS.dedupeByEmail,
      policy: raw.policy ?? DEFAULT_OPTIONS.policy,
    },
    metadata: {
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}

export { trimString, normalizeEmail, normalizeFlags, parseBooleanFlag };
