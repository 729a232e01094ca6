#!/usr/bin/env node
/**
 * dealmachine-clean <input.csv> [--out path] [--policy keep_owners|keep_renters]
 *                  [--no-trim] [--keep-missing-email] [--keep-invalid-emails] [--no-dedupe]
 *                  [--summary]
 *
 * --summary prints the run summary and a CSV preview of the first rows and
 * writes no file.
 *
 * Flags override CLEANER_* environment variables, which override defaults.
 */

import { parseArgs } from 'node:util';
import { cleanCsvFile, loadOptionsFromEnv, summarizeCsvFile } from '../adapters/index.js';
import { renderCsv, renderSummary } from '../renderers/index.js';
import type { ModuleResult } from '../types/index.js';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

const USAGE =
  'Usage: dealmachine-clean <input.csv> [--out path] [--policy keep_owners|keep_renters] ' +
  '[--no-trim] [--keep-missing-email] [--keep-invalid-emails] [--no-dedupe] [--summary]';

export interface CliArgs {
  inputPath: string;
  outputPath?: string;
  summaryOnly: boolean;
  options: Record<string, unknown>;
}

/**
 * Parse argv into an input path, output path and options record
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv
): CliArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      policy: { type: 'string', short: 'p' },
      'no-trim': { type: 'boolean' },
      'keep-missing-email': { type: 'boolean' },
      'keep-invalid-emails': { type: 'boolean' },
      'no-dedupe': { type: 'boolean' },
      summary: { type: 'boolean' },
    },
  });

  const [inputPath] = positionals;
  if (!inputPath) {
    throw new Error(USAGE);
  }

  const options = loadOptionsFromEnv(env);
  if (values.policy !== undefined) {
    options['policy'] = values.policy.trim().toLowerCase();
  }
  if (values['no-trim']) {
    options['trim'] = false;
  }
  if (values['keep-missing-email']) {
    options['dropMissingEmail'] = false;
  }
  if (values['keep-invalid-emails']) {
    options['filterValidEmails'] = false;
  }
  if (values['no-dedupe']) {
    options['dedupeByEmail'] = false;
  }

  return { inputPath, outputPath: values.out, summaryOnly: values.summary === true, options };
}

function reportFailure(result: ModuleResult<unknown>, io: CliIO): number {
  io.stderr(`Error: ${result.error?.message ?? 'Unknown error'}`);
  const details: unknown = result.error?.details;
  if (Array.isArray(details)) {
    for (const detail of details) {
      io.stderr(`  ${typeof detail === 'string' ? detail : JSON.stringify(detail)}`);
    }
  }
  return 1;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    const { inputPath, outputPath, summaryOnly, options } = parseCliArgs(argv, io.env);

    if (summaryOnly) {
      const result = await summarizeCsvFile(inputPath, { options });
      if (!result.success || !result.data) {
        return reportFailure(result, io);
      }
      io.stdout(renderSummary(result.data.report));
      io.stdout(renderCsv(result.data.preview));
      return 0;
    }

    const result = await cleanCsvFile(inputPath, { outputPath, options });
    if (!result.success || !result.data) {
      return reportFailure(result, io);
    }

    io.stdout(renderSummary(result.data.report));
    io.stdout(`Wrote ${result.data.outputPath}`);
    return 0;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    env: process.env,
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
