#!/usr/bin/env -S npx tsx
/**
 * Document comparison CLI
 *
 * Compares two documents (Word or Excel) and prints the detected changes.
 *
 * Usage: tsx bin/compare.ts [options] <original> <revised>
 *
 * Examples:
 *   tsx bin/compare.ts old.docx new.docx
 *   tsx bin/compare.ts --json old.xlsx new.xlsx > report.json
 *   tsx bin/compare.ts --similarity 0.6 --verbose v1.docx v2.docx
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { compare } from '../src/comparer';
import { describeFailure } from '../src/core/errors';
import { parse, resolveFormat, isSupportedFormat } from '../src/parse';
import { buildChangeList, toReportPayload } from '../src/report';
import type { ComparerSettings } from '../src/types';

interface CompareOptions {
  json?: boolean;
  verbose?: boolean;
  settings: ComparerSettings;
}

function usage(): never {
  console.error(`
Usage: tsx bin/compare.ts [options] <original> <revised>

Compare two documents and list what changed.

Arguments:
  original  Original document (.docx or .xlsx)
  revised   Revised document (must be same type as original)

Options:
  --similarity <n>        Text similarity threshold in [0, 1] (default 0.8)
  --image-similarity <n>  Image similarity threshold in [0, 1] (default 0.95)
  --json                  Print the report payload as JSON
  --verbose, -v           Show diagnostic messages
  --help, -h              Show this help message
`);
  process.exit(1);
}

function fail(message: string, detail?: string): never {
  console.error(`Error: ${message}`);
  if (detail) {
    console.error(detail);
  }
  process.exit(1);
}

function readThreshold(name: string, value: string | undefined): number {
  if (value === undefined) {
    fail(`${name} requires a value`);
  }
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    fail(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

async function readInput(path: string, options: CompareOptions): Promise<Buffer> {
  if (options.verbose) {
    console.error(`Reading ${basename(path)}...`);
  }
  try {
    return await readFile(path);
  } catch (err) {
    fail(`Cannot read file: ${path}`, describeFailure(err));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    usage();
  }

  const options: CompareOptions = { settings: {} };
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--similarity') {
      options.settings.similarityThreshold = readThreshold(arg, args[++i]);
    } else if (arg === '--image-similarity') {
      options.settings.imageSimilarityThreshold = readThreshold(arg, args[++i]);
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg.startsWith('-')) {
      console.error(`Error: Unknown option: ${arg}`);
      usage();
    } else {
      positionalArgs.push(arg);
    }
  }

  if (positionalArgs.length !== 2) {
    console.error('Error: Two input files are required');
    usage();
  }

  const [originalPath, revisedPath] = positionalArgs;
  const type1 = resolveFormat(originalPath);
  const type2 = resolveFormat(revisedPath);

  for (const [path, type] of [[originalPath, type1], [revisedPath, type2]]) {
    if (!isSupportedFormat(type)) {
      fail(`Unsupported file type: ${path}`, 'Supported types: .docx, .xlsx');
    }
  }

  if (type1 !== type2) {
    fail(
      'File types must match',
      `  File 1: ${type1} (${basename(originalPath)})\n  File 2: ${type2} (${basename(revisedPath)})`
    );
  }

  if (options.verbose) {
    options.settings.logCallback = (message) => console.error(message);
  }
  const parseOptions = { logCallback: options.settings.logCallback };

  const originalBytes = await readInput(originalPath, options);
  const revisedBytes = await readInput(revisedPath, options);

  try {
    const original = await parse(originalBytes, type1, parseOptions);
    const revised = await parse(revisedBytes, type2, parseOptions);
    const result = compare(original, revised, options.settings);

    if (options.json) {
      console.log(JSON.stringify(toReportPayload(result), null, 2));
      return;
    }

    const { summary } = result;
    console.log(`${summary.totalChanges} changes (severity: ${summary.severity})`);
    console.log(`  text:       ${summary.textChanges}`);
    console.log(`  formatting: ${summary.formattingChanges}`);
    console.log(`  tables:     ${summary.tableChanges}`);
    console.log(`  images:     ${summary.imageChanges}`);
    console.log(`  structure:  ${summary.structuralChanges}`);
    if (summary.errorCount > 0) {
      console.log(`  errors:     ${summary.errorCount}`);
    }

    for (const item of buildChangeList(result)) {
      const preview = item.previewText ? `  ${item.previewText}` : '';
      console.log(`[${item.id}] ${item.summary}${preview}`);
    }
  } catch (err) {
    if (options.verbose && err instanceof Error && err.stack) {
      fail('Comparison failed', err.stack);
    }
    fail('Comparison failed', describeFailure(err));
  }
}

main().catch((err: unknown) => {
  console.error('Unexpected error:', err);
  process.exit(1);
});
