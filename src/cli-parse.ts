#!/usr/bin/env node
/**
 * CLI Parse Entry Point
 *
 * Implements argument parsing for ninja-syntax.
 * Parses a build manifest (or a depfile) and prints what it declares.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import * as yaml from 'yaml';
import {
  isOutputFormat,
  loadConfig,
  OUTPUT_FORMATS,
  type CliConfig,
  type OutputFormat,
} from './cli-config.js';
import {
  createTraceCallbacks,
  formatError,
  readVersion,
} from './cli-shared.js';
import { NodeFileReader } from './files/reader.js';
import type { ManifestState } from './graph/state.js';
import { formatBuildLine, summarizeManifest } from './graph/summary.js';
import { loadManifest, parseDepfile, type Depfile } from './parser/index.js';
import { createError, NinjaError, type FileReader } from './types.js';

/**
 * Parsed command-line arguments for ninja-syntax
 */
export type ParsedArgs =
  | {
      mode: 'parse';
      file: string;
      depfile: boolean;
      verbose: boolean;
      format: OutputFormat | undefined;
      config: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

/** Streams and working directory the CLI runs against */
export interface CliIO {
  readonly cwd: string;
  /** Reads manifests and depfiles; defaults to the file system under cwd */
  readonly fileReader?: FileReader | undefined;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const EXIT_CODES = {
  OK: 0,
  USAGE: 1,
  NOT_FOUND: 2,
  PARSE_ERROR: 3,
} as const;

const HELP_TEXT = `ninja-syntax - Parse build manifests and depfiles

Usage: ninja-syntax [options] <file>

Options:
  --depfile        Parse <file> as a compiler-generated depfile
  --format <fmt>   Output format: text (default), json or yaml
  --config <path>  Configuration file (default: ./.ninja-syntax.json)
  --verbose        Trace files and declarations to stderr
  -h, --help       Show this help message
  -v, --version    Show version number`;

/** Flags that take the next argument as their value */
const VALUE_FLAGS = new Set(['--format', '--config']);

const KNOWN_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--depfile',
  '--verbose',
  ...VALUE_FLAGS,
]);

/**
 * Parse command-line arguments for ninja-syntax
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let config: string | undefined;
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (!arg.startsWith('-')) {
      // First non-flag argument is the file
      file ??= arg;
      continue;
    }
    if (!KNOWN_FLAGS.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }
    if (!VALUE_FLAGS.has(arg)) continue;

    const value = argv[i + 1];
    i++;
    if (arg === '--format') {
      if (value === undefined || value.startsWith('-')) {
        throw new Error('--format requires argument: text, json or yaml');
      }
      if (!isOutputFormat(value)) {
        throw new Error(
          `Invalid format: ${value}. Expected ${OUTPUT_FORMATS.join(', ')}`
        );
      }
      format = value;
    } else {
      if (value === undefined || value.startsWith('-')) {
        throw new Error('--config requires a path');
      }
      config = value;
    }
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return {
    mode: 'parse',
    file,
    depfile: argv.includes('--depfile'),
    verbose: argv.includes('--verbose'),
    format,
    config,
  };
}

// ============================================================
// OUTPUT FORMATTING
// ============================================================

function serialize(data: unknown, format: 'json' | 'yaml'): string {
  return format === 'json'
    ? JSON.stringify(data, null, 2)
    : yaml.stringify(data).trimEnd();
}

/**
 * Format a parsed manifest.
 * Text format: a count line, then one line per rule, pool, edge and default
 * statement in that order.
 */
export function formatManifest(
  state: ManifestState,
  format: OutputFormat
): string {
  if (format !== 'text') {
    return serialize(summarizeManifest(state), format);
  }

  const lines = [
    `${state.rules.length} rules, ${state.edges.length} edges, ${state.pools.length} pools, ${state.defaults.length} defaults`,
    ...state.rules.map((rule) => `rule ${rule.name}`),
    ...state.pools.map((pool) => `pool ${pool.name}`),
    ...state.edges.map(formatBuildLine),
    ...state.defaults.map((d) => `default ${d.targets.join(' ')}`),
  ];
  return lines.join('\n');
}

/** Text format: `target: prerequisite ...` */
export function formatDepfile(depfile: Depfile, format: OutputFormat): string {
  if (format !== 'text') {
    return serialize(
      { target: depfile.target, prerequisites: [...depfile.prerequisites] },
      format
    );
  }
  return [depfile.target + ':', ...depfile.prerequisites].join(' ');
}

// ============================================================
// RUN
// ============================================================

/** @throws NinjaError (NINJA-P008) when the file cannot be read */
function readDepfile(fileReader: FileReader, path: string): string {
  try {
    return fileReader.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw createError('NINJA-P008', { path, reason }, undefined, {
      cause: err,
    });
  }
}

/**
 * Run ninja-syntax against `argv` and return the exit code.
 * Exit codes: 0 success, 1 usage or configuration error, 2 file not found,
 * 3 parse error.
 */
export function run(argv: string[], io: CliIO): number {
  const usageError = (err: unknown): number => {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_CODES.USAGE;
  };

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    return usageError(err);
  }

  if (args.mode === 'help') {
    io.stdout(HELP_TEXT);
    return EXIT_CODES.OK;
  }
  if (args.mode === 'version') {
    io.stdout(readVersion());
    return EXIT_CODES.OK;
  }

  let config: CliConfig;
  try {
    config = loadConfig(io.cwd, args.config) ?? {};
  } catch (err) {
    return usageError(err);
  }

  const format = args.format ?? config.format ?? 'text';
  const filePath = resolve(io.cwd, args.file);

  if (!existsSync(filePath)) {
    io.stderr(`Error: File not found: ${args.file}`);
    return EXIT_CODES.NOT_FOUND;
  }
  if (statSync(filePath).isDirectory()) {
    io.stderr(`Error: Path is a directory: ${args.file}`);
    return EXIT_CODES.NOT_FOUND;
  }

  const fileReader = io.fileReader ?? new NodeFileReader(io.cwd);

  try {
    if (args.depfile) {
      const depfile = parseDepfile(
        readDepfile(fileReader, args.file),
        args.file
      );
      io.stdout(formatDepfile(depfile, format));
      return EXIT_CODES.OK;
    }

    const state = loadManifest(args.file, fileReader, {
      maxIncludeDepth: config.maxIncludeDepth,
      maxValueLength: config.maxValueLength,
      callbacks: args.verbose ? createTraceCallbacks(io.stderr) : undefined,
    });
    io.stdout(formatManifest(state, format));
    return EXIT_CODES.OK;
  } catch (err) {
    if (err instanceof NinjaError) {
      io.stderr(formatError(err));
      return EXIT_CODES.PARSE_ERROR;
    }
    throw err;
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = run(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
