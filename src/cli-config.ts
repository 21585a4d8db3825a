/**
 * Configuration Loader for ninja-syntax
 * Loads and validates .ninja-syntax.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { createError } from './types.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.ninja-syntax.json';

export const OUTPUT_FORMATS = ['text', 'json', 'yaml'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliConfig {
  readonly maxIncludeDepth?: number | undefined;
  readonly maxValueLength?: number | undefined;
  readonly format?: OutputFormat | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function invalid(reason: string): Error {
  return createError('NINJA-C002', { reason });
}

function readPositiveInteger(
  config: Record<string, unknown>,
  key: string
): number | undefined {
  const value = config[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw invalid(`${key} must be a positive integer`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 * Throws NINJA-C002 if configuration is invalid.
 */
export function validateConfig(data: unknown): CliConfig {
  if (!isRecord(data)) {
    throw invalid('must be an object');
  }

  const known = new Set(['maxIncludeDepth', 'maxValueLength', 'format']);
  for (const key of Object.keys(data)) {
    if (!known.has(key)) {
      throw invalid(`unknown option ${key}`);
    }
  }

  let format: OutputFormat | undefined;
  const rawFormat = data['format'];
  if (rawFormat !== undefined) {
    if (!isOutputFormat(rawFormat)) {
      throw invalid(
        `format has invalid value "${String(rawFormat)}" (must be 'text', 'json', or 'yaml')`
      );
    }
    format = rawFormat;
  }

  return {
    maxIncludeDepth: readPositiveInteger(data, 'maxIncludeDepth'),
    maxValueLength: readPositiveInteger(data, 'maxValueLength'),
    format,
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from `configPath`, or from .ninja-syntax.json in `cwd`.
 *
 * @returns CliConfig object, or null when no file is named and none exists
 * @throws NinjaError (NINJA-C001) when an explicitly named file is missing
 * @throws NinjaError (NINJA-C002) when the file is not valid configuration
 */
export function loadConfig(cwd: string, configPath?: string): CliConfig | null {
  const filePath =
    configPath === undefined
      ? join(cwd, CONFIG_FILE_NAME)
      : resolve(cwd, configPath);

  if (!existsSync(filePath)) {
    if (configPath === undefined) return null;
    throw createError('NINJA-C001', { path: configPath });
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw invalid(
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
