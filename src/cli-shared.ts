/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFileSync } from 'node:fs';
import { NinjaError, type ObservabilityCallbacks } from './types.js';

/**
 * Format error for stderr output
 *
 * Manifest errors print as `file:line:column: message`; errors raised
 * inside an included file keep the include line's location and quote the
 * nested diagnostic.
 */
export function formatError(err: Error): string {
  if (err instanceof NinjaError) {
    return err.format();
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Read the version field of the package manifest next to the sources
 * (or next to dist/ once built).
 */
export function readVersion(): string {
  const manifestUrl = new URL('../package.json', import.meta.url);
  const data: unknown = JSON.parse(readFileSync(manifestUrl, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}

/**
 * Observability callbacks that trace parsing to `write`, one line per
 * event.
 */
export function createTraceCallbacks(
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onFileStart: ({ file, depth }) => {
      write(`[parse] start ${file ?? '<input>'} (depth ${depth})`);
    },
    onInclude: ({ kind, path, depth }) => {
      write(`[parse] ${kind} ${path} (depth ${depth})`);
    },
    onDeclaration: ({ kind, name, location }) => {
      write(`[parse]   ${kind} ${name} at ${location.line}:${location.column}`);
    },
    onFileEnd: ({ file, declarations, durationMs }) => {
      write(
        `[parse] done ${file ?? '<input>'}: ${declarations} declarations in ${durationMs.toFixed(1)}ms`
      );
    },
  };
}
