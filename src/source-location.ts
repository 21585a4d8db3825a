// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  /** 1-based line number */
  readonly line: number;
  /** 1-based column number */
  readonly column: number;
  /** 0-based offset into the source buffer */
  readonly offset: number;
}

/**
 * Build a location from a cursor offset and the offset where its physical
 * line begins.
 */
export function makeLocation(
  lineIndex: number,
  lineStart: number,
  offset: number
): SourceLocation {
  return { line: lineIndex + 1, column: offset - lineStart + 1, offset };
}

/**
 * Compute the location of an arbitrary offset by scanning the buffer.
 * Offsets past the end clamp to the end of the buffer.
 */
export function locationAt(source: string, offset: number): SourceLocation {
  const target = Math.max(0, Math.min(offset, source.length));
  let lineIndex = 0;
  let lineStart = 0;
  for (let i = 0; i < target; i++) {
    if (source[i] === '\n') {
      lineIndex++;
      lineStart = i + 1;
    }
  }
  return makeLocation(lineIndex, lineStart, target);
}

/**
 * Format a single-line diagnostic: `file:line:column: message`.
 * The file part is omitted when no file name is known.
 *
 * @example
 * formatDiagnostic("expected newline, got ':'", { line: 2, column: 7, offset: 12 }, 'build.ninja')
 * // Returns: "build.ninja:2:7: expected newline, got ':'"
 */
export function formatDiagnostic(
  message: string,
  location: SourceLocation,
  file?: string | undefined
): string {
  const prefix = file ? `${file}:` : '';
  return `${prefix}${location.line}:${location.column}: ${message}`;
}
