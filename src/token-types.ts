// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  NONE: 'NONE',
  UNKNOWN: 'UNKNOWN',
  IDENT: 'IDENT',
  NEWLINE: 'NEWLINE',
  EQUALS: 'EQUALS', // =
  COLON: 'COLON', // :
  PIPE: 'PIPE', // |
  PIPE2: 'PIPE2', // ||
  INDENT: 'INDENT',
  OUTDENT: 'OUTDENT',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/**
 * A scanned token. The token holds offsets into the source buffer rather
 * than a copy of its text; read the text back through the tokenizer that
 * produced it.
 */
export interface Token {
  readonly type: TokenType;
  /** Offset of the first character */
  readonly start: number;
  /** Offset just past the last character */
  readonly end: number;
}

/** Human-readable name of a token kind, as used in "expected X, got Y" */
export function describeTokenType(type: TokenType): string {
  switch (type) {
    case TOKEN_TYPES.IDENT:
      return 'identifier';
    case TOKEN_TYPES.NEWLINE:
      return 'newline';
    case TOKEN_TYPES.EQUALS:
      return "'='";
    case TOKEN_TYPES.COLON:
      return "':'";
    case TOKEN_TYPES.PIPE:
      return "'|'";
    case TOKEN_TYPES.PIPE2:
      return "'||'";
    case TOKEN_TYPES.INDENT:
      return 'indent';
    case TOKEN_TYPES.OUTDENT:
      return 'outdent';
    case TOKEN_TYPES.EOF:
      return 'eof';
    case TOKEN_TYPES.UNKNOWN:
      return 'unknown character';
    case TOKEN_TYPES.NONE:
      return 'nothing';
  }
}

// ============================================================
// DIALECTS
// ============================================================

/**
 * Textual dialects scanned by the tokenizer.
 * - manifest: indentation is significant, `$` escapes are recognized
 * - makefile: compiler-generated dependency listings, no block structure
 */
export const DIALECTS = {
  MANIFEST: 'manifest',
  MAKEFILE: 'makefile',
} as const;

export type Dialect = (typeof DIALECTS)[keyof typeof DIALECTS];
