/**
 * Tokenizer State
 * Tracks cursor, line and indentation while scanning a buffer
 */

import {
  DIALECTS,
  makeLocation,
  TOKEN_TYPES,
  type Dialect,
  type SourceLocation,
  type Token,
} from '../types.js';

export interface TokenizerState {
  readonly source: string;
  readonly dialect: Dialect;
  /** File name carried into diagnostics */
  readonly file: string | undefined;
  pos: number;
  /** Offset where the current physical line starts */
  lineStart: number;
  /** 0-based index of the current physical line */
  lineIndex: number;
  /** Cached lookahead token; type NONE when nothing is cached */
  token: Token;
  /** Location of the cached token */
  tokenLocation: SourceLocation;
  /** State before the cached token was scanned */
  tokenMark: TokenizerMark | undefined;
  /** Indentation of the current line, valid once measured */
  curIndent: number;
  /** Indentation established for the current block */
  lastIndent: number;
  /** Indentation of each enclosing block */
  indentStack: number[];
  /** Cursor sits at the beginning of a physical line (manifest dialect) */
  atLineStart: boolean;
  /** curIndent has not yet been reconciled with lastIndent */
  indentPending: boolean;
  /** A token other than NEWLINE was produced on the current line */
  lineHasContent: boolean;
}

/** Restorable copy of the mutable parts of a TokenizerState */
export interface TokenizerMark {
  readonly pos: number;
  readonly lineStart: number;
  readonly lineIndex: number;
  readonly curIndent: number;
  readonly lastIndent: number;
  readonly indentStack: readonly number[];
  readonly atLineStart: boolean;
  readonly indentPending: boolean;
  readonly lineHasContent: boolean;
}

export const NO_TOKEN: Token = { type: TOKEN_TYPES.NONE, start: 0, end: 0 };

export function createTokenizerState(
  source: string,
  dialect: Dialect,
  file?: string
): TokenizerState {
  return {
    source,
    dialect,
    file,
    pos: 0,
    lineStart: 0,
    lineIndex: 0,
    token: NO_TOKEN,
    tokenLocation: makeLocation(0, 0, 0),
    tokenMark: undefined,
    curIndent: 0,
    lastIndent: 0,
    indentStack: [],
    atLineStart: dialect === DIALECTS.MANIFEST,
    indentPending: false,
    lineHasContent: false,
  };
}

export function mark(state: TokenizerState): TokenizerMark {
  return {
    pos: state.pos,
    lineStart: state.lineStart,
    lineIndex: state.lineIndex,
    curIndent: state.curIndent,
    lastIndent: state.lastIndent,
    indentStack: [...state.indentStack],
    atLineStart: state.atLineStart,
    indentPending: state.indentPending,
    lineHasContent: state.lineHasContent,
  };
}

export function restore(state: TokenizerState, saved: TokenizerMark): void {
  state.pos = saved.pos;
  state.lineStart = saved.lineStart;
  state.lineIndex = saved.lineIndex;
  state.curIndent = saved.curIndent;
  state.lastIndent = saved.lastIndent;
  state.indentStack = [...saved.indentStack];
  state.atLineStart = saved.atLineStart;
  state.indentPending = saved.indentPending;
  state.lineHasContent = saved.lineHasContent;
}

export function currentLocation(state: TokenizerState): SourceLocation {
  return makeLocation(state.lineIndex, state.lineStart, state.pos);
}

export function peek(state: TokenizerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function isAtEnd(state: TokenizerState): boolean {
  return state.pos >= state.source.length;
}

export function isManifest(state: TokenizerState): boolean {
  return state.dialect === DIALECTS.MANIFEST;
}

/**
 * Length of the line terminator at the cursor: 1 for `\n`, 2 for `\r\n`,
 * 0 when the cursor is not at a line end.
 */
export function newlineLength(state: TokenizerState, offset = 0): number {
  const ch = peek(state, offset);
  if (ch === '\n') return 1;
  if (ch === '\r' && peek(state, offset + 1) === '\n') return 2;
  return 0;
}

/** Move past a line terminator of `length` characters onto the next line */
export function advanceLine(state: TokenizerState, length: number): void {
  state.pos += length;
  state.lineIndex++;
  state.lineStart = state.pos;
}
