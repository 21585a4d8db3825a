/**
 * Character Readers
 * Functions that move the cursor over specific runs of source text
 */

import { LexerError } from '../types.js';
import { isBlank, isIdentifierChar } from './helpers.js';
import {
  advanceLine,
  currentLocation,
  isAtEnd,
  isManifest,
  newlineLength,
  peek,
  type TokenizerState,
} from './state.js';

/**
 * Whether the cursor is on a line continuation: backslash-newline in both
 * dialects, `$`-newline in manifest dialect. Returns the characters to
 * skip, or 0.
 */
function continuationLength(state: TokenizerState): number {
  const ch = peek(state);
  if (ch === '\\' || (ch === '$' && isManifest(state))) {
    const nl = newlineLength(state, 1);
    return nl === 0 ? 0 : nl + 1;
  }
  return 0;
}

/**
 * Skip blanks, line continuations and a trailing comment between tokens.
 * Stops at a line terminator, which is a token of its own.
 */
export function skipBlanks(state: TokenizerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isBlank(ch) || (ch === '\r' && peek(state, 1) === '\n')) {
      state.pos++;
      continue;
    }
    const continuation = continuationLength(state);
    if (continuation > 0) {
      advanceLine(state, continuation);
      continue;
    }
    if (ch === '#') {
      while (!isAtEnd(state) && newlineLength(state) === 0) state.pos++;
      continue;
    }
    break;
  }
}

/**
 * Measure the indentation of the next line that carries a token.
 * Blank lines and comment-only lines are passed over whole. At the end of
 * the buffer the indentation is 0, which closes every open block.
 */
export function measureIndent(state: TokenizerState): void {
  for (;;) {
    let p = state.pos;
    while (isBlank(state.source[p] ?? '')) p++;
    state.pos = p;

    if (isAtEnd(state)) {
      state.curIndent = 0;
      return;
    }

    const nl = newlineLength(state);
    if (nl > 0) {
      advanceLine(state, nl);
      continue;
    }

    if (peek(state) === '#') {
      while (!isAtEnd(state) && newlineLength(state) === 0) state.pos++;
      const end = newlineLength(state);
      if (end > 0) advanceLine(state, end);
      continue;
    }

    state.curIndent = state.pos - state.lineStart;
    return;
  }
}

/**
 * Read a name or path starting at the cursor and return its end offset.
 *
 * Manifest dialect: `$` always travels with the next character, and a
 * `${name}` reference is taken whole, so `$:` and `$ ` do not end the
 * path. Makefile dialect: `\ ` and `\#` are escaped characters.
 */
export function readIdentifier(state: TokenizerState): number {
  const start = state.pos;

  while (!isAtEnd(state)) {
    const ch = peek(state);

    if (continuationLength(state) > 0) break;

    if (ch === '$' && isManifest(state)) {
      const next = peek(state, 1);
      if (next === '') {
        throw new LexerError(
          'NINJA-L002',
          { escape: '$' },
          currentLocation(state),
          { file: state.file }
        );
      }
      if (next === '{') {
        let close = state.pos + 2;
        while (
          close < state.source.length &&
          state.source[close] !== '}' &&
          state.source[close] !== '\n'
        ) {
          close++;
        }
        if (state.source[close] !== '}') {
          throw new LexerError(
            'NINJA-L001',
            { text: state.source.slice(start, close) },
            currentLocation(state),
            { file: state.file }
          );
        }
        state.pos = close + 1;
        continue;
      }
      state.pos += 2;
      continue;
    }

    if (ch === '\\' && !isManifest(state)) {
      const next = peek(state, 1);
      state.pos += next === ' ' || next === '#' ? 2 : 1;
      continue;
    }

    if (!isIdentifierChar(ch)) break;
    state.pos++;
  }

  return state.pos;
}

/** Raw text of a line, with the source offset of every character */
export interface RawLine {
  readonly text: string;
  readonly offsets: readonly number[];
}

/**
 * Read raw characters up to the end of the logical line and consume its
 * terminator. Leading blanks are skipped. Continuations are folded in
 * without a newline character; in manifest dialect the blanks that indent
 * a continued line are dropped and every other `$` pair is kept verbatim.
 *
 * @throws LexerError (NINJA-L003) when the text grows past `maxLength`
 */
export function readRawLine(
  state: TokenizerState,
  maxLength: number
): RawLine {
  let text = '';
  const offsets: number[] = [];

  const push = (ch: string): void => {
    if (text.length >= maxLength) {
      throw new LexerError(
        'NINJA-L003',
        { maxLength },
        currentLocation(state),
        { file: state.file }
      );
    }
    text += ch;
    offsets.push(state.pos);
    state.pos++;
  };

  while (isBlank(peek(state))) state.pos++;

  while (!isAtEnd(state)) {
    const nl = newlineLength(state);
    if (nl > 0) {
      advanceLine(state, nl);
      return { text, offsets };
    }

    const continuation = continuationLength(state);
    if (continuation > 0) {
      advanceLine(state, continuation);
      if (isManifest(state)) {
        while (isBlank(peek(state))) state.pos++;
      }
      continue;
    }

    if (peek(state) === '$' && isManifest(state) && peek(state, 1) !== '') {
      push('$');
      push(peek(state));
      continue;
    }

    push(peek(state));
  }

  return { text, offsets };
}
