/**
 * Tokenizer
 * One-token-lookahead scanner shared by the manifest and makefile grammars
 */

import {
  DIALECTS,
  describeTokenType,
  locationAt,
  makeLocation,
  ParseError,
  TOKEN_TYPES,
  type Dialect,
  type SourceLocation,
  type Token,
  type TokenType,
} from '../types.js';
import { describeToken } from './helpers.js';
import {
  measureIndent,
  readIdentifier,
  readRawLine,
  skipBlanks,
  type RawLine,
} from './readers.js';
import {
  advanceLine,
  createTokenizerState,
  currentLocation,
  isAtEnd,
  isManifest,
  mark,
  NO_TOKEN,
  newlineLength,
  peek,
  restore,
  type TokenizerState,
} from './state.js';

/**
 * Scans a source buffer into tokens on demand.
 *
 * Tokens are views into the buffer, so the buffer handed to `start()`
 * backs every token and every string read through this tokenizer until
 * the next `start()`.
 *
 * @example
 * ```typescript
 * const tokenizer = new Tokenizer();
 * tokenizer.start('build out.o: cc in.c\n');
 * tokenizer.expectIdent('build');
 * tokenizer.readIdent(); // 'out.o'
 * tokenizer.peekToken(); // 'COLON'
 * ```
 */
export class Tokenizer {
  readonly dialect: Dialect;
  private state: TokenizerState;

  constructor(dialect: Dialect = DIALECTS.MANIFEST) {
    this.dialect = dialect;
    this.state = createTokenizerState('', dialect);
  }

  /** Reset all state to scan `source` from its first character */
  start(source: string, file?: string): void {
    this.state = createTokenizerState(source, this.dialect, file);
  }

  get source(): string {
    return this.state.source;
  }

  /** 1-based number of the physical line the cursor is on */
  get lineNumber(): number {
    return this.state.lineIndex + 1;
  }

  /** Indentation of the most recently measured line */
  get currentIndent(): number {
    return this.state.curIndent;
  }

  /** Indentation established for the block being scanned */
  get blockIndent(): number {
    return this.state.lastIndent;
  }

  // ============================================================
  // LOOKAHEAD
  // ============================================================

  /** The cached token (type NONE when nothing is cached) */
  token(): Token {
    return this.state.token;
  }

  peekToken(): TokenType {
    if (this.state.token.type !== TOKEN_TYPES.NONE) {
      return this.state.token.type;
    }
    this.state.tokenMark = mark(this.state);
    return this.scan();
  }

  consumeToken(): void {
    this.state.token = NO_TOKEN;
    this.state.tokenMark = undefined;
  }

  /** Text of the cached token, unescaped for makefile paths */
  tokenText(): string {
    const { start, end } = this.state.token;
    const raw = this.state.source.slice(start, end);
    if (isManifest(this.state)) return raw;
    return raw.replace(/\\([ #])/g, '$1').replace(/\$\$/g, '$');
  }

  // ============================================================
  // EXPECTATIONS
  // ============================================================

  expectToken(expected: TokenType): void {
    if (this.peekToken() !== expected) {
      throw this.errorExpected(describeTokenType(expected));
    }
    this.consumeToken();
  }

  expectIdent(expected: string): void {
    if (
      this.peekToken() !== TOKEN_TYPES.IDENT ||
      this.tokenText() !== expected
    ) {
      throw this.errorExpected(`'${expected}'`);
    }
    this.consumeToken();
  }

  /**
   * Consume an identifier and return its text.
   * Returns undefined, consuming nothing, when the next token is not one.
   */
  readIdent(): string | undefined {
    if (this.peekToken() !== TOKEN_TYPES.IDENT) return undefined;
    const text = this.tokenText();
    this.consumeToken();
    return text;
  }

  newline(): void {
    this.expectToken(TOKEN_TYPES.NEWLINE);
  }

  /**
   * Read the rest of the logical line as raw text and consume its
   * terminator. A token peeked but not consumed is read again as text,
   * except a peeked NEWLINE, which ends an empty line where it stands.
   */
  readToNewline(maxLength: number = Number.POSITIVE_INFINITY): RawLine {
    if (this.state.token.type === TOKEN_TYPES.NEWLINE) {
      this.consumeToken();
      return { text: '', offsets: [] };
    }
    this.rewind();
    const line = readRawLine(this.state, maxLength);
    this.state.lineHasContent = false;
    if (isManifest(this.state)) this.state.atLineStart = true;
    return line;
  }

  /**
   * Skip blanks at the cursor. With `newlines`, also skip NEWLINE tokens;
   * blank and comment lines produce those in makefile dialect and nothing
   * at all in manifest dialect.
   */
  skipWhitespace(newlines = false): void {
    if (newlines) {
      while (this.peekToken() === TOKEN_TYPES.NEWLINE) this.consumeToken();
      return;
    }
    if (this.state.token.type === TOKEN_TYPES.NONE) skipBlanks(this.state);
  }

  // ============================================================
  // DIAGNOSTICS
  // ============================================================

  /** Location of the cached token, or of the cursor when none is cached */
  location(): SourceLocation {
    if (this.state.token.type !== TOKEN_TYPES.NONE) {
      return this.state.tokenLocation;
    }
    return currentLocation(this.state);
  }

  locationAt(offset: number): SourceLocation {
    return locationAt(this.state.source, offset);
  }

  /** Describe the next token the way diagnostics quote it */
  describeNext(): string {
    const type = this.peekToken();
    return describeToken(type, this.tokenText());
  }

  error(
    errorId: string,
    context: Record<string, unknown> = {},
    location: SourceLocation = this.location(),
    cause?: unknown
  ): ParseError {
    return new ParseError(errorId, context, location, {
      file: this.state.file,
      cause,
    });
  }

  /** "expected X, got Y" located at the next token */
  errorExpected(expected: string): ParseError {
    const actual = this.describeNext();
    return this.error('NINJA-P001', { expected, actual });
  }

  // ============================================================
  // SCANNING
  // ============================================================

  private rewind(): void {
    if (this.state.tokenMark) restore(this.state, this.state.tokenMark);
    this.consumeToken();
  }

  private setToken(type: TokenType, start: number, end: number): TokenType {
    this.state.token = { type, start, end };
    this.state.tokenLocation = makeLocation(
      this.state.lineIndex,
      this.state.lineStart,
      start
    );
    return type;
  }

  private scan(): TokenType {
    const state = this.state;

    if (isManifest(state)) {
      if (state.atLineStart) {
        measureIndent(state);
        state.atLineStart = false;
        state.indentPending = true;
      }
      const indentToken = this.reconcileIndent();
      if (indentToken) return indentToken;
    }

    skipBlanks(state);
    const start = state.pos;

    if (isAtEnd(state)) {
      if (state.lineHasContent) {
        state.lineHasContent = false;
        if (isManifest(state)) state.atLineStart = true;
        return this.setToken(TOKEN_TYPES.NEWLINE, start, start);
      }
      return this.setToken(TOKEN_TYPES.EOF, start, start);
    }

    const nl = newlineLength(state);
    if (nl > 0) {
      this.setToken(TOKEN_TYPES.NEWLINE, start, start + nl);
      advanceLine(state, nl);
      state.lineHasContent = false;
      if (isManifest(state)) state.atLineStart = true;
      return TOKEN_TYPES.NEWLINE;
    }

    state.lineHasContent = true;
    const ch = peek(state);

    if (ch === '=') {
      state.pos++;
      return this.setToken(TOKEN_TYPES.EQUALS, start, state.pos);
    }
    if (ch === ':') {
      state.pos++;
      return this.setToken(TOKEN_TYPES.COLON, start, state.pos);
    }
    if (ch === '|') {
      const type =
        peek(state, 1) === '|' ? TOKEN_TYPES.PIPE2 : TOKEN_TYPES.PIPE;
      state.pos += type === TOKEN_TYPES.PIPE2 ? 2 : 1;
      return this.setToken(type, start, state.pos);
    }

    const end = readIdentifier(state);
    if (end > start) {
      return this.setToken(TOKEN_TYPES.IDENT, start, end);
    }

    state.pos++;
    return this.setToken(TOKEN_TYPES.UNKNOWN, start, state.pos);
  }

  /**
   * Compare the measured indentation with the enclosing blocks. Deeper
   * opens one block; shallower closes one block per call until the
   * columns agree.
   */
  private reconcileIndent(): TokenType | undefined {
    const state = this.state;
    if (!state.indentPending) return undefined;

    if (state.curIndent > state.lastIndent) {
      state.indentStack.push(state.lastIndent);
      state.lastIndent = state.curIndent;
      state.indentPending = false;
      return this.setToken(TOKEN_TYPES.INDENT, state.pos, state.pos);
    }
    if (state.curIndent < state.lastIndent) {
      state.lastIndent = state.indentStack.pop() ?? 0;
      return this.setToken(TOKEN_TYPES.OUTDENT, state.pos, state.pos);
    }

    state.indentPending = false;
    return undefined;
  }
}
