/**
 * Lexer Module
 * Converts source text into tokens
 */

import { DIALECTS, TOKEN_TYPES, type Dialect, type Token } from '../types.js';
import { Tokenizer } from './tokenizer.js';

export { LexerError } from '../types.js';
export { Tokenizer } from './tokenizer.js';
export type { RawLine } from './readers.js';
export { createTokenizerState, type TokenizerState } from './state.js';

/**
 * Scan `source` to the end and return every token, EOF included.
 * Intended for tooling and tests; the parsers pull tokens on demand.
 */
export function tokenize(
  source: string,
  dialect: Dialect = DIALECTS.MANIFEST
): Token[] {
  const tokenizer = new Tokenizer(dialect);
  tokenizer.start(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    tokenizer.peekToken();
    token = tokenizer.token();
    tokens.push(token);
    tokenizer.consumeToken();
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
