/**
 * Lexer Helper Functions
 * Character classification and token description
 */

import { describeTokenType, TOKEN_TYPES, type TokenType } from '../types.js';

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/** Characters allowed in names and paths */
export function isIdentifierChar(ch: string): boolean {
  if (ch === '') return false;
  return (
    isLetter(ch) ||
    isDigit(ch) ||
    '_-./+,@~%$\\'.includes(ch) ||
    ch.charCodeAt(0) >= 0x80
  );
}

/** Characters allowed in a `$name` reference */
export function isVarNameChar(ch: string): boolean {
  return ch !== '' && (isLetter(ch) || isDigit(ch) || ch === '_' || ch === '-');
}

/** Characters allowed in a `${name}` reference */
export function isBracedVarNameChar(ch: string): boolean {
  return isVarNameChar(ch) || ch === '.';
}

export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Describe an actual token for "expected X, got Y" messages.
 * Identifiers and unknown characters quote their text.
 */
export function describeToken(type: TokenType, text: string): string {
  if (type === TOKEN_TYPES.IDENT) return `'${text}'`;
  if (type === TOKEN_TYPES.UNKNOWN) return `unknown '${text}'`;
  return describeTokenType(type);
}
