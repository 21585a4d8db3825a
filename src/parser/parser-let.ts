/**
 * Parser Extension: Bindings
 * key = value statements, value decomposition and indented binding blocks
 */

import { EvalStringBuilder } from '../env/eval-string.js';
import type { BindingScope } from '../env/scope.js';
import type { RawLine } from '../lexer/index.js';
import { isBracedVarNameChar, isVarNameChar } from '../lexer/helpers.js';
import {
  TOKEN_TYPES,
  type EvalString,
  type SourceLocation,
} from '../types.js';
import { ManifestParser } from './parser.js';

/** A parsed key = value statement */
export interface LetStatement {
  readonly key: string;
  readonly value: EvalString;
  readonly location: SourceLocation;
}

// Declaration merging to add methods to ManifestParser interface
declare module './parser.js' {
  interface ManifestParser {
    parseLet(): LetStatement;
    parseLetKey(): string;
    parseLetValue(): EvalString;
    decomposeValue(line: RawLine): EvalString;
    parseBindingBlock(scope: BindingScope): void;
  }
}

// ============================================================
// KEY = VALUE
// ============================================================

ManifestParser.prototype.parseLet = function (
  this: ManifestParser
): LetStatement {
  const location = this.tokenizer.location();
  const key = this.parseLetKey();
  const value = this.parseLetValue();
  return { key, value, location };
};

/** Parse the "key =" half of a binding */
ManifestParser.prototype.parseLetKey = function (this: ManifestParser): string {
  const key = this.tokenizer.readIdent();
  if (key === undefined) {
    throw this.tokenizer.errorExpected('variable name');
  }
  this.tokenizer.expectToken(TOKEN_TYPES.EQUALS);
  return key;
};

/**
 * Parse the value half of a binding, up to and including the line
 * terminator, into literal runs and variable references. Nothing is
 * expanded here.
 */
ManifestParser.prototype.parseLetValue = function (
  this: ManifestParser
): EvalString {
  const line = this.tokenizer.readToNewline(this.maxValueLength);
  return this.decomposeValue(line);
};

ManifestParser.prototype.decomposeValue = function (
  this: ManifestParser,
  line: RawLine
): EvalString {
  const { text, offsets } = line;
  const builder = new EvalStringBuilder();
  const badEscape = (index: number): Error =>
    this.tokenizer.error(
      'NINJA-P004',
      {},
      this.tokenizer.locationAt(offsets[index] ?? 0)
    );

  let i = 0;
  while (i < text.length) {
    const dollar = text.indexOf('$', i);
    if (dollar === -1) {
      builder.addText(text.slice(i));
      break;
    }
    builder.addText(text.slice(i, dollar));

    const next = text[dollar + 1] ?? '';
    if (next === '$' || next === ' ' || next === ':') {
      builder.addText(next);
      i = dollar + 2;
    } else if (next === '{') {
      let end = dollar + 2;
      while (isBracedVarNameChar(text[end] ?? '')) end++;
      if (text[end] !== '}' || end === dollar + 2) throw badEscape(dollar);
      builder.addVariable(text.slice(dollar + 2, end));
      i = end + 1;
    } else if (isVarNameChar(next)) {
      let end = dollar + 1;
      while (isVarNameChar(text[end] ?? '')) end++;
      builder.addVariable(text.slice(dollar + 1, end));
      i = end;
    } else {
      throw badEscape(dollar);
    }
  }

  return builder.build();
};

// ============================================================
// BINDING BLOCKS
// ============================================================

/**
 * Parse indented key = value lines into `scope` until the block's
 * OUTDENT. The INDENT that opens the block is already consumed.
 */
ManifestParser.prototype.parseBindingBlock = function (
  this: ManifestParser,
  scope: BindingScope
): void {
  while (this.tokenizer.peekToken() !== TOKEN_TYPES.OUTDENT) {
    if (this.tokenizer.peekToken() === TOKEN_TYPES.INDENT) {
      throw this.tokenizer.error('NINJA-P003');
    }
    const { key, value } = this.parseLet();
    scope.define(key, value);
  }
  this.tokenizer.consumeToken();
};
