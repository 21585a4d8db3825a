/**
 * Parser Extension: Top Level
 * Statement dispatch for a whole manifest file
 */

import { TOKEN_TYPES } from '../types.js';
import { ManifestParser } from './parser.js';

/** Keywords that start a top-level statement */
export const KEYWORDS = [
  'rule',
  'build',
  'default',
  'pool',
  'include',
  'subninja',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

function isKeyword(text: string): text is Keyword {
  return (KEYWORDS as readonly string[]).includes(text);
}

// Declaration merging to add methods to ManifestParser interface
declare module './parser.js' {
  interface ManifestParser {
    parseManifest(): void;
    parseStatement(keyword: Keyword): void;
    parseAssignment(): void;
  }
}

ManifestParser.prototype.parseManifest = function (this: ManifestParser): void {
  for (;;) {
    switch (this.tokenizer.peekToken()) {
      case TOKEN_TYPES.EOF:
        return;
      case TOKEN_TYPES.NEWLINE:
        this.tokenizer.consumeToken();
        break;
      case TOKEN_TYPES.INDENT:
        throw this.tokenizer.error('NINJA-P003');
      case TOKEN_TYPES.IDENT: {
        const text = this.tokenizer.tokenText();
        if (isKeyword(text)) {
          this.parseStatement(text);
        } else {
          this.parseAssignment();
        }
        break;
      }
      default:
        throw this.tokenizer.error('NINJA-P002', {
          token: this.tokenizer.describeNext(),
        });
    }
  }
};

ManifestParser.prototype.parseStatement = function (
  this: ManifestParser,
  keyword: Keyword
): void {
  switch (keyword) {
    case 'rule':
      this.parseRule();
      return;
    case 'build':
      this.parseEdge();
      return;
    case 'default':
      this.parseDefault();
      return;
    case 'pool':
      this.parsePool();
      return;
    case 'include':
    case 'subninja':
      this.parseFileInclude();
      return;
  }
};

/** Top-level `key = value` in the current scope */
ManifestParser.prototype.parseAssignment = function (
  this: ManifestParser
): void {
  const { key, value, location } = this.parseLet();
  this.scope.define(key, value);
  this.recordDeclaration('binding', key, location);
};
