/**
 * Parser Extension: Build Edges
 * build OUT+ : RULE IN* [| IMPLICIT+] [|| ORDER_ONLY+]
 */

import { TOKEN_TYPES } from '../types.js';
import { ManifestParser } from './parser.js';

// Declaration merging to add methods to ManifestParser interface
declare module './parser.js' {
  interface ManifestParser {
    parseEdge(): void;
    readPathList(): string[];
  }
}

ManifestParser.prototype.parseEdge = function (this: ManifestParser): void {
  const location = this.tokenizer.location();
  this.tokenizer.expectIdent('build');

  const outputs = this.readPathList();
  if (outputs.length === 0) {
    throw this.tokenizer.errorExpected('output name');
  }
  this.tokenizer.expectToken(TOKEN_TYPES.COLON);

  const ruleLocation = this.tokenizer.location();
  const ruleName = this.tokenizer.readIdent();
  if (ruleName === undefined) {
    throw this.tokenizer.errorExpected('rule name');
  }
  const rule = this.graph.lookupRule(ruleName);
  if (!rule) {
    throw this.tokenizer.error('NINJA-P007', { name: ruleName }, ruleLocation);
  }

  const inputs = this.readPathList();

  let implicitInputs: string[] = [];
  if (this.tokenizer.peekToken() === TOKEN_TYPES.PIPE) {
    this.tokenizer.consumeToken();
    implicitInputs = this.readPathList();
    if (implicitInputs.length === 0) {
      throw this.tokenizer.errorExpected('input name');
    }
  }

  let orderOnlyInputs: string[] = [];
  if (this.tokenizer.peekToken() === TOKEN_TYPES.PIPE2) {
    this.tokenizer.consumeToken();
    orderOnlyInputs = this.readPathList();
    if (orderOnlyInputs.length === 0) {
      throw this.tokenizer.errorExpected('input name');
    }
  }

  this.tokenizer.newline();

  const scope = rule.scope.createChild();
  if (this.tokenizer.peekToken() === TOKEN_TYPES.INDENT) {
    this.tokenizer.consumeToken();
    this.parseBindingBlock(scope);
  }

  this.graph.addEdge({
    outputs,
    rule,
    inputs,
    implicitInputs,
    orderOnlyInputs,
    scope,
    location,
    file: this.file,
  });
  this.recordDeclaration('edge', outputs[0] ?? '', location);
};

/** Consume identifiers up to the first token that is not one */
ManifestParser.prototype.readPathList = function (
  this: ManifestParser
): string[] {
  const paths: string[] = [];
  for (
    let path = this.tokenizer.readIdent();
    path !== undefined;
    path = this.tokenizer.readIdent()
  ) {
    paths.push(path);
  }
  return paths;
};
