/**
 * Parser Extension: Declarations
 * rule, pool and default statements
 */

import { TOKEN_TYPES } from '../types.js';
import { ManifestParser } from './parser.js';

// Declaration merging to add methods to ManifestParser interface
declare module './parser.js' {
  interface ManifestParser {
    parseRule(): void;
    parsePool(): void;
    parseDefault(): void;
  }
}

/**
 * rule NAME
 *   key = value
 *   ...
 */
ManifestParser.prototype.parseRule = function (this: ManifestParser): void {
  const location = this.tokenizer.location();
  this.tokenizer.expectIdent('rule');

  const nameLocation = this.tokenizer.location();
  const name = this.tokenizer.readIdent();
  if (name === undefined) {
    throw this.tokenizer.errorExpected('rule name');
  }
  this.tokenizer.newline();

  if (this.graph.lookupRule(name) !== undefined) {
    throw this.tokenizer.error('NINJA-P005', { name }, nameLocation);
  }

  this.tokenizer.expectToken(TOKEN_TYPES.INDENT);
  const scope = this.scope.createChild();
  this.parseBindingBlock(scope);

  if (!scope.hasOwn('command')) {
    throw this.tokenizer.error('NINJA-P006', {}, location);
  }

  this.graph.addRule({ name, scope, location, file: this.file });
  this.recordDeclaration('rule', name, location);
};

/**
 * pool NAME
 *   depth = N
 */
ManifestParser.prototype.parsePool = function (this: ManifestParser): void {
  const location = this.tokenizer.location();
  this.tokenizer.expectIdent('pool');

  const nameLocation = this.tokenizer.location();
  const name = this.tokenizer.readIdent();
  if (name === undefined) {
    throw this.tokenizer.errorExpected('pool name');
  }
  this.tokenizer.newline();

  if (this.graph.lookupPool(name) !== undefined) {
    throw this.tokenizer.error('NINJA-P010', { name }, nameLocation);
  }

  this.tokenizer.expectToken(TOKEN_TYPES.INDENT);
  const scope = this.scope.createChild();
  this.parseBindingBlock(scope);

  this.graph.addPool({ name, scope, location, file: this.file });
  this.recordDeclaration('pool', name, location);
};

/** default TARGET+ */
ManifestParser.prototype.parseDefault = function (this: ManifestParser): void {
  const location = this.tokenizer.location();
  this.tokenizer.expectIdent('default');

  const targets: string[] = [];
  for (
    let target = this.tokenizer.readIdent();
    target !== undefined;
    target = this.tokenizer.readIdent()
  ) {
    targets.push(target);
  }
  if (targets.length === 0) {
    throw this.tokenizer.errorExpected('target name');
  }
  this.tokenizer.newline();

  this.graph.addDefaults({ targets, location, file: this.file });
  this.recordDeclaration('default', targets.join(' '), location);
};
