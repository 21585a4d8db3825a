/**
 * Parser Extension: File Inclusion
 * include and subninja statements
 */

import {
  EvaluationError,
  formatDiagnostic,
  NinjaError,
  TOKEN_TYPES,
  type SourceLocation,
} from '../types.js';
import { ManifestParser } from './parser.js';

// Declaration merging to add methods to ManifestParser interface
declare module './parser.js' {
  interface ManifestParser {
    parseFileInclude(): void;
    readIncludePath(location: SourceLocation): string;
  }
}

/** Message of a nested failure, with its position but without a file */
function describeNested(err: NinjaError): string {
  const data = err.toData();
  return data.location
    ? formatDiagnostic(data.message, data.location)
    : data.message;
}

/**
 * include PATH   parse PATH into the current scope
 * subninja PATH  parse PATH into a new child scope
 *
 * PATH is a single path token, expanded against the current scope
 * straight away. The nested file is loaded to completion before this file
 * continues.
 */
ManifestParser.prototype.parseFileInclude = function (
  this: ManifestParser
): void {
  const location: SourceLocation = this.tokenizer.location();
  const kind =
    this.tokenizer.readIdent() === 'subninja' ? 'subninja' : 'include';

  const path = this.readIncludePath(location);
  this.tokenizer.newline();

  const depth = this.include.depth + 1;
  if (depth > this.maxIncludeDepth) {
    throw this.tokenizer.error(
      'NINJA-P013',
      { maxDepth: this.maxIncludeDepth },
      location
    );
  }

  const chain =
    this.file === undefined ? [] : [...this.include.chain, this.file];
  if (chain.includes(path)) {
    const cycle = [...chain, path].join(' -> ');
    throw this.tokenizer.error('NINJA-P012', { cycle }, location);
  }

  this.callbacks.onInclude?.({ kind, path, depth });

  const subparser = new ManifestParser(
    this.graph,
    this.fileReader,
    {
      scope: kind === 'subninja' ? this.scope.createChild() : this.scope,
      callbacks: this.callbacks,
      maxIncludeDepth: this.maxIncludeDepth,
      maxValueLength: this.maxValueLength,
    },
    { depth, chain }
  );

  try {
    subparser.load(path);
  } catch (err) {
    if (!(err instanceof NinjaError)) throw err;

    // Unreadable file: report it at this include line
    if (err.errorId === 'NINJA-P008' && err.location === undefined) {
      throw this.tokenizer.error(
        'NINJA-P008',
        err.context ?? {},
        location,
        err.cause
      );
    }
    throw this.tokenizer.error(
      'NINJA-P009',
      { path, reason: describeNested(err) },
      location,
      err
    );
  }
};

/**
 * Read the path token after `include`/`subninja` and expand it. Expansion
 * errors are reported at the include line.
 */
ManifestParser.prototype.readIncludePath = function (
  this: ManifestParser,
  location: SourceLocation
): string {
  if (this.tokenizer.peekToken() !== TOKEN_TYPES.IDENT) {
    throw this.tokenizer.errorExpected('path to manifest file');
  }
  const { start, end } = this.tokenizer.token();
  const text = this.tokenizer.tokenText();
  this.tokenizer.consumeToken();

  const offsets = Array.from({ length: end - start }, (_, i) => start + i);
  const value = this.decomposeValue({ text, offsets });

  let path: string;
  try {
    path = this.scope.evaluate(value);
  } catch (err) {
    if (!(err instanceof EvaluationError)) throw err;
    throw new EvaluationError(err.errorId, err.context ?? {}, location, {
      file: this.file,
      cause: err,
    });
  }

  if (path === '') {
    throw this.tokenizer.error('NINJA-P011', {}, location);
  }
  return path;
};
