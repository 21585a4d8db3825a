/**
 * Makefile Parser
 * Dependency listings written by compilers: `target: prereq prereq ...`
 */

import { Tokenizer } from '../lexer/index.js';
import { DIALECTS, TOKEN_TYPES } from '../types.js';

/** Result of parsing a dependency listing */
export interface Depfile {
  readonly target: string;
  readonly prerequisites: readonly string[];
}

/**
 * Parses the first `target: prerequisites` statement of a depfile.
 * Anything after that statement is ignored.
 *
 * @example
 * ```typescript
 * const parser = new MakefileParser();
 * parser.parse('out.o: a.h \\\n  b.h\n');
 * parser.target;        // 'out.o'
 * parser.prerequisites; // ['a.h', 'b.h']
 * ```
 */
export class MakefileParser {
  readonly tokenizer = new Tokenizer(DIALECTS.MAKEFILE);
  target = '';
  prerequisites: string[] = [];

  /**
   * @throws ParseError when the buffer does not start with `target:`
   */
  parse(input: string, filename?: string): Depfile {
    this.target = '';
    this.prerequisites = [];
    this.tokenizer.start(input, filename);
    this.tokenizer.skipWhitespace(true);

    const target = this.tokenizer.readIdent();
    if (target === undefined) {
      throw this.tokenizer.errorExpected('output filename');
    }
    this.tokenizer.expectToken(TOKEN_TYPES.COLON);

    const prerequisites: string[] = [];
    for (;;) {
      const type = this.tokenizer.peekToken();
      if (type === TOKEN_TYPES.NEWLINE || type === TOKEN_TYPES.EOF) break;
      const prerequisite = this.tokenizer.readIdent();
      if (prerequisite === undefined) {
        throw this.tokenizer.errorExpected('newline');
      }
      prerequisites.push(prerequisite);
    }

    this.target = target;
    this.prerequisites = prerequisites;
    return { target, prerequisites };
  }
}
