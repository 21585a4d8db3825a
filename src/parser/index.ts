/**
 * Parser Module
 * Manifest and depfile parsers plus one-call entry points
 */

import { ManifestState } from '../graph/state.js';
import { InMemoryFileReader } from '../files/reader.js';
import type { FileReader } from '../types.js';
import { ManifestParser, type ManifestParserOptions } from './parser.js';
import { MakefileParser, type Depfile } from './makefile-parser.js';

// Load grammar methods onto ManifestParser.prototype
import './parser-script.js';
import './parser-let.js';
import './parser-decls.js';
import './parser-edge.js';
import './parser-include.js';

export {
  DEFAULT_MAX_INCLUDE_DEPTH,
  ManifestParser,
  type IncludeContext,
  type ManifestParserOptions,
} from './parser.js';
export { KEYWORDS, type Keyword } from './parser-script.js';
export type { LetStatement } from './parser-let.js';
export { MakefileParser, type Depfile } from './makefile-parser.js';

/**
 * Parse manifest text into a fresh ManifestState. Include and subninja
 * statements read through `fileReader`, which defaults to an empty
 * in-memory reader.
 */
export function parseManifest(
  input: string,
  options: ManifestParserOptions & { fileReader?: FileReader } = {}
): ManifestState {
  const { fileReader = new InMemoryFileReader(), ...parserOptions } = options;
  const state = new ManifestState();
  new ManifestParser(state, fileReader, parserOptions).parse(input);
  return state;
}

/** Read `filename` through `fileReader` and parse it into a ManifestState */
export function loadManifest(
  filename: string,
  fileReader: FileReader,
  options: ManifestParserOptions = {}
): ManifestState {
  const state = new ManifestState();
  new ManifestParser(state, fileReader, options).load(filename);
  return state;
}

export function parseDepfile(input: string, filename?: string): Depfile {
  return new MakefileParser().parse(input, filename);
}
