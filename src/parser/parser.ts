/**
 * Manifest Parser Class - Core
 *
 * Defines the ManifestParser class structure. Grammar methods are added via
 * prototype extension from separate modules, using TypeScript declaration
 * merging for type safety:
 * - parser-script.ts: top-level statement loop
 * - parser-let.ts: key = value bindings and value decomposition
 * - parser-decls.ts: rule, pool and default statements
 * - parser-edge.ts: build statements
 * - parser-include.ts: include and subninja
 */

import type { BindingScope } from '../env/scope.js';
import { Tokenizer } from '../lexer/index.js';
import {
  createError,
  DIALECTS,
  type DeclarationKind,
  type FileReader,
  type ManifestGraph,
  type ObservabilityCallbacks,
  type SourceLocation,
} from '../types.js';

export const DEFAULT_MAX_INCLUDE_DEPTH = 64;

export interface ManifestParserOptions {
  /** Scope for top-level bindings; defaults to the graph's root scope */
  scope?: BindingScope | undefined;
  callbacks?: ObservabilityCallbacks | undefined;
  /** Deepest include/subninja nesting accepted */
  maxIncludeDepth?: number | undefined;
  /** Longest binding value accepted, in characters */
  maxValueLength?: number | undefined;
}

/**
 * Position of a parser in the include hierarchy.
 * @internal
 */
export interface IncludeContext {
  readonly depth: number;
  /** Files being loaded, outermost first */
  readonly chain: readonly string[];
}

/**
 * Parses manifests into declarations registered with a ManifestGraph.
 * Fails on the first error; declarations registered before it stay.
 *
 * @example
 * ```typescript
 * const state = new ManifestState();
 * const parser = new ManifestParser(state, new NodeFileReader());
 * parser.load('build.ninja');
 * state.edges.length;
 * ```
 */
export class ManifestParser {
  readonly graph: ManifestGraph;
  readonly fileReader: FileReader;
  readonly scope: BindingScope;
  readonly tokenizer = new Tokenizer(DIALECTS.MANIFEST);
  readonly callbacks: ObservabilityCallbacks;
  readonly maxIncludeDepth: number;
  readonly maxValueLength: number;
  readonly include: IncludeContext;
  /** File being parsed, when known */
  file: string | undefined;
  /** Declarations registered by the current parse() */
  declarationCount = 0;

  constructor(
    graph: ManifestGraph,
    fileReader: FileReader,
    options: ManifestParserOptions = {},
    include: IncludeContext = { depth: 0, chain: [] }
  ) {
    this.graph = graph;
    this.fileReader = fileReader;
    this.scope = options.scope ?? graph.bindings;
    this.callbacks = options.callbacks ?? {};
    this.maxIncludeDepth = options.maxIncludeDepth ?? DEFAULT_MAX_INCLUDE_DEPTH;
    this.maxValueLength =
      options.maxValueLength ?? Number.POSITIVE_INFINITY;
    this.include = include;
  }

  /**
   * Read `filename` through the file reader and parse it.
   *
   * @throws NinjaError (NINJA-P008) when the file cannot be read
   */
  load(filename: string): void {
    let content: string;
    try {
      content = this.fileReader.readFile(filename);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw createError('NINJA-P008', { path: filename, reason }, undefined, {
        cause: err,
      });
    }
    this.parse(content, filename);
  }

  /** Parse `input` with a fresh tokenizer */
  parse(input: string, filename?: string): void {
    this.file = filename;
    this.declarationCount = 0;
    this.tokenizer.start(input, filename);

    const startedAt = performance.now();
    this.callbacks.onFileStart?.({ file: filename, depth: this.include.depth });

    this.parseManifest();

    this.callbacks.onFileEnd?.({
      file: filename,
      depth: this.include.depth,
      declarations: this.declarationCount,
      durationMs: performance.now() - startedAt,
    });
  }

  /** Count a registration and report it to observers */
  recordDeclaration(
    kind: DeclarationKind,
    name: string,
    location: SourceLocation
  ): void {
    this.declarationCount++;
    this.callbacks.onDeclaration?.({ kind, name, location, file: this.file });
  }
}
