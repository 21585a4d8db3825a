/**
 * Manifest Types
 * Tokens, errors, declarations and the capabilities the parser drives
 */

import type { BindingScope } from './env/scope.js';
import type { SourceLocation } from './source-location.js';

export * from './source-location.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';

// ============================================================
// EVAL STRINGS
// ============================================================

/** Literal text inside a binding value */
export interface LiteralPart {
  readonly kind: 'literal';
  readonly text: string;
}

/** A `$name` or `${name}` reference inside a binding value */
export interface VariablePart {
  readonly kind: 'variable';
  readonly name: string;
}

export type EvalPart = LiteralPart | VariablePart;

/**
 * Unevaluated binding value: literal runs interleaved with variable
 * references, in source order. Adjacent literal runs are merged.
 */
export interface EvalString {
  readonly parts: readonly EvalPart[];
}

// ============================================================
// DECLARATIONS
// ============================================================

export interface RuleDeclaration {
  readonly name: string;
  /** Raw bindings of the rule body */
  readonly scope: BindingScope;
  readonly location?: SourceLocation | undefined;
  readonly file?: string | undefined;
}

export interface EdgeDeclaration {
  readonly outputs: readonly string[];
  readonly rule: RuleDeclaration;
  readonly inputs: readonly string[];
  readonly implicitInputs: readonly string[];
  readonly orderOnlyInputs: readonly string[];
  /** Per-edge overrides; a child of the rule's scope */
  readonly scope: BindingScope;
  readonly location?: SourceLocation | undefined;
  readonly file?: string | undefined;
}

export interface PoolDeclaration {
  readonly name: string;
  readonly scope: BindingScope;
  readonly location?: SourceLocation | undefined;
  readonly file?: string | undefined;
}

export interface DefaultDeclaration {
  readonly targets: readonly string[];
  readonly location?: SourceLocation | undefined;
  readonly file?: string | undefined;
}

// ============================================================
// CAPABILITIES
// ============================================================

/**
 * Build graph capability. The parser registers declarations here and asks
 * it for rules and pools; identity, duplicate outputs and cycles are the
 * implementation's business.
 */
export interface ManifestGraph {
  /** Root scope for top-level bindings */
  readonly bindings: BindingScope;
  lookupRule(name: string): RuleDeclaration | undefined;
  addRule(rule: RuleDeclaration): void;
  lookupPool(name: string): PoolDeclaration | undefined;
  addPool(pool: PoolDeclaration): void;
  addEdge(edge: EdgeDeclaration): void;
  addDefaults(defaults: DefaultDeclaration): void;
}

/**
 * File access capability.
 * Returns the file content or throws an Error whose message says why.
 */
export interface FileReader {
  readFile(path: string): string;
}

// ============================================================
// OBSERVABILITY
// ============================================================

export type DeclarationKind = 'rule' | 'edge' | 'pool' | 'default' | 'binding';

/** Event emitted before a manifest file is parsed */
export interface FileStartEvent {
  file: string | undefined;
  /** Include nesting depth (0 for the top-level file) */
  depth: number;
}

/** Event emitted after a manifest file parsed successfully */
export interface FileEndEvent {
  file: string | undefined;
  depth: number;
  /** Declarations registered by this file, not counting nested files */
  declarations: number;
  durationMs: number;
}

/** Event emitted before an include or subninja file is loaded */
export interface IncludeEvent {
  kind: 'include' | 'subninja';
  path: string;
  depth: number;
}

/** Event emitted after a declaration is registered */
export interface DeclarationEvent {
  kind: DeclarationKind;
  /** Rule, pool or variable name; first output for edges */
  name: string;
  location: SourceLocation;
  file: string | undefined;
}

export interface ObservabilityCallbacks {
  /** Called before a file is tokenized */
  onFileStart?: (event: FileStartEvent) => void;
  /** Called after a file parsed without error */
  onFileEnd?: (event: FileEndEvent) => void;
  /** Called before a nested file is loaded */
  onInclude?: (event: IncludeEvent) => void;
  /** Called after each registration with the graph or scope */
  onDeclaration?: (event: DeclarationEvent) => void;
}
