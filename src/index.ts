/**
 * ninja-syntax Module
 * Exports the tokenizer, parsers, binding scopes, manifest state and types
 */

export { LexerError, Tokenizer, tokenize, type RawLine } from './lexer/index.js';
export {
  DEFAULT_MAX_INCLUDE_DEPTH,
  type Depfile,
  KEYWORDS,
  type Keyword,
  type LetStatement,
  loadManifest,
  MakefileParser,
  ManifestParser,
  type ManifestParserOptions,
  parseDepfile,
  parseManifest,
} from './parser/index.js';
export { type Binding, BindingScope } from './env/scope.js';
export {
  EvalStringBuilder,
  isEmptyEvalString,
  literal,
  referencedVariables,
  unparseEvalString,
} from './env/eval-string.js';
export { ManifestState, PHONY_RULE } from './graph/state.js';
export {
  type EdgeSummary,
  formatBuildLine,
  type ManifestSummary,
  type PoolSummary,
  type RuleSummary,
  summarizeManifest,
} from './graph/summary.js';
export { InMemoryFileReader, NodeFileReader } from './files/reader.js';
export {
  createError,
  type DeclarationEvent,
  type DeclarationKind,
  type DefaultDeclaration,
  DIALECTS,
  type Dialect,
  describeTokenType,
  type EdgeDeclaration,
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type EvalPart,
  type EvalString,
  EvaluationError,
  type FileEndEvent,
  type FileReader,
  type FileStartEvent,
  formatDiagnostic,
  type IncludeEvent,
  type LiteralPart,
  locationAt,
  type ManifestGraph,
  NinjaError,
  type NinjaErrorData,
  type NinjaErrorOptions,
  type ObservabilityCallbacks,
  ParseError,
  type PoolDeclaration,
  renderMessage,
  type RuleDeclaration,
  type SourceLocation,
  type Token,
  TOKEN_TYPES,
  type TokenType,
  type VariablePart,
} from './types.js';
