/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  formatDiagnostic,
  type SourceLocation,
} from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface NinjaErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  /** Manifest file the location refers to, when known */
  readonly file?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

export interface NinjaErrorOptions {
  readonly file?: string | undefined;
  readonly cause?: unknown;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * @param errorId - Error identifier (format: NINJA-{category}{3-digit})
 * @param context - Key-value pairs for template placeholder replacement
 * @param location - Source location where error occurred (optional)
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("NINJA-C001", { path: "build.ninja" })
 * // NinjaError: "File not found: build.ninja"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined,
  options: NinjaErrorOptions = {}
): NinjaError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new NinjaError(
    {
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    },
    options
  );
}

/** Render the registry template of `errorId`, checking its category */
function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all manifest errors.
 * Provides structured data for host applications to format as needed.
 */
export class NinjaError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly file?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: NinjaErrorData, options: NinjaErrorOptions = {}) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(
      `${data.message}${locationStr}`,
      options.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = 'NinjaError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.file = options.file ?? data.file;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): NinjaErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      file: this.file,
      context: this.context,
    };
  }

  /**
   * Format error for display: `file:line:column: message`.
   * A host may pass its own formatter.
   */
  format(formatter?: (data: NinjaErrorData) => string): string {
    const data = this.toData();
    if (formatter) return formatter(data);
    if (!data.location) return data.message;
    return formatDiagnostic(data.message, data.location, data.file);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Lexical errors: bad characters and unterminated constructs */
export class LexerError extends NinjaError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    options: NinjaErrorOptions = {}
  ) {
    super(
      { errorId, message: renderFor(errorId, 'lexer', context), location, context },
      options
    );
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Syntactic and parse-time semantic errors */
export class ParseError extends NinjaError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    options: NinjaErrorOptions = {}
  ) {
    super(
      { errorId, message: renderFor(errorId, 'parse', context), location, context },
      options
    );
    this.name = 'ParseError';
    this.location = location;
  }
}

/**
 * Errors raised while expanding variable references. Located when the
 * expansion happens during parsing.
 */
export class EvaluationError extends NinjaError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation | undefined,
    options: NinjaErrorOptions = {}
  ) {
    super(
      { errorId, message: renderFor(errorId, 'eval', context), location, context },
      options
    );
    this.name = 'EvaluationError';
  }
}
