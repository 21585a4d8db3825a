/**
 * Error Registry and Error Class Tests
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  EvaluationError,
  LexerError,
  NinjaError,
  ParseError,
  renderMessage,
} from '../src/index.js';

const CATEGORY_LETTERS = {
  lexer: 'L',
  parse: 'P',
  eval: 'E',
  cli: 'C',
} as const;

describe('ERROR_REGISTRY', () => {
  it('prefixes every ID with its category letter', () => {
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^NINJA-[LPEC]\d{3}$/);
      expect(errorId.charAt(6)).toBe(CATEGORY_LETTERS[definition.category]);
      expect(definition.errorId).toBe(errorId);
    }
  });

  it('keeps descriptions short', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });

  it('looks definitions up by ID', () => {
    expect(ERROR_REGISTRY.has('NINJA-P005')).toBe(true);
    expect(ERROR_REGISTRY.get('NINJA-P005')?.messageTemplate).toBe(
      "duplicate rule '{name}'"
    );
    expect(ERROR_REGISTRY.get('NINJA-X999')).toBeUndefined();
  });
});

describe('renderMessage', () => {
  it('replaces placeholders', () => {
    expect(renderMessage("duplicate rule '{name}'", { name: 'cc' })).toBe(
      "duplicate rule 'cc'"
    );
  });

  it('renders missing values as empty', () => {
    expect(renderMessage('a{x}b', {})).toBe('ab');
  });

  it('copies a brace that follows a dollar', () => {
    expect(renderMessage("unterminated '${' in {text}", { text: 'x' })).toBe(
      "unterminated '${' in x"
    );
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('a {x', { x: 1 })).toBe('a {x');
  });
});

describe('createError', () => {
  it('renders the registry template', () => {
    const err = createError('NINJA-C001', { path: 'build.ninja' });
    expect(err).toBeInstanceOf(NinjaError);
    expect(err.message).toBe('File not found: build.ninja');
    expect(err.context).toEqual({ path: 'build.ninja' });
  });

  it('appends the location to the message', () => {
    const err = createError(
      'NINJA-P007',
      { name: 'cc' },
      { line: 3, column: 10, offset: 40 }
    );
    expect(err.message).toBe("unknown build rule 'cc' at 3:10");
  });

  it('keeps the cause', () => {
    const cause = new Error('disk on fire');
    const err = createError('NINJA-P008', { path: 'a', reason: 'x' }, undefined, {
      cause,
    });
    expect(err.cause).toBe(cause);
  });

  it('rejects unknown IDs', () => {
    expect(() => createError('NINJA-X999', {})).toThrow(
      'Unknown error ID: NINJA-X999'
    );
  });
});

describe('NinjaError', () => {
  const location = { line: 2, column: 7, offset: 12 };

  it('strips the location from toData', () => {
    const err = new ParseError('NINJA-P002', { token: "':'" }, location, {
      file: 'build.ninja',
    });
    expect(err.toData()).toEqual({
      errorId: 'NINJA-P002',
      message: "unexpected ':'",
      location,
      file: 'build.ninja',
      context: { token: "':'" },
    });
  });

  it('formats as file:line:column: message', () => {
    const err = new ParseError('NINJA-P003', {}, location, {
      file: 'build.ninja',
    });
    expect(err.format()).toBe('build.ninja:2:7: unexpected indent');
  });

  it('omits the file when none is known', () => {
    const err = new ParseError('NINJA-P003', {}, location);
    expect(err.format()).toBe('2:7: unexpected indent');
  });

  it('accepts a custom formatter', () => {
    const err = new ParseError('NINJA-P003', {}, location);
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[NINJA-P003] unexpected indent'
    );
  });

  it('formats errors without a location as the bare message', () => {
    expect(createError('NINJA-C002', { reason: 'bad' }).format()).toBe(
      'Invalid configuration: bad'
    );
  });

  it('checks the category of specialized errors', () => {
    expect(() => new LexerError('NINJA-P001', {}, location)).toThrow(
      'Expected lexer error ID, got: NINJA-P001'
    );
    expect(() => new ParseError('NINJA-L001', {}, location)).toThrow(
      'Expected parse error ID, got: NINJA-L001'
    );
    expect(() => new EvaluationError('NINJA-X001', {})).toThrow(
      'Unknown error ID: NINJA-X001'
    );
  });

  it('names each class', () => {
    expect(new LexerError('NINJA-L002', { escape: '$' }, location).name).toBe(
      'LexerError'
    );
    expect(new ParseError('NINJA-P003', {}, location).name).toBe('ParseError');
    expect(new EvaluationError('NINJA-E001', { cycle: 'a -> a' }).name).toBe(
      'EvaluationError'
    );
  });
});
