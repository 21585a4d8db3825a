/**
 * Eval String Tests
 */

import { describe, expect, it } from 'vitest';
import {
  EvalStringBuilder,
  isEmptyEvalString,
  literal,
  parseManifest,
  referencedVariables,
  unparseEvalString,
} from '../../src/index.js';

describe('EvalStringBuilder', () => {
  it('merges adjacent literal text', () => {
    const value = new EvalStringBuilder()
      .addText('a')
      .addText('b')
      .addVariable('x')
      .addText('c')
      .build();
    expect(value.parts).toEqual([
      { kind: 'literal', text: 'ab' },
      { kind: 'variable', name: 'x' },
      { kind: 'literal', text: 'c' },
    ]);
  });

  it('drops empty text', () => {
    expect(literal('')).toEqual({ parts: [] });
    expect(isEmptyEvalString(literal(''))).toBe(true);
    expect(isEmptyEvalString(literal('x'))).toBe(false);
  });
});

describe('referencedVariables', () => {
  it('lists names once, in order of first use', () => {
    const value = new EvalStringBuilder()
      .addVariable('out')
      .addText(' ')
      .addVariable('in')
      .addVariable('out')
      .build();
    expect(referencedVariables(value)).toEqual(['out', 'in']);
  });
});

describe('unparseEvalString', () => {
  it('escapes dollars and braces references', () => {
    const value = new EvalStringBuilder()
      .addText('a$b ')
      .addVariable('cc.flags')
      .build();
    expect(unparseEvalString(value)).toBe('a$$b ${cc.flags}');
  });

  it('writes text that parses back to the same parts', () => {
    const state = parseManifest('x = $$a ${b}c $d\n');
    const original = state.bindings.lookup('x');
    expect(original).toBeDefined();
    if (!original) return;

    const reparsed = parseManifest(`x = ${unparseEvalString(original)}\n`);
    expect(reparsed.bindings.lookup('x')).toEqual(original);
  });
});
