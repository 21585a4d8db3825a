/**
 * Binding Scope Tests
 * Lookup through the parent chain and on-demand expansion
 */

import { describe, expect, it } from 'vitest';
import {
  BindingScope,
  EvalStringBuilder,
  EvaluationError,
  literal,
} from '../../src/index.js';
import { catchError } from '../helpers/manifest.js';

function ref(name: string) {
  return new EvalStringBuilder().addVariable(name).build();
}

describe('BindingScope', () => {
  it('looks keys up through the parent chain', () => {
    const root = new BindingScope();
    root.define('a', literal('1'));
    const child = root.createChild();
    child.define('b', literal('2'));

    expect(child.parent).toBe(root);
    expect(child.lookup('a')).toEqual(literal('1'));
    expect(root.lookup('b')).toBeUndefined();
    expect(child.hasOwn('a')).toBe(false);
    expect(child.keys()).toEqual(['b']);
  });

  it('lets a child shadow its parent', () => {
    const root = new BindingScope();
    root.define('a', literal('outer'));
    const child = root.createChild();
    child.define('a', literal('inner'));

    expect(child.evaluateBinding('a')).toBe('inner');
    expect(root.evaluateBinding('a')).toBe('outer');
  });

  it('expands unknown variables to the empty string', () => {
    const scope = new BindingScope();
    const value = new EvalStringBuilder()
      .addText('[')
      .addVariable('missing')
      .addText(']')
      .build();
    expect(scope.evaluate(value)).toBe('[]');
    expect(scope.evaluateBinding('missing')).toBe('');
  });

  it('expands references from the scope evaluation starts in', () => {
    const rule = new BindingScope();
    rule.define(
      'command',
      new EvalStringBuilder().addText('cc ').addVariable('in').build()
    );
    const edge = rule.createChild();
    edge.define('in', literal('a.c'));

    expect(edge.evaluateBinding('command')).toBe('cc a.c');
    expect(rule.evaluateBinding('command')).toBe('cc ');
  });

  it('resolves a self-reference to the shadowed definition', () => {
    const root = new BindingScope();
    root.define('cflags', literal('-O2'));
    const child = root.createChild();
    child.define(
      'cflags',
      new EvalStringBuilder().addVariable('cflags').addText(' -g').build()
    );

    expect(child.evaluateBinding('cflags')).toBe('-O2 -g');
  });

  it('expands a self-reference with nothing shadowed to empty', () => {
    const scope = new BindingScope();
    scope.define('a', ref('a'));
    expect(scope.evaluateBinding('a')).toBe('');
  });

  it('throws NINJA-E001 on a reference cycle', () => {
    const scope = new BindingScope();
    scope.define('a', ref('b'));
    scope.define('b', ref('a'));

    const err = catchError(() => scope.evaluateBinding('a'));
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err.errorId).toBe('NINJA-E001');
    expect(err.message).toBe('cycle in variable expansion: a -> b -> a');
  });

  it('names the cycle when evaluating a value directly', () => {
    const scope = new BindingScope();
    scope.define('a', ref('b'));
    scope.define('b', ref('a'));

    const err = catchError(() => scope.evaluate(ref('a')));
    expect(err.message).toBe('cycle in variable expansion: a -> b -> a');
  });

  it('expands a variable used twice', () => {
    const scope = new BindingScope();
    scope.define('x', literal('1'));
    const value = new EvalStringBuilder()
      .addVariable('x')
      .addText('+')
      .addVariable('x')
      .build();
    expect(scope.evaluate(value)).toBe('1+1');
  });
});
