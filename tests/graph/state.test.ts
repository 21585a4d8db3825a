/**
 * Manifest State Tests
 */

import { describe, expect, it } from 'vitest';
import {
  BindingScope,
  formatBuildLine,
  ManifestState,
  parseManifest,
  PHONY_RULE,
  summarizeManifest,
} from '../../src/index.js';

describe('ManifestState', () => {
  it('pre-registers the phony rule', () => {
    const state = new ManifestState();
    const phony = state.lookupRule(PHONY_RULE);
    expect(phony?.name).toBe('phony');
    expect(phony?.scope.parent).toBe(state.bindings);
    expect(state.rules).toEqual([]);
  });

  it('uses a caller-supplied root scope', () => {
    const root = new BindingScope();
    expect(new ManifestState(root).bindings).toBe(root);
  });

  it('keeps duplicate outputs for the graph to judge', () => {
    const state = parseManifest('build a: phony\nbuild a: phony\n');
    expect(state.edges).toHaveLength(2);
  });
});

describe('summarizeManifest', () => {
  it('flattens declarations into plain data', () => {
    const state = parseManifest(
      [
        'x = a',
        'y = $x/b',
        'rule cc',
        '  command = gcc $in',
        'pool link',
        '  depth = 2',
        'build o: cc i | h || d',
        '  flags = -g',
        'default o',
        '',
      ].join('\n')
    );

    expect(summarizeManifest(state)).toEqual({
      variables: { x: 'a', y: 'a/b' },
      rules: [{ name: 'cc', bindings: { command: 'gcc ${in}' } }],
      edges: [
        {
          outputs: ['o'],
          rule: 'cc',
          inputs: ['i'],
          implicitInputs: ['h'],
          orderOnlyInputs: ['d'],
          bindings: { flags: '-g' },
        },
      ],
      pools: [{ name: 'link', bindings: { depth: '2' } }],
      defaults: ['o'],
    });
  });
});

describe('formatBuildLine', () => {
  it('renders all three input groups', () => {
    const state = parseManifest('build o p: phony i | h || d\n');
    const edge = state.edges[0];
    expect(edge).toBeDefined();
    if (!edge) return;
    expect(formatBuildLine(edge)).toBe('build o p: phony i | h || d');
  });

  it('omits empty groups', () => {
    const state = parseManifest('build o: phony\n');
    const edge = state.edges[0];
    expect(edge).toBeDefined();
    if (!edge) return;
    expect(formatBuildLine(edge)).toBe('build o: phony');
  });
});
