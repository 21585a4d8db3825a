/**
 * Manifest Summary
 * Plain-data view of a ManifestState for printing and serialization
 */

import { unparseEvalString } from '../env/eval-string.js';
import type { BindingScope } from '../env/scope.js';
import type { EdgeDeclaration } from '../types.js';
import type { ManifestState } from './state.js';

export interface RuleSummary {
  name: string;
  /** Raw binding values, in manifest syntax */
  bindings: Record<string, string>;
}

export interface EdgeSummary {
  outputs: string[];
  rule: string;
  inputs: string[];
  implicitInputs: string[];
  orderOnlyInputs: string[];
  bindings: Record<string, string>;
}

export interface PoolSummary {
  name: string;
  bindings: Record<string, string>;
}

export interface ManifestSummary {
  /** Top-level variables, fully expanded */
  variables: Record<string, string>;
  rules: RuleSummary[];
  edges: EdgeSummary[];
  pools: PoolSummary[];
  defaults: string[];
}

function rawBindings(scope: BindingScope): Record<string, string> {
  const bindings: Record<string, string> = {};
  for (const key of scope.keys()) {
    const value = scope.lookup(key);
    if (value) bindings[key] = unparseEvalString(value);
  }
  return bindings;
}

export function summarizeManifest(state: ManifestState): ManifestSummary {
  const variables: Record<string, string> = {};
  for (const key of state.bindings.keys()) {
    variables[key] = state.bindings.evaluateBinding(key);
  }

  return {
    variables,
    rules: state.rules.map((rule) => ({
      name: rule.name,
      bindings: rawBindings(rule.scope),
    })),
    edges: state.edges.map((edge) => ({
      outputs: [...edge.outputs],
      rule: edge.rule.name,
      inputs: [...edge.inputs],
      implicitInputs: [...edge.implicitInputs],
      orderOnlyInputs: [...edge.orderOnlyInputs],
      bindings: rawBindings(edge.scope),
    })),
    pools: state.pools.map((pool) => ({
      name: pool.name,
      bindings: rawBindings(pool.scope),
    })),
    defaults: state.defaultTargets,
  };
}

/**
 * Render an edge back as a build line:
 * `build OUT: RULE IN | IMPLICIT || ORDER_ONLY`
 */
export function formatBuildLine(edge: EdgeDeclaration): string {
  let line = `build ${edge.outputs.join(' ')}: ${edge.rule.name}`;
  if (edge.inputs.length > 0) line += ` ${edge.inputs.join(' ')}`;
  if (edge.implicitInputs.length > 0) {
    line += ` | ${edge.implicitInputs.join(' ')}`;
  }
  if (edge.orderOnlyInputs.length > 0) {
    line += ` || ${edge.orderOnlyInputs.join(' ')}`;
  }
  return line;
}
