/**
 * Manifest State
 * In-memory registry of everything a manifest declares
 */

import { BindingScope } from '../env/scope.js';
import type {
  DefaultDeclaration,
  EdgeDeclaration,
  ManifestGraph,
  PoolDeclaration,
  RuleDeclaration,
} from '../types.js';

/** Name of the built-in rule that runs no command */
export const PHONY_RULE = 'phony';

/**
 * Collects declarations in registration order. Registration does not
 * check for duplicate outputs or dependency cycles.
 */
export class ManifestState implements ManifestGraph {
  readonly bindings: BindingScope;
  readonly edges: EdgeDeclaration[] = [];
  readonly defaults: DefaultDeclaration[] = [];
  private readonly ruleMap = new Map<string, RuleDeclaration>();
  private readonly poolMap = new Map<string, PoolDeclaration>();

  constructor(bindings: BindingScope = new BindingScope()) {
    this.bindings = bindings;
    this.ruleMap.set(PHONY_RULE, {
      name: PHONY_RULE,
      scope: bindings.createChild(),
    });
  }

  /** Declared rules, excluding the built-in phony rule */
  get rules(): RuleDeclaration[] {
    return [...this.ruleMap.values()].filter((r) => r.name !== PHONY_RULE);
  }

  get pools(): PoolDeclaration[] {
    return [...this.poolMap.values()];
  }

  /** Target names of every default statement, in order */
  get defaultTargets(): string[] {
    return this.defaults.flatMap((d) => [...d.targets]);
  }

  lookupRule(name: string): RuleDeclaration | undefined {
    return this.ruleMap.get(name);
  }

  addRule(rule: RuleDeclaration): void {
    this.ruleMap.set(rule.name, rule);
  }

  lookupPool(name: string): PoolDeclaration | undefined {
    return this.poolMap.get(name);
  }

  addPool(pool: PoolDeclaration): void {
    this.poolMap.set(pool.name, pool);
  }

  addEdge(edge: EdgeDeclaration): void {
    this.edges.push(edge);
  }

  addDefaults(defaults: DefaultDeclaration): void {
    this.defaults.push(defaults);
  }
}
