/**
 * Binding Scopes
 * Parent-linked variable scopes holding unevaluated values
 */

import { EvaluationError, type EvalString } from '../types.js';

/** A single key=value definition, remembering the definition it shadowed */
export interface Binding {
  readonly key: string;
  readonly value: EvalString;
  readonly scope: BindingScope;
  /**
   * What `key` resolved to when this binding was defined. References to
   * the binding's own key inside its value resolve here, which makes
   * `cflags = $cflags -O2` append to the outer value.
   */
  readonly previous: Binding | undefined;
}

/**
 * A mapping from variable name to unevaluated value, chained to a parent
 * for lookup. Values are expanded on demand against the scope evaluation
 * starts from, so rule bindings see the overrides of the edge being
 * evaluated.
 */
export class BindingScope {
  readonly parent: BindingScope | undefined;
  private readonly bindings = new Map<string, Binding>();

  constructor(parent?: BindingScope) {
    this.parent = parent;
  }

  createChild(): BindingScope {
    return new BindingScope(this);
  }

  define(key: string, value: EvalString): void {
    const previous = this.lookupBinding(key);
    this.bindings.set(key, { key, value, scope: this, previous });
  }

  /** Resolve `key` through the parent chain */
  lookupBinding(key: string): Binding | undefined {
    for (
      let scope: BindingScope | undefined = this;
      scope !== undefined;
      scope = scope.parent
    ) {
      const binding = scope.bindings.get(key);
      if (binding) return binding;
    }
    return undefined;
  }

  lookup(key: string): EvalString | undefined {
    return this.lookupBinding(key)?.value;
  }

  /** Whether `key` is defined in this scope itself */
  hasOwn(key: string): boolean {
    return this.bindings.has(key);
  }

  /** Keys defined in this scope itself, in definition order */
  keys(): string[] {
    return [...this.bindings.keys()];
  }

  /**
   * Expand every reference in `value`. Unknown variables expand to the
   * empty string.
   *
   * @throws EvaluationError (NINJA-E001) on a reference cycle
   */
  evaluate(value: EvalString): string {
    return this.expand(value, undefined, []);
  }

  /** Expand the value bound to `key`, or '' when it is unbound */
  evaluateBinding(key: string): string {
    const binding = this.lookupBinding(key);
    if (!binding) return '';
    return this.expand(binding.value, binding, [binding]);
  }

  private expand(
    value: EvalString,
    self: Binding | undefined,
    stack: readonly Binding[]
  ): string {
    let result = '';
    for (const part of value.parts) {
      if (part.kind === 'literal') {
        result += part.text;
        continue;
      }

      const binding =
        self !== undefined && part.name === self.key
          ? self.previous
          : this.lookupBinding(part.name);
      if (!binding) continue;

      if (stack.includes(binding)) {
        const cycle = [...stack.map((b) => b.key), binding.key].join(' -> ');
        throw new EvaluationError('NINJA-E001', { cycle });
      }
      result += this.expand(binding.value, binding, [...stack, binding]);
    }
    return result;
  }
}
