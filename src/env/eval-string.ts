/**
 * Eval String Helpers
 * Construction and rendering of unevaluated binding values
 */

import type { EvalPart, EvalString } from '../types.js';

/**
 * Accumulates literal runs and variable references in source order,
 * merging adjacent literal text.
 */
export class EvalStringBuilder {
  private readonly parts: EvalPart[] = [];
  private pending = '';

  addText(text: string): this {
    this.pending += text;
    return this;
  }

  addVariable(name: string): this {
    this.flush();
    this.parts.push({ kind: 'variable', name });
    return this;
  }

  build(): EvalString {
    this.flush();
    return { parts: [...this.parts] };
  }

  private flush(): void {
    if (this.pending !== '') {
      this.parts.push({ kind: 'literal', text: this.pending });
      this.pending = '';
    }
  }
}

/** An EvalString holding only `text` */
export function literal(text: string): EvalString {
  return new EvalStringBuilder().addText(text).build();
}

export function isEmptyEvalString(value: EvalString): boolean {
  return value.parts.length === 0;
}

/** Names referenced by `value`, in order of first appearance */
export function referencedVariables(value: EvalString): string[] {
  const names: string[] = [];
  for (const part of value.parts) {
    if (part.kind === 'variable' && !names.includes(part.name)) {
      names.push(part.name);
    }
  }
  return names;
}

/**
 * Render `value` back to manifest syntax. Literal `$` is escaped and every
 * reference is written in braces, so the result parses to the same parts.
 */
export function unparseEvalString(value: EvalString): string {
  return value.parts
    .map((part) =>
      part.kind === 'literal'
        ? part.text.replace(/\$/g, '$$$$')
        : `\${${part.name}}`
    )
    .join('');
}
