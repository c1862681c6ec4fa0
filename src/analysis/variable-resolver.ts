/**
 * Variable Resolver
 *
 * Tracks `%let` assignments and substitutes `&name` references. One flat
 * table per analysis run: macro-variable scoping (global/local, call stack)
 * is not modelled, later assignments simply shadow earlier ones.
 */

import type { VariableBinding } from '../types/analysis-types.js';
import { MaskedSource, splitStatements } from '../parsers/sas-lexer.js';

const LET_PATTERN = /^\s*%let\s+([A-Za-z_]\w*)\s*=/i;
const MAX_SUBSTITUTION_PASSES = 16;

/** `&name` optionally followed by the `.` delimiter; `&&` is left alone */
const referencePattern = (): RegExp => /(?<!&)&([A-Za-z_]\w*)(\.?)/g;

export class VariableResolver {
  private bindings: Map<string, VariableBinding> = new Map();
  private nextOrder = 0;

  constructor(seed: Record<string, string> = {}) {
    for (const [name, value] of Object.entries(seed)) {
      this.define(name, value, -1);
    }
  }

  /**
   * Build a resolver from every `%let` statement in the source, left to right
   */
  static fromSource(source: MaskedSource, seed: Record<string, string> = {}): VariableResolver {
    const resolver = new VariableResolver(seed);

    for (const statement of splitStatements(source.code)) {
      if (!statement.terminated) continue;

      const masked = source.code.slice(statement.start, statement.end);
      const match = masked.match(LET_PATTERN);
      if (!match) continue;

      // Value comes from the comment-free text so quoted values survive
      const valueStart = statement.start + match[0].length;
      const value = source.withoutComments.slice(valueStart, statement.end - 1);
      resolver.define(match[1], value, statement.start + (masked.length - masked.trimStart().length));
    }

    return resolver;
  }

  /**
   * Record an assignment. The value is resolved against the bindings that
   * exist at this point; references to names defined later stay verbatim.
   */
  define(name: string, value: string, offset: number): VariableBinding {
    const binding: VariableBinding = {
      name,
      value: this.substitute(value.trim()),
      order: this.nextOrder++,
      offset,
    };
    this.bindings.set(name.toLowerCase(), binding);
    return binding;
  }

  lookup(name: string): string | undefined {
    return this.bindings.get(name.toLowerCase())?.value;
  }

  has(name: string): boolean {
    return this.bindings.has(name.toLowerCase());
  }

  getBindings(): VariableBinding[] {
    return [...this.bindings.values()].sort((a, b) => a.order - b.order);
  }

  /**
   * Replace every resolvable reference in `text`.
   *
   * Undefined names and names whose expansion refers back to themselves are
   * preserved as written, so applying this twice gives the same result.
   * Text that is still changing after the last pass (values that assemble
   * new references, such as `&` followed by a name) is returned unchanged.
   */
  substitute(text: string): string {
    let current = text;

    for (let pass = 0; pass < MAX_SUBSTITUTION_PASSES; pass++) {
      const next = current.replace(referencePattern(), (reference: string, name: string) => {
        const resolved = this.resolve(name, []);
        return resolved ?? reference;
      });
      if (next === current) {
        return current;
      }
      current = next;
    }

    return text;
  }

  /**
   * Fully expand one name. Returns null for undefined names and for names
   * involved in a reference cycle.
   */
  private resolve(name: string, stack: string[]): string | null {
    const key = name.toLowerCase();
    const binding = this.bindings.get(key);
    if (!binding || stack.includes(key)) {
      return null;
    }

    let cyclic = false;
    const nested = [...stack, key];
    const expanded = binding.value.replace(referencePattern(), (reference: string, inner: string) => {
      const innerKey = inner.toLowerCase();
      if (!this.bindings.has(innerKey)) {
        return reference;
      }
      const resolved = this.resolve(inner, nested);
      if (resolved === null) {
        cyclic = true;
        return reference;
      }
      return resolved;
    });

    return cyclic ? null : expanded;
  }
}
