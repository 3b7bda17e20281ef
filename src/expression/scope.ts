/**
 * Scope - explicit symbol table for expression evaluation
 *
 * Lookups walk the parent chain. Function calls skip non-function bindings,
 * so a data column named `c` does not hide the `c()` builtin.
 *
 * @module expression/scope
 */

import type { FunctionValue, Value } from './values.js';

export class Scope {
  private readonly bindings = new Map<string, Value>();
  private readonly parent: Scope | null;

  constructor(parent: Scope | null = null) {
    this.parent = parent;
  }

  define(name: string, value: Value): void {
    this.bindings.set(name, value);
  }

  /**
   * Remove a local binding
   */
  remove(name: string): boolean {
    return this.bindings.delete(name);
  }

  /**
   * True when bound here or in a parent scope
   */
  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  lookup(name: string): Value | undefined {
    const local = this.bindings.get(name);
    if (local !== undefined) return local;
    return this.parent ? this.parent.lookup(name) : undefined;
  }

  lookupFunction(name: string): FunctionValue | undefined {
    const local = this.bindings.get(name);
    if (local !== undefined && local.type === 'function') return local;
    return this.parent ? this.parent.lookupFunction(name) : undefined;
  }

  /**
   * Names bound directly in this scope
   */
  localNames(): string[] {
    return [...this.bindings.keys()];
  }

  child(): Scope {
    return new Scope(this);
  }
}
