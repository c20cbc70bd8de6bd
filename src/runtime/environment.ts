import type { OxValue } from './values';
import { OxError, Position } from '../errors';

/**
 * Lexical scope environment for variable bindings.
 * Each scope has a parent, forming a scope chain.
 */
export class Environment {
  private bindings: Map<string, OxValue> = new Map();
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
  }

  /** Bind in this scope, shadowing any outer binding of the same name. */
  declare(name: string, value: OxValue): void {
    this.bindings.set(name, value);
  }

  get(name: string, position?: Position): OxValue {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new OxError('NameError', `Undefined variable '${name}'`, position);
    }
    return value;
  }

  /**
   * Mutate the nearest scope where `name` is already bound.
   */
  set(name: string, value: OxValue, position?: Position): void {
    if (this.bindings.has(name)) {
      this.bindings.set(name, value);
      return;
    }
    if (this.parent) {
      this.parent.set(name, value, position);
      return;
    }
    throw new OxError('NameError', `Undefined variable '${name}'`, position);
  }

  has(name: string): boolean {
    if (this.bindings.has(name)) return true;
    if (this.parent) return this.parent.has(name);
    return false;
  }

  lookup(name: string): OxValue | undefined {
    const own = this.bindings.get(name);
    if (own !== undefined) return own;
    return this.parent ? this.parent.lookup(name) : undefined;
  }

  child(): Environment {
    return new Environment(this);
  }

  /**
   * Get all bindings in this scope (not including parent).
   */
  ownBindings(): Map<string, OxValue> {
    return new Map(this.bindings);
  }
}
