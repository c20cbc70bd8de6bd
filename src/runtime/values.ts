/**
 * Runtime value types for the ox language.
 * Every expression evaluates to an OxValue.
 */

import type * as AST from '../parser/ast';
import type { Environment } from './environment';
import { OxError, Position } from '../errors';

export type OxValue =
  | OxNumber
  | OxString
  | OxBoolean
  | OxNil
  | OxArray
  | OxStruct
  | OxInstance
  | OxFunction
  | OxNative;

export type OxKind = OxValue['kind'];

export interface OxNumber {
  kind: 'number';
  value: number;
}

export interface OxString {
  kind: 'string';
  value: string;
}

export interface OxBoolean {
  kind: 'boolean';
  value: boolean;
}

export interface OxNil {
  kind: 'nil';
}

export interface OxArray {
  kind: 'array';
  elements: OxValue[];
}

/**
 * A struct definition. `layout` is the full constructor field order:
 * the parent's layout followed by `fields`.
 */
export interface OxStruct {
  kind: 'struct';
  name: string;
  fields: string[];
  layout: string[];
  parent: OxStruct | null;
  staticMethods: Map<string, OxFunction>;
  instanceMethods: Map<string, OxFunction>;
}

export interface OxInstance {
  kind: 'instance';
  struct: OxStruct;
  fields: Map<string, OxValue>;
}

export interface OxFunction {
  kind: 'function';
  name: string;
  params: string[];
  body: AST.Statement[];
  closure: Environment;
  /** Set when an instance method was read off an instance; passed as the first argument. */
  receiver?: OxInstance;
}

export interface OxNative {
  kind: 'native';
  name: string;
  /** Expected argument count, or null for variadic natives. */
  arity: number | null;
  call: (args: OxValue[]) => OxValue;
}

// ─── Constructors ────────────────────────────────────

export function oxNumber(value: number): OxNumber {
  return { kind: 'number', value };
}

export function oxString(value: string): OxString {
  return { kind: 'string', value };
}

export function oxBoolean(value: boolean): OxBoolean {
  return { kind: 'boolean', value };
}

const NIL: OxNil = { kind: 'nil' };

export function oxNil(): OxNil {
  return NIL;
}

export function oxArray(elements: OxValue[]): OxArray {
  return { kind: 'array', elements };
}

export function oxNative(
  name: string,
  arity: number | null,
  call: (args: OxValue[]) => OxValue,
): OxNative {
  return { kind: 'native', name, arity, call };
}

// ─── Structs ─────────────────────────────────────────

/**
 * Build a struct definition. Own fields may not repeat a field the parent
 * chain already declares.
 */
export function createStruct(
  name: string,
  fields: string[],
  parent: OxStruct | null,
  position?: Position,
): OxStruct {
  const inherited = parent ? parent.layout : [];
  for (const field of fields) {
    if (inherited.includes(field)) {
      throw new OxError(
        'TypeError',
        `Struct ${name} redeclares field '${field}' inherited from ${parent?.name}`,
        position,
      );
    }
  }
  return {
    kind: 'struct',
    name,
    fields: [...fields],
    layout: [...inherited, ...fields],
    parent,
    staticMethods: new Map(),
    instanceMethods: new Map(),
  };
}

export function instantiate(struct: OxStruct, args: OxValue[], position?: Position): OxInstance {
  if (args.length !== struct.layout.length) {
    throw new OxError(
      'ArityError',
      `${struct.name} expects ${struct.layout.length} field value(s) (${struct.layout.join(', ')}), got ${args.length}`,
      position,
    );
  }
  const fields = new Map<string, OxValue>();
  struct.layout.forEach((field, i) => fields.set(field, args[i]));
  return { kind: 'instance', struct, fields };
}

/** Static method lookup: own table first, then up the parent chain. */
export function findStaticMethod(struct: OxStruct, name: string): OxFunction | undefined {
  for (let s: OxStruct | null = struct; s; s = s.parent) {
    const method = s.staticMethods.get(name);
    if (method) return method;
  }
  return undefined;
}

/** Instance method lookup: own table first, then up the parent chain. */
export function findInstanceMethod(struct: OxStruct, name: string): OxFunction | undefined {
  for (let s: OxStruct | null = struct; s; s = s.parent) {
    const method = s.instanceMethods.get(name);
    if (method) return method;
  }
  return undefined;
}

export function bindReceiver(method: OxFunction, receiver: OxInstance): OxFunction {
  return { ...method, receiver };
}

// ─── Utilities ───────────────────────────────────────

export function valueToString(value: OxValue): string {
  switch (value.kind) {
    case 'number': return String(value.value);
    case 'string': return value.value;
    case 'boolean': return String(value.value);
    case 'nil': return 'nil';
    case 'array': return '[' + value.elements.map(valueToString).join(', ') + ']';
    case 'struct': return `<struct ${value.name}>`;
    case 'instance': {
      const fields = Array.from(value.fields.entries())
        .map(([k, v]) => `${k}: ${valueToString(v)}`);
      return `${value.struct.name}(${fields.join(', ')})`;
    }
    case 'function': return `<func ${value.name}>`;
    case 'native': return `<native ${value.name}>`;
  }
}

/**
 * Equality without coercion: both sides must be the same kind.
 * Scalars compare by value, everything else by identity.
 */
export function valuesEqual(a: OxValue, b: OxValue, position?: Position): boolean {
  if (a.kind !== b.kind) {
    throw new OxError('TypeError', `Cannot compare ${a.kind} with ${b.kind}`, position);
  }
  switch (a.kind) {
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'nil':
      return true;
    case 'function':
      // bound methods compare equal when they wrap the same closure and receiver
      return b.kind === 'function' && a.body === b.body && a.closure === b.closure && a.receiver === b.receiver;
    default:
      return a === b;
  }
}
