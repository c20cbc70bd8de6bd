/**
 * Native functions bound in the prelude scope of every program.
 */

import { OxError } from '../errors';
import { OxNative, OxValue, oxNative, oxNil, oxNumber, oxString, valueToString } from './values';

export type PrintFn = (line: string) => void;

/**
 * Build the default natives. `print` receives each rendered output line.
 */
export function createBuiltins(print: PrintFn): OxNative[] {
  return [
    oxNative('print', null, (args) => {
      print(formatArgs(args));
      return oxNil();
    }),

    oxNative('len', 1, ([value]) => {
      if (value.kind === 'array') return oxNumber(value.elements.length);
      if (value.kind === 'string') return oxNumber(value.value.length);
      throw new OxError('TypeError', `len() expects an array or string, got ${value.kind}`);
    }),

    oxNative('str', 1, ([value]) => oxString(valueToString(value))),
  ];
}

/** Render values the way `print` does, for hosts that capture output. */
export function formatArgs(args: OxValue[]): string {
  return args.map(valueToString).join(' ');
}
