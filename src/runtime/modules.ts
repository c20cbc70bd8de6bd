/**
 * Module resolution and caching for `import` statements.
 *
 * A loader turns a dotted module name into source text. The registry parses
 * each module once, evaluates it once, and detects import cycles.
 */

import * as fs from 'fs';
import * as path from 'path';
import type * as AST from '../parser/ast';
import type { OxValue } from './values';
import { OxError, Position } from '../errors';
import { Lexer } from '../lexer/lexer';
import { Parser } from '../parser/parser';

export const MODULE_EXTENSION = '.ox';

/** Directory holding the bundled `.ox` standard library (`import math`). */
export const STDLIB_DIR = path.resolve(__dirname, '../../stdlib');

export interface ModuleSource {
  name: string;
  source: string;
  /** Where the source came from, e.g. a file path. */
  origin?: string;
}

export interface ModuleLoader {
  resolve(name: string): ModuleSource | undefined;
}

/** Serves modules from an in-memory table of name → source. */
export class MapModuleLoader implements ModuleLoader {
  private sources: Map<string, string>;

  constructor(sources: Record<string, string> | Map<string, string>) {
    this.sources = sources instanceof Map ? new Map(sources) : new Map(Object.entries(sources));
  }

  resolve(name: string): ModuleSource | undefined {
    const source = this.sources.get(name);
    return source === undefined ? undefined : { name, source };
  }
}

/**
 * Serves modules from disk. `a.b` resolves to `a/b.ox` under the first
 * search directory that has it.
 */
export class FileModuleLoader implements ModuleLoader {
  readonly searchPaths: string[];

  constructor(searchPaths: string[]) {
    this.searchPaths = searchPaths.map((dir) => path.resolve(dir));
  }

  resolve(name: string): ModuleSource | undefined {
    const relative = name.split('.').join(path.sep) + MODULE_EXTENSION;
    for (const dir of this.searchPaths) {
      const filePath = path.join(dir, relative);
      if (fs.existsSync(filePath) && fs.statSync(filePath).isFile()) {
        return { name, source: fs.readFileSync(filePath, 'utf-8'), origin: filePath };
      }
    }
    return undefined;
  }
}

/** Runs a parsed module and returns the declarations it exports. */
export type ModuleEvaluator = (program: AST.Program, name: string) => Map<string, OxValue>;

export class ModuleRegistry {
  private programs = new Map<string, AST.Program>();
  private declarations = new Map<string, Map<string, OxValue>>();
  private importStack: string[] = [];

  constructor(private loader: ModuleLoader) {}

  isLoaded(name: string): boolean {
    return this.declarations.has(name);
  }

  /** Parse a module, reusing the cached tree on later calls. */
  parse(name: string, position?: Position): AST.Program {
    const cached = this.programs.get(name);
    if (cached) return cached;

    const resolved = this.loader.resolve(name);
    if (!resolved) {
      throw new OxError('ImportError', `Module not found: ${name}`, position);
    }
    const program = new Parser().parse(new Lexer(resolved.source).tokens());
    this.programs.set(name, program);
    return program;
  }

  /**
   * Evaluate a module once and return its declarations. A module that is
   * still being evaluated further up the import chain is a cycle.
   */
  load(name: string, evaluate: ModuleEvaluator, position?: Position): Map<string, OxValue> {
    const cached = this.declarations.get(name);
    if (cached) return cached;

    if (this.importStack.includes(name)) {
      const cycle = [...this.importStack.slice(this.importStack.indexOf(name)), name];
      throw new OxError('ImportError', `Circular import: ${cycle.join(' -> ')}`, position);
    }

    const program = this.parse(name, position);
    this.importStack.push(name);
    let declarations: Map<string, OxValue>;
    try {
      declarations = evaluate(program, name);
    } finally {
      this.importStack.pop();
    }
    this.declarations.set(name, declarations);
    return declarations;
  }
}
