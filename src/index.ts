export { OxError, ErrorKind, Position } from './errors';
export { Lexer, tokenize } from './lexer/lexer';
export { Token, TokenType, KEYWORDS } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions, DEFAULT_MAX_CALL_DEPTH } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export {
  OxValue,
  OxKind,
  OxNumber,
  OxString,
  OxBoolean,
  OxNil,
  OxArray,
  OxStruct,
  OxInstance,
  OxFunction,
  OxNative,
  oxNumber,
  oxString,
  oxBoolean,
  oxNil,
  oxArray,
  oxNative,
  valueToString,
  valuesEqual,
} from './runtime/values';
export {
  ModuleLoader,
  ModuleSource,
  ModuleRegistry,
  MapModuleLoader,
  FileModuleLoader,
  STDLIB_DIR,
} from './runtime/modules';
export { createBuiltins, formatArgs, PrintFn } from './runtime/builtins';
export { OxConfig, loadConfig, loadConfigForScript } from './runtime/config';

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { FileModuleLoader, STDLIB_DIR } from './runtime/modules';
import { createBuiltins } from './runtime/builtins';
import { loadConfigForScript } from './runtime/config';
import { OxValue } from './runtime/values';
import * as AST from './parser/ast';

/**
 * Parse an ox source string into an AST.
 */
export function parse(source: string): AST.Program {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser();
  return parser.parse(tokens);
}

/**
 * Execute an ox source string with a fresh interpreter.
 * Without explicit natives, `print` writes through console.log.
 */
export function execute(source: string, options: InterpreterOptions = {}): OxValue {
  const ast = parse(source);
  const interpreter = new Interpreter({
    ...options,
    natives: options.natives ?? createBuiltins((line) => console.log(line)),
  });
  return interpreter.run(ast);
}

/**
 * Run a script file. Configuration is loaded for the script's directory;
 * imports resolve from the script's directory, then configured module
 * paths, then the bundled standard library.
 */
export function runFile(scriptPath: string, options: InterpreterOptions = {}): OxValue {
  const resolved = path.resolve(scriptPath);
  const source = fs.readFileSync(resolved, 'utf-8');
  const config = loadConfigForScript(resolved);
  const loader = options.loader ?? new FileModuleLoader([
    path.dirname(resolved),
    ...(config.modulePaths ?? []),
    STDLIB_DIR,
  ]);
  return execute(source, {
    maxCallDepth: options.maxCallDepth ?? config.maxCallDepth,
    trace: options.trace ?? config.trace,
    natives: options.natives,
    loader,
  });
}
