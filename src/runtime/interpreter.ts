import * as AST from '../parser/ast';
import { OxError, Position, isStackExhaustion } from '../errors';
import { Environment } from './environment';
import { ModuleLoader, ModuleRegistry, MapModuleLoader } from './modules';
import {
  OxValue,
  OxFunction,
  OxNative,
  OxInstance,
  OxStruct,
  oxNumber,
  oxString,
  oxBoolean,
  oxNil,
  oxArray,
  createStruct,
  instantiate,
  findStaticMethod,
  findInstanceMethod,
  bindReceiver,
  valueToString,
  valuesEqual,
} from './values';

/** Sentinel thrown to implement return statements. */
class ReturnSignal {
  constructor(public value: OxValue) {}
}

/** Sentinel thrown to implement break statements. */
class BreakSignal {}

/** Sentinel thrown to implement continue statements. */
class ContinueSignal {}

export const DEFAULT_MAX_CALL_DEPTH = 400;

export interface InterpreterOptions {
  /** Maximum number of nested function calls before a StackOverflowError. */
  maxCallDepth?: number;
  trace?: boolean;
  /** Host functions bound in the prelude scope, visible to every program and module. */
  natives?: OxNative[];
  /** Resolves `import` names to source text. */
  loader?: ModuleLoader;
}

export class Interpreter {
  private prelude: Environment;
  private globalEnv: Environment;
  private modules: ModuleRegistry;
  private maxCallDepth: number;
  private callDepth = 0;
  private startTime = Date.now();
  private traceEnabled: boolean;
  private traceLog: string[] = [];

  constructor(options: InterpreterOptions = {}) {
    const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
      throw new Error(`maxCallDepth must be a positive integer, got ${maxCallDepth}`);
    }
    this.maxCallDepth = maxCallDepth;
    this.traceEnabled = options.trace ?? false;
    this.modules = new ModuleRegistry(options.loader ?? new MapModuleLoader({}));
    this.prelude = new Environment();
    for (const native of options.natives ?? []) {
      this.prelude.declare(native.name, native);
    }
    this.globalEnv = this.prelude.child();
  }

  /** The global scope: top-level and imported declarations accumulate here. */
  get globals(): Environment {
    return this.globalEnv;
  }

  /**
   * Execute top-level statements in order. Returns the value of the last
   * statement, or the value of a top-level `return`.
   */
  run(program: AST.Program, scope: Environment = this.globalEnv): OxValue {
    this.startTime = Date.now();
    let result: OxValue = oxNil();
    try {
      for (const stmt of program.body) {
        result = this.execute(stmt, scope);
      }
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      if (isStackExhaustion(e)) {
        throw new OxError('StackOverflowError', `Host call stack exhausted: ${e.message}`);
      }
      throw e;
    }
    return result;
  }

  getTraceLog(): string[] {
    return [...this.traceLog];
  }

  // ─── Statement Execution ───────────────────────────────

  execute(node: AST.Statement, env: Environment): OxValue {
    switch (node.type) {
      case 'Assignment':
        return this.executeAssignment(node, env);
      case 'IfStatement':
        return this.executeIf(node, env);
      case 'WhileStatement':
        return this.executeWhile(node, env);
      case 'ForStatement':
        return this.executeFor(node, env);
      case 'ReturnStatement':
        throw new ReturnSignal(node.value ? this.evaluate(node.value, env) : oxNil());
      case 'BreakStatement':
        throw new BreakSignal();
      case 'ContinueStatement':
        throw new ContinueSignal();
      case 'FunctionDeclaration':
        return this.executeFunctionDeclaration(node, env);
      case 'StructDeclaration':
        return this.executeStructDeclaration(node, env);
      case 'ImportStatement':
        return this.executeImport(node, env);
      case 'ExpressionStatement':
        return this.evaluate(node.expression, env);
    }
  }

  // ─── Assignment ────────────────────────────────────────

  private executeAssignment(node: AST.Assignment, env: Environment): OxValue {
    const target = node.target;
    switch (target.type) {
      case 'Identifier': {
        if (node.operator === '+=') {
          const current = env.get(target.name, target.position);
          const result = this.addAssign(current, this.evaluate(node.value, env), node.position);
          env.set(target.name, result, target.position);
          return result;
        }
        const value = this.evaluate(node.value, env);
        if (env.has(target.name)) {
          env.set(target.name, value, target.position);
        } else {
          env.declare(target.name, value);
        }
        return value;
      }

      case 'MemberExpression': {
        const object = this.evaluate(target.object, env);
        if (object.kind !== 'instance') {
          throw new OxError('TypeError', `Cannot assign field '${target.property}' on ${object.kind}`, target.position);
        }
        const current = object.fields.get(target.property);
        if (current === undefined) {
          throw new OxError('NameError', `${object.struct.name} has no field '${target.property}'`, target.position);
        }
        const value = this.evaluate(node.value, env);
        const result = node.operator === '+=' ? this.addAssign(current, value, node.position) : value;
        object.fields.set(target.property, result);
        return result;
      }

      case 'IndexExpression': {
        const object = this.evaluate(target.object, env);
        if (object.kind !== 'array') {
          throw new OxError('TypeError', `Cannot assign by index into ${object.kind}`, target.position);
        }
        const index = this.checkIndex(this.evaluate(target.index, env), object.elements.length, target.position);
        const value = this.evaluate(node.value, env);
        const result = node.operator === '+=' ? this.addAssign(object.elements[index], value, node.position) : value;
        object.elements[index] = result;
        return result;
      }
    }
  }

  /** `+=`: arrays get the value appended in place, everything else is `+`. */
  private addAssign(current: OxValue, value: OxValue, position: Position): OxValue {
    if (current.kind === 'array') {
      current.elements.push(value);
      return current;
    }
    return this.applyBinary('+', current, value, position);
  }

  // ─── Control Flow ──────────────────────────────────────

  private executeIf(node: AST.IfStatement, env: Environment): OxValue {
    if (this.condition(node.condition, env, 'if')) {
      return this.executeBlock(node.body, env.child());
    }

    for (const elif of node.elifs) {
      if (this.condition(elif.condition, env, 'else if')) {
        return this.executeBlock(elif.body, env.child());
      }
    }

    if (node.elseBody) {
      return this.executeBlock(node.elseBody, env.child());
    }

    return oxNil();
  }

  private executeWhile(node: AST.WhileStatement, env: Environment): OxValue {
    while (this.condition(node.condition, env, 'while')) {
      try {
        this.executeBlock(node.body, env.child());
      } catch (e) {
        if (e instanceof BreakSignal) break;
        if (e instanceof ContinueSignal) continue;
        throw e;
      }
    }
    return oxNil();
  }

  private executeFor(node: AST.ForStatement, env: Environment): OxValue {
    const iterable = this.evaluate(node.iterable, env);
    if (iterable.kind !== 'array') {
      throw new OxError('TypeError', `Cannot iterate over ${iterable.kind}`, node.iterable.position);
    }

    for (const element of [...iterable.elements]) {
      const loopEnv = env.child();
      loopEnv.declare(node.variable, element);
      try {
        this.executeBlock(node.body, loopEnv);
      } catch (e) {
        if (e instanceof BreakSignal) break;
        if (e instanceof ContinueSignal) continue;
        throw e;
      }
    }
    return oxNil();
  }

  private condition(expr: AST.Expression, env: Environment, construct: string): boolean {
    const value = this.evaluate(expr, env);
    if (value.kind !== 'boolean') {
      throw new OxError('TypeError', `${construct} condition must be a boolean, got ${value.kind}`, expr.position);
    }
    return value.value;
  }

  // ─── Declarations ──────────────────────────────────────

  private executeFunctionDeclaration(node: AST.FunctionDeclaration, env: Environment): OxValue {
    const separator = node.kind === 'instance' ? ':' : '.';
    const fn: OxFunction = {
      kind: 'function',
      name: node.owner ? `${node.owner}${separator}${node.name}` : node.name,
      params: node.params,
      body: node.body,
      closure: env,
    };

    if (node.kind === 'plain' || node.owner === undefined) {
      env.declare(node.name, fn);
      return oxNil();
    }

    const owner = env.get(node.owner, node.position);
    if (owner.kind !== 'struct') {
      throw new OxError('TypeError', `Cannot attach method ${fn.name}: ${node.owner} is a ${owner.kind}, not a struct`, node.position);
    }
    const table = node.kind === 'static' ? owner.staticMethods : owner.instanceMethods;
    table.set(node.name, fn);
    return oxNil();
  }

  private executeStructDeclaration(node: AST.StructDeclaration, env: Environment): OxValue {
    let parent: OxStruct | null = null;
    if (node.parent !== undefined) {
      const value = env.get(node.parent, node.position);
      if (value.kind !== 'struct') {
        throw new OxError('TypeError', `${node.name} cannot inherit from ${node.parent}: it is a ${value.kind}`, node.position);
      }
      parent = value;
    }
    const struct = createStruct(node.name, node.fields, parent, node.position);
    env.declare(node.name, struct);
    if (this.traceEnabled) {
      this.trace(`struct ${node.name}(${struct.layout.join(', ')})`);
    }
    return oxNil();
  }

  // ─── Modules ───────────────────────────────────────────

  private executeImport(node: AST.ImportStatement, env: Environment): OxValue {
    if (this.traceEnabled) {
      const state = this.modules.isLoaded(node.module) ? 'cached' : 'loading';
      this.trace(`import ${node.module} (${state})`);
    }
    const declarations = this.modules.load(
      node.module,
      (program) => this.evaluateModule(program),
      node.position,
    );
    for (const [name, value] of declarations) {
      env.declare(name, value);
    }
    return oxNil();
  }

  /**
   * Run a module in its own scope under the prelude and collect the
   * functions and structs it leaves bound there.
   */
  private evaluateModule(program: AST.Program): Map<string, OxValue> {
    const scope = this.prelude.child();
    try {
      for (const stmt of program.body) {
        this.execute(stmt, scope);
      }
    } catch (e) {
      if (!(e instanceof ReturnSignal)) throw e;
    }

    const declarations = new Map<string, OxValue>();
    for (const [name, value] of scope.ownBindings()) {
      if (value.kind === 'function' || value.kind === 'struct') {
        declarations.set(name, value);
      }
    }
    return declarations;
  }

  // ─── Expressions ───────────────────────────────────────

  evaluate(node: AST.Expression, env: Environment): OxValue {
    switch (node.type) {
      case 'NumberLiteral':
        return oxNumber(node.value);
      case 'StringLiteral':
        return oxString(node.value);
      case 'BooleanLiteral':
        return oxBoolean(node.value);
      case 'NilLiteral':
        return oxNil();
      case 'ArrayLiteral':
        return oxArray(node.elements.map((el) => this.evaluate(el, env)));
      case 'Identifier':
        return env.get(node.name, node.position);
      case 'BinaryExpression':
        return this.applyBinary(
          node.operator,
          this.evaluate(node.left, env),
          this.evaluate(node.right, env),
          node.position,
        );
      case 'LogicalExpression':
        return this.evaluateLogical(node, env);
      case 'UnaryExpression':
        return this.evaluateUnary(node, env);
      case 'CallExpression': {
        const callee = this.evaluate(node.callee, env);
        const args = node.args.map((arg) => this.evaluate(arg, env));
        return this.callValue(callee, args, node.position);
      }
      case 'MethodCall':
        return this.evaluateMethodCall(node, env);
      case 'MemberExpression':
        return this.getMember(this.evaluate(node.object, env), node.property, node.position);
      case 'IndexExpression':
        return this.evaluateIndex(node, env);
    }
  }

  private applyBinary(
    operator: AST.ArithmeticOperator | AST.ComparisonOperator,
    left: OxValue,
    right: OxValue,
    position: Position,
  ): OxValue {
    switch (operator) {
      case '+':
        if (left.kind === 'number' && right.kind === 'number') return oxNumber(left.value + right.value);
        if (left.kind === 'string' && right.kind === 'string') return oxString(left.value + right.value);
        throw this.operandError(operator, left, right, position);
      case '-':
      case '*':
      case '/':
      case '^': {
        if (left.kind !== 'number' || right.kind !== 'number') {
          throw this.operandError(operator, left, right, position);
        }
        const a = left.value;
        const b = right.value;
        if (operator === '-') return oxNumber(a - b);
        if (operator === '*') return oxNumber(a * b);
        if (operator === '/') return oxNumber(a / b);
        return oxNumber(Math.pow(a, b));
      }
      case '==':
        return oxBoolean(valuesEqual(left, right, position));
      case '!=':
        return oxBoolean(!valuesEqual(left, right, position));
      case '<':
      case '>':
      case '<=':
      case '>=': {
        let a: number | string;
        let b: number | string;
        if (left.kind === 'number' && right.kind === 'number') {
          a = left.value;
          b = right.value;
        } else if (left.kind === 'string' && right.kind === 'string') {
          a = left.value;
          b = right.value;
        } else if (left.kind !== right.kind) {
          throw new OxError('TypeError', `Cannot compare ${left.kind} with ${right.kind}`, position);
        } else {
          throw new OxError('TypeError', `Cannot order ${left.kind} values with '${operator}'`, position);
        }
        if (operator === '<') return oxBoolean(a < b);
        if (operator === '>') return oxBoolean(a > b);
        if (operator === '<=') return oxBoolean(a <= b);
        return oxBoolean(a >= b);
      }
    }
  }

  private operandError(operator: string, left: OxValue, right: OxValue, position: Position): OxError {
    return new OxError('TypeError', `Cannot apply '${operator}' to ${left.kind} and ${right.kind}`, position);
  }

  private evaluateLogical(node: AST.LogicalExpression, env: Environment): OxValue {
    const left = this.evaluate(node.left, env);
    if (left.kind !== 'boolean') {
      throw new OxError('TypeError', `'${node.operator}' expects booleans, got ${left.kind}`, node.left.position);
    }
    if (node.operator === '&&' ? !left.value : left.value) {
      return left;
    }
    const right = this.evaluate(node.right, env);
    if (right.kind !== 'boolean') {
      throw new OxError('TypeError', `'${node.operator}' expects booleans, got ${right.kind}`, node.right.position);
    }
    return right;
  }

  private evaluateUnary(node: AST.UnaryExpression, env: Environment): OxValue {
    const operand = this.evaluate(node.operand, env);
    if (node.operator === '-') {
      if (operand.kind !== 'number') {
        throw new OxError('TypeError', `Cannot negate ${operand.kind}`, node.position);
      }
      return oxNumber(-operand.value);
    }
    if (operand.kind !== 'boolean') {
      throw new OxError('TypeError', `'!' expects a boolean, got ${operand.kind}`, node.position);
    }
    return oxBoolean(!operand.value);
  }

  private evaluateIndex(node: AST.IndexExpression, env: Environment): OxValue {
    const object = this.evaluate(node.object, env);
    const index = this.evaluate(node.index, env);
    if (object.kind === 'array') {
      return object.elements[this.checkIndex(index, object.elements.length, node.position)];
    }
    if (object.kind === 'string') {
      return oxString(object.value[this.checkIndex(index, object.value.length, node.position)]);
    }
    throw new OxError('TypeError', `Cannot index into ${object.kind}`, node.position);
  }

  private checkIndex(index: OxValue, length: number, position: Position): number {
    if (index.kind !== 'number' || !Number.isInteger(index.value)) {
      throw new OxError('TypeError', `Index must be an integer, got ${valueToString(index)}`, position);
    }
    if (index.value < 0 || index.value >= length) {
      throw new OxError('IndexError', `Index ${index.value} out of range for length ${length}`, position);
    }
    return index.value;
  }

  // ─── Structs & Dispatch ────────────────────────────────

  private getMember(object: OxValue, property: string, position: Position): OxValue {
    if (object.kind === 'instance') {
      const field = object.fields.get(property);
      if (field !== undefined) return field;
      const method = findInstanceMethod(object.struct, property);
      if (method) return bindReceiver(method, object);
      throw new OxError('NameError', `${object.struct.name} has no field or method '${property}'`, position);
    }
    if (object.kind === 'struct') {
      const method = findStaticMethod(object, property);
      if (method) return method;
      throw new OxError('NameError', `${object.name} has no static method '${property}'`, position);
    }
    throw new OxError('TypeError', `Cannot read '${property}' of ${object.kind}`, position);
  }

  private evaluateMethodCall(node: AST.MethodCall, env: Environment): OxValue {
    const object = this.evaluate(node.object, env);
    if (object.kind !== 'instance') {
      throw new OxError('TypeError', `Cannot call instance method '${node.method}' on ${object.kind}`, node.position);
    }
    const method = findInstanceMethod(object.struct, node.method);
    if (!method) {
      throw new OxError('NameError', `${object.struct.name} has no method '${node.method}'`, node.position);
    }
    const args = node.args.map((arg) => this.evaluate(arg, env));
    return this.callFunction(bindReceiver(method, object), args, node.position);
  }

  // ─── Calls ─────────────────────────────────────────────

  private callValue(callee: OxValue, args: OxValue[], position: Position): OxValue {
    switch (callee.kind) {
      case 'function':
        return this.callFunction(callee, args, position);
      case 'native':
        if (callee.arity !== null && callee.arity !== args.length) {
          throw new OxError('ArityError', `${callee.name} expects ${callee.arity} argument(s), got ${args.length}`, position);
        }
        return callee.call(args);
      case 'struct':
        return instantiate(callee, args, position);
      default:
        throw new OxError('TypeError', `Cannot call a ${callee.kind}`, position);
    }
  }

  private callFunction(fn: OxFunction, args: OxValue[], position: Position): OxValue {
    const receiver: OxInstance[] = fn.receiver ? [fn.receiver] : [];
    const fullArgs = [...receiver, ...args];
    if (fullArgs.length !== fn.params.length) {
      throw new OxError(
        'ArityError',
        `${fn.name} expects ${fn.params.length - receiver.length} argument(s), got ${args.length}`,
        position,
      );
    }
    if (this.callDepth >= this.maxCallDepth) {
      throw new OxError('StackOverflowError', `Maximum call depth of ${this.maxCallDepth} exceeded`, position);
    }

    const scope = new Environment(fn.closure);
    fn.params.forEach((param, i) => scope.declare(param, fullArgs[i]));

    if (this.traceEnabled) {
      this.trace(`call ${fn.name}(${args.map(valueToString).join(', ')}) depth=${this.callDepth + 1}`);
    }

    this.callDepth++;
    try {
      this.executeBlock(fn.body, scope);
      return oxNil();
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      throw e;
    } finally {
      this.callDepth--;
    }
  }

  // ─── Helpers ───────────────────────────────────────────

  private executeBlock(body: AST.Statement[], env: Environment): OxValue {
    for (const stmt of body) {
      this.execute(stmt, env);
    }
    return oxNil();
  }

  private trace(message: string): void {
    this.traceLog.push(`[${Date.now() - this.startTime}ms] ${message}`);
    console.log(`  [trace] ${message}`);
  }
}
