import type { Position } from '../errors';

export type { Position };

export type Statement =
  | Assignment
  | IfStatement
  | WhileStatement
  | ForStatement
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | FunctionDeclaration
  | StructDeclaration
  | ImportStatement
  | ExpressionStatement;

export type Expression =
  | NumberLiteral
  | StringLiteral
  | BooleanLiteral
  | NilLiteral
  | ArrayLiteral
  | Identifier
  | BinaryExpression
  | LogicalExpression
  | UnaryExpression
  | CallExpression
  | MethodCall
  | MemberExpression
  | IndexExpression;

export type Node = Program | Statement | Expression;

export interface BaseNode {
  position: Position;
}

export interface Program extends BaseNode {
  type: 'Program';
  body: Statement[];
}

// ─── Statements ──────────────────────────────────────────

/** Places an assignment can write to. */
export type AssignmentTarget = Identifier | MemberExpression | IndexExpression;

export interface Assignment extends BaseNode {
  type: 'Assignment';
  operator: '=' | '+=';
  target: AssignmentTarget;
  value: Expression;
}

export interface IfStatement extends BaseNode {
  type: 'IfStatement';
  condition: Expression;
  body: Statement[];
  elifs: { condition: Expression; body: Statement[] }[];
  elseBody?: Statement[];
}

export interface WhileStatement extends BaseNode {
  type: 'WhileStatement';
  condition: Expression;
  body: Statement[];
}

export interface ForStatement extends BaseNode {
  type: 'ForStatement';
  variable: string;
  iterable: Expression;
  body: Statement[];
}

export interface ReturnStatement extends BaseNode {
  type: 'ReturnStatement';
  value?: Expression;
}

export interface BreakStatement extends BaseNode {
  type: 'BreakStatement';
}

export interface ContinueStatement extends BaseNode {
  type: 'ContinueStatement';
}

/**
 * `plain`: `func name(...)`
 * `static`: `func Owner.name(...)`, called without a receiver
 * `instance`: `func Owner:name(self, ...)`, the first parameter receives the instance
 */
export type FunctionKind = 'plain' | 'static' | 'instance';

export interface FunctionDeclaration extends BaseNode {
  type: 'FunctionDeclaration';
  kind: FunctionKind;
  owner?: string;
  name: string;
  params: string[];
  body: Statement[];
}

export interface StructDeclaration extends BaseNode {
  type: 'StructDeclaration';
  name: string;
  parent?: string;
  fields: string[];
}

export interface ImportStatement extends BaseNode {
  type: 'ImportStatement';
  module: string;
}

export interface ExpressionStatement extends BaseNode {
  type: 'ExpressionStatement';
  expression: Expression;
}

// ─── Expressions ─────────────────────────────────────────

export interface NumberLiteral extends BaseNode {
  type: 'NumberLiteral';
  value: number;
  raw: string;
}

export interface StringLiteral extends BaseNode {
  type: 'StringLiteral';
  value: string;
}

export interface BooleanLiteral extends BaseNode {
  type: 'BooleanLiteral';
  value: boolean;
}

export interface NilLiteral extends BaseNode {
  type: 'NilLiteral';
}

export interface ArrayLiteral extends BaseNode {
  type: 'ArrayLiteral';
  elements: Expression[];
}

export interface Identifier extends BaseNode {
  type: 'Identifier';
  name: string;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '^';
export type ComparisonOperator = '==' | '!=' | '<' | '>' | '<=' | '>=';

export interface BinaryExpression extends BaseNode {
  type: 'BinaryExpression';
  operator: ArithmeticOperator | ComparisonOperator;
  left: Expression;
  right: Expression;
}

export interface LogicalExpression extends BaseNode {
  type: 'LogicalExpression';
  operator: '&&' | '||';
  left: Expression;
  right: Expression;
}

export interface UnaryExpression extends BaseNode {
  type: 'UnaryExpression';
  operator: '-' | '!';
  operand: Expression;
}

export interface CallExpression extends BaseNode {
  type: 'CallExpression';
  callee: Expression;
  args: Expression[];
}

export interface MethodCall extends BaseNode {
  type: 'MethodCall';
  object: Expression;
  method: string;
  args: Expression[];
}

export interface MemberExpression extends BaseNode {
  type: 'MemberExpression';
  object: Expression;
  property: string;
}

export interface IndexExpression extends BaseNode {
  type: 'IndexExpression';
  object: Expression;
  index: Expression;
}
