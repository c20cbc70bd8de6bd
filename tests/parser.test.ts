import { Lexer } from '../src/lexer/lexer';
import { Parser } from '../src/parser/parser';
import { OxError } from '../src/errors';
import * as AST from '../src/parser/ast';

describe('Parser', () => {
  function parse(source: string): AST.Program {
    const lexer = new Lexer(source);
    const tokens = lexer.tokenize();
    const parser = new Parser();
    return parser.parse(tokens);
  }

  function first(source: string): AST.Statement {
    const ast = parse(source);
    expect(ast.body).toHaveLength(1);
    return ast.body[0];
  }

  function expr(source: string): AST.Expression {
    const stmt = first(source);
    if (stmt.type !== 'ExpressionStatement') {
      throw new Error(`expected an expression statement, got ${stmt.type}`);
    }
    return stmt.expression;
  }

  function parseError(source: string): OxError {
    try {
      parse(source);
    } catch (e) {
      if (e instanceof OxError) return e;
      throw e;
    }
    throw new Error('expected a ParseError');
  }

  describe('assignments', () => {
    it('should parse simple assignment', () => {
      expect(first('x = 42')).toMatchObject({
        type: 'Assignment',
        operator: '=',
        target: { type: 'Identifier', name: 'x' },
        value: { type: 'NumberLiteral', value: 42, raw: '42' },
      });
    });

    it('should parse compound assignment', () => {
      expect(first('total += 1.5')).toMatchObject({
        type: 'Assignment',
        operator: '+=',
        target: { type: 'Identifier', name: 'total' },
        value: { type: 'NumberLiteral', value: 1.5 },
      });
    });

    it('should parse field and index targets', () => {
      expect(first('p.x = 1')).toMatchObject({
        target: { type: 'MemberExpression', object: { type: 'Identifier', name: 'p' }, property: 'x' },
      });
      expect(first('items[0] = "a"')).toMatchObject({
        target: { type: 'IndexExpression', index: { type: 'NumberLiteral', value: 0 } },
        value: { type: 'StringLiteral', value: 'a' },
      });
    });

    it('should reject an invalid assignment target', () => {
      const err = parseError('f() = 1');
      expect(err.errorType).toBe('ParseError');
      expect(err.detail).toBe('Invalid assignment target: CallExpression');
    });
  });

  describe('expressions', () => {
    it('should give multiplication precedence over addition', () => {
      expect(expr('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpression',
        operator: '+',
        left: { value: 1 },
        right: { type: 'BinaryExpression', operator: '*', left: { value: 2 }, right: { value: 3 } },
      });
    });

    it('should associate subtraction to the left', () => {
      expect(expr('10 - 4 - 3')).toMatchObject({
        operator: '-',
        left: { operator: '-', left: { value: 10 }, right: { value: 4 } },
        right: { value: 3 },
      });
    });

    it('should associate exponent to the right', () => {
      expect(expr('2 ^ 3 ^ 2')).toMatchObject({
        operator: '^',
        left: { value: 2 },
        right: { operator: '^', left: { value: 3 }, right: { value: 2 } },
      });
    });

    it('should bind unary minus tighter than exponent', () => {
      expect(expr('-2 ^ 2')).toMatchObject({
        operator: '^',
        left: { type: 'UnaryExpression', operator: '-', operand: { value: 2 } },
      });
    });

    it('should bind && tighter than ||', () => {
      expect(expr('a || b && c')).toMatchObject({
        type: 'LogicalExpression',
        operator: '||',
        left: { name: 'a' },
        right: { type: 'LogicalExpression', operator: '&&', left: { name: 'b' }, right: { name: 'c' } },
      });
    });

    it('should place comparisons below arithmetic', () => {
      expect(expr('a + 1 <= b * 2')).toMatchObject({
        operator: '<=',
        left: { operator: '+' },
        right: { operator: '*' },
      });
    });

    it('should respect parentheses', () => {
      expect(expr('(1 + 2) * 3')).toMatchObject({
        operator: '*',
        left: { operator: '+' },
        right: { value: 3 },
      });
    });

    it('should parse literals', () => {
      expect(expr('[1, "two", true, nil]')).toMatchObject({
        type: 'ArrayLiteral',
        elements: [
          { type: 'NumberLiteral', value: 1 },
          { type: 'StringLiteral', value: 'two' },
          { type: 'BooleanLiteral', value: true },
          { type: 'NilLiteral' },
        ],
      });
    });

    it('should parse postfix chains', () => {
      expect(expr('a.b(1)[2]:m(3)')).toMatchObject({
        type: 'MethodCall',
        method: 'm',
        args: [{ value: 3 }],
        object: {
          type: 'IndexExpression',
          index: { value: 2 },
          object: {
            type: 'CallExpression',
            args: [{ value: 1 }],
            callee: { type: 'MemberExpression', property: 'b', object: { name: 'a' } },
          },
        },
      });
    });

    it('should not continue a call onto the next line', () => {
      const ast = parse('f\n(1)');
      expect(ast.body).toHaveLength(2);
      expect(ast.body[0]).toMatchObject({ type: 'ExpressionStatement', expression: { type: 'Identifier', name: 'f' } });
      expect(ast.body[1]).toMatchObject({ type: 'ExpressionStatement', expression: { type: 'NumberLiteral', value: 1 } });
    });

    it('should record positions', () => {
      expect(expr('  foo').position).toEqual({ line: 1, column: 3 });
    });
  });

  describe('functions', () => {
    it('should parse a plain function', () => {
      expect(first('func add(a, b) { return a + b }')).toMatchObject({
        type: 'FunctionDeclaration',
        kind: 'plain',
        name: 'add',
        params: ['a', 'b'],
        body: [{ type: 'ReturnStatement', value: { type: 'BinaryExpression', operator: '+' } }],
      });
    });

    it('should parse static and instance methods', () => {
      expect(first('func Point.origin() { return Point(0, 0) }')).toMatchObject({
        kind: 'static',
        owner: 'Point',
        name: 'origin',
        params: [],
      });
      expect(first('func Point:norm(self) { return self.x }')).toMatchObject({
        kind: 'instance',
        owner: 'Point',
        name: 'norm',
        params: ['self'],
      });
    });

    it('should require a receiver on instance methods', () => {
      const err = parseError('func Point:bad() { }');
      expect(err.detail).toBe('Instance method Point:bad needs a receiver parameter');
      expect(err.position).toEqual({ line: 1, column: 1 });
    });

    it('should reject duplicate parameters', () => {
      expect(parseError('func f(a, a) { }').message).toBe("ParseError: Duplicate parameter 'a' at line 1, column 11");
    });

    it('should parse a bare return before a closing brace or a newline', () => {
      const bodyOf = (source: string): AST.Statement[] => {
        const stmt = first(source);
        return stmt.type === 'FunctionDeclaration' ? stmt.body : [];
      };

      const closing = bodyOf('func f() { return }');
      expect(closing).toHaveLength(1);
      expect(closing[0].type).toBe('ReturnStatement');
      expect(closing[0]).not.toHaveProperty('value');

      const newline = bodyOf('func g() {\n  return\n  1\n}');
      expect(newline).toHaveLength(2);
      expect(newline[0]).not.toHaveProperty('value');
      expect(newline[1]).toMatchObject({ type: 'ExpressionStatement', expression: { value: 1 } });
    });
  });

  describe('structs', () => {
    it('should parse a struct', () => {
      expect(first('struct Point { x, y }')).toMatchObject({
        type: 'StructDeclaration',
        name: 'Point',
        parent: undefined,
        fields: ['x', 'y'],
      });
    });

    it('should parse inheritance', () => {
      expect(first('struct Point3 inherits Point { z }')).toMatchObject({
        name: 'Point3',
        parent: 'Point',
        fields: ['z'],
      });
    });

    it('should reject duplicate fields', () => {
      expect(parseError('struct P { x, x }').detail).toBe("Duplicate field 'x'");
    });
  });

  describe('control flow', () => {
    it('should parse if / else if / else', () => {
      expect(first('if a { x = 1 } else if b { x = 2 } else { x = 3 }')).toMatchObject({
        type: 'IfStatement',
        condition: { name: 'a' },
        body: [{ type: 'Assignment' }],
        elifs: [{ condition: { name: 'b' }, body: [{ type: 'Assignment' }] }],
        elseBody: [{ type: 'Assignment' }],
      });
    });

    it('should parse while and for loops', () => {
      expect(first('while i < 3 { i += 1 }')).toMatchObject({
        type: 'WhileStatement',
        condition: { operator: '<' },
      });
      expect(first('for item in items { print(item) }')).toMatchObject({
        type: 'ForStatement',
        variable: 'item',
        iterable: { name: 'items' },
        body: [{ type: 'ExpressionStatement', expression: { type: 'CallExpression' } }],
      });
    });

    it('should accept break and continue inside loops', () => {
      expect(first('while true { if x { break } continue }')).toMatchObject({
        body: [
          { type: 'IfStatement', body: [{ type: 'BreakStatement' }] },
          { type: 'ContinueStatement' },
        ],
      });
    });

    it('should reject break outside a loop', () => {
      expect(parseError('break').detail).toBe("'break' outside of a loop");
    });

    it('should not let continue cross a function boundary', () => {
      expect(parseError('while true { func f() { continue } }').detail).toBe("'continue' outside of a loop");
    });

    it('should allow semicolons between statements', () => {
      expect(parse('x = 1; y = 2;; z = 3').body).toHaveLength(3);
    });
  });

  describe('imports', () => {
    it('should parse dotted module names', () => {
      expect(first('import lib.util')).toMatchObject({ type: 'ImportStatement', module: 'lib.util' });
    });

    it('should reject imports inside blocks', () => {
      expect(parseError('func f() { import math }').detail).toBe('import is only allowed at the top level');
    });
  });

  describe('errors', () => {
    it('should report the unexpected token', () => {
      const err = parseError('x = )');
      expect(err.message).toBe("ParseError: Unexpected token: RPAREN ')' at line 1, column 5");
    });

    it('should report a missing closing brace', () => {
      expect(parseError('func f() { x = 1').detail).toBe('Expected RBRACE but got end of input');
    });

    it('should report nesting deeper than the host stack', () => {
      const parens = parseError('('.repeat(20000) + '1' + ')'.repeat(20000));
      expect(parens).toBeInstanceOf(OxError);
      expect(parens.errorType).toBe('ParseError');
      expect(parens.detail).toBe('Expression nested too deeply');
      expect(parens.position).toBeDefined();

      const negations = parseError('-'.repeat(100000) + '1');
      expect(negations.errorType).toBe('ParseError');
      expect(negations.detail).toBe('Expression nested too deeply');
    });

    it('should parse again after running out of stack', () => {
      const parser = new Parser();
      expect(() => parser.parse(new Lexer('('.repeat(20000) + '1' + ')'.repeat(20000)).tokenize())).toThrow(OxError);
      expect(parser.parse(new Lexer('x = 1').tokenize()).body).toHaveLength(1);
    });

    it('should report a missing struct name', () => {
      expect(parseError('struct { x }').detail).toBe("Expected IDENTIFIER but got LBRACE '{'");
    });
  });
});
