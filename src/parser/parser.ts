import { Token, TokenType } from '../lexer/tokens';
import { OxError, isStackExhaustion } from '../errors';
import * as AST from './ast';

const COMPARISON_OPERATORS: Partial<Record<TokenType, AST.ComparisonOperator>> = {
  [TokenType.EQ]: '==',
  [TokenType.NEQ]: '!=',
  [TokenType.LT]: '<',
  [TokenType.GT]: '>',
  [TokenType.LTE]: '<=',
  [TokenType.GTE]: '>=',
};

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;
  private loopDepth = 0;
  private blockDepth = 0;

  parse(tokens: Iterable<Token>): AST.Program {
    this.tokens = Array.from(tokens);
    this.pos = 0;
    this.loopDepth = 0;
    this.blockDepth = 0;

    const body: AST.Statement[] = [];
    try {
      this.skipSemicolons();
      while (!this.check(TokenType.EOF)) {
        body.push(this.parseStatement());
        this.skipSemicolons();
      }
    } catch (e) {
      if (isStackExhaustion(e)) {
        throw this.error('Expression nested too deeply');
      }
      throw e;
    }

    return {
      type: 'Program',
      body,
      position: { line: 1, column: 1 },
    };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatement(): AST.Statement {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.FUNC: return this.parseFunctionDeclaration();
      case TokenType.STRUCT: return this.parseStructDeclaration();
      case TokenType.IF: return this.parseIfStatement();
      case TokenType.WHILE: return this.parseWhileStatement();
      case TokenType.FOR: return this.parseForStatement();
      case TokenType.RETURN: return this.parseReturnStatement();
      case TokenType.BREAK: return this.parseLoopJump(TokenType.BREAK);
      case TokenType.CONTINUE: return this.parseLoopJump(TokenType.CONTINUE);
      case TokenType.IMPORT: return this.parseImportStatement();
      default: return this.parseAssignmentOrExpression();
    }
  }

  private parseFunctionDeclaration(): AST.FunctionDeclaration {
    const pos = this.position();
    this.expect(TokenType.FUNC);
    const first = this.expect(TokenType.IDENTIFIER).value;

    let kind: AST.FunctionKind = 'plain';
    let owner: string | undefined;
    let name = first;
    if (this.match(TokenType.DOT)) {
      kind = 'static';
      owner = first;
      name = this.expect(TokenType.IDENTIFIER).value;
    } else if (this.match(TokenType.COLON)) {
      kind = 'instance';
      owner = first;
      name = this.expect(TokenType.IDENTIFIER).value;
    }

    this.expect(TokenType.LPAREN);
    const params = this.parseNameList(TokenType.RPAREN, 'parameter');
    this.expect(TokenType.RPAREN);

    if (kind === 'instance' && params.length === 0) {
      throw this.error(`Instance method ${owner}:${name} needs a receiver parameter`, pos);
    }

    // A function body is its own loop context: `break` cannot cross it
    const savedLoopDepth = this.loopDepth;
    this.loopDepth = 0;
    const body = this.parseBlock();
    this.loopDepth = savedLoopDepth;

    return { type: 'FunctionDeclaration', kind, owner, name, params, body, position: pos };
  }

  private parseStructDeclaration(): AST.StructDeclaration {
    const pos = this.position();
    this.expect(TokenType.STRUCT);
    const name = this.expect(TokenType.IDENTIFIER).value;
    let parent: string | undefined;
    if (this.match(TokenType.INHERITS)) {
      parent = this.expect(TokenType.IDENTIFIER).value;
    }
    this.expect(TokenType.LBRACE);
    const fields = this.parseNameList(TokenType.RBRACE, 'field');
    this.expect(TokenType.RBRACE);
    return { type: 'StructDeclaration', name, parent, fields, position: pos };
  }

  /** Comma-separated identifiers up to (not including) `closer`. Trailing comma allowed. */
  private parseNameList(closer: TokenType, what: string): string[] {
    const names: string[] = [];
    while (!this.check(closer)) {
      const tok = this.expect(TokenType.IDENTIFIER);
      if (names.includes(tok.value)) {
        throw this.error(`Duplicate ${what} '${tok.value}'`, { line: tok.line, column: tok.column });
      }
      names.push(tok.value);
      if (!this.match(TokenType.COMMA)) break;
    }
    return names;
  }

  private parseIfStatement(): AST.IfStatement {
    const pos = this.position();
    this.expect(TokenType.IF);
    const condition = this.parseExpression();
    const body = this.parseBlock();

    const elifs: { condition: AST.Expression; body: AST.Statement[] }[] = [];
    let elseBody: AST.Statement[] | undefined;
    while (this.match(TokenType.ELSE)) {
      if (this.match(TokenType.IF)) {
        const elifCondition = this.parseExpression();
        elifs.push({ condition: elifCondition, body: this.parseBlock() });
      } else {
        elseBody = this.parseBlock();
        break;
      }
    }

    return { type: 'IfStatement', condition, body, elifs, elseBody, position: pos };
  }

  private parseWhileStatement(): AST.WhileStatement {
    const pos = this.position();
    this.expect(TokenType.WHILE);
    const condition = this.parseExpression();
    const body = this.parseLoopBody();
    return { type: 'WhileStatement', condition, body, position: pos };
  }

  private parseForStatement(): AST.ForStatement {
    const pos = this.position();
    this.expect(TokenType.FOR);
    const variable = this.expect(TokenType.IDENTIFIER).value;
    this.expect(TokenType.IN);
    const iterable = this.parseExpression();
    const body = this.parseLoopBody();
    return { type: 'ForStatement', variable, iterable, body, position: pos };
  }

  private parseLoopBody(): AST.Statement[] {
    this.loopDepth++;
    try {
      return this.parseBlock();
    } finally {
      this.loopDepth--;
    }
  }

  private parseReturnStatement(): AST.ReturnStatement {
    const pos = this.position();
    const keyword = this.expect(TokenType.RETURN);
    const next = this.peek();
    const bare =
      next.type === TokenType.RBRACE ||
      next.type === TokenType.SEMICOLON ||
      next.type === TokenType.EOF ||
      next.line !== keyword.line;
    if (bare) {
      return { type: 'ReturnStatement', position: pos };
    }
    return { type: 'ReturnStatement', value: this.parseExpression(), position: pos };
  }

  private parseLoopJump(type: TokenType.BREAK | TokenType.CONTINUE): AST.BreakStatement | AST.ContinueStatement {
    const pos = this.position();
    const keyword = this.expect(type);
    if (this.loopDepth === 0) {
      throw this.error(`'${keyword.value}' outside of a loop`, pos);
    }
    return type === TokenType.BREAK
      ? { type: 'BreakStatement', position: pos }
      : { type: 'ContinueStatement', position: pos };
  }

  private parseImportStatement(): AST.ImportStatement {
    const pos = this.position();
    this.expect(TokenType.IMPORT);
    if (this.blockDepth > 0) {
      throw this.error('import is only allowed at the top level', pos);
    }
    let module = this.expect(TokenType.IDENTIFIER).value;
    while (this.match(TokenType.DOT)) {
      module += '.' + this.expect(TokenType.IDENTIFIER).value;
    }
    return { type: 'ImportStatement', module, position: pos };
  }

  // ─── Assignment or Expression ──────────────────────────

  private parseAssignmentOrExpression(): AST.Statement {
    const pos = this.position();
    const expression = this.parseExpression();

    if (this.check(TokenType.EQUALS) || this.check(TokenType.PLUS_EQ)) {
      const operator = this.advance().type === TokenType.EQUALS ? '=' : '+=';
      if (
        expression.type !== 'Identifier' &&
        expression.type !== 'MemberExpression' &&
        expression.type !== 'IndexExpression'
      ) {
        throw this.error(`Invalid assignment target: ${expression.type}`, expression.position);
      }
      const value = this.parseExpression();
      return { type: 'Assignment', operator, target: expression, value, position: pos };
    }

    return { type: 'ExpressionStatement', expression, position: pos };
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Expression {
    return this.parseLogicalOr();
  }

  private parseLogicalOr(): AST.Expression {
    let left = this.parseLogicalAnd();
    while (this.match(TokenType.OR)) {
      const right = this.parseLogicalAnd();
      left = { type: 'LogicalExpression', operator: '||', left, right, position: left.position };
    }
    return left;
  }

  private parseLogicalAnd(): AST.Expression {
    let left = this.parseComparison();
    while (this.match(TokenType.AND)) {
      const right = this.parseComparison();
      left = { type: 'LogicalExpression', operator: '&&', left, right, position: left.position };
    }
    return left;
  }

  private parseComparison(): AST.Expression {
    let left = this.parseAdditive();
    let operator = COMPARISON_OPERATORS[this.peek().type];
    while (operator) {
      this.advance();
      const right = this.parseAdditive();
      left = { type: 'BinaryExpression', operator, left, right, position: left.position };
      operator = COMPARISON_OPERATORS[this.peek().type];
    }
    return left;
  }

  private parseAdditive(): AST.Expression {
    let left = this.parseMultiplicative();
    while (this.check(TokenType.PLUS) || this.check(TokenType.MINUS)) {
      const operator = this.advance().type === TokenType.PLUS ? '+' : '-';
      const right = this.parseMultiplicative();
      left = { type: 'BinaryExpression', operator, left, right, position: left.position };
    }
    return left;
  }

  private parseMultiplicative(): AST.Expression {
    let left = this.parseExponent();
    while (this.check(TokenType.STAR) || this.check(TokenType.SLASH)) {
      const operator = this.advance().type === TokenType.STAR ? '*' : '/';
      const right = this.parseExponent();
      left = { type: 'BinaryExpression', operator, left, right, position: left.position };
    }
    return left;
  }

  private parseExponent(): AST.Expression {
    const left = this.parseUnary();
    if (this.match(TokenType.CARET)) {
      // right-associative: 2^3^2 == 2^(3^2)
      const right = this.parseExponent();
      return { type: 'BinaryExpression', operator: '^', left, right, position: left.position };
    }
    return left;
  }

  private parseUnary(): AST.Expression {
    if (this.check(TokenType.MINUS) || this.check(TokenType.NOT)) {
      const pos = this.position();
      const operator = this.advance().type === TokenType.MINUS ? '-' : '!';
      const operand = this.parseUnary();
      return { type: 'UnaryExpression', operator, operand, position: pos };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): AST.Expression {
    let node = this.parsePrimary();

    while (true) {
      if (this.check(TokenType.DOT)) {
        this.advance();
        const property = this.expect(TokenType.IDENTIFIER).value;
        node = { type: 'MemberExpression', object: node, property, position: node.position };
      } else if (this.check(TokenType.COLON)) {
        this.advance();
        const method = this.expect(TokenType.IDENTIFIER).value;
        this.expect(TokenType.LPAREN);
        const args = this.parseArgList();
        node = { type: 'MethodCall', object: node, method, args, position: node.position };
      } else if (this.check(TokenType.LPAREN) && this.onSameLine()) {
        this.advance();
        const args = this.parseArgList();
        node = { type: 'CallExpression', callee: node, args, position: node.position };
      } else if (this.check(TokenType.LBRACKET) && this.onSameLine()) {
        this.advance();
        const index = this.parseExpression();
        this.expect(TokenType.RBRACKET);
        node = { type: 'IndexExpression', object: node, index, position: node.position };
      } else {
        break;
      }
    }

    return node;
  }

  private parsePrimary(): AST.Expression {
    const tok = this.peek();
    const pos = { line: tok.line, column: tok.column };

    switch (tok.type) {
      case TokenType.NUMBER:
        this.advance();
        return { type: 'NumberLiteral', value: parseFloat(tok.value), raw: tok.value, position: pos };
      case TokenType.STRING:
        this.advance();
        return { type: 'StringLiteral', value: tok.value, position: pos };
      case TokenType.TRUE:
      case TokenType.FALSE:
        this.advance();
        return { type: 'BooleanLiteral', value: tok.type === TokenType.TRUE, position: pos };
      case TokenType.NIL:
        this.advance();
        return { type: 'NilLiteral', position: pos };
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: 'Identifier', name: tok.value, position: pos };
      case TokenType.LBRACKET:
        return this.parseArrayLiteral();
      case TokenType.LPAREN: {
        this.advance();
        const expr = this.parseExpression();
        this.expect(TokenType.RPAREN);
        return expr;
      }
    }

    throw this.error(`Unexpected token: ${this.describe(tok)}`);
  }

  private parseArrayLiteral(): AST.ArrayLiteral {
    const pos = this.position();
    this.expect(TokenType.LBRACKET);
    const elements: AST.Expression[] = [];
    while (!this.check(TokenType.RBRACKET)) {
      elements.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RBRACKET);
    return { type: 'ArrayLiteral', elements, position: pos };
  }

  // ─── Arguments ─────────────────────────────────────────

  /** Arguments after an opening paren, through the closing one. */
  private parseArgList(): AST.Expression[] {
    const args: AST.Expression[] = [];
    while (!this.check(TokenType.RPAREN)) {
      args.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expect(TokenType.RPAREN);
    return args;
  }

  // ─── Blocks ────────────────────────────────────────────

  private parseBlock(): AST.Statement[] {
    this.expect(TokenType.LBRACE);
    this.blockDepth++;
    const body: AST.Statement[] = [];
    this.skipSemicolons();
    while (!this.check(TokenType.RBRACE)) {
      if (this.check(TokenType.EOF)) {
        throw this.error(`Expected ${TokenType.RBRACE} but got ${this.describe(this.peek())}`);
      }
      body.push(this.parseStatement());
      this.skipSemicolons();
    }
    this.blockDepth--;
    this.expect(TokenType.RBRACE);
    return body;
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? { type: TokenType.EOF, value: '', line: 1, column: 1 };
  }

  private advance(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token {
    const tok = this.peek();
    if (tok.type !== type) {
      throw this.error(`Expected ${type} but got ${this.describe(tok)}`);
    }
    return this.advance();
  }

  /** Calls and indexing must start on the line of the token before them. */
  private onSameLine(): boolean {
    const previous = this.tokens[this.pos - 1];
    return previous !== undefined && previous.line === this.peek().line;
  }

  private skipSemicolons(): void {
    while (this.check(TokenType.SEMICOLON)) {
      this.advance();
    }
  }

  private describe(tok: Token): string {
    return tok.type === TokenType.EOF ? 'end of input' : `${tok.type} '${tok.value}'`;
  }

  private position(): AST.Position {
    const tok = this.peek();
    return { line: tok.line, column: tok.column };
  }

  private error(message: string, position: AST.Position = this.position()): OxError {
    return new OxError('ParseError', message, position);
  }
}
