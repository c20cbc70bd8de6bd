import { Token, TokenType, KEYWORDS } from './tokens';
import { OxError } from '../errors';

export class Lexer {
  private source: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Scan the whole source into an array terminated by an EOF token.
   */
  tokenize(): Token[] {
    return Array.from(this.tokens());
  }

  /**
   * Lazily scan the source. Every call starts over from the first character,
   * so iterating twice yields the same sequence.
   */
  *tokens(): Generator<Token, void, undefined> {
    // each pass scans with its own cursor
    yield* new Lexer(this.source).scan();
  }

  private *scan(): Generator<Token, void, undefined> {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      if (ch === '\n') {
        this.newline();
        continue;
      }

      // Line comments
      if (ch === '/' && this.peekChar(1) === '/') {
        while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
          this.advance();
        }
        continue;
      }

      if (ch === '"' || ch === "'") {
        yield this.readString(ch);
        continue;
      }

      if (this.isDigit(ch)) {
        yield this.readNumber();
        continue;
      }

      if (this.isAlpha(ch)) {
        yield this.readIdentifier();
        continue;
      }

      yield this.readOperator();
    }

    yield { type: TokenType.EOF, value: '', line: this.line, column: this.column };
  }

  private readString(quote: string): Token {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== quote) {
      const ch = this.source[this.pos];
      if (ch === '\\') {
        this.advance();
        if (this.pos < this.source.length) {
          const escaped = this.source[this.pos];
          switch (escaped) {
            case 'n': text += '\n'; break;
            case 't': text += '\t'; break;
            case '\\': text += '\\'; break;
            case '"': text += '"'; break;
            case "'": text += "'"; break;
            default: text += '\\' + escaped;
          }
          this.advance();
        }
      } else if (ch === '\n') {
        throw this.error('Unterminated string', startLine, startCol);
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw this.error('Unterminated string', startLine, startCol);
    }
    this.advance(); // skip closing quote
    return { type: TokenType.STRING, value: text, line: startLine, column: startCol };
  }

  private readNumber(): Token {
    const startCol = this.column;
    let num = '';
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      num += this.source[this.pos];
      this.advance();
    }
    // `1.5` is one number; in `1.` the dot is its own token
    if (this.source[this.pos] === '.' && this.isDigit(this.peekChar(1))) {
      num += '.';
      this.advance();
      while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
        num += this.source[this.pos];
        this.advance();
      }
    }
    return { type: TokenType.NUMBER, value: num, line: this.line, column: startCol };
  }

  private readIdentifier(): Token {
    const startCol = this.column;
    let id = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      id += this.source[this.pos];
      this.advance();
    }
    const keyword = Object.prototype.hasOwnProperty.call(KEYWORDS, id) ? KEYWORDS[id] : undefined;
    return { type: keyword ?? TokenType.IDENTIFIER, value: id, line: this.line, column: startCol };
  }

  private readOperator(): Token {
    const ch = this.source[this.pos];
    const next = this.peekChar(1);

    switch (ch) {
      case '+':
        return next === '=' ? this.take(TokenType.PLUS_EQ, 2) : this.take(TokenType.PLUS, 1);
      case '-': return this.take(TokenType.MINUS, 1);
      case '*': return this.take(TokenType.STAR, 1);
      case '/': return this.take(TokenType.SLASH, 1);
      case '^': return this.take(TokenType.CARET, 1);
      case '=':
        return next === '=' ? this.take(TokenType.EQ, 2) : this.take(TokenType.EQUALS, 1);
      case '!':
        return next === '=' ? this.take(TokenType.NEQ, 2) : this.take(TokenType.NOT, 1);
      case '<':
        return next === '=' ? this.take(TokenType.LTE, 2) : this.take(TokenType.LT, 1);
      case '>':
        return next === '=' ? this.take(TokenType.GTE, 2) : this.take(TokenType.GT, 1);
      case '&':
        if (next === '&') return this.take(TokenType.AND, 2);
        break;
      case '|':
        if (next === '|') return this.take(TokenType.OR, 2);
        break;
      case '.': return this.take(TokenType.DOT, 1);
      case ':': return this.take(TokenType.COLON, 1);
      case ',': return this.take(TokenType.COMMA, 1);
      case ';': return this.take(TokenType.SEMICOLON, 1);
      case '(': return this.take(TokenType.LPAREN, 1);
      case ')': return this.take(TokenType.RPAREN, 1);
      case '{': return this.take(TokenType.LBRACE, 1);
      case '}': return this.take(TokenType.RBRACE, 1);
      case '[': return this.take(TokenType.LBRACKET, 1);
      case ']': return this.take(TokenType.RBRACKET, 1);
    }
    throw this.error(`Unexpected character '${ch}'`, this.line, this.column);
  }

  private take(type: TokenType, length: number): Token {
    const token: Token = {
      type,
      value: this.source.slice(this.pos, this.pos + length),
      line: this.line,
      column: this.column,
    };
    for (let i = 0; i < length; i++) this.advance();
    return token;
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private newline(): void {
    this.pos++;
    this.line++;
    this.column = 1;
  }

  private peekChar(offset: number): string {
    const idx = this.pos + offset;
    return idx < this.source.length ? this.source[idx] : '';
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string, line: number, column: number): OxError {
    return new OxError('LexError', message, { line, column });
  }
}

/**
 * Lazy, restartable token sequence over `source`. Lex errors surface while
 * iterating, at the offending character.
 */
export function tokenize(source: string): Iterable<Token> {
  return {
    [Symbol.iterator]: () => new Lexer(source).tokens(),
  };
}
