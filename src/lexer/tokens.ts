export enum TokenType {
  // Literals
  NUMBER = 'NUMBER',
  STRING = 'STRING',
  IDENTIFIER = 'IDENTIFIER',

  // Arithmetic
  PLUS = 'PLUS',               // +
  MINUS = 'MINUS',             // -
  STAR = 'STAR',               // *
  SLASH = 'SLASH',             // /
  CARET = 'CARET',             // ^
  PLUS_EQ = 'PLUS_EQ',         // +=
  EQUALS = 'EQUALS',           // =

  // Comparison
  EQ = 'EQ',                   // ==
  NEQ = 'NEQ',                 // !=
  LT = 'LT',                   // <
  GT = 'GT',                   // >
  LTE = 'LTE',                 // <=
  GTE = 'GTE',                 // >=

  // Boolean
  AND = 'AND',                 // &&
  OR = 'OR',                   // ||
  NOT = 'NOT',                 // !

  // Punctuation
  DOT = 'DOT',                 // .
  COLON = 'COLON',             // :
  COMMA = 'COMMA',             // ,
  SEMICOLON = 'SEMICOLON',     // ;
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )
  LBRACE = 'LBRACE',           // {
  RBRACE = 'RBRACE',           // }
  LBRACKET = 'LBRACKET',       // [
  RBRACKET = 'RBRACKET',       // ]

  // Keywords
  FUNC = 'FUNC',
  STRUCT = 'STRUCT',
  INHERITS = 'INHERITS',
  IF = 'IF',
  ELSE = 'ELSE',
  WHILE = 'WHILE',
  FOR = 'FOR',
  IN = 'IN',
  RETURN = 'RETURN',
  BREAK = 'BREAK',
  CONTINUE = 'CONTINUE',
  TRUE = 'TRUE',
  FALSE = 'FALSE',
  NIL = 'NIL',
  IMPORT = 'IMPORT',

  EOF = 'EOF',
}

export const KEYWORDS: Record<string, TokenType> = {
  'func': TokenType.FUNC,
  'struct': TokenType.STRUCT,
  'inherits': TokenType.INHERITS,
  'if': TokenType.IF,
  'else': TokenType.ELSE,
  'while': TokenType.WHILE,
  'for': TokenType.FOR,
  'in': TokenType.IN,
  'return': TokenType.RETURN,
  'break': TokenType.BREAK,
  'continue': TokenType.CONTINUE,
  'true': TokenType.TRUE,
  'false': TokenType.FALSE,
  'nil': TokenType.NIL,
  'import': TokenType.IMPORT,
};

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}
