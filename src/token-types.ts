import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  GHOST: 'GHOST', // null literal

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  ASSIGN_KW: 'ASSIGN_KW', // assign
  CHECK: 'CHECK',
  FOLLOWUP: 'FOLLOWUP',
  OTHERWISE: 'OTHERWISE',
  EACH: 'EACH',
  CHASE: 'CHASE',
  MISSION: 'MISSION',
  EXTRACT: 'EXTRACT',
  ABORT: 'ABORT',
  PROCEED: 'PROCEED',
  IN: 'IN',
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  CARET: 'CARET', // ^

  // Assignment
  ASSIGN: 'ASSIGN', // =

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Range
  RANGE: 'RANGE', // ..

  // Delimiters
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  COMMA: 'COMMA',
  SEMICOLON: 'SEMICOLON',

  // Special
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Source lexeme (string literals hold their unescaped content) */
  readonly value: string;
  readonly span: SourceSpan;
}

/** Human-readable description of a token type, used in error messages */
export const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  INT: 'integer',
  FLOAT: 'float',
  STRING: 'string',
  TRUE: "'true'",
  FALSE: "'false'",
  GHOST: "'ghost'",
  IDENTIFIER: 'identifier',
  ASSIGN_KW: "'assign'",
  CHECK: "'check'",
  FOLLOWUP: "'followup'",
  OTHERWISE: "'otherwise'",
  EACH: "'each'",
  CHASE: "'chase'",
  MISSION: "'mission'",
  EXTRACT: "'extract'",
  ABORT: "'abort'",
  PROCEED: "'proceed'",
  IN: "'in'",
  AND: "'and'",
  OR: "'or'",
  NOT: "'not'",
  PLUS: "'+'",
  MINUS: "'-'",
  STAR: "'*'",
  SLASH: "'/'",
  PERCENT: "'%'",
  CARET: "'^'",
  ASSIGN: "'='",
  EQ: "'=='",
  NE: "'!='",
  LT: "'<'",
  GT: "'>'",
  LE: "'<='",
  GE: "'>='",
  RANGE: "'..'",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  COMMA: "','",
  SEMICOLON: "';'",
  NEWLINE: 'newline',
  EOF: 'end of input',
};
