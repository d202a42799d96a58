/**
 * Operator and Keyword Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operators, matched before single characters */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '..': TOKEN_TYPES.RANGE,
};

export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '^': TOKEN_TYPES.CARET,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Reserved words, including the literal words true/false/ghost */
export const KEYWORDS: Record<string, TokenType> = {
  assign: TOKEN_TYPES.ASSIGN_KW,
  check: TOKEN_TYPES.CHECK,
  followup: TOKEN_TYPES.FOLLOWUP,
  otherwise: TOKEN_TYPES.OTHERWISE,
  each: TOKEN_TYPES.EACH,
  chase: TOKEN_TYPES.CHASE,
  mission: TOKEN_TYPES.MISSION,
  extract: TOKEN_TYPES.EXTRACT,
  abort: TOKEN_TYPES.ABORT,
  proceed: TOKEN_TYPES.PROCEED,
  in: TOKEN_TYPES.IN,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  ghost: TOKEN_TYPES.GHOST,
};
