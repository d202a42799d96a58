/**
 * Lexer Helper Functions
 * Character classes and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const DIGIT = /^[0-9]$/;
const IDENT_START = /^[A-Za-z_]$/;
const IDENT_CHAR = /^[A-Za-z0-9_]$/;

export function isDigit(ch: string): boolean {
  return DIGIT.test(ch);
}

export function isIdentifierStart(ch: string): boolean {
  return IDENT_START.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return IDENT_CHAR.test(ch);
}

/** Insignificant whitespace; '\n' is a statement separator and not skipped */
export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Consume `lexeme` and return its token */
export function consumeToken(
  state: LexerState,
  type: TokenType,
  lexeme: string
): Token {
  const start = currentLocation(state);
  for (let i = 0; i < lexeme.length; i++) advance(state);
  return makeToken(type, lexeme, start, currentLocation(state));
}
