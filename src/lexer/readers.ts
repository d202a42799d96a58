/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token, TokenType } from '../types.js';
import { ExpectedCharacterError, TOKEN_TYPES } from '../types.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '\\': '\\',
  '"': '"',
};

/** Unknown escapes stand for the escaped character itself */
function processEscape(state: LexerState): string {
  const escaped = advance(state);
  return ESCAPES[escaped] ?? escaped;
}

/**
 * Read a double-quoted string. The token value is the unescaped content.
 * Strings may span lines; reaching end of input before the closing quote
 * is an error.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\') {
      advance(state);
      if (isAtEnd(state)) break;
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw new ExpectedCharacterError(
      "'\"'",
      'end of input',
      currentLocation(state)
    );
  }

  advance(state); // closing "
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * Read an INT or FLOAT literal. A '.' is part of the number only when a
 * digit follows it, so `1..10` reads as INT, RANGE, INT.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';
  let type: TokenType = TOKEN_TYPES.INT;

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    type = TOKEN_TYPES.FLOAT;
    value += advance(state);
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
  }

  return makeToken(type, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = Object.hasOwn(KEYWORDS, value)
    ? (KEYWORDS[value] ?? TOKEN_TYPES.IDENTIFIER)
    : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
