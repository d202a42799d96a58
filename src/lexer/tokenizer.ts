/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import {
  ExpectedCharacterError,
  IllegalCharacterError,
  TOKEN_TYPES,
} from '../types.js';
import {
  consumeToken,
  isBlank,
  isDigit,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip blanks and `#` comments; stops before a newline */
function skipTrivia(state: LexerState): void {
  for (;;) {
    while (!isAtEnd(state) && isBlank(peek(state))) {
      advance(state);
    }
    if (peek(state) !== '#') return;
    while (!isAtEnd(state) && peek(state) !== '\n') {
      advance(state);
    }
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const ch = peek(state);

  if (ch === '\n') {
    return consumeToken(state, TOKEN_TYPES.NEWLINE, '\n');
  }

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  const twoChar = peekString(state, 2);
  if (Object.hasOwn(TWO_CHAR_OPERATORS, twoChar)) {
    const type = TWO_CHAR_OPERATORS[twoChar];
    if (type !== undefined) return consumeToken(state, type, twoChar);
  }

  if (Object.hasOwn(SINGLE_CHAR_OPERATORS, ch)) {
    const type = SINGLE_CHAR_OPERATORS[ch];
    if (type !== undefined) return consumeToken(state, type, ch);
  }

  // '!' only exists as the first half of '!='
  if (ch === '!') {
    advance(state);
    const found = isAtEnd(state) ? 'end of input' : JSON.stringify(peek(state));
    throw new ExpectedCharacterError(
      "'=' after '!'",
      found,
      currentLocation(state)
    );
  }

  throw new IllegalCharacterError(ch, currentLocation(state));
}

/**
 * Convert source text to tokens. The last token is always EOF.
 * @throws IllegalCharacterError on an unrecognized character
 * @throws ExpectedCharacterError on an unterminated string or a lone '!'
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
