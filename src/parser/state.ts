/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import {
  ExpectedCharacterError,
  TOKEN_DESCRIPTIONS,
  TOKEN_TYPES,
} from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or fail with ExpectedCharacterError.
 * `expected` overrides the default description of `type`.
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected?: string
): Token {
  if (check(state, type)) return advance(state);
  throw expectedError(state, expected ?? TOKEN_DESCRIPTIONS[type]);
}

/**
 * Build the error for a missing construct at the current token.
 * @internal
 */
export function expectedError(
  state: ParserState,
  expected: string
): ExpectedCharacterError {
  const token = current(state);
  return new ExpectedCharacterError(
    expected,
    describeToken(token),
    token.span.start
  );
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

/** Skip statement separators (newlines and semicolons) @internal */
export function skipSeparators(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
    advance(state);
  }
}

/**
 * Skip newlines only when the first token after them is one of `types`.
 * Lets `}` and `followup` sit on different lines without swallowing
 * the separator that ends the statement otherwise.
 * @internal
 */
export function skipNewlinesIfFollowedBy(
  state: ParserState,
  ...types: TokenType[]
): boolean {
  let offset = 0;
  while (peek(state, offset).type === TOKEN_TYPES.NEWLINE) offset++;
  if (!types.includes(peek(state, offset).type)) return false;
  state.pos += offset;
  return true;
}

// ============================================================
// DESCRIPTIONS & SPANS
// ============================================================

/** Human-readable description of a token for error messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
      return `identifier '${token.value}'`;
    case TOKEN_TYPES.INT:
    case TOKEN_TYPES.FLOAT:
      return `number ${token.value}`;
    case TOKEN_TYPES.STRING:
      return `string ${JSON.stringify(token.value)}`;
    default:
      return TOKEN_DESCRIPTIONS[token.type];
  }
}

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** End location of the most recently consumed token @internal */
export function previousEnd(state: ParserState): SourceLocation {
  const token = state.tokens[state.pos - 1] ?? current(state);
  return token.span.end;
}
