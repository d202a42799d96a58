/**
 * Parser Extension: Primary Expressions
 * Literals, identifiers, grouping and list literals
 */

import { Parser } from './parser.js';
import type { ExpressionNode, ListLiteralNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  expectedError,
  makeSpan,
  skipNewlines,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseListLiteral(): ListLiteralNode;
  }
}

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.INT:
      advance(this.state);
      return { type: 'IntLiteral', value: BigInt(token.value), span };
    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      return { type: 'FloatLiteral', value: Number(token.value), span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span };
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span,
      };
    case TOKEN_TYPES.GHOST:
      advance(this.state);
      return { type: 'NullLiteral', span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span };
    case TOKEN_TYPES.LPAREN: {
      // Grouping only; the inner node keeps its own span
      advance(this.state);
      skipNewlines(this.state);
      const inner = this.parseExpression();
      skipNewlines(this.state);
      expect(this.state, TOKEN_TYPES.RPAREN);
      return inner;
    }
    case TOKEN_TYPES.LBRACKET:
      return this.parseListLiteral();
    default:
      throw expectedError(this.state, 'expression');
  }
};

/** [a, b, c] with optional newlines between elements */
Parser.prototype.parseListLiteral = function (this: Parser): ListLiteralNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACKET).span.start;
  const elements: ExpressionNode[] = [];

  skipNewlines(this.state);
  if (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    elements.push(this.parseExpression());
    skipNewlines(this.state);
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      skipNewlines(this.state);
      elements.push(this.parseExpression());
      skipNewlines(this.state);
    }
  }

  const end = expect(this.state, TOKEN_TYPES.RBRACKET, "',' or ']'").span
    .end;
  return { type: 'ListLiteral', elements, span: makeSpan(start, end) };
};
