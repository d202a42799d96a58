/**
 * Parser Extension: Missions and Calls
 */

import { Parser } from './parser.js';
import type { ExpressionNode, MissionDeclNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, expect, makeSpan, skipNewlines } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseMissionDecl(): MissionDeclNode;
    parseParameters(): string[];
    parseArguments(): ExpressionNode[];
  }
}

/** mission name(p1, p2) { body } */
Parser.prototype.parseMissionDecl = function (this: Parser): MissionDeclNode {
  const start = expect(this.state, TOKEN_TYPES.MISSION).span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER).value;
  const params = this.parseParameters();
  const body = this.parseBlock();

  return {
    type: 'MissionDecl',
    name,
    params,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/** (a, b, c) */
Parser.prototype.parseParameters = function (this: Parser): string[] {
  expect(this.state, TOKEN_TYPES.LPAREN);
  const params: string[] = [];

  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    params.push(expect(this.state, TOKEN_TYPES.IDENTIFIER).value);
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      params.push(expect(this.state, TOKEN_TYPES.IDENTIFIER).value);
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
  return params;
};

/** (expr, expr) with optional newlines between arguments */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN);
  const args: ExpressionNode[] = [];

  skipNewlines(this.state);
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseExpression());
    skipNewlines(this.state);
    while (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      skipNewlines(this.state);
      args.push(this.parseExpression());
      skipNewlines(this.state);
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "',' or ')'");
  return args;
};
