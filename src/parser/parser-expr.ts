/**
 * Parser Extension: Expression Parsing
 * Precedence chain from `or` down to postfix call and index
 */

import { Parser } from './parser.js';
import type {
  ArithmeticOp,
  BinaryOp,
  ComparisonOp,
  ExpressionNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  previousEnd,
  skipNewlines,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseNot(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePower(): ExpressionNode;
    parsePostfix(): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const COMPARISON_OPS: Partial<Record<TokenType, ComparisonOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GE]: '>=',
};

const ADDITIVE_OPS: Partial<Record<TokenType, ArithmeticOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, ArithmeticOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

function binary(
  op: BinaryOp,
  left: ExpressionNode,
  right: ExpressionNode
): ExpressionNode {
  return {
    type: 'BinaryExpr',
    op,
    left,
    right,
    span: makeSpan(left.span.start, right.span.end),
  };
}

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseOr();
};

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  let left = this.parseAnd();
  while (check(this.state, TOKEN_TYPES.OR)) {
    advance(this.state);
    const right = this.parseAnd();
    left = {
      type: 'LogicalExpr',
      op: 'or',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
  return left;
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  let left = this.parseNot();
  while (check(this.state, TOKEN_TYPES.AND)) {
    advance(this.state);
    const right = this.parseNot();
    left = {
      type: 'LogicalExpr',
      op: 'and',
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
  return left;
};

Parser.prototype.parseNot = function (this: Parser): ExpressionNode {
  if (!check(this.state, TOKEN_TYPES.NOT)) {
    return this.parseComparison();
  }
  const start = advance(this.state).span.start;
  const operand = this.parseNot();
  return {
    type: 'UnaryExpr',
    op: 'not',
    operand,
    span: makeSpan(start, operand.span.end),
  };
};

/** Left-associative: a < b < c parses as (a < b) < c */
Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  let left = this.parseAdditive();
  for (;;) {
    const op = COMPARISON_OPS[current(this.state).type];
    if (op === undefined) return left;
    advance(this.state);
    left = binary(op, left, this.parseAdditive());
  }
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  let left = this.parseMultiplicative();
  for (;;) {
    const op = ADDITIVE_OPS[current(this.state).type];
    if (op === undefined) return left;
    advance(this.state);
    left = binary(op, left, this.parseMultiplicative());
  }
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  let left = this.parseUnary();
  for (;;) {
    const op = MULTIPLICATIVE_OPS[current(this.state).type];
    if (op === undefined) return left;
    advance(this.state);
    left = binary(op, left, this.parseUnary());
  }
};

/** Prefix - and +. Binds looser than ^, so -2^2 is -(2^2). */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  if (token.type !== TOKEN_TYPES.MINUS && token.type !== TOKEN_TYPES.PLUS) {
    return this.parsePower();
  }
  advance(this.state);
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op: token.type === TOKEN_TYPES.MINUS ? '-' : '+',
    operand,
    span: makeSpan(token.span.start, operand.span.end),
  };
};

/** Right-associative: 2^3^2 is 2^(3^2) */
Parser.prototype.parsePower = function (this: Parser): ExpressionNode {
  const base = this.parsePostfix();
  if (!check(this.state, TOKEN_TYPES.CARET)) return base;
  advance(this.state);
  return binary('^', base, this.parseUnary());
};

// ============================================================
// POSTFIX
// ============================================================

/** Calls and indexing, chained left to right: f(1)[0](2) */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      const args = this.parseArguments();
      expr = {
        type: 'Call',
        callee: expr,
        args,
        span: makeSpan(expr.span.start, previousEnd(this.state)),
      };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      skipNewlines(this.state);
      const index = this.parseExpression();
      skipNewlines(this.state);
      const end = expect(this.state, TOKEN_TYPES.RBRACKET).span.end;
      expr = {
        type: 'Index',
        target: expr,
        index,
        span: makeSpan(expr.span.start, end),
      };
    } else {
      return expr;
    }
  }
};
