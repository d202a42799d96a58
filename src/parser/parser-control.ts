/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops and extract
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  ChaseLoopNode,
  ConditionalBranch,
  EachLoopNode,
  ExpressionNode,
  ExtractNode,
  IfChainNode,
  RangeNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  expect,
  makeSpan,
  previousEnd,
  skipNewlinesIfFollowedBy,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseCondition(): ExpressionNode;
    parseIfChain(): IfChainNode;
    parseEachLoop(): EachLoopNode;
    parseChaseLoop(): ChaseLoopNode;
    parseExtract(): ExtractNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** { statements } */
Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE).span.start;
  const statements = this.parseStatementList(TOKEN_TYPES.RBRACE);
  const end = expect(this.state, TOKEN_TYPES.RBRACE).span.end;
  return { type: 'Block', statements, span: makeSpan(start, end) };
};

/** ( expr ) */
Parser.prototype.parseCondition = function (this: Parser): ExpressionNode {
  expect(this.state, TOKEN_TYPES.LPAREN);
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN);
  return condition;
};

// ============================================================
// CONDITIONALS
// ============================================================

/** check (c) { } followup (c) { } ... otherwise { } */
Parser.prototype.parseIfChain = function (this: Parser): IfChainNode {
  const start = expect(this.state, TOKEN_TYPES.CHECK).span.start;
  const branches: ConditionalBranch[] = [
    { condition: this.parseCondition(), body: this.parseBlock() },
  ];

  while (skipNewlinesIfFollowedBy(this.state, TOKEN_TYPES.FOLLOWUP)) {
    advance(this.state);
    branches.push({
      condition: this.parseCondition(),
      body: this.parseBlock(),
    });
  }

  let otherwise: BlockNode | null = null;
  if (skipNewlinesIfFollowedBy(this.state, TOKEN_TYPES.OTHERWISE)) {
    advance(this.state);
    otherwise = this.parseBlock();
  }

  return {
    type: 'IfChain',
    branches,
    otherwise,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// LOOPS
// ============================================================

/**
 * each v in (start..end) { }
 * each v in (expr) { }
 */
Parser.prototype.parseEachLoop = function (this: Parser): EachLoopNode {
  const start = expect(this.state, TOKEN_TYPES.EACH).span.start;
  const variable = expect(this.state, TOKEN_TYPES.IDENTIFIER).value;
  expect(this.state, TOKEN_TYPES.IN);
  expect(this.state, TOKEN_TYPES.LPAREN);

  const first = this.parseExpression();
  let iterable: RangeNode | ExpressionNode = first;
  if (check(this.state, TOKEN_TYPES.RANGE)) {
    advance(this.state);
    const last = this.parseExpression();
    iterable = {
      type: 'Range',
      start: first,
      end: last,
      span: makeSpan(first.span.start, last.span.end),
    };
  }

  expect(this.state, TOKEN_TYPES.RPAREN);
  const body = this.parseBlock();

  return {
    type: 'EachLoop',
    variable,
    iterable,
    body,
    span: makeSpan(start, body.span.end),
  };
};

/** chase (cond) { } */
Parser.prototype.parseChaseLoop = function (this: Parser): ChaseLoopNode {
  const start = expect(this.state, TOKEN_TYPES.CHASE).span.start;
  const condition = this.parseCondition();
  const body = this.parseBlock();
  return {
    type: 'ChaseLoop',
    condition,
    body,
    span: makeSpan(start, body.span.end),
  };
};

// ============================================================
// EXTRACT
// ============================================================

/** extract [expr]; a bare extract yields ghost */
Parser.prototype.parseExtract = function (this: Parser): ExtractNode {
  const token = expect(this.state, TOKEN_TYPES.EXTRACT);

  if (
    check(
      this.state,
      TOKEN_TYPES.NEWLINE,
      TOKEN_TYPES.SEMICOLON,
      TOKEN_TYPES.RBRACE,
      TOKEN_TYPES.EOF
    )
  ) {
    return { type: 'Extract', value: null, span: token.span };
  }

  const value = this.parseExpression();
  return {
    type: 'Extract',
    value,
    span: makeSpan(token.span.start, value.span.end),
  };
};
