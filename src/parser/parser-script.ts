/**
 * Parser Extension: Program and Statement Parsing
 */

import { Parser } from './parser.js';
import type {
  AssignNode,
  ProgramNode,
  StatementNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  expectedError,
  makeSpan,
  peek,
  previousEnd,
  skipSeparators,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatementList(terminator: TokenType): StatementNode[];
    parseStatement(): StatementNode;
    parseAssign(): AssignNode;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements = this.parseStatementList(TOKEN_TYPES.EOF);
  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Statements up to (not including) `terminator`. Each statement must be
 * followed by a newline, a ';' or the terminator, unless it ends with a
 * closing '}'.
 */
Parser.prototype.parseStatementList = function (
  this: Parser,
  terminator: TokenType
): StatementNode[] {
  const statements: StatementNode[] = [];
  skipSeparators(this.state);

  while (!check(this.state, terminator, TOKEN_TYPES.EOF)) {
    statements.push(this.parseStatement());
    const closedBlock = peek(this.state, -1).type === TOKEN_TYPES.RBRACE;

    if (check(this.state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
      skipSeparators(this.state);
    } else if (
      !closedBlock &&
      !check(this.state, terminator, TOKEN_TYPES.EOF)
    ) {
      throw expectedError(this.state, "newline or ';'");
    }
  }

  return statements;
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.ASSIGN_KW:
      return this.parseAssign();
    case TOKEN_TYPES.MISSION:
      return this.parseMissionDecl();
    case TOKEN_TYPES.CHECK:
      return this.parseIfChain();
    case TOKEN_TYPES.EACH:
      return this.parseEachLoop();
    case TOKEN_TYPES.CHASE:
      return this.parseChaseLoop();
    case TOKEN_TYPES.EXTRACT:
      return this.parseExtract();
    case TOKEN_TYPES.ABORT:
      advance(this.state);
      return { type: 'Abort', span: token.span };
    case TOKEN_TYPES.PROCEED:
      advance(this.state);
      return { type: 'Proceed', span: token.span };
  }

  // name = expr
  if (
    token.type === TOKEN_TYPES.IDENTIFIER &&
    peek(this.state, 1).type === TOKEN_TYPES.ASSIGN
  ) {
    return this.parseAssign();
  }

  const expression = this.parseExpression();
  return {
    type: 'ExpressionStatement',
    expression,
    span: expression.span,
  };
};

/**
 * assign name = expr   declares in the current scope
 * name = expr          rebinds the nearest binding
 */
Parser.prototype.parseAssign = function (this: Parser): AssignNode {
  const start = current(this.state).span.start;
  const declare = check(this.state, TOKEN_TYPES.ASSIGN_KW);
  if (declare) advance(this.state);

  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER).value;
  expect(this.state, TOKEN_TYPES.ASSIGN);
  const value = this.parseExpression();

  return {
    type: 'Assign',
    name,
    value,
    declare,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
