/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Recursive-descent parser that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: program, statements, assignment
 * - parser-control.ts: blocks, check/followup/otherwise, each, chase, extract
 * - parser-functions.ts: mission declarations, call arguments
 * - parser-expr.ts: precedence chain and postfix operators
 * - parser-literals.ts: literals, identifiers, groups, list literals
 *
 * @example
 * ```typescript
 * const ast = new Parser(tokenize(source)).parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /** Parse tokens into a complete program. Throws on the first error. */
  parse(): ProgramNode {
    return this.parseProgram();
  }
}
