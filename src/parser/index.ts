/**
 * SpyLang Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ProgramNode } from '../types.js';
import { Parser } from './parser.js';

// Extension modules register prototype methods on Parser.
// These must be imported AFTER parser.js so the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

/**
 * Parse SpyLang source code into an AST.
 *
 * @throws IllegalCharacterError or ExpectedCharacterError on the first
 * lexical or syntax error
 *
 * @example
 * ```typescript
 * const ast = parse('assign x = 1 + 2');
 * ```
 */
export function parse(source: string): ProgramNode {
  return new Parser(tokenize(source)).parse();
}

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
