/**
 * SpyLang Parser Tests
 * AST shapes, precedence and syntax errors
 */

import { describe, expect, it } from 'vitest';
import {
  ExpectedCharacterError,
  parse,
  type ExpressionNode,
  type StatementNode,
} from '../../src/index.js';

function firstStatement(source: string): StatementNode {
  const statement = parse(source).statements[0];
  if (!statement) throw new Error('no statement parsed');
  return statement;
}

function expression(source: string): ExpressionNode {
  const statement = firstStatement(source);
  if (statement.type !== 'ExpressionStatement') {
    throw new Error(`expected an expression statement, got ${statement.type}`);
  }
  return statement.expression;
}

/** Compact rendering of an expression tree for precedence assertions */
function shape(node: ExpressionNode): string {
  switch (node.type) {
    case 'BinaryExpr':
    case 'LogicalExpr':
      return `(${shape(node.left)} ${node.op} ${shape(node.right)})`;
    case 'UnaryExpr':
      return `(${node.op} ${shape(node.operand)})`;
    case 'Call':
      return `${shape(node.callee)}(${node.args.map(shape).join(', ')})`;
    case 'Index':
      return `${shape(node.target)}[${shape(node.index)}]`;
    case 'Identifier':
      return node.name;
    case 'IntLiteral':
      return node.value.toString();
    case 'FloatLiteral':
      return String(node.value);
    case 'StringLiteral':
      return JSON.stringify(node.value);
    case 'BoolLiteral':
      return String(node.value);
    case 'NullLiteral':
      return 'ghost';
    case 'ListLiteral':
      return `[${node.elements.map(shape).join(', ')}]`;
  }
}

describe('SpyLang Parser', () => {
  describe('statements', () => {
    it('parses assign as a declaration and bare = as a rebinding', () => {
      const program = parse('assign x = 1\nx = 2');
      expect(program.statements.map((s) => s.type)).toEqual([
        'Assign',
        'Assign',
      ]);
      const [declared, rebound] = program.statements;
      expect(declared?.type === 'Assign' && declared.declare).toBe(true);
      expect(rebound?.type === 'Assign' && rebound.declare).toBe(false);
    });

    it('parses a mission declaration', () => {
      const statement = firstStatement('mission add(a, b) { extract a + b }');
      expect(statement.type).toBe('MissionDecl');
      if (statement.type === 'MissionDecl') {
        expect(statement.name).toBe('add');
        expect(statement.params).toEqual(['a', 'b']);
        expect(statement.body.statements.map((s) => s.type)).toEqual([
          'Extract',
        ]);
      }
    });

    it('parses check with followup and otherwise on later lines', () => {
      const statement = firstStatement(
        'check (x < 1) {\n  1\n}\nfollowup (x < 2) {\n  2\n}\notherwise {\n  3\n}'
      );
      expect(statement.type).toBe('IfChain');
      if (statement.type === 'IfChain') {
        expect(statement.branches).toHaveLength(2);
        expect(statement.otherwise?.statements).toHaveLength(1);
      }
    });

    it('ends a check chain at a statement that is not followup or otherwise', () => {
      const program = parse('check (true) { 1 }\n\ntransmit(2)');
      expect(program.statements.map((s) => s.type)).toEqual([
        'IfChain',
        'ExpressionStatement',
      ]);
    });

    it('parses each over a range and over an expression', () => {
      const range = firstStatement('each i in (1..10) { }');
      const list = firstStatement('each v in (items) { }');
      expect(range.type === 'EachLoop' && range.iterable.type).toBe('Range');
      expect(list.type === 'EachLoop' && list.iterable.type).toBe('Identifier');
    });

    it('parses a bare extract as extracting ghost', () => {
      const statement = firstStatement('extract');
      expect(statement.type === 'Extract' && statement.value).toBeNull();
      const inBlock = firstStatement('mission m() { extract }');
      expect(
        inBlock.type === 'MissionDecl' && inBlock.body.statements[0]?.type
      ).toBe('Extract');
    });

    it('accepts semicolons between statements', () => {
      expect(parse('assign a = 1; assign b = 2;').statements).toHaveLength(2);
    });

    it('accepts an empty program', () => {
      expect(parse('\n# nothing here\n').statements).toEqual([]);
    });
  });

  describe('precedence', () => {
    it.each([
      ['1 + 2 * 3', '(1 + (2 * 3))'],
      ['(1 + 2) * 3', '((1 + 2) * 3)'],
      ['1 - 2 - 3', '((1 - 2) - 3)'],
      ['2 ^ 3 ^ 2', '(2 ^ (3 ^ 2))'],
      ['-2 ^ 2', '(- (2 ^ 2))'],
      ['2 ^ -1', '(2 ^ (- 1))'],
      ['a or b and c', '(a or (b and c))'],
      ['not a == b', '(not (a == b))'],
      ['a < b + 1', '(a < (b + 1))'],
      ['f(1)[0](2)', 'f(1)[0](2)'],
      ['[1, "a", ghost]', '[1, "a", ghost]'],
    ])('parses %s as %s', (source, expected) => {
      expect(shape(expression(source))).toBe(expected);
    });
  });

  describe('spans', () => {
    it('spans a binary expression from its left to its right operand', () => {
      const node = expression('  foo + 12');
      expect(node.span.start.column).toBe(3);
      expect(node.span.end.column).toBe(11);
    });
  });

  describe('errors', () => {
    it('reports a missing closing parenthesis', () => {
      expect(() => parse('transmit(1')).toThrow(ExpectedCharacterError);
      expect(() => parse('transmit(1')).toThrow(
        "Expected ',' or ')', found end of input at 1:11"
      );
    });

    it('reports a missing expression', () => {
      expect(() => parse('assign x = ')).toThrow(
        'Expected expression, found end of input at 1:12'
      );
    });

    it('requires a separator between statements', () => {
      expect(() => parse('assign x = 1 assign y = 2')).toThrow(
        "Expected newline or ';', found 'assign' at 1:14"
      );
    });

    it('accepts a statement right after a closing brace', () => {
      const program = parse('check (true) { 1 } assign y = 2');
      expect(program.statements.map((stmt) => stmt.type)).toEqual([
        'IfChain',
        'Assign',
      ]);
    });

    it('requires parentheses around a check condition', () => {
      expect(() => parse('check x { }')).toThrow(
        "Expected '(', found identifier 'x' at 1:7"
      );
    });

    it('reports an unclosed block', () => {
      expect(() => parse('chase (true) {\n  transmit(1)\n')).toThrow(
        "Expected '}', found end of input at 3:1"
      );
    });

    it('describes number and string tokens', () => {
      expect(() => parse('mission 5() { }')).toThrow(
        'Expected identifier, found number 5 at 1:9'
      );
      expect(() => parse('each "v" in (x) { }')).toThrow(
        'Expected identifier, found string "v" at 1:6'
      );
    });
  });
});
