import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

/** Statements inside `{ ... }` */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | MissionDeclNode
  | AssignNode
  | IfChainNode
  | EachLoopNode
  | ChaseLoopNode
  | ExtractNode
  | AbortNode
  | ProceedNode
  | ExpressionStatementNode;

/**
 * Mission declaration: mission name(a, b) { ... }
 * Binds `name` in the current scope before the body can ever run.
 */
export interface MissionDeclNode extends BaseNode {
  readonly type: 'MissionDecl';
  readonly name: string;
  readonly params: string[];
  readonly body: BlockNode;
}

/**
 * Assignment.
 * - assign x = expr  (declare: true)  binds in the current scope
 * - x = expr         (declare: false) rebinds the nearest existing binding
 */
export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: ExpressionNode;
  readonly declare: boolean;
}

export interface ConditionalBranch {
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/**
 * check (c) { } followup (c) { } ... otherwise { }
 * branches[0] is the `check` clause; the rest are `followup` clauses.
 */
export interface IfChainNode extends BaseNode {
  readonly type: 'IfChain';
  readonly branches: ConditionalBranch[];
  readonly otherwise: BlockNode | null;
}

/** Half-open range `start..end` used by `each` */
export interface RangeNode extends BaseNode {
  readonly type: 'Range';
  readonly start: ExpressionNode;
  readonly end: ExpressionNode;
}

/**
 * each v in (start..end) { }  iterates integers in [start, end)
 * each v in (list) { }        iterates list elements or string characters
 */
export interface EachLoopNode extends BaseNode {
  readonly type: 'EachLoop';
  readonly variable: string;
  readonly iterable: RangeNode | ExpressionNode;
  readonly body: BlockNode;
}

export interface ChaseLoopNode extends BaseNode {
  readonly type: 'ChaseLoop';
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/** extract [expr] */
export interface ExtractNode extends BaseNode {
  readonly type: 'Extract';
  readonly value: ExpressionNode | null;
}

export interface AbortNode extends BaseNode {
  readonly type: 'Abort';
}

export interface ProceedNode extends BaseNode {
  readonly type: 'Proceed';
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | BinaryExprNode
  | LogicalExprNode
  | UnaryExprNode
  | CallNode
  | IndexNode
  | IdentifierNode
  | LiteralNode
  | ListLiteralNode;

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%' | '^';

export type ComparisonOp = '==' | '!=' | '<' | '>' | '<=' | '>=';

export type BinaryOp = ArithmeticOp | ComparisonOp;

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** `and` / `or` with short-circuit evaluation */
export interface LogicalExprNode extends BaseNode {
  readonly type: 'LogicalExpr';
  readonly op: 'and' | 'or';
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: '-' | '+' | 'not';
  readonly operand: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly target: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode[];
}

// ============================================================
// LITERALS
// ============================================================

export type LiteralNode =
  | IntLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NullLiteralNode;

export interface IntLiteralNode extends BaseNode {
  readonly type: 'IntLiteral';
  readonly value: bigint;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

/** `ghost` */
export interface NullLiteralNode extends BaseNode {
  readonly type: 'NullLiteral';
}

// ============================================================
// UNION
// ============================================================

export type ASTNode =
  | ProgramNode
  | BlockNode
  | StatementNode
  | RangeNode
  | ExpressionNode;

export type NodeType = ASTNode['type'];
