/**
 * Expressions: dispatch, binary, logical, unary and index expressions
 *
 * Sub-expressions evaluate left to right. Type mismatches raise
 * RuntimeError from the operator helpers.
 *
 * @internal
 */

import type {
  BinaryExprNode,
  ComparisonOp,
  ExpressionNode,
  IndexNode,
  LogicalExprNode,
  UnaryExprNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import {
  applyArithmetic,
  applyComparison,
  applyUnary,
} from '../../operators.js';
import {
  characters,
  inferType,
  isList,
  isTruthy,
  type SpyValue,
} from '../../values.js';
import { Evaluator } from '../base.js';

declare module '../base.js' {
  interface Evaluator {
    evaluateExpression(node: ExpressionNode): Promise<SpyValue>;
    evaluateBinaryExpr(node: BinaryExprNode): Promise<SpyValue>;
    evaluateLogicalExpr(node: LogicalExprNode): Promise<boolean>;
    evaluateUnaryExpr(node: UnaryExprNode): Promise<SpyValue>;
    evaluateIndex(node: IndexNode): Promise<SpyValue>;
  }
}

const COMPARISON_OPS: ReadonlySet<string> = new Set([
  '==',
  '!=',
  '<',
  '>',
  '<=',
  '>=',
]);

function isComparison(op: BinaryExprNode['op']): op is ComparisonOp {
  return COMPARISON_OPS.has(op);
}

Evaluator.prototype.evaluateExpression = async function (
  this: Evaluator,
  node: ExpressionNode
): Promise<SpyValue> {
  switch (node.type) {
    case 'BinaryExpr':
      return this.evaluateBinaryExpr(node);
    case 'LogicalExpr':
      return this.evaluateLogicalExpr(node);
    case 'UnaryExpr':
      return this.evaluateUnaryExpr(node);
    case 'Call':
      return this.evaluateCall(node);
    case 'Index':
      return this.evaluateIndex(node);
    case 'Identifier':
      return this.evaluateIdentifier(node);
    case 'ListLiteral':
      return this.evaluateListLiteral(node);
    case 'IntLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
    case 'NullLiteral':
      return this.evaluateLiteral(node);
  }
};

Evaluator.prototype.evaluateBinaryExpr = async function (
  this: Evaluator,
  node: BinaryExprNode
): Promise<SpyValue> {
  const left = await this.evaluateExpression(node.left);
  const right = await this.evaluateExpression(node.right);
  const { op } = node;
  return isComparison(op)
    ? applyComparison(op, left, right, node)
    : applyArithmetic(op, left, right, node);
};

/** Short-circuit; the result is always Bool */
Evaluator.prototype.evaluateLogicalExpr = async function (
  this: Evaluator,
  node: LogicalExprNode
): Promise<boolean> {
  const left = isTruthy(await this.evaluateExpression(node.left));
  if (node.op === 'and' ? !left : left) return left;
  return isTruthy(await this.evaluateExpression(node.right));
};

Evaluator.prototype.evaluateUnaryExpr = async function (
  this: Evaluator,
  node: UnaryExprNode
): Promise<SpyValue> {
  const operand = await this.evaluateExpression(node.operand);
  return applyUnary(node.op, operand, node);
};

/** list[i] or str[i] with an Int index in [0, length) */
Evaluator.prototype.evaluateIndex = async function (
  this: Evaluator,
  node: IndexNode
): Promise<SpyValue> {
  const target = await this.evaluateExpression(node.target);
  const index = await this.evaluateExpression(node.index);

  let items: SpyValue[];
  if (isList(target)) {
    items = target;
  } else if (typeof target === 'string') {
    items = characters(target);
  } else {
    throw RuntimeError.fromNode(
      'SPY-R005',
      { type: inferType(target) },
      node.target
    );
  }

  if (typeof index !== 'bigint') {
    throw RuntimeError.fromNode(
      'SPY-R002',
      { detail: `Index must be Int, received ${inferType(index)}` },
      node.index
    );
  }

  const item = index >= 0n ? items[Number(index)] : undefined;
  if (item === undefined) {
    throw RuntimeError.fromNode(
      'SPY-R006',
      { index: index.toString(), length: items.length },
      node
    );
  }
  return item;
};
