/**
 * Literals and list construction
 *
 * @internal
 */

import type { ListLiteralNode, LiteralNode } from '../../../../types.js';
import type { SpyValue } from '../../values.js';
import { Evaluator } from '../base.js';

declare module '../base.js' {
  interface Evaluator {
    evaluateLiteral(node: LiteralNode): SpyValue;
    evaluateListLiteral(node: ListLiteralNode): Promise<SpyValue[]>;
  }
}

Evaluator.prototype.evaluateLiteral = function (
  this: Evaluator,
  node: LiteralNode
): SpyValue {
  switch (node.type) {
    case 'IntLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
      return node.value;
    case 'NullLiteral':
      return null;
  }
};

/** Every evaluation creates a fresh list; elements run left to right */
Evaluator.prototype.evaluateListLiteral = async function (
  this: Evaluator,
  node: ListLiteralNode
): Promise<SpyValue[]> {
  const list: SpyValue[] = [];
  for (const element of node.elements) {
    list.push(await this.evaluateExpression(element));
  }
  return list;
};
