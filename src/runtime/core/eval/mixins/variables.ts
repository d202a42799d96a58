/**
 * Variables: identifier lookup, assignment and mission declarations
 *
 * @internal
 */

import type {
  AssignNode,
  IdentifierNode,
  MissionDeclNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { mission } from '../../callable.js';
import { declareVariable, getVariable, setVariable } from '../../context.js';
import type { SpyValue } from '../../values.js';
import { Evaluator } from '../base.js';

declare module '../base.js' {
  interface Evaluator {
    evaluateIdentifier(node: IdentifierNode): SpyValue;
    executeAssign(node: AssignNode): Promise<SpyValue>;
    executeMissionDecl(node: MissionDeclNode): SpyValue;
  }
}

Evaluator.prototype.evaluateIdentifier = function (
  this: Evaluator,
  node: IdentifierNode
): SpyValue {
  const value = getVariable(this.ctx, node.name);
  if (value === undefined) {
    throw RuntimeError.fromNode('SPY-R001', { name: node.name }, node);
  }
  return value;
};

/** `assign` binds locally; bare `=` rebinds the nearest binding */
Evaluator.prototype.executeAssign = async function (
  this: Evaluator,
  node: AssignNode
): Promise<SpyValue> {
  const value = await this.evaluateExpression(node.value);
  if (node.declare) {
    declareVariable(this.ctx, node.name, value);
  } else {
    setVariable(this.ctx, node.name, value);
  }
  return value;
};

/**
 * Bind a closure over the current scope. The name is bound in that same
 * scope, so the body sees itself and recursion works.
 */
Evaluator.prototype.executeMissionDecl = function (
  this: Evaluator,
  node: MissionDeclNode
): SpyValue {
  const closure = mission(node.name, node.params, node.body, this.ctx);
  declareVariable(this.ctx, node.name, closure);
  return closure;
};
