/**
 * Evaluation entry points used by execute()
 *
 * @internal
 */

import type { StatementNode } from '../../../types.js';
import type { Signal } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import { getEvaluator } from './evaluator.js';

export { Evaluator, getEvaluator } from './evaluator.js';

/** Execute one top-level statement in the context's root scope */
export function executeStatement(
  stmt: StatementNode,
  ctx: RuntimeContext
): Promise<Signal> {
  return getEvaluator(ctx).executeStatement(stmt);
}
