/**
 * Composed Evaluator
 *
 * Loads every evaluation module onto the Evaluator prototype and caches
 * one evaluator per root RuntimeContext.
 *
 * Modules:
 * - mixins/control-flow.ts: statements, blocks, check chains, loops
 * - mixins/expressions.ts: expression dispatch and operators
 * - mixins/closures.ts: calls and mission invocation
 * - mixins/variables.ts: lookup, assignment, mission declarations
 * - mixins/literals.ts: literals and list literals
 *
 * @internal
 */

import { Evaluator } from './base.js';
import './mixins/control-flow.js';
import './mixins/expressions.js';
import './mixins/closures.js';
import './mixins/variables.js';
import './mixins/literals.js';
import type { RuntimeContext } from '../types.js';

export { Evaluator };

/**
 * WeakMap cache for evaluator instances.
 * Entries go away with their RuntimeContext.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a context.
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
