/**
 * Evaluator Base Class
 *
 * Holds the active scope and the utilities every evaluation module uses.
 * Evaluation methods are attached to the prototype by the modules under
 * mixins/, with declaration merging for their types.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';

export class Evaluator {
  /**
   * Scope the evaluator is currently running in. Swapped by inScope()
   * while blocks and mission bodies execute.
   */
  ctx: RuntimeContext;

  constructor(ctx: RuntimeContext) {
    this.ctx = ctx;
  }

  /** Run `body` with `scope` as the active scope, restoring it afterwards */
  async inScope<T>(scope: RuntimeContext, body: () => Promise<T>): Promise<T> {
    const saved = this.ctx;
    this.ctx = scope;
    try {
      return await body();
    } finally {
      this.ctx = saved;
    }
  }
}
