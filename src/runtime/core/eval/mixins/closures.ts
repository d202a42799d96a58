/**
 * Closures: mission calls and invocation
 *
 * @internal
 */

import type { CallNode } from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { isCallable, type MissionCallable } from '../../callable.js';
import {
  callDepth,
  createChildContext,
  declareVariable,
  popCallFrame,
  pushCallFrame,
} from '../../context.js';
import { inferType, type SpyValue } from '../../values.js';
import { Evaluator } from '../base.js';

declare module '../base.js' {
  interface Evaluator {
    evaluateCall(node: CallNode): Promise<SpyValue>;
    invokeCallable(
      callee: SpyValue,
      args: SpyValue[],
      node: CallNode
    ): Promise<SpyValue>;
    invokeMission(callee: MissionCallable, args: SpyValue[]): Promise<SpyValue>;
  }
}

/** Callee first, then arguments left to right, then the call */
Evaluator.prototype.evaluateCall = async function (
  this: Evaluator,
  node: CallNode
): Promise<SpyValue> {
  const callee = await this.evaluateExpression(node.callee);
  const args: SpyValue[] = [];
  for (const argNode of node.args) {
    args.push(await this.evaluateExpression(argNode));
  }
  return this.invokeCallable(callee, args, node);
};

/**
 * Invoke a mission or built-in with evaluated arguments.
 *
 * Pushes a call frame for the duration of the call. A RuntimeError leaving
 * the call records the stack as it was at the failure point.
 */
Evaluator.prototype.invokeCallable = async function (
  this: Evaluator,
  callee: SpyValue,
  args: SpyValue[],
  node: CallNode
): Promise<SpyValue> {
  if (!isCallable(callee)) {
    throw RuntimeError.fromNode(
      'SPY-R004',
      { type: inferType(callee) },
      node.callee
    );
  }

  const expected =
    callee.kind === 'mission' ? callee.params.length : callee.arity;
  if (args.length !== expected) {
    throw RuntimeError.fromNode(
      'SPY-R003',
      { name: callee.name, expected, actual: args.length },
      node
    );
  }

  if (callDepth(this.ctx) >= this.ctx.maxCallDepth) {
    const error = RuntimeError.fromNode(
      'SPY-R013',
      { limit: this.ctx.maxCallDepth },
      node
    );
    error.captureCallStack(this.ctx.callStack);
    throw error;
  }

  pushCallFrame(this.ctx, {
    location: node.span,
    functionName: callee.name,
    file: this.ctx.file,
  });
  const startTime = Date.now();
  this.ctx.observability.onMissionCall?.({
    name: callee.name,
    args,
    depth: callDepth(this.ctx),
  });

  try {
    const value =
      callee.kind === 'mission'
        ? await this.invokeMission(callee, args)
        : await callee.fn(args, this.ctx, node.span.start);

    this.ctx.observability.onMissionReturn?.({
      name: callee.name,
      value,
      durationMs: Date.now() - startTime,
    });
    return value;
  } catch (error) {
    if (error instanceof RuntimeError) {
      error.captureCallStack(this.ctx.callStack);
    }
    throw error;
  } finally {
    popCallFrame(this.ctx);
  }
};

/**
 * Run a mission body in a fresh child of its captured scope.
 * `extract` supplies the result; falling off the end yields ghost.
 */
Evaluator.prototype.invokeMission = async function (
  this: Evaluator,
  callee: MissionCallable,
  args: SpyValue[]
): Promise<SpyValue> {
  const scope = createChildContext(callee.scope);
  callee.params.forEach((param, i) => {
    declareVariable(scope, param, args[i] ?? null);
  });

  const signal = await this.inScope(scope, () =>
    this.executeStatements(callee.body.statements)
  );

  switch (signal.kind) {
    case 'return':
      return signal.value;
    case 'normal':
      return null;
    case 'break':
    case 'continue':
      throw this.loopSignalError(signal);
  }
};
