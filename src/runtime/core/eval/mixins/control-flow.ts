/**
 * Control Flow: statements, blocks, conditionals and loops
 *
 * Statements return a Signal. Blocks stop at the first non-normal signal;
 * loops consume break and continue and pass return through.
 *
 * @internal
 */

import type {
  BlockNode,
  ChaseLoopNode,
  EachLoopNode,
  IfChainNode,
  StatementNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { createChildContext, declareVariable } from '../../context.js';
import { normal, type LoopSignal, type Signal } from '../../signals.js';
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
    executeStatement(node: StatementNode): Promise<Signal>;
    executeStatements(statements: readonly StatementNode[]): Promise<Signal>;
    executeBlock(block: BlockNode): Promise<Signal>;
    executeIfChain(node: IfChainNode): Promise<Signal>;
    executeEachLoop(node: EachLoopNode): Promise<Signal>;
    executeChaseLoop(node: ChaseLoopNode): Promise<Signal>;
    loopSignalError(signal: LoopSignal): RuntimeError;
  }
}

/** What a loop does after one pass of its body */
type LoopStep = { exit: false } | { exit: true; signal: Signal };

const LOOP_DONE: Signal = normal(null);

// ============================================================
// STATEMENTS
// ============================================================

Evaluator.prototype.executeStatement = async function (
  this: Evaluator,
  node: StatementNode
): Promise<Signal> {
  switch (node.type) {
    case 'MissionDecl':
      return normal(this.executeMissionDecl(node));
    case 'Assign':
      return normal(await this.executeAssign(node));
    case 'IfChain':
      return this.executeIfChain(node);
    case 'EachLoop':
      return this.executeEachLoop(node);
    case 'ChaseLoop':
      return this.executeChaseLoop(node);
    case 'Extract':
      return {
        kind: 'return',
        value: node.value ? await this.evaluateExpression(node.value) : null,
      };
    case 'Abort':
      return { kind: 'break', node };
    case 'Proceed':
      return { kind: 'continue', node };
    case 'ExpressionStatement':
      return normal(await this.evaluateExpression(node.expression));
  }
};

/** Run statements in the active scope; the value is the last statement's */
Evaluator.prototype.executeStatements = async function (
  this: Evaluator,
  statements: readonly StatementNode[]
): Promise<Signal> {
  let value: SpyValue = null;
  for (const statement of statements) {
    const signal = await this.executeStatement(statement);
    if (signal.kind !== 'normal') return signal;
    value = signal.value;
  }
  return normal(value);
};

/** Run a block in a fresh child scope */
Evaluator.prototype.executeBlock = function (
  this: Evaluator,
  block: BlockNode
): Promise<Signal> {
  return this.inScope(createChildContext(this.ctx), () =>
    this.executeStatements(block.statements)
  );
};

/** abort/proceed that escaped every loop */
Evaluator.prototype.loopSignalError = function (
  this: Evaluator,
  signal: LoopSignal
): RuntimeError {
  return RuntimeError.fromNode(
    'SPY-R009',
    { keyword: signal.kind === 'break' ? 'abort' : 'proceed' },
    signal.node
  );
};

// ============================================================
// CONDITIONALS
// ============================================================

/** First truthy branch runs; otherwise the `otherwise` block; else ghost */
Evaluator.prototype.executeIfChain = async function (
  this: Evaluator,
  node: IfChainNode
): Promise<Signal> {
  for (const branch of node.branches) {
    if (isTruthy(await this.evaluateExpression(branch.condition))) {
      return this.executeBlock(branch.body);
    }
  }
  return node.otherwise ? this.executeBlock(node.otherwise) : normal(null);
};

// ============================================================
// LOOPS
// ============================================================

/** Translate the body's signal into what the loop should do next */
function loopStep(signal: Signal): LoopStep {
  switch (signal.kind) {
    case 'normal':
    case 'continue':
      return { exit: false };
    case 'break':
      return { exit: true, signal: LOOP_DONE };
    case 'return':
      return { exit: true, signal };
  }
}

/**
 * each v in (start..end): Int bounds evaluated once, end exclusive.
 * each v in (expr): elements of a List (read live) or characters of a Str.
 * Every iteration gets its own scope holding `v`.
 */
Evaluator.prototype.executeEachLoop = async function (
  this: Evaluator,
  node: EachLoopNode
): Promise<Signal> {
  const iterate = async (value: SpyValue): Promise<LoopStep> => {
    const scope = createChildContext(this.ctx);
    declareVariable(scope, node.variable, value);
    const signal = await this.inScope(scope, () =>
      this.executeStatements(node.body.statements)
    );
    return loopStep(signal);
  };

  if (node.iterable.type === 'Range') {
    const start = await this.evaluateExpression(node.iterable.start);
    const end = await this.evaluateExpression(node.iterable.end);
    if (typeof start !== 'bigint' || typeof end !== 'bigint') {
      throw RuntimeError.fromNode(
        'SPY-R002',
        {
          detail: `Range bounds must be Int, received ${inferType(start)} and ${inferType(end)}`,
        },
        node.iterable
      );
    }
    for (let i = start; i < end; i++) {
      const step = await iterate(i);
      if (step.exit) return step.signal;
    }
    return LOOP_DONE;
  }

  const subject = await this.evaluateExpression(node.iterable);
  if (isList(subject)) {
    for (let i = 0; i < subject.length; i++) {
      const step = await iterate(subject[i] ?? null);
      if (step.exit) return step.signal;
    }
    return LOOP_DONE;
  }
  if (typeof subject === 'string') {
    for (const ch of characters(subject)) {
      const step = await iterate(ch);
      if (step.exit) return step.signal;
    }
    return LOOP_DONE;
  }

  throw RuntimeError.fromNode(
    'SPY-R002',
    { detail: `Cannot iterate over ${inferType(subject)}` },
    node.iterable
  );
};

/** chase (cond) { }: condition re-checked before every pass */
Evaluator.prototype.executeChaseLoop = async function (
  this: Evaluator,
  node: ChaseLoopNode
): Promise<Signal> {
  while (isTruthy(await this.evaluateExpression(node.condition))) {
    const step = loopStep(await this.executeBlock(node.body));
    if (step.exit) return step.signal;
  }
  return LOOP_DONE;
};
