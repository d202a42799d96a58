/**
 * Script Execution
 *
 * Public API for executing SpyLang programs.
 * Provides both full execution and step-by-step execution.
 */

import type { ProgramNode } from '../../types.js';
import { SpyError } from '../../types.js';
import { parse } from '../../parser/index.js';
import { createRuntimeContext, PROGRAM_NAME } from './context.js';
import { executeStatement, getEvaluator } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  RuntimeOptions,
  StepResult,
} from './types.js';
import type { SpyValue } from './values.js';

/**
 * Execute a parsed program.
 *
 * @param program The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value and the program's root-scope bindings
 */
export async function execute(
  program: ProgramNode,
  context: RuntimeContext
): Promise<ExecutionResult> {
  const stepper = createStepper(program, context);
  while (!stepper.done) {
    await stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to drive the loop and inspect state between steps.
 */
export function createStepper(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = program.statements;
  const total = statements.length;
  let index = 0;
  let lastValue: SpyValue = null;
  let isDone = total === 0;

  const collectVariables = (): Record<string, SpyValue> => {
    const vars: Record<string, SpyValue> = {};
    for (const [name, value] of context.variables) {
      if (context.library.get(name) !== value) {
        vars[name] = value;
      }
    }
    return vars;
  };

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    async step(): Promise<StepResult> {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({
        index,
        total,
        file: context.file,
      });

      try {
        const signal = await executeStatement(stmt, context);

        if (signal.kind === 'break' || signal.kind === 'continue') {
          throw getEvaluator(context).loopSignalError(signal);
        }
        lastValue = signal.value;

        context.observability.onStepEnd?.({
          index,
          total,
          value: lastValue,
          durationMs: Date.now() - startTime,
          file: context.file,
        });

        index++;
        // A top-level extract ends the program
        isDone = signal.kind === 'return' || index >= total;
        return { value: lastValue, done: isDone, index: index - 1, total };
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }
    },

    getResult(): ExecutionResult {
      return { value: lastValue, variables: collectVariables() };
    },
  };
}

/**
 * Parse and execute `source` in `context`. Errors are attributed to `file`
 * (default: the context's file) unless a nested launch already claimed them.
 */
export async function executeProgram(
  source: string,
  context: RuntimeContext,
  file: string | undefined = context.file
): Promise<ExecutionResult> {
  context.sources.set(file ?? PROGRAM_NAME, source);
  try {
    return await execute(parse(source), context);
  } catch (error) {
    if (error instanceof SpyError && file !== undefined) {
      error.attributeTo(file);
    }
    throw error;
  }
}

// ============================================================
// RUN OUTCOME
// ============================================================

/** Result of runProgram(): a value, or the SpyLang error that stopped it */
export type RunOutcome =
  | {
      readonly ok: true;
      readonly value: SpyValue;
      readonly context: RuntimeContext;
    }
  | {
      readonly ok: false;
      readonly error: SpyError;
      readonly context: RuntimeContext;
    };

/**
 * Run a whole program with a fresh context.
 * SpyLang errors become `{ ok: false }`; host failures still reject.
 *
 * @example
 * ```typescript
 * const outcome = await runProgram('transmit(1 + 2)', { console: io });
 * if (!outcome.ok) process.stderr.write(formatAgentError(outcome.error, source));
 * ```
 */
export async function runProgram(
  source: string,
  options: RuntimeOptions = {}
): Promise<RunOutcome> {
  const context = createRuntimeContext(options);
  try {
    const result = await executeProgram(source, context);
    return { ok: true, value: result.value, context };
  } catch (error) {
    if (error instanceof SpyError) {
      return { ok: false, error, context };
    }
    throw error;
  }
}
