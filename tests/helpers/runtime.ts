/**
 * Test utilities for SpyLang runtime tests
 */

import {
  createBufferedConsole,
  createMemoryLoader,
  createRuntimeContext,
  createStepper,
  execute,
  parse,
  type BufferedConsole,
  type ExecutionResult,
  type RuntimeContext,
  type RuntimeOptions,
  type SpyValue,
  type StepResult,
} from '../../src/index.js';

/** Options for test execution */
export interface TestOptions extends RuntimeOptions {
  /** Lines served to intel / intel_int */
  input?: string[];
  /** In-memory files for launch, keyed by absolute POSIX path */
  files?: Record<string, string>;
}

/** Shared setup for all execution modes */
function setup(source: string, options: TestOptions = {}) {
  const { input, files, ...runtimeOptions } = options;
  const io = createBufferedConsole(input);
  const ctx = createRuntimeContext({
    console: io,
    loader: createMemoryLoader(files ?? {}),
    ...runtimeOptions,
  });
  return { ast: parse(source), ctx, io };
}

/** Execute a SpyLang script and return the final value */
export async function run(
  source: string,
  options: TestOptions = {}
): Promise<SpyValue> {
  const { ast, ctx } = setup(source, options);
  return (await execute(ast, ctx)).value;
}

/** Execute and return full result with variables */
export async function runFull(
  source: string,
  options: TestOptions = {}
): Promise<ExecutionResult> {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx);
}

/** Execute and return everything the script wrote to the console */
export async function runOutput(
  source: string,
  options: TestOptions = {}
): Promise<string> {
  const { ast, ctx, io } = setup(source, options);
  await execute(ast, ctx);
  return io.output;
}

/** Execute and return the context and console for inspection */
export async function runWithContext(
  source: string,
  options: TestOptions = {}
): Promise<{
  result: ExecutionResult;
  ctx: RuntimeContext;
  io: BufferedConsole;
}> {
  const { ast, ctx, io } = setup(source, options);
  const result = await execute(ast, ctx);
  return { result, ctx, io };
}

/** Execute using stepper and return all step results */
export async function runStepped(
  source: string,
  options: TestOptions = {}
): Promise<StepResult[]> {
  const { ast, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(await stepper.step());
  }

  return results;
}
