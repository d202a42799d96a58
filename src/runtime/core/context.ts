/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import type { CallFrame } from '../../types.js';
import { createLibrary } from '../ext/builtins.js';
import { createBufferedConsole } from '../ext/console.js';
import { createFileLoader } from '../ext/loader.js';
import type { Library, RuntimeContext, RuntimeOptions } from './types.js';
import type { SpyValue } from './values.js';

export const DEFAULT_MAX_CALL_DEPTH = 1000;

/** Name used for code that did not come from a file */
export const PROGRAM_NAME = '<program>';

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the SpyLang runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new RangeError(
      `maxCallDepth must be a positive integer, got ${maxCallDepth}`
    );
  }

  const library = options.library ?? createLibrary();
  const variables = seedVariables(library);

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      variables.set(name, value);
    }
  }

  return {
    parent: undefined,
    variables,
    library,
    console: options.console ?? createBufferedConsole(),
    loader: options.loader ?? createFileLoader(),
    observability: options.observability ?? {},
    file: options.file,
    callStack: [],
    maxCallDepth,
    launchChain: options.file !== undefined ? [options.file] : [],
    sources: new Map(),
  };
}

function seedVariables(library: Library): Map<string, SpyValue> {
  return new Map(library);
}

/**
 * Create a child context for block scoping.
 * The child shares every capability with its parent but has its own
 * variables map. Variable lookups walk the parent chain.
 */
export function createChildContext(parent: RuntimeContext): RuntimeContext {
  return {
    parent,
    variables: new Map<string, SpyValue>(),
    library: parent.library,
    console: parent.console,
    loader: parent.loader,
    observability: parent.observability,
    file: parent.file,
    callStack: parent.callStack,
    maxCallDepth: parent.maxCallDepth,
    launchChain: parent.launchChain,
    sources: parent.sources,
  };
}

/**
 * Create the root context of a launched program: a fresh scope seeded from
 * the library, running `file`, sharing the caller's devices and call stack.
 */
export function createLaunchContext(
  caller: RuntimeContext,
  file: string
): RuntimeContext {
  return {
    parent: undefined,
    variables: seedVariables(caller.library),
    library: caller.library,
    console: caller.console,
    loader: caller.loader,
    observability: caller.observability,
    file,
    callStack: caller.callStack,
    maxCallDepth: caller.maxCallDepth,
    launchChain: [...caller.launchChain, file],
    sources: caller.sources,
  };
}

// ============================================================
// VARIABLES
// ============================================================

/**
 * Get a variable value, walking the parent chain.
 * Returns undefined if not found in any scope.
 */
export function getVariable(
  ctx: RuntimeContext,
  name: string
): SpyValue | undefined {
  const owner = findOwner(ctx, name);
  return owner?.variables.get(name);
}

/** Check if a variable exists in any scope. */
export function hasVariable(ctx: RuntimeContext, name: string): boolean {
  return findOwner(ctx, name) !== undefined;
}

/** Bind `name` in this scope, shadowing any outer binding */
export function declareVariable(
  ctx: RuntimeContext,
  name: string,
  value: SpyValue
): void {
  ctx.variables.set(name, value);
}

/**
 * Rebind the nearest existing binding of `name`; with none, bind it in
 * this scope.
 */
export function setVariable(
  ctx: RuntimeContext,
  name: string,
  value: SpyValue
): void {
  (findOwner(ctx, name) ?? ctx).variables.set(name, value);
}

function findOwner(
  ctx: RuntimeContext,
  name: string
): RuntimeContext | undefined {
  let scope: RuntimeContext | undefined = ctx;
  while (scope) {
    if (scope.variables.has(name)) return scope;
    scope = scope.parent;
  }
  return undefined;
}

// ============================================================
// CALL STACK
// ============================================================

/** Push frame onto call stack before mission execution. */
export function pushCallFrame(ctx: RuntimeContext, frame: CallFrame): void {
  ctx.callStack.push(frame);
}

/** Pop frame from call stack after mission returns. */
export function popCallFrame(ctx: RuntimeContext): void {
  ctx.callStack.pop();
}

/** Current mission call depth */
export function callDepth(ctx: RuntimeContext): number {
  return ctx.callStack.length;
}
