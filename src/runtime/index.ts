/**
 * SpyLang Runtime
 *
 * Public API for executing SpyLang programs.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, events)
 *   - values.ts: SpyValue and value utilities
 *   - callable.ts: Mission and built-in callables
 *   - operators.ts: Arithmetic, comparison and unary operators
 *   - signals.ts: Control flow signals
 *   - context.ts: Runtime context factory and scope helpers
 *   - execute.ts: Program execution (execute, createStepper, runProgram)
 *   - launch.ts: Nested program launches
 *   - eval/: AST evaluation (internal)
 * - ext/: Capabilities and the built-in library
 *   - builtins.ts: Built-in missions and constants
 *   - console.ts: Console devices
 *   - loader.ts: Source loaders
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  LaunchEvent,
  Library,
  MissionCallEvent,
  MissionReturnEvent,
  ObservabilityCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// VALUES AND CALLABLES
// ============================================================

export type { SpyTypeName, SpyValue } from './core/values.js';

export {
  deepEquals,
  formatFloat,
  formatValue,
  inferType,
  isList,
  isNumeric,
  isTruthy,
} from './core/values.js';

export type {
  MissionCallable,
  NativeCallable,
  NativeFn,
  SpyCallable,
} from './core/callable.js';

export { isCallable, isMission, mission, native } from './core/callable.js';

export {
  applyArithmetic,
  applyComparison,
  applyUnary,
} from './core/operators.js';

// ============================================================
// CONTROL FLOW SIGNALS
// ============================================================

export type {
  BreakSignal,
  ContinueSignal,
  NormalSignal,
  ReturnSignal,
  Signal,
} from './core/signals.js';

// ============================================================
// CONTEXT FACTORY
// ============================================================

export {
  DEFAULT_MAX_CALL_DEPTH,
  createChildContext,
  createRuntimeContext,
  getVariable,
  hasVariable,
  PROGRAM_NAME,
} from './core/context.js';

// ============================================================
// EXECUTION
// ============================================================

export {
  createStepper,
  execute,
  executeProgram,
  runProgram,
  type RunOutcome,
} from './core/execute.js';

// ============================================================
// CAPABILITIES
// ============================================================

export { createLibrary } from './ext/builtins.js';

export type {
  BufferedConsole,
  ConsoleDevice,
  NodeConsole,
} from './ext/console.js';

export { createBufferedConsole, createNodeConsole } from './ext/console.js';

export type { SourceLoader } from './ext/loader.js';

export { createFileLoader, createMemoryLoader } from './ext/loader.js';
