/**
 * SpyLang Module
 * Exports lexer, parser, runtime, error formatting and AST types
 */

export { tokenize } from './lexer/index.js';
export { parse } from './parser/index.js';
export {
  applyArithmetic,
  applyComparison,
  applyUnary,
  type BreakSignal,
  type BufferedConsole,
  type ConsoleDevice,
  type ContinueSignal,
  createBufferedConsole,
  createChildContext,
  createFileLoader,
  createLibrary,
  createMemoryLoader,
  createNodeConsole,
  createRuntimeContext,
  createStepper,
  DEFAULT_MAX_CALL_DEPTH,
  deepEquals,
  type ErrorEvent,
  execute,
  executeProgram,
  type ExecutionResult,
  type ExecutionStepper,
  formatFloat,
  formatValue,
  getVariable,
  hasVariable,
  inferType,
  isCallable,
  isList,
  isMission,
  isNumeric,
  isTruthy,
  type LaunchEvent,
  type Library,
  mission,
  type MissionCallable,
  type MissionCallEvent,
  type MissionReturnEvent,
  native,
  type NativeCallable,
  type NativeFn,
  type NodeConsole,
  type NormalSignal,
  type ObservabilityCallbacks,
  PROGRAM_NAME,
  type ReturnSignal,
  runProgram,
  type RunOutcome,
  type RuntimeContext,
  type RuntimeOptions,
  type Signal,
  type SourceLoader,
  type SpyCallable,
  type SpyTypeName,
  type SpyValue,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
} from './runtime/index.js';
export {
  formatAgentError,
  renderCaretUnderline,
  renderTraceback,
  type SourceTable,
} from './error-formatter.js';
export * from './types.js';
