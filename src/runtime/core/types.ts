/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { CallFrame } from '../../types.js';
import type { ConsoleDevice } from '../ext/console.js';
import type { SourceLoader } from '../ext/loader.js';
import type { SpyValue } from './values.js';

/** Built-in names and values copied into every root scope */
export type Library = ReadonlyMap<string, SpyValue>;

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a mission or built-in is invoked */
  onMissionCall?: (event: MissionCallEvent) => void;
  /** Called after a mission or built-in returns */
  onMissionReturn?: (event: MissionReturnEvent) => void;
  /** Called when `launch` starts a nested program */
  onLaunch?: (event: LaunchEvent) => void;
  /** Called when an error escapes a top-level statement */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** File being executed, when known */
  file: string | undefined;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: SpyValue;
  /** Execution time in milliseconds */
  durationMs: number;
  file: string | undefined;
}

export interface MissionCallEvent {
  name: string;
  args: SpyValue[];
  /** Call depth after the frame was pushed */
  depth: number;
}

export interface MissionReturnEvent {
  name: string;
  value: SpyValue;
  durationMs: number;
}

export interface LaunchEvent {
  /** Resolved path of the launched file */
  path: string;
  /** File that called launch, if any */
  from: string | undefined;
}

/** Event emitted on error */
export interface ErrorEvent {
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/**
 * Runtime context: one lexical scope plus the capabilities shared by every
 * scope of a run. Child contexts share everything except `variables`.
 */
export interface RuntimeContext {
  /** Enclosing scope (undefined = root scope) */
  readonly parent?: RuntimeContext | undefined;
  /** Names bound in this scope */
  readonly variables: Map<string, SpyValue>;
  /** Built-in table seeded into root scopes */
  readonly library: Library;
  readonly console: ConsoleDevice;
  readonly loader: SourceLoader;
  readonly observability: ObservabilityCallbacks;
  /** File the scope's code came from (undefined for in-memory sources) */
  readonly file: string | undefined;
  /** Active mission calls, shared across scopes and nested launches */
  readonly callStack: CallFrame[];
  readonly maxCallDepth: number;
  /** Resolved paths of the files currently being launched, outermost first */
  readonly launchChain: readonly string[];
  /** Source text of every program run so far, keyed by file or PROGRAM_NAME */
  readonly sources: Map<string, string>;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables, bound in the root scope after the library */
  variables?: Record<string, SpyValue>;
  /** Console device (default: buffered console with no input) */
  console?: ConsoleDevice;
  /** Source loader used by `launch` (default: filesystem loader) */
  loader?: SourceLoader;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Maximum mission call depth (default: 1000) */
  maxCallDepth?: number;
  /** File being executed; relative launches resolve against it */
  file?: string;
  /** Built-in table (default: a fresh createLibrary()) */
  library?: Library;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last top-level statement, or of a top-level extract */
  value: SpyValue;
  /** Root-scope bindings that are not untouched library entries */
  variables: Record<string, SpyValue>;
}

/** Result of a single step execution */
export interface StepResult {
  value: SpyValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  readonly done: boolean;
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): Promise<StepResult>;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
