/**
 * SpyLang Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// CALL FRAME
// ============================================================

/**
 * Call stack frame information for error reporting.
 * One frame per active mission call, outermost first.
 */
export interface CallFrame {
  /** Source location of the call expression */
  readonly location: SourceSpan;
  /** Name of the mission (or built-in) being called */
  readonly functionName: string;
  /** File the call site belongs to */
  readonly file?: string | undefined;
}

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface SpyErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  /** Extent of the offending construct, when known */
  readonly span?: SourceSpan | undefined;
  readonly file?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

function lookupDefinition(errorId: string, category?: ErrorCategory) {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Base error class for all SpyLang errors.
 * Provides structured data for host applications to format as needed.
 */
export class SpyError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
  private sourceFile: string | undefined;

  constructor(data: SpyErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'SpyError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.span = data.span;
    this.context = data.context;
    this.sourceFile = data.file;
  }

  /** File the error belongs to; undefined until a runner attributes it */
  get file(): string | undefined {
    return this.sourceFile;
  }

  /**
   * Attribute the error to a file. The first attribution wins, so an error
   * raised inside a launched script keeps naming that script.
   */
  attributeTo(file: string): void {
    if (this.sourceFile === undefined) {
      this.sourceFile = file;
    }
  }

  /** Get structured error data for custom formatting */
  toData(): SpyErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      span: this.span,
      file: this.sourceFile,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: SpyErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Unrecognized character in source text */
export class IllegalCharacterError extends SpyError {
  readonly character: string;

  constructor(character: string, location: SourceLocation) {
    const definition = lookupDefinition('SPY-L001', 'lexer');
    const context = { char: JSON.stringify(character) };
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'IllegalCharacterError';
    this.character = character;
  }
}

/** A required token was missing */
export class ExpectedCharacterError extends SpyError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, location: SourceLocation) {
    const definition = lookupDefinition('SPY-P001', 'parse');
    const context = { expected, actual };
    super({
      errorId: definition.errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'ExpectedCharacterError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** Runtime execution errors */
export class RuntimeError extends SpyError {
  private frames: CallFrame[] | undefined;

  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>,
    span?: SourceSpan
  ) {
    lookupDefinition(errorId, 'runtime');
    super({ errorId, message, location, context, span });
    this.name = 'RuntimeError';
  }

  /** Mission call stack at the point of failure, outermost first */
  get callStack(): readonly CallFrame[] {
    return this.frames ?? [];
  }

  /** Record the call stack; only the first (innermost) capture is kept */
  captureCallStack(frames: readonly CallFrame[]): void {
    if (this.frames === undefined) {
      this.frames = [...frames];
    }
  }

  /** Create from an AST node; the error covers the node's span */
  static fromNode(
    errorId: string,
    context: Record<string, unknown>,
    node?: { span: SourceSpan }
  ): RuntimeError {
    const definition = lookupDefinition(errorId, 'runtime');
    return new RuntimeError(
      errorId,
      renderMessage(definition.messageTemplate, context),
      node?.span.start,
      context,
      node?.span
    );
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating runtime errors from the registry.
 *
 * @throws TypeError if errorId is not a registered runtime error
 *
 * @example
 * createError('SPY-R001', { name: 'foo' }, location)
 * // RuntimeError: "'foo' is not defined at 1:5"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): RuntimeError {
  const definition = lookupDefinition(errorId, 'runtime');
  return new RuntimeError(
    errorId,
    renderMessage(definition.messageTemplate, context),
    location,
    context
  );
}
