/**
 * Agent Error Formatter
 *
 * Renders SpyLang errors for people:
 *
 * ```
 * Agent Error: Runtime breach! Division by zero.
 *   --> main.spy:2:10
 *    |
 *  2 |   extract a / b
 *    |           ^^^^^
 *
 * Mission Traceback (most recent incident last):
 *   Mission Log: File "main.spy", line 4, in <program>
 *   Mission Log: File "main.spy", line 2, in split
 * ```
 */

import type { CallFrame, SourceSpan } from './types.js';
import { RuntimeError, type SpyError } from './types.js';
import { PROGRAM_NAME } from './runtime/index.js';

/** Source text per file; unnamed programs use '<program>' */
export type SourceTable = ReadonlyMap<string, string>;

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render a caret underline for a span on its first line.
 * Columns are 1-based; a span that runs past the line stops at its end.
 *
 * @throws RangeError when the span ends before it starts
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;

  const padding = ' '.repeat(Math.max(0, startColumn - 1));
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));
  return padding + carets;
}

// ============================================================
// SECTIONS
// ============================================================

function headline(error: SpyError): string {
  const message = error.toData().message;
  return error instanceof RuntimeError
    ? `Agent Error: Runtime breach! ${message}.`
    : `Agent Error: ${message}. Mission compromised!`;
}

function snippet(error: SpyError, source: string | undefined): string[] {
  const location = error.location;
  if (!location || source === undefined) return [];

  const lineContent = source.split('\n')[location.line - 1];
  if (lineContent === undefined) return [];

  const span = error.span ?? { start: location, end: location };
  const lineNumber = String(location.line);
  const gutter = ' '.repeat(lineNumber.length);
  return [
    ` ${gutter} |`,
    ` ${lineNumber} | ${lineContent}`,
    ` ${gutter} | ${renderCaretUnderline(span, lineContent)}`,
  ];
}

/**
 * One line per active scope, outermost first: the program, then every
 * mission on the stack, each with the line it was executing.
 */
export function renderTraceback(
  frames: readonly CallFrame[],
  error: SpyError
): string[] {
  const entries: { file: string; line: number; scope: string }[] = [];
  let scope = PROGRAM_NAME;

  for (const frame of frames) {
    entries.push({
      file: frame.file ?? PROGRAM_NAME,
      line: frame.location.start.line,
      scope,
    });
    scope = frame.functionName;
  }
  if (error.location) {
    entries.push({
      file: error.file ?? PROGRAM_NAME,
      line: error.location.line,
      scope,
    });
  }

  return [
    'Mission Traceback (most recent incident last):',
    ...entries.map(
      (e) => `  Mission Log: File "${e.file}", line ${e.line}, in ${e.scope}`
    ),
  ];
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Format an error with its location, a source snippet and, for runtime
 * errors, the mission traceback.
 *
 * @param sources - Source text used for the snippet, looked up by the
 * error's file (as recorded in RuntimeContext.sources)
 */
export function formatAgentError(
  error: SpyError,
  sources: SourceTable = new Map()
): string {
  const lines = [headline(error)];
  const file = error.file ?? PROGRAM_NAME;

  if (error.location) {
    lines.push(`  --> ${file}:${error.location.line}:${error.location.column}`);
    lines.push(...snippet(error, sources.get(file)));
  }

  if (error instanceof RuntimeError) {
    lines.push('');
    lines.push(...renderTraceback(error.callStack, error));
  }

  return lines.join('\n');
}
