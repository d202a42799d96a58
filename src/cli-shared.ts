/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFile } from 'node:fs/promises';
import { formatAgentError, type SourceTable } from './error-formatter.js';
import { formatValue, isList } from './runtime/index.js';
import type { SpyValue } from './runtime/index.js';
import { SpyError } from './types.js';

/**
 * Convert a shell result to the lines it prints.
 * Lists print one element per line; ghost prints nothing.
 */
export function formatOutput(value: SpyValue): string[] {
  if (value === null) return [];
  if (isList(value)) return value.map((element) => formatValue(element));
  return [formatValue(value)];
}

/**
 * Format error for stderr output
 *
 * @param sources - Program sources, for the snippet under SpyLang errors
 */
export function formatError(err: unknown, sources?: SourceTable): string {
  if (err instanceof SpyError) {
    return formatAgentError(err, sources);
  }

  // Handle file not found errors (ENOENT)
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `Error: File '${String(err.path)}' not found.`;
  }

  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}

/**
 * Read the package version from package.json beside the sources
 * (or beside dist/ once built).
 */
export async function readVersion(): Promise<string> {
  const packageJsonUrl = new URL('../package.json', import.meta.url);
  try {
    const packageJson: unknown = JSON.parse(
      await readFile(packageJsonUrl, 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw err;
    }
  }
  return '0.0.0';
}
