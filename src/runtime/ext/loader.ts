/**
 * Source Loaders
 *
 * Resolve and read `.spy` files for `launch` and the CLI.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

export interface SourceLoader {
  /**
   * Resolve `specifier` relative to the directory of `fromFile`, or to the
   * loader's working directory when there is no launching file.
   */
  resolve(specifier: string, fromFile: string | undefined): string;
  /** Read a resolved path; rejects when the file cannot be read */
  readFile(resolvedPath: string): Promise<string>;
}

/** Normalize CRLF line endings */
function normalize(source: string): string {
  return source.replace(/\r\n/g, '\n');
}

/** Loader backed by the filesystem */
export function createFileLoader(cwd: string = process.cwd()): SourceLoader {
  return {
    resolve(specifier, fromFile) {
      const base = fromFile !== undefined ? path.dirname(fromFile) : cwd;
      return path.resolve(base, specifier);
    },
    async readFile(resolvedPath) {
      return normalize(await readFile(resolvedPath, 'utf-8'));
    },
  };
}

/**
 * Loader over an in-memory file table, keyed by absolute POSIX path.
 *
 * @example
 * ```typescript
 * const loader = createMemoryLoader({ '/lib/util.spy': 'assign x = 1' });
 * loader.resolve('util.spy', '/lib/main.spy'); // '/lib/util.spy'
 * ```
 */
export function createMemoryLoader(
  files: Record<string, string>,
  cwd = '/'
): SourceLoader {
  const table = new Map(Object.entries(files));

  return {
    resolve(specifier, fromFile) {
      const base =
        fromFile !== undefined ? path.posix.dirname(fromFile) : cwd;
      return path.posix.resolve(base, specifier);
    },
    readFile(resolvedPath) {
      const source = table.get(resolvedPath);
      if (source === undefined) {
        return Promise.reject(
          new Error(`ENOENT: no such file '${resolvedPath}'`)
        );
      }
      return Promise.resolve(normalize(source));
    },
  };
}
