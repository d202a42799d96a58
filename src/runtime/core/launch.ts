/**
 * Nested program launches
 *
 * `launch("file.spy")` runs another file as a separate program: fresh root
 * scope seeded from the library, same console, loader and call stack.
 */

import type { SourceLocation } from '../../types.js';
import { createError } from '../../types.js';
import { createLaunchContext } from './context.js';
import { executeProgram } from './execute.js';
import type { RuntimeContext } from './types.js';

/**
 * Load and run `specifier` relative to the caller's file.
 *
 * @throws RuntimeError SPY-R012 when the file is already being launched
 * @throws RuntimeError SPY-R011 when the file cannot be read
 */
export async function launchProgram(
  specifier: string,
  caller: RuntimeContext,
  location?: SourceLocation
): Promise<void> {
  const resolved = caller.loader.resolve(specifier, caller.file);

  if (caller.launchChain.includes(resolved)) {
    const chain = [...caller.launchChain, resolved].join(' -> ');
    throw createError('SPY-R012', { chain }, location);
  }

  let source: string;
  try {
    source = await caller.loader.readFile(resolved);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createError('SPY-R011', { path: specifier, reason }, location);
  }

  caller.observability.onLaunch?.({ path: resolved, from: caller.file });
  await executeProgram(source, createLaunchContext(caller, resolved), resolved);
}
