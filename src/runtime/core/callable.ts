/**
 * Callable Types
 *
 * Unified representation for all callable values in SpyLang:
 * - MissionCallable: closures declared with `mission` in source code
 * - NativeCallable: built-in missions provided by the runtime library
 *
 * Public API for host applications.
 */

import type { BlockNode, SourceLocation } from '../../types.js';
import type { RuntimeContext } from './types.js';
import type { SpyValue } from './values.js';

/**
 * Native function signature.
 * Receives evaluated arguments, the calling context and the call location.
 */
export type NativeFn = (
  args: SpyValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => SpyValue | Promise<SpyValue>;

/** Mission declared in source; `scope` is the context it closes over */
export interface MissionCallable {
  readonly __type: 'callable';
  readonly kind: 'mission';
  readonly name: string;
  readonly params: readonly string[];
  readonly body: BlockNode;
  readonly scope: RuntimeContext;
}

/** Built-in mission implemented in TypeScript */
export interface NativeCallable {
  readonly __type: 'callable';
  readonly kind: 'native';
  readonly name: string;
  readonly arity: number;
  readonly fn: NativeFn;
}

export type SpyCallable = MissionCallable | NativeCallable;

export function isCallable(value: SpyValue): value is SpyCallable {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value)
  );
}

export function isMission(value: SpyValue): value is MissionCallable {
  return isCallable(value) && value.kind === 'mission';
}

/** Create a closure over `scope` */
export function mission(
  name: string,
  params: readonly string[],
  body: BlockNode,
  scope: RuntimeContext
): MissionCallable {
  return { __type: 'callable', kind: 'mission', name, params, body, scope };
}

/**
 * Create a built-in mission.
 *
 * @example
 * ```typescript
 * const double = native('double', 1, ([x]) => ...);
 * ```
 */
export function native(name: string, arity: number, fn: NativeFn): NativeCallable {
  return { __type: 'callable', kind: 'native', name, arity, fn };
}
