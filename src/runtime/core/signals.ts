/**
 * Control Flow Signals
 *
 * Statement evaluation returns a signal instead of throwing. Blocks stop
 * at the first non-normal signal; loops consume break and continue;
 * mission calls consume return.
 */

import type { AbortNode, ProceedNode } from '../../types.js';
import type { SpyValue } from './values.js';

/** Statement completed; `value` is the statement's value */
export interface NormalSignal {
  readonly kind: 'normal';
  readonly value: SpyValue;
}

/** `extract` */
export interface ReturnSignal {
  readonly kind: 'return';
  readonly value: SpyValue;
}

/** `abort` */
export interface BreakSignal {
  readonly kind: 'break';
  readonly node: AbortNode;
}

/** `proceed` */
export interface ContinueSignal {
  readonly kind: 'continue';
  readonly node: ProceedNode;
}

export type Signal = NormalSignal | ReturnSignal | BreakSignal | ContinueSignal;

export type LoopSignal = BreakSignal | ContinueSignal;

export function normal(value: SpyValue): NormalSignal {
  return { kind: 'normal', value };
}

export function isLoopSignal(signal: Signal): signal is LoopSignal {
  return signal.kind === 'break' || signal.kind === 'continue';
}
