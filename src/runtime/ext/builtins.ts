/**
 * Built-in Library
 *
 * Native missions and constants copied into every root scope. The table is
 * built per interpreter by createLibrary(); nothing here is process-wide
 * mutable state.
 */

import type { SourceLocation } from '../../types.js';
import { createError } from '../../types.js';
import { isCallable, native, type NativeFn } from '../core/callable.js';
import { launchProgram } from '../core/launch.js';
import type { Library } from '../core/types.js';
import {
  characters,
  formatValue,
  inferType,
  isList,
  isNumeric,
  type SpyValue,
} from '../core/values.js';

// ============================================================
// ARGUMENT HELPERS
// ============================================================

function arg(args: SpyValue[], index: number): SpyValue {
  return args[index] ?? null;
}

function expectList(
  value: SpyValue,
  mission: string,
  position: number,
  location?: SourceLocation
): SpyValue[] {
  if (isList(value)) return value;
  throw createError(
    'SPY-R002',
    {
      detail: `${mission} expects a List as argument ${position}, received ${inferType(value)}`,
    },
    location
  );
}

const INTEGER_INPUT = /^[+-]?\d+$/;

// ============================================================
// NATIVE MISSIONS
// ============================================================

const transmit: NativeFn = (args, ctx) => {
  ctx.console.write(`${formatValue(arg(args, 0))}\n`);
  return null;
};

const transmitRet: NativeFn = (args, ctx) => {
  const value = arg(args, 0);
  ctx.console.write(`${formatValue(value)}\n`);
  return value;
};

const intel: NativeFn = async (args, ctx) => {
  ctx.console.write(formatValue(arg(args, 0)));
  return await ctx.console.readLine();
};

const intelInt: NativeFn = async (args, ctx, location) => {
  ctx.console.write(formatValue(arg(args, 0)));
  const line = await ctx.console.readLine();
  const text = line.trim();
  if (!INTEGER_INPUT.test(text)) {
    throw createError('SPY-R010', { input: line }, location);
  }
  return BigInt(text);
};

const erase: NativeFn = (_args, ctx) => {
  ctx.console.clear();
  return null;
};

const addAgent: NativeFn = (args, _ctx, location) => {
  expectList(arg(args, 0), 'add_agent', 1, location).push(arg(args, 1));
  return null;
};

const withdraw: NativeFn = (args, _ctx, location) => {
  const list = expectList(arg(args, 0), 'withdraw', 1, location);
  if (list.length === 0) {
    throw createError('SPY-R008', {}, location);
  }
  return list.pop() ?? null;
};

const expand: NativeFn = (args, _ctx, location) => {
  const target = expectList(arg(args, 0), 'expand', 1, location);
  const source = expectList(arg(args, 1), 'expand', 2, location);
  // Snapshot first: expand(a, a) doubles a once
  target.push(...source.slice());
  return null;
};

const length: NativeFn = (args, _ctx, location) => {
  const value = arg(args, 0);
  if (typeof value === 'string') return BigInt(characters(value).length);
  if (isList(value)) return BigInt(value.length);
  throw createError(
    'SPY-R002',
    { detail: `length expects a List or Str, received ${inferType(value)}` },
    location
  );
};

const launch: NativeFn = async (args, ctx, location) => {
  const target = arg(args, 0);
  if (typeof target !== 'string') {
    throw createError(
      'SPY-R002',
      { detail: `launch expects a Str path, received ${inferType(target)}` },
      location
    );
  }
  await launchProgram(target, ctx, location);
  return null;
};

// ============================================================
// LIBRARY
// ============================================================

/**
 * Build the built-in table.
 * Called once per interpreter; each run copies it into its root scope.
 */
export function createLibrary(): Library {
  const entries: [string, SpyValue][] = [
    ['math_pi', Math.PI],
    ['transmit', native('transmit', 1, transmit)],
    ['transmit_ret', native('transmit_ret', 1, transmitRet)],
    ['intel', native('intel', 1, intel)],
    ['intel_int', native('intel_int', 1, intelInt)],
    ['erase', native('erase', 0, erase)],
    ['is_code', native('is_code', 1, (args) => isNumeric(arg(args, 0)))],
    [
      'is_msg',
      native('is_msg', 1, (args) => typeof arg(args, 0) === 'string'),
    ],
    ['is_list', native('is_list', 1, (args) => isList(arg(args, 0)))],
    [
      'is_mission',
      native('is_mission', 1, (args) => isCallable(arg(args, 0))),
    ],
    ['add_agent', native('add_agent', 2, addAgent)],
    ['withdraw', native('withdraw', 1, withdraw)],
    ['expand', native('expand', 2, expand)],
    ['length', native('length', 1, length)],
    ['launch', native('launch', 1, launch)],
  ];
  return new Map(entries);
}
