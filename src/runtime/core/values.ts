/**
 * SpyLang Value Types and Utilities
 *
 * Core value types that flow through SpyLang programs.
 * Public API for host applications.
 */

import type { SpyCallable } from './callable.js';

/**
 * Any value that can flow through a SpyLang program.
 *
 * - bigint: Int (arbitrary precision)
 * - number: Float
 * - string: Str
 * - boolean: Bool
 * - null: ghost
 * - SpyValue[]: List, shared by reference
 * - SpyCallable: mission closure or built-in
 */
export type SpyValue =
  | bigint
  | number
  | string
  | boolean
  | null
  | SpyValue[]
  | SpyCallable;

/** Names reported by type errors and the is_* built-ins */
export type SpyTypeName =
  | 'Int'
  | 'Float'
  | 'Str'
  | 'Bool'
  | 'Ghost'
  | 'List'
  | 'Mission';

export function isList(value: SpyValue): value is SpyValue[] {
  return Array.isArray(value);
}

export function isNumeric(value: SpyValue): value is bigint | number {
  return typeof value === 'bigint' || typeof value === 'number';
}

/** Infer the SpyLang type from a runtime value */
export function inferType(value: SpyValue): SpyTypeName {
  if (value === null) return 'Ghost';
  switch (typeof value) {
    case 'bigint':
      return 'Int';
    case 'number':
      return 'Float';
    case 'string':
      return 'Str';
    case 'boolean':
      return 'Bool';
  }
  return Array.isArray(value) ? 'List' : 'Mission';
}

/** Check if a value is truthy in SpyLang semantics */
export function isTruthy(value: SpyValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value !== 0n;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a Float the way SpyLang prints it: the shortest round-trip
 * digits, fixed notation for exponents in [-4, 16) with a trailing `.0`
 * on integral values, otherwise scientific with a two-digit exponent
 * (`1e-07`, `1e+16`).
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  if (Object.is(value, -0)) return '-0.0';

  const [mantissa = '0', exponentText = '0'] = Math.abs(value)
    .toExponential()
    .split('e');
  const exponent = Number(exponentText);
  const digits = mantissa.replace('.', '');
  const sign = value < 0 ? '-' : '';

  if (exponent < -4 || exponent >= 16) {
    const head =
      digits.length > 1 ? `${digits.slice(0, 1)}.${digits.slice(1)}` : digits;
    const expSign = exponent < 0 ? '-' : '+';
    const expDigits = String(Math.abs(exponent)).padStart(2, '0');
    return `${sign}${head}e${expSign}${expDigits}`;
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  const whole = digits.padEnd(exponent + 1, '0').slice(0, exponent + 1);
  const fraction = digits.slice(exponent + 1);
  return `${sign}${whole}.${fraction === '' ? '0' : fraction}`;
}

/** Code points of a Str; indexing, length and iteration all agree on these */
export function characters(value: string): string[] {
  return Array.from(value);
}

function formatElement(value: SpyValue, seen: Set<SpyValue[]>): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return formatInner(value, seen);
}

function formatInner(value: SpyValue, seen: Set<SpyValue[]>): string {
  if (value === null) return 'ghost';
  switch (typeof value) {
    case 'bigint':
      return value.toString();
    case 'number':
      return formatFloat(value);
    case 'string':
      return value;
    case 'boolean':
      return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    // A list that contains itself prints as [...]
    if (seen.has(value)) return '[...]';
    seen.add(value);
    const inner = value.map((v) => formatElement(v, seen)).join(', ');
    seen.delete(value);
    return `[${inner}]`;
  }
  return value.kind === 'mission'
    ? `<mission ${value.name}>`
    : `<built-in mission ${value.name}>`;
}

/** Stringify a value the way `transmit` and `+` concatenation show it */
export function formatValue(value: SpyValue): string {
  return formatInner(value, new Set());
}

// ============================================================
// EQUALITY
// ============================================================

function numericEquals(a: bigint | number, b: bigint | number): boolean {
  if (typeof a === 'bigint' && typeof b === 'bigint') return a === b;
  if (typeof a === 'number' && typeof b === 'number') return a === b;
  const int = typeof a === 'bigint' ? a : b;
  const float = typeof a === 'number' ? a : b;
  if (typeof int !== 'bigint' || typeof float !== 'number') return false;
  return Number.isInteger(float) && BigInt(float) === int;
}

/**
 * Structural equality used by `==` and `!=`. Never throws.
 * Int and Float compare numerically, lists element-wise,
 * callables by identity; any other type pairing is unequal.
 */
export function deepEquals(a: SpyValue, b: SpyValue): boolean {
  if (a === b) return true;
  if (isNumeric(a) && isNumeric(b)) return numericEquals(a, b);
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      const left = a[i];
      const right = b[i];
      if (left === undefined || right === undefined) return false;
      if (!deepEquals(left, right)) return false;
    }
    return true;
  }
  return false;
}
