/**
 * Operators
 *
 * Arithmetic, comparison and unary operators over SpyValues.
 * Int op Int stays Int (except `/`); any Float operand makes the result
 * Float.
 */

import type {
  ArithmeticOp,
  ComparisonOp,
  SourceSpan,
} from '../../types.js';
import { RuntimeError } from '../../types.js';
import {
  deepEquals,
  formatValue,
  inferType,
  isList,
  isNumeric,
  isTruthy,
  type SpyValue,
} from './values.js';

type Located = { span: SourceSpan };

function typeError(detail: string, node: Located): RuntimeError {
  return RuntimeError.fromNode('SPY-R002', { detail }, node);
}

function operandError(
  op: string,
  left: SpyValue,
  right: SpyValue,
  node: Located
): RuntimeError {
  return typeError(
    `Unsupported operand types for '${op}': ${inferType(left)} and ${inferType(right)}`,
    node
  );
}

function isZero(value: bigint | number): boolean {
  return typeof value === 'bigint' ? value === 0n : value === 0;
}

// ============================================================
// ARITHMETIC
// ============================================================

/** Floored modulo: the result takes the divisor's sign */
function floorMod(dividend: bigint, divisor: bigint): bigint {
  const rem = dividend % divisor;
  return rem !== 0n && rem < 0n !== divisor < 0n ? rem + divisor : rem;
}

function numericOp(
  op: '+' | '-' | '*',
  left: bigint | number,
  right: bigint | number
): bigint | number {
  if (typeof left === 'bigint' && typeof right === 'bigint') {
    switch (op) {
      case '+':
        return left + right;
      case '-':
        return left - right;
      case '*':
        return left * right;
    }
  }
  const a = Number(left);
  const b = Number(right);
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
  }
}

function power(
  base: bigint | number,
  exponent: bigint | number,
  node: Located
): bigint | number {
  if (typeof base === 'bigint' && typeof exponent === 'bigint') {
    if (exponent >= 0n) {
      try {
        return base ** exponent;
      } catch (error) {
        if (!(error instanceof RangeError)) throw error;
        throw RuntimeError.fromNode('SPY-R014', { operation: "'^'" }, node);
      }
    }
  }
  if (isZero(base) && Number(exponent) < 0) {
    throw RuntimeError.fromNode('SPY-R007', { operation: 'Division' }, node);
  }
  return Math.pow(Number(base), Number(exponent));
}

/**
 * Apply an arithmetic operator.
 *
 * - `+` concatenates when either side is a Str (the other is stringified)
 *   and joins two Lists into a new List
 * - `/` is true division and always yields Float
 * - `%` takes Int operands only
 * - `^` yields Int for Int operands with a non-negative exponent
 *
 * @throws RuntimeError on operand type mismatch or division by zero
 */
export function applyArithmetic(
  op: ArithmeticOp,
  left: SpyValue,
  right: SpyValue,
  node: Located
): SpyValue {
  if (op === '+') {
    if (typeof left === 'string' || typeof right === 'string') {
      return formatValue(left) + formatValue(right);
    }
    if (isList(left) && isList(right)) {
      return [...left, ...right];
    }
  }

  if (!isNumeric(left) || !isNumeric(right)) {
    throw operandError(op, left, right, node);
  }

  switch (op) {
    case '+':
    case '-':
    case '*':
      return numericOp(op, left, right);
    case '/':
      if (isZero(right)) {
        throw RuntimeError.fromNode(
          'SPY-R007',
          { operation: 'Division' },
          node
        );
      }
      return Number(left) / Number(right);
    case '%':
      if (typeof left !== 'bigint' || typeof right !== 'bigint') {
        throw operandError(op, left, right, node);
      }
      if (right === 0n) {
        throw RuntimeError.fromNode('SPY-R007', { operation: 'Modulo' }, node);
      }
      return floorMod(left, right);
    case '^':
      return power(left, right, node);
  }
}

// ============================================================
// COMPARISON
// ============================================================

function orderNumbers(
  op: '<' | '>' | '<=' | '>=',
  a: bigint | number,
  b: bigint | number
): boolean {
  // JS relational operators order bigint and number against each other
  switch (op) {
    case '<':
      return a < b;
    case '>':
      return a > b;
    case '<=':
      return a <= b;
    case '>=':
      return a >= b;
  }
}

function orderStrings(
  op: '<' | '>' | '<=' | '>=',
  a: string,
  b: string
): boolean {
  switch (op) {
    case '<':
      return a < b;
    case '>':
      return a > b;
    case '<=':
      return a <= b;
    case '>=':
      return a >= b;
  }
}

/**
 * Apply a comparison operator.
 * `==` and `!=` never fail; ordering requires two numbers or two Strs.
 */
export function applyComparison(
  op: ComparisonOp,
  left: SpyValue,
  right: SpyValue,
  node: Located
): boolean {
  if (op === '==') return deepEquals(left, right);
  if (op === '!=') return !deepEquals(left, right);

  if (isNumeric(left) && isNumeric(right)) {
    return orderNumbers(op, left, right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return orderStrings(op, left, right);
  }
  throw typeError(
    `Cannot compare ${inferType(left)} and ${inferType(right)} with '${op}'`,
    node
  );
}

// ============================================================
// UNARY
// ============================================================

export function applyUnary(
  op: '-' | '+' | 'not',
  operand: SpyValue,
  node: Located
): SpyValue {
  if (op === 'not') return !isTruthy(operand);
  if (!isNumeric(operand)) {
    throw typeError(
      `Bad operand type for unary '${op}': ${inferType(operand)}`,
      node
    );
  }
  return op === '-' ? -operand : operand;
}
