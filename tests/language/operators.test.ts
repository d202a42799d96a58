/**
 * SpyLang Language Tests: Operators
 * Arithmetic, concatenation, comparison, logic and their type errors
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError, runProgram } from '../../src/index.js';
import { run } from '../helpers/runtime.js';

describe('SpyLang Language: Operators', () => {
  describe('arithmetic', () => {
    it('keeps Int arithmetic in Int', async () => {
      expect(await run('1 + 2 * 3')).toBe(7n);
      expect(await run('10 - 4 - 3')).toBe(3n);
    });

    it('evaluates integer literals exactly beyond 2^53', async () => {
      expect(await run('2 ^ 100')).toBe(1267650600228229401496703205376n);
      expect(await run('9007199254740993 + 0')).toBe(9007199254740993n);
    });

    it('always divides to Float', async () => {
      expect(await run('7 / 2')).toBe(3.5);
      expect(await run('6 / 3')).toBe(2);
    });

    it('takes the divisor sign for modulo', async () => {
      expect(await run('7 % 3')).toBe(1n);
      expect(await run('-7 % 3')).toBe(2n);
      expect(await run('7 % -3')).toBe(-2n);
    });

    it('raises Int to a non-negative Int power as Int', async () => {
      expect(await run('2 ^ 10')).toBe(1024n);
      expect(await run('2 ^ -1')).toBe(0.5);
      expect(await run('2.0 ^ 2')).toBe(4);
      expect(await run('-2 ^ 2')).toBe(-4n);
    });

    it('promotes to Float when either operand is Float', async () => {
      expect(await run('1 + 2.5')).toBe(3.5);
      expect(await run('2 * 0.5')).toBe(1);
    });

    it('applies unary plus and minus', async () => {
      expect(await run('-(3 - 5)')).toBe(2n);
      expect(await run('+1.5')).toBe(1.5);
    });
  });

  describe('concatenation', () => {
    it('stringifies the other operand when either side is a Str', async () => {
      expect(await run('"agent " + 7')).toBe('agent 7');
      expect(await run('"x" + 1.0')).toBe('x1.0');
      expect(await run('true + "!"')).toBe('true!');
      expect(await run('"v" + [1, "a"]')).toBe('v[1, "a"]');
      expect(await run('"n" + ghost')).toBe('nghost');
    });

    it('joins two lists into a new list', async () => {
      expect(await run('assign a = [1]\nassign b = a + [2]\nadd_agent(b, 3)\na')).toEqual([
        1n,
      ]);
      expect(await run('[1] + [2, 3]')).toEqual([1n, 2n, 3n]);
    });
  });

  describe('comparison', () => {
    it('compares Int and Float numerically', async () => {
      expect(await run('1 == 1.0')).toBe(true);
      expect(await run('2 > 1.5')).toBe(true);
      expect(await run('3 <= 2')).toBe(false);
    });

    it('orders strings', async () => {
      expect(await run('"alpha" < "bravo"')).toBe(true);
      expect(await run('"b" >= "c"')).toBe(false);
    });

    it('compares lists structurally and never fails on equality', async () => {
      expect(await run('[1, [2]] == [1, [2.0]]')).toBe(true);
      expect(await run('[1, 2] != [1]')).toBe(true);
      expect(await run('1 == "1"')).toBe(false);
      expect(await run('ghost == ghost')).toBe(true);
      expect(await run('transmit == transmit')).toBe(true);
    });
  });

  describe('logic', () => {
    it('yields Bool from and/or/not', async () => {
      expect(await run('1 and "x"')).toBe(true);
      expect(await run('0 or ghost')).toBe(false);
      expect(await run('not []')).toBe(true);
      expect(await run('not "secret"')).toBe(false);
    });

    it('applies not to a whole comparison', async () => {
      expect(await run('not 1 == 2')).toBe(true);
      expect(await run('(not 1) == 2')).toBe(false);
    });

    it('short-circuits the right operand', async () => {
      expect(await run('false and missing_name')).toBe(false);
      expect(await run('true or missing_name')).toBe(true);
    });
  });

  describe('errors', () => {
    it('raises on division by zero', async () => {
      await expect(run('1 / 0')).rejects.toThrow(RuntimeError);
      await expect(run('1 / 0')).rejects.toThrow('Division by zero at 1:1');
      await expect(run('1.5 / 0.0')).rejects.toThrow('Division by zero');
      await expect(run('0 ^ -1')).rejects.toThrow('Division by zero');
    });

    it('raises when an Int power is too large to represent', async () => {
      const outcome = await runProgram('2 ^ 100000000000');
      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.error).toBeInstanceOf(RuntimeError);
      expect(outcome.error.errorId).toBe('SPY-R014');
      expect(outcome.error.message).toBe(
        "Result of '^' is too large to represent at 1:1"
      );
    });

    it('raises on modulo by zero', async () => {
      await expect(run('assign x = 5\nx % 0')).rejects.toThrow(
        'Modulo by zero at 2:1'
      );
    });

    it('rejects mismatched operand types', async () => {
      await expect(run('"a" - 1')).rejects.toThrow(
        "Unsupported operand types for '-': Str and Int at 1:1"
      );
      await expect(run('5 % 2.0')).rejects.toThrow(
        "Unsupported operand types for '%': Int and Float at 1:1"
      );
      await expect(run('[1] * 2')).rejects.toThrow(
        "Unsupported operand types for '*': List and Int at 1:1"
      );
    });

    it('rejects ordering across types', async () => {
      await expect(run('1 < "a"')).rejects.toThrow(
        "Cannot compare Int and Str with '<' at 1:1"
      );
    });

    it('rejects unary minus on a non-number', async () => {
      await expect(run('-"a"')).rejects.toThrow(
        "Bad operand type for unary '-': Str at 1:1"
      );
    });

    it('tags operator errors with their error ID', async () => {
      try {
        await run('1 / 0');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(RuntimeError);
        if (error instanceof RuntimeError) {
          expect(error.errorId).toBe('SPY-R007');
          expect(error.span?.end.column).toBe(6);
        }
      }
    });
  });
});
