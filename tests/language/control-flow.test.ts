/**
 * SpyLang Language Tests: Control Flow
 * check/followup/otherwise, each, chase, abort, proceed and extract
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError } from '../../src/index.js';
import { run, runOutput } from '../helpers/runtime.js';

describe('SpyLang Language: Control Flow', () => {
  describe('check / followup / otherwise', () => {
    const classify = `
      mission classify(n) {
        check (n < 0) { extract "neg" } followup (n == 0) { extract "zero" }
        otherwise { extract "pos" }
      }
    `;

    it('runs the first truthy branch', async () => {
      expect(await run(`${classify}\nclassify(-5)`)).toBe('neg');
      expect(await run(`${classify}\nclassify(0)`)).toBe('zero');
      expect(await run(`${classify}\nclassify(9)`)).toBe('pos');
    });

    it('yields ghost when no branch runs', async () => {
      expect(await run('check (false) { 1 }')).toBeNull();
    });

    it('scopes declarations to the branch block', async () => {
      await expect(run('check (true) { assign inner = 1 }\ninner')).rejects.toThrow(
        "'inner' is not defined at 2:1"
      );
    });

    it('rebinds outer variables from inside a branch', async () => {
      expect(await run('assign x = 1\ncheck (true) { x = 2 }\nx')).toBe(2n);
    });
  });

  describe('each', () => {
    it('iterates a half-open range: (1..10) runs 9 times', async () => {
      const script = `
        assign n = 0
        each i in (1..10) { n = n + 1 }
        n
      `;
      expect(await run(script)).toBe(9n);
    });

    it('runs zero times when the range is empty', async () => {
      expect(await run('assign n = 0\neach i in (5..1) { n = n + 1 }\nn')).toBe(0n);
    });

    it('evaluates range bounds once', async () => {
      const script = `
        assign limit = 3
        assign seen = []
        each i in (0..limit) {
          add_agent(seen, i)
          limit = 10
        }
        seen
      `;
      expect(await run(script)).toEqual([0n, 1n, 2n]);
    });

    it('requires Int range bounds', async () => {
      await expect(run('each i in (1.0..3) { }')).rejects.toThrow(
        'Range bounds must be Int, received Float and Int at 1:12'
      );
    });

    it('iterates list elements and reads the list live', async () => {
      const script = `
        assign xs = [1, 2]
        assign seen = []
        each x in (xs) {
          add_agent(seen, x)
          check (x == 1) { add_agent(xs, 3) }
        }
        seen
      `;
      expect(await run(script)).toEqual([1n, 2n, 3n]);
    });

    it('iterates the characters of a Str', async () => {
      expect(await runOutput('each c in ("a😀b") { transmit(c) }')).toBe(
        'a\n😀\nb\n'
      );
    });

    it('rejects values that cannot be iterated', async () => {
      await expect(run('each x in (5) { }')).rejects.toThrow(
        'Cannot iterate over Int at 1:12'
      );
    });

    it('does not leak the loop variable', async () => {
      await expect(run('each i in (0..3) { }\ni')).rejects.toThrow(
        "'i' is not defined at 2:1"
      );
    });

    it('gives every iteration its own binding', async () => {
      const script = `
        assign reveals = []
        each i in (0..3) {
          mission reveal() { extract i }
          add_agent(reveals, reveal)
        }
        [reveals[0](), reveals[2]()]
      `;
      expect(await run(script)).toEqual([0n, 2n]);
    });
  });

  describe('chase', () => {
    it('re-checks its condition before every pass', async () => {
      expect(await run('assign i = 0\nchase (i < 5) { i = i + 1 }\ni')).toBe(5n);
    });

    it('never runs the body when the condition starts false', async () => {
      expect(await runOutput('chase (false) { transmit(1) }')).toBe('');
    });
  });

  describe('abort and proceed', () => {
    it('abort exits only the innermost loop', async () => {
      const script = `
        assign log = []
        each i in (0..3) {
          each j in (0..3) {
            check (j == 1) { abort }
            add_agent(log, [i, j])
          }
        }
        log
      `;
      expect(await run(script)).toEqual([
        [0n, 0n],
        [1n, 0n],
        [2n, 0n],
      ]);
    });

    it('proceed moves an each loop to its next element', async () => {
      const script = `
        assign out = []
        each i in (0..5) {
          check (i % 2 == 0) { proceed }
          add_agent(out, i)
        }
        out
      `;
      expect(await run(script)).toEqual([1n, 3n]);
    });

    it('proceed re-checks a chase condition', async () => {
      const script = `
        assign i = 0
        assign out = []
        chase (i < 5) {
          i = i + 1
          check (i == 3) { proceed }
          add_agent(out, i)
        }
        out
      `;
      expect(await run(script)).toEqual([1n, 2n, 4n, 5n]);
    });

    it('rejects abort outside a loop', async () => {
      await expect(run('abort')).rejects.toThrow(RuntimeError);
      await expect(run('abort')).rejects.toThrow(
        "'abort' used outside of a loop at 1:1"
      );
    });

    it('rejects proceed that escapes through a check block', async () => {
      await expect(run('assign x = 1\ncheck (x) { proceed }')).rejects.toThrow(
        "'proceed' used outside of a loop at 2:13"
      );
    });

    it('does not let abort cross a mission boundary', async () => {
      const script = 'mission quit() { abort }\neach i in (0..2) { quit() }';
      await expect(run(script)).rejects.toThrow(
        "'abort' used outside of a loop at 1:18"
      );
    });
  });

  describe('extract', () => {
    it('returns from inside a loop in a mission', async () => {
      const script = `
        mission find(xs, target) {
          each x in (xs) {
            check (x == target) { extract true }
          }
          extract false
        }
        [find([1, 2, 3], 2), find([1, 2, 3], 7)]
      `;
      expect(await run(script)).toEqual([true, false]);
    });

    it('ends the program when used at the top level', async () => {
      expect(await run('transmit(1)\nextract 5\ntransmit(2)')).toBe(5n);
      expect(await runOutput('transmit(1)\nextract 5\ntransmit(2)')).toBe('1\n');
    });

    it('extracts ghost when bare', async () => {
      expect(await run('mission m() { extract }\nm()')).toBeNull();
    });
  });
});
