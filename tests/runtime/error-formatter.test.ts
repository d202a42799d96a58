/**
 * SpyLang Runtime Tests: Agent Error Formatting
 */

import { describe, expect, it } from 'vitest';
import {
  createMemoryLoader,
  formatAgentError,
  IllegalCharacterError,
  renderCaretUnderline,
  runProgram,
  type SpyError,
} from '../../src/index.js';

async function failure(
  source: string,
  options: Parameters<typeof runProgram>[1] = {}
): Promise<string> {
  const outcome = await runProgram(source, options);
  if (outcome.ok) throw new Error('expected the program to fail');
  return formatAgentError(outcome.error, outcome.context.sources);
}

describe('SpyLang Runtime: Agent Error Formatting', () => {
  describe('renderCaretUnderline', () => {
    const at = (line: number, column: number) => ({ line, column, offset: 0 });

    it('underlines a span on one line', () => {
      expect(
        renderCaretUnderline({ start: at(1, 3), end: at(1, 6) }, 'abcdefgh')
      ).toBe('  ^^^');
    });

    it('draws at least one caret', () => {
      expect(
        renderCaretUnderline({ start: at(1, 1), end: at(1, 1) }, 'x')
      ).toBe('^');
    });

    it('runs a multi-line span to the end of its first line', () => {
      expect(
        renderCaretUnderline({ start: at(1, 4), end: at(2, 2) }, 'abcdef')
      ).toBe('   ^^^');
    });

    it('rejects a span that ends before it starts', () => {
      expect(() =>
        renderCaretUnderline({ start: at(2, 1), end: at(1, 1) }, 'x')
      ).toThrow('Span start must precede end');
    });
  });

  describe('formatAgentError', () => {
    it('formats a syntax error with its snippet', async () => {
      expect(await failure('transmit(1')).toBe(
        [
          "Agent Error: Expected ',' or ')', found end of input. Mission compromised!",
          '  --> <program>:1:11',
          '   |',
          ' 1 | transmit(1',
          '   |           ^',
        ].join('\n')
      );
    });

    it('formats a runtime error with the mission traceback', async () => {
      const source = [
        'mission split(a, b) {',
        '  extract a / b',
        '}',
        'split(1, 0)',
      ].join('\n');
      expect(await failure(source, { file: 'main.spy' })).toBe(
        [
          'Agent Error: Runtime breach! Division by zero.',
          '  --> main.spy:2:11',
          '   |',
          ' 2 |   extract a / b',
          '   |           ^^^^^',
          '',
          'Mission Traceback (most recent incident last):',
          '  Mission Log: File "main.spy", line 4, in <program>',
          '  Mission Log: File "main.spy", line 2, in split',
        ].join('\n')
      );
    });

    it('formats a top-level runtime error', async () => {
      expect(await failure('1 / 0')).toBe(
        [
          'Agent Error: Runtime breach! Division by zero.',
          '  --> <program>:1:1',
          '   |',
          ' 1 | 1 / 0',
          '   | ^^^^^',
          '',
          'Mission Traceback (most recent incident last):',
          '  Mission Log: File "<program>", line 1, in <program>',
        ].join('\n')
      );
    });

    it('shows the launched file an error came from', async () => {
      const loader = createMemoryLoader({
        '/ops/helper.spy': 'assign z = 1 / 0',
      });
      expect(
        await failure('launch("helper.spy")', {
          file: '/ops/main.spy',
          loader,
        })
      ).toBe(
        [
          'Agent Error: Runtime breach! Division by zero.',
          '  --> /ops/helper.spy:1:12',
          '   |',
          ' 1 | assign z = 1 / 0',
          '   |            ^^^^^',
          '',
          'Mission Traceback (most recent incident last):',
          '  Mission Log: File "/ops/main.spy", line 1, in <program>',
          '  Mission Log: File "/ops/helper.spy", line 1, in launch',
        ].join('\n')
      );
    });

    it('widens the gutter for multi-digit line numbers', async () => {
      const source = `${'\n'.repeat(11)}@`;
      const formatted = await failure(source);
      expect(formatted.split('\n').slice(1)).toEqual([
        '  --> <program>:12:1',
        '    |',
        ' 12 | @',
        '    | ^',
      ]);
    });

    it('omits the snippet when the source is unknown', () => {
      const error: SpyError = new IllegalCharacterError('@', {
        line: 1,
        column: 3,
        offset: 2,
      });
      expect(formatAgentError(error)).toBe(
        [
          'Agent Error: Unauthorized character "@" detected in the operation. Mission compromised!',
          '  --> <program>:1:3',
        ].join('\n')
      );
    });
  });
});
