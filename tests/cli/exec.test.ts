/**
 * CLI Tests: spy
 * Argument parsing, script execution and the interactive shell
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { createDefaultConfig } from '../../src/cli-config.js';
import { executeScript, parseArgs, runShell } from '../../src/cli-exec.js';
import { RuntimeError, type NodeConsole } from '../../src/index.js';

/** NodeConsole over an in-memory list of input lines */
function fakeConsole(lines: string[] = []): NodeConsole & {
  readonly output: string;
} {
  const queue = [...lines];
  let output = '';
  return {
    get output() {
      return output;
    },
    write(text) {
      output += text;
    },
    nextLine() {
      return Promise.resolve(queue.shift() ?? null);
    },
    async readLine() {
      return (await this.nextLine()) ?? '';
    },
    clear() {},
    close() {},
  };
}

function scratchDir(): string {
  return mkdtempSync(path.join(tmpdir(), 'spylang-cli-'));
}

describe('CLI: spy', () => {
  describe('parseArgs', () => {
    it('starts the shell without arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'repl' });
    });

    it('runs a file given as the only argument', () => {
      expect(parseArgs(['mission.spy'])).toEqual({
        mode: 'exec',
        file: 'mission.spy',
      });
    });

    it('recognizes help and version flags anywhere', () => {
      expect(parseArgs(['mission.spy', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('rejects unknown options and extra arguments', () => {
      expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
      expect(() => parseArgs(['a.spy', 'b.spy'])).toThrow(
        'Unexpected argument: b.spy'
      );
    });
  });

  describe('executeScript', () => {
    it('runs a script and its launches from disk', async () => {
      const dir = scratchDir();
      writeFileSync(
        path.join(dir, 'main.spy'),
        'launch("helper.spy")\ntransmit("done")\n'
      );
      writeFileSync(path.join(dir, 'helper.spy'), 'transmit("helper")\n');
      const io = fakeConsole();

      const outcome = await executeScript(
        path.join(dir, 'main.spy'),
        io,
        createDefaultConfig()
      );
      expect(outcome.ok).toBe(true);
      expect(io.output).toBe('helper\ndone\n');
    });

    it('returns runtime errors attributed to the resolved file', async () => {
      const dir = scratchDir();
      const file = path.join(dir, 'broken.spy');
      writeFileSync(file, 'assign x = 1\nx / 0\n');

      const outcome = await executeScript(
        file,
        fakeConsole(),
        createDefaultConfig()
      );
      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error).toBeInstanceOf(RuntimeError);
        expect(outcome.error.file).toBe(path.resolve(file));
      }
    });

    it('applies the configured call depth', async () => {
      const dir = scratchDir();
      const file = path.join(dir, 'deep.spy');
      writeFileSync(file, 'mission dive() { extract dive() }\ndive()\n');

      const outcome = await executeScript(file, fakeConsole(), {
        ...createDefaultConfig(),
        maxCallDepth: 5,
      });
      expect(!outcome.ok && outcome.error.message).toBe(
        'Maximum call depth of 5 exceeded at 1:26'
      );
    });

    it('rejects a missing file', async () => {
      await expect(
        executeScript(
          path.join(scratchDir(), 'none.spy'),
          fakeConsole(),
          createDefaultConfig()
        )
      ).rejects.toThrow(/ENOENT/);
    });
  });

  describe('runShell', () => {
    it('keeps bindings between lines and prints results', async () => {
      const io = fakeConsole(['assign x = 2', 'x * 3', '', '[1, "a"]']);
      await runShell(io, createDefaultConfig());
      expect(io.output).toBe(
        [
          'SpyLang > 2',
          'SpyLang > 6',
          'SpyLang > SpyLang > 1',
          'a',
          'SpyLang > ',
        ].join('\n')
      );
    });

    it('reports errors and keeps going', async () => {
      const io = fakeConsole(['y', 'transmit("still in")']);
      const reports: string[] = [];
      await runShell(io, { ...createDefaultConfig(), prompt: '> ' }, (text) =>
        reports.push(text)
      );
      expect(io.output).toBe('> > still in\n> ');
      expect(reports).toEqual([
        [
          "Agent Error: Runtime breach! 'y' is not defined.",
          '  --> <program>:1:1',
          '   |',
          ' 1 | y',
          '   | ^',
          '',
          'Mission Traceback (most recent incident last):',
          '  Mission Log: File "<program>", line 1, in <program>',
          '',
        ].join('\n'),
      ]);
    });
  });
});
