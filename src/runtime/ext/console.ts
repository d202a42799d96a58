/**
 * Console Devices
 *
 * The I/O capability behind transmit, intel and erase. The runtime only
 * talks to a ConsoleDevice; hosts choose the implementation.
 */

import * as readline from 'node:readline';

export interface ConsoleDevice {
  /** Write text as is (no newline added) */
  write(text: string): void;
  /** Read one line without its terminator; "" once input is exhausted */
  readLine(): Promise<string>;
  /** Clear the screen */
  clear(): void;
}

// ============================================================
// BUFFERED CONSOLE
// ============================================================

/** In-memory console for tests and embedding */
export interface BufferedConsole extends ConsoleDevice {
  /** Everything written so far */
  readonly output: string;
  /** Number of clear() calls */
  readonly clears: number;
  /** Lines not yet consumed by readLine() */
  readonly pendingInput: readonly string[];
}

/**
 * Create a console that records output and serves `input` line by line.
 *
 * @example
 * ```typescript
 * const io = createBufferedConsole(['007']);
 * // intel("code? ") returns "007"; io.output is "code? "
 * ```
 */
export function createBufferedConsole(
  input: readonly string[] = []
): BufferedConsole {
  const queue = [...input];
  let output = '';
  let clears = 0;

  return {
    get output() {
      return output;
    },
    get clears() {
      return clears;
    },
    get pendingInput() {
      return queue;
    },
    write(text) {
      output += text;
    },
    readLine() {
      return Promise.resolve(queue.shift() ?? '');
    },
    clear() {
      clears++;
      output = '';
    },
  };
}

// ============================================================
// NODE CONSOLE
// ============================================================

/** Console over Node streams, used by the CLI */
export interface NodeConsole extends ConsoleDevice {
  /** Next input line, or null at end of input */
  nextLine(): Promise<string | null>;
  /** Release the input stream so the process can exit */
  close(): void;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export function createNodeConsole(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): NodeConsole {
  let lines: AsyncIterator<string> | undefined;
  let rl: readline.Interface | undefined;
  let ended = false;

  // Created on first read so scripts that never read leave stdin alone
  const iterator = (): AsyncIterator<string> => {
    if (!lines) {
      rl = readline.createInterface({ input, terminal: false });
      lines = rl[Symbol.asyncIterator]();
    }
    return lines;
  };

  const nextLine = async (): Promise<string | null> => {
    if (ended) return null;
    const result = await iterator().next();
    if (result.done === true) {
      ended = true;
      return null;
    }
    return result.value;
  };

  return {
    write(text) {
      output.write(text);
    },
    async readLine() {
      return (await nextLine()) ?? '';
    },
    nextLine,
    clear() {
      output.write(CLEAR_SCREEN);
    },
    close() {
      rl?.close();
    },
  };
}
