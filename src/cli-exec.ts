#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), executeScript() and runShell() for the
 * spy binary. Runs a .spy file, or an interactive shell when no file is
 * given.
 */

import * as path from 'node:path';
import { loadConfig, type CliConfig } from './cli-config.js';
import { formatError, formatOutput, readVersion } from './cli-shared.js';
import {
  createFileLoader,
  createNodeConsole,
  createRuntimeContext,
  executeProgram,
  runProgram,
  type NodeConsole,
  type RunOutcome,
} from './runtime/index.js';
import { SpyError } from './types.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; file: string }
  | { mode: 'repl' }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  spy <script.spy>   Execute a SpyLang script file
  spy                Start the interactive shell
  spy --help         Show this help message
  spy --version      Show version information

Configuration:
  spy.config.yaml in the working directory may set maxCallDepth and prompt

Examples:
  spy mission.spy`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  const [file, ...rest] = argv;
  if (file === undefined) {
    return { mode: 'repl' };
  }
  if (rest.length > 0) {
    throw new Error(`Unexpected argument: ${rest[0] ?? ''}`);
  }
  return { mode: 'exec', file };
}

/**
 * Execute a SpyLang script file. Relative launches resolve against the
 * script's directory.
 *
 * @throws Error if the file cannot be read
 */
export async function executeScript(
  file: string,
  io: NodeConsole,
  config: CliConfig
): Promise<RunOutcome> {
  const scriptPath = path.resolve(file);
  const loader = createFileLoader();
  const source = await loader.readFile(scriptPath);

  return runProgram(source, {
    file: scriptPath,
    console: io,
    loader,
    maxCallDepth: config.maxCallDepth,
  });
}

/**
 * Interactive shell: every line runs in one shared root scope, so
 * declarations persist between lines. Ends at end of input.
 */
export async function runShell(
  io: NodeConsole,
  config: CliConfig,
  report: (text: string) => void = (text) => io.write(text)
): Promise<void> {
  const context = createRuntimeContext({
    console: io,
    loader: createFileLoader(),
    maxCallDepth: config.maxCallDepth,
  });

  for (;;) {
    io.write(config.prompt);
    const line = await io.nextLine();
    if (line === null) break;
    if (line.trim() === '') continue;

    try {
      const result = await executeProgram(line, context);
      for (const text of formatOutput(result.value)) {
        io.write(`${text}\n`);
      }
    } catch (err) {
      if (!(err instanceof SpyError)) throw err;
      report(`${formatError(err, context.sources)}\n`);
    }
  }
}

/**
 * Entry point for the spy binary
 *
 * Parses command-line arguments, executes scripts, and handles errors.
 * Writes program output to stdout and errors to stderr.
 */
export async function main(): Promise<void> {
  const io = createNodeConsole(process.stdin, process.stdout);
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'repl':
        await runShell(io, loadConfig(process.cwd()), (text) =>
          process.stderr.write(text)
        );
        return;

      case 'exec': {
        const outcome = await executeScript(
          parsed.file,
          io,
          loadConfig(process.cwd())
        );
        if (!outcome.ok) {
          console.error(formatError(outcome.error, outcome.context.sources));
          process.exitCode = 1;
        }
        return;
      }
    }
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  } finally {
    io.close();
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  });
}
