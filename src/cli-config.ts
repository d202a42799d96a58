/**
 * Configuration Loader for spy
 * Loads and validates spy.config.yaml files.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_CALL_DEPTH } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = 'spy.config.yaml';

export const DEFAULT_PROMPT = 'SpyLang > ';

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** Maximum mission call depth */
  readonly maxCallDepth: number;
  /** Interactive shell prompt */
  readonly prompt: string;
}

export function createDefaultConfig(): CliConfig {
  return { maxCallDepth: DEFAULT_MAX_CALL_DEPTH, prompt: DEFAULT_PROMPT };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS = new Set(['maxCallDepth', 'prompt']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * An empty document yields the defaults.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
export function validateConfig(data: unknown): CliConfig {
  const defaults = createDefaultConfig();
  if (data === null || data === undefined) return defaults;

  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const maxCallDepth = data['maxCallDepth'] ?? defaults.maxCallDepth;
  if (
    typeof maxCallDepth !== 'number' ||
    !Number.isInteger(maxCallDepth) ||
    maxCallDepth < 1
  ) {
    throw new Error(
      `Invalid configuration: maxCallDepth must be a positive integer, got ${String(maxCallDepth)}`
    );
  }

  const prompt = data['prompt'] ?? defaults.prompt;
  if (typeof prompt !== 'string') {
    throw new Error('Invalid configuration: prompt must be a string');
  }

  return { maxCallDepth, prompt };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from spy.config.yaml in the specified directory.
 *
 * @param cwd - Directory to search for the configuration file
 * @returns The defaults when no file exists
 * @throws Error with "Invalid configuration: {reason}" on unreadable
 * files, malformed YAML or invalid values
 */
export function loadConfig(cwd: string): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
