/**
 * CLI Tests: spy.config.yaml
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import * as yaml from 'yaml';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  validateConfig,
} from '../../src/cli-config.js';

function dirWithConfig(content?: string): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'spylang-config-'));
  if (content !== undefined) {
    writeFileSync(path.join(dir, CONFIG_FILE_NAME), content);
  }
  return dir;
}

describe('CLI: configuration', () => {
  describe('validateConfig', () => {
    it('uses the defaults for an empty document', () => {
      expect(validateConfig(null)).toEqual({
        maxCallDepth: 1000,
        prompt: 'SpyLang > ',
      });
    });

    it('merges given keys over the defaults', () => {
      expect(validateConfig(yaml.parse('maxCallDepth: 50'))).toEqual({
        maxCallDepth: 50,
        prompt: 'SpyLang > ',
      });
      expect(validateConfig(yaml.parse('prompt: "agent> "'))).toEqual({
        maxCallDepth: 1000,
        prompt: 'agent> ',
      });
    });

    it('rejects invalid values', () => {
      expect(() => validateConfig({ maxCallDepth: 0 })).toThrow(
        'Invalid configuration: maxCallDepth must be a positive integer, got 0'
      );
      expect(() => validateConfig({ maxCallDepth: 2.5 })).toThrow(
        'Invalid configuration: maxCallDepth must be a positive integer, got 2.5'
      );
      expect(() => validateConfig({ prompt: 5 })).toThrow(
        'Invalid configuration: prompt must be a string'
      );
    });

    it('rejects unknown keys and non-mappings', () => {
      expect(() => validateConfig({ colour: 'red' })).toThrow(
        'Invalid configuration: unknown key colour'
      );
      expect(() => validateConfig([1, 2])).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });
  });

  describe('loadConfig', () => {
    it('returns the defaults when there is no file', () => {
      expect(loadConfig(dirWithConfig())).toEqual({
        maxCallDepth: 1000,
        prompt: 'SpyLang > ',
      });
    });

    it('reads the file in the given directory', () => {
      const dir = dirWithConfig('maxCallDepth: 200\nprompt: "spy: "\n');
      expect(loadConfig(dir)).toEqual({ maxCallDepth: 200, prompt: 'spy: ' });
    });

    it('rejects malformed YAML', () => {
      const dir = dirWithConfig('maxCallDepth: [1, 2\n');
      expect(() => loadConfig(dir)).toThrow(
        /^Invalid configuration: invalid YAML/
      );
    });
  });
});
