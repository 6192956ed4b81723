/**
 * Configuration loading and validation
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  resolveConfig,
  validateConfig,
} from '../../src/index.js';
import { createDefaultConfig } from '../../src/config.js';

// ============================================================
// VALIDATION
// ============================================================

describe('validateConfig', () => {
  it('accepts every known option', () => {
    expect(
      validateConfig({ format: 'compact', emitTokens: true, outDir: 'build' })
    ).toEqual({ format: 'compact', emitTokens: true, outDir: 'build' });
  });

  it('treats an empty document as no options', () => {
    expect(validateConfig(null)).toEqual({});
    expect(validateConfig(undefined)).toEqual({});
  });

  it('rejects non-mapping documents', () => {
    expect(() => validateConfig(['pretty'])).toThrow(
      'Invalid configuration: must be a mapping'
    );
    expect(() => validateConfig('pretty')).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ indent: 4 })).toThrow(
      'Invalid configuration: unknown key indent'
    );
  });

  it('rejects invalid values', () => {
    expect(() => validateConfig({ format: 3 })).toThrow(
      'Invalid configuration: format must be one of compact, pretty, got 3'
    );
    expect(() => validateConfig({ emitTokens: 'yes' })).toThrow(
      'Invalid configuration: emitTokens must be a boolean'
    );
    expect(() => validateConfig({ outDir: '' })).toThrow(
      'Invalid configuration: outDir must be a non-empty string'
    );
  });

  it('raises JACK-C001', () => {
    let thrown: unknown;
    try {
      validateConfig(42);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({ errorId: 'JACK-C001' });
  });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jack-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name = CONFIG_FILE_NAME): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('returns null when the default file is absent', () => {
    expect(loadConfig(tempDir)).toBeNull();
  });

  it('reads the default file from the working directory', () => {
    writeConfig('format: compact\nemitTokens: true\n');
    expect(loadConfig(tempDir)).toEqual({ format: 'compact', emitTokens: true });
  });

  it('reads an explicit path', () => {
    const file = writeConfig('outDir: out\n', 'custom.yaml');
    expect(loadConfig(tempDir, file)).toEqual({ outDir: 'out' });
  });

  it('treats an empty file as no options', () => {
    writeConfig('');
    expect(loadConfig(tempDir)).toEqual({});
  });

  it('fails when an explicit path is missing', () => {
    expect(() =>
      loadConfig(tempDir, path.join(tempDir, 'missing.yaml'))
    ).toThrow('Invalid configuration: failed to read');
  });

  it('fails on malformed YAML', () => {
    writeConfig('format: [pretty\n');
    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: invalid YAML'
    );
  });

  it('validates the parsed document', () => {
    writeConfig('format: fancy\n');
    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: format must be one of compact, pretty, got fancy'
    );
  });
});

// ============================================================
// RESOLUTION
// ============================================================

describe('resolveConfig', () => {
  it('starts from the defaults', () => {
    expect(resolveConfig()).toEqual(createDefaultConfig());
    expect(createDefaultConfig()).toEqual({
      format: 'pretty',
      emitTokens: false,
    });
  });

  it('lets later layers override earlier ones', () => {
    expect(
      resolveConfig(
        { format: 'compact', outDir: 'a' },
        { outDir: 'b', emitTokens: true }
      )
    ).toEqual({ format: 'compact', emitTokens: true, outDir: 'b' });
  });
});
