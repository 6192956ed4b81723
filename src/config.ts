/**
 * Configuration Loader
 * Loads and validates jack-analyzer.yaml files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError } from './error-classes.js';
import { MARKUP_FORMATS, type MarkupFormat } from './tree/serialize.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file looked up in the working directory */
export const CONFIG_FILE_NAME = 'jack-analyzer.yaml';

export interface AnalyzerConfig {
  /** Markup layout of written files */
  readonly format: MarkupFormat;
  /** Also write `NameT.xml` token files */
  readonly emitTokens: boolean;
  /** Output directory; undefined writes next to each source file */
  readonly outDir?: string | undefined;
}

/** Options a configuration file may set; every key is optional */
export type ConfigFile = Partial<AnalyzerConfig>;

export function createDefaultConfig(): AnalyzerConfig {
  return { format: 'pretty', emitTokens: false };
}

// ============================================================
// VALIDATION
// ============================================================

const KNOWN_KEYS = ['format', 'emitTokens', 'outDir'];

function isMarkupFormat(value: unknown): value is MarkupFormat {
  return MARKUP_FORMATS.some((format) => format === value);
}

function invalid(reason: string): never {
  throw createError('JACK-C001', { reason });
}

/**
 * Validate parsed YAML and narrow it to the file options.
 * An empty document is an empty configuration.
 */
export function validateConfig(data: unknown): ConfigFile {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    invalid('must be a mapping');
  }

  const values = new Map<string, unknown>(Object.entries(data));
  for (const key of values.keys()) {
    if (!KNOWN_KEYS.includes(key)) {
      invalid(`unknown key ${key}`);
    }
  }

  const format = values.get('format');
  const emitTokens = values.get('emitTokens');
  const outDir = values.get('outDir');
  let config: ConfigFile = {};

  if (format !== undefined) {
    if (!isMarkupFormat(format)) {
      invalid(
        `format must be one of ${MARKUP_FORMATS.join(', ')}, got ${String(format)}`
      );
    }
    config = { ...config, format };
  }

  if (emitTokens !== undefined) {
    if (typeof emitTokens !== 'boolean') {
      invalid('emitTokens must be a boolean');
    }
    config = { ...config, emitTokens };
  }

  if (outDir !== undefined) {
    if (typeof outDir !== 'string' || outDir === '') {
      invalid('outDir must be a non-empty string');
    }
    config = { ...config, outDir };
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from `configPath`, or from jack-analyzer.yaml in
 * `cwd` when no path is given.
 *
 * @returns File options, or null when no file exists at the default path
 * @throws JackError (JACK-C001) for unreadable, malformed or invalid files
 */
export function loadConfig(cwd: string, configPath?: string): ConfigFile | null {
  const path = configPath ?? join(cwd, CONFIG_FILE_NAME);

  if (!configPath && !existsSync(path)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(path, 'utf-8');
  } catch (err) {
    invalid(
      `failed to read ${path} (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}

/** Defaults, then file options, then command-line overrides */
export function resolveConfig(...layers: ConfigFile[]): AnalyzerConfig {
  return layers.reduce<AnalyzerConfig>(
    (config, layer) => ({ ...config, ...layer }),
    createDefaultConfig()
  );
}
