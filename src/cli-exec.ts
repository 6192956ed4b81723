/**
 * CLI Execution
 *
 * Argument parsing and the analyze-files loop behind the jack-analyzer
 * binary.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { analyze } from './analyzer.js';
import {
  type AnalyzerConfig,
  type ConfigFile,
  loadConfig,
  resolveConfig,
} from './config.js';
import { createError } from './error-classes.js';
import type { EngineCallbacks } from './parser/state.js';
import { MARKUP_FORMATS, type MarkupFormat } from './tree/serialize.js';
import { formatError } from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'analyze';
      paths: string[];
      /** Options given on the command line; they override the config file */
      overrides: ConfigFile;
      configPath?: string | undefined;
      verbose: boolean;
    }
  | { mode: 'help' | 'version' };

/** Output sink; console by default */
export interface CliIO {
  log(line: string): void;
  error(line: string): void;
}

const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function usageError(reason: string): never {
  throw createError('JACK-C002', { reason });
}

function isMarkupFormat(value: string): value is MarkupFormat {
  return MARKUP_FORMATS.some((format) => format === value);
}

/**
 * Parse command-line arguments into a structured command
 *
 * @param argv - Raw arguments (typically process.argv.slice(2))
 * @throws JackError (JACK-C002) for unknown options or missing values
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const paths: string[] = [];
  let overrides: ConfigFile = {};
  let configPath: string | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    const valueOf = (flag: string): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        usageError(`Missing value after ${flag}`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--out-dir':
        overrides = { ...overrides, outDir: valueOf(arg) };
        break;
      case '--format': {
        const format = valueOf(arg);
        if (!isMarkupFormat(format)) {
          usageError(
            `Invalid --format value: ${format}. Must be one of: ${MARKUP_FORMATS.join(', ')}`
          );
        }
        overrides = { ...overrides, format };
        break;
      }
      case '--tokens':
        overrides = { ...overrides, emitTokens: true };
        break;
      case '--config':
        configPath = valueOf(arg);
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        if (arg.startsWith('-')) {
          usageError(`Unknown option: ${arg}`);
        }
        paths.push(arg);
    }
  }

  if (paths.length === 0) {
    usageError('Missing file or directory argument');
  }

  return { mode: 'analyze', paths, overrides, configPath, verbose };
}

/**
 * Expand arguments into .jack files: directories contribute their .jack
 * entries in name order, files must carry the .jack extension.
 */
export async function collectSources(paths: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const entry of paths) {
    const stat = await fs.stat(entry);
    if (stat.isDirectory()) {
      const names = (await fs.readdir(entry))
        .filter((name) => name.endsWith('.jack'))
        .sort();
      files.push(...names.map((name) => path.join(entry, name)));
    } else if (entry.endsWith('.jack')) {
      files.push(entry);
    } else {
      usageError(`Not a .jack file: ${entry}`);
    }
  }
  return files;
}

/** Output paths for one source file */
export function outputPaths(
  file: string,
  config: AnalyzerConfig
): { tree: string; tokens: string } {
  const base = path.basename(file, '.jack');
  const dir = config.outDir ?? path.dirname(file);
  return {
    tree: path.join(dir, `${base}.xml`),
    tokens: path.join(dir, `${base}T.xml`),
  };
}

/**
 * Reject two different sources that map to the same output file, as
 * same-named files from several directories do under an output directory.
 *
 * @throws JackError (JACK-C002) naming both sources
 */
export function checkOutputCollisions(
  files: readonly string[],
  config: AnalyzerConfig
): void {
  const writers = new Map<string, string>();
  for (const file of files) {
    const { tree } = outputPaths(file, config);
    const other = writers.get(tree);
    if (other !== undefined && other !== file) {
      usageError(`${other} and ${file} both write ${tree}`);
    }
    writers.set(tree, file);
  }
}

function traceCallbacks(io: CliIO): EngineCallbacks {
  return {
    onRuleEnd: (event) => {
      if (event.outcome !== 'notApplicable') {
        io.error(`  ${event.rule} @${event.index}: ${event.outcome}`);
      }
    },
    onBacktrack: (event) => {
      io.error(
        `  backtrack ${event.from} -> ${event.to} (expected ${event.failure.expected})`
      );
    },
  };
}

/**
 * Analyze every file named by `args`, writing markup files.
 *
 * @returns Exit code: 0 when every file parsed, 1 otherwise
 */
export async function runAnalyzer(
  args: Extract<ParsedArgs, { mode: 'analyze' }>,
  options: { cwd?: string; io?: CliIO } = {}
): Promise<number> {
  const io = options.io ?? consoleIO;
  const cwd = options.cwd ?? process.cwd();
  const fromFile =
    loadConfig(
      cwd,
      args.configPath ? path.resolve(cwd, args.configPath) : undefined
    ) ?? {};
  const config = resolveConfig(fromFile, args.overrides);
  const resolved: AnalyzerConfig = config.outDir
    ? { ...config, outDir: path.resolve(cwd, config.outDir) }
    : config;

  const files = await collectSources(
    args.paths.map((entry) => path.resolve(cwd, entry))
  );
  checkOutputCollisions(files, resolved);
  if (resolved.outDir) {
    await fs.mkdir(resolved.outDir, { recursive: true });
  }

  let failures = 0;
  for (const file of files) {
    const display = path.relative(cwd, file) || file;
    if (args.verbose) io.error(`Analyzing ${display}`);

    try {
      const source = await fs.readFile(file, 'utf-8');
      const result = analyze(source, {
        format: resolved.format,
        callbacks: args.verbose ? traceCallbacks(io) : undefined,
      });
      const out = outputPaths(file, resolved);
      await fs.writeFile(out.tree, result.xml, 'utf-8');
      if (resolved.emitTokens) {
        await fs.writeFile(out.tokens, result.tokensXml, 'utf-8');
      }
      io.log(`${display} -> ${path.relative(cwd, out.tree) || out.tree}`);
    } catch (err) {
      failures++;
      io.error(formatError(err, display));
    }
  }

  return failures === 0 ? 0 : 1;
}
