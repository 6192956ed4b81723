#!/usr/bin/env node
/**
 * jack-analyzer - write parse-tree markup for Jack source files
 *
 * Usage:
 *   jack-analyzer Main.jack
 *   jack-analyzer src/ --out-dir build --tokens
 */

import { formatError, USAGE, VERSION } from './cli-shared.js';
import { parseArgs, runAnalyzer } from './cli-exec.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.mode) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(VERSION);
      return 0;
    case 'analyze':
      return runAnalyzer(args);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(formatError(err));
    process.exitCode = 1;
  }
);
