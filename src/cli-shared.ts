/**
 * CLI Shared Utilities
 * Error formatting and usage text for the command-line front end
 */

import { JackError, LexerError, ParseError } from './error-classes.js';
import { formatLocation } from './source-location.js';

export const VERSION = '0.1.0';

export const USAGE = `Usage: jack-analyzer <file.jack | directory>... [options]

Options:
  --out-dir <dir>      Write output files to <dir> instead of beside sources
  --format <layout>    Markup layout: pretty (default) or compact
  --tokens             Also write NameT.xml token files
  --config <file>      Read options from <file> instead of ./jack-analyzer.yaml
  --verbose            Trace productions and backtracking on stderr
  -h, --help           Show this help
  -v, --version        Show version`;

/**
 * Format error for stderr output, prefixed with the file and position
 * when known: `Main.jack:3:5: Parse error [JACK-P004]: Expected ...`
 */
export function formatError(err: unknown, file?: string): string {
  if (!(err instanceof Error)) {
    return String(err);
  }

  if (err instanceof JackError) {
    const { errorId, message, location } = err.toData();
    const label =
      err instanceof LexerError
        ? 'Lexer error'
        : err instanceof ParseError
          ? 'Parse error'
          : 'Error';
    const where = [file, location ? formatLocation(location) : undefined]
      .filter((part): part is string => part !== undefined)
      .join(':');
    const prefix = where ? `${where}: ` : '';
    return `${prefix}${label} [${errorId}]: ${message}`;
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return file ? `${file}: ${err.message}` : err.message;
}
