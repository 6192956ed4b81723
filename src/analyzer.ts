/**
 * Analyzer
 * Source text to tokens, parse tree and markup in one call
 */

import { JackTokenizer } from './lexer/token-source.js';
import { tokenize } from './lexer/tokenizer.js';
import { CompilationEngine } from './parser/engine.js';
import type { EngineCallbacks } from './parser/state.js';
import type { Token } from './token-types.js';
import type { ParseNode, TreeEvent } from './tree/parse-tree.js';
import {
  formatTokensXml,
  type MarkupFormat,
} from './tree/serialize.js';

export interface AnalyzeOptions {
  /** Markup layout for `xml` and `tokensXml` (default: compact) */
  format?: MarkupFormat | undefined;
  callbacks?: EngineCallbacks | undefined;
}

export interface AnalysisResult {
  readonly tokens: readonly Token[];
  readonly events: readonly TreeEvent[];
  readonly tree: ParseNode;
  /** Parse tree markup */
  readonly xml: string;
  /** Token list markup */
  readonly tokensXml: string;
}

/**
 * Parse one class from a token list.
 * @throws ParseError when the tokens do not form a class
 */
export function analyzeTokens(
  tokens: readonly Token[],
  options: AnalyzeOptions = {}
): AnalysisResult {
  const format = options.format ?? 'compact';
  const engine = new CompilationEngine(new JackTokenizer(tokens), {
    callbacks: options.callbacks,
  });
  engine.compileClass();

  return {
    tokens,
    events: engine.events(),
    tree: engine.tree(),
    xml: engine.xml(format),
    tokensXml: formatTokensXml(tokens, format),
  };
}

/**
 * Tokenize and parse one Jack source file.
 * @throws LexerError for invalid characters or literals
 * @throws ParseError when the source is not a single valid class
 */
export function analyze(
  source: string,
  options: AnalyzeOptions = {}
): AnalysisResult {
  return analyzeTokens(tokenize(source), options);
}
