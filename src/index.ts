/**
 * jack-analyzer
 * Exports the tokenizer, grammar engine, parse tree and error taxonomy
 */

export { JackTokenizer, nextToken, tokenize, type TokenSource } from './lexer/index.js';
export {
  CompilationEngine,
  type BacktrackEvent,
  type EngineCallbacks,
  type EngineOptions,
  type Failure,
  type Outcome,
  type RuleEndEvent,
  type RuleStartEvent,
} from './parser/index.js';
export {
  analyze,
  analyzeTokens,
  type AnalysisResult,
  type AnalyzeOptions,
} from './analyzer.js';
export {
  buildTree,
  ParseTreeBuilder,
  terminalTexts,
  type ParseNode,
  type RuleNode,
  type TerminalNode,
  type TreeEvent,
} from './tree/parse-tree.js';
export {
  escapeText,
  formatTokensXml,
  MARKUP_FORMATS,
  serializeTree,
  type MarkupFormat,
} from './tree/serialize.js';
export {
  type AnalyzerConfig,
  type ConfigFile,
  CONFIG_FILE_NAME,
  loadConfig,
  resolveConfig,
  validateConfig,
} from './config.js';

// ============================================================
// TOKENS
// ============================================================
export {
  describeToken,
  isJackSymbol,
  isKeyword,
  type JackSymbol,
  type Keyword,
  KEYWORDS,
  MAX_INT_CONST,
  SYMBOLS,
  type SourceToken,
  type Token,
  TOKEN_TYPES,
  type TokenType,
} from './token-types.js';
export type { SourceLocation, SourceSpan } from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  createError,
  FAILURE_KINDS,
  type FailureKind,
  JackError,
  type JackErrorData,
  LexerError,
  PARSE_ERROR_IDS,
  ParseError,
} from './error-classes.js';
export {
  type ErrorCategory,
  type ErrorDefinition,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';
