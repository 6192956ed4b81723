/**
 * Compilation Engine
 * Drives one token source through the Jack grammar and records the tree
 */

import { createError, ParseError } from '../error-classes.js';
import type { TokenSource } from '../lexer/token-source.js';
import { describeToken } from '../token-types.js';
import {
  buildTree,
  type ParseNode,
  type TreeEvent,
} from '../tree/parse-tree.js';
import { type MarkupFormat, serializeTree } from '../tree/serialize.js';
import type { Failure } from './outcome.js';
import {
  compileClass,
  compileClassVarDec,
  compileParameterList,
  compileSubroutineBody,
  compileSubroutineDec,
  compileVarDec,
} from './parser-class.js';
import {
  compileExpression,
  compileExpressionList,
  compileTerm,
} from './parser-expr.js';
import {
  compileDo,
  compileIf,
  compileLet,
  compileReturn,
  compileStatements,
  compileWhile,
} from './parser-statements.js';
import {
  createParserState,
  type EngineCallbacks,
  lastPulledToken,
  type ParserState,
  pullToken,
} from './state.js';
import type { Step } from './combinators.js';

export interface EngineOptions {
  callbacks?: EngineCallbacks | undefined;
}

/**
 * Single-use parser bound to one token source. Call exactly one
 * `compile*` entry point; it throws `ParseError` when the input does not
 * match. The tree events recorded so far stay readable either way.
 */
export class CompilationEngine {
  private readonly state: ParserState;
  private ranRule: string | undefined;
  private succeeded = false;

  constructor(source: TokenSource, options: EngineOptions = {}) {
    this.state = createParserState(source, options.callbacks);
  }

  /** Parse a whole class; tokens after its closing brace are an error */
  compileClass(): void {
    this.run('class', compileClass);
    const trailing = pullToken(this.state);
    if (trailing) {
      this.succeeded = false;
      throw new ParseError(
        'TrailingTokens',
        { expected: 'end of input', found: describeToken(trailing) },
        trailing.span?.start
      );
    }
  }

  compileClassVarDec(): void {
    this.run('classVarDec', compileClassVarDec);
  }

  compileSubroutineDec(): void {
    this.run('subroutineDec', compileSubroutineDec);
  }

  compileParameterList(): void {
    this.run('parameterList', compileParameterList);
  }

  compileSubroutineBody(): void {
    this.run('subroutineBody', compileSubroutineBody);
  }

  compileVarDec(): void {
    this.run('varDec', compileVarDec);
  }

  compileStatements(): void {
    this.run('statements', compileStatements);
  }

  compileLet(): void {
    this.run('letStatement', compileLet);
  }

  compileIf(): void {
    this.run('ifStatement', compileIf);
  }

  compileWhile(): void {
    this.run('whileStatement', compileWhile);
  }

  compileDo(): void {
    this.run('doStatement', compileDo);
  }

  compileReturn(): void {
    this.run('returnStatement', compileReturn);
  }

  compileExpression(): void {
    this.run('expression', compileExpression);
  }

  compileTerm(): void {
    this.run('term', compileTerm);
  }

  compileExpressionList(): void {
    this.run('expressionList', compileExpressionList);
  }

  /** Recorded tree events; partial after a failed parse */
  events(): readonly TreeEvent[] {
    return this.state.tree.events();
  }

  /** Tree markup; after a failed parse, the partial (unclosed) markup */
  xml(format: MarkupFormat = 'compact'): string {
    return serializeTree(this.state.tree.events(), format);
  }

  /**
   * Root node of a successful parse.
   * @throws Error if no parse has succeeded
   */
  tree(): ParseNode {
    const root = this.succeeded
      ? buildTree(this.state.tree.events())[0]
      : undefined;
    if (!root) {
      throw new Error('No parse tree: the parse has not succeeded');
    }
    return root;
  }

  /** Tokens pulled from the source so far */
  tokensRead(): number {
    return this.state.buffer.length;
  }

  private run(rule: string, production: Step): void {
    if (this.ranRule !== undefined) {
      throw createError('JACK-P010', { rule: this.ranRule });
    }
    this.ranRule = rule;

    const outcome = production(this.state);
    if (outcome.type !== 'matched') {
      throw this.toParseError(outcome.failure);
    }
    this.succeeded = true;
  }

  /**
   * Report the failure that escaped, unless the parse got further before
   * backtracking; then the furthest failure names the real problem.
   */
  private toParseError(escaped: Failure): ParseError {
    const furthest = this.state.furthest;
    const failure =
      furthest && furthest.index > escaped.index ? furthest : escaped;

    const found = failure.found;
    const location = found
      ? found.span?.start
      : lastPulledToken(this.state)?.span?.end;

    return new ParseError(
      failure.kind,
      {
        expected: failure.expected,
        found: found ? describeToken(found) : undefined,
      },
      location
    );
  }
}
