/**
 * Parse Tree
 * Append-only tag events and the node tree rebuilt from them
 */

import type { TokenType } from '../token-types.js';

// ============================================================
// EVENTS
// ============================================================

export type TreeEvent =
  | { readonly type: 'open'; readonly name: string }
  | { readonly type: 'close'; readonly name: string }
  | {
      readonly type: 'leaf';
      readonly tokenType: TokenType;
      readonly text: string;
    };

/**
 * Collects tree events during a parse. Events are only appended, except
 * that backtracking truncates back to a previously observed length.
 */
export class ParseTreeBuilder {
  private readonly list: TreeEvent[] = [];

  get length(): number {
    return this.list.length;
  }

  open(name: string): void {
    this.list.push({ type: 'open', name });
  }

  close(name: string): void {
    this.list.push({ type: 'close', name });
  }

  leaf(tokenType: TokenType, text: string): void {
    this.list.push({ type: 'leaf', tokenType, text });
  }

  truncate(length: number): void {
    if (length < 0 || length > this.list.length) {
      throw new RangeError(
        `Cannot truncate ${this.list.length} events to ${length}`
      );
    }
    this.list.length = length;
  }

  events(): readonly TreeEvent[] {
    return [...this.list];
  }
}

// ============================================================
// NODES
// ============================================================

export interface RuleNode {
  readonly kind: 'rule';
  readonly name: string;
  readonly children: readonly ParseNode[];
}

export interface TerminalNode {
  readonly kind: 'terminal';
  readonly type: TokenType;
  readonly text: string;
}

export type ParseNode = RuleNode | TerminalNode;

interface OpenRule {
  readonly name: string;
  readonly children: ParseNode[];
}

/**
 * Rebuild nodes from a well-nested event sequence.
 * Returns the top-level nodes (one per entry production).
 *
 * @throws Error when the events are not well nested
 */
export function buildTree(events: readonly TreeEvent[]): ParseNode[] {
  const roots: ParseNode[] = [];
  const stack: OpenRule[] = [];

  const append = (node: ParseNode): void => {
    const parent = stack[stack.length - 1];
    if (parent) parent.children.push(node);
    else roots.push(node);
  };

  for (const event of events) {
    switch (event.type) {
      case 'open':
        stack.push({ name: event.name, children: [] });
        break;
      case 'close': {
        const top = stack.pop();
        if (!top || top.name !== event.name) {
          throw new Error(
            `Unbalanced parse tree: </${event.name}> closes <${top?.name ?? ''}>`
          );
        }
        append({ kind: 'rule', name: top.name, children: top.children });
        break;
      }
      case 'leaf':
        append({ kind: 'terminal', type: event.tokenType, text: event.text });
        break;
    }
  }

  const unclosed = stack[stack.length - 1];
  if (unclosed) {
    throw new Error(`Unbalanced parse tree: <${unclosed.name}> is not closed`);
  }

  return roots;
}

/** Leaf texts in document order */
export function terminalTexts(nodes: readonly ParseNode[]): string[] {
  const texts: string[] = [];
  const visit = (node: ParseNode): void => {
    if (node.kind === 'terminal') {
      texts.push(node.text);
      return;
    }
    node.children.forEach(visit);
  };
  nodes.forEach(visit);
  return texts;
}
