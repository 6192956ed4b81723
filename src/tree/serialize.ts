/**
 * Markup Serializers
 * Render tree events and token lists as tag markup
 */

import type { Token } from '../token-types.js';
import type { TreeEvent } from './parse-tree.js';

/**
 * `compact` writes tags back to back with no whitespace.
 * `pretty` writes one element per line, indenting rules by two spaces and
 * padding leaf text with single spaces (`<keyword> class </keyword>`).
 */
export type MarkupFormat = 'compact' | 'pretty';

export const MARKUP_FORMATS: readonly MarkupFormat[] = ['compact', 'pretty'];

const ESCAPES: Readonly<Record<string, string>> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
};

export function escapeText(text: string): string {
  return text.replace(/[<>&"]/g, (ch) => ESCAPES[ch] ?? ch);
}

function leafMarkup(tag: string, text: string, format: MarkupFormat): string {
  const body = escapeText(text);
  return format === 'pretty'
    ? `<${tag}> ${body} </${tag}>`
    : `<${tag}>${body}</${tag}>`;
}

export function serializeTree(
  events: readonly TreeEvent[],
  format: MarkupFormat = 'compact'
): string {
  if (format === 'compact') {
    return events
      .map((event) =>
        event.type === 'leaf'
          ? leafMarkup(event.tokenType, event.text, format)
          : event.type === 'open'
            ? `<${event.name}>`
            : `</${event.name}>`
      )
      .join('');
  }

  const lines: string[] = [];
  let depth = 0;
  for (const event of events) {
    switch (event.type) {
      case 'open':
        lines.push(`${'  '.repeat(depth)}<${event.name}>`);
        depth++;
        break;
      case 'close':
        depth--;
        lines.push(`${'  '.repeat(depth)}</${event.name}>`);
        break;
      case 'leaf':
        lines.push(
          `${'  '.repeat(depth)}${leafMarkup(event.tokenType, event.text, format)}`
        );
        break;
    }
  }
  return lines.map((line) => `${line}\n`).join('');
}

/** Render a token list wrapped in `<tokens>` */
export function formatTokensXml(
  tokens: readonly Token[],
  format: MarkupFormat = 'compact'
): string {
  const leaves = tokens.map((token) =>
    leafMarkup(token.type, token.value, format)
  );
  if (format === 'compact') {
    return `<tokens>${leaves.join('')}</tokens>`;
  }
  return ['<tokens>', ...leaves, '</tokens>'].map((line) => `${line}\n`).join('');
}
