/**
 * Markup serialization
 */

import { describe, expect, it } from 'vitest';
import {
  escapeText,
  formatTokensXml,
  serializeTree,
  tokenize,
  type TreeEvent,
} from '../../src/index.js';

describe('escapeText', () => {
  it('escapes markup characters', () => {
    expect(escapeText('a < b > c & "d"')).toBe(
      'a &lt; b &gt; c &amp; &quot;d&quot;'
    );
  });

  it('leaves other text alone', () => {
    expect(escapeText("it's fine")).toBe("it's fine");
  });
});

describe('serializeTree', () => {
  const events: TreeEvent[] = [
    { type: 'open', name: 'term' },
    { type: 'leaf', tokenType: 'symbol', text: '-' },
    { type: 'open', name: 'term' },
    { type: 'leaf', tokenType: 'identifier', text: 'x' },
    { type: 'close', name: 'term' },
    { type: 'close', name: 'term' },
  ];

  it('writes compact markup by default', () => {
    expect(serializeTree(events)).toBe(
      '<term><symbol>-</symbol><term><identifier>x</identifier></term></term>'
    );
  });

  it('indents nested rules in pretty markup', () => {
    expect(serializeTree(events, 'pretty')).toBe(
      '<term>\n' +
        '  <symbol> - </symbol>\n' +
        '  <term>\n' +
        '    <identifier> x </identifier>\n' +
        '  </term>\n' +
        '</term>\n'
    );
  });

  it('escapes symbol leaves', () => {
    expect(
      serializeTree([{ type: 'leaf', tokenType: 'symbol', text: '<' }])
    ).toBe('<symbol>&lt;</symbol>');
  });

  it('writes nothing for no events', () => {
    expect(serializeTree([])).toBe('');
    expect(serializeTree([], 'pretty')).toBe('');
  });
});

describe('formatTokensXml', () => {
  it('wraps compact token leaves', () => {
    expect(formatTokensXml(tokenize('let x'))).toBe(
      '<tokens><keyword>let</keyword><identifier>x</identifier></tokens>'
    );
  });

  it('writes one token per line in pretty markup', () => {
    expect(formatTokensXml(tokenize('x < 1'), 'pretty')).toBe(
      '<tokens>\n' +
        '<identifier> x </identifier>\n' +
        '<symbol> &lt; </symbol>\n' +
        '<integerConstant> 1 </integerConstant>\n' +
        '</tokens>\n'
    );
  });
});
