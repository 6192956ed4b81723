/**
 * Expression, term and expression list productions
 */

import { describe, expect, it } from 'vitest';
import type { ParseNode } from '../../src/index.js';
import { engineFor } from '../helpers/tokens.js';

function childLabels(node: ParseNode): string[] {
  if (node.kind === 'terminal') return [];
  return node.children.map((child) =>
    child.kind === 'rule' ? child.name : child.text
  );
}

describe('compileTerm', () => {
  it('parses constants', () => {
    const cases: Array<[string, string]> = [
      ['7 ;', '<term><integerConstant>7</integerConstant></term>'],
      ['"hi there" ;', '<term><stringConstant>hi there</stringConstant></term>'],
      ['true ;', '<term><keyword>true</keyword></term>'],
      ['this ;', '<term><keyword>this</keyword></term>'],
    ];
    for (const [source, xml] of cases) {
      const engine = engineFor(source);
      engine.compileTerm();
      expect(engine.xml()).toBe(xml);
    }
  });

  it('parses a variable name without suffix', () => {
    const engine = engineFor('count ;');
    engine.compileTerm();
    expect(engine.xml()).toBe('<term><identifier>count</identifier></term>');
  });

  it('parses a qualified subroutine call', () => {
    const engine = engineFor('a.b()');
    engine.compileTerm();
    expect(engine.xml()).toBe(
      '<term><identifier>a</identifier><symbol>.</symbol>' +
        '<identifier>b</identifier><symbol>(</symbol>' +
        '<expressionList></expressionList><symbol>)</symbol></term>'
    );
  });

  it('parses an unqualified call with arguments', () => {
    const engine = engineFor('max(1, 2)');
    engine.compileTerm();
    expect(engine.xml()).toBe(
      '<term><identifier>max</identifier><symbol>(</symbol>' +
        '<expressionList>' +
        '<expression><term><integerConstant>1</integerConstant></term></expression>' +
        '<symbol>,</symbol>' +
        '<expression><term><integerConstant>2</integerConstant></term></expression>' +
        '</expressionList><symbol>)</symbol></term>'
    );
  });

  it('nests unary operators', () => {
    const engine = engineFor('-x ;');
    engine.compileTerm();
    expect(engine.xml()).toBe(
      '<term><symbol>-</symbol><term><identifier>x</identifier></term></term>'
    );
  });

  it('escapes markup characters in string constants', () => {
    const engine = engineFor('"a<b & c" ;');
    engine.compileTerm();
    expect(engine.xml()).toBe(
      '<term><stringConstant>a&lt;b &amp; c</stringConstant></term>'
    );
  });

  it('reads the identifier once when trying suffixes', () => {
    const engine = engineFor('a.b()');
    engine.compileTerm();
    expect(engine.tokensRead()).toBe(5);
  });

  it('reports a token that cannot start a term', () => {
    const engine = engineFor(') ;');
    expect(() => engine.compileTerm()).toThrow(
      "Expected term, found symbol ')' at 1:1"
    );
  });
});

describe('compileExpression', () => {
  it('indexes arrays and applies binary operators', () => {
    const engine = engineFor('a[i] - b ;');
    engine.compileExpression();
    expect(engine.xml()).toBe(
      '<expression><term><identifier>a</identifier><symbol>[</symbol>' +
        '<expression><term><identifier>i</identifier></term></expression>' +
        '<symbol>]</symbol></term><symbol>-</symbol>' +
        '<term><identifier>b</identifier></term></expression>'
    );
  });

  it('groups parenthesized subexpressions', () => {
    const engine = engineFor('(a + 1) * 2 ;');
    engine.compileExpression();
    expect(engine.xml()).toBe(
      '<expression><term><symbol>(</symbol><expression>' +
        '<term><identifier>a</identifier></term><symbol>+</symbol>' +
        '<term><integerConstant>1</integerConstant></term>' +
        '</expression><symbol>)</symbol></term><symbol>*</symbol>' +
        '<term><integerConstant>2</integerConstant></term></expression>'
    );
  });

  it('keeps operators flat and in source order', () => {
    const engine = engineFor('1 + 2 * 3 ;');
    engine.compileExpression();
    expect(childLabels(engine.tree())).toEqual([
      'term',
      '+',
      'term',
      '*',
      'term',
    ]);
  });

  it('accepts every binary operator', () => {
    const engine = engineFor('a + b - c * d / e & f | g < h > i = j ;');
    engine.compileExpression();
    expect(childLabels(engine.tree()).filter((label) => label !== 'term')).toEqual(
      ['+', '-', '*', '/', '&', '|', '<', '>', '=']
    );
  });

  it('rejects an operator without a right operand', () => {
    let thrown: unknown;
    try {
      engineFor('1 + ;').compileExpression();
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({
      kind: 'WrongSymbol',
      errorId: 'JACK-P004',
      message: "Expected term, found symbol ';' at 1:5",
    });
  });
});

describe('compileExpressionList', () => {
  it('separates expressions with commas', () => {
    const engine = engineFor('1, "s", null )');
    engine.compileExpressionList();
    expect(childLabels(engine.tree())).toEqual([
      'expression',
      ',',
      'expression',
      ',',
      'expression',
    ]);
  });

  it('matches an empty list', () => {
    const engine = engineFor(')');
    engine.compileExpressionList();
    expect(engine.xml()).toBe('<expressionList></expressionList>');
    expect(engine.tokensRead()).toBe(1);
  });
});
