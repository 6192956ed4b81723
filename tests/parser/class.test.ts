/**
 * Class structure productions
 */

import { describe, expect, it } from 'vitest';
import { terminalTexts, tokenize } from '../../src/index.js';
import { COUNTER_CLASS, EMPTY_CLASS } from '../helpers/programs.js';
import { engineFor } from '../helpers/tokens.js';

function ruleNames(source: string): string[] {
  const engine = engineFor(source);
  engine.compileClass();
  const root = engine.tree();
  return root.kind === 'rule'
    ? root.children.flatMap((child) => (child.kind === 'rule' ? [child.name] : []))
    : [];
}

describe('compileClass', () => {
  it('parses an empty class', () => {
    const engine = engineFor(EMPTY_CLASS);
    engine.compileClass();
    expect(engine.xml()).toBe(
      '<class><keyword>class</keyword><identifier>Foo</identifier>' +
        '<symbol>{</symbol><symbol>}</symbol></class>'
    );
  });

  it('writes pretty markup one element per line', () => {
    const engine = engineFor(EMPTY_CLASS);
    engine.compileClass();
    expect(engine.xml('pretty')).toBe(
      '<class>\n' +
        '  <keyword> class </keyword>\n' +
        '  <identifier> Foo </identifier>\n' +
        '  <symbol> { </symbol>\n' +
        '  <symbol> } </symbol>\n' +
        '</class>\n'
    );
  });

  it('parses member declarations in order', () => {
    expect(ruleNames(COUNTER_CLASS)).toEqual([
      'classVarDec',
      'classVarDec',
      'subroutineDec',
      'subroutineDec',
    ]);
  });

  it('records every token as a leaf in source order', () => {
    const engine = engineFor(COUNTER_CLASS);
    engine.compileClass();
    expect(terminalTexts([engine.tree()])).toEqual(
      tokenize(COUNTER_CLASS).map((token) => token.value)
    );
  });

  it('reports the deepest failure inside a subroutine', () => {
    let thrown: unknown;
    try {
      engineFor('class A { function void f() { x = 1; } }').compileClass();
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({
      kind: 'SymbolNotFound',
      errorId: 'JACK-P005',
      message: "Expected symbol '}', found identifier 'x' at 1:31",
    });
  });

  it('reports a missing variable name', () => {
    expect(() => engineFor('class A { static int ; }').compileClass()).toThrow(
      "Expected identifier, found symbol ';' at 1:22"
    );
  });

  it('rejects tokens after the class', () => {
    let thrown: unknown;
    try {
      engineFor('class A { } class B { }').compileClass();
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toMatchObject({
      kind: 'TrailingTokens',
      errorId: 'JACK-P009',
      message: "Unexpected keyword 'class' after end of class at 1:13",
    });
  });

  it('keeps the partial markup of an unfinished class', () => {
    const engine = engineFor('class Foo {');
    expect(() => engine.compileClass()).toThrow(
      "Unexpected end of input, expected keyword 'static' or keyword 'field' at 1:12"
    );
    expect(engine.xml()).toBe(
      '<class><keyword>class</keyword><identifier>Foo</identifier>' +
        '<symbol>{</symbol><classVarDec>'
    );
  });
});

describe('compileClassVarDec', () => {
  it('parses a single declaration', () => {
    const engine = engineFor('static int x ;');
    engine.compileClassVarDec();
    expect(engine.xml()).toBe(
      '<classVarDec><keyword>static</keyword><keyword>int</keyword>' +
        '<identifier>x</identifier><symbol>;</symbol></classVarDec>'
    );
  });

  it('parses several names', () => {
    const engine = engineFor('field Point a, b;');
    engine.compileClassVarDec();
    expect(engine.xml()).toBe(
      '<classVarDec><keyword>field</keyword><identifier>Point</identifier>' +
        '<identifier>a</identifier><symbol>,</symbol>' +
        '<identifier>b</identifier><symbol>;</symbol></classVarDec>'
    );
  });
});

describe('compileSubroutineDec', () => {
  it('tries void before a general type', () => {
    const engine = engineFor('function void main() { return; }');
    engine.compileSubroutineDec();
    expect(engine.xml()).toBe(
      '<subroutineDec><keyword>function</keyword><keyword>void</keyword>' +
        '<identifier>main</identifier><symbol>(</symbol>' +
        '<parameterList></parameterList><symbol>)</symbol>' +
        '<subroutineBody><symbol>{</symbol><statements><returnStatement>' +
        '<keyword>return</keyword><symbol>;</symbol></returnStatement>' +
        '</statements><symbol>}</symbol></subroutineBody></subroutineDec>'
    );
  });

  it('accepts a class name as return type', () => {
    const engine = engineFor('constructor Point new() { return this; }');
    engine.compileSubroutineDec();
    expect(engine.events().slice(0, 4)).toEqual([
      { type: 'open', name: 'subroutineDec' },
      { type: 'leaf', tokenType: 'keyword', text: 'constructor' },
      { type: 'leaf', tokenType: 'identifier', text: 'Point' },
      { type: 'leaf', tokenType: 'identifier', text: 'new' },
    ]);
  });
});

describe('compileParameterList', () => {
  it('parses typed parameters', () => {
    const engine = engineFor('int x, char c, Point p )');
    engine.compileParameterList();
    expect(engine.xml()).toBe(
      '<parameterList><keyword>int</keyword><identifier>x</identifier>' +
        '<symbol>,</symbol><keyword>char</keyword><identifier>c</identifier>' +
        '<symbol>,</symbol><identifier>Point</identifier>' +
        '<identifier>p</identifier></parameterList>'
    );
  });

  it('matches an empty list', () => {
    const engine = engineFor(')');
    engine.compileParameterList();
    expect(engine.xml()).toBe('<parameterList></parameterList>');
  });
});

describe('compileSubroutineBody and compileVarDec', () => {
  it('parses local declarations before statements', () => {
    const engine = engineFor('{ var int i, j; var Array a; let i = 0; }');
    engine.compileSubroutineBody();
    const root = engine.tree();
    expect(
      root.kind === 'rule' ? root.children.map((child) =>
        child.kind === 'rule' ? child.name : child.text
      ) : []
    ).toEqual(['{', 'varDec', 'varDec', 'statements', '}']);
  });

  it('parses a single varDec', () => {
    const engine = engineFor('var boolean done;');
    engine.compileVarDec();
    expect(engine.xml()).toBe(
      '<varDec><keyword>var</keyword><keyword>boolean</keyword>' +
        '<identifier>done</identifier><symbol>;</symbol></varDec>'
    );
  });
});
