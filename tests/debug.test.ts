import { describe, it, expect } from 'vitest';
import { tokenize, parse, compileCode, testPattern } from '../src/debug';
import { TokenType } from '../src/pattern/types';
import { parsePattern } from '../src/pattern/parser';

describe('debug entry points', () => {
  it('should list the tokens of a pattern', () => {
    expect(tokenize('(send _)').map((token) => token.type)).toEqual([
      TokenType.LPAREN,
      TokenType.IDENT,
      TokenType.WILDCARD,
      TokenType.RPAREN,
      TokenType.EOF,
    ]);
  });

  it('should return the parsed tree', () => {
    expect(parse('(send $_ ...)')).toEqual(parsePattern('(send $_ ...)'));
  });

  it('should show the plain matcher code', () => {
    expect(compileCode('_')).toBe('true');
    expect(compileCode('(int %value)')).toBe(
      'node instanceof AstNode && node.type === "int" && ' +
        'node.children.length === 1 && node.children[0] === params.value'
    );
  });

  it('should show the instrumented matcher code', () => {
    expect(compileCode('_', { traced: true })).toBe(
      '(trace.enter(0) && trace.visit(node, 0) && true && trace.success(0))'
    );
  });

  it('should classify the source a pattern runs against', () => {
    const result = testPattern('(send nil? :foo)', '(send nil :bar)');

    expect(result.matched).toBe(false);
    expect(result.segments()).toEqual([
      { begin: 0, end: 15, text: '(send nil :bar)', classification: 'not_matched', color: 'red' },
    ]);
  });
});
