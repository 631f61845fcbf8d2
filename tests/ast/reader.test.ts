import { describe, it, expect } from 'vitest';
import { readSource } from '../../src/ast/reader';
import { AstNode, s } from '../../src/ast/node';
import { ParseError } from '../../src/pattern/types';

describe('readSource', () => {
  it('should read a node with plain values', () => {
    const { source, ast } = readSource('(send nil :foo)');

    expect(source).toBe('(send nil :foo)');
    expect(ast).toBeInstanceOf(AstNode);
    expect(ast.type).toBe('send');
    expect(ast.children).toEqual([null, Symbol.for('foo')]);
    expect(ast.loc).toEqual({ begin: 0, end: 15 });
  });

  it('should give nested nodes ranges covering their parentheses', () => {
    const { ast } = readSource('(send (int 1) :+ (int 2))');
    const [left, operator, right] = ast.children;

    expect(ast.loc).toEqual({ begin: 0, end: 25 });
    expect(left).toBeInstanceOf(AstNode);
    expect(left).toMatchObject({ type: 'int', children: [1], loc: { begin: 6, end: 13 } });
    expect(operator).toBe(Symbol.for('+'));
    expect(right).toMatchObject({ type: 'int', children: [2], loc: { begin: 17, end: 24 } });
  });

  it('should read strings, booleans and floats', () => {
    const { ast } = readSource('(args "x" true false -0.5)');
    expect(ast.children).toEqual(['x', true, false, -0.5]);
  });

  it('should accept keyword node types', () => {
    const { ast } = readSource('(begin (nil) (true))');
    expect([...ast.eachDescendant()].map((node) => node.type)).toEqual(['nil', 'true']);
  });

  it('should ignore surrounding whitespace', () => {
    const { ast } = readSource('  (int)\n');
    expect(ast.loc).toEqual({ begin: 2, end: 7 });
  });

  describe('errors', () => {
    it('should require a node at the top', () => {
      expect(() => readSource('nil')).toThrow('Expected a node at position 0');
    });

    it('should require a node type', () => {
      expect(() => readSource('(1)')).toThrow('Expected node type at position 1');
    });

    it('should reject pattern-only syntax', () => {
      expect(() => readSource('(send _)')).toThrow('Unexpected token "_" at position 6');
    });

    it('should reject an unterminated node', () => {
      expect(() => readSource('(send (int 1)')).toThrow(ParseError);
      expect(() => readSource('(send (int 1)')).toThrow('Unterminated node at position 0');
    });

    it('should reject trailing input', () => {
      expect(() => readSource('(a) (b)')).toThrow('Unexpected token "(" at position 4');
    });
  });
});

describe('AstNode', () => {
  it('should enumerate itself then descendants depth-first', () => {
    const { ast } = readSource('(send (send (lvar :a) :b) :c (int 1))');
    const types = [...ast.eachNode()].map((node) => node.type);

    expect(types).toEqual(['send', 'send', 'lvar', 'int']);
  });

  it('should print back in reader syntax', () => {
    expect(s('send', null, Symbol.for('foo'), 'bar', 1).toString()).toBe(
      '(send nil :foo "bar" 1)'
    );
  });

  it('should build nodes without ranges', () => {
    expect(s('int', 1).loc).toBeUndefined();
  });
});
