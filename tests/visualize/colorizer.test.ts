import { describe, it, expect } from 'vitest';
import { Colorizer, COLORS, classify } from '../../src/visualize/colorizer';
import { AstNode } from '../../src/ast/node';
import { readSource } from '../../src/ast/reader';

function runs(colorizer: Colorizer, source: string) {
  return colorizer
    .test(source)
    .segments()
    .map(({ begin, end, classification }) => [begin, end, classification]);
}

describe('classify', () => {
  it('should map match status to a classification', () => {
    expect(classify(undefined)).toBe('not_visited');
    expect(classify(false)).toBe('not_matched');
    expect(classify(true)).toBe('matched');
  });

  it('should pair every classification with a color', () => {
    expect(COLORS).toEqual({
      not_visitable: 'lightseagreen',
      not_visited: 'yellow',
      not_matched: 'red',
      matched: 'green',
    });
  });
});

describe('Colorizer', () => {
  describe('whole-node results', () => {
    it('should color a matching node green throughout', () => {
      const result = new Colorizer('(send nil? :foo)').test('(send nil :foo)');

      expect(result.matched).toBe(true);
      expect(result.attributes()).toEqual(Array.from({ length: 15 }, () => 'matched'));
      expect(result.segments()).toEqual([
        { begin: 0, end: 15, text: '(send nil :foo)', classification: 'matched', color: 'green' },
      ]);
    });

    it('should color a failing node red throughout', () => {
      const result = new Colorizer('(send nil? :foo)').test('(send nil :bar)');

      expect(result.matched).toBe(false);
      expect(result.attributes()).toEqual(Array.from({ length: 15 }, () => 'not_matched'));
    });

    it('should leave characters outside every node not visitable', () => {
      const result = new Colorizer('(send nil? :foo)').test('  (send nil :foo)\n');

      expect(result.render((text, color) => `<${color}>${text}</${color}>`)).toBe(
        '<lightseagreen>  </lightseagreen><green>(send nil :foo)</green><lightseagreen>\n</lightseagreen>'
      );
    });
  });

  describe('nested nodes', () => {
    it('should let inner nodes override their parent', () => {
      const colorizer = new Colorizer('(send (int _) :foo)');

      expect(runs(colorizer, '(send (int 1) :bar)')).toEqual([
        [0, 6, 'not_matched'],
        [6, 13, 'matched'],
        [13, 19, 'not_matched'],
      ]);
    });

    it('should mark children the run never reached as not visited', () => {
      const colorizer = new Colorizer('(send (int 1) :+ (int 2))');

      expect(runs(colorizer, '(send (int 5) :+ (int 2))')).toEqual([
        [0, 17, 'not_matched'],
        [17, 24, 'not_visited'],
        [24, 25, 'not_matched'],
      ]);
    });

    it('should mark children absorbed by rest as not visitable', () => {
      const colorizer = new Colorizer('(send _ ...)');

      expect(runs(colorizer, '(send (int 1) (int 2))')).toEqual([
        [0, 14, 'matched'],
        [14, 21, 'not_visitable'],
        [21, 22, 'matched'],
      ]);
    });

    it('should mark children a node type does not look into as not visitable', () => {
      const colorizer = new Colorizer('send');

      expect(runs(colorizer, '(send (int 1))')).toEqual([
        [0, 6, 'matched'],
        [6, 13, 'not_visitable'],
        [13, 14, 'matched'],
      ]);
    });

    it('should attribute a captured child to the capture', () => {
      const colorizer = new Colorizer('(send $(int _) :x)');
      const result = colorizer.test('(send (int 1) :x)');
      const [child] = [...result.ast.eachDescendant()];

      expect(result.governorOf(child)).toBe(2);
      expect(result.attributes()).toEqual(Array.from({ length: 17 }, () => 'matched'));
    });
  });

  describe('trees', () => {
    it('should skip nodes without a source range', () => {
      const source = '(send (int 1) (int 2))';
      const left = new AstNode('int', [1], { begin: 6, end: 13 });
      const right = new AstNode('int', [2], { begin: 14, end: 21 });
      const ast = new AstNode('send', [left, right]);
      const result = new Colorizer('(send (int _) (int 3))').test({ source, ast });

      expect(result.matchMap()).toEqual(
        new Map([
          [ast, 'not_matched'],
          [left, 'matched'],
          [right, 'not_matched'],
        ])
      );
      expect(result.segments().map(({ begin, end, classification }) => [begin, end, classification])).toEqual([
        [0, 6, 'not_visitable'],
        [6, 13, 'matched'],
        [13, 14, 'not_visitable'],
        [14, 21, 'not_matched'],
        [21, 22, 'not_visitable'],
      ]);
    });

    it('should give each UTF-16 code unit of the source its own attribute', () => {
      const result = new Colorizer('(str _)').test('(str "\u{1F600}")');

      expect(result.source).toHaveLength(10);
      expect(result.attributes()).toEqual(Array.from({ length: 10 }, () => 'matched'));
      expect(result.segments()).toEqual([
        { begin: 0, end: 10, text: '(str "\u{1F600}")', classification: 'matched', color: 'green' },
      ]);
    });

    it('should accept an already read source', () => {
      const parsed = readSource('(send nil :foo)');
      const result = new Colorizer('(send nil? :foo)').test(parsed);

      expect(result.ast).toBe(parsed.ast);
      expect(result.source).toBe('(send nil :foo)');
    });
  });

  describe('pattern lookup', () => {
    it('should find the pattern node governing an analyzed node', () => {
      const colorizer = new Colorizer('(send (int 1) :+ (int 2))');
      const result = colorizer.test('(send (int 5) :+ (int 2))');
      const [left, right] = [...result.ast.eachDescendant()];
      const pattern = colorizer.pattern.matcher.pattern;

      expect(result.patternFor(result.ast)).toBe(pattern);
      expect(result.patternFor(left)).toBe(pattern.children[1]);
      expect(result.patternFor(right)).toBe(pattern.children[3]);
    });

    it('should find nothing for a node no pattern position governs', () => {
      const result = new Colorizer('send').test('(send (int 1))');
      const [child] = [...result.ast.eachDescendant()];

      expect(result.governorOf(child)).toBeUndefined();
      expect(result.patternFor(child)).toBeUndefined();
    });
  });

  describe('options', () => {
    it('should pass named parameters to every run', () => {
      const colorizer = new Colorizer('(send nil? %method)', { params: { method: Symbol.for('foo') } });

      expect(colorizer.test('(send nil :foo)').matched).toBe(true);
      expect(colorizer.test('(send nil :bar)').matched).toBe(false);
    });

    it('should use custom predicates', () => {
      const colorizer = new Colorizer('(int odd?)', {
        predicates: { 'odd?': (value) => typeof value === 'number' && value % 2 === 1 },
      });

      expect(colorizer.test('(int 3)').matched).toBe(true);
    });
  });
});
