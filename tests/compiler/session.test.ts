import { describe, it, expect, vi, afterEach } from 'vitest';
import { CompilationSession } from '../../src/compiler/session';
import { defineCompiler } from '../../src/compiler/registry';
import { nodeCompiler, headCompiler, elementCompiler } from '../../src/compiler/handlers';
import { Compiler } from '../../src/compiler/compiler';
import { PatternCompileError, type Fragment } from '../../src/compiler/types';
import { parsePattern } from '../../src/pattern/parser';
import type { PatternNode } from '../../src/pattern/types';
import { TraceInstrumentation } from '../../src/trace/instrumentation';

const always: Fragment = {
  describe: () => 'true',
  variadic: false,
  match: () => true,
};

function sessionFor(definition = nodeCompiler): CompilationSession {
  return new CompilationSession({
    source: '',
    definitions: { node: definition, head: definition, element: definition },
    predicates: {},
    debug: false,
  });
}

describe('CompilationSession', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should have no current node outside a compile', () => {
    const session = sessionFor();
    expect(session.current).toBeUndefined();
    expect(session.definition).toBe(nodeCompiler);
  });

  it('should point at the node being compiled while its handler runs', () => {
    const seen: (PatternNode | undefined)[] = [];
    const definition = defineCompiler('probe', (registry) => {
      registry
        .define('node_pattern', (node, session) => {
          seen.push(session.current);
          for (const child of node.children) session.compile(child);
          seen.push(session.current);
          return always;
        })
        .define('wildcard', (_node, session) => {
          seen.push(session.current);
          return always;
        });
    });
    const tree = parsePattern('(_ _)');

    sessionFor(definition).compile(tree);

    expect(seen).toEqual([tree, tree.children[0], tree.children[1], tree]);
    expect(seen[1]).toBe(tree.children[0]);
  });

  it('should restore the current node when a nested compile throws', () => {
    let afterFailure: PatternNode | undefined;
    const definition = defineCompiler('failing', (registry) => {
      registry
        .define('node_pattern', (node, session) => {
          try {
            session.compile(node.children[0]);
          } catch (error) {
            afterFailure = session.current;
            throw error;
          }
          return always;
        })
        .define('symbol', (node) => {
          throw new Error(`cannot compile :${node.value}`);
        });
    });
    const session = sessionFor(definition);
    const tree = parsePattern('(:boom)');

    expect(() => session.compile(tree)).toThrow('cannot compile :boom');
    expect(afterFailure).toBe(tree);
    expect(session.current).toBeUndefined();
  });

  it('should stay usable after a failed compile', () => {
    const session = sessionFor();

    expect(() => session.compile(parsePattern('(send ...)'))).toThrow(PatternCompileError);
    expect(session.current).toBeUndefined();
    expect(session.compile(parsePattern('_')).match(null, { params: {}, captures: [] })).toBe(true);
  });

  it('should collect declared parameters once, in order', () => {
    const session = sessionFor();
    session.compile(parsePattern('(send %receiver %method %receiver)'));

    expect(session.parameters).toEqual(['receiver', 'method']);
  });

  it('should dispatch elements through the element definition', () => {
    const session = new CompilationSession({
      source: '',
      definitions: { node: nodeCompiler, head: headCompiler, element: elementCompiler },
      predicates: {},
      debug: false,
    });
    const fragment = session.compile(parsePattern('(send ...)'));

    expect(fragment.variadic).toBe(false);
  });

  it('should log each dispatch when debug is enabled', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Compiler({ debug: true }).compile('(send _)');

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '[tree-pattern] node: node_pattern at 0',
      '[tree-pattern]   head: node_type at 1',
      '[tree-pattern]   element: wildcard at 6',
      '[tree-pattern] compiled with parameters []',
    ]);
  });

  it('should not log by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Compiler().compile('(send _)');

    expect(log).not.toHaveBeenCalled();
  });

  it('should reserve instrumentation parameters', () => {
    const compile = () =>
      new Compiler().compile('(send nil? %trace)', new TraceInstrumentation());

    expect(compile).toThrow(PatternCompileError);
    expect(compile).toThrow('Parameter "%trace" is reserved at position 11: "(send nil? %trace)"');
  });
});
