import type { PatternNode } from '../pattern/types.js';
import { parsePattern } from '../pattern/parser.js';
import type { CompilerOptions } from '../types/index.js';
import { elementCompiler, headCompiler, nodeCompiler } from './handlers.js';
import { CompilationSession, type CompilerDefinitions } from './session.js';
import {
  MatcherCallError,
  type Fragment,
  type Instrumentation,
  type MatchEnv,
} from './types.js';

/**
 * Outcome of running a compiled pattern
 */
export type MatchResult =
  | { matched: true; captures: unknown[] }
  | { matched: false };

/**
 * A compiled pattern: a matcher with a declared set of named parameters
 */
export class CompiledPattern {
  /** Pattern source, empty when compiled from a tree */
  readonly source: string;
  readonly pattern: PatternNode;
  /** Named parameters every call must provide, and no others */
  readonly parameters: readonly string[];
  private readonly root: Fragment;
  private readonly instrumentation: Instrumentation | undefined;

  constructor(
    source: string,
    pattern: PatternNode,
    parameters: readonly string[],
    root: Fragment,
    instrumentation?: Instrumentation
  ) {
    this.source = source;
    this.pattern = pattern;
    this.parameters = parameters;
    this.root = root;
    this.instrumentation = instrumentation;
  }

  /**
   * The matcher's code, as an expression over `node`
   */
  get code(): string {
    return this.root.describe('node');
  }

  /**
   * Run the matcher, returning captures on success.
   *
   * @throws MatcherCallError if `params` is not exactly the declared set
   */
  exec(subject: unknown, params: Readonly<Record<string, unknown>> = {}): MatchResult {
    this.checkCall(params);

    const env: MatchEnv = { params, captures: [] };
    if (!this.root.match(subject, env)) {
      return { matched: false };
    }
    return { matched: true, captures: env.captures };
  }

  /**
   * Run the matcher and report only whether it matched
   */
  match(subject: unknown, params: Readonly<Record<string, unknown>> = {}): boolean {
    return this.exec(subject, params).matched;
  }

  private checkCall(params: Readonly<Record<string, unknown>>): void {
    const given = Object.keys(params);
    const missing = this.parameters.filter((name) => !given.includes(name));
    const unexpected = given.filter((name) => !this.parameters.includes(name));

    if (missing.length > 0 || unexpected.length > 0) {
      const problems = [
        missing.length > 0 ? `missing ${missing.join(', ')}` : '',
        unexpected.length > 0 ? `unexpected ${unexpected.join(', ')}` : '',
      ].filter(Boolean);
      throw new MatcherCallError(
        `Matcher expects parameters [${this.parameters.join(', ')}]: ${problems.join('; ')}`,
        missing,
        unexpected
      );
    }

    this.instrumentation?.checkCall(params);
  }
}

/**
 * Compiles pattern trees into matchers in a single top-down pass.
 *
 * Instrumentation is injected per compilation, so one compiler can
 * produce both plain and instrumented matchers.
 */
export class Compiler {
  private readonly options: CompilerOptions;
  private readonly definitions: CompilerDefinitions;

  constructor(options: CompilerOptions = {}) {
    this.options = options;
    this.definitions = {
      node: options.definitions?.node ?? nodeCompiler,
      head: options.definitions?.head ?? headCompiler,
      element: options.definitions?.element ?? elementCompiler,
    };
  }

  /**
   * Compile a pattern, given as source or as an already parsed tree.
   *
   * @throws ParseError if the pattern source is invalid
   * @throws PatternCompileError if the tree uses an unsupported construct
   */
  compile(pattern: string | PatternNode, instrumentation?: Instrumentation): CompiledPattern {
    const source = typeof pattern === 'string' ? pattern : '';
    const tree = typeof pattern === 'string' ? parsePattern(pattern) : pattern;

    const session = new CompilationSession({
      source,
      definitions: this.definitions,
      predicates: this.options.predicates ?? {},
      instrumentation,
      debug: this.options.debug ?? false,
    });

    const root = session.compile(tree);
    session.log(`compiled with parameters [${session.parameters.join(', ')}]`);

    return new CompiledPattern(source, tree, session.parameters, root, instrumentation);
  }
}

/**
 * Compile a pattern with default options.
 *
 * @example
 * ```ts
 * const matcher = compile('(send nil? $_)');
 * const { ast } = readSource('(send nil :foo)');
 * matcher.exec(ast); // { matched: true, captures: [Symbol.for('foo')] }
 * ```
 */
export function compile(pattern: string | PatternNode, options?: CompilerOptions): CompiledPattern {
  return new Compiler(options).compile(pattern);
}
