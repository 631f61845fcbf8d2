import type { PatternNode } from '../pattern/types.js';
import type { CompilationSession } from './session.js';

/**
 * State shared by all fragments during one matcher call
 */
export interface MatchEnv {
  /** Named parameters the matcher was called with */
  readonly params: Readonly<Record<string, unknown>>;
  /** Captured values, in pattern order */
  readonly captures: unknown[];
}

/**
 * The compiled form of one pattern node: an executable test plus
 * a code description of what it checks.
 */
export interface Fragment {
  /**
   * Render the check as an expression over `subject`,
   * itself an expression naming the value under test
   */
  describe(subject: string): string;
  /**
   * Variadic fragments match a run of sibling values
   * (the subject is then an array) instead of a single value
   */
  readonly variadic: boolean;
  match(subject: unknown, env: MatchEnv): boolean;
}

/**
 * Compiler logic for one pattern node type tag
 */
export type Handler<N extends PatternNode = PatternNode> = (
  node: N,
  session: CompilationSession
) => Fragment;

/**
 * A value test used by `foo?` predicates
 */
export type Predicate = (value: unknown) => boolean;

/**
 * Error thrown when a pattern cannot be compiled
 */
export class PatternCompileError extends Error {
  constructor(
    message: string,
    public readonly tag: string,
    public readonly position: number,
    public readonly source: string
  ) {
    super(
      source
        ? `${message} at position ${position}: "${source}"`
        : `${message} at position ${position}`
    );
    this.name = 'PatternCompileError';
  }
}

/**
 * Error thrown when a compiled matcher is called with the wrong
 * set of named parameters
 */
export class MatcherCallError extends Error {
  constructor(
    message: string,
    public readonly missing: readonly string[] = [],
    public readonly unexpected: readonly string[] = []
  ) {
    super(message);
    this.name = 'MatcherCallError';
  }
}

/**
 * Wraps every dispatch of a compilation.
 *
 * `instrument` is called before the handler runs, with `next` invoking it,
 * so implementations see nodes in pre-order.
 */
export interface Instrumentation {
  /** Named parameters the instrumented matcher additionally requires */
  readonly parameters: readonly string[];
  instrument(frame: CompileFrame, next: () => Fragment): Fragment;
  /** Validate the instrumentation's own parameters before a call */
  checkCall(params: Readonly<Record<string, unknown>>): void;
}

/**
 * An element position under a node pattern
 */
export interface ElementSlot {
  /** Governor of the node pattern owning the element */
  readonly owner: PatternNode;
  readonly index: number;
}

/**
 * One level of the session's compile stack
 */
export interface CompileFrame {
  readonly node: PatternNode;
  /** Outermost pattern node that tests the same subject as `node` */
  readonly governor: PatternNode;
  /** Set for elements at a fixed child index */
  readonly slot: ElementSlot | undefined;
}
