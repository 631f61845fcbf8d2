import type { Predicate } from '../compiler/types.js';
import type { CompilerDefinition } from '../compiler/registry.js';

export type { MatchEnv, Fragment, Handler, Predicate, Instrumentation } from '../compiler/types.js';

/**
 * Options for the Compiler
 */
export interface CompilerOptions {
  /**
   * Extra `name?` predicates; these shadow the built-ins.
   * Example: { 'even?': (v) => typeof v === 'number' && v % 2 === 0 }
   */
  predicates?: Readonly<Record<string, Predicate>>;

  /**
   * Replace the definitions the compiler dispatches through.
   * Each defaults to the built-in compiler of that name.
   */
  definitions?: {
    node?: CompilerDefinition;
    head?: CompilerDefinition;
    element?: CompilerDefinition;
  };

  /**
   * Enable debug logging
   */
  debug?: boolean;
}

/**
 * Options for the Colorizer
 */
export interface ColorizerOptions extends CompilerOptions {
  /**
   * Named parameters passed to every run, besides the trace
   */
  params?: Readonly<Record<string, unknown>>;
}
