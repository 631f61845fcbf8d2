import type { PatternNode } from '../pattern/types.js';
import { Compiler, type CompiledPattern, type MatchResult } from '../compiler/compiler.js';
import type { CompilerOptions } from '../types/index.js';
import { TraceInstrumentation } from './instrumentation.js';
import type { NodeIds } from './node-ids.js';
import { Trace } from './trace.js';

/**
 * One traced run: the trace it filled and what the matcher returned
 */
export interface TracedRun {
  readonly trace: Trace;
  readonly result: MatchResult;
}

/**
 * A pattern compiled with trace instrumentation
 */
export class DebugPattern {
  readonly matcher: CompiledPattern;
  readonly nodeIds: NodeIds;
  private readonly debug: boolean;

  constructor(pattern: string | PatternNode, options: CompilerOptions = {}) {
    const instrumentation = new TraceInstrumentation();
    this.matcher = new Compiler(options).compile(pattern, instrumentation);
    this.nodeIds = instrumentation.nodeIds;
    this.debug = options.debug ?? false;
  }

  /**
   * Run against `subject` with a fresh trace.
   * `params` are the pattern's own named parameters.
   */
  run(subject: unknown, params: Readonly<Record<string, unknown>> = {}): TracedRun {
    const trace = new Trace();
    const result = this.matcher.exec(subject, { ...params, trace });

    if (this.debug) {
      const { entered, matched } = trace.summary();
      console.log(
        `[tree-pattern] run ${result.matched ? 'matched' : 'did not match'}: ` +
          `${entered}/${this.nodeIds.size} positions entered, ${matched} matched`
      );
    }

    return { trace, result };
  }
}

/**
 * Compile a pattern in debug mode.
 *
 * @example
 * ```ts
 * const pattern = compileDebug('(send nil? :foo)');
 * const { trace } = pattern.run(readSource('(send nil :foo)').ast);
 * trace.matched(0); // true
 * ```
 */
export function compileDebug(pattern: string | PatternNode, options?: CompilerOptions): DebugPattern {
  return new DebugPattern(pattern, options);
}
