import {
  MatcherCallError,
  type CompileFrame,
  type Fragment,
  type Instrumentation,
} from '../compiler/types.js';
import { NodeIds } from './node-ids.js';
import { Trace } from './trace.js';

function traceOf(params: Readonly<Record<string, unknown>>): Trace {
  const trace = params.trace;
  if (!(trace instanceof Trace)) {
    throw new MatcherCallError('Parameter "trace" must be a Trace instance');
  }
  return trace;
}

/**
 * Instrumentation recording every pattern position into a `Trace`.
 *
 * Each compiled fragment `f` for a node with id `n` becomes
 * `trace.enter(n) && trace.visit(subject, g) && f && trace.success(n)`,
 * where `g` is the id of the node's governor. The trace calls always
 * return true, so the result is `f`'s.
 *
 * Use one instance per compilation: it owns the pattern's `NodeIds`.
 */
export class TraceInstrumentation implements Instrumentation {
  readonly parameters: readonly string[] = ['trace'];
  readonly nodeIds = new NodeIds();

  instrument(frame: CompileFrame, next: () => Fragment): Fragment {
    const id = this.nodeIds.assign(frame.node);
    const governor = this.nodeIds.assign(frame.governor);
    this.nodeIds.setGovernor(id, governor);

    const fragment = next();

    // a variadic element spans several children, so it owns no single slot
    if (frame.slot && !fragment.variadic) {
      this.nodeIds.setSlot(this.nodeIds.assign(frame.slot.owner), frame.slot.index, id);
    }

    return {
      describe: (subject) =>
        `(trace.enter(${id}) && trace.visit(${subject}, ${governor}) && ${fragment.describe(subject)} && trace.success(${id}))`,
      variadic: fragment.variadic,
      match: (subject, env) => {
        const trace = traceOf(env.params);
        return (
          trace.enter(id) &&
          trace.visit(subject, governor) &&
          fragment.match(subject, env) &&
          trace.success(id)
        );
      },
    };
  }

  checkCall(params: Readonly<Record<string, unknown>>): void {
    traceOf(params);
  }
}
