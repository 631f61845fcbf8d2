export { Trace } from './trace.js';
export type { MatchStatus } from './trace.js';
export { NodeIds } from './node-ids.js';
export { TraceInstrumentation } from './instrumentation.js';
export { DebugPattern, compileDebug } from './debug-pattern.js';
export type { TracedRun } from './debug-pattern.js';
