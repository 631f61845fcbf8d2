export { PatternCompileError, MatcherCallError } from './types.js';
export type {
  MatchEnv,
  Fragment,
  Handler,
  Predicate,
  Instrumentation,
  CompileFrame,
  ElementSlot,
} from './types.js';

export { Registry, defineCompiler, onUnknownType } from './registry.js';
export type { CompilerDefinition } from './registry.js';
export { CompilationSession } from './session.js';
export type { CompilerDefinitions, SessionOptions } from './session.js';
export { nodeCompiler, headCompiler, elementCompiler } from './handlers.js';
export { BUILTIN_PREDICATES, resolvePredicate } from './predicates.js';
export { Compiler, CompiledPattern, compile } from './compiler.js';
export type { MatchResult } from './compiler.js';
