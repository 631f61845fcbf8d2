// Main entry point for tree-pattern

// Pattern language
export { Scanner, Parser, parsePattern } from './pattern/index.js';
export { ParseError, TokenType } from './pattern/types.js';
export type { Token, SourceRange, PatternNode, PatternNodeType } from './pattern/types.js';

// Analyzed trees
export { AstNode, isAstNode, s, readSource } from './ast/index.js';
export type { AstValue, ParsedSource } from './ast/index.js';

// Compiler
export {
  Compiler,
  CompiledPattern,
  compile,
  Registry,
  defineCompiler,
  nodeCompiler,
  headCompiler,
  elementCompiler,
  CompilationSession,
  PatternCompileError,
  MatcherCallError,
  BUILTIN_PREDICATES,
} from './compiler/index.js';
export type {
  CompilerDefinition,
  CompileFrame,
  MatchResult,
} from './compiler/index.js';

// Tracing
export {
  Trace,
  NodeIds,
  TraceInstrumentation,
  DebugPattern,
  compileDebug,
} from './trace/index.js';
export type { MatchStatus, TracedRun } from './trace/index.js';

// Visualization
export { Colorizer, ColorizerResult, COLORS, classify } from './visualize/index.js';
export type { Classification, DisplayColor, Segment } from './visualize/index.js';

// Debugging entry points
export { tokenize, parse, compileCode, testPattern } from './debug.js';

// Re-export types
export type {
  CompilerOptions,
  ColorizerOptions,
  MatchEnv,
  Fragment,
  Handler,
  Predicate,
  Instrumentation,
} from './types/index.js';
