// Entry points for inspecting what the compiler does with a pattern

import { Scanner } from './pattern/scanner.js';
import { parsePattern } from './pattern/parser.js';
import type { PatternNode, Token } from './pattern/types.js';
import { Compiler } from './compiler/compiler.js';
import { TraceInstrumentation } from './trace/instrumentation.js';
import type { ParsedSource } from './ast/reader.js';
import { Colorizer, type ColorizerResult } from './visualize/colorizer.js';
import type { ColorizerOptions, CompilerOptions } from './types/index.js';

/**
 * Tokens of a pattern, ending with EOF
 */
export function tokenize(pattern: string): Token[] {
  return new Scanner(pattern).getTokens();
}

/**
 * The pattern tree a pattern parses to
 */
export function parse(pattern: string): PatternNode {
  return parsePattern(pattern);
}

/**
 * The code a pattern compiles to, as an expression over `node`.
 * With `traced`, the code of the instrumented matcher.
 */
export function compileCode(
  pattern: string,
  options: CompilerOptions & { traced?: boolean } = {}
): string {
  const { traced, ...compilerOptions } = options;
  const compiler = new Compiler(compilerOptions);
  const instrumentation = traced ? new TraceInstrumentation() : undefined;
  return compiler.compile(pattern, instrumentation).code;
}

/**
 * Run a pattern in debug mode against s-expression source and
 * classify every character of it
 */
export function testPattern(
  pattern: string,
  input: string | ParsedSource,
  options?: ColorizerOptions
): ColorizerResult {
  return new Colorizer(pattern, options).test(input);
}
