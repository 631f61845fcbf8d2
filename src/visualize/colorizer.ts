import type { PatternNode } from '../pattern/types.js';
import { AstNode } from '../ast/node.js';
import { readSource, type ParsedSource } from '../ast/reader.js';
import type { MatchResult } from '../compiler/compiler.js';
import { DebugPattern } from '../trace/debug-pattern.js';
import type { NodeIds } from '../trace/node-ids.js';
import type { MatchStatus, Trace } from '../trace/trace.js';
import type { ColorizerOptions } from '../types/index.js';

/**
 * How a character of the analyzed source relates to the run
 */
export type Classification = 'not_visitable' | 'not_visited' | 'not_matched' | 'matched';

export type DisplayColor = 'lightseagreen' | 'yellow' | 'red' | 'green';

export const COLORS: Readonly<Record<Classification, DisplayColor>> = {
  not_visitable: 'lightseagreen',
  not_visited: 'yellow',
  not_matched: 'red',
  matched: 'green',
};

export function classify(status: MatchStatus): Classification {
  if (status === undefined) return 'not_visited';
  return status ? 'matched' : 'not_matched';
}

/**
 * A run of consecutive UTF-16 code units sharing a classification;
 * `begin` and `end` are offsets into the source string
 */
export interface Segment {
  readonly begin: number;
  readonly end: number;
  readonly text: string;
  readonly classification: Classification;
  readonly color: DisplayColor;
}

/**
 * Result of a traced run against a particular analyzed tree
 */
export class ColorizerResult {
  readonly source: string;
  readonly ast: AstNode;
  readonly trace: Trace;
  readonly nodeIds: NodeIds;
  readonly returned: MatchResult;
  private cachedGovernors: Map<AstNode, number | undefined> | undefined;
  private cachedColorMap: Map<number, Classification> | undefined;

  constructor(
    parsed: ParsedSource,
    trace: Trace,
    nodeIds: NodeIds,
    returned: MatchResult
  ) {
    this.source = parsed.source;
    this.ast = parsed.ast;
    this.trace = trace;
    this.nodeIds = nodeIds;
    this.returned = returned;
  }

  get matched(): boolean {
    return this.returned.matched;
  }

  /**
   * The pattern position governing an analyzed node, if any.
   *
   * A node the run tested is governed by the position that tested it.
   * Otherwise, if its parent is governed, by the pattern element for its
   * child index under that position, which the run never reached.
   */
  governorOf(node: AstNode): number | undefined {
    return this.governors().get(node);
  }

  /**
   * Pattern node governing an analyzed node, if any
   */
  patternFor(node: AstNode): PatternNode | undefined {
    const id = this.governorOf(node);
    return id === undefined ? undefined : this.nodeIds.nodeFor(id);
  }

  /**
   * Classification of every analyzed node, self first, depth-first
   */
  matchMap(): Map<AstNode, Classification> {
    const map = new Map<AstNode, Classification>();
    for (const [node, id] of this.governors()) {
      map.set(node, id === undefined ? 'not_visitable' : classify(this.trace.matched(id)));
    }
    return map;
  }

  /**
   * Classification by UTF-16 offset, for offsets covered by a
   * node's range. Nodes later in depth-first order overwrite earlier
   * ones, so the innermost node wins.
   */
  colorMap(): Map<number, Classification> {
    if (!this.cachedColorMap) {
      const map = new Map<number, Classification>();
      for (const [node, classification] of this.matchMap()) {
        if (!node.loc) continue;
        for (let i = node.loc.begin; i < node.loc.end; i++) {
          map.set(i, classification);
        }
      }
      this.cachedColorMap = map;
    }
    return this.cachedColorMap;
  }

  /**
   * One classification per UTF-16 code unit of the source, the unit node
   * ranges are measured in; a character outside the BMP takes two entries
   */
  attributes(): Classification[] {
    const map = this.colorMap();
    return Array.from({ length: this.source.length }, (_, i) => map.get(i) ?? 'not_visitable');
  }

  segments(): Segment[] {
    const attributes = this.attributes();
    const segments: Segment[] = [];
    let begin = 0;

    for (let i = 1; i <= attributes.length; i++) {
      if (i === attributes.length || attributes[i] !== attributes[begin]) {
        const classification = attributes[begin];
        segments.push({
          begin,
          end: i,
          text: this.source.slice(begin, i),
          classification,
          color: COLORS[classification],
        });
        begin = i;
      }
    }

    return segments;
  }

  /**
   * Join the source back together, each run passed through `paint`
   */
  render(paint: (text: string, color: DisplayColor) => string): string {
    return this.segments()
      .map((segment) => paint(segment.text, segment.color))
      .join('');
  }

  private governors(): Map<AstNode, number | undefined> {
    if (!this.cachedGovernors) {
      const map = new Map<AstNode, number | undefined>();
      const walk = (node: AstNode, governor: number | undefined): void => {
        map.set(node, governor);
        node.children.forEach((child, index) => {
          if (child instanceof AstNode) {
            const slot = governor === undefined ? undefined : this.nodeIds.elementAt(governor, index);
            walk(child, this.trace.governorOf(child) ?? slot);
          }
        });
      };
      walk(this.ast, this.trace.governorOf(this.ast));
      this.cachedGovernors = map;
    }
    return this.cachedGovernors;
  }
}

/**
 * Runs a pattern in debug mode against analyzed sources
 */
export class Colorizer {
  readonly pattern: DebugPattern;
  private readonly params: Readonly<Record<string, unknown>>;

  constructor(pattern: string | PatternNode, options: ColorizerOptions = {}) {
    const { params, ...compilerOptions } = options;
    this.pattern = new DebugPattern(pattern, compilerOptions);
    this.params = params ?? {};
  }

  /**
   * Run against `input`: s-expression source, or an already read tree
   */
  test(input: string | ParsedSource): ColorizerResult {
    const parsed = typeof input === 'string' ? readSource(input) : input;
    const { trace, result } = this.pattern.run(parsed.ast, this.params);
    return new ColorizerResult(parsed, trace, this.pattern.nodeIds, result);
  }
}
