import type { SourceRange } from '../pattern/types.js';

/**
 * A value that may appear as a child of an analyzed node
 */
export type AstValue = AstNode | symbol | string | number | boolean | null;

/**
 * A node of the analyzed tree: the concrete data a matcher runs against.
 *
 * Children are either nested nodes or plain values (`null` for nil,
 * `Symbol.for(name)` for symbols). Only nodes carry a source range.
 */
export class AstNode {
  readonly type: string;
  readonly children: readonly AstValue[];
  readonly loc: SourceRange | undefined;

  constructor(type: string, children: readonly AstValue[] = [], loc?: SourceRange) {
    this.type = type;
    this.children = children;
    this.loc = loc;
  }

  /**
   * Yield every descendant node, depth-first, parents before children
   */
  *eachDescendant(): Generator<AstNode> {
    for (const child of this.children) {
      if (child instanceof AstNode) {
        yield child;
        yield* child.eachDescendant();
      }
    }
  }

  /**
   * This node followed by all its descendants
   */
  *eachNode(): Generator<AstNode> {
    yield this;
    yield* this.eachDescendant();
  }

  toString(): string {
    const parts = [this.type, ...this.children.map(formatValue)];
    return `(${parts.join(' ')})`;
  }
}

export function isAstNode(value: unknown): value is AstNode {
  return value instanceof AstNode;
}

/**
 * Format a child value the way the reader accepts it
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'nil';
  if (typeof value === 'symbol') return `:${value.description ?? ''}`;
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

/**
 * Build a node without a source range.
 *
 * @example
 * ```ts
 * const call = s('send', null, Symbol.for('foo'));
 * call.toString(); // '(send nil :foo)'
 * ```
 */
export function s(type: string, ...children: AstValue[]): AstNode {
  return new AstNode(type, children);
}
