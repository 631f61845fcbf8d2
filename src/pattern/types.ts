/**
 * Token types for the pattern scanner
 */
export enum TokenType {
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',
  CAPTURE = 'CAPTURE',
  NEGATION = 'NEGATION',
  REST = 'REST',
  WILDCARD = 'WILDCARD',
  SYMBOL = 'SYMBOL',
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  NIL = 'NIL',
  TRUE = 'TRUE',
  FALSE = 'FALSE',
  PREDICATE = 'PREDICATE',
  PARAM = 'PARAM',
  IDENT = 'IDENT',
  EOF = 'EOF',
}

/**
 * A token produced by the scanner.
 * `value` is the token's meaning (symbol name, unquoted string, ...),
 * `text` the raw slice of source it was read from.
 */
export interface Token {
  type: TokenType;
  value: string;
  text: string;
  position: number;
}

/**
 * Half-open character range `[begin, end)` in some source text
 */
export interface SourceRange {
  begin: number;
  end: number;
}

interface PatternBase {
  readonly loc: SourceRange;
  /** Operand patterns; empty for atoms */
  readonly children: readonly PatternNode[];
}

export interface NodePatternNode extends PatternBase {
  readonly type: 'node_pattern';
  /** The head first, then one pattern per child position */
  readonly children: readonly PatternNode[];
}

export interface NodeTypeNode extends PatternBase {
  readonly type: 'node_type';
  readonly value: string;
}

export interface WildcardNode extends PatternBase {
  readonly type: 'wildcard';
}

export interface RestNode extends PatternBase {
  readonly type: 'rest';
}

export interface SymbolNode extends PatternBase {
  readonly type: 'symbol';
  readonly value: string;
}

export interface StringNode extends PatternBase {
  readonly type: 'string';
  readonly value: string;
}

export interface NumberNode extends PatternBase {
  readonly type: 'number';
  readonly value: number;
}

export interface NilNode extends PatternBase {
  readonly type: 'nil';
}

export interface BooleanNode extends PatternBase {
  readonly type: 'boolean';
  readonly value: boolean;
}

export interface PredicateNode extends PatternBase {
  readonly type: 'predicate';
  /** Predicate name including the trailing `?` */
  readonly value: string;
}

export interface ParamNode extends PatternBase {
  readonly type: 'param';
  readonly value: string;
}

export interface CaptureNode extends PatternBase {
  readonly type: 'capture';
}

export interface NegationNode extends PatternBase {
  readonly type: 'negation';
}

export interface UnionNode extends PatternBase {
  readonly type: 'union';
}

/**
 * Union type of all pattern node types
 */
export type PatternNode =
  | NodePatternNode
  | NodeTypeNode
  | WildcardNode
  | RestNode
  | SymbolNode
  | StringNode
  | NumberNode
  | NilNode
  | BooleanNode
  | PredicateNode
  | ParamNode
  | CaptureNode
  | NegationNode
  | UnionNode;

export type PatternNodeType = PatternNode['type'];

/**
 * The member of the pattern node union carrying tag `T`
 */
export type PatternNodeOf<T extends PatternNodeType> = Extract<PatternNode, { type: T }>;

/**
 * Narrow a pattern node to the member for `type`
 */
export function hasType<T extends PatternNodeType>(
  node: PatternNode,
  type: T
): node is PatternNodeOf<T> {
  return node.type === type;
}

/**
 * Error thrown when scanning or parsing fails
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly position: number,
    public readonly source: string
  ) {
    super(`${message} at position ${position}: "${source}"`);
    this.name = 'ParseError';
  }
}
