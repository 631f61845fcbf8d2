export { TokenType, ParseError, hasType } from './types.js';
export type {
  Token,
  SourceRange,
  PatternNode,
  PatternNodeType,
  PatternNodeOf,
  NodePatternNode,
  NodeTypeNode,
  WildcardNode,
  RestNode,
  SymbolNode,
  StringNode,
  NumberNode,
  NilNode,
  BooleanNode,
  PredicateNode,
  ParamNode,
  CaptureNode,
  NegationNode,
  UnionNode,
} from './types.js';

export { Scanner } from './scanner.js';
export { Parser, parsePattern } from './parser.js';
