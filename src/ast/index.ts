export { AstNode, isAstNode, formatValue, s } from './node.js';
export type { AstValue } from './node.js';
export { Reader, readSource } from './reader.js';
export type { ParsedSource } from './reader.js';
