import { isAstNode } from '../ast/node.js';
import type { Predicate } from './types.js';

const NODE_TYPE_PREDICATE = /^([A-Za-z_][A-Za-z0-9_]*)_type\?$/;

/**
 * Predicates available to every pattern as `name?`
 */
export const BUILTIN_PREDICATES: Readonly<Record<string, Predicate>> = {
  'nil?': (value) => value === null,
  'true?': (value) => value === true,
  'false?': (value) => value === false,
  'symbol?': (value) => typeof value === 'symbol',
  'string?': (value) => typeof value === 'string',
  'number?': (value) => typeof value === 'number',
  'integer?': (value) => Number.isInteger(value),
  'node?': (value) => isAstNode(value),
};

/**
 * Resolve a predicate by name.
 *
 * Custom predicates shadow built-ins; `<type>_type?` is derived on demand
 * for any node type not otherwise defined.
 */
export function resolvePredicate(
  name: string,
  custom: Readonly<Record<string, Predicate>> = {}
): Predicate | undefined {
  if (Object.prototype.hasOwnProperty.call(custom, name)) {
    return custom[name];
  }
  if (Object.prototype.hasOwnProperty.call(BUILTIN_PREDICATES, name)) {
    return BUILTIN_PREDICATES[name];
  }

  const typeMatch = NODE_TYPE_PREDICATE.exec(name);
  if (typeMatch) {
    const type = typeMatch[1];
    return (value) => isAstNode(value) && value.type === type;
  }

  return undefined;
}
