import {
  hasType,
  type PatternNodeOf,
  type PatternNodeType,
} from '../pattern/types.js';
import { PatternCompileError, type Handler } from './types.js';

/**
 * Fails compilation for a tag with no registered handler
 */
export const onUnknownType: Handler = (node, session) => {
  throw new PatternCompileError(
    `Unsupported pattern construct "${node.type}" in ${session.definition.name} position`,
    node.type,
    node.loc.begin,
    session.source
  );
};

/**
 * Mapping from pattern node type tag to handler.
 *
 * A registry is owned by one compiler definition. `derive()` takes a full
 * snapshot, so defining handlers on the copy never reaches the original.
 */
export class Registry {
  private readonly handlers: Map<string, Handler>;
  private readonly unknown: Handler;

  constructor(unknown: Handler = onUnknownType, handlers?: ReadonlyMap<string, Handler>) {
    this.unknown = unknown;
    this.handlers = new Map<string, Handler>(handlers);
  }

  /**
   * Register (or replace) the handler for a tag
   */
  define<T extends PatternNodeType>(type: T, handler: Handler<PatternNodeOf<T>>): this {
    this.handlers.set(type, (node, session) =>
      hasType(node, type) ? handler(node, session) : this.unknown(node, session)
    );
    return this;
  }

  /**
   * Resolve a tag to its handler, or to the unknown-type handler
   */
  resolve(type: string): Handler {
    return this.handlers.get(type) ?? this.unknown;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  /**
   * Registered tags, in definition order
   */
  types(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Independent copy of this registry
   */
  derive(): Registry {
    return new Registry(this.unknown, this.handlers);
  }
}

/**
 * A named compiler: the registry its dispatch is bound to
 */
export interface CompilerDefinition {
  readonly name: string;
  readonly registry: Registry;
}

/**
 * Create a compiler definition, optionally derived from a parent.
 * `setup` runs once, at definition time.
 *
 * @example
 * ```ts
 * const strict = defineCompiler('strict', (registry) => {
 *   registry.define('wildcard', rejectWildcard);
 * }, nodeCompiler);
 * ```
 */
export function defineCompiler(
  name: string,
  setup: (registry: Registry) => void,
  parent?: CompilerDefinition
): CompilerDefinition {
  const registry = parent ? parent.registry.derive() : new Registry();
  setup(registry);
  return { name, registry };
}
