import type { PatternNode, PredicateNode } from '../pattern/types.js';
import type { CompilerDefinition } from './registry.js';
import { resolvePredicate } from './predicates.js';
import {
  PatternCompileError,
  type CompileFrame,
  type Fragment,
  type Instrumentation,
  type Predicate,
} from './types.js';

/**
 * The definitions a session dispatches through: `node` for patterns tested
 * against a single value, `head` for the head of a node pattern (whose
 * subject is known to be a node), `element` for the children of a node pattern
 */
export interface CompilerDefinitions {
  readonly node: CompilerDefinition;
  readonly head: CompilerDefinition;
  readonly element: CompilerDefinition;
}

export interface SessionOptions {
  source: string;
  definitions: CompilerDefinitions;
  predicates: Readonly<Record<string, Predicate>>;
  instrumentation?: Instrumentation;
  debug: boolean;
}

interface StackEntry {
  frame: CompileFrame;
  definition: CompilerDefinition;
}

/**
 * State of one top-level compilation and every nested compile it triggers.
 *
 * The compile stack gives the current node; entries are popped on return
 * and on throw, so the current node always reflects the enclosing compile.
 */
export class CompilationSession {
  readonly source: string;
  readonly definitions: CompilerDefinitions;
  private readonly predicates: Readonly<Record<string, Predicate>>;
  private readonly instrumentation: Instrumentation | undefined;
  private readonly debug: boolean;
  private readonly stack: StackEntry[] = [];
  private readonly declared: string[] = [];

  constructor(options: SessionOptions) {
    this.source = options.source;
    this.definitions = options.definitions;
    this.predicates = options.predicates;
    this.instrumentation = options.instrumentation;
    this.debug = options.debug;
  }

  /**
   * The pattern node being compiled, if any
   */
  get current(): PatternNode | undefined {
    return this.stack.at(-1)?.frame.node;
  }

  /**
   * The definition the current node was dispatched through
   */
  get definition(): CompilerDefinition {
    return this.stack.at(-1)?.definition ?? this.definitions.node;
  }

  /**
   * Named parameters the compiled matcher requires, in declaration order
   */
  get parameters(): readonly string[] {
    return [...this.declared, ...(this.instrumentation?.parameters ?? [])];
  }

  /**
   * Compile a node tested against the same subject as the current one
   */
  compile(node: PatternNode, definition: CompilerDefinition = this.definition): Fragment {
    const parent = this.stack.at(-1);
    return this.dispatch(
      {
        node,
        governor: parent ? parent.frame.governor : node,
        slot: undefined,
      },
      definition
    );
  }

  /**
   * Compile a node pattern element, which tests a child of the current
   * subject. `index` is the child position, when it is fixed.
   */
  compileElement(node: PatternNode, index: number | undefined): Fragment {
    const parent = this.stack.at(-1);
    return this.dispatch(
      {
        node,
        governor: node,
        slot:
          parent && index !== undefined
            ? { owner: parent.frame.governor, index }
            : undefined,
      },
      this.definitions.element
    );
  }

  /**
   * Record a named parameter the matcher must be called with
   */
  declareParameter(name: string, node: PatternNode): void {
    if (this.instrumentation?.parameters.includes(name)) {
      throw new PatternCompileError(
        `Parameter "%${name}" is reserved`,
        node.type,
        node.loc.begin,
        this.source
      );
    }
    if (!this.declared.includes(name)) {
      this.declared.push(name);
    }
  }

  /**
   * Look up the predicate a `name?` node refers to
   */
  predicate(node: PredicateNode): Predicate {
    const predicate = resolvePredicate(node.value, this.predicates);
    if (!predicate) {
      throw new PatternCompileError(
        `Unknown predicate "${node.value}"`,
        node.type,
        node.loc.begin,
        this.source
      );
    }
    return predicate;
  }

  /**
   * Log a message if debug is enabled
   */
  log(message: string): void {
    if (this.debug) {
      console.log(`[tree-pattern] ${message}`);
    }
  }

  private dispatch(frame: CompileFrame, definition: CompilerDefinition): Fragment {
    this.stack.push({ frame, definition });
    try {
      this.log(
        `${'  '.repeat(this.stack.length - 1)}${definition.name}: ${frame.node.type} at ${frame.node.loc.begin}`
      );
      const handler = definition.registry.resolve(frame.node.type);
      const run = (): Fragment => handler(frame.node, this);
      return this.instrumentation ? this.instrumentation.instrument(frame, run) : run();
    } finally {
      this.stack.pop();
    }
  }
}
