import { isAstNode } from '../ast/node.js';
import type { PatternNode, PatternNodeOf } from '../pattern/types.js';
import { defineCompiler, type CompilerDefinition } from './registry.js';
import type { CompilationSession } from './session.js';
import { PatternCompileError, type Fragment, type Handler } from './types.js';

/**
 * Fragment testing one value
 */
function single(
  describe: (subject: string) => string,
  match: Fragment['match']
): Fragment {
  return { describe, variadic: false, match };
}

function literal(expected: unknown, text: string): Fragment {
  return single(
    (subject) => `${subject} === ${text}`,
    (value) => value === expected
  );
}

function rejectVariadic(
  fragment: Fragment,
  node: PatternNode,
  what: string,
  session: CompilationSession
): Fragment {
  if (fragment.variadic) {
    throw new PatternCompileError(
      `"..." cannot be used ${what}`,
      node.type,
      node.loc.begin,
      session.source
    );
  }
  return fragment;
}

const compileNodeType: Handler<PatternNodeOf<'node_type'>> = (node) =>
  single(
    (subject) => `${subject} instanceof AstNode && ${subject}.type === ${JSON.stringify(node.value)}`,
    (value) => isAstNode(value) && value.type === node.value
  );

const compileWildcard: Handler = () =>
  single(
    () => 'true',
    () => true
  );

const compileRest: Handler = () => ({
  describe: () => 'true',
  variadic: true,
  match: () => true,
});

const compileParam: Handler<PatternNodeOf<'param'>> = (node, session) => {
  session.declareParameter(node.value, node);
  return single(
    (subject) => `${subject} === params.${node.value}`,
    (value, env) => value === env.params[node.value]
  );
};

const compilePredicate: Handler<PatternNodeOf<'predicate'>> = (node, session) => {
  const predicate = session.predicate(node);
  return single(
    (subject) => `predicates[${JSON.stringify(node.value)}](${subject})`,
    (value) => predicate(value)
  );
};

/**
 * `$p`: reserves its capture slot before `p` runs, so captures
 * come out in pattern order (outer before inner)
 */
const compileCapture: Handler<PatternNodeOf<'capture'>> = (node, session) => {
  const inner = session.compile(node.children[0]);
  return {
    describe: (subject) => `${inner.describe(subject)} && capture(${subject})`,
    variadic: inner.variadic,
    match: (value, env) => {
      const slot = env.captures.length;
      env.captures.push(undefined);
      if (inner.match(value, env)) {
        env.captures[slot] = value;
        return true;
      }
      env.captures.length = slot;
      return false;
    },
  };
};

/**
 * `!p`: anything captured under `p` is discarded either way
 */
const compileNegation: Handler<PatternNodeOf<'negation'>> = (node, session) => {
  const inner = rejectVariadic(
    session.compile(node.children[0]),
    node,
    'under a negation',
    session
  );
  return single(
    (subject) => `!(${inner.describe(subject)})`,
    (value, env) => {
      const mark = env.captures.length;
      const matched = inner.match(value, env);
      env.captures.length = mark;
      return !matched;
    }
  );
};

const compileUnion: Handler<PatternNodeOf<'union'>> = (node, session) => {
  const alternatives = node.children.map((child) =>
    rejectVariadic(session.compile(child), child, 'in a union', session)
  );
  return single(
    (subject) => `(${alternatives.map((alt) => alt.describe(subject)).join(' || ')})`,
    (value, env) => {
      for (const alternative of alternatives) {
        const mark = env.captures.length;
        if (alternative.match(value, env)) {
          return true;
        }
        env.captures.length = mark;
      }
      return false;
    }
  );
};

/**
 * `(head e1 e2 ...)`: the head is tested against the node itself,
 * each element against the child at its position. One `...` element may
 * absorb any number of children; elements after it are anchored to the end.
 */
const compileNodePattern: Handler<PatternNodeOf<'node_pattern'>> = (node, session) => {
  const [headNode, ...elementNodes] = node.children;
  const head = rejectVariadic(
    session.compile(headNode, session.definitions.head),
    headNode,
    'as a node pattern head',
    session
  );

  const before: Fragment[] = [];
  const after: Fragment[] = [];
  let rest: Fragment | undefined;

  for (let index = 0; index < elementNodes.length; index++) {
    const child = elementNodes[index];
    const element = session.compileElement(child, rest ? undefined : index);
    if (element.variadic) {
      if (rest) {
        throw new PatternCompileError(
          'Only one "..." is allowed per node pattern',
          child.type,
          child.loc.begin,
          session.source
        );
      }
      rest = element;
    } else if (rest) {
      after.push(element);
    } else {
      before.push(element);
    }
  }

  const variadic = rest;
  const fixed = before.length + after.length;

  const describe = (subject: string): string => {
    const children = `${subject}.children`;
    const parts = [
      `${subject} instanceof AstNode`,
      head.describe(subject),
      variadic ? `${children}.length >= ${fixed}` : `${children}.length === ${fixed}`,
      ...before.map((element, i) => element.describe(`${children}[${i}]`)),
    ];
    if (variadic) {
      const end = after.length > 0 ? `, -${after.length}` : '';
      parts.push(variadic.describe(`${children}.slice(${before.length}${end})`));
      parts.push(
        ...after.map((element, i) => element.describe(`${children}.at(-${after.length - i})`))
      );
    }
    return parts.join(' && ');
  };

  const match: Fragment['match'] = (value, env) => {
    if (!isAstNode(value) || !head.match(value, env)) {
      return false;
    }

    const children = value.children;
    if (variadic ? children.length < fixed : children.length !== fixed) {
      return false;
    }

    for (let i = 0; i < before.length; i++) {
      if (!before[i].match(children[i], env)) return false;
    }
    if (!variadic) {
      return true;
    }

    const tail = children.length - after.length;
    if (!variadic.match(children.slice(before.length, tail), env)) {
      return false;
    }
    for (let i = 0; i < after.length; i++) {
      if (!after[i].match(children[tail + i], env)) return false;
    }
    return true;
  };

  return single(describe, match);
};

/**
 * Compiles patterns tested against a single value
 */
export const nodeCompiler: CompilerDefinition = defineCompiler('node', (registry) => {
  registry
    .define('node_pattern', compileNodePattern)
    .define('node_type', compileNodeType)
    .define('wildcard', compileWildcard)
    .define('symbol', (node) =>
      literal(Symbol.for(node.value), `Symbol.for(${JSON.stringify(node.value)})`)
    )
    .define('string', (node) => literal(node.value, JSON.stringify(node.value)))
    .define('number', (node) => literal(node.value, String(node.value)))
    .define('nil', () => literal(null, 'null'))
    .define('boolean', (node) => literal(node.value, String(node.value)))
    .define('predicate', compilePredicate)
    .define('param', compileParam)
    .define('capture', compileCapture)
    .define('negation', compileNegation)
    .define('union', compileUnion);
});

/**
 * Compiles the head of a node pattern. The node pattern has already
 * checked that its subject is a node, so a node type only compares the type.
 */
export const headCompiler: CompilerDefinition = defineCompiler(
  'head',
  (registry) => {
    registry.define('node_type', (node) =>
      single(
        (subject) => `${subject}.type === ${JSON.stringify(node.value)}`,
        (value) => isAstNode(value) && value.type === node.value
      )
    );
  },
  nodeCompiler
);

/**
 * Compiles the elements of a node pattern: everything the node compiler
 * does, plus `...`
 */
export const elementCompiler: CompilerDefinition = defineCompiler(
  'element',
  (registry) => {
    registry.define('rest', compileRest);
  },
  nodeCompiler
);
