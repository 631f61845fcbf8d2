import { TokenType, ParseError, type PatternNode, type Token } from './types.js';
import { Scanner } from './scanner.js';

/**
 * Recursive descent parser for node patterns.
 *
 * Grammar:
 *   pattern := term EOF
 *   term    := '$' term | '!' term
 *            | '(' term term* ')'
 *            | '{' term term* '}'
 *            | atom
 *   atom    := IDENT | '_' | '...' | SYMBOL | STRING | NUMBER
 *            | 'nil' | 'true' | 'false' | PREDICATE | PARAM
 *
 * Whether `...` is allowed at a position is decided by the compiler,
 * not here.
 */
export class Parser {
  private scanner: Scanner;
  private readonly source: string;
  private previousEnd: number = 0;

  constructor(source: string) {
    this.source = source;
    this.scanner = new Scanner(source);
  }

  /**
   * Parse the pattern and return its tree
   */
  parse(): PatternNode {
    if (this.scanner.isAtEnd()) {
      throw new ParseError('Empty pattern', 0, this.source);
    }

    const pattern = this.parseTerm();

    if (!this.scanner.isAtEnd()) {
      const token = this.scanner.peek();
      throw new ParseError(
        `Unexpected token "${token.text}"`,
        token.position,
        this.source
      );
    }

    return pattern;
  }

  private parseTerm(): PatternNode {
    const token = this.scanner.nextToken();

    switch (token.type) {
      case TokenType.CAPTURE: {
        const inner = this.parseTerm();
        return {
          type: 'capture',
          children: [inner],
          loc: { begin: token.position, end: inner.loc.end },
        };
      }

      case TokenType.NEGATION: {
        const inner = this.parseTerm();
        return {
          type: 'negation',
          children: [inner],
          loc: { begin: token.position, end: inner.loc.end },
        };
      }

      case TokenType.LPAREN: {
        const children = this.parseTermsUntil(TokenType.RPAREN, token, 'node pattern');
        return {
          type: 'node_pattern',
          children,
          loc: { begin: token.position, end: this.previousEnd },
        };
      }

      case TokenType.LBRACE: {
        const children = this.parseTermsUntil(TokenType.RBRACE, token, 'union');
        return {
          type: 'union',
          children,
          loc: { begin: token.position, end: this.previousEnd },
        };
      }

      default:
        return this.parseAtom(token);
    }
  }

  /**
   * Parse one or more terms up to and including the closing token
   */
  private parseTermsUntil(
    closing: TokenType,
    opening: Token,
    what: string
  ): PatternNode[] {
    const terms: PatternNode[] = [];

    while (!this.scanner.check(closing)) {
      if (this.scanner.isAtEnd()) {
        throw new ParseError(
          `Unterminated ${what}`,
          opening.position,
          this.source
        );
      }
      terms.push(this.parseTerm());
    }

    const close = this.scanner.nextToken();
    this.previousEnd = close.position + 1;

    if (terms.length === 0) {
      throw new ParseError(`Empty ${what}`, opening.position, this.source);
    }

    return terms;
  }

  private parseAtom(token: Token): PatternNode {
    const loc = { begin: token.position, end: token.position + token.text.length };

    switch (token.type) {
      case TokenType.IDENT:
        return { type: 'node_type', value: token.value, children: [], loc };
      case TokenType.WILDCARD:
        return { type: 'wildcard', children: [], loc };
      case TokenType.REST:
        return { type: 'rest', children: [], loc };
      case TokenType.SYMBOL:
        return { type: 'symbol', value: token.value, children: [], loc };
      case TokenType.STRING:
        return { type: 'string', value: token.value, children: [], loc };
      case TokenType.NUMBER:
        return { type: 'number', value: Number(token.value), children: [], loc };
      case TokenType.NIL:
        return { type: 'nil', children: [], loc };
      case TokenType.TRUE:
        return { type: 'boolean', value: true, children: [], loc };
      case TokenType.FALSE:
        return { type: 'boolean', value: false, children: [], loc };
      case TokenType.PREDICATE:
        return { type: 'predicate', value: token.value, children: [], loc };
      case TokenType.PARAM:
        return { type: 'param', value: token.value, children: [], loc };
      case TokenType.EOF:
        throw new ParseError(
          'Unexpected end of pattern',
          token.position,
          this.source
        );
      default:
        throw new ParseError(
          `Unexpected token "${token.text}"`,
          token.position,
          this.source
        );
    }
  }
}

/**
 * Parse pattern source into a pattern tree.
 *
 * @throws ParseError if the pattern is invalid
 *
 * @example
 * ```ts
 * const tree = parsePattern('(send nil? :foo)');
 * tree.type; // 'node_pattern'
 * ```
 */
export function parsePattern(source: string): PatternNode {
  return new Parser(source).parse();
}
