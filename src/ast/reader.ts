import { TokenType, ParseError } from '../pattern/types.js';
import { Scanner } from '../pattern/scanner.js';
import { AstNode, type AstValue } from './node.js';

// literal node types such as (nil) and (true) are spelled like keywords
const NODE_TYPE_TOKENS = new Set([TokenType.IDENT, TokenType.NIL, TokenType.TRUE, TokenType.FALSE]);

/**
 * Source text together with the analyzed tree read from it
 */
export interface ParsedSource {
  readonly source: string;
  readonly ast: AstNode;
}

/**
 * Reads s-expression source into an analyzed tree.
 *
 * Grammar:
 *   source := node EOF
 *   node   := '(' type value* ')'
 *   type   := IDENT | 'nil' | 'true' | 'false'
 *   value  := node | 'nil' | 'true' | 'false' | SYMBOL | STRING | NUMBER
 *
 * Every node's range spans its parentheses.
 */
export class Reader {
  private scanner: Scanner;
  private readonly source: string;

  constructor(source: string) {
    this.source = source;
    this.scanner = new Scanner(source);
  }

  read(): ParsedSource {
    const token = this.scanner.peek();
    if (token.type !== TokenType.LPAREN) {
      throw new ParseError('Expected a node', token.position, this.source);
    }

    const ast = this.readNode();

    if (!this.scanner.isAtEnd()) {
      const extra = this.scanner.peek();
      throw new ParseError(
        `Unexpected token "${extra.text}"`,
        extra.position,
        this.source
      );
    }

    return { source: this.source, ast };
  }

  private readNode(): AstNode {
    const open = this.scanner.nextToken();
    const head = this.scanner.nextToken();

    if (!NODE_TYPE_TOKENS.has(head.type)) {
      throw new ParseError('Expected node type', head.position, this.source);
    }

    const children: AstValue[] = [];
    while (!this.scanner.check(TokenType.RPAREN)) {
      if (this.scanner.isAtEnd()) {
        throw new ParseError('Unterminated node', open.position, this.source);
      }
      children.push(this.readValue());
    }

    const close = this.scanner.nextToken();
    return new AstNode(head.text, children, {
      begin: open.position,
      end: close.position + 1,
    });
  }

  private readValue(): AstValue {
    const token = this.scanner.peek();

    switch (token.type) {
      case TokenType.LPAREN:
        return this.readNode();
      case TokenType.NIL:
        this.scanner.nextToken();
        return null;
      case TokenType.TRUE:
        this.scanner.nextToken();
        return true;
      case TokenType.FALSE:
        this.scanner.nextToken();
        return false;
      case TokenType.SYMBOL:
        this.scanner.nextToken();
        return Symbol.for(token.value);
      case TokenType.STRING:
        this.scanner.nextToken();
        return token.value;
      case TokenType.NUMBER:
        this.scanner.nextToken();
        return Number(token.value);
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
 * Read s-expression source into an analyzed tree.
 *
 * @example
 * ```ts
 * const { ast } = readSource('(send nil :foo)');
 * ast.loc; // { begin: 0, end: 15 }
 * ```
 */
export function readSource(source: string): ParsedSource {
  return new Reader(source).read();
}
