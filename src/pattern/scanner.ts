import { TokenType, Token, ParseError } from './types.js';

const DELIMITERS = new Set(['(', ')', '{', '}']);
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Scanner (lexer) for the pattern language.
 * Also used to read s-expression sources, which share the literal syntax.
 */
export class Scanner {
  private readonly source: string;
  private position: number = 0;
  private tokens: Token[] = [];
  private current: number = 0;

  constructor(source: string) {
    this.source = source;
    this.tokenize();
  }

  /**
   * Peek at the current token without consuming it
   */
  peek(): Token {
    return this.tokens[this.current];
  }

  /**
   * Consume and return the current token
   */
  nextToken(): Token {
    const token = this.tokens[this.current];
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  /**
   * Check if we've reached the end of tokens
   */
  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  /**
   * Check if the current token matches the given type
   */
  check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  /**
   * Tokenize the entire source string
   */
  private tokenize(): void {
    while (this.position < this.source.length) {
      this.skipWhitespace();
      if (this.position >= this.source.length) break;

      const char = this.source[this.position];

      if (char === '(') {
        this.addSingle(TokenType.LPAREN);
      } else if (char === ')') {
        this.addSingle(TokenType.RPAREN);
      } else if (char === '{') {
        this.addSingle(TokenType.LBRACE);
      } else if (char === '}') {
        this.addSingle(TokenType.RBRACE);
      } else if (char === '$') {
        this.addSingle(TokenType.CAPTURE);
      } else if (char === '!') {
        this.addSingle(TokenType.NEGATION);
      } else if (this.source.startsWith('...', this.position)) {
        this.addToken(TokenType.REST, '...', this.position, this.position + 3);
      } else if (char === '"') {
        this.scanString();
      } else if (char === ':') {
        this.scanPrefixed(TokenType.SYMBOL, 'symbol name');
      } else if (char === '%') {
        this.scanPrefixed(TokenType.PARAM, 'parameter name');
      } else {
        this.scanWord();
      }
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: '',
      text: '',
      position: this.source.length,
    });
  }

  /**
   * Skip whitespace characters
   */
  private skipWhitespace(): void {
    while (
      this.position < this.source.length &&
      /\s/.test(this.source[this.position])
    ) {
      this.position++;
    }
  }

  /**
   * Read characters up to the next whitespace or delimiter
   */
  private readWord(start: number): string {
    let end = start;
    while (
      end < this.source.length &&
      !/\s/.test(this.source[end]) &&
      !DELIMITERS.has(this.source[end])
    ) {
      end++;
    }
    return this.source.slice(start, end);
  }

  /**
   * Scan a double-quoted string with `\"` and `\\` escapes
   */
  private scanString(): void {
    const start = this.position;
    let value = '';
    let end = start + 1;

    while (end < this.source.length && this.source[end] !== '"') {
      if (this.source[end] === '\\' && end + 1 < this.source.length) {
        value += this.source[end + 1];
        end += 2;
        continue;
      }
      value += this.source[end];
      end++;
    }

    if (end >= this.source.length) {
      throw new ParseError('Unterminated string', start, this.source);
    }

    this.addToken(TokenType.STRING, value, start, end + 1);
  }

  /**
   * Scan a `:symbol` or `%param`: a one-character sigil followed by a name
   */
  private scanPrefixed(type: TokenType, expected: string): void {
    const start = this.position;
    const name = this.readWord(start + 1);

    if (name.length === 0) {
      throw new ParseError(`Expected ${expected}`, start, this.source);
    }
    if (type === TokenType.PARAM && !IDENTIFIER.test(name)) {
      throw new ParseError(`Invalid parameter name "${name}"`, start, this.source);
    }

    this.addToken(type, name, start, start + 1 + name.length);
  }

  /**
   * Scan a bare word: keyword, wildcard, number, predicate or node type
   */
  private scanWord(): void {
    const start = this.position;
    const word = this.readWord(start);
    let tokenType: TokenType;

    switch (word) {
      case '_':
        tokenType = TokenType.WILDCARD;
        break;
      case 'nil':
        tokenType = TokenType.NIL;
        break;
      case 'true':
        tokenType = TokenType.TRUE;
        break;
      case 'false':
        tokenType = TokenType.FALSE;
        break;
      default:
        if (NUMBER.test(word)) {
          tokenType = TokenType.NUMBER;
        } else if (word.endsWith('?') && IDENTIFIER.test(word.slice(0, -1))) {
          tokenType = TokenType.PREDICATE;
        } else if (IDENTIFIER.test(word)) {
          tokenType = TokenType.IDENT;
        } else {
          throw new ParseError(`Unexpected "${word}"`, start, this.source);
        }
        break;
    }

    this.addToken(tokenType, word, start, start + word.length);
  }

  private addSingle(type: TokenType): void {
    const char = this.source[this.position];
    this.addToken(type, char, this.position, this.position + 1);
  }

  /**
   * Add a token to the tokens array and move past it
   */
  private addToken(type: TokenType, value: string, start: number, end: number): void {
    this.tokens.push({
      type,
      value,
      text: this.source.slice(start, end),
      position: start,
    });
    this.position = end;
  }

  /**
   * Get all tokens (for debugging)
   */
  getTokens(): Token[] {
    return [...this.tokens];
  }
}
