/**
 * lexitree Lexer - one character of lookahead over a forward-only input
 */

import { TokenType, LexError } from './types';
import type { Token, TokenSource, LexerOptions } from './types';

/**
 * Text to lex: a whole string or a sequence of chunks read in order
 */
export type LexerInput = string | Iterable<string>;

export class Lexer implements TokenSource {
  private chunks: Iterator<string>;
  private chunk: string = '';
  private position: number = 0;
  private options: Required<LexerOptions>;

  constructor(input: LexerInput, options: LexerOptions = {}) {
    const chunks: Iterable<string> = typeof input === 'string' ? [input] : input;
    this.chunks = chunks[Symbol.iterator]();
    this.options = {
      strictNull: options.strictNull ?? false,
    };
  }

  /**
   * Tokenize entire input into token array, EOF included
   */
  public tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.type === TokenType.EOF) break;
    }

    return tokens;
  }

  /**
   * Get next token from input
   */
  public nextToken(): Token {
    this.skipWhitespace();

    if (this.isAtEnd()) {
      return this.createToken(TokenType.EOF, '');
    }

    const char = this.peek();

    if (char === '"') {
      return this.scanString();
    }

    if (char === '-' || this.isDigit(char)) {
      return this.scanNumber();
    }

    switch (char) {
      case 'f':
        return this.scanKeyword('false', TokenType.BOOLEAN);
      case 't':
        return this.scanKeyword('true', TokenType.BOOLEAN);
      case 'n':
        return this.scanNull();
      case '{':
        return this.createToken(TokenType.OPEN_BRACE, this.advance());
      case '}':
        return this.createToken(TokenType.CLOSE_BRACE, this.advance());
      case '[':
        return this.createToken(TokenType.OPEN_BRACKET, this.advance());
      case ']':
        return this.createToken(TokenType.CLOSE_BRACKET, this.advance());
      case ':':
        return this.createToken(TokenType.COLON, this.advance());
      case ',':
        return this.createToken(TokenType.COMMA, this.advance());
    }

    throw new LexError(`Unexpected character: '${char}'`, char);
  }

  /**
   * Raw text up to the next quote. Backslashes are kept as written.
   */
  private scanString(): Token {
    this.advance(); // skip opening "
    let value = '';

    while (!this.isAtEnd() && this.peek() !== '"') {
      value += this.advance();
    }

    if (this.isAtEnd()) {
      throw new LexError(`Unterminated string: "${value}`);
    }

    this.advance(); // skip closing "
    return this.createToken(TokenType.STRING, value);
  }

  /**
   * Greedy over minus signs, digits and dots. Conversion is the parser's job.
   */
  private scanNumber(): Token {
    let text = '';

    while (!this.isAtEnd() && this.isNumberChar(this.peek())) {
      text += this.advance();
    }

    return this.createToken(TokenType.NUMBER, text);
  }

  private scanKeyword(keyword: string, type: TokenType): Token {
    let text = this.advance();

    while (text.length < keyword.length && !this.isAtEnd()) {
      text += this.advance();
    }

    if (text !== keyword) {
      throw new LexError(`Invalid literal: ${text}`);
    }

    return this.createToken(type, keyword);
  }

  private scanNull(): Token {
    if (this.options.strictNull) {
      return this.scanKeyword('null', TokenType.NULL);
    }

    this.advance(); // n
    // The three characters after `n` are dropped without being checked
    for (let i = 0; i < 3 && !this.isAtEnd(); i++) {
      this.advance();
    }

    return this.createToken(TokenType.NULL, 'null');
  }

  private skipWhitespace(): void {
    // Only spaces and newlines; tabs and carriage returns are not whitespace here
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\n') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isNumberChar(char: string): boolean {
    return this.isDigit(char) || char === '-' || char === '.';
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.chunk[this.position];
  }

  private advance(): string {
    const char = this.peek();
    this.position++;
    return char;
  }

  /**
   * Pulls the next non-empty chunk when the current one is used up
   */
  private isAtEnd(): boolean {
    while (this.position >= this.chunk.length) {
      const next = this.chunks.next();
      if (next.done) return true;
      this.chunk = next.value;
      this.position = 0;
    }
    return false;
  }

  private createToken(type: TokenType, value: string): Token {
    return { type, value };
  }
}
