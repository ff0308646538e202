/**
 * lexitree Parser - recursive descent, one routine per nonterminal
 * Pulls one token at a time; no lookahead beyond the token in hand
 */

import { TokenType, ParseError } from './types';
import type { Token, TokenSource, ParserOptions } from './types';
import { Value } from './value';

/**
 * Replays a token array, then EOF forever
 */
class TokenArraySource implements TokenSource {
  private current: number = 0;

  constructor(private readonly tokens: Token[]) {}

  public nextToken(): Token {
    if (this.current >= this.tokens.length) {
      return { type: TokenType.EOF, value: '' };
    }
    return this.tokens[this.current++];
  }
}

export class Parser {
  private source: TokenSource;
  private depth: number = 0;
  private options: Required<Omit<ParserOptions, 'strictNull'>>;

  constructor(source: TokenSource | Token[], options: ParserOptions = {}) {
    this.source = Array.isArray(source) ? new TokenArraySource(source) : source;
    this.options = {
      memberOrder: options.memberOrder ?? 'prepend',
      allowTrailingComma: options.allowTrailingComma ?? true,
      maxDepth: options.maxDepth ?? Infinity,
    };
  }

  /**
   * Parse every top-level value until end of input
   */
  public parse(): Value[] {
    const values: Value[] = [];

    for (;;) {
      const value = this.parseValueFrom(this.advance());
      if (value === null) break;
      values.push(value);
    }

    return values;
  }

  /**
   * Build the value that starts with `token`; null at end of input
   */
  public parseValueFrom(token: Token): Value | null {
    switch (token.type) {
      case TokenType.OPEN_BRACE:
        return this.parseObject();
      case TokenType.OPEN_BRACKET:
        return this.parseList();
      case TokenType.STRING:
      case TokenType.NUMBER:
      case TokenType.BOOLEAN:
      case TokenType.NULL:
        return this.tokenToLiteral(token);
      case TokenType.EOF:
        return null;
      default:
        throw new ParseError(`Invalid document: unexpected ${this.describe(token)}`);
    }
  }

  /**
   * Members until the matching `}`. The opening brace is already consumed.
   */
  private parseObject(): Value {
    this.enter();

    const object = Value.object();
    const members = object.getObject();

    let pendingKey: string | null = null;
    let colonSeen = false;
    let commaSeen = false;
    let first = true;

    let token = this.advance();
    while (token.type !== TokenType.CLOSE_BRACE) {
      switch (token.type) {
        case TokenType.STRING:
        case TokenType.NUMBER:
        case TokenType.BOOLEAN:
        case TokenType.NULL:
        case TokenType.OPEN_BRACE:
        case TokenType.OPEN_BRACKET:
          if (pendingKey === null) {
            if (token.type === TokenType.OPEN_BRACE || token.type === TokenType.OPEN_BRACKET) {
              throw new ParseError(`Expected a key, found ${this.describe(token)}`);
            }
            // Any literal text works as a key
            pendingKey = token.value;
          } else if (!colonSeen) {
            throw new ParseError(`Missing colon after key "${pendingKey}"`);
          } else {
            this.checkSeparator(first, commaSeen, 'members');
            const value = this.parseMemberValue(token);
            if (this.options.memberOrder === 'append') {
              members.pushBack({ key: pendingKey, value });
            } else {
              members.pushFront({ key: pendingKey, value });
            }
            pendingKey = null;
            colonSeen = false;
            commaSeen = false;
            first = false;
          }
          break;

        case TokenType.COLON:
          if (pendingKey === null || colonSeen) {
            throw new ParseError('Unexpected colon');
          }
          colonSeen = true;
          break;

        case TokenType.COMMA:
          if (pendingKey !== null) {
            throw new ParseError(`Missing value for key "${pendingKey}"`);
          }
          if (first) {
            throw new ParseError('Unexpected leading comma in object');
          }
          if (commaSeen) {
            throw new ParseError('Unexpected comma in object');
          }
          commaSeen = true;
          break;

        case TokenType.EOF:
          throw new ParseError('Unterminated object');

        default:
          throw new ParseError(`Unexpected ${this.describe(token)} in object`);
      }

      token = this.advance();
    }

    if (pendingKey !== null) {
      throw new ParseError(`Missing value for key "${pendingKey}"`);
    }
    if (commaSeen && !this.options.allowTrailingComma) {
      throw new ParseError('Trailing comma in object');
    }

    this.depth--;
    return object;
  }

  /**
   * Elements until the matching `]`, appended in encounter order
   */
  private parseList(): Value {
    this.enter();

    const list = Value.list();
    const items = list.getList();

    let commaSeen = false;
    let first = true;

    let token = this.advance();
    while (token.type !== TokenType.CLOSE_BRACKET) {
      switch (token.type) {
        case TokenType.STRING:
        case TokenType.NUMBER:
        case TokenType.BOOLEAN:
        case TokenType.NULL:
        case TokenType.OPEN_BRACE:
        case TokenType.OPEN_BRACKET:
          this.checkSeparator(first, commaSeen, 'elements');
          items.pushBack(this.parseMemberValue(token));
          commaSeen = false;
          first = false;
          break;

        case TokenType.COMMA:
          if (first) {
            throw new ParseError('Unexpected leading comma in list');
          }
          if (commaSeen) {
            throw new ParseError('Unexpected comma in list');
          }
          commaSeen = true;
          break;

        case TokenType.EOF:
          throw new ParseError('Unterminated list');

        default:
          throw new ParseError(`Unexpected ${this.describe(token)} in list`);
      }

      token = this.advance();
    }

    if (commaSeen && !this.options.allowTrailingComma) {
      throw new ParseError('Trailing comma in list');
    }

    this.depth--;
    return list;
  }

  /**
   * Every entry after the first needs a comma before it
   */
  private checkSeparator(first: boolean, commaSeen: boolean, what: string): void {
    if (!first && !commaSeen) {
      throw new ParseError(`Missing comma between ${what}`);
    }
  }

  private parseMemberValue(token: Token): Value {
    const value = this.parseValueFrom(token);
    if (value === null) {
      throw new ParseError('Unexpected end of input');
    }
    return value;
  }

  /**
   * Convert a literal token to a leaf value
   */
  private tokenToLiteral(token: Token): Value {
    switch (token.type) {
      case TokenType.NULL:
        return Value.null();

      case TokenType.BOOLEAN:
        return Value.bool(token.value === 'true');

      case TokenType.NUMBER: {
        const number = Number(token.value);
        if (!Number.isFinite(number)) {
          throw new ParseError(`Invalid number: ${token.value}`);
        }
        return Value.number(number);
      }

      case TokenType.STRING:
      default:
        return Value.string(token.value);
    }
  }

  private enter(): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw new ParseError(`Maximum nesting depth exceeded: ${this.options.maxDepth}`);
    }
  }

  private advance(): Token {
    return this.source.nextToken();
  }

  private describe(token: Token): string {
    return token.type === TokenType.EOF ? 'end of input' : `'${token.value}'`;
  }
}
