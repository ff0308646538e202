/**
 * Core lexitree type definitions
 */

/**
 * Token types for lexical analysis
 */
export enum TokenType {
  // Literals
  NULL = 'NULL',
  BOOLEAN = 'BOOLEAN',
  NUMBER = 'NUMBER',
  STRING = 'STRING',

  // Delimiters
  COLON = 'COLON', // :
  COMMA = 'COMMA', // ,
  OPEN_BRACE = 'OPEN_BRACE', // {
  CLOSE_BRACE = 'CLOSE_BRACE', // }
  OPEN_BRACKET = 'OPEN_BRACKET', // [
  CLOSE_BRACKET = 'CLOSE_BRACKET', // ]

  // Special
  EOF = 'EOF',
}

/**
 * Lexical unit. Tokens carry no position; they are consumed and dropped by the parser.
 */
export interface Token {
  type: TokenType;
  value: string;
}

/**
 * Pull-based token source with no lookahead beyond the token returned
 */
export interface TokenSource {
  nextToken(): Token;
}

/**
 * Lexer options
 */
export interface LexerOptions {
  /** Require `null` to be spelled out; otherwise `n` and any three characters read as null */
  strictNull?: boolean;
}

/**
 * Parser options
 */
export interface ParserOptions extends LexerOptions {
  /** Where parsed object members go; `prepend` iterates in reverse source order */
  memberOrder?: 'prepend' | 'append';
  /** Accept a comma right before `]` or `}` */
  allowTrailingComma?: boolean;
  /** Maximum nesting depth; unlimited when unset */
  maxDepth?: number;
}

/**
 * Serializer options
 */
export interface SerializerOptions {
  /** `legacy` reproduces the unquoted, trailing-separator layout */
  format?: 'legacy' | 'json';
  /** Indentation (spaces), json format only */
  indent?: number;
  /** Sort object keys */
  sortKeys?: boolean;
}

export type ErrorKind =
  | 'LexError'
  | 'ParseError'
  | 'TypeMismatch'
  | 'NotFound'
  | 'SerializeError'
  | 'Error';

/**
 * Base error for everything the library raises
 */
export class JsonTreeError extends Error {
  public readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind = 'Error') {
    super(message);
    this.name = 'JsonTreeError';
    this.kind = kind;
    Object.setPrototypeOf(this, JsonTreeError.prototype);
  }

  public toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * Unrecognized character or malformed keyword literal
 */
export class LexError extends JsonTreeError {
  constructor(
    message: string,
    public readonly character?: string
  ) {
    super(message, 'LexError');
    this.name = 'LexError';
    Object.setPrototypeOf(this, LexError.prototype);
  }
}

/**
 * Grammar violation or unconvertible number literal
 */
export class ParseError extends JsonTreeError {
  constructor(message: string) {
    super(message, 'ParseError');
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Accessor used on a value of another variant
 */
export class TypeMismatchError extends JsonTreeError {
  constructor(
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Expected ${expected}, found ${actual}`, 'TypeMismatch');
    this.name = 'TypeMismatchError';
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

/**
 * Read-only keyed lookup of an absent key
 */
export class NotFoundError extends JsonTreeError {
  constructor(public readonly key: string) {
    super(`Key not found: ${key}`, 'NotFound');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Value the chosen output format cannot render
 */
export class SerializeError extends JsonTreeError {
  constructor(message: string) {
    super(message, 'SerializeError');
    this.name = 'SerializeError';
    Object.setPrototypeOf(this, SerializeError.prototype);
  }
}

