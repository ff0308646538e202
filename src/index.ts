/**
 * lexitree - JSON-like text to ordered value trees and back
 * Main API entry point
 */

import { Lexer } from './lexer';
import { Parser } from './parser';
import { Serializer } from './serializer';
import { Value } from './value';
import type { ReadonlyValue } from './value';
import { fromNative, toNative } from './native';
import { JsonTreeError } from './types';
import type { ParserOptions, SerializerOptions } from './types';

/**
 * Parse every top-level value in `source`
 */
export function parseAll(source: string, options?: ParserOptions): Value[] {
  try {
    const lexer = new Lexer(source, options);
    const parser = new Parser(lexer, options);
    return parser.parse();
  } catch (error) {
    if (error instanceof JsonTreeError) {
      throw error;
    }
    throw new JsonTreeError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse `source` to a value. With several top-level values the last one is
 * returned; an empty document gives Null.
 */
export function parse(source: string, options?: ParserOptions): Value {
  const values = parseAll(source, options);
  return values.length > 0 ? values[values.length - 1] : Value.null();
}

/**
 * Serialize a value tree to text
 */
export function stringify(value: ReadonlyValue, options?: SerializerOptions): string {
  const serializer = new Serializer(options);
  return serializer.serialize(value);
}

/**
 * Check syntax without keeping the result
 */
export function validate(
  source: string,
  options?: ParserOptions
): { valid: boolean; error?: JsonTreeError } {
  try {
    parseAll(source, options);
    return { valid: true };
  } catch (error) {
    if (error instanceof JsonTreeError) {
      return { valid: false, error };
    }
    return {
      valid: false,
      error: new JsonTreeError(error instanceof Error ? error.message : String(error)),
    };
  }
}

/**
 * Re-render standard JSON text through a value tree
 */
export function fromJSON(json: string, options?: SerializerOptions): string {
  const data: unknown = JSON.parse(json);
  return stringify(fromNative(data), options);
}

/**
 * Parse `source` and render it as indented standard JSON
 */
export function toJSON(source: string, options?: ParserOptions): string {
  const value = parse(source, options);
  return JSON.stringify(toNative(value), null, 2);
}

// Re-export types and classes
export * from './types';
export { Value } from './value';
export type { ReadonlyValue, ValueKind, Member } from './value';
export { OrderedSequence } from './sequence';
export { Lexer } from './lexer';
export type { LexerInput } from './lexer';
export { Parser } from './parser';
export { Serializer } from './serializer';
export { toNative, fromNative } from './native';
export type { NativeValue, NativeArray, NativeObject } from './native';
