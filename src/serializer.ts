/**
 * lexitree Serializer - renders a value tree as text
 * Two layouts:
 * - json: quoted strings and keys, optionally indented; text is written raw, as the lexer reads it
 * - legacy: unquoted strings and a separator after every entry, e.g. `[ 1, 2, ] `
 */

import { SerializeError } from './types';
import type { SerializerOptions } from './types';
import type { ReadonlyValue } from './value';

export class Serializer {
  private options: Required<SerializerOptions>;
  private indentStr: string;

  constructor(options: SerializerOptions = {}) {
    this.options = {
      format: options.format ?? 'json',
      indent: options.indent ?? 0,
      sortKeys: options.sortKeys ?? false,
    };
    this.indentStr = ' '.repeat(this.options.indent);
  }

  /**
   * Serialize a value tree to a string
   */
  public serialize(value: ReadonlyValue): string {
    return this.options.format === 'legacy'
      ? this.serializeLegacy(value)
      : this.serializeJson(value, 0);
  }

  private serializeLegacy(value: ReadonlyValue): string {
    switch (value.kind) {
      case 'null':
        return 'null';
      case 'bool':
        return value.getBool() ? 'true' : 'false';
      case 'number':
        return formatNumber(value.getNumber());
      case 'string':
        return value.getString();
      case 'list': {
        let result = '[ ';
        for (const item of value.items()) {
          result += this.serializeLegacy(item) + ', ';
        }
        return result + '] ';
      }
      case 'object': {
        let result = '{ ';
        for (const [key, member] of this.orderedMembers(value)) {
          result += key + ':' + this.serializeLegacy(member) + ', ';
        }
        return result + '} ';
      }
    }
  }

  private serializeJson(value: ReadonlyValue, level: number): string {
    switch (value.kind) {
      case 'null':
        return 'null';
      case 'bool':
        return value.getBool() ? 'true' : 'false';
      case 'number':
        return this.serializeNumber(value.getNumber());
      case 'string':
        return this.quote(value.getString());
      case 'list': {
        const items = Array.from(value.items(), item => this.serializeJson(item, level + 1));
        return this.wrap('[', ']', items, level);
      }
      case 'object': {
        const separator = this.options.indent > 0 ? ': ' : ':';
        const members = this.orderedMembers(value).map(
          ([key, member]) => this.quote(key) + separator + this.serializeJson(member, level + 1)
        );
        return this.wrap('{', '}', members, level);
      }
    }
  }

  private serializeNumber(value: number): string {
    if (!isFinite(value)) {
      throw new SerializeError(`Cannot serialize non-finite number: ${value}`);
    }
    return formatNumber(value);
  }

  private quote(text: string): string {
    if (text.includes('"')) {
      throw new SerializeError(`Cannot serialize text containing a double quote: ${text}`);
    }
    return '"' + text + '"';
  }

  private wrap(open: string, close: string, entries: string[], level: number): string {
    if (entries.length === 0) {
      return open + close;
    }
    if (this.options.indent === 0) {
      return open + entries.join(',') + close;
    }

    const inner = '\n' + this.indentStr.repeat(level + 1);
    return open + inner + entries.join(',' + inner) + '\n' + this.indentStr.repeat(level) + close;
  }

  private orderedMembers(value: ReadonlyValue): (readonly [string, ReadonlyValue])[] {
    const members = Array.from(value.members());
    if (this.options.sortKeys) {
      members.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    }
    return members;
  }
}

/**
 * Render a number in plain decimal notation, since the lexer reads no exponents
 */
export function formatNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
