/**
 * Conversion between value trees and plain JavaScript data
 */

import { TypeMismatchError } from './types';
import { Value } from './value';
import type { ReadonlyValue } from './value';

export type NativeValue = null | boolean | number | string | NativeArray | NativeObject;

export interface NativeArray extends Array<NativeValue> {}

export interface NativeObject {
  [key: string]: NativeValue;
}

/**
 * Plain data for a value tree. When an object repeats a key, the member found
 * first in iteration order wins, as with keyed lookup.
 */
export function toNative(value: ReadonlyValue): NativeValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return value.getBool();
    case 'number':
      return value.getNumber();
    case 'string':
      return value.getString();
    case 'list':
      return Array.from(value.items(), item => toNative(item));
    case 'object': {
      const result: NativeObject = {};
      for (const [key, member] of value.members()) {
        if (!Object.prototype.hasOwnProperty.call(result, key)) {
          result[key] = toNative(member);
        }
      }
      return result;
    }
  }
}

/**
 * Value tree for plain data; object members follow `Object.keys` order
 */
export function fromNative(data: unknown): Value {
  if (data === null) {
    return Value.null();
  }

  switch (typeof data) {
    case 'boolean':
      return Value.bool(data);
    case 'number':
      return Value.number(data);
    case 'string':
      return Value.string(data);
    case 'object': {
      if (Array.isArray(data)) {
        const list = Value.list();
        for (const item of data) {
          list.getList().pushBack(fromNative(item));
        }
        return list;
      }

      const object = Value.object();
      for (const [key, member] of Object.entries(data)) {
        object.getObject().pushBack({ key, value: fromNative(member) });
      }
      return object;
    }
    default:
      throw new TypeMismatchError('null, boolean, number, string, array or object', typeof data);
  }
}
