import { describe, it, expect } from 'vitest';
import { toNative, fromNative } from './native';
import { Value } from './value';
import { TypeMismatchError } from './types';

describe('native conversion', () => {
  it('should convert scalars both ways', () => {
    expect(toNative(Value.null())).toBe(null);
    expect(toNative(Value.bool(false))).toBe(false);
    expect(toNative(Value.number(1.5))).toBe(1.5);
    expect(toNative(Value.string('s'))).toBe('s');

    expect(fromNative(null).isNull()).toBe(true);
    expect(fromNative(true).getBool()).toBe(true);
    expect(fromNative(3).getNumber()).toBe(3);
    expect(fromNative('x').getString()).toBe('x');
  });

  it('should convert nested data', () => {
    const data = { name: 'box', sizes: [1, 2], meta: { open: true, tag: null } };
    const value = fromNative(data);

    expect(Array.from(value.members(), ([key]) => key)).toEqual(['name', 'sizes', 'meta']);
    expect(value.find('sizes').getList().at(1).getNumber()).toBe(2);
    expect(toNative(value)).toEqual(data);
  });

  it('should keep the first of duplicated keys', () => {
    const object = Value.object();
    object.insert('k', Value.number(1));
    object.insert('k', Value.number(2));

    expect(toNative(object)).toEqual({ k: 2 });
  });

  it('should reject values with no document form', () => {
    expect(() => fromNative(undefined)).toThrow(TypeMismatchError);
    expect(() => fromNative(() => 1)).toThrow(TypeMismatchError);
    expect(() => fromNative([1, 10n])).toThrow(TypeMismatchError);
  });
});
