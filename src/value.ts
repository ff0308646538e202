/**
 * Document value model - one tagged variant per node
 */

import { OrderedSequence } from './sequence';
import { NotFoundError, TypeMismatchError } from './types';

export type ValueKind = 'null' | 'bool' | 'number' | 'string' | 'list' | 'object';

/**
 * Object member. Duplicate keys are kept as separate members.
 */
export interface Member {
  key: string;
  value: Value;
}

type Payload =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'list'; items: OrderedSequence<Value> }
  | { kind: 'object'; members: OrderedSequence<Member> };

/**
 * Read-only view of a value. Keyed lookup through this view never inserts.
 */
export interface ReadonlyValue {
  readonly kind: ValueKind;
  readonly size: number;
  isNull(): boolean;
  isBool(): boolean;
  isNumber(): boolean;
  isString(): boolean;
  isList(): boolean;
  isObject(): boolean;
  getBool(): boolean;
  getNumber(): number;
  getString(): string;
  find(key: string): ReadonlyValue;
  has(key: string): boolean;
  items(): Iterable<ReadonlyValue>;
  members(): Iterable<readonly [string, ReadonlyValue]>;
  equals(other: ReadonlyValue): boolean;
  clone(): Value;
}

const NULL_PAYLOAD: Payload = { kind: 'null' };

export class Value implements ReadonlyValue {
  private payload: Payload = NULL_PAYLOAD;

  public static null(): Value {
    return new Value();
  }

  public static bool(value: boolean): Value {
    const result = new Value();
    result.setBool(value);
    return result;
  }

  public static number(value: number): Value {
    const result = new Value();
    result.setNumber(value);
    return result;
  }

  public static string(value: string): Value {
    const result = new Value();
    result.setString(value);
    return result;
  }

  public static list(items: Iterable<Value> = []): Value {
    const result = new Value();
    result.setList();
    for (const item of items) {
      result.pushBack(item);
    }
    return result;
  }

  /**
   * Members are appended in the order given
   */
  public static object(members: Iterable<readonly [string, Value]> = []): Value {
    const result = new Value();
    result.setObject();
    for (const [key, value] of members) {
      result.append(key, value);
    }
    return result;
  }

  public get kind(): ValueKind {
    return this.payload.kind;
  }

  /**
   * Element count of a List or member count of an Object
   */
  public get size(): number {
    switch (this.payload.kind) {
      case 'list':
        return this.payload.items.length;
      case 'object':
        return this.payload.members.length;
      default:
        throw new TypeMismatchError('list or object', this.payload.kind);
    }
  }

  public isNull(): boolean {
    return this.payload.kind === 'null';
  }

  public isBool(): boolean {
    return this.payload.kind === 'bool';
  }

  public isNumber(): boolean {
    return this.payload.kind === 'number';
  }

  public isString(): boolean {
    return this.payload.kind === 'string';
  }

  public isList(): boolean {
    return this.payload.kind === 'list';
  }

  public isObject(): boolean {
    return this.payload.kind === 'object';
  }

  public getBool(): boolean {
    if (this.payload.kind !== 'bool') {
      throw new TypeMismatchError('bool', this.payload.kind);
    }
    return this.payload.value;
  }

  public getNumber(): number {
    if (this.payload.kind !== 'number') {
      throw new TypeMismatchError('number', this.payload.kind);
    }
    return this.payload.value;
  }

  public getString(): string {
    if (this.payload.kind !== 'string') {
      throw new TypeMismatchError('string', this.payload.kind);
    }
    return this.payload.value;
  }

  /**
   * Live element sequence; items pushed here are adopted without copying
   */
  public getList(): OrderedSequence<Value> {
    if (this.payload.kind !== 'list') {
      throw new TypeMismatchError('list', this.payload.kind);
    }
    return this.payload.items;
  }

  /**
   * Live member sequence; members pushed here are adopted without copying
   */
  public getObject(): OrderedSequence<Member> {
    if (this.payload.kind !== 'object') {
      throw new TypeMismatchError('object', this.payload.kind);
    }
    return this.payload.members;
  }

  // Each setter replaces the whole payload, so the previous variant is released first.

  public setNull(): void {
    this.payload = NULL_PAYLOAD;
  }

  public setBool(value: boolean): void {
    this.payload = { kind: 'bool', value };
  }

  public setNumber(value: number): void {
    this.payload = { kind: 'number', value };
  }

  public setString(value: string): void {
    this.payload = { kind: 'string', value };
  }

  public setList(): void {
    this.payload = { kind: 'list', items: new OrderedSequence<Value>() };
  }

  public setObject(): void {
    this.payload = { kind: 'object', members: new OrderedSequence<Member>() };
  }

  /**
   * Prepends a copy of `value` to a List
   */
  public pushFront(value: ReadonlyValue): void {
    this.getList().pushFront(value.clone());
  }

  /**
   * Appends a copy of `value` to a List
   */
  public pushBack(value: ReadonlyValue): void {
    this.getList().pushBack(value.clone());
  }

  /**
   * Adds a copy of `value` at the front of an Object's members, so members
   * iterate in reverse insertion order.
   */
  public insert(key: string, value: ReadonlyValue): void {
    this.getObject().pushFront({ key, value: value.clone() });
  }

  /**
   * Adds a copy of `value` at the back of an Object's members
   */
  public append(key: string, value: ReadonlyValue): void {
    this.getObject().pushBack({ key, value: value.clone() });
  }

  /**
   * First member named `key`; when there is none, a Null member is appended
   * and returned so the caller can fill it in.
   */
  public get(key: string): Value {
    const members = this.getObject();
    const found = members.find(member => member.key === key);
    if (found) {
      return found.value;
    }

    const slot = new Value();
    members.pushBack({ key, value: slot });
    return slot;
  }

  /**
   * First member named `key`, or NotFoundError
   */
  public find(key: string): Value {
    const found = this.getObject().find(member => member.key === key);
    if (!found) {
      throw new NotFoundError(key);
    }
    return found.value;
  }

  public has(key: string): boolean {
    return this.getObject().find(member => member.key === key) !== undefined;
  }

  public *items(): IterableIterator<Value> {
    yield* this.getList();
  }

  public *members(): IterableIterator<readonly [string, Value]> {
    for (const member of this.getObject()) {
      yield [member.key, member.value] as const;
    }
  }

  /**
   * Deep copy; nested lists and objects share nothing with the source
   */
  public clone(): Value {
    const copy = new Value();
    copy.assign(this);
    return copy;
  }

  /**
   * Replaces this value with a deep copy of `other`
   */
  public assign(other: ReadonlyValue): void {
    if (other === this) return;

    switch (other.kind) {
      case 'null':
        this.setNull();
        break;
      case 'bool':
        this.setBool(other.getBool());
        break;
      case 'number':
        this.setNumber(other.getNumber());
        break;
      case 'string':
        this.setString(other.getString());
        break;
      case 'list': {
        const items = new OrderedSequence<Value>();
        for (const item of other.items()) {
          items.pushBack(item.clone());
        }
        this.payload = { kind: 'list', items };
        break;
      }
      case 'object': {
        const members = new OrderedSequence<Member>();
        for (const [key, value] of other.members()) {
          members.pushBack({ key, value: value.clone() });
        }
        this.payload = { kind: 'object', members };
        break;
      }
    }
  }

  /**
   * Moves the payload into a new value and leaves this one Null
   */
  public take(): Value {
    const moved = new Value();
    moved.payload = this.payload;
    this.payload = NULL_PAYLOAD;
    return moved;
  }

  /**
   * Deep structural equality; member order is significant
   */
  public equals(other: ReadonlyValue): boolean {
    if (other === this) return true;
    if (other.kind !== this.payload.kind) return false;

    switch (this.payload.kind) {
      case 'null':
        return true;
      case 'bool':
        return this.payload.value === other.getBool();
      case 'number':
        return Object.is(this.payload.value, other.getNumber());
      case 'string':
        return this.payload.value === other.getString();
      case 'list': {
        const theirs = Array.from(other.items());
        if (theirs.length !== this.payload.items.length) return false;
        let i = 0;
        for (const item of this.payload.items) {
          if (!item.equals(theirs[i++])) return false;
        }
        return true;
      }
      case 'object': {
        const theirs = Array.from(other.members());
        if (theirs.length !== this.payload.members.length) return false;
        let i = 0;
        for (const member of this.payload.members) {
          const [key, value] = theirs[i++];
          if (member.key !== key || !member.value.equals(value)) return false;
        }
        return true;
      }
    }
  }
}
