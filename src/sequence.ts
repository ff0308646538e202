/**
 * Ordered sequence backing List elements and Object members.
 * A singly linked chain with front and back pointers: O(1) push at either
 * end and pop at the front, O(n) pop at the back and indexed access.
 */

interface Node<T> {
  value: T;
  next: Node<T> | null;
}

export class OrderedSequence<T> implements Iterable<T> {
  private head: Node<T> | null = null;
  private tail: Node<T> | null = null;
  private count: number = 0;

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.pushBack(item);
    }
  }

  public get length(): number {
    return this.count;
  }

  public isEmpty(): boolean {
    return this.head === null;
  }

  public pushFront(value: T): void {
    const node: Node<T> = { value, next: this.head };
    this.head = node;
    if (this.tail === null) {
      this.tail = node;
    }
    this.count++;
  }

  public pushBack(value: T): void {
    const node: Node<T> = { value, next: null };
    if (this.tail === null) {
      this.head = node;
    } else {
      this.tail.next = node;
    }
    this.tail = node;
    this.count++;
  }

  public popFront(): T | undefined {
    const node = this.head;
    if (node === null) return undefined;

    this.head = node.next;
    if (this.head === null) {
      this.tail = null;
    }
    this.count--;
    return node.value;
  }

  /**
   * Walks to the node before the tail, so this is linear
   */
  public popBack(): T | undefined {
    const last = this.tail;
    if (last === null) return undefined;
    if (this.head === last) return this.popFront();

    let prev = this.head;
    while (prev !== null && prev.next !== last) {
      prev = prev.next;
    }
    if (prev !== null) {
      prev.next = null;
    }
    this.tail = prev;
    this.count--;
    return last.value;
  }

  public front(): T | undefined {
    return this.head?.value;
  }

  public back(): T | undefined {
    return this.tail?.value;
  }

  public at(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new RangeError(`Index out of range: ${index} (length ${this.count})`);
    }

    let node = this.head;
    for (let i = 0; i < index && node !== null; i++) {
      node = node.next;
    }
    if (node === null) {
      throw new RangeError(`Index out of range: ${index} (length ${this.count})`);
    }
    return node.value;
  }

  public find(predicate: (value: T) => boolean): T | undefined {
    for (let node = this.head; node !== null; node = node.next) {
      if (predicate(node.value)) return node.value;
    }
    return undefined;
  }

  public clear(): void {
    this.head = null;
    this.tail = null;
    this.count = 0;
  }

  public equals(
    other: OrderedSequence<T>,
    eq: (a: T, b: T) => boolean = Object.is
  ): boolean {
    if (this.count !== other.count) return false;

    let a = this.head;
    let b = other.head;
    while (a !== null && b !== null) {
      if (!eq(a.value, b.value)) return false;
      a = a.next;
      b = b.next;
    }
    return a === null && b === null;
  }

  /**
   * Structural copy. Items are shared unless `copyItem` copies them.
   */
  public clone(copyItem: (value: T) => T = item => item): OrderedSequence<T> {
    const copy = new OrderedSequence<T>();
    for (let node = this.head; node !== null; node = node.next) {
      copy.pushBack(copyItem(node.value));
    }
    return copy;
  }

  /**
   * Hands every node to a new sequence and leaves this one empty
   */
  public take(): OrderedSequence<T> {
    const moved = new OrderedSequence<T>();
    moved.head = this.head;
    moved.tail = this.tail;
    moved.count = this.count;
    this.clear();
    return moved;
  }

  /**
   * New sequence holding this sequence's items followed by `other`'s
   */
  public concat(other: Iterable<T>): OrderedSequence<T> {
    const result = this.clone();
    for (const item of other) {
      result.pushBack(item);
    }
    return result;
  }

  public toArray(): T[] {
    return Array.from(this);
  }

  public *[Symbol.iterator](): Iterator<T> {
    for (let node = this.head; node !== null; node = node.next) {
      yield node.value;
    }
  }
}
