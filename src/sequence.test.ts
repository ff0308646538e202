import { describe, it, expect } from 'vitest';
import { OrderedSequence } from './sequence';

describe('OrderedSequence', () => {
  it('should push and pop at both ends', () => {
    const seq = new OrderedSequence<number>();

    seq.pushBack(2);
    seq.pushFront(1);
    seq.pushBack(3);

    expect(seq.toArray()).toEqual([1, 2, 3]);
    expect(seq.length).toBe(3);
    expect(seq.front()).toBe(1);
    expect(seq.back()).toBe(3);

    expect(seq.popBack()).toBe(3);
    expect(seq.back()).toBe(2);
    expect(seq.popFront()).toBe(1);
    expect(seq.popFront()).toBe(2);
    expect(seq.isEmpty()).toBe(true);
    expect(seq.popFront()).toBeUndefined();
    expect(seq.popBack()).toBeUndefined();
  });

  it('should keep the tail valid after emptying', () => {
    const seq = new OrderedSequence([1]);

    seq.popBack();
    seq.pushBack(5);

    expect(seq.toArray()).toEqual([5]);
    expect(seq.front()).toBe(5);
    expect(seq.back()).toBe(5);
  });

  it('should index from the front', () => {
    const seq = new OrderedSequence(['a', 'b', 'c']);

    expect(seq.at(0)).toBe('a');
    expect(seq.at(2)).toBe('c');
    expect(() => seq.at(3)).toThrow(RangeError);
    expect(() => seq.at(-1)).toThrow(RangeError);
  });

  it('should compare element by element', () => {
    const a = new OrderedSequence([1, 2, 3]);

    expect(a.equals(new OrderedSequence([1, 2, 3]))).toBe(true);
    expect(a.equals(new OrderedSequence([1, 2]))).toBe(false);
    expect(a.equals(new OrderedSequence([1, 2, 4]))).toBe(false);
    expect(
      new OrderedSequence([{ n: 1 }]).equals(new OrderedSequence([{ n: 1 }]), (x, y) => x.n === y.n)
    ).toBe(true);
  });

  it('should clone independently of the source', () => {
    const source = new OrderedSequence([{ n: 1 }]);
    const copy = source.clone(item => ({ ...item }));

    copy.pushBack({ n: 2 });
    copy.at(0).n = 10;

    expect(source.length).toBe(1);
    expect(source.at(0).n).toBe(1);
  });

  it('should move every node and empty the source', () => {
    const source = new OrderedSequence([1, 2]);
    const moved = source.take();

    expect(moved.toArray()).toEqual([1, 2]);
    expect(source.isEmpty()).toBe(true);
    expect(source.length).toBe(0);
  });

  it('should concatenate without touching either side', () => {
    const left = new OrderedSequence([1, 2]);
    const right = new OrderedSequence([3]);

    expect(left.concat(right).toArray()).toEqual([1, 2, 3]);
    expect(left.toArray()).toEqual([1, 2]);
  });

  it('should find the first match', () => {
    const seq = new OrderedSequence([
      { key: 'a', v: 1 },
      { key: 'a', v: 2 },
    ]);

    expect(seq.find(item => item.key === 'a')?.v).toBe(1);
    expect(seq.find(item => item.key === 'b')).toBeUndefined();
  });

  it('should clear all items', () => {
    const seq = new OrderedSequence([1, 2, 3]);

    seq.clear();

    expect(seq.isEmpty()).toBe(true);
    expect(Array.from(seq)).toEqual([]);
  });
});
