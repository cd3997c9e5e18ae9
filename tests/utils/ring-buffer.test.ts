import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../../src/utils/ring-buffer.js';

describe('RingBuffer', () => {
  it('should keep items in insertion order below capacity', () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.size).toBe(2);
    expect(buffer.toArray()).toEqual([1, 2]);
  });

  it('should evict the oldest item once full', () => {
    const buffer = new RingBuffer<number>(3);
    const evicted = [1, 2, 3, 4, 5].map((n) => buffer.push(n));

    expect(evicted).toEqual([false, false, false, true, true]);
    expect(buffer.size).toBe(3);
    expect(buffer.toArray()).toEqual([3, 4, 5]);
  });

  it('should return the newest items oldest first', () => {
    const buffer = new RingBuffer<string>(4);
    for (const item of ['a', 'b', 'c', 'd', 'e']) {
      buffer.push(item);
    }

    expect(buffer.last(2)).toEqual(['d', 'e']);
    expect(buffer.last(10)).toEqual(['b', 'c', 'd', 'e']);
    expect(buffer.last(0)).toEqual([]);
  });

  it('should empty on clear', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);

    buffer.clear();
    buffer.push(9);

    expect(buffer.toArray()).toEqual([9]);
  });

  it('should reject a capacity below one', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrow('RingBuffer capacity must be a positive integer, got 1.5');
  });
});
