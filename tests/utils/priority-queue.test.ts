import { describe, it, expect } from 'vitest';
import { PriorityQueue } from '@/utils/priority-queue.js';

describe('PriorityQueue', () => {
  const numbers = () => new PriorityQueue<number>((a, b) => a - b);

  it('should pop entries in ascending order', () => {
    const queue = numbers();
    for (const n of [5, 1, 4, 1, 3, 9, 2, 6]) {
      queue.push(n);
    }

    const popped: number[] = [];
    for (let n = queue.pop(); n !== undefined; n = queue.pop()) {
      popped.push(n);
    }

    expect(popped).toEqual([1, 1, 2, 3, 4, 5, 6, 9]);
  });

  it('should return undefined when empty', () => {
    const queue = numbers();

    expect(queue.isEmpty()).toBe(true);
    expect(queue.pop()).toBeUndefined();
    expect(queue.peek()).toBeUndefined();
  });

  it('should peek without removing', () => {
    const queue = numbers();
    queue.push(3);
    queue.push(2);

    expect(queue.peek()).toBe(2);
    expect(queue.size).toBe(2);
  });

  it('should break ties with the comparator', () => {
    const queue = new PriorityQueue<{ d: number; id: string }>((a, b) =>
      a.d !== b.d ? a.d - b.d : a.id.localeCompare(b.id)
    );
    queue.push({ d: 1, id: 'c' });
    queue.push({ d: 1, id: 'a' });
    queue.push({ d: 0, id: 'z' });

    expect(queue.pop()?.id).toBe('z');
    expect(queue.pop()?.id).toBe('a');
    expect(queue.pop()?.id).toBe('c');
  });

  it('should clear all entries', () => {
    const queue = numbers();
    queue.push(1);
    queue.clear();

    expect(queue.size).toBe(0);
  });
});
