import { expect } from 'vitest';

import { naturalOrder, type Compare } from '../engine/compare.js';
import { NIL } from '../engine/node-arena.js';
import { MAX_LEVEL, type SkipList } from '../engine/skip-list.js';

/**
 * Walks the raw node graph and checks ordering, level chains, back links,
 * the element count and the number of live slots.
 */
export function expectConsistent<T>(list: SkipList<T>, compare: Compare<T> = naturalOrder): void {
  const allocator = list.getAllocator();
  const tail = list.end().slot();

  let head = tail;
  while (allocator.get(head).back !== NIL) {
    head = allocator.get(head).back;
  }

  const base: number[] = [];
  for (let cursor = allocator.get(head).forward[0]; cursor !== tail; cursor = allocator.get(cursor).forward[0]) {
    base.push(cursor);
  }
  expect(base.length).toBe(list.size);
  expect(allocator.liveCount).toBe(list.size + 2);

  let previous = head;
  for (const index of base) {
    expect(allocator.get(index).back).toBe(previous);
    previous = index;
  }
  expect(allocator.get(tail).back).toBe(previous);

  for (let i = 1; i < base.length; i += 1) {
    const left = allocator.get(base[i - 1]).entry;
    const right = allocator.get(base[i]).entry;
    if (left === undefined || right === undefined) {
      throw new Error('sentinel found on the base chain');
    }
    expect(compare(left.value, right.value)).toBeLessThanOrEqual(0);
  }

  for (let level = 0; level < MAX_LEVEL; level += 1) {
    const expected = base.filter((index) => allocator.get(index).level > level);
    const actual: number[] = [];
    for (
      let cursor = allocator.get(head).forward[level];
      cursor !== tail;
      cursor = allocator.get(cursor).forward[level]
    ) {
      actual.push(cursor);
    }
    expect(actual).toEqual(expected);
  }
}
