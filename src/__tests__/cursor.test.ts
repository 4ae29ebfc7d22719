import { describe, expect, it } from 'vitest';

import { SkipListIterator } from '../engine/cursor.js';
import {
  ForeignIteratorError,
  InvalidDereferenceError,
  OutOfRangeError,
  StaleIteratorError,
} from '../engine/errors.js';
import { SkipList } from '../engine/skip-list.js';

describe('SkipListIterator', () => {
  it('walks the base level in both directions', () => {
    const list = SkipList.from([1, 3, 4], { seed: 123 });
    const cursor = list.begin();

    expect(cursor.value).toBe(1);
    expect(cursor.advance().value).toBe(3);
    expect(cursor.advance().value).toBe(4);
    expect(cursor.advance().isEnd).toBe(true);
    expect(cursor.retreat().value).toBe(4);
    expect(cursor.retreat().retreat().value).toBe(1);
  });

  it('refuses to advance past end and leaves the cursor in place', () => {
    const list = SkipList.from([1]);
    const end = list.end();

    expect(() => end.advance()).toThrow(OutOfRangeError);
    expect(end.equals(list.end())).toBe(true);
  });

  it('refuses to retreat onto the head sentinel', () => {
    const list = SkipList.from([1, 2]);
    const first = list.begin();

    expect(() => first.retreat()).toThrow('cannot retreat before begin');
    expect(first.value).toBe(1);

    const emptyEnd = new SkipList<number>().end();
    expect(() => emptyEnd.retreat()).toThrow(OutOfRangeError);
  });

  it('rejects dereferencing the end position', () => {
    const list = SkipList.from([1]);

    expect(() => list.end().value).toThrow(InvalidDereferenceError);
  });

  it('treats a detached cursor as pointing nowhere', () => {
    const cursor = SkipListIterator.detached<number>();

    expect(cursor.isDetached).toBe(true);
    expect(cursor.isEnd).toBe(false);
    expect(() => cursor.value).toThrow(InvalidDereferenceError);
    expect(() => cursor.advance()).toThrow(OutOfRangeError);
    expect(() => cursor.retreat()).toThrow(OutOfRangeError);
    expect(cursor.equals(SkipListIterator.detached<number>())).toBe(true);
  });

  it('compares by node identity, not by value', () => {
    const list = new SkipList<number>({ seed: 4 });
    const first = list.insert(5);
    const second = list.insert(5);

    expect(first.equals(second)).toBe(false);
    expect(first.value).toBe(second.value);
    expect(list.find(5).equals(second)).toBe(true);
    expect(list.begin().equals(second)).toBe(true);
    expect(list.begin().advance().equals(first)).toBe(true);
  });

  it('clones into an independent cursor', () => {
    const list = SkipList.from([1, 2, 3]);
    const original = list.begin();
    const copy = original.clone();

    copy.advance();

    expect(original.value).toBe(1);
    expect(copy.value).toBe(2);
  });

  it('detects use after the target node is erased', () => {
    const list = SkipList.from([1, 2, 3], { seed: 8 });
    const target = list.find(2);

    list.erase(target);

    expect(() => target.value).toThrow(StaleIteratorError);
    expect(() => target.advance()).toThrow(StaleIteratorError);
    expect(() => list.erase(target)).toThrow(StaleIteratorError);
    expect(list.toArray()).toEqual([1, 3]);
  });

  it('stays stale when the released slot is reused', () => {
    const list = SkipList.from([1, 2]);
    const target = list.find(1);
    const slot = target.slot();

    list.erase(target.clone());
    const replacement = list.insert(7);

    expect(replacement.slot()).toBe(slot);
    expect(replacement.equals(target)).toBe(false);
    expect(() => target.value).toThrow(StaleIteratorError);
    expect(replacement.value).toBe(7);
  });

  it('detects use after clear', () => {
    const list = SkipList.from([4, 5]);
    const first = list.begin();

    list.clear();

    expect(() => first.value).toThrow(StaleIteratorError);
  });

  it('rejects erasing end or a cursor from another list', () => {
    const list = SkipList.from([1, 2]);
    const other = SkipList.from([1, 2]);

    expect(() => list.erase(list.end())).toThrow('cannot erase end iterator');
    expect(() => list.erase(other.begin())).toThrow(ForeignIteratorError);
    expect(() => list.erase(SkipListIterator.detached<number>())).toThrow(ForeignIteratorError);
    expect(list.size).toBe(2);
    expect(other.size).toBe(2);
  });
});
