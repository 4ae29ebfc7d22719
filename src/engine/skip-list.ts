import type { Logger } from '../logging/logger.js';
import type { SkipListMetrics } from '../metrics/registry.js';
import { XorShift32, type RandomSource } from '../utils/prng.js';
import { naturalOrder, type Compare } from './compare.js';
import { SkipListIterator } from './cursor.js';
import {
  ForeignIteratorError,
  InvalidArgumentError,
  InvariantViolationError,
  OutOfRangeError,
} from './errors.js';
import { NodeArena, type NodeAllocator } from './node-arena.js';

export const MAX_LEVEL = 32;
export const LEVEL_PROBABILITY = 0.5;

export interface SkipListOptions<T> {
  compare?: Compare<T>;
  /** Seed for the default level generator. Ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  createAllocator?: () => NodeAllocator<T>;
  logger?: Logger;
  metrics?: SkipListMetrics;
  /** Label used in metrics and log lines. */
  name?: string;
}

/**
 * Everything `swap` and `moveFrom` exchange. Observability (name, logger,
 * metrics) stays with the container instance.
 */
interface ListState<T> {
  allocator: NodeAllocator<T>;
  head: number;
  tail: number;
  size: number;
  compare: Compare<T>;
  random: RandomSource;
  createAllocator: () => NodeAllocator<T>;
}

function createState<T>(
  compare: Compare<T>,
  random: RandomSource,
  createAllocator: () => NodeAllocator<T>
): ListState<T> {
  const allocator = createAllocator();
  const head = allocator.allocate(MAX_LEVEL);
  const tail = allocator.allocate(MAX_LEVEL);

  allocator.get(head).forward.fill(tail);
  allocator.get(tail).back = head;

  return { allocator, head, tail, size: 0, compare, random, createAllocator };
}

/**
 * Ordered multiset backed by a probabilistic multi-level linked list.
 *
 * Search, insert and erase each run one top-to-bottom descent and take
 * expected O(log n). A new value goes in front of the equal values already
 * stored, so equal values come out newest first. Positions are exposed as
 * {@link SkipListIterator} cursors over the base level.
 */
export class SkipList<T> implements Iterable<T> {
  private state: ListState<T>;

  private readonly name: string;
  private readonly logger?: Logger;
  private readonly metrics?: SkipListMetrics;

  constructor(options: SkipListOptions<T> = {}) {
    this.name = options.name ?? 'default';
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.state = createState<T>(
      options.compare ?? naturalOrder,
      options.random ?? new XorShift32(options.seed ?? 1),
      options.createAllocator ?? (() => new NodeArena<T>())
    );
  }

  static from<T>(values: Iterable<T>, options: SkipListOptions<T> = {}): SkipList<T> {
    const list = new SkipList<T>(options);
    for (const value of values) {
      list.insert(value);
    }

    return list;
  }

  /** Move construction: the new list takes over `source`'s nodes and `source` is left empty. */
  static take<T>(source: SkipList<T>): SkipList<T> {
    const list = new SkipList<T>({
      createAllocator: source.state.createAllocator,
      logger: source.logger,
      metrics: source.metrics,
      name: source.name,
    });
    return list.moveFrom(source);
  }

  get size(): number {
    return this.state.size;
  }

  isEmpty(): boolean {
    return this.state.size === 0;
  }

  getAllocator(): NodeAllocator<T> {
    return this.state.allocator;
  }

  begin(): SkipListIterator<T> {
    const { allocator, head } = this.state;
    return this.iteratorAt(allocator.get(head).forward[0]);
  }

  end(): SkipListIterator<T> {
    return this.iteratorAt(this.state.tail);
  }

  insert(value: T): SkipListIterator<T> {
    return this.link(value);
  }

  /**
   * Builds the value from `args` before touching the graph, so a throwing
   * constructor leaves the list unchanged.
   */
  emplace<A extends unknown[]>(construct: (...args: A) => T, ...args: A): SkipListIterator<T> {
    const value = construct(...args);
    return this.link(value);
  }

  pushFront(value: T): SkipListIterator<T> {
    return this.insert(value);
  }

  pushBack(value: T): SkipListIterator<T> {
    return this.insert(value);
  }

  /** Most recently inserted element equal to `value`, or `end()`. */
  find(value: T): SkipListIterator<T> {
    const { allocator, tail, compare } = this.state;
    const cursor = this.descend(value);
    const candidate = allocator.get(cursor).forward[0];

    if (candidate !== tail && compare(this.valueAt(candidate), value) === 0) {
      return this.iteratorAt(candidate);
    }

    return this.end();
  }

  contains(value: T): boolean {
    return !this.find(value).equals(this.end());
  }

  /**
   * Removes the element under `position` and returns a cursor to its former
   * successor. Cursors to the erased element become stale.
   */
  erase(position: SkipListIterator<T>): SkipListIterator<T> {
    const { allocator, head, tail } = this.state;
    if (!position.belongsTo(allocator)) {
      throw new ForeignIteratorError('iterator belongs to a different skip list');
    }

    const index = position.slot();
    if (index === tail || index === head) {
      throw new OutOfRangeError('cannot erase end iterator');
    }

    const node = allocator.get(index);
    const update = this.predecessorsOf(index);

    for (let level = 0; level < node.level; level += 1) {
      allocator.get(update[level]).forward[level] = node.forward[level];
    }

    const successor = node.forward[0];
    allocator.get(successor).back = node.back;
    allocator.release(index);

    this.state.size -= 1;
    this.metrics?.recordErase(this.name, this.state.size);
    return this.iteratorAt(successor);
  }

  popFront(): void {
    if (this.isEmpty()) {
      throw new OutOfRangeError('popFront called on empty skip list');
    }

    this.erase(this.begin());
  }

  popBack(): void {
    if (this.isEmpty()) {
      throw new OutOfRangeError('popBack called on empty skip list');
    }

    const { allocator, tail } = this.state;
    this.erase(this.iteratorAt(allocator.get(tail).back));
  }

  clear(): void {
    const { allocator, head, tail } = this.state;
    const removed = this.state.size;

    let cursor = allocator.get(head).forward[0];
    while (cursor !== tail) {
      const next = allocator.get(cursor).forward[0];
      allocator.release(cursor);
      cursor = next;
    }

    allocator.get(head).forward.fill(tail);
    allocator.get(tail).back = head;
    this.state.size = 0;

    this.metrics?.recordClear(this.name);
    this.logger?.debug('skip list cleared', { list: this.name, removed });
  }

  /**
   * Grows by inserting `fill` until `count` elements are held, or shrinks by
   * erasing every element from position `count` onward.
   */
  resize(count: number): void;
  resize(count: number, fill: T): void;
  resize(count: number, ...fill: [] | [T]): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new InvalidArgumentError(`invalid size: ${count}`);
    }

    const before = this.state.size;
    if (count > before) {
      if (fill.length === 0) {
        throw new InvalidArgumentError('a fill value is required to grow the list');
      }

      for (let i = before; i < count; i += 1) {
        this.insert(fill[0]);
      }
    } else if (count < before) {
      let cursor = this.begin();
      for (let i = 0; i < count; i += 1) {
        cursor.advance();
      }

      while (!cursor.isEnd) {
        cursor = this.erase(cursor);
      }
    }

    this.logger?.debug('skip list resized', { list: this.name, from: before, to: count });
  }

  swap(other: SkipList<T>): void {
    const mine = this.state;
    this.state = other.state;
    other.state = mine;

    this.metrics?.recordSize(this.name, this.state.size);
    other.metrics?.recordSize(other.name, other.state.size);
    this.logger?.debug('skip list swapped', { list: this.name, with: other.name });
  }

  /** Independent deep copy built by re-inserting every element in order. */
  clone(): SkipList<T> {
    const copy = new SkipList<T>({
      compare: this.state.compare,
      random: this.state.random.fork(),
      createAllocator: this.state.createAllocator,
      logger: this.logger,
      metrics: this.metrics,
      name: this.name,
    });

    for (const value of this) {
      copy.insert(value);
    }

    return copy;
  }

  /** Copy assignment. The allocator is kept; the comparator is taken from `source`. */
  copyFrom(source: SkipList<T>): this {
    if (source === this) {
      return this;
    }

    this.clear();
    this.state.compare = source.state.compare;
    for (const value of source) {
      this.insert(value);
    }

    this.logger?.debug('skip list copied', { list: this.name, from: source.name, size: this.size });
    return this;
  }

  /**
   * Move assignment: drops this list's nodes and adopts `source`'s graph.
   * `source` is left empty with fresh sentinels; cursors into the moved
   * graph now refer to this list.
   */
  moveFrom(source: SkipList<T>): this {
    if (source === this) {
      return this;
    }

    this.clear();
    const moved = source.state;
    source.state = createState<T>(moved.compare, moved.random.fork(), moved.createAllocator);
    this.state = moved;

    this.metrics?.recordSize(this.name, this.state.size);
    source.metrics?.recordSize(source.name, 0);
    this.logger?.debug('skip list moved', { list: this.name, from: source.name, size: this.size });
    return this;
  }

  /** Same size and pairwise-equal elements in order. */
  equals(other: SkipList<T>, isEqual: (left: T, right: T) => boolean = (left, right) => left === right): boolean {
    if (this.size !== other.size) {
      return false;
    }

    const mine = this[Symbol.iterator]();
    for (const theirs of other) {
      const next = mine.next();
      if (next.done || !isEqual(next.value, theirs)) {
        return false;
      }
    }

    return true;
  }

  notEquals(other: SkipList<T>, isEqual?: (left: T, right: T) => boolean): boolean {
    return !this.equals(other, isEqual);
  }

  *values(): Generator<T, void, undefined> {
    const { allocator, head, tail } = this.state;
    let cursor = allocator.get(head).forward[0];

    while (cursor !== tail) {
      const next = allocator.get(cursor).forward[0];
      yield this.valueAt(cursor);
      cursor = next;
    }
  }

  *reversed(): Generator<T, void, undefined> {
    const { allocator, head, tail } = this.state;
    let cursor = allocator.get(tail).back;

    while (cursor !== head) {
      const previous = allocator.get(cursor).back;
      yield this.valueAt(cursor);
      cursor = previous;
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.values();
  }

  toArray(): T[] {
    return Array.from(this);
  }

  /** Node level of every element in base order. */
  levels(): number[] {
    const { allocator, head, tail } = this.state;
    const levels: number[] = [];

    for (let cursor = allocator.get(head).forward[0]; cursor !== tail; cursor = allocator.get(cursor).forward[0]) {
      levels.push(allocator.get(cursor).level);
    }

    return levels;
  }

  private link(value: T): SkipListIterator<T> {
    const { allocator, head } = this.state;
    const update = new Array<number>(MAX_LEVEL).fill(head);
    this.descend(value, update);

    const level = this.randomLevel();
    const index = allocator.allocate(level, { value });
    const node = allocator.get(index);

    for (let i = 0; i < level; i += 1) {
      const predecessor = allocator.get(update[i]);
      node.forward[i] = predecessor.forward[i];
      predecessor.forward[i] = index;
    }

    node.back = update[0];
    allocator.get(node.forward[0]).back = index;

    this.state.size += 1;
    this.metrics?.recordInsert(this.name, level, this.state.size);
    return this.iteratorAt(index);
  }

  /**
   * Top-to-bottom sweep. Returns the last node whose value is strictly less
   * than `target` (or head) and, when given, fills `update[level]` with the
   * cursor at which each level was left.
   */
  private descend(target: T, update?: number[]): number {
    const { allocator, head, tail, compare } = this.state;
    let cursor = head;
    let hops = 0;

    for (let level = MAX_LEVEL - 1; level >= 0; level -= 1) {
      let next = allocator.get(cursor).forward[level];
      while (next !== tail && compare(this.valueAt(next), target) < 0) {
        cursor = next;
        next = allocator.get(cursor).forward[level];
        hops += 1;
      }

      if (update) {
        update[level] = cursor;
      }
    }

    this.metrics?.observeDescent(this.name, hops);
    return cursor;
  }

  /**
   * Predecessor of node `index` at each of its levels. Starts from the
   * descent on the node's value, then steps across equal values until the
   * node itself is next, so one specific duplicate can be unlinked.
   */
  private predecessorsOf(index: number): number[] {
    const { allocator, head, tail, compare } = this.state;
    const node = allocator.get(index);
    const target = this.valueAt(index);
    const update = new Array<number>(MAX_LEVEL).fill(head);
    this.descend(target, update);

    for (let level = 0; level < node.level; level += 1) {
      let cursor = update[level];
      let next = allocator.get(cursor).forward[level];

      while (next !== index && next !== tail && compare(this.valueAt(next), target) === 0) {
        cursor = next;
        next = allocator.get(cursor).forward[level];
      }

      if (next !== index) {
        this.logger?.error('node missing from its level chain', { list: this.name, slot: index, level });
        throw new InvariantViolationError(`slot ${index} is not linked at level ${level}`);
      }

      update[level] = cursor;
    }

    return update;
  }

  private randomLevel(): number {
    let level = 1;
    while (level < MAX_LEVEL && this.state.random.nextFloat() < LEVEL_PROBABILITY) {
      level += 1;
    }

    return level;
  }

  private valueAt(index: number): T {
    const entry = this.state.allocator.get(index).entry;
    if (entry === undefined) {
      throw new InvariantViolationError(`slot ${index} is a sentinel`);
    }

    return entry.value;
  }

  private iteratorAt(index: number): SkipListIterator<T> {
    const { allocator } = this.state;
    return new SkipListIterator(allocator, index, allocator.generationOf(index));
  }
}
