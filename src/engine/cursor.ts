import {
  InvalidDereferenceError,
  OutOfRangeError,
  StaleIteratorError,
} from './errors.js';
import { NIL, type NodeAllocator, type SkipNode } from './node-arena.js';

/**
 * Bidirectional cursor over the base level of a skip list.
 *
 * A cursor sits on a value node, on the tail sentinel (the end position), or
 * nowhere at all (detached). It never owns the node it points at; once that
 * node is erased every operation on the cursor throws `StaleIteratorError`.
 * `advance` and `retreat` move the cursor in place and leave it untouched
 * when they throw.
 */
export class SkipListIterator<T> {
  constructor(
    private readonly allocator: NodeAllocator<T> | undefined,
    private index: number,
    private generation: number
  ) {}

  static detached<T>(): SkipListIterator<T> {
    return new SkipListIterator<T>(undefined, NIL, 0);
  }

  get isDetached(): boolean {
    return this.allocator === undefined;
  }

  /** True on the end position. */
  get isEnd(): boolean {
    const node = this.resolve();
    return node !== undefined && node.entry === undefined && node.back !== NIL;
  }

  get value(): T {
    const node = this.resolve();
    if (node === undefined || node.entry === undefined) {
      throw new InvalidDereferenceError('cannot dereference a sentinel or detached iterator');
    }

    return node.entry.value;
  }

  advance(): this {
    const node = this.resolve();
    if (node === undefined || node.entry === undefined) {
      throw new OutOfRangeError('cannot advance past end');
    }

    this.moveTo(node.forward[0]);
    return this;
  }

  retreat(): this {
    const node = this.resolve();
    if (node === undefined || node.back === NIL) {
      throw new OutOfRangeError('cannot retreat before begin');
    }

    // the head sentinel is the only node without a predecessor
    if (this.allocatorOrThrow().get(node.back).back === NIL) {
      throw new OutOfRangeError('cannot retreat before begin');
    }

    this.moveTo(node.back);
    return this;
  }

  clone(): SkipListIterator<T> {
    return new SkipListIterator(this.allocator, this.index, this.generation);
  }

  equals(other: SkipListIterator<T>): boolean {
    return (
      this.allocator === other.allocator &&
      this.index === other.index &&
      this.generation === other.generation
    );
  }

  /** @internal */
  belongsTo(allocator: NodeAllocator<T>): boolean {
    return this.allocator === allocator;
  }

  /**
   * Slot index of the live node under the cursor.
   * @internal
   */
  slot(): number {
    this.resolve();
    return this.index;
  }

  private resolve(): SkipNode<T> | undefined {
    if (this.allocator === undefined) {
      return undefined;
    }

    if (!this.allocator.isLive(this.index, this.generation)) {
      throw new StaleIteratorError('iterator refers to an erased element');
    }

    return this.allocator.get(this.index);
  }

  private moveTo(index: number): void {
    const allocator = this.allocatorOrThrow();
    this.index = index;
    this.generation = allocator.generationOf(index);
  }

  private allocatorOrThrow(): NodeAllocator<T> {
    if (this.allocator === undefined) {
      throw new OutOfRangeError('iterator is detached');
    }

    return this.allocator;
  }
}
