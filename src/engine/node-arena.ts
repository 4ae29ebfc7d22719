import { CapacityExceededError, InvariantViolationError } from './errors.js';

/** Unset link. */
export const NIL = -1;

export interface NodeEntry<T> {
  value: T;
}

/**
 * One slot of the node graph. Sentinels carry no `entry`. Links are slot
 * indices into the owning allocator, never object references.
 */
export interface SkipNode<T> {
  readonly level: number;
  readonly forward: number[];
  back: number;
  readonly entry: NodeEntry<T> | undefined;
}

/**
 * Memory strategy for a container's nodes. The container is the sole owner:
 * every slot it allocates is released by it and by nothing else.
 */
export interface NodeAllocator<T> {
  readonly liveCount: number;
  allocate(level: number, entry?: NodeEntry<T>): number;
  release(index: number): void;
  get(index: number): SkipNode<T>;
  generationOf(index: number): number;
  isLive(index: number, generation: number): boolean;
}

export interface NodeArenaOptions {
  /** Upper bound on simultaneously live nodes, sentinels included. */
  maxNodes?: number;
}

export class NodeArena<T> implements NodeAllocator<T> {
  private readonly slots: Array<SkipNode<T> | undefined> = [];
  private readonly generations: number[] = [];
  private readonly freeSlots: number[] = [];
  private live = 0;

  constructor(private readonly options: NodeArenaOptions = {}) {}

  get liveCount(): number {
    return this.live;
  }

  get capacity(): number {
    return this.slots.length;
  }

  allocate(level: number, entry?: NodeEntry<T>): number {
    const { maxNodes } = this.options;
    if (maxNodes !== undefined && this.live >= maxNodes) {
      throw new CapacityExceededError(`node arena is full (${maxNodes} nodes)`);
    }

    const node: SkipNode<T> = {
      level,
      forward: new Array<number>(level).fill(NIL),
      back: NIL,
      entry,
    };

    const reused = this.freeSlots.pop();
    const index = reused ?? this.slots.length;
    this.slots[index] = node;
    if (reused === undefined) {
      this.generations[index] = 0;
    }

    this.live += 1;
    return index;
  }

  release(index: number): void {
    if (this.slots[index] === undefined) {
      throw new InvariantViolationError(`slot ${index} released twice`);
    }

    this.slots[index] = undefined;
    this.generations[index] = this.generationOf(index) + 1;
    this.freeSlots.push(index);
    this.live -= 1;
  }

  get(index: number): SkipNode<T> {
    const node = this.slots[index];
    if (node === undefined) {
      throw new InvariantViolationError(`slot ${index} is not allocated`);
    }

    return node;
  }

  generationOf(index: number): number {
    return this.generations[index] ?? 0;
  }

  isLive(index: number, generation: number): boolean {
    return this.slots[index] !== undefined && this.generationOf(index) === generation;
  }
}
