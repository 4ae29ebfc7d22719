/**
 * Source of uniform randomness for level sampling. Held per container so a
 * fixed seed reproduces the same node levels.
 */
export interface RandomSource {
  /** Uniform float in `[0, 1)`. */
  nextFloat(): number;
  /** Independent source seeded from this one. */
  fork(): RandomSource;
}

export class XorShift32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    if (this.state === 0) {
      this.state = 0x6d2b79f5;
    }
  }

  nextUint32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  // the largest output is 2^32 - 1, so dividing by 2^32 stays strictly below 1
  nextFloat(): number {
    return this.nextUint32() / 0x100000000;
  }

  nextInt(minInclusive: number, maxInclusive: number): number {
    if (maxInclusive < minInclusive) {
      throw new Error('invalid range');
    }

    const span = maxInclusive - minInclusive + 1;
    return minInclusive + (this.nextUint32() % span);
  }

  fork(): XorShift32 {
    return new XorShift32(this.nextUint32());
  }
}
