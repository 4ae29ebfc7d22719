import { IncomparableValuesError } from './errors.js';

/**
 * Total order over stored values: negative when `left` sorts first, zero when
 * the two are equivalent, positive otherwise.
 */
export type Compare<T> = (left: T, right: T) => number;

type Primitive = number | string | bigint;

function isPrimitive(value: unknown): value is Primitive {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'bigint';
}

/**
 * Ascending order for numbers, strings and bigints. NaN and any other value
 * have no natural order and throw.
 */
export function naturalOrder(left: unknown, right: unknown): number {
  if (!isPrimitive(left) || !isPrimitive(right)) {
    throw new IncomparableValuesError(
      `no natural order for ${typeof left} and ${typeof right}; pass a compare function`
    );
  }

  // numbers and bigints compare with each other, strings only with strings
  if ((typeof left === 'string') !== (typeof right === 'string')) {
    throw new IncomparableValuesError(`no natural order for ${typeof left} and ${typeof right}`);
  }

  if (Number.isNaN(left) || Number.isNaN(right)) {
    throw new IncomparableValuesError('NaN has no natural order');
  }

  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}

export function reverseOrder<T>(compare: Compare<T>): Compare<T> {
  return (left, right) => compare(right, left);
}

/** Orders records by a derived key, falling back to natural order on the key. */
export function byKey<T, K>(select: (value: T) => K, compare: Compare<K> = naturalOrder): Compare<T> {
  return (left, right) => compare(select(left), select(right));
}
