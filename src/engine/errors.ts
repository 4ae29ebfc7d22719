export type SkipListErrorCode =
  | 'OUT_OF_RANGE'
  | 'INVALID_DEREFERENCE'
  | 'STALE_ITERATOR'
  | 'FOREIGN_ITERATOR'
  | 'INVALID_ARGUMENT'
  | 'CAPACITY_EXCEEDED'
  | 'INCOMPARABLE_VALUES'
  | 'INVARIANT_VIOLATION';

export abstract class SkipListError extends Error {
  abstract readonly code: SkipListErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Navigation or removal past either boundary of the list. */
export class OutOfRangeError extends SkipListError {
  readonly code = 'OUT_OF_RANGE';
}

export class InvalidDereferenceError extends SkipListError {
  readonly code = 'INVALID_DEREFERENCE';
}

/** The cursor's node was released by erase or clear after the cursor was taken. */
export class StaleIteratorError extends SkipListError {
  readonly code = 'STALE_ITERATOR';
}

export class ForeignIteratorError extends SkipListError {
  readonly code = 'FOREIGN_ITERATOR';
}

export class InvalidArgumentError extends SkipListError {
  readonly code = 'INVALID_ARGUMENT';
}

export class CapacityExceededError extends SkipListError {
  readonly code = 'CAPACITY_EXCEEDED';
}

export class IncomparableValuesError extends SkipListError {
  readonly code = 'INCOMPARABLE_VALUES';
}

/**
 * The node graph is inconsistent. Never raised while the structural
 * invariants hold; the container should be discarded once it is.
 */
export class InvariantViolationError extends SkipListError {
  readonly code = 'INVARIANT_VIOLATION';
}
