export { SkipList, MAX_LEVEL, LEVEL_PROBABILITY, type SkipListOptions } from './engine/skip-list.js';
export { SkipListIterator } from './engine/cursor.js';
export {
  NodeArena,
  NIL,
  type NodeAllocator,
  type NodeArenaOptions,
  type NodeEntry,
  type SkipNode,
} from './engine/node-arena.js';
export { naturalOrder, reverseOrder, byKey, type Compare } from './engine/compare.js';
export {
  SkipListError,
  OutOfRangeError,
  InvalidDereferenceError,
  StaleIteratorError,
  ForeignIteratorError,
  InvalidArgumentError,
  CapacityExceededError,
  IncomparableValuesError,
  InvariantViolationError,
  type SkipListErrorCode,
} from './engine/errors.js';
export { XorShift32, type RandomSource } from './utils/prng.js';
export { Logger, type LogLevel, type LogFields } from './logging/logger.js';
export { SkipListMetrics, type SkipListMetricsOptions } from './metrics/registry.js';
export { loadAppConfig } from './config/app-config.js';
export { createSkipListFactory, type SkipListFactory, type FactoryListOptions } from './app.js';
export type { AppConfig, SkipListConfig, ObservabilityConfig, BenchmarkConfig } from './types/config.js';
