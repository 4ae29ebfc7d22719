import type { AppConfig } from './types/config.js';
import { Logger } from './logging/logger.js';
import { SkipListMetrics } from './metrics/registry.js';
import { SkipList, type SkipListOptions } from './engine/skip-list.js';

export type FactoryListOptions<T> = Omit<SkipListOptions<T>, 'seed' | 'random' | 'logger' | 'metrics' | 'name'>;

export interface SkipListFactory {
  logger: Logger;
  metrics?: SkipListMetrics;
  create: <T>(name: string, options?: FactoryListOptions<T>) => SkipList<T>;
}

/**
 * Shared logger and metrics for every list built from one configuration.
 * The k-th list created gets seed `config.skipList.seed + k`.
 */
export function createSkipListFactory(config: AppConfig): SkipListFactory {
  const logger = new Logger('skiplist', config.observability.logLevel);
  const metrics = config.observability.metricsEnabled
    ? new SkipListMetrics({ collectDefaults: config.observability.collectDefaultMetrics })
    : undefined;

  let created = 0;

  const create = <T>(name: string, options: FactoryListOptions<T> = {}): SkipList<T> => {
    const seed = config.skipList.seed + created;
    created += 1;

    logger.debug('creating skip list', { list: name, seed });
    return new SkipList<T>({
      ...options,
      seed,
      name,
      logger: logger.child(name),
      metrics,
    });
  };

  return { logger, metrics, create };
}
