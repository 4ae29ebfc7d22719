import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface SkipListMetricsOptions {
  registry?: Registry;
  collectDefaults?: boolean;
  prefix?: string;
}

export class SkipListMetrics {
  readonly registry: Registry;

  readonly insertsTotal: Counter<'list'>;
  readonly erasesTotal: Counter<'list'>;
  readonly clearsTotal: Counter<'list'>;
  readonly size: Gauge<'list'>;
  readonly nodeLevels: Histogram<'list'>;
  readonly descentHops: Histogram<'list'>;

  constructor(options: SkipListMetricsOptions = {}) {
    this.registry = options.registry ?? new Registry();
    const prefix = options.prefix ?? 'skiplist';

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.insertsTotal = new Counter({
      name: `${prefix}_inserts_total`,
      help: 'Total number of elements inserted',
      labelNames: ['list'],
      registers: [this.registry],
    });

    this.erasesTotal = new Counter({
      name: `${prefix}_erases_total`,
      help: 'Total number of elements erased one at a time',
      labelNames: ['list'],
      registers: [this.registry],
    });

    this.clearsTotal = new Counter({
      name: `${prefix}_clears_total`,
      help: 'Total number of clear operations',
      labelNames: ['list'],
      registers: [this.registry],
    });

    this.size = new Gauge({
      name: `${prefix}_size`,
      help: 'Current number of elements held',
      labelNames: ['list'],
      registers: [this.registry],
    });

    this.nodeLevels = new Histogram({
      name: `${prefix}_node_level`,
      help: 'Distribution of sampled node levels',
      labelNames: ['list'],
      buckets: [1, 2, 3, 4, 6, 8, 12, 16, 24, 32],
      registers: [this.registry],
    });

    this.descentHops = new Histogram({
      name: `${prefix}_descent_hops`,
      help: 'Forward links followed per top-to-bottom descent',
      labelNames: ['list'],
      buckets: [0, 1, 2, 4, 8, 16, 32, 64, 128, 256],
      registers: [this.registry],
    });
  }

  recordInsert(list: string, level: number, size: number): void {
    this.insertsTotal.inc({ list });
    this.nodeLevels.observe({ list }, level);
    this.size.set({ list }, size);
  }

  recordErase(list: string, size: number): void {
    this.erasesTotal.inc({ list });
    this.size.set({ list }, size);
  }

  recordClear(list: string): void {
    this.clearsTotal.inc({ list });
    this.size.set({ list }, 0);
  }

  recordSize(list: string, size: number): void {
    this.size.set({ list }, size);
  }

  observeDescent(list: string, hops: number): void {
    this.descentHops.observe({ list }, hops);
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
