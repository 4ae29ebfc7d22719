import { describe, expect, it } from 'vitest';

import { loadAppConfig } from '../config/app-config.js';

function restoreEnv(name: string, previousValue: string | undefined): void {
  if (previousValue === undefined) {
    delete process.env[name];
    return;
  }

  process.env[name] = previousValue;
}

function withEnv(values: Record<string, string | undefined>, run: () => void): void {
  const previous = Object.fromEntries(Object.keys(values).map((name) => [name, process.env[name]]));
  for (const [name, value] of Object.entries(values)) {
    restoreEnv(name, value);
  }

  try {
    run();
  } finally {
    for (const [name, value] of Object.entries(previous)) {
      restoreEnv(name, value);
    }
  }
}

describe('loadAppConfig', () => {
  it('loads defaults', () => {
    withEnv(
      {
        SKIPLIST_SEED: undefined,
        LOG_LEVEL: undefined,
        METRICS_ENABLED: undefined,
        METRICS_DEFAULTS: undefined,
        BENCH_ITERATIONS: undefined,
        BENCH_VALUE_RANGE: undefined,
      },
      () => {
        const config = loadAppConfig();
        expect(config.skipList.seed).toBe(1);
        expect(config.observability).toEqual({
          logLevel: 'info',
          metricsEnabled: true,
          collectDefaultMetrics: false,
        });
        expect(config.benchmark).toEqual({ iterations: 25_000, valueRange: 100_000 });
      }
    );
  });

  it('parses overrides', () => {
    withEnv(
      {
        SKIPLIST_SEED: '99',
        LOG_LEVEL: ' DEBUG ',
        METRICS_ENABLED: 'off',
        METRICS_DEFAULTS: 'yes',
        BENCH_ITERATIONS: '10',
      },
      () => {
        const config = loadAppConfig();
        expect(config.skipList.seed).toBe(99);
        expect(config.observability.logLevel).toBe('debug');
        expect(config.observability.metricsEnabled).toBe(false);
        expect(config.observability.collectDefaultMetrics).toBe(true);
        expect(config.benchmark.iterations).toBe(10);
      }
    );
  });

  it('throws on invalid numeric env values', () => {
    withEnv({ SKIPLIST_SEED: 'not-a-number' }, () => {
      expect(() => loadAppConfig()).toThrow('Invalid numeric value for SKIPLIST_SEED');
    });

    withEnv({ BENCH_VALUE_RANGE: '' }, () => {
      expect(() => loadAppConfig()).toThrow('Invalid numeric value for BENCH_VALUE_RANGE');
    });
  });

  it('throws on non-positive benchmark sizes', () => {
    withEnv({ BENCH_ITERATIONS: '0' }, () => {
      expect(() => loadAppConfig()).toThrow('Expected a positive integer for BENCH_ITERATIONS: 0');
    });
  });

  it('throws on unknown log levels', () => {
    withEnv({ LOG_LEVEL: 'verbose' }, () => {
      expect(() => loadAppConfig()).toThrow('Invalid log level for LOG_LEVEL: verbose');
    });
  });
});
