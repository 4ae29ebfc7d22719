import { createSkipListFactory } from './app.js';
import { loadAppConfig } from './config/app-config.js';
import { XorShift32 } from './utils/prng.js';

function percentile(sorted: number[], ratio: number): number {
  return sorted[Math.floor(sorted.length * ratio)] ?? 0;
}

function summarize(samples: number[]) {
  const sorted = [...samples].sort((left, right) => left - right);
  return {
    p50: Number(percentile(sorted, 0.5).toFixed(4)),
    p95: Number(percentile(sorted, 0.95).toFixed(4)),
    p99: Number(percentile(sorted, 0.99).toFixed(4)),
  };
}

async function benchmark(): Promise<void> {
  const config = loadAppConfig();
  const factory = createSkipListFactory(config);
  const { iterations, valueRange } = config.benchmark;

  const list = factory.create<number>('benchmark');
  const random = new XorShift32(config.skipList.seed ^ 0x9e3779b9);

  const insertSamples: number[] = [];
  const findSamples: number[] = [];
  const eraseSamples: number[] = [];

  const startedAt = performance.now();
  for (let i = 0; i < iterations; i += 1) {
    const value = random.nextInt(0, valueRange - 1);
    const now = performance.now();
    list.insert(value);
    insertSamples.push(performance.now() - now);
  }

  let hits = 0;
  for (let i = 0; i < iterations; i += 1) {
    const value = random.nextInt(0, valueRange - 1);
    const now = performance.now();
    if (list.contains(value)) {
      hits += 1;
    }
    findSamples.push(performance.now() - now);
  }

  for (let i = 0; i < iterations / 2; i += 1) {
    const position = list.find(random.nextInt(0, valueRange - 1));
    if (position.isEnd) {
      continue;
    }

    const now = performance.now();
    list.erase(position);
    eraseSamples.push(performance.now() - now);
  }

  const elapsedMs = performance.now() - startedAt;
  const levels = list.levels();
  const maxLevel = levels.reduce((max, level) => Math.max(max, level), 0);

  factory.logger.info('benchmark complete', {
    iterations,
    valueRange,
    elapsedMs: Number(elapsedMs.toFixed(2)),
    finalSize: list.size,
    findHits: hits,
    maxLevel,
    latencyMs: {
      insert: summarize(insertSamples),
      find: summarize(findSamples),
      erase: summarize(eraseSamples),
    },
  });

  if (factory.metrics) {
    process.stdout.write(await factory.metrics.render());
  }
}

benchmark().catch((error) => {
  console.error(error);
  process.exit(1);
});
