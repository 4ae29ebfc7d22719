import type { LogLevel } from '../logging/logger.js';

export interface SkipListConfig {
  seed: number;
}

export interface ObservabilityConfig {
  logLevel: LogLevel;
  metricsEnabled: boolean;
  collectDefaultMetrics: boolean;
}

export interface BenchmarkConfig {
  iterations: number;
  valueRange: number;
}

export interface AppConfig {
  nodeEnv: string;
  skipList: SkipListConfig;
  observability: ObservabilityConfig;
  benchmark: BenchmarkConfig;
}
