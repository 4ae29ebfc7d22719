import 'dotenv/config';

import { isLogLevel, type LogLevel } from '../logging/logger.js';
import type { AppConfig } from '../types/config.js';

function readEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function readNumber(name: string, fallback?: number): number {
  const raw = process.env[name] ?? (fallback === undefined ? undefined : String(fallback));
  if (raw === undefined) {
    throw new Error(`Missing required numeric environment variable: ${name}`);
  }

  const parsed = Number(raw);
  if (raw.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: ${raw}`);
  }

  return parsed;
}

function readPositiveInteger(name: string, fallback: number): number {
  const value = readNumber(name, fallback);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Expected a positive integer for ${name}: ${value}`);
  }

  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

function readLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = readEnv(name, fallback).trim().toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid log level for ${name}: ${raw}`);
  }

  return raw;
}

export function loadAppConfig(): AppConfig {
  return {
    nodeEnv: readEnv('NODE_ENV', 'development'),
    skipList: {
      seed: readNumber('SKIPLIST_SEED', 1),
    },
    observability: {
      logLevel: readLogLevel('LOG_LEVEL', 'info'),
      metricsEnabled: readBoolean('METRICS_ENABLED', true),
      collectDefaultMetrics: readBoolean('METRICS_DEFAULTS', false),
    },
    benchmark: {
      iterations: readPositiveInteger('BENCH_ITERATIONS', 25_000),
      valueRange: readPositiveInteger('BENCH_VALUE_RANGE', 100_000),
    },
  };
}
