import { InvalidArgumentError } from 'commander';
import type { MonitorConfig } from '@dhtwatch/shared';
import { loadConfig } from '@dhtwatch/shared';
import { MetricStore, openDatabase } from '@dhtwatch/core';

export interface ConfigOption {
  config?: string;
}

export function resolveConfig(options: ConfigOption): MonitorConfig {
  return loadConfig({ configPath: options.config });
}

/**
 * Open the configured store, run `fn` against it and close it again. Reads
 * go straight to the database file, so they work with or without a running
 * daemon.
 */
export async function withStore<T>(
  options: ConfigOption,
  fn: (store: MetricStore, config: MonitorConfig) => T | Promise<T>,
): Promise<T> {
  const config = resolveConfig(options);
  const store = new MetricStore(openDatabase(config.store.path));
  try {
    return await fn(store, config);
  } finally {
    store.close();
  }
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError(`Invalid limit: "${value}"`);
  }
  return limit;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
