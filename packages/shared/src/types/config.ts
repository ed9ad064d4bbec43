import type { LogLevel } from '../utils/logger.js';

export interface CaptureConfig {
  tool: string;
  interface: string;
  filter: string;
  windowMs: number;
  graceMs: number;
  killTimeoutMs: number;
  topTalkers: number;
  /** Addresses treated as this host; `null` means detect from the interface */
  localAddresses: string[] | null;
}

export interface SchedulerConfig {
  intervalMs: number;
}

export interface SamplerConfig {
  diskPath: string;
}

export interface StoreConfig {
  path: string;
}

export interface RetentionConfig {
  maxAgeMs: number;
  maxRows: number;
  checkIntervalMs: number;
}

export interface HttpConfig {
  enabled: boolean;
  host: string;
  port: number;
  staticDir: string | null;
}

export interface LogConfig {
  level: LogLevel;
}

/**
 * Fully resolved daemon configuration. Durations are milliseconds and paths
 * are absolute.
 */
export interface MonitorConfig {
  home: string;
  capture: CaptureConfig;
  scheduler: SchedulerConfig;
  sampler: SamplerConfig;
  store: StoreConfig;
  retention: RetentionConfig;
  http: HttpConfig;
  log: LogConfig;
  watchProcess: string | null;
}
