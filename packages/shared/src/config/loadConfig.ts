import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import type { MonitorConfig } from '../types/config.js';
import { DHTWATCH_CONFIG_FILE, DHTWATCH_HOME } from '../constants.js';
import { monitorConfigSchema, type ValidatedMonitorConfig } from '../schemas/config.schema.js';
import { ConfigValidationError } from '../utils/errors.js';

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load `dhtwatch.config.json`, apply DHTWATCH_* environment overrides and
 * validate the result. A missing default config file yields the defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): MonitorConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.DHTWATCH_CONFIG;
  const configPath = resolve(cwd, explicitPath ?? DHTWATCH_CONFIG_FILE);

  let raw: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    raw = readConfigFile(configPath);
  } else if (explicitPath) {
    throw new ConfigValidationError([`${configPath}: file not found`]);
  }

  return parseConfig(applyEnvOverrides(raw, env), cwd);
}

/**
 * Validate an already-loaded config object and resolve it.
 */
export function parseConfig(input: unknown, cwd: string = process.cwd()): MonitorConfig {
  const result = monitorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return resolveConfig(result.data, cwd);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${path}: ${msg}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return parsed;
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const section = (name: string): Record<string, unknown> => {
    const value = raw[name];
    return isRecord(value) ? { ...value } : {};
  };

  const result: Record<string, unknown> = { ...raw };

  if (env.DHTWATCH_HOME) result.home = env.DHTWATCH_HOME;

  const capture = section('capture');
  if (env.DHTWATCH_INTERFACE) capture.interface = env.DHTWATCH_INTERFACE;
  if (env.DHTWATCH_FILTER) capture.filter = env.DHTWATCH_FILTER;
  result.capture = capture;

  const store = section('store');
  if (env.DHTWATCH_DB) store.path = env.DHTWATCH_DB;
  result.store = store;

  const http = section('http');
  if (env.DHTWATCH_HTTP_HOST) http.host = env.DHTWATCH_HTTP_HOST;
  if (env.DHTWATCH_HTTP_PORT) http.port = Number(env.DHTWATCH_HTTP_PORT);
  result.http = http;

  const log = section('log');
  if (env.DHTWATCH_LOG_LEVEL) log.level = env.DHTWATCH_LOG_LEVEL;
  result.log = log;

  return result;
}

function resolveConfig(data: ValidatedMonitorConfig, cwd: string): MonitorConfig {
  const home = data.home ? resolve(cwd, data.home) : DHTWATCH_HOME;
  const resolvePath = (path: string): string => (isAbsolute(path) ? path : resolve(cwd, path));

  return {
    home,
    capture: {
      tool: data.capture.tool,
      interface: data.capture.interface,
      filter: data.capture.filter,
      windowMs: data.capture.window,
      graceMs: data.capture.gracePeriod,
      killTimeoutMs: data.capture.killTimeout,
      topTalkers: data.capture.topTalkers,
      localAddresses: data.capture.localAddresses ?? null,
    },
    scheduler: {
      intervalMs: data.scheduler.interval,
    },
    sampler: {
      diskPath: data.sampler.diskPath,
    },
    store: {
      path: data.store.path ? resolvePath(data.store.path) : join(home, 'dhtwatch.db'),
    },
    retention: {
      maxAgeMs: data.retention.maxAge,
      maxRows: data.retention.maxRows,
      checkIntervalMs: data.retention.checkInterval,
    },
    http: {
      enabled: data.http.enabled,
      host: data.http.host,
      port: data.http.port,
      staticDir: data.http.staticDir ? resolvePath(data.http.staticDir) : null,
    },
    log: {
      level: data.log.level,
    },
    watchProcess: data.watchProcess,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
