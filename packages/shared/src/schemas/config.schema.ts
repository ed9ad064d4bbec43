import { z } from 'zod';
import {
  DEFAULT_CAPTURE_FILTER,
  DEFAULT_CAPTURE_GRACE,
  DEFAULT_CAPTURE_INTERFACE,
  DEFAULT_CAPTURE_TOOL,
  DEFAULT_CAPTURE_WINDOW,
  DEFAULT_DISK_PATH,
  DEFAULT_HTTP_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_KILL_TIMEOUT,
  DEFAULT_RETENTION_CHECK_INTERVAL,
  DEFAULT_RETENTION_MAX_AGE,
  DEFAULT_RETENTION_MAX_ROWS,
  DEFAULT_TICK_INTERVAL,
  DEFAULT_TOP_TALKERS,
  DEFAULT_WATCH_PROCESS,
} from '../constants.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { parseDuration } from '../utils/parser.js';

/** A duration given as milliseconds or as an ms-style string ('5s', '30d'). */
export const durationSchema = z
  .union([z.number().int().nonnegative(), z.string().min(1)])
  .transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : `Invalid duration: ${String(value)}`,
      });
      return z.NEVER;
    }
  });

export const captureConfigSchema = z.object({
  tool: z.string().min(1).default(DEFAULT_CAPTURE_TOOL),
  interface: z.string().min(1).default(DEFAULT_CAPTURE_INTERFACE),
  filter: z.string().default(DEFAULT_CAPTURE_FILTER),
  window: durationSchema
    .default(DEFAULT_CAPTURE_WINDOW)
    .refine((ms) => ms >= 1000, 'capture window must be at least 1s'),
  gracePeriod: durationSchema.default(DEFAULT_CAPTURE_GRACE),
  killTimeout: durationSchema.default(DEFAULT_KILL_TIMEOUT),
  topTalkers: z.number().int().min(1).max(1000).default(DEFAULT_TOP_TALKERS),
  localAddresses: z.array(z.string().ip()).optional(),
});

export const schedulerConfigSchema = z.object({
  interval: durationSchema
    .default(DEFAULT_TICK_INTERVAL)
    .refine((ms) => ms >= 1000, 'tick interval must be at least 1s'),
});

export const samplerConfigSchema = z.object({
  diskPath: z.string().min(1).default(DEFAULT_DISK_PATH),
});

export const storeConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

export const retentionConfigSchema = z.object({
  maxAge: durationSchema.default(DEFAULT_RETENTION_MAX_AGE),
  maxRows: z.number().int().positive().default(DEFAULT_RETENTION_MAX_ROWS),
  checkInterval: durationSchema
    .default(DEFAULT_RETENTION_CHECK_INTERVAL)
    .refine((ms) => ms >= 1000, 'retention check interval must be at least 1s'),
});

export const httpConfigSchema = z.object({
  enabled: z.boolean().default(true),
  host: z.string().min(1).default(DEFAULT_HTTP_HOST),
  port: z.number().int().min(0).max(65535).default(DEFAULT_HTTP_PORT),
  staticDir: z.string().min(1).optional(),
});

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value),
  { message: `log level must be one of: ${LOG_LEVELS.join(', ')}` },
);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const monitorConfigSchema = z.object({
  home: z.string().min(1).optional(),
  capture: captureConfigSchema.default({}),
  scheduler: schedulerConfigSchema.default({}),
  sampler: samplerConfigSchema.default({}),
  store: storeConfigSchema.default({}),
  retention: retentionConfigSchema.default({}),
  http: httpConfigSchema.default({}),
  log: logConfigSchema.default({}),
  watchProcess: z.string().min(1).nullable().default(DEFAULT_WATCH_PROCESS),
});

export type MonitorConfigInput = z.input<typeof monitorConfigSchema>;
export type ValidatedMonitorConfig = z.infer<typeof monitorConfigSchema>;
