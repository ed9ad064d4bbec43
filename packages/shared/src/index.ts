// Types
export type {
  MetricName,
  Sample,
  TopTalker,
  NodeCandidate,
  TrafficWindow,
  RecordKind,
  NewSampleRecord,
  NewTrafficRecord,
  NewRecord,
  StoredSample,
  StoredTrafficWindow,
  StoredRecord,
  CaptureFailureCode,
  CaptureFailure,
  StoredCaptureFailure,
  StoreSummary,
  ProcessInfo,
  MonitorConfig,
  CaptureConfig,
  SchedulerConfig,
  SamplerConfig,
  StoreConfig,
  RetentionConfig,
  HttpConfig,
  LogConfig,
  EventBusMessage,
  TickOutcome,
  TickReport,
} from './types/index.js';

// Constants
export {
  DHTWATCH_HOME,
  DHTWATCH_DB_FILE,
  DHTWATCH_CONFIG_FILE,
  DHTWATCH_VERSION,
  DEFAULT_DHT_PORT,
  DEFAULT_CAPTURE_TOOL,
  DEFAULT_CAPTURE_INTERFACE,
  DEFAULT_CAPTURE_FILTER,
  DEFAULT_CAPTURE_WINDOW,
  DEFAULT_CAPTURE_GRACE,
  DEFAULT_KILL_TIMEOUT,
  DEFAULT_TOP_TALKERS,
  DEFAULT_TICK_INTERVAL,
  DEFAULT_DISK_PATH,
  DEFAULT_RETENTION_MAX_AGE,
  DEFAULT_RETENTION_MAX_ROWS,
  DEFAULT_RETENTION_CHECK_INTERVAL,
  DEFAULT_HTTP_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_RECENT_LIMIT,
  MAX_RECENT_LIMIT,
  DEFAULT_WATCH_PROCESS,
  PROCESS_LOOKUP_TIMEOUT,
  NODE_MIN_WINDOWS,
  NODE_MIN_LIFETIME_SEC,
  NODE_MIN_BYTES,
  NODE_MIN_PACKETS,
  NODE_MIN_SCORE,
  NODE_CANDIDATE_LIMIT,
  NODE_IDLE_EVICTION_MS,
} from './constants.js';

// Schemas
export {
  durationSchema,
  captureConfigSchema,
  schedulerConfigSchema,
  samplerConfigSchema,
  storeConfigSchema,
  retentionConfigSchema,
  httpConfigSchema,
  logConfigSchema,
  monitorConfigSchema,
} from './schemas/config.schema.js';

export type { MonitorConfigInput, ValidatedMonitorConfig } from './schemas/config.schema.js';

// Configuration
export { loadConfig, parseConfig } from './config/loadConfig.js';
export type { LoadConfigOptions } from './config/loadConfig.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  formatAge,
} from './utils/parser.js';

export {
  createLogger,
  getLogger,
  setDefaultLogger,
  isLogLevel,
  LOG_LEVELS,
} from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  MonitorError,
  CaptureError,
  CaptureToolUnavailableError,
  CaptureTimeoutError,
  CaptureCancelledError,
  MetricUnavailableError,
  SamplerTimeoutError,
  StoreError,
  StoreWriteError,
  StoreReadError,
  StoreCorruptionError,
  ConfigValidationError,
} from './utils/errors.js';
export type { CaptureErrorCode } from './utils/errors.js';
