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
} from './records.js';

export type {
  MonitorConfig,
  CaptureConfig,
  SchedulerConfig,
  SamplerConfig,
  StoreConfig,
  RetentionConfig,
  HttpConfig,
  LogConfig,
} from './config.js';

export type { EventBusMessage, TickOutcome, TickReport } from './events.js';
