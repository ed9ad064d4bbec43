// Store
export { openDatabase } from './db/Database.js';
export { MetricStore } from './db/MetricStore.js';
export type { PruneResult } from './db/MetricStore.js';
export { SampleRepository } from './db/repositories/SampleRepository.js';
export { TrafficWindowRepository } from './db/repositories/TrafficWindowRepository.js';
export { CaptureFailureRepository } from './db/repositories/CaptureFailureRepository.js';
export type { TableStats } from './db/repositories/TableStats.js';
export { isCorruption, toStoreError } from './db/errors.js';

// Events
export { EventBus } from './events/EventBus.js';
export type { EventName } from './events/EventBus.js';

// Capture
export { parseCaptureLine } from './capture/lineParser.js';
export type { CapturedPacket, ParsedLine } from './capture/lineParser.js';
export { TrafficAccumulator, rankTopTalkers } from './capture/TrafficAccumulator.js';
export type { DirectionalCounters } from './capture/TrafficAccumulator.js';
export { PeerTracker, hashAddress } from './capture/PeerTracker.js';
export type { PeerStats, PeerTrackerOptions } from './capture/PeerTracker.js';
export { TsharkCapture, buildCaptureArgs } from './capture/TsharkCapture.js';
export type { CaptureRunner, TsharkOptions } from './capture/TsharkCapture.js';
export { resolveLocalAddresses } from './capture/localAddresses.js';
export { CaptureAggregator, createCaptureAggregator } from './capture/CaptureAggregator.js';
export type { CaptureAggregatorOptions } from './capture/CaptureAggregator.js';
export { gracefulShutdown } from './process/GracefulShutdown.js';

// Metrics
export { SystemSampler } from './metrics/SystemSampler.js';
export type { SystemSources } from './metrics/SystemSampler.js';
export { ProcessInspector, lookupPid } from './metrics/ProcessInspector.js';

// Scheduler
export { SamplingScheduler } from './scheduler/SamplingScheduler.js';
export type {
  SampleSource,
  TrafficSource,
  SamplingSchedulerOptions,
} from './scheduler/SamplingScheduler.js';

// HTTP API
export { HTTPServer, defaultStaticDir } from './api/HTTPServer.js';
export type { ApiContext } from './api/HTTPServer.js';
export { registerRecordRoutes } from './api/routes/records.js';
export { registerStatusRoutes } from './api/routes/status.js';
export type { StatusContext, HealthStatus } from './api/routes/status.js';

// Daemon
export { MonitorDaemon } from './daemon/Daemon.js';
export type { DaemonOptions } from './daemon/Daemon.js';
