import { mkdirSync } from 'node:fs';
import type { MonitorConfig } from '@dhtwatch/shared';
import { StoreCorruptionError, StoreError, getLogger } from '@dhtwatch/shared';
import { openDatabase } from '../db/Database.js';
import { MetricStore } from '../db/MetricStore.js';
import type { PruneResult } from '../db/MetricStore.js';
import { EventBus } from '../events/EventBus.js';
import { SystemSampler } from '../metrics/SystemSampler.js';
import { ProcessInspector } from '../metrics/ProcessInspector.js';
import { createCaptureAggregator } from '../capture/CaptureAggregator.js';
import { SamplingScheduler } from '../scheduler/SamplingScheduler.js';
import type { SampleSource, TrafficSource } from '../scheduler/SamplingScheduler.js';
import { HTTPServer } from '../api/HTTPServer.js';

const logger = getLogger();

export interface DaemonOptions {
  sampler?: SampleSource;
  capture?: TrafficSource;
  inspector?: ProcessInspector;
  handleSignals?: boolean;
  exit?: (code: number) => void;
  now?: () => number;
}

interface DaemonParts {
  store: MetricStore;
  scheduler: SamplingScheduler;
  httpServer: HTTPServer | null;
  maintenanceTimer: NodeJS.Timeout;
}

export class MonitorDaemon {
  private config: MonitorConfig;
  private options: DaemonOptions;
  private eventBus: EventBus;
  private parts: DaemonParts | null = null;
  private stopping: Promise<void> | null = null;
  private signalHandler: (() => void) | null = null;

  constructor(config: MonitorConfig, options: DaemonOptions = {}) {
    this.config = config;
    this.options = options;
    this.eventBus = new EventBus();
  }

  get bus(): EventBus {
    return this.eventBus;
  }

  get store(): MetricStore | null {
    return this.parts?.store ?? null;
  }

  get isRunning(): boolean {
    return this.parts !== null;
  }

  async start(): Promise<void> {
    if (this.parts) return;
    const { config } = this;

    logger.level = config.log.level;
    logger.info({ home: config.home, store: config.store.path }, 'dhtwatch daemon starting...');

    mkdirSync(config.home, { recursive: true });

    const store = new MetricStore(openDatabase(config.store.path));
    const inspector = this.options.inspector ?? new ProcessInspector(config.watchProcess);

    const scheduler = new SamplingScheduler({
      store,
      sampler: this.options.sampler ?? new SystemSampler(config.sampler.diskPath),
      capture: this.options.capture ?? createCaptureAggregator(config.capture),
      eventBus: this.eventBus,
      intervalMs: config.scheduler.intervalMs,
      windowMs: config.capture.windowMs,
      onFatal: (err) => this.handleFatal(err),
      now: this.options.now,
    });

    let httpServer: HTTPServer | null = null;
    if (config.http.enabled) {
      httpServer = new HTTPServer(
        {
          store,
          config,
          getLastTick: () => scheduler.getLastTick(),
          inspectProcess: () => inspector.inspect(),
          now: this.options.now,
        },
        this.eventBus,
        config.http,
      );
      try {
        await httpServer.start();
      } catch (err) {
        store.close();
        throw err;
      }
    }

    const maintenanceTimer = setInterval(() => {
      this.runMaintenance();
    }, config.retention.checkIntervalMs);
    maintenanceTimer.unref();

    this.parts = { store, scheduler, httpServer, maintenanceTimer };

    this.runMaintenance();
    // a corrupt store found by the first pass has already begun shutdown
    if (this.stopping) return;
    scheduler.start();

    if (this.options.handleSignals ?? true) {
      this.setupSignalHandlers();
    }

    logger.info({ pid: process.pid }, 'dhtwatch daemon started');
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  /** Apply retention: drop records past the age horizon, then cap row counts. */
  runMaintenance(): PruneResult | null {
    if (!this.parts) return null;
    const { store } = this.parts;
    const { maxAgeMs, maxRows } = this.config.retention;
    const now = this.options.now ?? Date.now;

    try {
      const byAge = store.prune(new Date(now() - maxAgeMs));
      const byRows = store.enforceMaxRows(maxRows);
      const result: PruneResult = {
        sample: byAge.sample + byRows.sample,
        traffic: byAge.traffic + byRows.traffic,
        captureFailures: byAge.captureFailures + byRows.captureFailures,
      };
      if (result.sample + result.traffic + result.captureFailures > 0) {
        logger.info(result, 'Retention removed old records');
        this.eventBus.emit('store:pruned', result);
      }
      return result;
    } catch (err) {
      if (err instanceof StoreCorruptionError) {
        this.handleFatal(err);
      } else {
        logger.error({ err }, 'Maintenance task failed');
      }
      return null;
    }
  }

  private async shutdown(): Promise<void> {
    const parts = this.parts;
    if (!parts) return;

    logger.info('dhtwatch daemon stopping...');
    this.removeSignalHandlers();
    clearInterval(parts.maintenanceTimer);

    await parts.scheduler.stop();
    if (parts.httpServer) {
      await parts.httpServer.stop();
    }
    parts.store.close();

    this.eventBus.emit('system:shutdown', undefined);
    this.eventBus.removeAllListeners();
    this.parts = null;

    logger.info('dhtwatch daemon stopped');
  }

  private handleFatal(err: StoreError): void {
    logger.fatal({ err }, 'Unrecoverable metric store failure');
    const exit = this.options.exit ?? ((code: number) => process.exit(code));
    this.stop()
      .catch((stopErr: unknown) => {
        logger.error({ err: stopErr }, 'Shutdown after fatal error failed');
      })
      .finally(() => exit(1));
  }

  private setupSignalHandlers(): void {
    const exit = this.options.exit ?? ((code: number) => process.exit(code));
    const handler = () => {
      logger.info('Received shutdown signal');
      this.stop()
        .then(() => exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          exit(1);
        });
    };
    this.signalHandler = handler;
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  }

  private removeSignalHandlers(): void {
    if (this.signalHandler) {
      process.off('SIGINT', this.signalHandler);
      process.off('SIGTERM', this.signalHandler);
      this.signalHandler = null;
    }
  }
}
