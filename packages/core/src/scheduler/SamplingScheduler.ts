import type { RecordKind, Sample, TickOutcome, TickReport, TrafficWindow } from '@dhtwatch/shared';
import {
  CaptureError,
  SamplerTimeoutError,
  StoreError,
  getLogger,
} from '@dhtwatch/shared';
import type { MetricStore } from '../db/MetricStore.js';
import type { EventBus } from '../events/EventBus.js';

const logger = getLogger();

export interface SampleSource {
  sample(): Promise<Sample>;
}

export interface TrafficSource {
  captureWindow(durationMs: number, signal?: AbortSignal): Promise<TrafficWindow>;
}

export interface SamplingSchedulerOptions {
  store: MetricStore;
  sampler: SampleSource;
  capture: TrafficSource;
  eventBus: EventBus;
  intervalMs: number;
  windowMs: number;
  onFatal?: (err: StoreError) => void;
  now?: () => number;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new SamplerTimeoutError(timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives the monitor: one tick per interval, each taking a system sample
 * and a capture window concurrently. The next tick is armed only after the
 * current one has been written, so ticks never overlap.
 */
export class SamplingScheduler {
  private store: MetricStore;
  private sampler: SampleSource;
  private capture: TrafficSource;
  private eventBus: EventBus;
  private intervalMs: number;
  private windowMs: number;
  private onFatal: (err: StoreError) => void;
  private now: () => number;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private lastTick: Readonly<TickReport> | null = null;
  private lastTimestamps: Record<RecordKind, number> = { sample: 0, traffic: 0 };

  constructor(options: SamplingSchedulerOptions) {
    this.store = options.store;
    this.sampler = options.sampler;
    this.capture = options.capture;
    this.eventBus = options.eventBus;
    this.intervalMs = options.intervalMs;
    this.windowMs = options.windowMs;
    this.onFatal = options.onFatal ?? (() => undefined);
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getLastTick(): Readonly<TickReport> | null {
    return this.lastTick;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info(
      { intervalMs: this.intervalMs, windowMs: this.windowMs },
      'Sampling scheduler started',
    );
    this.schedule(0);
  }

  /** Cancel any in-flight capture and wait for the current tick to settle. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.abortController?.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('Sampling scheduler stopped');
  }

  /**
   * Run one tick: sample and capture concurrently, then persist whatever
   * succeeded. Store errors propagate; everything else ends up in the report.
   */
  async tick(): Promise<Readonly<TickReport>> {
    const startedAt = this.now();
    const controller = new AbortController();
    this.abortController = controller;

    const [sampleResult, captureResult] = await Promise.allSettled([
      withTimeout(this.sampler.sample(), this.intervalMs),
      this.capture.captureWindow(this.windowMs, controller.signal),
    ]);
    this.abortController = null;

    let sample: TickOutcome = 'failed';
    let sampleError: string | null = null;
    if (sampleResult.status === 'fulfilled') {
      const stored = this.store.append({
        kind: 'sample',
        ...sampleResult.value,
        timestamp: this.monotonic('sample', sampleResult.value.timestamp),
      });
      sample = 'written';
      this.eventBus.emit('tick:sample', stored);
    } else {
      sampleError = errorMessage(sampleResult.reason);
      logger.error({ err: sampleResult.reason }, 'System sample failed');
    }

    let traffic: TickOutcome = 'failed';
    let captureError: TickReport['captureError'] = null;
    if (captureResult.status === 'fulfilled') {
      const stored = this.store.append({
        kind: 'traffic',
        ...captureResult.value,
        timestamp: this.monotonic('traffic', captureResult.value.timestamp),
      });
      traffic = 'written';
      this.eventBus.emit('tick:traffic', stored);
    } else {
      const err: unknown = captureResult.reason;
      if (err instanceof CaptureError) {
        const code = err.code;
        if (code === 'CAPTURE_CANCELLED') {
          traffic = 'skipped';
          logger.debug('Capture cancelled, window discarded');
        } else {
          captureError = { code, message: err.message };
          const failure = { timestamp: new Date(startedAt), code, message: err.message };
          this.store.recordCaptureFailure(failure);
          this.eventBus.emit('tick:capture-failed', failure);
          logger.warn({ err }, 'Capture window failed');
        }
      } else {
        captureError = { code: 'CAPTURE_FAILED', message: errorMessage(err) };
        logger.error({ err }, 'Capture window failed unexpectedly');
      }
    }

    const report: Readonly<TickReport> = Object.freeze({
      startedAt: new Date(startedAt),
      finishedAt: new Date(this.now()),
      sample,
      traffic,
      sampleError,
      captureError,
    });
    this.lastTick = report;
    this.eventBus.emit('tick:complete', report);
    return report;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runScheduledTick();
    }, delayMs);
  }

  private async runScheduledTick(): Promise<void> {
    const startedAt = this.now();
    try {
      await this.tick();
    } catch (err) {
      if (err instanceof StoreError) {
        this.running = false;
        logger.fatal({ err }, 'Metric store failure, stopping scheduler');
        this.onFatal(err);
      } else {
        logger.error({ err }, 'Tick failed');
      }
    } finally {
      this.inFlight = null;
    }

    if (this.running) {
      const elapsed = this.now() - startedAt;
      this.schedule(Math.max(0, this.intervalMs - elapsed));
    }
  }

  /** Never let a kind's timestamps go backwards when the clock steps back. */
  private monotonic(kind: RecordKind, timestamp: Date): Date {
    const ms = Math.max(timestamp.getTime(), this.lastTimestamps[kind]);
    this.lastTimestamps[kind] = ms;
    return ms === timestamp.getTime() ? timestamp : new Date(ms);
  }
}
