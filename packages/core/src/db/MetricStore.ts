import type BetterSqlite3 from 'better-sqlite3';
import type {
  CaptureFailure,
  NewRecord,
  NewSampleRecord,
  NewTrafficRecord,
  RecordKind,
  StoredCaptureFailure,
  StoredRecord,
  StoredSample,
  StoredTrafficWindow,
  StoreSummary,
} from '@dhtwatch/shared';
import { getLogger } from '@dhtwatch/shared';
import { SampleRepository } from './repositories/SampleRepository.js';
import { TrafficWindowRepository } from './repositories/TrafficWindowRepository.js';
import { CaptureFailureRepository } from './repositories/CaptureFailureRepository.js';
import { toStoreError } from './errors.js';

const logger = getLogger();

export interface PruneResult {
  sample: number;
  traffic: number;
  captureFailures: number;
}

/**
 * Durable append-only store for samples, traffic windows and capture failures.
 *
 * Every public method either completes or throws a StoreError subclass;
 * SQLite errors never leak. Reads return materialized arrays, so a prune
 * running afterwards does not change what a caller already holds.
 */
export class MetricStore {
  private db: BetterSqlite3.Database;
  private samples: SampleRepository;
  private traffic: TrafficWindowRepository;
  private failures: CaptureFailureRepository;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.samples = new SampleRepository(db);
    this.traffic = new TrafficWindowRepository(db);
    this.failures = new CaptureFailureRepository(db);
  }

  append(record: NewSampleRecord): StoredSample;
  append(record: NewTrafficRecord): StoredTrafficWindow;
  append(record: NewRecord): StoredRecord;
  append(record: NewRecord): StoredRecord {
    return this.write(`append ${record.kind}`, () =>
      record.kind === 'sample' ? this.samples.insert(record) : this.traffic.insert(record),
    );
  }

  /** Records with `from <= timestamp <= to`, oldest first. */
  queryRange(kind: 'sample', from: Date, to: Date): StoredSample[];
  queryRange(kind: 'traffic', from: Date, to: Date): StoredTrafficWindow[];
  queryRange(kind: RecordKind, from: Date, to: Date): StoredRecord[];
  queryRange(kind: RecordKind, from: Date, to: Date): StoredRecord[] {
    if (from.getTime() > to.getTime()) return [];
    return this.read(`query ${kind} range`, () =>
      kind === 'sample'
        ? this.samples.getRange(from.getTime(), to.getTime())
        : this.traffic.getRange(from.getTime(), to.getTime()),
    );
  }

  /** The newest `limit` records, returned oldest first. */
  recent(kind: 'sample', limit: number): StoredSample[];
  recent(kind: 'traffic', limit: number): StoredTrafficWindow[];
  recent(kind: RecordKind, limit: number): StoredRecord[];
  recent(kind: RecordKind, limit: number): StoredRecord[] {
    if (limit <= 0) return [];
    return this.read(`recent ${kind}`, () =>
      kind === 'sample' ? this.samples.getRecent(limit) : this.traffic.getRecent(limit),
    );
  }

  latest(kind: 'sample'): StoredSample | null;
  latest(kind: 'traffic'): StoredTrafficWindow | null;
  latest(kind: RecordKind): StoredRecord | null;
  latest(kind: RecordKind): StoredRecord | null {
    return this.read(`latest ${kind}`, () =>
      kind === 'sample' ? this.samples.getLatest() : this.traffic.getLatest(),
    );
  }

  summaryStats(): StoreSummary {
    return this.read('summary', () => {
      const sample = this.samples.stats();
      const traffic = this.traffic.stats();
      const earliest = minOf(sample.earliest, traffic.earliest);
      const latest = maxOf(sample.latest, traffic.latest);

      return {
        counts: { sample: sample.count, traffic: traffic.count },
        captureFailures: this.failures.count(),
        earliest: earliest === null ? null : new Date(earliest),
        latest: latest === null ? null : new Date(latest),
        storageBytes: this.storageBytes(),
      };
    });
  }

  recordCaptureFailure(failure: CaptureFailure): StoredCaptureFailure {
    return this.write('append capture failure', () => this.failures.insert(failure));
  }

  /** Newest first. */
  recentCaptureFailures(limit: number): StoredCaptureFailure[] {
    if (limit <= 0) return [];
    return this.read('recent capture failures', () => this.failures.getRecent(limit));
  }

  /** Delete every record older than `olderThan`, all kinds in one transaction. */
  prune(olderThan: Date): PruneResult {
    const cutoff = olderThan.getTime();
    const result = this.write('prune', () =>
      this.db.transaction(
        (): PruneResult => ({
          sample: this.samples.deleteBefore(cutoff),
          traffic: this.traffic.deleteBefore(cutoff),
          captureFailures: this.failures.deleteBefore(cutoff),
        }),
      )(),
    );
    logger.debug({ cutoff: olderThan.toISOString(), ...result }, 'Pruned metric store');
    return result;
  }

  /** Keep at most `maxRows` records of each kind, dropping the oldest. */
  enforceMaxRows(maxRows: number): PruneResult {
    return this.write('enforce max rows', () =>
      this.db.transaction(
        (): PruneResult => ({
          sample: this.samples.trimTo(maxRows),
          traffic: this.traffic.trimTo(maxRows),
          captureFailures: 0,
        }),
      )(),
    );
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private storageBytes(): number {
    const pageCount = this.db.pragma('page_count', { simple: true });
    const pageSize = this.db.pragma('page_size', { simple: true });
    if (typeof pageCount !== 'number' || typeof pageSize !== 'number') return 0;
    return pageCount * pageSize;
  }

  private read<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStoreError(operation, 'read', err);
    }
  }

  private write<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw toStoreError(operation, 'write', err);
    }
  }
}

function minOf(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.min(a, b);
}

function maxOf(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}
