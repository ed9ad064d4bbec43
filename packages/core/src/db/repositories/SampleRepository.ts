import type BetterSqlite3 from 'better-sqlite3';
import type { Sample, StoredSample } from '@dhtwatch/shared';
import type { TableStats } from './TableStats.js';

export interface SampleRow {
  id: number;
  timestamp: number;
  cpu_percent: number | null;
  mem_percent: number | null;
  disk_percent: number | null;
  mem_used_bytes: number | null;
  mem_total_bytes: number | null;
  disk_used_bytes: number | null;
  disk_total_bytes: number | null;
}

type SampleParams = [
  number,
  number | null,
  number | null,
  number | null,
  number | null,
  number | null,
  number | null,
  number | null,
];

export function toStoredSample(row: SampleRow): StoredSample {
  return {
    kind: 'sample',
    id: row.id,
    timestamp: new Date(row.timestamp),
    cpuPercent: row.cpu_percent,
    memPercent: row.mem_percent,
    diskPercent: row.disk_percent,
    memUsedBytes: row.mem_used_bytes,
    memTotalBytes: row.mem_total_bytes,
    diskUsedBytes: row.disk_used_bytes,
    diskTotalBytes: row.disk_total_bytes,
  };
}

export class SampleRepository {
  private db: BetterSqlite3.Database;
  private insertStmt: BetterSqlite3.Statement<SampleParams>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.insertStmt = db.prepare<SampleParams>(`
      INSERT INTO samples (
        timestamp, cpu_percent, mem_percent, disk_percent,
        mem_used_bytes, mem_total_bytes, disk_used_bytes, disk_total_bytes
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  insert(sample: Sample): StoredSample {
    const result = this.insertStmt.run(
      sample.timestamp.getTime(),
      sample.cpuPercent,
      sample.memPercent,
      sample.diskPercent,
      sample.memUsedBytes,
      sample.memTotalBytes,
      sample.diskUsedBytes,
      sample.diskTotalBytes,
    );
    return { kind: 'sample', ...sample, id: Number(result.lastInsertRowid) };
  }

  getRange(startTime: number, endTime: number): StoredSample[] {
    return this.db
      .prepare<[number, number], SampleRow>(
        'SELECT * FROM samples WHERE timestamp BETWEEN ? AND ? ORDER BY timestamp, id',
      )
      .all(startTime, endTime)
      .map(toStoredSample);
  }

  getRecent(limit: number): StoredSample[] {
    return this.db
      .prepare<[number], SampleRow>(`
        SELECT * FROM (
          SELECT * FROM samples ORDER BY timestamp DESC, id DESC LIMIT ?
        ) ORDER BY timestamp, id
      `)
      .all(limit)
      .map(toStoredSample);
  }

  getLatest(): StoredSample | null {
    const row = this.db
      .prepare<[], SampleRow>('SELECT * FROM samples ORDER BY timestamp DESC, id DESC LIMIT 1')
      .get();
    return row ? toStoredSample(row) : null;
  }

  stats(): TableStats {
    const row = this.db
      .prepare<[], TableStats>(
        'SELECT COUNT(*) as count, MIN(timestamp) as earliest, MAX(timestamp) as latest FROM samples',
      )
      .get();
    return row ?? { count: 0, earliest: null, latest: null };
  }

  deleteBefore(cutoff: number): number {
    return this.db.prepare<[number]>('DELETE FROM samples WHERE timestamp < ?').run(cutoff).changes;
  }

  trimTo(maxRows: number): number {
    const { count } = this.stats();
    if (count <= maxRows) return 0;
    return this.db
      .prepare<[number]>(
        'DELETE FROM samples WHERE id IN (SELECT id FROM samples ORDER BY timestamp, id LIMIT ?)',
      )
      .run(count - maxRows).changes;
  }
}
