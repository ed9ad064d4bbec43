import type BetterSqlite3 from 'better-sqlite3';
import { z } from 'zod';
import type { StoredTrafficWindow, TrafficWindow } from '@dhtwatch/shared';
import { StoreCorruptionError } from '@dhtwatch/shared';
import type { TableStats } from './TableStats.js';

export interface TrafficWindowRow {
  id: number;
  timestamp: number;
  window_ms: number;
  unique_peers: number;
  total_bytes: number;
  total_packets: number;
  in_bytes: number;
  out_bytes: number;
  in_packets: number;
  out_packets: number;
  new_peers: number;
  expired_peers: number;
  skipped_lines: number;
  top_talkers: string;
  node_candidates: string;
}

type TrafficWindowParams = [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  string,
  string,
];

const topTalkersSchema = z.array(
  z.object({
    address: z.string(),
    bytes: z.number(),
    packets: z.number(),
  }),
);

const nodeCandidatesSchema = z.array(
  z.object({
    id: z.string(),
    ipHash: z.string(),
    score: z.number(),
    lifetimeSec: z.number(),
    windowsSeen: z.number(),
    inBytes: z.number(),
    outBytes: z.number(),
    inPackets: z.number(),
    outPackets: z.number(),
  }),
);

function parseJsonColumn<T>(schema: z.ZodType<T>, text: string, column: string, id: number): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new StoreCorruptionError(`decode traffic_windows.${column} #${id}`, { cause: err });
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new StoreCorruptionError(`decode traffic_windows.${column} #${id}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function toStoredTrafficWindow(row: TrafficWindowRow): StoredTrafficWindow {
  return {
    kind: 'traffic',
    id: row.id,
    timestamp: new Date(row.timestamp),
    windowMs: row.window_ms,
    uniquePeers: row.unique_peers,
    totalBytes: row.total_bytes,
    totalPackets: row.total_packets,
    inBytes: row.in_bytes,
    outBytes: row.out_bytes,
    inPackets: row.in_packets,
    outPackets: row.out_packets,
    newPeers: row.new_peers,
    expiredPeers: row.expired_peers,
    skippedLines: row.skipped_lines,
    topTalkers: parseJsonColumn(topTalkersSchema, row.top_talkers, 'top_talkers', row.id),
    nodeCandidates: parseJsonColumn(
      nodeCandidatesSchema,
      row.node_candidates,
      'node_candidates',
      row.id,
    ),
  };
}

export class TrafficWindowRepository {
  private db: BetterSqlite3.Database;
  private insertStmt: BetterSqlite3.Statement<TrafficWindowParams>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.insertStmt = db.prepare<TrafficWindowParams>(`
      INSERT INTO traffic_windows (
        timestamp, window_ms, unique_peers, total_bytes, total_packets,
        in_bytes, out_bytes, in_packets, out_packets,
        new_peers, expired_peers, skipped_lines, top_talkers, node_candidates
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  insert(window: TrafficWindow): StoredTrafficWindow {
    const result = this.insertStmt.run(
      window.timestamp.getTime(),
      window.windowMs,
      window.uniquePeers,
      window.totalBytes,
      window.totalPackets,
      window.inBytes,
      window.outBytes,
      window.inPackets,
      window.outPackets,
      window.newPeers,
      window.expiredPeers,
      window.skippedLines,
      JSON.stringify(window.topTalkers),
      JSON.stringify(window.nodeCandidates),
    );
    return { kind: 'traffic', ...window, id: Number(result.lastInsertRowid) };
  }

  getRange(startTime: number, endTime: number): StoredTrafficWindow[] {
    return this.db
      .prepare<[number, number], TrafficWindowRow>(
        'SELECT * FROM traffic_windows WHERE timestamp BETWEEN ? AND ? ORDER BY timestamp, id',
      )
      .all(startTime, endTime)
      .map(toStoredTrafficWindow);
  }

  getRecent(limit: number): StoredTrafficWindow[] {
    return this.db
      .prepare<[number], TrafficWindowRow>(`
        SELECT * FROM (
          SELECT * FROM traffic_windows ORDER BY timestamp DESC, id DESC LIMIT ?
        ) ORDER BY timestamp, id
      `)
      .all(limit)
      .map(toStoredTrafficWindow);
  }

  getLatest(): StoredTrafficWindow | null {
    const row = this.db
      .prepare<[], TrafficWindowRow>(
        'SELECT * FROM traffic_windows ORDER BY timestamp DESC, id DESC LIMIT 1',
      )
      .get();
    return row ? toStoredTrafficWindow(row) : null;
  }

  stats(): TableStats {
    const row = this.db
      .prepare<[], TableStats>(
        'SELECT COUNT(*) as count, MIN(timestamp) as earliest, MAX(timestamp) as latest FROM traffic_windows',
      )
      .get();
    return row ?? { count: 0, earliest: null, latest: null };
  }

  deleteBefore(cutoff: number): number {
    return this.db
      .prepare<[number]>('DELETE FROM traffic_windows WHERE timestamp < ?')
      .run(cutoff).changes;
  }

  trimTo(maxRows: number): number {
    const { count } = this.stats();
    if (count <= maxRows) return 0;
    return this.db
      .prepare<[number]>(
        'DELETE FROM traffic_windows WHERE id IN (SELECT id FROM traffic_windows ORDER BY timestamp, id LIMIT ?)',
      )
      .run(count - maxRows).changes;
  }
}
