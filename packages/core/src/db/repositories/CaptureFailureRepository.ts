import type BetterSqlite3 from 'better-sqlite3';
import type { CaptureFailure, CaptureFailureCode, StoredCaptureFailure } from '@dhtwatch/shared';

export interface CaptureFailureRow {
  id: number;
  timestamp: number;
  code: string;
  message: string;
}

function toFailureCode(code: string): CaptureFailureCode {
  return code === 'CAPTURE_TIMEOUT' ? 'CAPTURE_TIMEOUT' : 'CAPTURE_TOOL_UNAVAILABLE';
}

export class CaptureFailureRepository {
  private db: BetterSqlite3.Database;
  private insertStmt: BetterSqlite3.Statement<[number, string, string]>;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;
    this.insertStmt = db.prepare<[number, string, string]>(
      'INSERT INTO capture_failures (timestamp, code, message) VALUES (?, ?, ?)',
    );
  }

  insert(failure: CaptureFailure): StoredCaptureFailure {
    const result = this.insertStmt.run(failure.timestamp.getTime(), failure.code, failure.message);
    return { ...failure, id: Number(result.lastInsertRowid) };
  }

  getRecent(limit: number): StoredCaptureFailure[] {
    return this.db
      .prepare<[number], CaptureFailureRow>(
        'SELECT * FROM capture_failures ORDER BY timestamp DESC, id DESC LIMIT ?',
      )
      .all(limit)
      .map((row) => ({
        id: row.id,
        timestamp: new Date(row.timestamp),
        code: toFailureCode(row.code),
        message: row.message,
      }));
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM capture_failures')
      .get();
    return row?.count ?? 0;
  }

  deleteBefore(cutoff: number): number {
    return this.db
      .prepare<[number]>('DELETE FROM capture_failures WHERE timestamp < ?')
      .run(cutoff).changes;
  }
}
