import type BetterSqlite3 from 'better-sqlite3';

export function up(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS samples (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      cpu_percent REAL,
      mem_percent REAL,
      disk_percent REAL,
      mem_used_bytes INTEGER,
      mem_total_bytes INTEGER,
      disk_used_bytes INTEGER,
      disk_total_bytes INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_samples_timestamp
      ON samples(timestamp);

    CREATE TABLE IF NOT EXISTS traffic_windows (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      window_ms INTEGER NOT NULL,
      unique_peers INTEGER NOT NULL,
      total_bytes INTEGER NOT NULL,
      total_packets INTEGER NOT NULL,
      in_bytes INTEGER NOT NULL DEFAULT 0,
      out_bytes INTEGER NOT NULL DEFAULT 0,
      in_packets INTEGER NOT NULL DEFAULT 0,
      out_packets INTEGER NOT NULL DEFAULT 0,
      new_peers INTEGER NOT NULL DEFAULT 0,
      expired_peers INTEGER NOT NULL DEFAULT 0,
      skipped_lines INTEGER NOT NULL DEFAULT 0,
      top_talkers TEXT NOT NULL DEFAULT '[]',
      node_candidates TEXT NOT NULL DEFAULT '[]'
    );

    CREATE INDEX IF NOT EXISTS idx_traffic_windows_timestamp
      ON traffic_windows(timestamp);
  `);
}
