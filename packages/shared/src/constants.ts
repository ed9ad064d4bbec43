import { homedir } from 'node:os';
import { join } from 'node:path';

export const DHTWATCH_HOME = process.env.DHTWATCH_HOME || join(homedir(), '.dhtwatch');
export const DHTWATCH_DB_FILE = join(DHTWATCH_HOME, 'dhtwatch.db');
export const DHTWATCH_CONFIG_FILE = 'dhtwatch.config.json';

export const DHTWATCH_VERSION = '0.3.0';

// DHT traffic of dna-nodus bootstrap nodes
export const DEFAULT_DHT_PORT = 4000;
export const DEFAULT_CAPTURE_TOOL = 'tshark';
export const DEFAULT_CAPTURE_INTERFACE = 'any';
export const DEFAULT_CAPTURE_FILTER = `udp port ${DEFAULT_DHT_PORT}`;
export const DEFAULT_CAPTURE_WINDOW = '60s';
export const DEFAULT_CAPTURE_GRACE = '10s';
export const DEFAULT_KILL_TIMEOUT = 5000;
export const DEFAULT_TOP_TALKERS = 10;

export const DEFAULT_TICK_INTERVAL = '60s';
export const DEFAULT_DISK_PATH = '/';

export const DEFAULT_RETENTION_MAX_AGE = '30d';
export const DEFAULT_RETENTION_MAX_ROWS = 1_000_000;
export const DEFAULT_RETENTION_CHECK_INTERVAL = '1h';

export const DEFAULT_HTTP_HOST = '0.0.0.0';
export const DEFAULT_HTTP_PORT = 8080;
export const DEFAULT_RECENT_LIMIT = 60;
export const MAX_RECENT_LIMIT = 10_000;

export const DEFAULT_WATCH_PROCESS = 'dna-nodus';
export const PROCESS_LOOKUP_TIMEOUT = 2000;

// Node candidate heuristics
export const NODE_MIN_WINDOWS = 20;
export const NODE_MIN_LIFETIME_SEC = 10 * 60;
export const NODE_MIN_BYTES = 200_000;
export const NODE_MIN_PACKETS = 500;
export const NODE_MIN_SCORE = 0.2;
export const NODE_CANDIDATE_LIMIT = 20;
export const NODE_IDLE_EVICTION_MS = 24 * 60 * 60 * 1000;
