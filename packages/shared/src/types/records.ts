export type MetricName = 'cpu' | 'memory' | 'disk';

/**
 * One host reading. A metric that could not be read is `null`.
 */
export interface Sample {
  timestamp: Date;
  cpuPercent: number | null;
  memPercent: number | null;
  diskPercent: number | null;
  memUsedBytes: number | null;
  memTotalBytes: number | null;
  diskUsedBytes: number | null;
  diskTotalBytes: number | null;
}

export interface TopTalker {
  address: string;
  bytes: number;
  packets: number;
}

export interface NodeCandidate {
  /** `node-` followed by the first 8 hex chars of the address hash */
  id: string;
  ipHash: string;
  score: number;
  lifetimeSec: number;
  windowsSeen: number;
  inBytes: number;
  outBytes: number;
  inPackets: number;
  outPackets: number;
}

export interface TrafficWindow {
  /** End of the capture window */
  timestamp: Date;
  windowMs: number;
  uniquePeers: number;
  totalBytes: number;
  totalPackets: number;
  inBytes: number;
  outBytes: number;
  inPackets: number;
  outPackets: number;
  newPeers: number;
  expiredPeers: number;
  skippedLines: number;
  topTalkers: TopTalker[];
  nodeCandidates: NodeCandidate[];
}

export type RecordKind = 'sample' | 'traffic';

export type NewSampleRecord = { kind: 'sample' } & Sample;
export type NewTrafficRecord = { kind: 'traffic' } & TrafficWindow;
export type NewRecord = NewSampleRecord | NewTrafficRecord;

export type StoredSample = NewSampleRecord & { id: number };
export type StoredTrafficWindow = NewTrafficRecord & { id: number };
export type StoredRecord = StoredSample | StoredTrafficWindow;

export type CaptureFailureCode = 'CAPTURE_TOOL_UNAVAILABLE' | 'CAPTURE_TIMEOUT';

export interface CaptureFailure {
  timestamp: Date;
  code: CaptureFailureCode;
  message: string;
}

export interface StoredCaptureFailure extends CaptureFailure {
  id: number;
}

export interface StoreSummary {
  counts: Record<RecordKind, number>;
  captureFailures: number;
  earliest: Date | null;
  latest: Date | null;
  storageBytes: number;
}

export interface ProcessInfo {
  name: string;
  running: boolean;
  pid: number | null;
  cpuPercent: number | null;
  memoryBytes: number | null;
  uptimeSeconds: number | null;
}
