export interface EventBusMessage {
  id: string;
  type: string;
  source: string;
  timestamp: Date;
  data: unknown;
}

export type TickOutcome = 'written' | 'failed' | 'skipped';

export interface TickReport {
  startedAt: Date;
  finishedAt: Date;
  sample: TickOutcome;
  traffic: TickOutcome;
  sampleError: string | null;
  captureError: { code: string; message: string } | null;
}
