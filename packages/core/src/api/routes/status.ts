import { hostname } from 'node:os';
import type { FastifyInstance } from 'fastify';
import type {
  MonitorConfig,
  ProcessInfo,
  StoredTrafficWindow,
  TickReport,
} from '@dhtwatch/shared';
import { DEFAULT_RECENT_LIMIT } from '@dhtwatch/shared';
import type { MetricStore } from '../../db/MetricStore.js';
import { formatQueryError, limitQuerySchema, sendStoreError } from './query.js';

export interface StatusContext {
  store: MetricStore;
  config: MonitorConfig;
  getLastTick: () => Readonly<TickReport> | null;
  inspectProcess: () => Promise<ProcessInfo | null>;
  now?: () => number;
}

export type HealthStatus = 'cold' | 'ok' | 'idle' | 'failing';

export function registerStatusRoutes(app: FastifyInstance, context: StatusContext): void {
  const { store, config, getLastTick, inspectProcess } = context;
  const now = context.now ?? Date.now;

  app.get('/api/v1/summary', async (_request, reply) => {
    try {
      return store.summaryStats();
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  app.get('/api/v1/capture-failures', async (request, reply) => {
    const parsed = limitQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      reply.status(400);
      return { error: formatQueryError(parsed.error) };
    }
    try {
      return store.recentCaptureFailures(parsed.data.limit ?? DEFAULT_RECENT_LIMIT);
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  app.get('/api/v1/health', async (_request, reply) => {
    let latest: StoredTrafficWindow | null;
    let points: number;
    try {
      latest = store.latest('traffic');
      points = store.summaryStats().counts.traffic;
    } catch (err) {
      return sendStoreError(reply, err);
    }

    const lastTick = getLastTick();
    let status: HealthStatus;
    if (lastTick?.traffic === 'failed') {
      status = 'failing';
    } else if (!latest) {
      status = 'cold';
    } else {
      status = latest.totalPackets > 0 ? 'ok' : 'idle';
    }

    return {
      status,
      points,
      lastTimestamp: latest?.timestamp ?? null,
      lastBytes: latest?.totalBytes ?? null,
      lastPackets: latest?.totalPackets ?? null,
      lastPeers: latest?.uniquePeers ?? null,
      ageSeconds: latest ? Math.max(0, (now() - latest.timestamp.getTime()) / 1000) : null,
      intervalSeconds: config.scheduler.intervalMs / 1000,
      lastTick,
      process: await inspectProcess(),
    };
  });

  app.get('/api/v1/config', async () => ({
    hostname: hostname(),
    interface: config.capture.interface,
    filter: config.capture.filter,
    windowSeconds: config.capture.windowMs / 1000,
    intervalSeconds: config.scheduler.intervalMs / 1000,
    httpHost: config.http.host,
    httpPort: config.http.port,
    watchProcess: config.watchProcess,
  }));
}
