import type { FastifyInstance } from 'fastify';
import type { RecordKind, StoredRecord } from '@dhtwatch/shared';
import { DEFAULT_RECENT_LIMIT } from '@dhtwatch/shared';
import type { MetricStore } from '../../db/MetricStore.js';
import type { RecordQuery } from './query.js';
import { formatQueryError, recordQuerySchema, sendStoreError } from './query.js';

function selectRecords(store: MetricStore, kind: RecordKind, query: RecordQuery): StoredRecord[] {
  if (query.start && query.end) {
    return store.queryRange(kind, query.start, query.end);
  }
  return store.recent(kind, query.limit ?? DEFAULT_RECENT_LIMIT);
}

export function registerRecordRoutes(app: FastifyInstance, store: MetricStore): void {
  for (const [path, kind] of [
    ['/api/v1/windows', 'traffic'],
    ['/api/v1/samples', 'sample'],
  ] as const) {
    app.get(path, async (request, reply) => {
      const parsed = recordQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        reply.status(400);
        return { error: formatQueryError(parsed.error) };
      }
      try {
        return selectRecords(store, kind, parsed.data);
      } catch (err) {
        return sendStoreError(reply, err);
      }
    });
  }

  app.get('/api/v1/windows/latest', async (_request, reply) => {
    try {
      const latest = store.latest('traffic');
      if (!latest) {
        reply.status(404);
        return { error: 'No traffic window recorded yet' };
      }
      return latest;
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  app.get('/api/v1/samples/latest', async (_request, reply) => {
    try {
      const latest = store.latest('sample');
      if (!latest) {
        reply.status(404);
        return { error: 'No system sample recorded yet' };
      }
      return latest;
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  // Likely DHT nodes as of the latest window
  app.get('/api/v1/nodes', async (_request, reply) => {
    try {
      return store.latest('traffic')?.nodeCandidates ?? [];
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });
}
