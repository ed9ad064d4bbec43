import type { FastifyReply } from 'fastify';
import { z } from 'zod';
import { MAX_RECENT_LIMIT, StoreError, getLogger } from '@dhtwatch/shared';

const logger = getLogger();

const limitSchema = z.coerce.number().int().min(1).max(MAX_RECENT_LIMIT).optional();

export const recordQuerySchema = z
  .object({
    limit: limitSchema,
    start: z.coerce.date().optional(),
    end: z.coerce.date().optional(),
  })
  .refine((query) => (query.start === undefined) === (query.end === undefined), {
    message: 'start and end must be given together',
  })
  .refine((query) => query.limit === undefined || query.start === undefined, {
    message: 'limit cannot be combined with start and end',
  });

export const limitQuerySchema = z.object({ limit: limitSchema });

export type RecordQuery = z.infer<typeof recordQuerySchema>;

export function formatQueryError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
    .join('; ');
}

/**
 * Answer a failed store call: 503 for store errors, rethrow anything else
 * for fastify's default 500.
 */
export function sendStoreError(reply: FastifyReply, err: unknown): { error: string; code: string } {
  if (!(err instanceof StoreError)) throw err;
  logger.error({ err }, 'Store read failed while serving request');
  reply.status(503);
  return { error: err.message, code: err.code };
}
