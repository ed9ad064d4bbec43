import { StoreCorruptionError, StoreError, StoreReadError, StoreWriteError } from '@dhtwatch/shared';

const CORRUPTION_CODES = new Set(['SQLITE_CORRUPT', 'SQLITE_NOTADB']);

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function isCorruption(err: unknown): boolean {
  const code = sqliteCode(err);
  return code !== null && CORRUPTION_CODES.has(code);
}

export function toStoreError(operation: string, mode: 'read' | 'write', err: unknown): StoreError {
  if (err instanceof StoreError) return err;
  if (isCorruption(err)) return new StoreCorruptionError(operation, { cause: err });
  return mode === 'read'
    ? new StoreReadError(operation, { cause: err })
    : new StoreWriteError(operation, { cause: err });
}
