import type Database from 'libsql';
import { DomainError, InvariantViolationError, StoreUnavailableError } from '../errors.js';

const SLEEP_BUFFER = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
const SLEEP_VIEW = new Int32Array(SLEEP_BUFFER);

function blockingSleep(ms: number): void {
  if (ms <= 0) {
    return;
  }
  const deadline = Date.now() + ms;
  while (true) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return;
    }
    Atomics.wait(SLEEP_VIEW, 0, 0, remaining);
  }
}

function sqliteCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === 'string' && code.startsWith('SQLITE_') ? code : undefined;
}

function isBusyError(err: unknown): boolean {
  const code = sqliteCode(err);
  return (
    code === 'SQLITE_BUSY' ||
    (err instanceof Error && err.message.includes('SQLITE_BUSY'))
  );
}

/**
 * Translate a failure escaping a transaction. Domain rejections pass through,
 * constraint failures are invariant violations caught by the schema, and any
 * other SQLite error is a storage fault.
 */
export function translateStoreError(err: unknown): unknown {
  if (err instanceof DomainError) {
    return err;
  }
  const code = sqliteCode(err);
  if (code === undefined) {
    if (err instanceof Error && /constraint failed/i.test(err.message)) {
      return new InvariantViolationError([err.message]);
    }
    return err;
  }
  const message = err instanceof Error ? err.message : code;
  if (code.startsWith('SQLITE_CONSTRAINT')) {
    return new InvariantViolationError([message]);
  }
  return new StoreUnavailableError(message, { cause: err });
}

/**
 * Execute a function within a write transaction using BEGIN IMMEDIATE.
 * This takes the write lock up front, so the checks a caller makes inside
 * `fn` cannot race another writer. Retries SQLITE_BUSY with backoff.
 */
export function withWriteTransaction<T>(
  db: Database.Database,
  fn: () => T,
  opts?: { retries?: number; busySleepMs?: number }
): T {
  const retries = opts?.retries ?? 5;
  const busySleepMs = opts?.busySleepMs ?? 25;
  let attempt = 0;

  while (true) {
    try {
      return db.transaction(fn).immediate();
    } catch (err: unknown) {
      if (!isBusyError(err) || attempt >= retries) {
        throw translateStoreError(err);
      }
      attempt += 1;
      blockingSleep(busySleepMs * attempt);
    }
  }
}
