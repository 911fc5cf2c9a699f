/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Row-level and group-level problems are data in the BatchReport; only the
 * errors below ever leave `IngestionService.ingest` or the committer.
 */

export abstract class IngestionError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Storage cannot be reached. Before any group commits, this fails the whole batch. */
export class StorageUnavailableError extends IngestionError {
  readonly code = 'storage_unavailable';

  constructor(
    operation: string,
    readonly origin?: unknown,
  ) {
    super(`Voter store unavailable during ${operation}: ${describeError(origin)}`);
  }
}

export class BatchCancelledError extends IngestionError {
  readonly code = 'cancelled';

  constructor(readonly batchId: string) {
    super(`Batch ${batchId} was cancelled before commit`);
  }
}

export class DuplicateVoterError extends IngestionError {
  readonly code = 'duplicate_voter';

  constructor(readonly naturalKey: { name: string; constituency: string; boothNo: string }) {
    super(
      `Voter "${naturalKey.name}" already exists in ${naturalKey.constituency}` +
        (naturalKey.boothNo ? ` booth ${naturalKey.boothNo}` : ''),
    );
  }
}

export class VoterNotFoundError extends IngestionError {
  readonly code = 'voter_not_found';

  constructor(readonly voterId: number) {
    super(`Voter ${voterId} does not exist`);
  }
}

export class InvalidConfigError extends IngestionError {
  readonly code = 'invalid_config';

  constructor(readonly problems: string[]) {
    super(`Invalid ingestion configuration: ${problems.join('; ')}`);
  }
}

// ── SQLite error classification ────────────────────────────────────

// Extended result codes share these prefixes (SQLITE_IOERR_WRITE, SQLITE_BUSY_TIMEOUT, …)
const OUTAGE_CODE_PREFIXES = [
  'SQLITE_IOERR',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_FULL',
  'SQLITE_CANTOPEN',
  'SQLITE_READONLY',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
];

export function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isUniqueViolation(err: unknown): boolean {
  return sqliteCode(err) === 'SQLITE_CONSTRAINT_UNIQUE';
}

/** True for errors that mean the store itself is gone, not that one write was bad. */
export function isStorageOutage(err: unknown): boolean {
  if (err instanceof StorageUnavailableError) return true;
  const code = sqliteCode(err);
  if (code) return OUTAGE_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
  // better-sqlite3 raises a plain TypeError once the handle is closed
  return err instanceof TypeError && /database connection is not open/i.test(err.message);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
