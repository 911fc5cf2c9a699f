import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { StorageUnavailableError } from '../common/errors/ingestion.errors';

// The unique index is the only arbiter between concurrent batches and
// manual API creates; NOCASE keeps it consistent with the normalizer.
// Plain rowid ids: an insert skipped by ON CONFLICT DO NOTHING consumes none.
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS voters (
    id                 INTEGER PRIMARY KEY,
    name               TEXT    NOT NULL,
    age                INTEGER,
    gender             TEXT    NOT NULL DEFAULT 'unknown',
    constituency       TEXT    NOT NULL,
    booth_no           TEXT    NOT NULL DEFAULT '',
    address            TEXT    NOT NULL DEFAULT '',
    vote               INTEGER NOT NULL DEFAULT 0,
    source_batch_id    TEXT,
    source_document_id TEXT,
    ingested_at        TEXT,
    created_at         TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    updated_at         TEXT
  );

  CREATE UNIQUE INDEX IF NOT EXISTS ux_voters_natural_key
    ON voters (name COLLATE NOCASE, constituency COLLATE NOCASE, booth_no COLLATE NOCASE);

  CREATE INDEX IF NOT EXISTS idx_voters_constituency
    ON voters (constituency COLLATE NOCASE);
`;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private db: Database.Database | null = null;

  constructor(private readonly config: ConfigService) {}

  onModuleInit() {
    const path = this.config.get<string>('database.path', 'data/voters.db');
    const busyTimeout = this.config.get<number>('database.busyTimeoutMs', 5000);

    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }

    this.db = new Database(path, { timeout: busyTimeout });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);

    this.logger.log(`SQLite voter store ready at ${path}`);
  }

  /** The open handle; throws StorageUnavailableError once closed. */
  get connection(): Database.Database {
    if (!this.db || !this.db.open) {
      throw new StorageUnavailableError('connect', 'connection closed');
    }
    return this.db;
  }

  onModuleDestroy() {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.logger.log('SQLite connection closed');
    }
  }
}
