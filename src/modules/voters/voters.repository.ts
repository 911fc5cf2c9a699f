import { Injectable, Logger } from '@nestjs/common';
import type Database from 'better-sqlite3';
import { DatabaseService } from '../../database/database.service';
import {
  DuplicateVoterError,
  StorageUnavailableError,
  isStorageOutage,
  isUniqueViolation,
} from '../../common/errors/ingestion.errors';
import {
  AGE_BANDS,
  GENDERS,
  type AgeBand,
  type ConstituencySummary,
  type Gender,
  type MergeFields,
  type NaturalKey,
  type NewVoter,
  type Voter,
  type VoterStore,
  type WriteResult,
} from './voter.types';

interface VoterRow {
  id: number;
  name: string;
  age: number | null;
  gender: string;
  constituency: string;
  booth_no: string;
  address: string;
  vote: number;
  source_batch_id: string | null;
  source_document_id: string | null;
  ingested_at: string | null;
  created_at: string;
  updated_at: string | null;
}

type InsertParams = [
  string, number | null, string, string, string, string, number,
  string | null, string | null, string | null,
];

const INSERT_SQL = `
  INSERT INTO voters
    (name, age, gender, constituency, booth_no, address, vote,
     source_batch_id, source_document_id, ingested_at)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`;

function toAgeBand(value: string): AgeBand | undefined {
  return AGE_BANDS.find((b) => b === value);
}

// LIKE treats % and _ as wildcards; a search term matches them literally.
function likePattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function toGender(value: string): Gender {
  return GENDERS.find((g) => g === value) ?? 'unknown';
}

function toVoter(row: VoterRow): Voter {
  return {
    id: row.id,
    name: row.name,
    age: row.age,
    gender: toGender(row.gender),
    constituency: row.constituency,
    boothNo: row.booth_no,
    address: row.address,
    vote: row.vote === 1,
    sourceBatchId: row.source_batch_id,
    sourceDocumentId: row.source_document_id,
    ingestedAt: row.ingested_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function insertParams(v: NewVoter): InsertParams {
  return [
    v.name, v.age, v.gender, v.constituency, v.boothNo, v.address, v.vote ? 1 : 0,
    v.sourceBatchId, v.sourceDocumentId, v.ingestedAt,
  ];
}

/**
 * SQLite-backed voter store.
 *
 * better-sqlite3 is synchronous; the async signatures keep the
 * VoterStore contract honest for backends that are not.
 */
@Injectable()
export class VotersRepository implements VoterStore {
  private readonly logger = new Logger(VotersRepository.name);

  constructor(private readonly database: DatabaseService) {}

  // ═══════════════════════════════════════════════════════════════════
  // Pipeline store contract
  // ═══════════════════════════════════════════════════════════════════

  async findByConstituency(constituency: string): Promise<Voter[]> {
    return this.guard('findByConstituency', (db) =>
      db
        .prepare<[string], VoterRow>(
          'SELECT * FROM voters WHERE constituency = ? COLLATE NOCASE ORDER BY id',
        )
        .all(constituency)
        .map(toVoter),
    );
  }

  async findByNaturalKey(key: NaturalKey): Promise<Voter | null> {
    return this.guard('findByNaturalKey', (db) => {
      const row = this.naturalKeyLookup(db).get(key.name, key.constituency, key.boothNo);
      return row ? toVoter(row) : null;
    });
  }

  /**
   * Insert a group in one transaction. A row whose natural key is already
   * taken (by an earlier batch, a concurrent one, or an API create) is
   * reported as `duplicate` with the id that holds the key.
   */
  async commitGroup(voters: NewVoter[]): Promise<WriteResult[]> {
    return this.guard('commitGroup', (db) => {
      const insert = db.prepare<InsertParams>(
        `${INSERT_SQL} ON CONFLICT DO NOTHING`,
      );
      const lookup = this.naturalKeyLookup(db);

      const writeAll = db.transaction((rows: NewVoter[]): WriteResult[] =>
        rows.map((v): WriteResult => {
          const info = insert.run(...insertParams(v));
          if (info.changes === 1) {
            return { status: 'inserted', voterId: Number(info.lastInsertRowid) };
          }
          const holder = lookup.get(v.name, v.constituency, v.boothNo);
          if (!holder) {
            throw new Error(`Insert of "${v.name}" was ignored but no row holds its natural key`);
          }
          return { status: 'duplicate', voterId: holder.id };
        }),
      );

      return writeAll(voters);
    });
  }

  async insertOne(voter: NewVoter): Promise<WriteResult> {
    const [result] = await this.commitGroup([voter]);
    return result;
  }

  /**
   * Fill gaps on an existing voter from a reviewed candidate.
   * Known values and the natural key are never overwritten.
   */
  async mergeInto(voterId: number, fields: MergeFields): Promise<Voter | null> {
    return this.guard('mergeInto', (db) => {
      const info = db
        .prepare<[number | null, string, string, number]>(
          `UPDATE voters SET
             age        = COALESCE(age, ?),
             gender     = CASE WHEN gender = 'unknown' THEN ? ELSE gender END,
             address    = CASE WHEN address = '' THEN ? ELSE address END,
             updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
           WHERE id = ?`,
        )
        .run(fields.age, fields.gender, fields.address, voterId);

      if (info.changes === 0) return null;
      return this.selectById(db, voterId);
    });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Read side used by the API layer
  // ═══════════════════════════════════════════════════════════════════

  async findById(voterId: number): Promise<Voter | null> {
    return this.guard('findById', (db) => this.selectById(db, voterId));
  }

  async list(skip = 0, limit = 100): Promise<Voter[]> {
    return this.guard('list', (db) =>
      db
        .prepare<[number, number], VoterRow>('SELECT * FROM voters ORDER BY id LIMIT ? OFFSET ?')
        .all(limit, skip)
        .map(toVoter),
    );
  }

  async count(): Promise<number> {
    return this.guard('count', (db) => {
      const row = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM voters').get();
      return row ? row.total : 0;
    });
  }

  async summaryByConstituency(): Promise<ConstituencySummary[]> {
    return this.guard('summaryByConstituency', (db) =>
      db
        .prepare<[], ConstituencySummary>(
          `SELECT constituency, COUNT(id) AS count FROM voters
           GROUP BY constituency COLLATE NOCASE ORDER BY constituency`,
        )
        .all(),
    );
  }

  /** Voters with a known age, binned. Every band is present, empty ones at 0. */
  async ageDistribution(): Promise<Record<AgeBand, number>> {
    return this.guard('ageDistribution', (db) => {
      const rows = db
        .prepare<[], { band: string; count: number }>(
          `SELECT CASE
                    WHEN age < 18  THEN '0-17'
                    WHEN age <= 30 THEN '18-30'
                    WHEN age <= 45 THEN '31-45'
                    WHEN age <= 60 THEN '46-60'
                    ELSE '61+'
                  END AS band,
                  COUNT(id) AS count
           FROM voters WHERE age IS NOT NULL GROUP BY band`,
        )
        .all();

      const bins: Record<AgeBand, number> = { '0-17': 0, '18-30': 0, '31-45': 0, '46-60': 0, '61+': 0 };
      for (const row of rows) {
        const band = toAgeBand(row.band);
        if (band) bins[band] = row.count;
      }
      return bins;
    });
  }

  async genderRatio(): Promise<Record<Gender, number>> {
    return this.guard('genderRatio', (db) => {
      const rows = db
        .prepare<[], { gender: string; count: number }>(
          'SELECT gender, COUNT(id) AS count FROM voters GROUP BY gender',
        )
        .all();

      const ratio: Record<Gender, number> = { male: 0, female: 0, other: 0, unknown: 0 };
      for (const row of rows) ratio[toGender(row.gender)] += row.count;
      return ratio;
    });
  }

  /** Substring match on name, constituency or booth, case-insensitive. */
  async search(term: string, limit = 100): Promise<Voter[]> {
    return this.guard('search', (db) => {
      const pattern = likePattern(term);
      return db
        .prepare<[string, string, string, number], VoterRow>(
          `SELECT * FROM voters
           WHERE name LIKE ? ESCAPE '\\'
              OR constituency LIKE ? ESCAPE '\\'
              OR booth_no LIKE ? ESCAPE '\\'
           ORDER BY id LIMIT ?`,
        )
        .all(pattern, pattern, pattern, limit)
        .map(toVoter);
    });
  }

  async filterByConstituency(constituency: string, limit = 100): Promise<Voter[]> {
    return this.guard('filterByConstituency', (db) =>
      db
        .prepare<[string, number], VoterRow>(
          'SELECT * FROM voters WHERE constituency = ? COLLATE NOCASE ORDER BY id LIMIT ?',
        )
        .all(constituency, limit)
        .map(toVoter),
    );
  }

  async filterByGender(gender: Gender, limit = 100): Promise<Voter[]> {
    return this.guard('filterByGender', (db) =>
      db
        .prepare<[string, number], VoterRow>('SELECT * FROM voters WHERE gender = ? ORDER BY id LIMIT ?')
        .all(gender, limit)
        .map(toVoter),
    );
  }

  /** Inclusive on both ends; voters with an unknown age never match. */
  async filterByAgeRange(minAge: number, maxAge: number, limit = 100): Promise<Voter[]> {
    return this.guard('filterByAgeRange', (db) =>
      db
        .prepare<[number, number, number], VoterRow>(
          'SELECT * FROM voters WHERE age BETWEEN ? AND ? ORDER BY id LIMIT ?',
        )
        .all(minAge, maxAge, limit)
        .map(toVoter),
    );
  }

  /**
   * Direct create from the CRUD layer. Unlike the pipeline path, a taken
   * natural key is an error the caller must see.
   */
  async createManual(voter: NewVoter): Promise<Voter> {
    return this.guard('createManual', (db) => {
      try {
        const info = db.prepare<InsertParams>(INSERT_SQL).run(...insertParams(voter));
        const created = this.selectById(db, Number(info.lastInsertRowid));
        if (!created) throw new Error(`Voter ${String(info.lastInsertRowid)} vanished after insert`);
        return created;
      } catch (err) {
        if (isUniqueViolation(err)) throw new DuplicateVoterError(voter);
        throw err;
      }
    });
  }

  // ── Internal ───────────────────────────────────────────────────────

  private naturalKeyLookup(
    db: Database.Database,
  ): Database.Statement<[string, string, string], VoterRow> {
    return db.prepare<[string, string, string], VoterRow>(
      `SELECT * FROM voters
       WHERE name = ? COLLATE NOCASE
         AND constituency = ? COLLATE NOCASE
         AND booth_no = ? COLLATE NOCASE`,
    );
  }

  private selectById(db: Database.Database, voterId: number): Voter | null {
    const row = db.prepare<[number], VoterRow>('SELECT * FROM voters WHERE id = ?').get(voterId);
    return row ? toVoter(row) : null;
  }

  /** Run a store operation, turning connectivity failures into StorageUnavailableError. */
  private guard<T>(operation: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(this.database.connection);
    } catch (err) {
      if (err instanceof StorageUnavailableError) throw err;
      if (isStorageOutage(err)) {
        this.logger.error(`Voter store outage during ${operation}: ${String(err)}`);
        throw new StorageUnavailableError(operation, err);
      }
      throw err;
    }
  }
}
