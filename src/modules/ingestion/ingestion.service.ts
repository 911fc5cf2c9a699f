/**
 * Batch Reconciler
 *
 * Drives one batch end to end:
 *
 *   1. Normalize + gate every row in row order, building the in-batch
 *      natural-key index as it goes (first row seen wins).
 *   2. Partition the survivors by constituency and resolve each partition
 *      on the bounded pool: one store read, then rows in order.
 *   3. Bucket: new → commit, exact → skip, probable/conflict → review.
 *   4. Hand the accept bucket to the committer and fold its outcomes.
 *
 * Only StorageUnavailableError (nothing written) and BatchCancelledError
 * (nothing written) escape; everything else is data in the BatchReport.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { loadIngestionConfig, type IngestionConfig } from '../../config/ingestion.config';
import {
  BatchCancelledError,
  StorageUnavailableError,
} from '../../common/errors/ingestion.errors';
import { VOTER_STORE, type VoterStore } from '../voters/voter.types';
import { CommitterService } from './committer.service';
import {
  ValidationGate,
  detectDuplicate,
  naturalKey,
  normalizeRecord,
  runBounded,
  type Classification,
  type MatchOutcome,
  type NormalizedCandidate,
  type RawRecord,
  type RejectionReason,
} from './engine';
import { toRawRecords, type SourceDocument } from './sources/source-adapter';

// ── Report shape ───────────────────────────────────────────────────

export interface RowRef {
  sourceDocumentId: string;
  rowIndex: number;
}

export interface RejectedRow extends RowRef {
  reason: RejectionReason;
}

export interface ReviewItem extends RowRef {
  classification: 'probable_duplicate' | 'conflict';
  matchedVoterId: number | null;
  matchedRowIndex: number | null;
  score: number;
  /** Replayed through the normalizer when a reviewer resolves the item. */
  record: RawRecord;
}

export interface FailedRow extends RowRef {
  reason: string;
}

export type OutcomeCounts = Record<Classification | 'rejected' | 'failed', number>;

export interface BatchReport {
  batchId: string;
  /** Committed voter ids, in row order. */
  accepted: number[];
  skippedDuplicates: number;
  rejected: RejectedRow[];
  needsReview: ReviewItem[];
  /** Rows whose commit group failed or was never submitted. Safe to resubmit. */
  failed: FailedRow[];
  counts: OutcomeCounts;
  cancelled: boolean;
}

export interface IngestOptions {
  batchId?: string;
  signal?: AbortSignal;
}

interface PendingRow {
  position: number;
  record: RawRecord;
  candidate: NormalizedCandidate;
}

interface ResolvedRow extends PendingRow {
  outcome: MatchOutcome;
}

function emptyCounts(): OutcomeCounts {
  return {
    new: 0,
    exact_duplicate: 0,
    probable_duplicate: 0,
    conflict: 0,
    rejected: 0,
    failed: 0,
  };
}

function ref(row: { sourceDocumentId: string; rowIndex: number }): RowRef {
  return { sourceDocumentId: row.sourceDocumentId, rowIndex: row.rowIndex };
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly settings: IngestionConfig;

  constructor(
    @Inject(VOTER_STORE) private readonly store: VoterStore,
    private readonly committer: CommitterService,
    config: ConfigService,
  ) {
    this.settings = config.get<IngestionConfig>('ingestion') ?? loadIngestionConfig({});
  }

  /** Convert one or more source documents at the boundary, then ingest. */
  async ingestSource(
    source: SourceDocument | SourceDocument[],
    options: IngestOptions = {},
  ): Promise<BatchReport> {
    const docs = Array.isArray(source) ? source : [source];
    return this.ingest(docs.flatMap(toRawRecords), options);
  }

  async ingest(rows: readonly RawRecord[], options: IngestOptions = {}): Promise<BatchReport> {
    const batchId = options.batchId ?? uuidv4();
    const { signal } = options;
    if (signal?.aborted) throw new BatchCancelledError(batchId);

    const startedAt = Date.now();
    this.logger.log(`Batch ${batchId}: ingesting ${rows.length} rows`);

    const report: BatchReport = {
      batchId,
      accepted: [],
      skippedDuplicates: 0,
      rejected: [],
      needsReview: [],
      failed: [],
      counts: emptyCounts(),
      cancelled: false,
    };

    // ── 1. Normalize, gate, in-batch natural keys ─────────────────
    const gate = new ValidationGate({ strictGender: this.settings.strictGender });
    const firstSeen = new Set<string>();
    const pending: PendingRow[] = [];

    const reject = (record: RawRecord, reason: RejectionReason) => {
      report.rejected.push({ ...ref(record), reason });
      report.counts.rejected++;
    };

    rows.forEach((record, position) => {
      const normalized = normalizeRecord(record);
      if (!normalized.ok) return reject(record, normalized.reason);

      const { candidate } = normalized;
      const reason = gate.check(candidate);
      if (reason) return reject(record, reason);

      const key = naturalKey(candidate);
      if (firstSeen.has(key)) {
        report.counts.exact_duplicate++;
        report.skippedDuplicates++;
        return;
      }
      firstSeen.add(key);
      pending.push({ position, record, candidate });
    });

    try {
      // ── 2. Resolve per constituency ─────────────────────────────
      const resolved = await this.resolvePartitions(pending, batchId, signal);

      // ── 3. Bucket ───────────────────────────────────────────────
      const accept: NormalizedCandidate[] = [];
      for (const row of resolved) {
        const { outcome } = row;
        report.counts[outcome.classification]++;

        switch (outcome.classification) {
          case 'new':
            accept.push(row.candidate);
            break;
          case 'exact_duplicate':
            report.skippedDuplicates++;
            break;
          case 'probable_duplicate':
          case 'conflict':
            report.needsReview.push({
              ...ref(row.record),
              classification: outcome.classification,
              matchedVoterId: outcome.matchedVoterId,
              matchedRowIndex: outcome.matchedRowIndex,
              score: outcome.score,
              record: row.record,
            });
            break;
        }
      }

      // ── 4. Commit ───────────────────────────────────────────────
      if (signal?.aborted) throw new BatchCancelledError(batchId);

      const { outcomes, cancelled } = await this.committer.commit(accept, batchId, signal);
      report.cancelled = cancelled;

      // Every outcome here was counted as `new`; a lost race or a failed
      // group moves the row to its final bucket.
      for (const outcome of outcomes) {
        switch (outcome.status) {
          case 'committed':
            report.accepted.push(outcome.voterId);
            break;
          case 'skipped_duplicate':
            report.skippedDuplicates++;
            report.counts.new--;
            report.counts.exact_duplicate++;
            break;
          case 'failed':
            report.failed.push({ ...ref(outcome.candidate), reason: outcome.reason });
            report.counts.new--;
            report.counts.failed++;
            break;
        }
      }
    } catch (err) {
      if (err instanceof StorageUnavailableError) {
        this.logger.error(`Batch ${batchId} aborted, nothing written: ${err.message}`, err.stack);
      } else if (err instanceof BatchCancelledError) {
        this.logger.warn(`Batch ${batchId} cancelled before commit`);
      }
      throw err;
    }

    this.logger.log(
      `Batch ${batchId} done in ${Date.now() - startedAt}ms: ` +
        `accepted=${report.accepted.length}, skipped=${report.skippedDuplicates}, ` +
        `rejected=${report.rejected.length}, review=${report.needsReview.length}, ` +
        `failed=${report.failed.length}${report.cancelled ? ' (cancelled)' : ''}`,
    );

    return report;
  }

  /**
   * Each partition reads its constituency once and resolves its rows in
   * row order, so a row only ever sees `new` rows that precede it.
   * Results come back in original row order.
   */
  private async resolvePartitions(
    pending: readonly PendingRow[],
    batchId: string,
    signal: AbortSignal | undefined,
  ): Promise<ResolvedRow[]> {
    const partitions = new Map<string, PendingRow[]>();
    for (const row of pending) {
      const key = row.candidate.constituency.toLowerCase();
      const partition = partitions.get(key);
      if (partition) partition.push(row);
      else partitions.set(key, [row]);
    }

    const resolved = await runBounded(
      [...partitions.values()],
      this.settings.concurrency,
      async (partition) => {
        const stored = await this.store.findByConstituency(partition[0].candidate.constituency);
        const earlier: NormalizedCandidate[] = [];

        return partition.map((row): ResolvedRow => {
          const outcome = detectDuplicate(row.candidate, { stored, earlier }, this.settings.policy);
          if (outcome.classification === 'new') earlier.push(row.candidate);
          return { ...row, outcome };
        });
      },
      { signal, cancelError: () => new BatchCancelledError(batchId) },
    );

    return resolved.flat().sort((a, b) => a.position - b.position);
  }
}
