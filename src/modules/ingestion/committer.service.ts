/**
 * Persistence Committer
 *
 * Writes the accept bucket in bounded groups, one transaction per group.
 * Every input candidate gets exactly one outcome:
 *   committed          new row written, voterId assigned by the store
 *   skipped_duplicate  natural key taken at write time (lost a race)
 *   failed             its group failed or was never submitted; safe to resubmit
 *
 * Committed groups are never rolled back by a later failure or cancellation.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loadIngestionConfig, type IngestionConfig } from '../../config/ingestion.config';
import {
  BatchCancelledError,
  StorageUnavailableError,
  VoterNotFoundError,
  describeError,
} from '../../common/errors/ingestion.errors';
import {
  VOTER_STORE,
  type NewVoter,
  type VoterStore,
} from '../voters/voter.types';
import type { NormalizedCandidate } from './engine';

export type CommitOutcome =
  | { status: 'committed'; candidate: NormalizedCandidate; voterId: number }
  | { status: 'skipped_duplicate'; candidate: NormalizedCandidate; voterId: number }
  | { status: 'failed'; candidate: NormalizedCandidate; reason: string };

export interface CommitResult {
  outcomes: CommitOutcome[];
  /** Submission stopped early because the caller cancelled. */
  cancelled: boolean;
}

export type ReviewDecision =
  | { action: 'create' }
  | { action: 'merge'; voterId: number };

export type ReviewResolution =
  | { status: 'committed' | 'skipped_duplicate' | 'merged'; voterId: number };

export function toNewVoter(
  candidate: NormalizedCandidate,
  batchId: string,
  ingestedAt: string,
): NewVoter {
  return {
    name: candidate.name,
    age: candidate.age,
    gender: candidate.gender,
    constituency: candidate.constituency,
    boothNo: candidate.boothNo,
    address: candidate.address,
    vote: candidate.vote,
    sourceBatchId: batchId,
    sourceDocumentId: candidate.sourceDocumentId,
    ingestedAt,
  };
}

@Injectable()
export class CommitterService {
  private readonly logger = new Logger(CommitterService.name);
  private readonly settings: IngestionConfig;

  constructor(
    @Inject(VOTER_STORE) private readonly store: VoterStore,
    config: ConfigService,
  ) {
    this.settings = config.get<IngestionConfig>('ingestion') ?? loadIngestionConfig({});
  }

  /**
   * Commit the accept bucket of one batch.
   *
   * A storage outage before the first group lands is rethrown: nothing was
   * written, so the caller retries the whole batch. After that, an outage
   * halts submission and the remaining rows are reported failed.
   */
  async commit(
    candidates: readonly NormalizedCandidate[],
    batchId: string,
    signal?: AbortSignal,
  ): Promise<CommitResult> {
    const outcomes: CommitOutcome[] = [];
    if (candidates.length === 0) return { outcomes, cancelled: false };
    if (signal?.aborted) throw new BatchCancelledError(batchId);

    const size = this.settings.commitGroupSize;
    const ingestedAt = new Date().toISOString();
    const totalGroups = Math.ceil(candidates.length / size);

    let landedGroups = 0;
    let haltReason: string | null = null;
    let cancelled = false;

    for (let g = 0; g < totalGroups; g++) {
      const group = candidates.slice(g * size, (g + 1) * size);

      if (haltReason === null && signal?.aborted) {
        cancelled = true;
        haltReason = 'cancelled';
        this.logger.warn(
          `Batch ${batchId}: cancelled after ${landedGroups}/${totalGroups} groups`,
        );
      }

      if (haltReason !== null) {
        for (const candidate of group) outcomes.push({ status: 'failed', candidate, reason: haltReason });
        continue;
      }

      try {
        const results = await this.store.commitGroup(
          group.map((c) => toNewVoter(c, batchId, ingestedAt)),
        );
        results.forEach((r, i) => {
          const candidate = group[i];
          outcomes.push(
            r.status === 'inserted'
              ? { status: 'committed', candidate, voterId: r.voterId }
              : { status: 'skipped_duplicate', candidate, voterId: r.voterId },
          );
        });
        landedGroups++;
      } catch (err) {
        const outage = err instanceof StorageUnavailableError;
        if (outage && landedGroups === 0) throw err;

        const reason = outage ? 'storage_unavailable' : describeError(err);
        if (outage) haltReason = reason;

        this.logger.warn(
          `Batch ${batchId}: group ${g + 1}/${totalGroups} failed (${group.length} rows): ${describeError(err)}`,
        );
        for (const candidate of group) outcomes.push({ status: 'failed', candidate, reason });
      }
    }

    return { outcomes, cancelled };
  }

  /**
   * Apply a human decision on a review-bucket row. `create` goes through the
   * same uniqueness-guarded insert as a batch; `merge` only fills gaps on the
   * chosen voter and never touches its natural key.
   */
  async resolveReview(
    candidate: NormalizedCandidate,
    decision: ReviewDecision,
    batchId: string,
  ): Promise<ReviewResolution> {
    if (decision.action === 'merge') {
      const merged = await this.store.mergeInto(decision.voterId, {
        age: candidate.age,
        gender: candidate.gender,
        address: candidate.address,
      });
      if (!merged) throw new VoterNotFoundError(decision.voterId);

      this.logger.log(`Merged row ${candidate.rowIndex} of batch ${batchId} into voter ${merged.id}`);
      return { status: 'merged', voterId: merged.id };
    }

    const result = await this.store.insertOne(
      toNewVoter(candidate, batchId, new Date().toISOString()),
    );
    return {
      status: result.status === 'inserted' ? 'committed' : 'skipped_duplicate',
      voterId: result.voterId,
    };
  }
}
