/**
 * Ingestion Worker: consumes the `ingestion-events` BullMQ queue.
 *
 *   • ingest-batch    → run the reconciler, cache the BatchReport
 *   • resolve-review  → apply a reviewer's create/merge decision
 *
 * Payloads are validated before any work: a malformed job can never
 * succeed, so it fails with UnrecoverableError instead of retrying.
 * Storage outages are rethrown and BullMQ retries with backoff; the
 * batch had zero side effects, so the retry is safe.
 */

import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance, type ClassConstructor } from 'class-transformer';
import { validate } from 'class-validator';
import { Job, UnrecoverableError } from 'bullmq';
import { ReportCacheService } from '../cache/report-cache.service';
import { describeError } from '../common/errors/ingestion.errors';
import { EventTypes, INGESTION_QUEUE } from '../events/event-types';
import { IngestionService, type BatchReport } from '../modules/ingestion/ingestion.service';
import {
  CommitterService,
  type ReviewDecision,
  type ReviewResolution,
} from '../modules/ingestion/committer.service';
import { ValidationGate, normalizeRecord } from '../modules/ingestion/engine';
import { IngestBatchDto } from '../modules/ingestion/dto/ingest-batch.dto';
import { ResolveReviewDto } from '../modules/ingestion/dto/resolve-review.dto';
import { loadIngestionConfig, type IngestionConfig } from '../config/ingestion.config';

export type IngestionJob = Pick<Job, 'id' | 'name' | 'data'>;

export type JobResult =
  | { type: typeof EventTypes.INGEST_BATCH; report: BatchReport }
  | { type: typeof EventTypes.RESOLVE_REVIEW; resolution: ReviewResolution };

@Processor(INGESTION_QUEUE, { concurrency: 2 })
export class IngestionProcessor extends WorkerHost {
  private readonly logger = new Logger(IngestionProcessor.name);
  private readonly strictGender: boolean;

  constructor(
    private readonly ingestion: IngestionService,
    private readonly committer: CommitterService,
    private readonly reports: ReportCacheService,
    config: ConfigService,
  ) {
    super();
    const settings = config.get<IngestionConfig>('ingestion') ?? loadIngestionConfig({});
    this.strictGender = settings.strictGender;
  }

  async process(job: IngestionJob): Promise<JobResult> {
    try {
      switch (job.name) {
        case EventTypes.INGEST_BATCH:
          return await this.handleIngestBatch(await this.parse(IngestBatchDto, job));
        case EventTypes.RESOLVE_REVIEW:
          return await this.handleResolveReview(await this.parse(ResolveReviewDto, job));
        default:
          throw new UnrecoverableError(`Unknown event type: ${job.name}`);
      }
    } catch (err) {
      const stack = err instanceof Error ? err.stack : undefined;
      this.logger.error(`Worker failed on ${job.name} (job ${job.id ?? '?'}): ${describeError(err)}`, stack);
      throw err; // let BullMQ retry, unless unrecoverable
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // Event Handlers
  // ═══════════════════════════════════════════════════════════════════

  private async handleIngestBatch(data: IngestBatchDto): Promise<JobResult> {
    this.logger.log(
      `Processing ingest-batch ${data.batchId}: ${data.rows.length} rows (by: ${data.submittedBy})`,
    );

    const report = await this.ingestion.ingest(data.rows, { batchId: data.batchId });
    await this.reports.save(report);

    return { type: EventTypes.INGEST_BATCH, report };
  }

  /**
   * The stored review item carries the raw row, so it is normalized and
   * gated again here rather than trusting a candidate from the client.
   */
  private async handleResolveReview(data: ResolveReviewDto): Promise<JobResult> {
    this.logger.log(
      `Processing resolve-review: row ${data.row.rowIndex} of ${data.batchId} → ${data.action}`,
    );

    const normalized = normalizeRecord(data.row);
    if (!normalized.ok) {
      throw new UnrecoverableError(`Review row rejected: ${normalized.reason}`);
    }
    const reason = new ValidationGate({ strictGender: this.strictGender }).check(normalized.candidate);
    if (reason) {
      throw new UnrecoverableError(`Review row rejected: ${reason}`);
    }

    let decision: ReviewDecision = { action: 'create' };
    if (data.action === 'merge') {
      if (data.voterId === undefined) throw new UnrecoverableError('merge requires voterId');
      decision = { action: 'merge', voterId: data.voterId };
    }

    const resolution = await this.committer.resolveReview(normalized.candidate, decision, data.batchId);
    return { type: EventTypes.RESOLVE_REVIEW, resolution };
  }

  // ── Payload validation ────────────────────────────────────────────

  private async parse<T extends object>(cls: ClassConstructor<T>, job: IngestionJob): Promise<T> {
    const plain: unknown = job.data;
    if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
      throw new UnrecoverableError(`Invalid ${job.name} payload: not an object`);
    }
    const dto = plainToInstance(cls, plain);
    const errors = await validate(dto);
    if (errors.length > 0) {
      const detail = errors.map((e) => e.property).join(', ');
      throw new UnrecoverableError(`Invalid ${job.name} payload: ${detail}`);
    }
    return dto;
  }
}
