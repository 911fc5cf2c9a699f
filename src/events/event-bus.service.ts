/**
 * Event Bus Service: thin wrapper over the BullMQ queue.
 *
 * Single queue `ingestion-events` with named jobs for routing.
 */

import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { v4 as uuidv4 } from 'uuid';
import type { RawRecord } from '../modules/ingestion/engine';
import {
  EventTypes,
  INGESTION_QUEUE,
  type IngestBatchEvent,
  type ResolveReviewEvent,
} from './event-types';

const DEFAULT_OPTS = {
  attempts: 3,
  backoff: { type: 'exponential' as const, delay: 3000 },
  removeOnComplete: true,
  removeOnFail: 100,
};

@Injectable()
export class EventBusService {
  private readonly logger = new Logger(EventBusService.name);

  constructor(
    @InjectQueue(INGESTION_QUEUE) private readonly queue: Queue,
  ) {}

  /**
   * Enqueue a batch and return its id. The id doubles as the job id, so
   * submitting the same batch twice while the first is queued is a no-op.
   */
  async emitIngestBatch(
    rows: RawRecord[],
    submittedBy: string,
    batchId: string = uuidv4(),
  ): Promise<string> {
    const data: IngestBatchEvent = { batchId, rows, submittedBy, timestamp: Date.now() };
    await this.queue.add(EventTypes.INGEST_BATCH, data, {
      ...DEFAULT_OPTS,
      jobId: batchId,
    });
    this.logger.debug(`Emitted ${EventTypes.INGEST_BATCH} ${batchId} with ${rows.length} rows`);
    return batchId;
  }

  async emitReviewResolution(data: ResolveReviewEvent): Promise<void> {
    await this.queue.add(EventTypes.RESOLVE_REVIEW, data, {
      ...DEFAULT_OPTS,
      priority: 1, // reviewer is waiting on it
    });
    this.logger.debug(
      `Emitted ${EventTypes.RESOLVE_REVIEW} (${data.action}) for row ${data.row.rowIndex} of ${data.batchId}`,
    );
  }
}
