/**
 * Event Bus: BullMQ-backed ingestion jobs.
 *
 * The API layer submits batches and review decisions as events; the
 * ingestion worker consumes them. The API process never runs the
 * reconciler itself.
 */

import type { RawRecord } from '../modules/ingestion/engine';

// ── Event type constants ──────────────────────────────────────────

export const INGESTION_QUEUE = 'ingestion-events';

export const EventTypes = {
  /** A batch of extracted rows is ready to ingest */
  INGEST_BATCH: 'ingest-batch',
  /** A reviewer resolved a probable duplicate or conflict */
  RESOLVE_REVIEW: 'resolve-review',
} as const;

// ── Event payloads ────────────────────────────────────────────────

export interface IngestBatchEvent {
  batchId: string;
  rows: RawRecord[];
  submittedBy: string; // userId or 'system'
  timestamp: number;
}

export interface ResolveReviewEvent {
  batchId: string;
  row: RawRecord;
  action: 'create' | 'merge';
  /** Required when action is `merge`. */
  voterId?: number;
  resolvedBy: string;
  timestamp: number;
}
