/**
 * Ingestion Engine: Shared Types
 *
 * Everything here is ephemeral: raw rows, candidates and match outcomes live
 * only for the duration of one batch. The persisted shape is `Voter`
 * (see modules/voters/voter.types.ts).
 */

import type { Gender } from '../../voters/voter.types';

// ── Raw input (extraction boundary) ───────────────────────────────

export const RAW_FIELDS = [
  'name',
  'age',
  'gender',
  'constituency',
  'boothNo',
  'address',
  'vote',
] as const;

export type RawField = (typeof RAW_FIELDS)[number];

export type RawFields = Partial<Record<RawField, string>>;

export interface RawRecord {
  sourceDocumentId: string;
  rowIndex: number;
  /** True when the source document carries booth numbers (PDF rosters). */
  boothRequired: boolean;
  fields: RawFields;
}

// ── Normalization ──────────────────────────────────────────────────

export type NormalizationFlag =
  | 'age_parsed'
  | 'age_defaulted'
  | 'gender_defaulted';

export interface NormalizedCandidate {
  sourceDocumentId: string;
  rowIndex: number;
  boothRequired: boolean;
  name: string;
  age: number | null;
  gender: Gender;
  constituency: string;
  boothNo: string;
  address: string;
  vote: boolean;
  flags: NormalizationFlag[];
  /** Verbatim raw field values, used to spot rows the source emitted twice. */
  fingerprint: string;
}

export type RejectionReason =
  | 'malformed_row'
  | 'missing_name'
  | 'missing_constituency'
  | 'missing_booth_no'
  | 'invalid_gender'
  | 'duplicate_within_row_set';

export type NormalizeResult =
  | { ok: true; candidate: NormalizedCandidate }
  | { ok: false; reason: RejectionReason };

// ── Matching ───────────────────────────────────────────────────────

export type Classification =
  | 'new'
  | 'exact_duplicate'
  | 'probable_duplicate'
  | 'conflict';

export interface MatchOutcome {
  classification: Classification;
  /** Stored voter this candidate matched, if the match came from the store. */
  matchedVoterId: number | null;
  /** Earlier row of the same batch this candidate matched, if any. */
  matchedRowIndex: number | null;
  score: number;
}

/** The fields the similarity policy compares. Voters and candidates both fit. */
export interface ComparableRecord {
  name: string;
  age: number | null;
  constituency: string;
  boothNo: string;
  address: string;
}

export interface SimilarityPolicy {
  nameWeight: number;
  ageWeight: number;
  addressWeight: number;
  /** score ≥ this → probable_duplicate */
  probableThreshold: number;
  /** conflictThreshold ≤ score < probableThreshold → conflict */
  conflictThreshold: number;
  /** Known ages further apart than this contradict an otherwise strong match. */
  ageTolerance: number;
}

export interface SimilarityBreakdown {
  score: number;
  nameScore: number;
  ageScore: number;
  addressScore: number;
}
