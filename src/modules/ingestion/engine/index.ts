/**
 * Ingestion Engine: Barrel Exports
 */

// Types
export type {
  RawField,
  RawFields,
  RawRecord,
  NormalizationFlag,
  NormalizedCandidate,
  RejectionReason,
  NormalizeResult,
  Classification,
  MatchOutcome,
  ComparableRecord,
  SimilarityPolicy,
  SimilarityBreakdown,
} from './types';
export { RAW_FIELDS } from './types';

// Step 1: Normalizer
export {
  normalizeRecord,
  normalizeName,
  normalizeGender,
  normalizeConstituency,
  normalizeBooth,
  parseAge,
  parseVote,
} from './normalizer';

// Step 2: Validation Gate
export { ValidationGate, type ValidationGateOptions } from './validation-gate';

// Step 3: Similarity + Duplicate Detector
export { naturalKey } from './natural-key';
export { nameSimilarity, ageCloseness, addressSimilarity, scoreSimilarity } from './similarity';
export { detectDuplicate, type DetectionContext } from './duplicate-detector';

// Worker pool
export { runBounded, type PoolOptions } from './worker-pool';
