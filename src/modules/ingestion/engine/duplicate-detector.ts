/**
 * STEP 3b: Duplicate Detector
 *
 * Classifies one candidate against
 *   • the stored voters of its constituency (ascending id), and
 *   • the candidates resolved as `new` earlier in the same batch (ascending row).
 *
 *   1. Identical natural key                  → exact_duplicate (score 1)
 *   2. Best weighted similarity, same constituency only:
 *        score ≥ probableThreshold            → probable_duplicate
 *          (known ages beyond ageTolerance    → conflict instead)
 *        conflictThreshold ≤ score            → conflict
 *        otherwise                            → new
 *
 * Comparison order is fixed (store first, then batch rows) and only a
 * strictly better score replaces the current best, so the same snapshot and
 * batch always produce the same outcome.
 */

import type { Voter } from '../../voters/voter.types';
import { naturalKey } from './natural-key';
import { scoreSimilarity } from './similarity';
import type {
  MatchOutcome,
  NormalizedCandidate,
  SimilarityPolicy,
} from './types';

export interface DetectionContext {
  /** Stored voters of the candidate's constituency, ascending id. */
  stored: readonly Voter[];
  /** Earlier in-batch candidates classified `new`, ascending row order. */
  earlier: readonly NormalizedCandidate[];
}

interface BestMatch {
  score: number;
  age: number | null;
  matchedVoterId: number | null;
  matchedRowIndex: number | null;
}

function sameConstituency(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function detectDuplicate(
  candidate: NormalizedCandidate,
  context: DetectionContext,
  policy: SimilarityPolicy,
): MatchOutcome {
  const key = naturalKey(candidate);

  // ── 1. Exact natural-key match ──────────────────────────────────
  const storedExact = context.stored.find((v) => naturalKey(v) === key);
  if (storedExact) {
    return {
      classification: 'exact_duplicate',
      matchedVoterId: storedExact.id,
      matchedRowIndex: null,
      score: 1,
    };
  }

  const batchExact = context.earlier.find((c) => naturalKey(c) === key);
  if (batchExact) {
    return {
      classification: 'exact_duplicate',
      matchedVoterId: null,
      matchedRowIndex: batchExact.rowIndex,
      score: 1,
    };
  }

  // ── 2. Weighted similarity within the constituency ──────────────
  let best: BestMatch | null = null;

  for (const voter of context.stored) {
    if (!sameConstituency(voter.constituency, candidate.constituency)) continue;
    const { score } = scoreSimilarity(candidate, voter, policy);
    if (!best || score > best.score) {
      best = { score, age: voter.age, matchedVoterId: voter.id, matchedRowIndex: null };
    }
  }

  for (const other of context.earlier) {
    if (!sameConstituency(other.constituency, candidate.constituency)) continue;
    const { score } = scoreSimilarity(candidate, other, policy);
    if (!best || score > best.score) {
      best = { score, age: other.age, matchedVoterId: null, matchedRowIndex: other.rowIndex };
    }
  }

  if (!best || best.score < policy.conflictThreshold) {
    return { classification: 'new', matchedVoterId: null, matchedRowIndex: null, score: best?.score ?? 0 };
  }

  // ── 3-4. Review bands ───────────────────────────────────────────
  const contradictoryAge =
    candidate.age !== null &&
    best.age !== null &&
    Math.abs(candidate.age - best.age) > policy.ageTolerance;

  const classification =
    best.score >= policy.probableThreshold && !contradictoryAge
      ? 'probable_duplicate'
      : 'conflict';

  return {
    classification,
    matchedVoterId: best.matchedVoterId,
    matchedRowIndex: best.matchedRowIndex,
    score: best.score,
  };
}
