/**
 * STEP 3a: Similarity Scoring
 *
 * Pure pairwise scoring of two voter-shaped records. The weights live in
 * SimilarityPolicy so the matching policy can be tuned from configuration.
 *
 * Signals:
 *   name     edit distance + token Jaccard, with a token-subset shortcut
 *   age      linear closeness over AGE_SPAN years
 *   address  token Jaccard
 *
 * A signal that cannot be computed (unknown age, empty address) is neutral
 * (0.5), so missing data neither proves nor disproves a match.
 */

import type { ComparableRecord, SimilarityBreakdown, SimilarityPolicy } from './types';

const NEUTRAL = 0.5;
const SUBSET_SCORE = 0.85;
const AGE_SPAN = 10;

// ── Name ───────────────────────────────────────────────────────────

/**
 * Composite name similarity: 40% normalised edit-distance + 60% token Jaccard.
 * "Rao" vs "Asha Rao" is a token subset and scores SUBSET_SCORE.
 */
export function nameSimilarity(a: string, b: string): number {
  const la = a.toLowerCase().trim();
  const lb = b.toLowerCase().trim();
  if (la === lb) return 1;
  if (la.length === 0 || lb.length === 0) return 0;

  const tokA = new Set(la.split(/\s+/));
  const tokB = new Set(lb.split(/\s+/));

  const aSubsetOfB = [...tokA].every((t) => tokB.has(t));
  const bSubsetOfA = [...tokB].every((t) => tokA.has(t));
  if (aSubsetOfB || bSubsetOfA) return SUBSET_SCORE;

  const editSim = 1 - levenshtein(la, lb) / Math.max(la.length, lb.length);
  return editSim * 0.4 + jaccard(tokA, tokB) * 0.6;
}

export function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () =>
    Array<number>(n + 1).fill(0),
  );
  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;
  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }
  return dp[m][n];
}

function jaccard(a: Set<string>, b: Set<string>): number {
  const intersection = [...a].filter((t) => b.has(t)).length;
  const union = new Set([...a, ...b]).size;
  return union > 0 ? intersection / union : 0;
}

// ── Age & address ──────────────────────────────────────────────────

export function ageCloseness(a: number | null, b: number | null): number {
  if (a === null || b === null) return NEUTRAL;
  return Math.max(0, 1 - Math.abs(a - b) / AGE_SPAN);
}

function addressTokens(address: string): Set<string> {
  return new Set(
    address
      .toLowerCase()
      .split(/[^a-z0-9\u0900-\u0D7F]+/)
      .filter((t) => t.length > 0),
  );
}

export function addressSimilarity(a: string, b: string): number {
  const tokA = addressTokens(a);
  const tokB = addressTokens(b);
  if (tokA.size === 0 || tokB.size === 0) return NEUTRAL;
  return jaccard(tokA, tokB);
}

// ── Composite ──────────────────────────────────────────────────────

export function scoreSimilarity(
  a: ComparableRecord,
  b: ComparableRecord,
  policy: SimilarityPolicy,
): SimilarityBreakdown {
  const nameScore = nameSimilarity(a.name, b.name);
  const ageScore = ageCloseness(a.age, b.age);
  const addressScore = addressSimilarity(a.address, b.address);

  const score = Math.max(
    0,
    Math.min(
      nameScore * policy.nameWeight +
        ageScore * policy.ageWeight +
        addressScore * policy.addressWeight,
      1,
    ),
  );

  return { score, nameScore, ageScore, addressScore };
}
