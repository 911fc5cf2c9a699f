/**
 * STEP 2: Validation Gate
 *
 * Field-level invariants on a normalized candidate. One gate per batch:
 * it remembers the raw fingerprints it has accepted so a row the source
 * emitted twice verbatim is rejected the second time.
 */

import type { NormalizedCandidate, RejectionReason } from './types';

export interface ValidationGateOptions {
  /** Require gender to map to male/female/other. */
  strictGender: boolean;
}

export class ValidationGate {
  private readonly seen = new Set<string>();

  constructor(private readonly options: ValidationGateOptions) {}

  /** Returns the rejection reason, or null when the candidate may proceed. */
  check(candidate: NormalizedCandidate): RejectionReason | null {
    if (candidate.name === '') return 'missing_name';
    if (candidate.constituency === '') return 'missing_constituency';
    if (candidate.boothRequired && candidate.boothNo === '') return 'missing_booth_no';
    if (this.options.strictGender && candidate.gender === 'unknown') return 'invalid_gender';

    if (this.seen.has(candidate.fingerprint)) return 'duplicate_within_row_set';
    this.seen.add(candidate.fingerprint);

    return null;
  }
}
