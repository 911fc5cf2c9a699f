import type { NaturalKey } from '../../voters/voter.types';

/**
 * Case-folded (name, constituency, booth) tuple as a single map key.
 * Matches the store's NOCASE unique index.
 */
export function naturalKey(record: NaturalKey): string {
  return JSON.stringify([
    record.name.toLowerCase(),
    record.constituency.toLowerCase(),
    record.boothNo.toLowerCase(),
  ]);
}
