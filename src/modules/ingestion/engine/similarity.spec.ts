import {
  addressSimilarity,
  ageCloseness,
  levenshtein,
  nameSimilarity,
  scoreSimilarity,
} from './similarity';
import type { ComparableRecord, SimilarityPolicy } from './types';

const policy: SimilarityPolicy = {
  nameWeight: 0.6,
  ageWeight: 0.25,
  addressWeight: 0.15,
  probableThreshold: 0.85,
  conflictThreshold: 0.65,
  ageTolerance: 5,
};

function record(overrides: Partial<ComparableRecord> = {}): ComparableRecord {
  return { name: 'Asha Rao', age: 34, constituency: 'North', boothNo: 'B01', address: '', ...overrides };
}

describe('nameSimilarity', () => {
  it('is 1 for names equal ignoring case', () => {
    expect(nameSimilarity('Asha Rao', 'asha rao')).toBe(1);
  });

  it('scores a token subset at 0.85', () => {
    expect(nameSimilarity('Rao', 'Asha Rao')).toBe(0.85);
  });

  it('is 0 when either side is empty', () => {
    expect(nameSimilarity('', 'Asha')).toBe(0);
  });

  it('blends edit distance and token overlap otherwise', () => {
    // edit: 1 - 1/8, jaccard: {asha} / {asha, rao, ram}
    expect(nameSimilarity('asha rao', 'asha ram')).toBeCloseTo(0.875 * 0.4 + (1 / 3) * 0.6, 10);
  });
});

describe('levenshtein', () => {
  it('counts single-character edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
  });
});

describe('ageCloseness', () => {
  it('falls off linearly over ten years', () => {
    expect(ageCloseness(34, 36)).toBeCloseTo(0.8, 10);
    expect(ageCloseness(20, 40)).toBe(0);
  });

  it('is neutral when either age is unknown', () => {
    expect(ageCloseness(null, 30)).toBe(0.5);
  });
});

describe('addressSimilarity', () => {
  it('compares address tokens ignoring case and punctuation', () => {
    expect(addressSimilarity('12, MG Road', '12 mg road')).toBe(1);
    expect(addressSimilarity('12 MG Road', '14 MG Road')).toBe(0.5);
  });

  it('is neutral when an address is missing', () => {
    expect(addressSimilarity('', '12 MG Road')).toBe(0.5);
  });
});

describe('scoreSimilarity', () => {
  it('weights name, age and address', () => {
    const result = scoreSimilarity(record(), record({ boothNo: 'B02' }), policy);
    expect(result.nameScore).toBe(1);
    expect(result.ageScore).toBe(1);
    expect(result.addressScore).toBe(0.5);
    expect(result.score).toBeCloseTo(0.925, 10);
  });

  it('drops into the conflict band when ages are far apart', () => {
    const result = scoreSimilarity(record({ age: 34 }), record({ age: 56 }), policy);
    expect(result.ageScore).toBe(0);
    expect(result.score).toBeCloseTo(0.675, 10);
  });
});
