export const GENDERS = ['male', 'female', 'other', 'unknown'] as const;

export type Gender = (typeof GENDERS)[number];

export interface Voter {
  id: number;
  name: string;
  age: number | null;
  gender: Gender;
  constituency: string;
  boothNo: string;
  address: string;
  vote: boolean;
  sourceBatchId: string | null;
  sourceDocumentId: string | null;
  ingestedAt: string | null;
  createdAt: string;
  updatedAt: string | null;
}

/** Insert shape. Identity and timestamps are assigned by the store. */
export type NewVoter = Omit<Voter, 'id' | 'createdAt' | 'updatedAt'>;

export interface NaturalKey {
  name: string;
  constituency: string;
  boothNo: string;
}

export type WriteResult =
  | { status: 'inserted'; voterId: number }
  /** The natural key was already taken; `voterId` is the row that holds it. */
  | { status: 'duplicate'; voterId: number };

/** Only fields that can be filled in without changing a voter's identity. */
export interface MergeFields {
  age: number | null;
  gender: Gender;
  address: string;
}

export interface ConstituencySummary {
  constituency: string;
  count: number;
}

export const AGE_BANDS = ['0-17', '18-30', '31-45', '46-60', '61+'] as const;

export type AgeBand = (typeof AGE_BANDS)[number];

/**
 * Storage contract the pipeline depends on.
 *
 * `commitGroup` must be atomic per call and must check natural-key uniqueness
 * in the same step as the write; a taken key is reported, never thrown.
 */
export interface VoterStore {
  findByConstituency(constituency: string): Promise<Voter[]>;
  findByNaturalKey(key: NaturalKey): Promise<Voter | null>;
  commitGroup(voters: NewVoter[]): Promise<WriteResult[]>;
  insertOne(voter: NewVoter): Promise<WriteResult>;
  mergeInto(voterId: number, fields: MergeFields): Promise<Voter | null>;
}

export const VOTER_STORE = Symbol('VOTER_STORE');
