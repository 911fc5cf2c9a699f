/**
 * STEP 1: Record Normalizer
 *
 * Turns one RawRecord into a canonical NormalizedCandidate, or rejects it.
 * Pure: every decision (defaulted age, unknown gender) travels in the result.
 *
 * Canonical forms:
 *   name          "  shri ASHA   rao " → "Asha Rao"
 *   constituency  "north  delhi"       → "North Delhi"
 *   booth         "Booth No. b 01"     → "B01"
 */

import type { Gender } from '../../voters/voter.types';
import {
  RAW_FIELDS,
  type NormalizationFlag,
  type NormalizeResult,
  type RawRecord,
} from './types';

// ── Regex patterns ─────────────────────────────────────────────────

// Keep letters of any script (with their combining marks), whitespace, dots, hyphens, apostrophes
const NAME_NOISE_RE = /[^\p{L}\p{M}\s.\-']/gu;
const EDGE_PUNCT_RE = /^[.\-']+|[.\-']+$/g;
const BOOTH_PREFIX_RE = /^(?:BOOTH|PART)\s*(?:NO\.?|NUMBER|#)?\s*[:\-]?\s*/;
const AGE_RE = /^(\d{1,3})(?:\.\d+)?(?:\s*(?:y|yr|yrs|year|years))?$/i;

const MIN_AGE = 1;
const MAX_AGE = 120;

const HONORIFICS = new Set([
  'shri', 'sri', 'shree', 'smt', 'shrimati', 'kumari', 'km',
  'mr', 'mrs', 'ms', 'miss', 'dr',
]);

const GENDER_ALIASES: Record<string, Gender> = {
  m: 'male', male: 'male', man: 'male', purush: 'male', 'पुरुष': 'male',
  f: 'female', female: 'female', w: 'female', woman: 'female',
  mahila: 'female', 'महिला': 'female', stree: 'female',
  o: 'other', other: 'other', t: 'other', tg: 'other', x: 'other',
  transgender: 'other', 'third gender': 'other', 'तृतीय': 'other',
};

const TRUTHY_VOTE = new Set(['true', 'yes', 'y', '1', 'voted']);

// ── Field normalizers ──────────────────────────────────────────────

function collapse(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

export function titleCase(value: string): string {
  return value
    .split(' ')
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
}

export function normalizeName(raw: string | undefined): string {
  const tokens = collapse(raw)
    .normalize('NFC')
    .replace(NAME_NOISE_RE, ' ')
    .split(/\s+/)
    .map((t) => t.replace(EDGE_PUNCT_RE, ''))
    .filter((t) => t.length > 0);

  while (tokens.length > 0 && HONORIFICS.has(tokens[0].toLowerCase())) {
    tokens.shift();
  }

  return titleCase(tokens.join(' '));
}

export function normalizeGender(raw: string | undefined): Gender {
  const key = collapse(raw).toLowerCase().replace(/\.$/, '');
  return GENDER_ALIASES[key] ?? 'unknown';
}

/** Age outside [1, 120] or unparseable is unknown, never a rejection. */
export function parseAge(raw: string | undefined): number | null {
  const match = AGE_RE.exec(collapse(raw));
  if (!match) return null;
  const age = parseInt(match[1], 10);
  return age >= MIN_AGE && age <= MAX_AGE ? age : null;
}

export function normalizeConstituency(raw: string | undefined): string {
  return titleCase(collapse(raw));
}

export function normalizeBooth(raw: string | undefined): string {
  return collapse(raw).toUpperCase().replace(BOOTH_PREFIX_RE, '').replace(/\s+/g, '');
}

export function parseVote(raw: string | undefined): boolean {
  return TRUTHY_VOTE.has(collapse(raw).toLowerCase());
}

// ── Public API ─────────────────────────────────────────────────────

export function normalizeRecord(record: RawRecord): NormalizeResult {
  const { fields } = record;

  if (RAW_FIELDS.every((f) => collapse(fields[f]) === '')) {
    return { ok: false, reason: 'malformed_row' };
  }

  const name = normalizeName(fields.name);
  if (name === '') {
    return { ok: false, reason: 'missing_name' };
  }

  const flags: NormalizationFlag[] = [];

  const age = parseAge(fields.age);
  flags.push(age === null ? 'age_defaulted' : 'age_parsed');

  const gender = normalizeGender(fields.gender);
  if (gender === 'unknown') flags.push('gender_defaulted');

  return {
    ok: true,
    candidate: {
      sourceDocumentId: record.sourceDocumentId,
      rowIndex: record.rowIndex,
      boothRequired: record.boothRequired,
      name,
      age,
      gender,
      constituency: normalizeConstituency(fields.constituency),
      boothNo: normalizeBooth(fields.boothNo),
      address: collapse(fields.address),
      vote: parseVote(fields.vote),
      flags,
      fingerprint: JSON.stringify(RAW_FIELDS.map((f) => fields[f] ?? '')),
    },
  };
}
