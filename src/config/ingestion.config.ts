import { registerAs } from '@nestjs/config';
import { InvalidConfigError } from '../common/errors/ingestion.errors';
import type { SimilarityPolicy } from '../modules/ingestion/engine/types';

export interface IngestionConfig {
  /** Constituency partitions resolved in parallel. */
  concurrency: number;
  /** Rows per atomic commit group. */
  commitGroupSize: number;
  /** Reject rows whose gender does not map to male/female/other. */
  strictGender: boolean;
  /** How long a finished BatchReport stays in Redis. */
  reportTtlSeconds: number;
  policy: SimilarityPolicy;
}

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

/**
 * Build the ingestion settings from INGEST_* variables.
 * Thresholds and weights are checked here so a bad deploy fails at boot,
 * not halfway through a roster.
 */
export function loadIngestionConfig(env: NodeJS.ProcessEnv): IngestionConfig {
  const config: IngestionConfig = {
    concurrency: num(env.INGEST_CONCURRENCY, 4),
    commitGroupSize: num(env.INGEST_COMMIT_GROUP_SIZE, 100),
    strictGender: env.INGEST_STRICT_GENDER === 'true',
    reportTtlSeconds: num(env.INGEST_REPORT_TTL_SECONDS, 86_400),
    policy: {
      nameWeight: num(env.INGEST_NAME_WEIGHT, 0.6),
      ageWeight: num(env.INGEST_AGE_WEIGHT, 0.25),
      addressWeight: num(env.INGEST_ADDRESS_WEIGHT, 0.15),
      probableThreshold: num(env.INGEST_PROBABLE_THRESHOLD, 0.85),
      conflictThreshold: num(env.INGEST_CONFLICT_THRESHOLD, 0.65),
      ageTolerance: num(env.INGEST_AGE_TOLERANCE, 5),
    },
  };

  const problems = validateIngestionConfig(config);
  if (problems.length > 0) throw new InvalidConfigError(problems);
  return config;
}

export function validateIngestionConfig(config: IngestionConfig): string[] {
  const problems: string[] = [];
  const { policy } = config;

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    problems.push('concurrency must be a positive integer');
  }
  if (!Number.isInteger(config.commitGroupSize) || config.commitGroupSize < 1) {
    problems.push('commitGroupSize must be a positive integer');
  }
  if (!Number.isInteger(config.reportTtlSeconds) || config.reportTtlSeconds < 1) {
    problems.push('reportTtlSeconds must be a positive integer');
  }

  const weights = [policy.nameWeight, policy.ageWeight, policy.addressWeight];
  if (weights.some((w) => !Number.isFinite(w) || w < 0)) {
    problems.push('similarity weights must be non-negative numbers');
  } else if (Math.abs(weights.reduce((a, b) => a + b, 0) - 1) > 1e-6) {
    problems.push('similarity weights must sum to 1');
  }

  if (
    !(policy.conflictThreshold > 0) ||
    !(policy.conflictThreshold < policy.probableThreshold) ||
    !(policy.probableThreshold <= 1)
  ) {
    problems.push('thresholds must satisfy 0 < conflictThreshold < probableThreshold <= 1');
  }
  if (!Number.isFinite(policy.ageTolerance) || policy.ageTolerance < 0) {
    problems.push('ageTolerance must be a non-negative number');
  }

  return problems;
}

export default registerAs('ingestion', () => loadIngestionConfig(process.env));
