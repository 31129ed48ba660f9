import {
  FamilyLearning,
  LearningDimension,
  LearningMetricsRecord,
  LearningSnapshot,
  PerformanceMetrics,
} from '../../types.js';
import { round8 } from '../../utils/math.js';

export const learningKey = (dimension: LearningDimension, subject: string, window: string): string =>
  `${dimension}:${subject}:${window}`;

const averages = (contributions: LearningMetricsRecord['contributions']): PerformanceMetrics => {
  const values = Object.values(contributions).map((c) => c.metrics);
  const n = values.length;
  const avg = (pick: (m: PerformanceMetrics) => number): number =>
    n === 0 ? 0 : round8(values.reduce((sum, m) => sum + pick(m), 0) / n);

  return {
    alpha: avg((m) => m.alpha),
    drawdown: avg((m) => m.drawdown),
    trustScore: avg((m) => m.trustScore),
    acceptanceRate: avg((m) => m.acceptanceRate),
  };
};

export interface ContributionInput {
  dimension: LearningDimension;
  subject: string;
  window: string;
  executionTraceId: string;
  asOf: string;
  metrics: PerformanceMetrics;
  at: string;
}

/**
 * Folds one evaluation into an aggregate. Each trace contributes its latest
 * evaluation only; an evaluation older than the one already folded in for the
 * same trace leaves the aggregate untouched (returns null).
 */
export function applyContribution(
  current: LearningMetricsRecord | undefined,
  input: ContributionInput,
): LearningMetricsRecord | null {
  const existing = current?.contributions[input.executionTraceId];
  if (existing && existing.asOf >= input.asOf) {
    return null;
  }

  const contributions = {
    ...(current?.contributions ?? {}),
    [input.executionTraceId]: { asOf: input.asOf, metrics: input.metrics },
  };

  return {
    key: learningKey(input.dimension, input.subject, input.window),
    dimension: input.dimension,
    subject: input.subject,
    window: input.window,
    sampleSize: Object.keys(contributions).length,
    means: averages(contributions),
    contributions,
    revision: (current?.revision ?? 0) + 1,
    updatedAt: input.at,
  };
}

/** Latest window per strategy family, frozen under a snapshot version. */
export function buildLearningSnapshot(
  records: Record<string, LearningMetricsRecord>,
  version: number,
  takenAt: string,
): LearningSnapshot {
  const families: Record<string, FamilyLearning> = {};

  for (const record of Object.values(records)) {
    if (record.dimension !== 'family') continue;
    const current = families[record.subject];
    if (current && current.window >= record.window) continue;
    families[record.subject] = {
      ...record.means,
      window: record.window,
      sampleSize: record.sampleSize,
    };
  }

  return { version, takenAt, families };
}
