import { LearningSnapshot, PerformanceMetrics } from '../../types.js';
import { round8 } from '../../utils/math.js';

export interface RankCandidate {
  /** Unique, stable key; ties in score are broken on it. */
  key: string;
  family: string;
}

export interface RankedCandidate<T extends RankCandidate> {
  candidate: T;
  score: number;
  components: PerformanceMetrics;
}

/**
 * Orders candidate strategies using learning metrics. Implementations only
 * read the snapshot they are given.
 */
export interface RankingPolicy {
  readonly id: string;
  rank<T extends RankCandidate>(candidates: readonly T[], snapshot: LearningSnapshot): RankedCandidate<T>[];
}

export interface RankingWeights {
  version: string;
  weights: PerformanceMetrics;
  priors: PerformanceMetrics;
}

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = {
  version: 'builtin-v1',
  weights: { alpha: 1, drawdown: -1, trustScore: 0.5, acceptanceRate: 0.5 },
  priors: { alpha: 0, drawdown: 0, trustScore: 0.5, acceptanceRate: 0.5 },
};

export const componentsFor = (
  family: string,
  snapshot: LearningSnapshot,
  priors: PerformanceMetrics,
): PerformanceMetrics => {
  const learned = snapshot.families[family];
  if (!learned) return { ...priors };
  return {
    alpha: learned.alpha,
    drawdown: learned.drawdown,
    trustScore: learned.trustScore,
    acceptanceRate: learned.acceptanceRate,
  };
};

/** Declared weights · components, rounded so float noise never decides a tie. */
export const weightedScore = (components: PerformanceMetrics, weights: PerformanceMetrics): number =>
  round8(
    weights.alpha * components.alpha
      + weights.drawdown * components.drawdown
      + weights.trustScore * components.trustScore
      + weights.acceptanceRate * components.acceptanceRate,
  );
