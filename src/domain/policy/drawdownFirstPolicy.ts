import { LearningSnapshot } from '../../types.js';
import { round8 } from '../../utils/math.js';
import { RankCandidate, RankedCandidate, RankingPolicy, RankingWeights, componentsFor, weightedScore } from './types.js';

/** Lowest drawdown first; equal drawdowns fall back to the weighted score. */
export class DrawdownFirstPolicy implements RankingPolicy {
  readonly id = 'drawdown-first';

  constructor(private readonly config: RankingWeights) {}

  rank<T extends RankCandidate>(candidates: readonly T[], snapshot: LearningSnapshot): RankedCandidate<T>[] {
    const { weights, priors } = this.config;

    return candidates
      .map((candidate) => {
        const components = componentsFor(candidate.family, snapshot, priors);
        return {
          candidate,
          score: round8(1 - components.drawdown),
          weighted: weightedScore(components, weights),
          components,
        };
      })
      .sort((a, b) =>
        a.components.drawdown - b.components.drawdown
        || b.weighted - a.weighted
        || a.candidate.key.localeCompare(b.candidate.key))
      .map(({ candidate, score, components }) => ({ candidate, score, components }));
  }
}
