import { LearningSnapshot } from '../../types.js';
import { RankCandidate, RankedCandidate, RankingPolicy, RankingWeights, componentsFor, weightedScore } from './types.js';

/** Score = declared weights · latest family metrics (priors for unseen families). */
export class WeightedSumPolicy implements RankingPolicy {
  readonly id = 'weighted-sum';

  constructor(private readonly config: RankingWeights) {}

  rank<T extends RankCandidate>(candidates: readonly T[], snapshot: LearningSnapshot): RankedCandidate<T>[] {
    const { weights, priors } = this.config;

    return candidates
      .map((candidate) => {
        const components = componentsFor(candidate.family, snapshot, priors);
        return { candidate, score: weightedScore(components, weights), components };
      })
      .sort((a, b) => b.score - a.score || a.candidate.key.localeCompare(b.candidate.key));
  }
}
