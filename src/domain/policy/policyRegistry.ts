import { DrawdownFirstPolicy } from './drawdownFirstPolicy.js';
import { RankingPolicy, RankingWeights } from './types.js';
import { WeightedSumPolicy } from './weightedSumPolicy.js';

type PolicyFactory = (weights: RankingWeights) => RankingPolicy;

const FACTORIES: Record<string, PolicyFactory> = {
  'weighted-sum': (weights) => new WeightedSumPolicy(weights),
  'drawdown-first': (weights) => new DrawdownFirstPolicy(weights),
};

export const availablePolicies = (): string[] => Object.keys(FACTORIES).sort();

export function createRankingPolicy(id: string, weights: RankingWeights): RankingPolicy {
  const factory = FACTORIES[id];
  if (!factory) {
    throw new Error(`Unknown ranking policy '${id}'. Available: ${availablePolicies().join(', ')}.`);
  }
  return factory(weights);
}
