import { distributeWeights, eligibleSymbols, investmentCeiling, toHypothesis } from './allocation.js';
import { StrategyFamilyPlugin } from './types.js';

const TREND_TYPES = new Set(['trend', 'opportunity']);

export const momentumTiltStrategy: StrategyFamilyPlugin = {
  id: 'momentum-tilt',
  name: 'Momentum tilt',
  description: 'Weights symbols by confidence-weighted trend and opportunity signals.',
  build(input) {
    const scores: Record<string, number> = {};

    for (const symbol of eligibleSymbols(input)) {
      const signals = input.context.signals.filter((s) => s.symbol === symbol && TREND_TYPES.has(s.signalType));
      if (signals.length === 0) continue;
      const strength = signals.reduce((sum, s) => sum + s.score * s.confidence, 0) / signals.length;
      if (strength > 0) scores[symbol] = strength;
    }

    const symbols = Object.keys(scores);
    if (symbols.length === 0) return null;

    const ceiling = investmentCeiling(input);
    const allocations = distributeWeights(scores, ceiling, input.goal.constraints.maxSingleAssetWeight);

    return toHypothesis('momentum-tilt', input, allocations, [
      ...symbols.sort().map((symbol) => `trend_strength:${symbol}:${scores[symbol].toFixed(4)}`),
      `invested_share:${ceiling}`,
    ]);
  },
};
