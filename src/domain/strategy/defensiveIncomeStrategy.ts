import {
  dailyVolatility,
  distributeWeights,
  eligibleSymbols,
  investmentCeiling,
  toHypothesis,
} from './allocation.js';
import { StrategyFamilyPlugin } from './types.js';

const DEFENSIVE_SHARE = 0.8;
const VOLATILITY_FLOOR = 0.0001;
const WARNING_SCORE = -0.5;

export const defensiveIncomeStrategy: StrategyFamilyPlugin = {
  id: 'defensive-income',
  name: 'Defensive income',
  description: 'Inverse-volatility weights, skips symbols under strong risk or alert signals, holds extra cash.',
  build(input) {
    const flagged = new Set(
      input.context.signals
        .filter((s) => (s.signalType === 'risk' || s.signalType === 'alert') && s.score <= WARNING_SCORE)
        .map((s) => s.symbol),
    );

    const scores: Record<string, number> = {};
    for (const symbol of eligibleSymbols(input)) {
      if (flagged.has(symbol)) continue;
      scores[symbol] = 1 / Math.max(VOLATILITY_FLOOR, dailyVolatility(input, symbol));
    }

    if (Object.keys(scores).length === 0) return null;

    const invested = Number((investmentCeiling(input) * DEFENSIVE_SHARE).toFixed(4));
    const allocations = distributeWeights(scores, invested, input.goal.constraints.maxSingleAssetWeight);

    return toHypothesis('defensive-income', input, allocations, [
      'inverse_volatility_weights',
      ...[...flagged].sort().map((symbol) => `skipped_on_warning:${symbol}`),
      `invested_share:${invested}`,
    ]);
  },
};
