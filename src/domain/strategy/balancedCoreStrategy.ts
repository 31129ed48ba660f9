import { distributeWeights, eligibleSymbols, investmentCeiling, listedSymbols, toHypothesis } from './allocation.js';
import { StrategyFamilyPlugin } from './types.js';

export const balancedCoreStrategy: StrategyFamilyPlugin = {
  id: 'balanced-core',
  name: 'Balanced core',
  description: 'Equal-weight core across every eligible symbol, sized to the risk profile.',
  build(input) {
    // Falls back to the listed symbols when none has usable history; the
    // backtest then fails with data_insufficient.
    const eligible = eligibleSymbols(input);
    const symbols = eligible.length > 0 ? eligible : listedSymbols(input);
    if (symbols.length === 0) return null;

    const ceiling = investmentCeiling(input);
    const scores = Object.fromEntries(symbols.map((symbol) => [symbol, 1]));
    const allocations = distributeWeights(scores, ceiling, input.goal.constraints.maxSingleAssetWeight);

    return toHypothesis('balanced-core', input, allocations, [
      `equal_weight:${symbols.length}_symbols`,
      `invested_share:${ceiling}`,
    ]);
  },
};
