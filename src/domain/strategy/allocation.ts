import { Allocation, HypothesisBody, RiskTolerance } from '../../types.js';
import { stdDev } from '../../utils/math.js';
import { usablePoints } from '../backtest/simulation.js';
import { HypothesisInput } from './types.js';

const TOLERANCE_CEILING: Record<RiskTolerance, number> = {
  conservative: 0.5,
  moderate: 0.75,
  aggressive: 0.95,
};

const LOSS_AVERSION_DAMPING = 0.2;

const round4 = (v: number): number => Number(v.toFixed(4));

/** Symbols in the snapshot the goal does not exclude, whatever their history. */
export const listedSymbols = (input: HypothesisInput): string[] => {
  const excluded = new Set(input.goal.constraints.excludedSymbols.map((s) => s.toUpperCase()));
  return [...new Set(input.context.symbols)]
    .filter((symbol) => !excluded.has(symbol.toUpperCase()))
    .sort();
};

/** Listed symbols with at least two usable bars up to the snapshot timestamp. */
export const eligibleSymbols = (input: HypothesisInput): string[] =>
  listedSymbols(input).filter(
    (symbol) => usablePoints(input.context.priceHistory[symbol], input.context.timestamp).length >= 2,
  );

/** Share of capital the profile allows to be invested; the rest stays in cash. */
export const investmentCeiling = (input: HypothesisInput): number => {
  const { riskTolerance, lossAversionScore } = input.profile.riskProfile;
  return round4(TOLERANCE_CEILING[riskTolerance] * (1 - LOSS_AVERSION_DAMPING * lossAversionScore));
};

export const dailyVolatility = (input: HypothesisInput, symbol: string): number => {
  const prices = usablePoints(input.context.priceHistory[symbol], input.context.timestamp).map((p) => p.priceUsd);
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    returns.push(prices[i] / prices[i - 1] - 1);
  }
  return stdDev(returns);
};

/**
 * Splits `total` across symbols in proportion to their positive scores, with
 * no symbol above `cap`. Weight a capped symbol cannot take is redistributed;
 * whatever is left once every symbol is capped stays unallocated.
 */
export const distributeWeights = (scores: Record<string, number>, total: number, cap = 1): Allocation[] => {
  const weights: Record<string, number> = {};
  let active = Object.keys(scores).filter((symbol) => scores[symbol] > 0).sort();
  let remaining = total;

  while (active.length > 0 && remaining > 0) {
    const scoreSum = active.reduce((sum, symbol) => sum + scores[symbol], 0);
    const capped = active.filter((symbol) => (remaining * scores[symbol]) / scoreSum > cap);

    if (capped.length === 0) {
      for (const symbol of active) {
        weights[symbol] = (remaining * scores[symbol]) / scoreSum;
      }
      break;
    }

    for (const symbol of capped) {
      weights[symbol] = cap;
      remaining -= cap;
    }
    active = active.filter((symbol) => !capped.includes(symbol));
  }

  return Object.keys(weights)
    .sort()
    .map((symbol) => ({ symbol, weight: round4(weights[symbol]) }))
    .filter((a) => a.weight > 0);
};

export const toHypothesis = (
  family: string,
  input: HypothesisInput,
  allocations: Allocation[],
  rationale: string[],
): HypothesisBody => {
  const invested = allocations.reduce((sum, a) => sum + a.weight, 0);
  return {
    family,
    allocations,
    cashWeight: round4(Math.max(0, 1 - invested)),
    horizonMonths: input.goal.horizonMonths,
    rationale,
  };
};
