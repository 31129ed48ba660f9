import { DataInsufficientError } from '../../errors/taxonomy.js';
import { Allocation, DecisionOutcome, PerformanceMetrics, UserFeedback } from '../../types.js';
import { maxDrawdown, round8 } from '../../utils/math.js';
import { simulateAllocations } from '../backtest/simulation.js';

export interface MarketOutcome {
  asOf: string;
  prices: Record<string, number[]>;
  benchmark: number[];
}

export interface ScoringInput {
  executionTraceId: string;
  allocations: Allocation[];
  outcome: MarketOutcome;
  familyOutcomes: DecisionOutcome[];
  recentUserOutcomes: DecisionOutcome[];
  feedback?: UserFeedback;
  feedbackWeight: number;
}

export interface ScoringResult {
  metrics: PerformanceMetrics;
  realizedReturn: number;
  benchmarkReturn: number;
}

const cleanSeries = (values: number[] | undefined): number[] =>
  (values ?? []).filter((v) => Number.isFinite(v) && v > 0);

/**
 * Trust from how the family's proposals were received: accepted counts fully,
 * modified half, rejected not at all, with a one-accept/one-reject prior.
 */
export const decisionTrust = (outcomes: DecisionOutcome[]): number => {
  const credit = outcomes.reduce((sum, o) => sum + (o === 'accepted' ? 1 : o === 'modified' ? 0.5 : 0), 0);
  return (credit + 1) / (outcomes.length + 2);
};

export const acceptanceRate = (outcomes: DecisionOutcome[]): number =>
  outcomes.length === 0 ? 0 : outcomes.filter((o) => o === 'accepted').length / outcomes.length;

/** Rating 1..5 mapped onto 0..1. */
export const feedbackScore = (feedback: UserFeedback): number => (feedback.rating - 1) / 4;

export function scorePerformance(input: ScoringInput): ScoringResult {
  const entity = { type: 'execution_trace' as const, id: input.executionTraceId };
  const benchmark = cleanSeries(input.outcome.benchmark);

  if (benchmark.length < 2) {
    throw new DataInsufficientError('Market outcome needs at least 2 benchmark prices.', entity, {
      available: benchmark.length,
      required: 2,
    });
  }

  const cleaned: Record<string, number[]> = {};
  for (const allocation of input.allocations) {
    const series = cleanSeries(input.outcome.prices[allocation.symbol]);
    if (series.length < 2) {
      throw new DataInsufficientError(`Market outcome needs at least 2 prices for ${allocation.symbol}.`, entity, {
        symbol: allocation.symbol,
        available: series.length,
        required: 2,
      });
    }
    cleaned[allocation.symbol] = series;
  }

  // Align every series on its most recent bars.
  const bars = Math.min(...Object.values(cleaned).map((s) => s.length));
  const aligned = Object.fromEntries(Object.entries(cleaned).map(([symbol, s]) => [symbol, s.slice(-bars)]));

  const simulation = simulateAllocations(input.allocations, aligned);
  const realizedReturn = simulation.curve[simulation.curve.length - 1] - 1;
  const benchmarkReturn = benchmark[benchmark.length - 1] / benchmark[0] - 1;

  let trustScore = decisionTrust(input.familyOutcomes);
  if (input.feedback) {
    trustScore = (1 - input.feedbackWeight) * trustScore + input.feedbackWeight * feedbackScore(input.feedback);
  }

  return {
    metrics: {
      alpha: round8(realizedReturn - benchmarkReturn),
      drawdown: round8(maxDrawdown(simulation.curve)),
      trustScore: round8(trustScore),
      acceptanceRate: round8(acceptanceRate(input.recentUserOutcomes)),
    },
    realizedReturn: round8(realizedReturn),
    benchmarkReturn: round8(benchmarkReturn),
  };
}
