import { DataInsufficientError, entityOf } from '../../errors/taxonomy.js';
import {
  BacktestResult,
  DriverContribution,
  ExplainabilityTrace,
  HypothesisBody,
  MarketContext,
  SignalUsage,
  VersionRef,
} from '../../types.js';
import { hashObject } from '../../utils/hash.js';
import { clamp, maxDrawdown, mean, round8, stdDev } from '../../utils/math.js';
import { createRng, randomIndex } from '../../utils/random.js';
import { commonTimestamps, simulateAllocations, usablePoints } from './simulation.js';

export interface BacktestSettings {
  barsPerMonth: number;
  minBars: number;
  maxLookbackBars: number;
  bootstrapSamples: number;
}

export interface BacktestRunOptions {
  strategyRef: VersionRef;
  seed: number;
}

// Confidence blend
const WEIGHT_VOLUME = 0.5;
const WEIGHT_SIGNAL_COVERAGE = 0.3;
const WEIGHT_STABILITY = 0.2;

// Expected return above +100,000,000% is reported as the cap.
const EXPECTED_RETURN_CAP = 1_000_000;

const pct = (v: number): string => `${(v * 100).toFixed(2)}%`;

export const backtestIdFor = (ref: VersionRef): string => `bt:${ref.id}@${ref.version}`;

export class BacktestEngine {
  constructor(private readonly settings: BacktestSettings) {}

  /** Bars of history a horizon needs, bounded to [minBars, maxLookbackBars]. */
  requiredBars(horizonMonths: number): number {
    return clamp(
      Math.round(horizonMonths * this.settings.barsPerMonth),
      this.settings.minBars,
      this.settings.maxLookbackBars,
    );
  }

  async run(
    hypothesis: HypothesisBody,
    context: MarketContext,
    options: BacktestRunOptions,
  ): Promise<BacktestResult> {
    const entity = entityOf('strategy', options.strategyRef);

    const required = this.requiredBars(hypothesis.horizonMonths);
    const symbols = hypothesis.allocations.map((a) => a.symbol);
    const points = Object.fromEntries(
      symbols.map((symbol) => [symbol, usablePoints(context.priceHistory[symbol], context.timestamp)]),
    );
    const common = commonTimestamps(symbols.map((symbol) => points[symbol]));

    if (common.length < required) {
      const message = symbols.length === 0
        ? `Hypothesis holds no allocatable symbols in market context '${context.id}'.`
        : `Market context '${context.id}' has ${common.length} common bars up to ${context.timestamp} for `
          + `${symbols.join(', ')}; a ${hypothesis.horizonMonths}-month horizon needs ${required}.`;
      throw new DataInsufficientError(message, entity, {
        symbols,
        barsBySymbol: Object.fromEntries(symbols.map((symbol) => [symbol, points[symbol].length])),
        available: common.length,
        required,
        marketContextId: context.id,
      });
    }

    const bars = new Set(common.slice(-required));
    const series: Record<string, number[]> = {};
    for (const symbol of symbols) {
      series[symbol] = points[symbol].filter((p) => bars.has(p.ts)).map((p) => p.priceUsd);
    }
    const from = common[common.length - required];
    const to = common[common.length - 1];

    const simulation = simulateAllocations(hypothesis.allocations, series);
    const meanDaily = mean(simulation.dailyReturns);
    const horizonBars = hypothesis.horizonMonths * this.settings.barsPerMonth;

    const totalReturn = simulation.curve[simulation.curve.length - 1] - 1;
    // Compounded in log space so long horizons saturate at the cap instead of overflowing.
    const expectedReturn = Math.min(Math.expm1(horizonBars * Math.log1p(meanDaily)), EXPECTED_RETURN_CAP);
    const drawdown = maxDrawdown(simulation.curve);
    const volatility = stdDev(simulation.dailyReturns);

    const signalsUsed = this.signalsFor(hypothesis, context);
    const volume = Math.min(1, required / this.settings.maxLookbackBars);
    const coverage = this.signalCoverage(hypothesis, signalsUsed);
    const stability = this.bootstrapStability(simulation.dailyReturns, meanDaily, options.seed);
    const confidence = WEIGHT_VOLUME * volume + WEIGHT_SIGNAL_COVERAGE * coverage + WEIGHT_STABILITY * stability;

    const window = { from, to, bars: required };
    const metrics = {
      expectedReturn: round8(expectedReturn),
      maxDrawdown: round8(drawdown),
      confidence: round8(confidence),
      totalReturn: round8(totalReturn),
      volatility: round8(volatility),
    };

    const explainability = this.explain(hypothesis, context, simulation.symbolReturns, signalsUsed, window, {
      totalReturn,
      drawdown,
      confidence,
      volume,
      coverage,
      stability,
    });

    return {
      id: backtestIdFor(options.strategyRef),
      strategyRef: { ...options.strategyRef },
      marketContextRef: { id: context.id, timestamp: context.timestamp },
      metrics,
      seed: options.seed,
      fingerprint: hashObject({
        hypothesis,
        marketContext: { id: context.id, timestamp: context.timestamp },
        seed: options.seed,
        settings: this.settings,
      }),
      window,
      explainability,
      computedAt: context.timestamp,
    };
  }

  private signalsFor(hypothesis: HypothesisBody, context: MarketContext): SignalUsage[] {
    const symbols = new Set(hypothesis.allocations.map((a) => a.symbol));
    return context.signals
      .filter((s) => symbols.has(s.symbol))
      .map((s) => ({
        symbol: s.symbol,
        signalType: s.signalType,
        label: s.label,
        score: s.score,
        confidence: s.confidence,
      }))
      .sort((a, b) => a.symbol.localeCompare(b.symbol) || a.signalType.localeCompare(b.signalType) || a.label.localeCompare(b.label));
  }

  private signalCoverage(hypothesis: HypothesisBody, signals: SignalUsage[]): number {
    const covered = new Set(signals.map((s) => s.symbol));
    const invested = hypothesis.allocations.reduce((sum, a) => sum + a.weight, 0);
    if (invested <= 0) return 0;
    const coveredWeight = hypothesis.allocations
      .filter((a) => covered.has(a.symbol))
      .reduce((sum, a) => sum + a.weight, 0);
    return coveredWeight / invested;
  }

  /** Share of seeded bootstrap resamples whose mean return keeps the sign of the point estimate. */
  private bootstrapStability(returns: number[], pointEstimate: number, seed: number): number {
    if (returns.length === 0) return 0;
    const rng = createRng(seed);
    const target = Math.sign(pointEstimate);
    let matches = 0;

    for (let s = 0; s < this.settings.bootstrapSamples; s++) {
      let sum = 0;
      for (let i = 0; i < returns.length; i++) {
        sum += returns[randomIndex(rng, returns.length)];
      }
      if (Math.sign(sum / returns.length) === target) matches += 1;
    }

    return matches / this.settings.bootstrapSamples;
  }

  private explain(
    hypothesis: HypothesisBody,
    context: MarketContext,
    symbolReturns: Record<string, number>,
    signalsUsed: SignalUsage[],
    window: { from: string; to: string; bars: number },
    figures: { totalReturn: number; drawdown: number; confidence: number; volume: number; coverage: number; stability: number },
  ): ExplainabilityTrace {
    const contributions = hypothesis.allocations.map((a) => a.weight * (symbolReturns[a.symbol] ?? 0));
    const grossContribution = contributions.reduce((sum, c) => sum + Math.abs(c), 0);

    const drivers: DriverContribution[] = hypothesis.allocations
      .map((a, i) => ({
        symbol: a.symbol,
        weight: a.weight,
        windowReturn: round8(symbolReturns[a.symbol] ?? 0),
        contributionShare: grossContribution > 0 ? round8(contributions[i] / grossContribution) : 0,
      }))
      .sort((a, b) => Math.abs(b.contributionShare) - Math.abs(a.contributionShare) || a.symbol.localeCompare(b.symbol));

    const notes: string[] = [
      `history volume ${pct(figures.volume)} of max lookback, signal coverage ${pct(figures.coverage)}, `
        + `bootstrap stability ${pct(figures.stability)}`,
    ];

    const warnings = signalsUsed.filter((s) => (s.signalType === 'risk' || s.signalType === 'alert') && s.score < 0);
    for (const warning of warnings) {
      notes.push(`${warning.signalType} signal on ${warning.symbol}: ${warning.label}`);
    }

    const eventsInWindow = context.events.filter((e) => e.timestamp >= window.from && e.timestamp <= window.to);
    if (eventsInWindow.length > 0) {
      notes.push(`${eventsInWindow.length} market event(s) inside the backtest window`);
    }

    const lead = drivers[0];
    const summary = `${hypothesis.family} over ${window.bars} bars (${window.from} to ${window.to}): `
      + `total return ${pct(figures.totalReturn)}, max drawdown ${pct(figures.drawdown)}, `
      + `confidence ${figures.confidence.toFixed(2)}.`
      + (lead ? ` Main driver: ${lead.symbol} (${pct(lead.windowReturn)} over the window).` : '');

    return {
      summary,
      window,
      drivers,
      signalsUsed,
      notes,
    };
  }
}
