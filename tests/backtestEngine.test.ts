import { describe, expect, it } from 'vitest';
import { BacktestEngine, backtestIdFor } from '../src/domain/backtest/backtestEngine.js';
import { simulateAllocations } from '../src/domain/backtest/simulation.js';
import { HypothesisBody, MarketContext } from '../src/types.js';
import { compounding, marketContextInput, seriesFrom, signal } from './helpers.js';

const settings = { barsPerMonth: 21, minBars: 20, maxLookbackBars: 252, bootstrapSamples: 50 };
const strategyRef = { id: 'strat-1', version: 1 };

const context = (overrides: Partial<MarketContext> = {}): MarketContext => ({
  ...marketContextInput(),
  createdAt: '2026-01-30T00:00:00.000Z',
  ...overrides,
});

const hypothesis = (overrides: Partial<HypothesisBody> = {}): HypothesisBody => ({
  family: 'balanced-core',
  allocations: [{ symbol: 'AAA', weight: 1 }],
  cashWeight: 0,
  horizonMonths: 1,
  rationale: [],
  ...overrides,
});

describe('BacktestEngine', () => {
  const engine = new BacktestEngine(settings);

  it('bounds the required history to the configured range', () => {
    expect(engine.requiredBars(1)).toBe(21);
    expect(engine.requiredBars(0.5)).toBe(20);
    expect(engine.requiredBars(24)).toBe(252);
  });

  it('computes metrics over the most recent bars of a steadily rising series', async () => {
    const result = await engine.run(hypothesis(), context(), { strategyRef, seed: 7 });

    expect(result.id).toBe(backtestIdFor(strategyRef));
    expect(result.metrics).toEqual({
      expectedReturn: 0.23239194,
      maxDrawdown: 0,
      confidence: 0.24166667,
      totalReturn: 0.22019004,
      volatility: 0,
    });
    expect(result.window).toEqual({
      from: '2026-01-10T00:00:00.000Z',
      to: '2026-01-30T00:00:00.000Z',
      bars: 21,
    });
    expect(result.computedAt).toBe('2026-01-30T00:00:00.000Z');
    expect(result.marketContextRef).toEqual({ id: 'ctx-1', timestamp: '2026-01-30T00:00:00.000Z' });
  });

  it('reports the worst peak-to-trough loss', async () => {
    const prices = [100, 120, 90, ...Array.from({ length: 17 }, () => 90)];
    const ctx = context({ priceHistory: { AAA: seriesFrom(prices) } });

    const result = await engine.run(hypothesis({ horizonMonths: 0.5 }), ctx, { strategyRef, seed: 1 });

    expect(result.window.bars).toBe(20);
    expect(result.metrics.maxDrawdown).toBe(0.25);
    expect(result.metrics.totalReturn).toBe(-0.1);
  });

  it('reproduces a run exactly from the same inputs and seed', async () => {
    const body = hypothesis({
      allocations: [
        { symbol: 'AAA', weight: 0.4 },
        { symbol: 'CCC', weight: 0.4 },
      ],
      cashWeight: 0.2,
    });

    const first = await engine.run(body, context(), { strategyRef, seed: 99 });
    const second = await engine.run(body, context(), { strategyRef, seed: 99 });
    const reseeded = await engine.run(body, context(), { strategyRef, seed: 100 });

    expect(second).toEqual(first);
    expect(reseeded.fingerprint).not.toBe(first.fingerprint);
    expect(reseeded.seed).toBe(100);
  });

  it('fails with data_insufficient when a symbol lacks the history the horizon needs', async () => {
    await expect(engine.run(hypothesis({ horizonMonths: 12 }), context(), { strategyRef, seed: 1 })).rejects.toMatchObject({
      code: 'data_insufficient',
      statusCode: 422,
      retryable: true,
      details: {
        symbols: ['AAA'],
        barsBySymbol: { AAA: 30 },
        available: 30,
        required: 252,
        marketContextId: 'ctx-1',
        entity: { type: 'strategy', id: 'strat-1', version: 1 },
      },
    });
  });

  it('ignores non-positive prices when counting usable bars', async () => {
    const prices = compounding(21, 100, 0.01);
    prices[5] = 0;
    const ctx = context({ priceHistory: { AAA: seriesFrom(prices) } });

    await expect(engine.run(hypothesis(), ctx, { strategyRef, seed: 1 })).rejects.toMatchObject({
      code: 'data_insufficient',
      details: { available: 20, required: 21 },
    });
  });

  it('fails a hypothesis without allocations as data_insufficient', async () => {
    await expect(
      engine.run(hypothesis({ allocations: [], cashWeight: 1 }), context(), { strategyRef, seed: 1 }),
    ).rejects.toMatchObject({
      code: 'data_insufficient',
      statusCode: 422,
      message: "Hypothesis holds no allocatable symbols in market context 'ctx-1'.",
      details: { symbols: [], available: 0, required: 21 },
    });
  });

  it('aligns symbols on shared timestamps and ignores bars after the snapshot', async () => {
    const ctx = context({
      priceHistory: {
        AAA: seriesFrom(compounding(90, 100, 0.01)),
        BBB: seriesFrom(compounding(50, 20, 0.005), '2025-12-10T00:00:00.000Z'),
      },
    });
    const body = hypothesis({
      allocations: [
        { symbol: 'AAA', weight: 0.5 },
        { symbol: 'BBB', weight: 0.5 },
      ],
    });

    const result = await engine.run(body, ctx, { strategyRef, seed: 5 });

    expect(result.window).toEqual({
      from: '2026-01-08T00:00:00.000Z',
      to: '2026-01-28T00:00:00.000Z',
      bars: 21,
    });
  });

  it('counts only shared bars up to the snapshot as available history', async () => {
    const ctx = context({
      priceHistory: {
        AAA: seriesFrom(compounding(90, 100, 0.01)),
        BBB: seriesFrom(compounding(30, 20, 0.005), '2025-12-20T00:00:00.000Z'),
      },
    });
    const body = hypothesis({
      allocations: [
        { symbol: 'AAA', weight: 0.5 },
        { symbol: 'BBB', weight: 0.5 },
      ],
    });

    await expect(engine.run(body, ctx, { strategyRef, seed: 5 })).rejects.toMatchObject({
      code: 'data_insufficient',
      details: { barsBySymbol: { AAA: 30, BBB: 30 }, available: 18, required: 21 },
    });
  });

  it('keeps every metric finite over a very long horizon', async () => {
    const ctx = context({ priceHistory: { AAA: seriesFrom(compounding(260, 100, 0.07), '2025-01-01T00:00:00.000Z') } });

    const result = await engine.run(hypothesis({ horizonMonths: 600 }), ctx, { strategyRef, seed: 2 });

    expect(result.window.bars).toBe(252);
    expect(result.metrics.expectedReturn).toBe(1_000_000);
    for (const value of Object.values(result.metrics)) {
      expect(Number.isFinite(value)).toBe(true);
    }
    expect(JSON.parse(JSON.stringify(result.metrics))).toEqual(result.metrics);
  });

  it('explains drivers and the signals the hypothesis relied on', async () => {
    const ctx = context({
      signals: [
        signal('CCC', 'risk', -0.7, 0.9),
        signal('AAA', 'trend', 0.6, 0.8),
        signal('BBB', 'trend', 0.9, 0.9),
      ],
    });
    const body = hypothesis({
      allocations: [
        { symbol: 'AAA', weight: 0.5 },
        { symbol: 'CCC', weight: 0.25 },
      ],
      cashWeight: 0.25,
    });

    const result = await engine.run(body, ctx, { strategyRef, seed: 3 });
    const trace = result.explainability;

    expect(trace.drivers.map((d) => d.symbol)).toEqual(['AAA', 'CCC']);
    expect(trace.signalsUsed.map((s) => `${s.symbol}:${s.signalType}`)).toEqual(['AAA:trend', 'CCC:risk']);
    expect(trace.notes).toContain('risk signal on CCC: risk-ccc');
    expect(trace.summary.startsWith('balanced-core over 21 bars (2026-01-10T00:00:00.000Z to 2026-01-30T00:00:00.000Z)')).toBe(true);
  });
});

describe('simulateAllocations', () => {
  it('keeps the unallocated share in cash', () => {
    const simulation = simulateAllocations([{ symbol: 'AAA', weight: 0.5 }], { AAA: [10, 20, 10] });

    expect(simulation.curve).toEqual([1, 1.5, 1.125]);
    expect(simulation.dailyReturns).toEqual([0.5, -0.25]);
    expect(simulation.symbolReturns).toEqual({ AAA: 0 });
  });
});
