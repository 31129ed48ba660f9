import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { CreateGoalInput, RecordMarketContextInput, RegisterProfileInput } from '../src/services/intakeService.js';
import { MarketSignal, PricePoint } from '../src/types.js';

export const DAY_MS = 86_400_000;
export const SERIES_START = '2026-01-01T00:00:00.000Z';

export async function createTempDir(prefix = 'strategy-engine-tests-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function buildTestConfig(tmpDir: string): AppConfig {
  return {
    ...baseConfig,
    paths: {
      ...baseConfig.paths,
      dataDir: tmpDir,
      stateFile: path.join(tmpDir, 'state.json'),
      logFile: path.join(tmpDir, 'events.ndjson'),
    },
    logging: {
      echo: false,
    },
    database: {
      connectionString: undefined,
      maxConnections: 1,
    },
    backtest: {
      barsPerMonth: 21,
      minBars: 20,
      maxLookbackBars: 252,
      bootstrapSamples: 50,
    },
    performance: {
      acceptanceWindow: 20,
      feedbackWeight: 0.2,
    },
    policy: {
      ...baseConfig.policy,
      ranking: 'weighted-sum',
      maxStalenessMs: 60_000,
    },
  };
}

/** Daily points starting at SERIES_START. */
export const seriesFrom = (prices: number[], start = SERIES_START): PricePoint[] =>
  prices.map((priceUsd, i) => ({
    ts: new Date(Date.parse(start) + i * DAY_MS).toISOString(),
    priceUsd,
  }));

/** `bars` prices compounding at `rate` per bar. */
export const compounding = (bars: number, start: number, rate: number): number[] =>
  Array.from({ length: bars }, (_, i) => start * (1 + rate) ** i);

/** Alternating up/down moves, so the series has volatility but no trend. */
export const zigzag = (bars: number, start: number, swing: number): number[] =>
  Array.from({ length: bars }, (_, i) => (i % 2 === 0 ? start : start * (1 + swing)));

export const profileInput = (id = 'user-1', overrides: Partial<RegisterProfileInput> = {}): RegisterProfileInput => ({
  id,
  name: 'Test User',
  cohort: 'young-professionals',
  wealthTier: 'mass-affluent',
  residenceCountry: 'DE',
  riskProfile: {
    riskTolerance: 'moderate',
    maxDrawdownTolerance: 0.2,
    lossAversionScore: 0,
  },
  preferences: {
    explainableOnly: true,
    reportingFrequency: 'monthly',
  },
  ...overrides,
});

export const goalInput = (userId = 'user-1', overrides: Partial<CreateGoalInput> = {}): CreateGoalInput => ({
  id: 'goal-retire',
  userId,
  description: 'Grow savings for a house deposit',
  targetAmountUsd: 50_000,
  horizonMonths: 1,
  constraints: { excludedSymbols: [] },
  ...overrides,
});

export const signal = (symbol: string, signalType: MarketSignal['signalType'], score: number, confidence = 1): MarketSignal => ({
  symbol,
  signalType,
  label: `${signalType}-${symbol.toLowerCase()}`,
  score,
  confidence,
});

/**
 * Three symbols with 30 daily bars each: AAA compounds at +1%/bar, BBB at
 * +0.5%/bar, CCC zigzags around 50. SPX is the benchmark.
 */
export const marketContextInput = (
  id = 'ctx-1',
  overrides: Partial<RecordMarketContextInput> = {},
): RecordMarketContextInput => ({
  id,
  timestamp: '2026-01-30T00:00:00.000Z',
  benchmarkSymbol: 'SPX',
  symbols: ['AAA', 'BBB', 'CCC'],
  signals: [],
  events: [],
  priceHistory: {
    AAA: seriesFrom(compounding(30, 100, 0.01)),
    BBB: seriesFrom(compounding(30, 20, 0.005)),
    CCC: seriesFrom(zigzag(30, 50, 0.02)),
    SPX: seriesFrom(compounding(30, 4000, 0.002)),
  },
  ...overrides,
});
