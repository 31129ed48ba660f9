import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const cfg = loadConfig({});

    expect(cfg.app).toEqual({ name: 'strategy-feedback-engine', env: 'development', port: 8787 });
    expect(cfg.paths.stateFile).toBe(path.join(path.resolve('data'), 'state.json'));
    expect(cfg.logging.echo).toBe(true);
    expect(cfg.database.connectionString).toBeUndefined();
    expect(cfg.backtest).toEqual({ barsPerMonth: 21, minBars: 20, maxLookbackBars: 252, bootstrapSamples: 200 });
    expect(cfg.performance).toEqual({ acceptanceWindow: 20, feedbackWeight: 0.2 });
    expect(cfg.policy.ranking).toBe('weighted-sum');
    expect(cfg.policy.weightsFile).toBe(path.resolve('config/ranking-weights.json'));
  });

  it('coerces numeric and boolean variables', () => {
    const cfg = loadConfig({
      PORT: '9100',
      LOG_ECHO: 'no',
      DATABASE_URL: '  ',
      BACKTEST_MIN_BARS: '10',
      PERFORMANCE_FEEDBACK_WEIGHT: '0.5',
      POLICY_RANKING: 'drawdown-first',
    });

    expect(cfg.app.port).toBe(9100);
    expect(cfg.logging.echo).toBe(false);
    expect(cfg.database.connectionString).toBeUndefined();
    expect(cfg.backtest.minBars).toBe(10);
    expect(cfg.performance.feedbackWeight).toBe(0.5);
    expect(cfg.policy.ranking).toBe('drawdown-first');
  });

  it('rejects inconsistent or out-of-range values', () => {
    expect(() => loadConfig({ BACKTEST_MIN_BARS: '300' })).toThrow('BACKTEST_MIN_BARS must not exceed BACKTEST_MAX_LOOKBACK_BARS');
    expect(() => loadConfig({ PERFORMANCE_FEEDBACK_WEIGHT: '2' })).toThrow();
    expect(() => loadConfig({ LOG_ECHO: 'maybe' })).toThrow();
  });
});
