import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContext, buildApp } from '../src/app.js';
import { BacktestEngine } from '../src/domain/backtest/backtestEngine.js';
import { buildTestConfig, createTempDir, goalInput, marketContextInput, profileInput } from './helpers.js';

describe('StrategyLifecycleService', () => {
  let ctx: AppContext;

  beforeEach(async () => {
    const tmpDir = await createTempDir();
    ctx = await buildApp(buildTestConfig(tmpDir));
    const { intake } = ctx.services;
    await intake.registerProfile(profileInput('user-1'));
    await intake.registerProfile(profileInput('user-2'));
    await intake.createGoal(goalInput('user-1'));
    await intake.createGoal(goalInput('user-1', { id: 'goal-long', horizonMonths: 12 }));
    await intake.recordMarketContext(marketContextInput('ctx-1'));
  });

  afterEach(async () => {
    await ctx.app.close();
    await ctx.stateStore.flush();
  });

  const propose = (goalId = 'goal-retire', family?: string) =>
    ctx.services.lifecycle.propose({
      userId: 'user-1',
      goalId,
      marketContextId: 'ctx-1',
      learning: ctx.services.policy.current(),
      ...(family ? { family } : {}),
    });

  it('proposes a backtested version 1 with an explainability trace', async () => {
    const learning = ctx.services.policy.current();
    const { strategy, backtest, failure } = await propose();

    expect(strategy.version).toBe(1);
    expect(strategy.status).toBe('proposable');
    expect(strategy.family).toBe('balanced-core');
    expect(strategy.supersedes).toBeNull();
    expect(strategy.policySnapshotVersion).toBe(learning.version);
    expect(strategy.goalRef).toEqual({ id: 'goal-retire', version: 1 });
    expect(strategy.marketContextRef).toEqual({ id: 'ctx-1', timestamp: '2026-01-30T00:00:00.000Z' });
    expect(failure).toBeNull();
    expect(backtest?.id).toBe(`bt:${strategy.id}@1`);
    expect(strategy.backtestResultId).toBe(backtest?.id);
    expect(strategy.explainability).toEqual(backtest?.explainability);

    const state = ctx.stateStore.snapshot();
    expect(state.metrics.strategiesProposed).toBe(1);
    expect(state.backtests[`${strategy.id}@1`]).toEqual(backtest);
  });

  it('reproduces the stored backtest from the recorded seed', async () => {
    const { strategy, backtest } = await propose();
    const context = ctx.services.intake.getMarketContext('ctx-1');
    const engine = new BacktestEngine(buildTestConfig('/unused').backtest);

    const rerun = await engine.run(strategy.hypothesis, context, {
      strategyRef: { id: strategy.id, version: strategy.version },
      seed: backtest?.seed ?? -1,
    });

    expect(rerun).toEqual(backtest);
  });

  it('honours an explicit family', async () => {
    const { strategy } = await propose('goal-retire', 'defensive-income');
    expect(strategy.family).toBe('defensive-income');

    await expect(propose('goal-retire', 'no-such-family')).rejects.toMatchObject({
      code: 'invalid_payload',
      statusCode: 400,
    });
  });

  it('stores a backtest_failed version when history is too short, and recovers by forking', async () => {
    const first = await propose('goal-long');

    expect(first.strategy.status).toBe('backtest_failed');
    expect(first.strategy.explainability).toBeNull();
    expect(first.strategy.backtestResultId).toBeNull();
    expect(first.backtest).toBeNull();
    expect(first.failure).toMatchObject({
      code: 'data_insufficient',
      details: { symbols: ['AAA', 'BBB', 'CCC'], available: 30, required: 252 },
    });
    expect(ctx.stateStore.snapshot().metrics.backtestFailures).toBe(1);

    const { lifecycle } = ctx.services;
    expect(lifecycle.getFailure('user-1', { id: first.strategy.id, version: 1 })?.code).toBe('data_insufficient');

    const second = await lifecycle.fork({
      userId: 'user-1',
      strategyId: first.strategy.id,
      fromVersion: 1,
      modification: { horizonMonths: 1, note: 'shorter horizon' },
    });

    expect(second.strategy.version).toBe(2);
    expect(second.strategy.status).toBe('proposable');
    expect(second.strategy.supersedes).toEqual({ id: first.strategy.id, version: 1 });
    expect(second.strategy.note).toBe('shorter horizon');
    expect(second.strategy.hypothesis.rationale.at(-1)).toBe('modified_from:v1:shorter horizon');

    // The failed version stays as it was.
    expect(lifecycle.getStrategy('user-1', first.strategy.id, 1)).toEqual(first.strategy);
  });

  it('lets exactly one of two concurrent forks of the same version win', async () => {
    const { strategy } = await propose();
    const { lifecycle } = ctx.services;

    const fork = (weight: number) =>
      lifecycle.fork({
        userId: 'user-1',
        strategyId: strategy.id,
        fromVersion: 1,
        modification: { allocations: [{ symbol: 'AAA', weight }] },
      });

    const results = await Promise.allSettled([fork(0.5), fork(0.6)]);
    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');

    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toMatchObject({
      code: 'concurrent_modification',
      statusCode: 409,
      details: { expectedVersion: 1, actualVersion: 2 },
    });

    expect(lifecycle.lineage('user-1', strategy.id).map((s) => s.version)).toEqual([1, 2]);
  });

  it('rejects a fork from a version that is no longer the head', async () => {
    const { strategy } = await propose();
    const { lifecycle } = ctx.services;

    await lifecycle.fork({ userId: 'user-1', strategyId: strategy.id, fromVersion: 1, modification: { note: 'first' } });

    await expect(
      lifecycle.fork({ userId: 'user-1', strategyId: strategy.id, fromVersion: 1, modification: { note: 'stale' } }),
    ).rejects.toMatchObject({
      code: 'concurrent_modification',
      details: { expectedVersion: 1, actualVersion: 2, entity: { type: 'strategy', id: strategy.id, version: 1 } },
    });
  });

  it('validates modified allocations against the goal', async () => {
    await ctx.services.intake.createGoal(goalInput('user-1', {
      id: 'goal-capped',
      constraints: { excludedSymbols: ['CCC'], maxSingleAssetWeight: 0.5 },
    }));
    const { strategy } = await propose('goal-capped');
    const { lifecycle } = ctx.services;

    const attempt = (allocations: { symbol: string; weight: number }[]) =>
      lifecycle.fork({ userId: 'user-1', strategyId: strategy.id, fromVersion: 1, modification: { allocations } });

    await expect(attempt([{ symbol: 'ccc', weight: 0.2 }])).rejects.toMatchObject({ code: 'invalid_payload' });
    await expect(attempt([{ symbol: 'AAA', weight: 0.6 }])).rejects.toMatchObject({ code: 'invalid_payload' });
    await expect(attempt([{ symbol: 'AAA', weight: 0.5 }, { symbol: 'aaa', weight: 0.1 }])).rejects.toMatchObject({
      code: 'invalid_payload',
    });
    await expect(attempt([{ symbol: 'AAA', weight: 0 }])).rejects.toMatchObject({ code: 'invalid_payload' });
    await expect(attempt([])).rejects.toMatchObject({ code: 'invalid_payload' });

    const ok = await attempt([{ symbol: 'aaa', weight: 0.5 }, { symbol: 'BBB', weight: 0.3 }]);
    expect(ok.strategy.hypothesis.allocations).toEqual([
      { symbol: 'AAA', weight: 0.5 },
      { symbol: 'BBB', weight: 0.3 },
    ]);
    expect(ok.strategy.hypothesis.cashWeight).toBe(0.2);
  });

  it('records an empty backtest_failed version when no family can build a hypothesis', async () => {
    await ctx.services.intake.createGoal(goalInput('user-1', {
      id: 'goal-empty',
      constraints: { excludedSymbols: ['AAA', 'BBB', 'CCC'] },
    }));

    const { strategy, backtest, failure } = await propose('goal-empty');

    expect(strategy.version).toBe(1);
    expect(strategy.status).toBe('backtest_failed');
    expect(strategy.family).toBe('balanced-core');
    expect(strategy.hypothesis).toMatchObject({ allocations: [], cashWeight: 1, rationale: ['no_eligible_symbols'] });
    expect(backtest).toBeNull();
    expect(failure).toMatchObject({
      code: 'data_insufficient',
      details: { symbols: [], available: 0, required: 21 },
    });
    expect(ctx.services.lifecycle.getStrategy('user-1', strategy.id)).toEqual(strategy);
    expect(ctx.services.lifecycle.getFailure('user-1', { id: strategy.id, version: 1 })).toEqual(failure);
  });

  it('records the shortfall when every symbol has a single bar', async () => {
    await ctx.services.intake.recordMarketContext(marketContextInput('ctx-thin', {
      priceHistory: {
        AAA: [{ ts: '2026-01-30T00:00:00.000Z', priceUsd: 100 }],
        BBB: [{ ts: '2026-01-30T00:00:00.000Z', priceUsd: 20 }],
        CCC: [{ ts: '2026-01-30T00:00:00.000Z', priceUsd: 50 }],
      },
    }));

    const { strategy, failure } = await ctx.services.lifecycle.propose({
      userId: 'user-1',
      goalId: 'goal-retire',
      marketContextId: 'ctx-thin',
      learning: ctx.services.policy.current(),
    });

    expect(strategy.status).toBe('backtest_failed');
    expect(strategy.hypothesis.allocations.map((a) => a.symbol)).toEqual(['AAA', 'BBB', 'CCC']);
    expect(failure).toMatchObject({
      strategyRef: { id: strategy.id, version: 1 },
      code: 'data_insufficient',
      details: {
        symbols: ['AAA', 'BBB', 'CCC'],
        barsBySymbol: { AAA: 1, BBB: 1, CCC: 1 },
        available: 1,
        required: 21,
        marketContextId: 'ctx-thin',
      },
    });
    expect(ctx.stateStore.snapshot().metrics.backtestFailures).toBe(1);
  });

  it('records a failure when the single-asset cap rounds every weight away', async () => {
    await ctx.services.intake.createGoal(goalInput('user-1', {
      id: 'goal-tiny-cap',
      constraints: { maxSingleAssetWeight: 0.00001 },
    }));

    const { strategy, failure } = await propose('goal-tiny-cap');

    expect(strategy.status).toBe('backtest_failed');
    expect(strategy.hypothesis.allocations).toEqual([]);
    expect(failure).toMatchObject({ code: 'data_insufficient', details: { symbols: [], available: 0 } });
  });

  it('scopes reads to the owning user', async () => {
    const { strategy } = await propose();
    const { lifecycle } = ctx.services;

    expect(() => lifecycle.getStrategy('user-2', strategy.id)).toThrowError(/not found/);
    expect(() => lifecycle.lineage('user-2', strategy.id)).toThrowError(/not found/);
    expect(lifecycle.listForGoal('user-1', 'goal-retire').map((s) => s.id)).toEqual([strategy.id]);
  });
});
