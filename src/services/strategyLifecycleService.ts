import { v4 as uuid } from 'uuid';
import { BacktestEngine } from '../domain/backtest/backtestEngine.js';
import { RankingPolicy } from '../domain/policy/types.js';
import { toHypothesis } from '../domain/strategy/allocation.js';
import { StrategyRegistry } from '../domain/strategy/strategyRegistry.js';
import { StrategyFamilyPlugin } from '../domain/strategy/types.js';
import {
  ConcurrentModificationError,
  DataInsufficientError,
  DomainError,
  ErrorCode,
  NotFoundError,
  entityOf,
} from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore, headOf, refOf, versionKey, versionOf } from '../infra/storage/recordStore.js';
import {
  Allocation,
  BacktestFailure,
  BacktestResult,
  Goal,
  HypothesisBody,
  LearningSnapshot,
  MarketContext,
  Strategy,
  VersionRef,
} from '../types.js';
import { seedFromKey } from '../utils/hash.js';
import { IntakeService } from './intakeService.js';

export interface ProposeInput {
  userId: string;
  goalId: string;
  goalVersion?: number;
  marketContextId: string;
  /** Snapshot of the market context series; the latest when omitted. */
  marketContextTimestamp?: string;
  /** Learning snapshot the caller read from the policy hook; never a live reference. */
  learning: LearningSnapshot;
  /** Restrict the proposal to one strategy family. */
  family?: string;
}

export interface StrategyModification {
  allocations?: Allocation[];
  horizonMonths?: number;
  marketContextId?: string;
  marketContextTimestamp?: string;
  note?: string;
}

export interface ForkInput {
  userId: string;
  strategyId: string;
  fromVersion: number;
  modification: StrategyModification;
}

export interface LifecycleResult {
  strategy: Strategy;
  backtest: BacktestResult | null;
  failure: BacktestFailure | null;
}

type StrategyDraft = Omit<Strategy, 'explainability' | 'backtestResultId' | 'status' | 'createdAt'>;

const WEIGHT_TOLERANCE = 1e-9;

export class StrategyLifecycleService {
  constructor(
    private readonly records: RecordStore,
    private readonly intake: IntakeService,
    private readonly registry: StrategyRegistry,
    private readonly engine: BacktestEngine,
    private readonly policy: RankingPolicy,
    private readonly logger: EventLogger,
  ) {}

  /**
   * Creates version 1 of a new strategy: builds one hypothesis per family,
   * keeps the one the ranking policy puts first, and backtests it.
   */
  async propose(input: ProposeInput): Promise<LifecycleResult> {
    const profile = this.intake.getProfile(input.userId);
    const goal = this.intake.getGoal(input.userId, input.goalId, input.goalVersion);
    const context = this.intake.getMarketContext(input.marketContextId, input.marketContextTimestamp);

    const families = input.family ? [this.requireFamily(input.family)] : this.registry.list();
    const hypothesisInput = { profile, goal, context };
    const candidates = families
      .map((plugin) => ({ key: plugin.id, family: plugin.id, hypothesis: plugin.build(hypothesisInput) }))
      .filter((c): c is { key: string; family: string; hypothesis: HypothesisBody } => c.hypothesis !== null);

    // No family found anything to hold. Version 1 is still written, empty, and
    // its backtest failure recorded.
    const top = candidates.length > 0
      ? this.policy.rank(candidates, input.learning)[0].candidate
      : {
        family: families[0].id,
        hypothesis: toHypothesis(families[0].id, hypothesisInput, [], ['no_eligible_symbols']),
      };

    const draft: StrategyDraft = {
      id: uuid(),
      version: 1,
      userId: input.userId,
      goalRef: refOf(goal),
      marketContextRef: { id: context.id, timestamp: context.timestamp },
      family: top.family,
      hypothesis: top.hypothesis,
      supersedes: null,
      policySnapshotVersion: input.learning.version,
    };

    const result = await this.backtestAndCommit(draft, context, 0);

    await this.logger.log(result.failure ? 'warn' : 'info', 'strategy.proposed', {
      strategyId: result.strategy.id,
      version: result.strategy.version,
      userId: input.userId,
      family: result.strategy.family,
      status: result.strategy.status,
      policy: this.policy.id,
      policySnapshotVersion: input.learning.version,
      candidates: candidates.length,
    });
    eventBus.emit('strategy.proposed', {
      strategyId: result.strategy.id,
      version: result.strategy.version,
      userId: input.userId,
      status: result.strategy.status,
    });

    return result;
  }

  /**
   * Writes version N+1 superseding `fromVersion`. Fails with
   * ConcurrentModificationError when `fromVersion` is no longer the head,
   * including when another fork of the same version commits first.
   */
  async fork(input: ForkInput): Promise<LifecycleResult> {
    const state = this.records.read();
    const current = this.getStrategy(input.userId, input.strategyId, input.fromVersion);
    const head = headOf(state.strategies, input.strategyId);

    if (head && head.version !== input.fromVersion) {
      throw new ConcurrentModificationError(entityOf('strategy', refOf(current)), input.fromVersion, head.version);
    }

    const { marketContextId, marketContextTimestamp } = input.modification;
    const context = marketContextId !== undefined
      ? this.intake.getMarketContext(marketContextId, marketContextTimestamp)
      : this.intake.getMarketContext(current.marketContextRef.id, current.marketContextRef.timestamp);
    const goal = this.intake.getGoal(input.userId, current.goalRef.id, current.goalRef.version);
    const hypothesis = this.applyModification(current, goal, input.modification);

    const draft: StrategyDraft = {
      id: current.id,
      version: current.version + 1,
      userId: current.userId,
      goalRef: { ...current.goalRef },
      marketContextRef: { id: context.id, timestamp: context.timestamp },
      family: current.family,
      hypothesis,
      supersedes: refOf(current),
      policySnapshotVersion: current.policySnapshotVersion,
      ...(input.modification.note ? { note: input.modification.note } : {}),
    };

    const result = await this.backtestAndCommit(draft, context, input.fromVersion);

    await this.logger.log(result.failure ? 'warn' : 'info', 'strategy.forked', {
      strategyId: result.strategy.id,
      version: result.strategy.version,
      supersedes: versionKey(refOf(current)),
      status: result.strategy.status,
    });
    eventBus.emit('strategy.forked', {
      strategyId: result.strategy.id,
      version: result.strategy.version,
      userId: input.userId,
      status: result.strategy.status,
    });

    return result;
  }

  /** Scoped to the owning user; omitting `version` returns the head. */
  getStrategy(userId: string, strategyId: string, version?: number): Strategy {
    const strategy = versionOf(this.records.read().strategies, strategyId, version);
    if (!strategy || strategy.userId !== userId) {
      throw new NotFoundError({ type: 'strategy', id: strategyId, version });
    }
    return strategy;
  }

  getBacktest(userId: string, ref: VersionRef): BacktestResult {
    this.getStrategy(userId, ref.id, ref.version);
    const backtest = this.records.read().backtests[versionKey(ref)];
    if (!backtest) throw new NotFoundError(entityOf('backtest', ref));
    return backtest;
  }

  getFailure(userId: string, ref: VersionRef): BacktestFailure | undefined {
    this.getStrategy(userId, ref.id, ref.version);
    return this.records.read().backtestFailures[versionKey(ref)];
  }

  /** Every version of a strategy, oldest first. */
  lineage(userId: string, strategyId: string): Strategy[] {
    const chain = this.records.read().strategies[strategyId];
    if (!chain || chain[0].userId !== userId) {
      throw new NotFoundError({ type: 'strategy', id: strategyId });
    }
    return chain;
  }

  listForGoal(userId: string, goalId: string): Strategy[] {
    return Object.values(this.records.read().strategies)
      .flat()
      .filter((s) => s.userId === userId && s.goalRef.id === goalId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id) || a.version - b.version);
  }

  private requireFamily(id: string): StrategyFamilyPlugin {
    const plugin = this.registry.get(id);
    if (!plugin) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, `Unknown strategy family '${id}'.`, {
        families: this.registry.list().map((f) => f.id),
      });
    }
    return plugin;
  }

  private applyModification(current: Strategy, goal: Goal, modification: StrategyModification): HypothesisBody {
    const entity = entityOf('strategy', refOf(current));
    const base = current.hypothesis;
    let allocations = base.allocations;

    if (modification.allocations) {
      const excluded = new Set(goal.constraints.excludedSymbols);
      const seen = new Set<string>();
      allocations = modification.allocations.map((a) => ({ symbol: a.symbol.toUpperCase(), weight: a.weight }));

      for (const allocation of allocations) {
        if (seen.has(allocation.symbol)) {
          throw new DomainError(ErrorCode.InvalidPayload, 400, `Duplicate allocation for ${allocation.symbol}.`, { entity });
        }
        seen.add(allocation.symbol);
        if (!Number.isFinite(allocation.weight) || allocation.weight <= 0) {
          throw new DomainError(ErrorCode.InvalidPayload, 400, `Weight for ${allocation.symbol} must be positive.`, { entity });
        }
        if (excluded.has(allocation.symbol)) {
          throw new DomainError(ErrorCode.InvalidPayload, 400, `${allocation.symbol} is excluded by goal '${goal.id}'.`, { entity });
        }
        const cap = goal.constraints.maxSingleAssetWeight;
        if (cap !== undefined && allocation.weight > cap + WEIGHT_TOLERANCE) {
          throw new DomainError(ErrorCode.InvalidPayload, 400, `Weight for ${allocation.symbol} exceeds the goal cap of ${cap}.`, { entity });
        }
      }

      if (allocations.length === 0) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, 'A modification must keep at least one allocation.', { entity });
      }
    }

    const invested = allocations.reduce((sum, a) => sum + a.weight, 0);
    if (invested > 1 + WEIGHT_TOLERANCE) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, `Allocation weights sum to ${invested}, above 1.`, { entity });
    }

    return {
      family: base.family,
      allocations,
      cashWeight: Number(Math.max(0, 1 - invested).toFixed(4)),
      horizonMonths: modification.horizonMonths ?? base.horizonMonths,
      rationale: [...base.rationale, `modified_from:v${current.version}${modification.note ? `:${modification.note}` : ''}`],
    };
  }

  /**
   * Runs the backtest outside any write, then commits the version together
   * with its BacktestResult (status proposable) or its BacktestFailure
   * (status backtest_failed) in one compare-and-set write.
   */
  private async backtestAndCommit(
    draft: StrategyDraft,
    context: MarketContext,
    expectedHead: number,
  ): Promise<LifecycleResult> {
    const ref = refOf(draft);
    const outcome = await this.engine
      .run(draft.hypothesis, context, { strategyRef: ref, seed: seedFromKey(versionKey(ref)) })
      .then((result) => ({ backtest: result, insufficient: null }))
      .catch((error: unknown) => {
        if (!(error instanceof DataInsufficientError)) throw error;
        return { backtest: null, insufficient: error };
      });
    const { backtest, insufficient } = outcome;

    const key = versionKey(ref);
    const conflict = () => new DomainError(ErrorCode.InternalError, 500, `Backtest record for '${key}' already exists.`);

    const result = await this.records.write((tx) => {
      const strategy: Strategy = {
        ...draft,
        explainability: backtest?.explainability ?? null,
        backtestResultId: backtest?.id ?? null,
        status: backtest ? 'proposable' : 'backtest_failed',
        createdAt: tx.at,
      };

      tx.appendVersion('strategy', tx.state.strategies, strategy, expectedHead);

      let failure: BacktestFailure | null = null;
      if (backtest) {
        tx.insertOnce('backtest', tx.state.backtests, key, backtest, conflict);
      } else if (insufficient) {
        failure = {
          strategyRef: ref,
          code: insufficient.code,
          message: insufficient.message,
          details: insufficient.details ?? {},
          recordedAt: tx.at,
        };
        tx.insertOnce('backtest_failure', tx.state.backtestFailures, key, failure, conflict);
        tx.state.metrics.backtestFailures += 1;
      }

      if (expectedHead === 0) {
        tx.state.metrics.strategiesProposed += 1;
      } else {
        tx.state.metrics.strategiesForked += 1;
      }

      return { strategy, backtest, failure };
    });

    if (result.failure) {
      await this.logger.log('warn', 'strategy.backtest_failed', {
        strategyId: key,
        code: result.failure.code,
        details: result.failure.details,
      });
    }
    return result;
  }
}
