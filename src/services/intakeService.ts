/**
 * Boundary with the intent-extraction and market-data collaborators.
 * Profiles are written once, goals are versioned, and market contexts form an
 * append-only series of snapshots keyed by id and timestamp.
 */

import { DomainError, ErrorCode, NotFoundError } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore, headOf, refOf, versionOf } from '../infra/storage/recordStore.js';
import { Goal, GoalConstraints, MarketContext, MarketContextRef, UserProfile } from '../types.js';
import { isValidTimestamp } from '../utils/time.js';

export type RegisterProfileInput = Omit<UserProfile, 'createdAt'>;

export interface CreateGoalInput {
  id: string;
  userId: string;
  description: string;
  targetAmountUsd: number;
  horizonMonths: number;
  constraints?: Partial<GoalConstraints>;
}

export interface ReviseGoalInput {
  userId: string;
  goalId: string;
  expectedVersion: number;
  description?: string;
  targetAmountUsd?: number;
  horizonMonths?: number;
  constraints?: Partial<GoalConstraints>;
}

export type RecordMarketContextInput = Omit<MarketContext, 'createdAt'>;

export const marketContextKey = (ref: MarketContextRef): string => `${ref.id}@${ref.timestamp}`;

const duplicate = (what: string, id: string): DomainError =>
  new DomainError(ErrorCode.DuplicateRecord, 409, `${what} '${id}' already exists and cannot be overwritten.`);

const normalizeConstraints = (constraints: Partial<GoalConstraints> = {}): GoalConstraints => ({
  ...(constraints.maxDrawdownPct !== undefined ? { maxDrawdownPct: constraints.maxDrawdownPct } : {}),
  ...(constraints.maxSingleAssetWeight !== undefined ? { maxSingleAssetWeight: constraints.maxSingleAssetWeight } : {}),
  excludedSymbols: (constraints.excludedSymbols ?? []).map((s) => s.toUpperCase()),
});

export class IntakeService {
  constructor(
    private readonly records: RecordStore,
    private readonly logger: EventLogger,
  ) {}

  async registerProfile(input: RegisterProfileInput): Promise<UserProfile> {
    const profile = await this.records.write((tx) =>
      tx.insertOnce('profile', tx.state.profiles, input.id, { ...input, createdAt: tx.at }, () =>
        duplicate('Profile', input.id)));

    await this.logger.log('info', 'profile.registered', { userId: profile.id, cohort: profile.cohort });
    return profile;
  }

  getProfile(userId: string): UserProfile {
    const profile = this.records.read().profiles[userId];
    if (!profile) throw new NotFoundError({ type: 'profile', id: userId });
    return profile;
  }

  /** A user may read only their own profile; anything else is reported as missing. */
  getOwnProfile(requesterId: string, profileId: string): UserProfile {
    if (requesterId !== profileId) throw new NotFoundError({ type: 'profile', id: profileId });
    return this.getProfile(profileId);
  }

  async createGoal(input: CreateGoalInput): Promise<Goal> {
    this.getProfile(input.userId);

    const goal = await this.records.write((tx) => {
      if (tx.state.goals[input.id]) throw duplicate('Goal', input.id);

      const record: Goal = {
        id: input.id,
        version: 1,
        userId: input.userId,
        description: input.description,
        targetAmountUsd: input.targetAmountUsd,
        horizonMonths: input.horizonMonths,
        constraints: normalizeConstraints(input.constraints),
        supersedes: null,
        createdAt: tx.at,
      };
      return tx.appendVersion('goal', tx.state.goals, record, 0);
    });

    await this.logger.log('info', 'goal.created', { goalId: goal.id, userId: goal.userId });
    return goal;
  }

  /** New goal version; fails with ConcurrentModificationError when `expectedVersion` is stale. */
  async reviseGoal(input: ReviseGoalInput): Promise<Goal> {
    const current = this.getGoal(input.userId, input.goalId, input.expectedVersion);

    const goal = await this.records.write((tx) => {
      const record: Goal = {
        ...current,
        version: input.expectedVersion + 1,
        description: input.description ?? current.description,
        targetAmountUsd: input.targetAmountUsd ?? current.targetAmountUsd,
        horizonMonths: input.horizonMonths ?? current.horizonMonths,
        constraints: input.constraints
          ? normalizeConstraints({ ...current.constraints, ...input.constraints })
          : current.constraints,
        supersedes: refOf(current),
        createdAt: tx.at,
      };
      return tx.appendVersion('goal', tx.state.goals, record, input.expectedVersion);
    });

    await this.logger.log('info', 'goal.revised', { goalId: goal.id, version: goal.version });
    return goal;
  }

  /** Scoped to the owning user; omitting `version` returns the latest. */
  getGoal(userId: string, goalId: string, version?: number): Goal {
    const goal = versionOf(this.records.read().goals, goalId, version);
    if (!goal || goal.userId !== userId) {
      throw new NotFoundError({ type: 'goal', id: goalId, version });
    }
    return goal;
  }

  listGoals(userId: string): Goal[] {
    const { goals } = this.records.read();
    return Object.keys(goals)
      .map((id) => headOf(goals, id))
      .filter((goal): goal is Goal => goal !== undefined && goal.userId === userId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  async recordMarketContext(input: RecordMarketContextInput): Promise<MarketContext> {
    if (!isValidTimestamp(input.timestamp)) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, `Invalid market context timestamp '${input.timestamp}'.`);
    }

    const timestamp = new Date(input.timestamp).toISOString();
    const key = marketContextKey({ id: input.id, timestamp });
    const symbols = [...new Set(input.symbols.map((s) => s.toUpperCase()))].sort();
    const priceHistory = Object.fromEntries(
      Object.entries(input.priceHistory).map(([symbol, points]) => [symbol.toUpperCase(), points]),
    );

    const context = await this.records.write((tx) =>
      tx.insertOnce(
        'market_context',
        tx.state.marketContexts,
        key,
        {
          ...input,
          timestamp,
          benchmarkSymbol: input.benchmarkSymbol.toUpperCase(),
          symbols,
          signals: input.signals.map((s) => ({ ...s, symbol: s.symbol.toUpperCase() })),
          priceHistory,
          createdAt: tx.at,
        },
        () => duplicate('Market context', key),
      ));

    await this.logger.log('info', 'market_context.recorded', {
      marketContextId: context.id,
      timestamp: context.timestamp,
      symbols: context.symbols.length,
    });
    return context;
  }

  /** One snapshot of the series; omitting `timestamp` returns the latest. */
  getMarketContext(id: string, timestamp?: string): MarketContext {
    let context: MarketContext | undefined;
    if (timestamp === undefined) {
      context = this.listMarketContexts(id).at(-1);
    } else if (isValidTimestamp(timestamp)) {
      context = this.records.read().marketContexts[marketContextKey({ id, timestamp: new Date(timestamp).toISOString() })];
    }
    if (!context) {
      throw new NotFoundError({ type: 'market_context', id, ...(timestamp !== undefined ? { timestamp } : {}) });
    }
    return context;
  }

  /** Snapshots recorded under `id`, oldest first. */
  listMarketContexts(id: string): MarketContext[] {
    return Object.values(this.records.read().marketContexts)
      .filter((context) => context.id === id)
      .sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }
}
