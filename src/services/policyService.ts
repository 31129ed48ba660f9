import { buildLearningSnapshot } from '../domain/performance/learning.js';
import { RankCandidate, RankedCandidate, RankingPolicy } from '../domain/policy/types.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore, versionKey } from '../infra/storage/recordStore.js';
import { LearningSnapshot, PerformanceMetrics, StrategyStatus, VersionRef } from '../types.js';
import { ageMs, isoNow } from '../utils/time.js';
import { StrategyLifecycleService } from './strategyLifecycleService.js';

export interface StrategyRanking {
  strategyRef: VersionRef;
  family: string;
  status: StrategyStatus;
  score: number;
  components: PerformanceMetrics;
}

export interface RankingResult<T> {
  policy: string;
  snapshotVersion: number;
  ranked: T[];
}

interface StrategyCandidate extends RankCandidate {
  ref: VersionRef;
  status: StrategyStatus;
}

/**
 * Agent-facing read side of the feedback loop. Holds a versioned learning
 * snapshot that is rebuilt after `learning.updated` fires, or on read once it
 * is older than `maxStalenessMs`. Callers always receive a frozen copy.
 */
export class PolicyService {
  private snapshot: LearningSnapshot;
  private version = 0;
  private unsubscribe?: () => void;
  private pending = false;
  private refreshing?: Promise<LearningSnapshot>;

  constructor(
    private readonly records: RecordStore,
    private readonly policy: RankingPolicy,
    private readonly lifecycle: StrategyLifecycleService,
    private readonly maxStalenessMs: number,
    private readonly logger: EventLogger,
  ) {
    this.snapshot = this.build();
  }

  get policyId(): string {
    return this.policy.id;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = eventBus.on('learning.updated', () => {
      this.scheduleRefresh();
    });
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
    if (this.refreshing) {
      await this.refreshing;
    }
  }

  /** Latest snapshot; rebuilt first when older than the staleness bound. */
  current(): LearningSnapshot {
    if (ageMs(this.snapshot.takenAt) > this.maxStalenessMs) {
      this.snapshot = this.build();
    }
    return this.snapshot;
  }

  async refresh(): Promise<LearningSnapshot> {
    this.snapshot = this.build();
    await this.logger.log('info', 'policy.snapshot.refreshed', {
      version: this.snapshot.version,
      families: Object.keys(this.snapshot.families).length,
    });
    return this.snapshot;
  }

  /** Resolves once any scheduled refresh has been applied. */
  async settled(): Promise<LearningSnapshot> {
    while (this.refreshing) {
      await this.refreshing;
    }
    return this.snapshot;
  }

  rank<T extends RankCandidate>(candidates: readonly T[]): RankingResult<RankedCandidate<T>> {
    const snapshot = this.current();
    return {
      policy: this.policy.id,
      snapshotVersion: snapshot.version,
      ranked: this.policy.rank(candidates, snapshot),
    };
  }

  rankStrategies(userId: string, refs: VersionRef[]): RankingResult<StrategyRanking> {
    const seen = new Set<string>();
    const candidates: StrategyCandidate[] = refs.map((ref) => {
      const key = versionKey(ref);
      if (seen.has(key)) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, `Strategy '${key}' is listed twice.`);
      }
      seen.add(key);
      const strategy = this.lifecycle.getStrategy(userId, ref.id, ref.version);
      return {
        key,
        family: strategy.family,
        ref: { id: strategy.id, version: strategy.version },
        status: strategy.status,
      };
    });

    const result = this.rank(candidates);
    return {
      ...result,
      ranked: result.ranked.map(({ candidate, score, components }) => ({
        strategyRef: candidate.ref,
        family: candidate.family,
        status: candidate.status,
        score,
        components,
      })),
    };
  }

  private scheduleRefresh(): void {
    if (this.pending) return;
    this.pending = true;

    const run = new Promise<void>((resolve) => {
      setImmediate(() => resolve());
    })
      .then(() => {
        this.pending = false;
        return this.refresh();
      })
      .catch(async (error: unknown) => {
        this.pending = false;
        await this.logger.log('error', 'policy.snapshot.refresh_failed', { error: String(error) });
        return this.snapshot;
      })
      .finally(() => {
        if (this.refreshing === run) this.refreshing = undefined;
      });
    this.refreshing = run;
  }

  private build(): LearningSnapshot {
    this.version += 1;
    const snapshot = buildLearningSnapshot(this.records.read().learningMetrics, this.version, isoNow());
    return Object.freeze({ ...snapshot, families: Object.freeze({ ...snapshot.families }) });
  }
}
