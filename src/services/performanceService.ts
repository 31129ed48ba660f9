import { v4 as uuid } from 'uuid';
import { MarketOutcome, scorePerformance } from '../domain/performance/scoring.js';
import { applyContribution, learningKey } from '../domain/performance/learning.js';
import { DomainError, ErrorCode, InvalidTransitionError } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore, RecordTx } from '../infra/storage/recordStore.js';
import {
  AppState,
  DecisionOutcome,
  EvaluationKind,
  LearningDimension,
  LearningMetricsRecord,
  PortfolioPerformance,
  UserFeedback,
} from '../types.js';
import { isValidTimestamp, monthKey } from '../utils/time.js';
import { DecisionService } from './decisionService.js';
import { IntakeService } from './intakeService.js';
import { StrategyLifecycleService } from './strategyLifecycleService.js';

export interface EvaluateInput {
  userId: string;
  executionTraceId: string;
  marketOutcome: MarketOutcome;
  feedback?: UserFeedback;
  kind?: EvaluationKind;
}

export interface EvaluateResult {
  performance: PortfolioPerformance;
  learningUpdated: string[];
}

export interface PerformanceSettings {
  acceptanceWindow: number;
  feedbackWeight: number;
}

export interface LearningMetricsFilter {
  dimension?: LearningDimension;
  subject?: string;
  window?: string;
}

interface DecidedOutcome {
  family: string;
  userId: string;
  outcome: DecisionOutcome;
  decidedAt: string;
}

const byAsOf = (a: PortfolioPerformance, b: PortfolioPerformance): number =>
  a.asOf.localeCompare(b.asOf) || a.recordedAt.localeCompare(b.recordedAt);

export class PerformanceService {
  constructor(
    private readonly records: RecordStore,
    private readonly intake: IntakeService,
    private readonly lifecycle: StrategyLifecycleService,
    private readonly decisions: DecisionService,
    private readonly settings: PerformanceSettings,
    private readonly logger: EventLogger,
  ) {}

  /**
   * Scores an execution trace against a realized market outcome and folds the
   * result into the family and cohort learning metrics for the month of
   * `asOf`. Evaluations of one trace may arrive in any order.
   */
  async evaluate(input: EvaluateInput): Promise<EvaluateResult> {
    const kind = input.kind ?? 'interim';
    const traceEntity = { type: 'execution_trace' as const, id: input.executionTraceId };

    if (!isValidTimestamp(input.marketOutcome.asOf)) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, `asOf '${input.marketOutcome.asOf}' is not a valid timestamp.`, {
        entity: traceEntity,
      });
    }
    // Canonical ISO form so asOf values order as strings.
    const asOf = new Date(input.marketOutcome.asOf).toISOString();

    const trace = this.decisions.getTrace(input.userId, input.executionTraceId);
    if (asOf < trace.startedAt) {
      throw new DomainError(
        ErrorCode.InvalidPayload,
        400,
        `asOf ${asOf} is earlier than the start of execution trace '${trace.id}' (${trace.startedAt}).`,
        { entity: traceEntity, asOf, startedAt: trace.startedAt },
      );
    }
    const strategy = this.lifecycle.getStrategy(input.userId, trace.strategyRef.id, trace.strategyRef.version);
    const profile = this.intake.getProfile(input.userId);

    const state = this.records.read();
    const decided = this.decidedOutcomes(state, asOf);

    const scored = scorePerformance({
      executionTraceId: trace.id,
      allocations: strategy.hypothesis.allocations,
      outcome: { ...input.marketOutcome, asOf },
      familyOutcomes: decided.filter((d) => d.family === trace.family).map((d) => d.outcome),
      recentUserOutcomes: decided
        .filter((d) => d.userId === input.userId)
        .slice(-this.settings.acceptanceWindow)
        .map((d) => d.outcome),
      feedback: input.feedback,
      feedbackWeight: this.settings.feedbackWeight,
    });

    const result = await this.records.write((tx) => {
      this.assertAccepts(tx.state, trace.id, asOf, kind);

      const performance: PortfolioPerformance = {
        id: uuid(),
        executionTraceId: trace.id,
        strategyRef: { ...trace.strategyRef },
        family: trace.family,
        userId: input.userId,
        kind,
        metrics: scored.metrics,
        realizedReturn: scored.realizedReturn,
        benchmarkReturn: scored.benchmarkReturn,
        ...(input.feedback ? { feedback: input.feedback } : {}),
        asOf,
        recordedAt: tx.at,
      };
      tx.appendEntry('performance', tx.state.performance, trace.id, performance);
      tx.state.metrics.evaluationsRecorded += 1;

      const window = monthKey(asOf);
      const learningUpdated = [
        this.contribute(tx, 'family', trace.family, window, performance),
        this.contribute(tx, 'cohort', profile.cohort, window, performance),
      ].filter((key): key is string => key !== null);

      return { performance, learningUpdated };
    });

    await this.logger.log('info', 'performance.evaluated', {
      performanceId: result.performance.id,
      executionTraceId: trace.id,
      kind,
      asOf,
      alpha: result.performance.metrics.alpha,
      learningUpdated: result.learningUpdated,
    });
    eventBus.emit('performance.evaluated', {
      performanceId: result.performance.id,
      executionTraceId: trace.id,
      asOf,
      kind,
    });
    if (result.learningUpdated.length > 0) {
      eventBus.emit('learning.updated', {
        keys: result.learningUpdated,
        dimensions: result.learningUpdated.map((key): LearningDimension => (key.startsWith('cohort:') ? 'cohort' : 'family')),
      });
    }

    return result;
  }

  /** Evaluations of a trace in `asOf` order. */
  listPerformance(userId: string, executionTraceId: string): PortfolioPerformance[] {
    this.decisions.getTrace(userId, executionTraceId);
    return [...(this.records.read().performance[executionTraceId] ?? [])].sort(byAsOf);
  }

  listLearningMetrics(filter: LearningMetricsFilter = {}): LearningMetricsRecord[] {
    return Object.values(this.records.read().learningMetrics)
      .filter((r) => !filter.dimension || r.dimension === filter.dimension)
      .filter((r) => !filter.subject || r.subject === filter.subject)
      .filter((r) => !filter.window || r.window === filter.window)
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  private assertAccepts(state: AppState, traceId: string, asOf: string, kind: EvaluationKind): void {
    const entity = { type: 'execution_trace' as const, id: traceId };
    const existing = state.performance[traceId] ?? [];

    if (existing.some((p) => p.asOf === asOf)) {
      throw new DomainError(ErrorCode.DuplicateRecord, 409, `Trace '${traceId}' already has an evaluation as of ${asOf}.`, {
        entity,
        asOf,
      });
    }

    const final = existing.find((p) => p.kind === 'final');
    if (final && kind === 'final') {
      throw new InvalidTransitionError(`Trace '${traceId}' already has a final evaluation as of ${final.asOf}.`, entity, {
        finalAsOf: final.asOf,
      });
    }
    if (final && asOf > final.asOf) {
      throw new InvalidTransitionError(`Trace '${traceId}' was finalized as of ${final.asOf}; ${asOf} is later.`, entity, {
        finalAsOf: final.asOf,
        asOf,
      });
    }
    if (kind === 'final' && existing.some((p) => p.asOf > asOf)) {
      throw new InvalidTransitionError(`Trace '${traceId}' has evaluations later than the final ${asOf}.`, entity, { asOf });
    }
  }

  private contribute(
    tx: RecordTx,
    dimension: LearningDimension,
    subject: string,
    window: string,
    performance: PortfolioPerformance,
  ): string | null {
    const key = learningKey(dimension, subject, window);
    const next = applyContribution(tx.state.learningMetrics[key], {
      dimension,
      subject,
      window,
      executionTraceId: performance.executionTraceId,
      asOf: performance.asOf,
      metrics: performance.metrics,
      at: tx.at,
    });
    if (!next) return null;

    tx.state.learningMetrics[key] = next;
    tx.noteAggregate('learning_metrics', key);
    return key;
  }

  /** Decided outcomes known at `asOf`, oldest first. */
  private decidedOutcomes(state: AppState, asOf: string): DecidedOutcome[] {
    const cutoff = Date.parse(asOf);
    return Object.values(state.decisionOutcomes)
      .filter((o) => Date.parse(o.decidedAt) <= cutoff)
      .flatMap((o) => {
        const decision = state.decisions[o.decisionId];
        return decision
          ? [{ family: decision.family, userId: decision.userId, outcome: o.outcome, decidedAt: o.decidedAt }]
          : [];
      })
      .sort((a, b) => a.decidedAt.localeCompare(b.decidedAt));
  }
}
