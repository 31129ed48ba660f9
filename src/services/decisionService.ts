import { v4 as uuid } from 'uuid';
import { assertTransition, toDecisionView } from '../domain/decision/decisionMachine.js';
import {
  DomainError,
  ErrorCode,
  InvalidTransitionError,
  NotFoundError,
  entityOf,
} from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore, RecordTx, versionKey } from '../infra/storage/recordStore.js';
import {
  AppState,
  Decision,
  DecisionOutcome,
  DecisionOutcomeRecord,
  DecisionView,
  ExecutionAction,
  ExecutionTrace,
  ExecutionTraceHeader,
  Strategy,
  TraceEvent,
  VersionRef,
} from '../types.js';
import { StrategyLifecycleService, StrategyModification } from './strategyLifecycleService.js';

export interface DecidePayload {
  reasonCode?: string;
  note?: string;
  modification?: StrategyModification;
}

export interface OpenDecisionResult {
  decision: DecisionView;
  replayed: boolean;
}

export interface DecideResult {
  decision: DecisionView;
  executionTrace: ExecutionTrace | null;
  fork: Strategy | null;
  followUp: DecisionView | null;
}

const DEFAULT_REJECTION_REASON = 'unspecified';

export const toExecutionTrace = (header: ExecutionTraceHeader, events: TraceEvent[]): ExecutionTrace => {
  const completion = events.find((e) => e.kind === 'completion');
  return {
    ...header,
    actions: events,
    completedAt: completion?.at ?? null,
  };
};

export class DecisionService {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly records: RecordStore,
    private readonly lifecycle: StrategyLifecycleService,
    private readonly logger: EventLogger,
  ) {}

  /**
   * Opens the human checkpoint for a proposable strategy version. Opening
   * the same version again returns the Decision already on record.
   */
  async open(userId: string, strategyRef: VersionRef): Promise<OpenDecisionResult> {
    const strategy = this.lifecycle.getStrategy(userId, strategyRef.id, strategyRef.version);
    this.assertProposable(strategy);

    const result = await this.records.write((tx) => {
      const existing = this.findForStrategy(tx.state, strategyRef);
      if (existing) {
        return { decision: existing, replayed: true };
      }
      const decision = this.insertDecision(tx, strategy, null);
      return { decision, replayed: false };
    });

    if (!result.replayed) {
      await this.logger.log('info', 'decision.opened', {
        decisionId: result.decision.id,
        strategyId: strategyRef.id,
        version: strategyRef.version,
      });
    }

    return {
      decision: toDecisionView(result.decision, undefined),
      replayed: result.replayed,
    };
  }

  getDecision(userId: string, decisionId: string): DecisionView {
    const state = this.records.read();
    const decision = state.decisions[decisionId];
    if (!decision || decision.userId !== userId) {
      throw new NotFoundError({ type: 'decision', id: decisionId });
    }
    return toDecisionView(decision, state.decisionOutcomes[decisionId]);
  }

  listForUser(userId: string): DecisionView[] {
    const state = this.records.read();
    return Object.values(state.decisions)
      .filter((d) => d.userId === userId)
      .sort((a, b) => a.proposedAt.localeCompare(b.proposedAt) || a.id.localeCompare(b.id))
      .map((d) => toDecisionView(d, state.decisionOutcomes[d.id]));
  }

  /**
   * Applies the single terminal transition of a Decision. Attempts on the
   * same Decision are serialized: while one is in progress, or once one has
   * been recorded, any other fails with InvalidTransitionError.
   */
  async decide(
    userId: string,
    decisionId: string,
    outcome: DecisionOutcome,
    payload: DecidePayload = {},
  ): Promise<DecideResult> {
    const current = this.getDecision(userId, decisionId);
    assertTransition(decisionId, current.state, outcome);

    if (this.inFlight.has(decisionId)) {
      throw new InvalidTransitionError(
        `Decision '${decisionId}' already has a transition in progress.`,
        { type: 'decision', id: decisionId },
        { attempted: outcome },
      );
    }

    this.inFlight.add(decisionId);
    try {
      const result = await this.applyOutcome(current, outcome, payload);

      await this.logger.log('info', 'decision.decided', {
        decisionId,
        userId,
        outcome,
        strategyId: current.strategyRef.id,
        version: current.strategyRef.version,
        executionTraceId: result.executionTrace?.id ?? null,
        followUpDecisionId: result.followUp?.id ?? null,
      });
      eventBus.emit('decision.decided', { decisionId, userId, outcome });

      return result;
    } finally {
      this.inFlight.delete(decisionId);
    }
  }

  // ─── Execution boundary ──────────────────────────────────────────────

  getTrace(userId: string, traceId: string): ExecutionTrace {
    const state = this.records.read();
    const header = state.executionTraces[traceId];
    if (!header || header.userId !== userId) {
      throw new NotFoundError({ type: 'execution_trace', id: traceId });
    }
    return toExecutionTrace(header, state.traceEvents[traceId] ?? []);
  }

  async appendAction(userId: string, traceId: string, action: ExecutionAction): Promise<TraceEvent> {
    this.getTrace(userId, traceId);

    return this.records.write((tx) => {
      const trace = this.traceIn(tx.state, traceId);
      if (trace.completedAt) {
        throw new InvalidTransitionError(
          `Execution trace '${traceId}' completed at ${trace.completedAt}; no further actions are accepted.`,
          { type: 'execution_trace', id: traceId },
        );
      }
      return tx.appendEntry('trace_event', tx.state.traceEvents, traceId, {
        seq: trace.actions.length + 1,
        kind: 'action',
        at: tx.at,
        action,
      });
    });
  }

  /** Corrects an earlier action by appending a compensating event; the original stays as written. */
  async appendCompensation(
    userId: string,
    traceId: string,
    compensates: number,
    reason: string,
    action?: ExecutionAction,
  ): Promise<TraceEvent> {
    this.getTrace(userId, traceId);

    return this.records.write((tx) => {
      const trace = this.traceIn(tx.state, traceId);
      if (trace.completedAt) {
        throw new InvalidTransitionError(
          `Execution trace '${traceId}' completed at ${trace.completedAt}; no further compensations are accepted.`,
          { type: 'execution_trace', id: traceId },
        );
      }
      const target = trace.actions.find((e) => e.seq === compensates);
      if (!target || target.kind !== 'action') {
        throw new DomainError(ErrorCode.InvalidPayload, 400, `Trace '${traceId}' has no action #${compensates} to compensate.`, {
          entity: { type: 'execution_trace', id: traceId },
        });
      }
      return tx.appendEntry('trace_event', tx.state.traceEvents, traceId, {
        seq: trace.actions.length + 1,
        kind: 'compensation',
        at: tx.at,
        compensates,
        reason,
        ...(action ? { action } : {}),
      });
    });
  }

  async complete(userId: string, traceId: string): Promise<ExecutionTrace> {
    this.getTrace(userId, traceId);

    const trace = await this.records.write((tx) => {
      const current = this.traceIn(tx.state, traceId);
      if (current.completedAt) {
        throw new InvalidTransitionError(
          `Execution trace '${traceId}' is already complete.`,
          { type: 'execution_trace', id: traceId },
        );
      }
      tx.appendEntry('trace_event', tx.state.traceEvents, traceId, {
        seq: current.actions.length + 1,
        kind: 'completion',
        at: tx.at,
      });
      return this.traceIn(tx.state, traceId);
    });

    await this.logger.log('info', 'execution_trace.completed', { executionTraceId: traceId, events: trace.actions.length });
    return trace;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private async applyOutcome(current: DecisionView, outcome: DecisionOutcome, payload: DecidePayload): Promise<DecideResult> {
    if (outcome === 'modified') {
      return this.applyModified(current, payload);
    }

    return this.records.write((tx) => {
      let executionTrace: ExecutionTrace | null = null;
      let executionTraceId: string | undefined;

      if (outcome === 'accepted') {
        const strategy = this.lifecycle.getStrategy(current.userId, current.strategyRef.id, current.strategyRef.version);
        this.assertProposable(strategy);
        const header = this.insertTrace(tx, current);
        executionTraceId = header.id;
        executionTrace = toExecutionTrace(header, []);
      }

      const record = this.seal(tx, current, {
        decisionId: current.id,
        outcome,
        ...(outcome === 'rejected' ? { reasonCode: payload.reasonCode ?? DEFAULT_REJECTION_REASON } : {}),
        ...(payload.note ? { note: payload.note } : {}),
        ...(executionTraceId ? { executionTraceId } : {}),
        decidedAt: tx.at,
      });

      return {
        decision: toDecisionView(current, record),
        executionTrace,
        fork: null,
        followUp: null,
      };
    });
  }

  /**
   * Forks the strategy with the user's modification, then seals the
   * Decision as modified and opens a follow-up Decision on the fork when the
   * fork's backtest made it proposable.
   */
  private async applyModified(current: DecisionView, payload: DecidePayload): Promise<DecideResult> {
    if (!payload.modification) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'A modified decision requires a modification payload.', {
        entity: { type: 'decision', id: current.id },
      });
    }

    const { strategy: fork } = await this.lifecycle.fork({
      userId: current.userId,
      strategyId: current.strategyRef.id,
      fromVersion: current.strategyRef.version,
      modification: payload.modification,
    });

    return this.records.write((tx) => {
      const followUp = fork.status === 'proposable' ? this.insertDecision(tx, fork, current.id) : null;

      const record = this.seal(tx, current, {
        decisionId: current.id,
        outcome: 'modified',
        modifiedStrategyRef: { id: fork.id, version: fork.version },
        ...(followUp ? { followUpDecisionId: followUp.id } : {}),
        ...(payload.note ? { note: payload.note } : {}),
        decidedAt: tx.at,
      });

      return {
        decision: toDecisionView(current, record),
        executionTrace: null,
        fork,
        followUp: followUp ? toDecisionView(followUp, undefined) : null,
      };
    });
  }

  private seal(tx: RecordTx, decision: Decision, record: DecisionOutcomeRecord): DecisionOutcomeRecord {
    tx.insertOnce('decision_outcome', tx.state.decisionOutcomes, decision.id, record, (existing) =>
      new InvalidTransitionError(
        `Decision '${decision.id}' was already decided as ${existing.outcome}.`,
        { type: 'decision', id: decision.id },
        { from: existing.outcome, to: record.outcome },
      ));
    tx.state.metrics.decisionsByOutcome[record.outcome] += 1;
    return record;
  }

  private insertDecision(tx: RecordTx, strategy: Strategy, parentDecisionId: string | null): Decision {
    const decision: Decision = {
      id: uuid(),
      strategyRef: { id: strategy.id, version: strategy.version },
      userId: strategy.userId,
      family: strategy.family,
      parentDecisionId,
      proposedAt: tx.at,
    };
    tx.insertOnce('decision', tx.state.decisions, decision.id, decision, () =>
      new DomainError(ErrorCode.InternalError, 500, `Decision id collision '${decision.id}'.`));
    tx.state.metrics.decisionsOpened += 1;
    return decision;
  }

  private insertTrace(tx: RecordTx, decision: DecisionView): ExecutionTraceHeader {
    const existing = Object.values(tx.state.executionTraces).find((t) => t.decisionId === decision.id);
    if (existing) {
      throw new InvalidTransitionError(
        `Decision '${decision.id}' already owns execution trace '${existing.id}'.`,
        { type: 'decision', id: decision.id },
      );
    }

    const header: ExecutionTraceHeader = {
      id: uuid(),
      decisionId: decision.id,
      originDecisionIds: this.originChain(tx.state, decision),
      strategyRef: { ...decision.strategyRef },
      userId: decision.userId,
      family: decision.family,
      startedAt: tx.at,
    };
    return tx.insertOnce('execution_trace', tx.state.executionTraces, header.id, header, () =>
      new DomainError(ErrorCode.InternalError, 500, `Execution trace id collision '${header.id}'.`));
  }

  /** Root-first chain of modified Decisions that led to this one, ending with it. */
  private originChain(state: AppState, decision: Decision): string[] {
    const chain: string[] = [decision.id];
    let parentId = decision.parentDecisionId;
    while (parentId) {
      chain.unshift(parentId);
      parentId = state.decisions[parentId]?.parentDecisionId ?? null;
    }
    return chain;
  }

  private findForStrategy(state: AppState, ref: VersionRef): Decision | undefined {
    const key = versionKey(ref);
    return Object.values(state.decisions).find((d) => versionKey(d.strategyRef) === key);
  }

  private traceIn(state: AppState, traceId: string): ExecutionTrace {
    const header = state.executionTraces[traceId];
    if (!header) throw new NotFoundError({ type: 'execution_trace', id: traceId });
    return toExecutionTrace(header, state.traceEvents[traceId] ?? []);
  }

  private assertProposable(strategy: Strategy): void {
    if (strategy.status !== 'proposable') {
      throw new InvalidTransitionError(
        `Strategy '${strategy.id}@${strategy.version}' is ${strategy.status}; no decision can be made on it.`,
        entityOf('strategy', { id: strategy.id, version: strategy.version }),
        { status: strategy.status },
      );
    }
  }
}
