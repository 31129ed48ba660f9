import { DecisionOutcome, EvaluationKind, LearningDimension, StrategyStatus } from '../types.js';

export interface EventMap {
  'strategy.proposed': { strategyId: string; version: number; userId: string; status: StrategyStatus };
  'strategy.forked': { strategyId: string; version: number; userId: string; status: StrategyStatus };
  'decision.decided': { decisionId: string; userId: string; outcome: DecisionOutcome };
  'performance.evaluated': { performanceId: string; executionTraceId: string; asOf: string; kind: EvaluationKind };
  'learning.updated': { keys: string[]; dimensions: LearningDimension[] };
}

export type EventType = keyof EventMap;

type Handler<E extends EventType> = (event: E, data: EventMap[E]) => void;

type HandlerTable = { [E in EventType]: Set<Handler<E>> };

const emptyTable = (): HandlerTable => ({
  'strategy.proposed': new Set(),
  'strategy.forked': new Set(),
  'decision.decided': new Set(),
  'performance.evaluated': new Set(),
  'learning.updated': new Set(),
});

class EventBus {
  private handlers: HandlerTable = emptyTable();

  on<E extends EventType>(event: E, handler: Handler<E>): () => void {
    const set: Set<Handler<E>> = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit<E extends EventType>(event: E, data: EventMap[E]): void {
    const set: Set<Handler<E>> = this.handlers[event];
    for (const handler of [...set]) {
      handler(event, data);
    }
  }

  listenerCount(event: EventType): number {
    return this.handlers[event].size;
  }

  clear(): void {
    this.handlers = emptyTable();
  }
}

export const eventBus = new EventBus();
