import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const createDefaultState = (): AppState => ({
  profiles: {},
  goals: {},
  marketContexts: {},
  strategies: {},
  backtests: {},
  backtestFailures: {},
  decisions: {},
  decisionOutcomes: {},
  executionTraces: {},
  traceEvents: {},
  performance: {},
  learningMetrics: {},
  auditLog: [],
  metrics: {
    startedAt: isoNow(),
    strategiesProposed: 0,
    strategiesForked: 0,
    backtestFailures: 0,
    decisionsOpened: 0,
    decisionsByOutcome: {
      accepted: 0,
      modified: 0,
      rejected: 0,
    },
    evaluationsRecorded: 0,
  },
});
