import { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { EventLogger } from '../infra/logger.js';
import { RecordStore } from '../infra/storage/recordStore.js';
import { DecisionService } from '../services/decisionService.js';
import { IntakeService } from '../services/intakeService.js';
import { PerformanceService } from '../services/performanceService.js';
import { PolicyService } from '../services/policyService.js';
import { StrategyLifecycleService } from '../services/strategyLifecycleService.js';
import { RuntimeMetrics } from '../types.js';

interface RouteDeps {
  config: AppConfig;
  records: RecordStore;
  logger: EventLogger;
  intake: IntakeService;
  lifecycle: StrategyLifecycleService;
  decisions: DecisionService;
  performance: PerformanceService;
  policy: PolicyService;
  getRuntimeMetrics: () => RuntimeMetrics;
}

type IdParams = { Params: { id: string } };

const symbolSchema = z.string().min(1).max(20);
const timestampSchema = z.string().refine((value) => Number.isFinite(Date.parse(value)), {
  message: 'must be an ISO-8601 timestamp',
});
const unitSchema = z.number().min(0).max(1);

const registerProfileSchema = z.object({
  id: z.string().min(1).max(120),
  name: z.string().min(1).max(120),
  cohort: z.string().min(1).default('general'),
  wealthTier: z.string().min(1).default('unspecified'),
  residenceCountry: z.string().min(2).default('unspecified'),
  riskProfile: z.object({
    riskTolerance: z.enum(['conservative', 'moderate', 'aggressive']),
    maxDrawdownTolerance: unitSchema,
    lossAversionScore: unitSchema,
  }),
  preferences: z.object({
    explainableOnly: z.boolean().default(false),
    reportingFrequency: z.enum(['daily', 'weekly', 'monthly']).default('monthly'),
  }).default({}),
});

const constraintsSchema = z.object({
  maxDrawdownPct: unitSchema.optional(),
  maxSingleAssetWeight: z.number().positive().max(1).optional(),
  excludedSymbols: z.array(symbolSchema).optional(),
});

const createGoalSchema = z.object({
  id: z.string().min(1).max(120),
  description: z.string().min(1).max(500),
  targetAmountUsd: z.number().positive(),
  horizonMonths: z.number().int().positive().max(600),
  constraints: constraintsSchema.optional(),
});

const reviseGoalSchema = z.object({
  expectedVersion: z.number().int().positive(),
  description: z.string().min(1).max(500).optional(),
  targetAmountUsd: z.number().positive().optional(),
  horizonMonths: z.number().int().positive().max(600).optional(),
  constraints: constraintsSchema.optional(),
});

const marketContextSchema = z.object({
  id: z.string().min(1).max(120),
  timestamp: timestampSchema,
  benchmarkSymbol: symbolSchema,
  symbols: z.array(symbolSchema).min(1),
  signals: z.array(z.object({
    symbol: symbolSchema,
    signalType: z.enum(['trend', 'opportunity', 'risk', 'alert']),
    label: z.string().min(1),
    score: z.number().min(-1).max(1),
    confidence: unitSchema,
  })).default([]),
  events: z.array(z.object({
    eventType: z.string().min(1),
    description: z.string(),
    timestamp: timestampSchema,
  })).default([]),
  priceHistory: z.record(symbolSchema, z.array(z.object({
    ts: timestampSchema,
    priceUsd: z.number(),
  }))),
});

const proposeSchema = z.object({
  goalId: z.string().min(1),
  goalVersion: z.number().int().positive().optional(),
  marketContextId: z.string().min(1),
  marketContextTimestamp: timestampSchema.optional(),
  family: z.string().min(1).optional(),
});

const modificationSchema = z.object({
  allocations: z.array(z.object({ symbol: symbolSchema, weight: z.number() })).optional(),
  horizonMonths: z.number().int().positive().max(600).optional(),
  marketContextId: z.string().min(1).optional(),
  marketContextTimestamp: timestampSchema.optional(),
  note: z.string().max(500).optional(),
});

const forkSchema = z.object({
  fromVersion: z.number().int().positive(),
  modification: modificationSchema,
});

const versionRefSchema = z.object({
  id: z.string().min(1),
  version: z.number().int().positive(),
});

const openDecisionSchema = z.object({
  strategyId: z.string().min(1),
  version: z.number().int().positive(),
});

const decideSchema = z.object({
  outcome: z.enum(['accepted', 'modified', 'rejected']),
  reasonCode: z.string().min(1).max(120).optional(),
  note: z.string().max(500).optional(),
  modification: modificationSchema.optional(),
});

const actionSchema = z.object({
  type: z.enum(['buy', 'sell', 'rebalance', 'note']),
  symbol: symbolSchema.optional(),
  quantity: z.number().positive().optional(),
  priceUsd: z.number().positive().optional(),
  notionalUsd: z.number().positive().optional(),
  externalRef: z.string().max(200).optional(),
});

const compensationSchema = z.object({
  compensates: z.number().int().positive(),
  reason: z.string().min(1).max(500),
  action: actionSchema.optional(),
});

const evaluationSchema = z.object({
  executionTraceId: z.string().min(1),
  kind: z.enum(['interim', 'final']).default('interim'),
  marketOutcome: z.object({
    asOf: timestampSchema,
    prices: z.record(symbolSchema, z.array(z.number())),
    benchmark: z.array(z.number()),
  }),
  feedback: z.object({
    rating: z.number().int().min(1).max(5),
    comment: z.string().max(1000).optional(),
  }).optional(),
});

const learningQuerySchema = z.object({
  dimension: z.enum(['family', 'cohort']).optional(),
  subject: z.string().min(1).optional(),
  window: z.string().regex(/^\d{4}-\d{2}$/).optional(),
});

const versionQuerySchema = z.object({
  version: z.coerce.number().int().positive().optional(),
});

const rankSchema = z.object({
  strategies: z.array(versionRefSchema).min(1).max(100),
});

const invalidPayload = (reply: FastifyReply, error: z.ZodError) =>
  reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Request payload failed validation.', {
    issues: error.flatten(),
  }));

function requireUserId(request: FastifyRequest): string {
  const header = request.headers['x-user-id'];
  const userId = Array.isArray(header) ? header[0] : header;
  if (!userId || userId.trim() === '') {
    throw new DomainError(ErrorCode.MissingUserId, 400, 'The x-user-id header is required.');
  }
  return userId.trim();
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.setErrorHandler(async (error: FastifyError | DomainError, request, reply) => {
    if (error instanceof DomainError) {
      return reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    }

    // Fastify's own 4xx errors, e.g. a malformed JSON body.
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send(toErrorEnvelope(ErrorCode.InvalidPayload, error.message));
    }

    await deps.logger.log('error', 'http.unhandled_error', {
      method: request.method,
      url: request.url,
      error: String(error),
    });
    return reply.code(500).send(toErrorEnvelope(ErrorCode.InternalError, 'Unexpected server error.'));
  });

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
    rankingPolicy: deps.policy.policyId,
  }));

  // ─── Intake ──────────────────────────────────────────────────────────

  app.post('/profiles', async (request, reply) => {
    const parse = registerProfileSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const profile = await deps.intake.registerProfile(parse.data);
    return reply.code(201).send({ profile });
  });

  app.get<IdParams>('/profiles/:id', async (request) => ({
    profile: deps.intake.getOwnProfile(requireUserId(request), request.params.id),
  }));

  app.post('/goals', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = createGoalSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const goal = await deps.intake.createGoal({ ...parse.data, userId });
    return reply.code(201).send({ goal });
  });

  app.get('/goals', async (request) => ({
    goals: deps.intake.listGoals(requireUserId(request)),
  }));

  app.get<IdParams>('/goals/:id', async (request, reply) => {
    const userId = requireUserId(request);
    const query = versionQuerySchema.safeParse(request.query);
    if (!query.success) return invalidPayload(reply, query.error);

    return { goal: deps.intake.getGoal(userId, request.params.id, query.data.version) };
  });

  app.post<IdParams>('/goals/:id/revisions', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = reviseGoalSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const goal = await deps.intake.reviseGoal({ ...parse.data, userId, goalId: request.params.id });
    return reply.code(201).send({ goal });
  });

  app.post('/market-contexts', async (request, reply) => {
    const parse = marketContextSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const marketContext = await deps.intake.recordMarketContext(parse.data);
    return reply.code(201).send({
      marketContext: {
        id: marketContext.id,
        timestamp: marketContext.timestamp,
        benchmarkSymbol: marketContext.benchmarkSymbol,
        symbols: marketContext.symbols,
        signals: marketContext.signals.length,
        events: marketContext.events.length,
      },
    });
  });

  // ─── Strategies ──────────────────────────────────────────────────────

  app.post('/strategies', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = proposeSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const learning = deps.policy.current();
    const result = await deps.lifecycle.propose({ ...parse.data, userId, learning });
    const opened = result.strategy.status === 'proposable'
      ? await deps.decisions.open(userId, { id: result.strategy.id, version: result.strategy.version })
      : null;

    return reply.code(201).send({ ...result, decision: opened?.decision ?? null });
  });

  app.get<IdParams>('/strategies/:id', async (request, reply) => {
    const userId = requireUserId(request);
    const query = versionQuerySchema.safeParse(request.query);
    if (!query.success) return invalidPayload(reply, query.error);

    const strategy = deps.lifecycle.getStrategy(userId, request.params.id, query.data.version);
    const ref = { id: strategy.id, version: strategy.version };
    return {
      strategy,
      backtest: strategy.status === 'proposable' ? deps.lifecycle.getBacktest(userId, ref) : null,
      failure: deps.lifecycle.getFailure(userId, ref) ?? null,
    };
  });

  app.get<IdParams>('/strategies/:id/lineage', async (request) => ({
    versions: deps.lifecycle.lineage(requireUserId(request), request.params.id),
  }));

  app.post<IdParams>('/strategies/:id/fork', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = forkSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const result = await deps.lifecycle.fork({ ...parse.data, userId, strategyId: request.params.id });
    return reply.code(201).send(result);
  });

  // ─── Decisions ───────────────────────────────────────────────────────

  app.post('/decisions', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = openDecisionSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const result = await deps.decisions.open(userId, { id: parse.data.strategyId, version: parse.data.version });
    return reply.code(result.replayed ? 200 : 201).send(result);
  });

  app.get('/decisions', async (request) => ({
    decisions: deps.decisions.listForUser(requireUserId(request)),
  }));

  app.get<IdParams>('/decisions/:id', async (request) => ({
    decision: deps.decisions.getDecision(requireUserId(request), request.params.id),
  }));

  app.post<IdParams>('/decisions/:id/decide', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = decideSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const { outcome, ...payload } = parse.data;
    return deps.decisions.decide(userId, request.params.id, outcome, payload);
  });

  // ─── Execution traces ────────────────────────────────────────────────

  app.get<IdParams>('/execution-traces/:id', async (request) => ({
    executionTrace: deps.decisions.getTrace(requireUserId(request), request.params.id),
  }));

  app.post<IdParams>('/execution-traces/:id/actions', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = actionSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const event = await deps.decisions.appendAction(userId, request.params.id, parse.data);
    return reply.code(201).send({ event });
  });

  app.post<IdParams>('/execution-traces/:id/compensations', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = compensationSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const event = await deps.decisions.appendCompensation(
      userId,
      request.params.id,
      parse.data.compensates,
      parse.data.reason,
      parse.data.action,
    );
    return reply.code(201).send({ event });
  });

  app.post<IdParams>('/execution-traces/:id/complete', async (request) => ({
    executionTrace: await deps.decisions.complete(requireUserId(request), request.params.id),
  }));

  app.get<IdParams>('/execution-traces/:id/performance', async (request) => ({
    performance: deps.performance.listPerformance(requireUserId(request), request.params.id),
  }));

  // ─── Feedback loop ───────────────────────────────────────────────────

  app.post('/evaluations', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = evaluationSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    const result = await deps.performance.evaluate({ ...parse.data, userId });
    return reply.code(201).send(result);
  });

  app.get('/learning-metrics', async (request, reply) => {
    const parse = learningQuerySchema.safeParse(request.query);
    if (!parse.success) return invalidPayload(reply, parse.error);

    return { learningMetrics: deps.performance.listLearningMetrics(parse.data) };
  });

  app.get('/policy/snapshot', async () => ({
    policy: deps.policy.policyId,
    snapshot: deps.policy.current(),
  }));

  app.post('/rank', async (request, reply) => {
    const userId = requireUserId(request);
    const parse = rankSchema.safeParse(request.body);
    if (!parse.success) return invalidPayload(reply, parse.error);

    return deps.policy.rankStrategies(userId, parse.data.strategies);
  });

  // ─── Operations ──────────────────────────────────────────────────────

  app.get('/health', async () => {
    const state = deps.records.read();
    const runtime = deps.getRuntimeMetrics();

    return {
      status: 'ok',
      env: deps.config.app.env,
      uptimeSeconds: runtime.uptimeSeconds,
      processPid: runtime.processPid,
      rankingPolicy: deps.policy.policyId,
      policySnapshotVersion: runtime.policySnapshotVersion,
      stateSummary: {
        profiles: Object.keys(state.profiles).length,
        strategies: Object.keys(state.strategies).length,
        decisions: Object.keys(state.decisions).length,
        executionTraces: Object.keys(state.executionTraces).length,
      },
    };
  });

  app.get('/metrics', async () => ({
    runtime: deps.getRuntimeMetrics(),
    metrics: deps.records.read().metrics,
  }));
}
