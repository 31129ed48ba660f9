import Fastify from 'fastify';
import { registerRoutes } from './api/routes.js';
import { AppConfig } from './config.js';
import { BacktestEngine } from './domain/backtest/backtestEngine.js';
import { createRankingPolicy } from './domain/policy/policyRegistry.js';
import { StrategyRegistry } from './domain/strategy/strategyRegistry.js';
import { Database, PoolFactory } from './infra/database/db.js';
import { EventLogger } from './infra/logger.js';
import { RecordStore } from './infra/storage/recordStore.js';
import { StateStore } from './infra/storage/stateStore.js';
import { DecisionService } from './services/decisionService.js';
import { IntakeService } from './services/intakeService.js';
import { PerformanceService } from './services/performanceService.js';
import { PolicyService } from './services/policyService.js';
import { loadRankingWeights } from './services/rankingWeights.js';
import { StrategyLifecycleService } from './services/strategyLifecycleService.js';

export interface AppServices {
  intake: IntakeService;
  lifecycle: StrategyLifecycleService;
  decisions: DecisionService;
  performance: PerformanceService;
  policy: PolicyService;
}

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  records: RecordStore;
  logger: EventLogger;
  database: Database;
  services: AppServices;
}

export interface BuildOptions {
  poolFactory?: PoolFactory;
}

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  const stateStore = new StateStore(config.paths.stateFile);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile, config.logging.echo);
  await logger.init();

  const records = new RecordStore(stateStore, logger);

  const database = new Database(config.database, logger, options.poolFactory);
  if (await database.init()) {
    records.attachSink(database);
  }

  const weights = await loadRankingWeights(config.policy.weightsFile);
  const rankingPolicy = createRankingPolicy(config.policy.ranking, weights);

  const intake = new IntakeService(records, logger);
  const lifecycle = new StrategyLifecycleService(
    records,
    intake,
    new StrategyRegistry(),
    new BacktestEngine(config.backtest),
    rankingPolicy,
    logger,
  );
  const decisions = new DecisionService(records, lifecycle, logger);
  const performance = new PerformanceService(records, intake, lifecycle, decisions, config.performance, logger);
  const policy = new PolicyService(records, rankingPolicy, lifecycle, config.policy.maxStalenessMs, logger);
  policy.start();

  app.addHook('onClose', async () => {
    await policy.stop();
    await database.close();
  });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    records,
    logger,
    intake,
    lifecycle,
    decisions,
    performance,
    policy,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      policySnapshotVersion: policy.current().version,
      processPid: process.pid,
    }),
  });

  await logger.log('info', 'app.ready', {
    rankingPolicy: rankingPolicy.id,
    weightsVersion: weights.version,
    auditMirror: database.isAvailable(),
  });

  return {
    app,
    stateStore,
    records,
    logger,
    database,
    services: { intake, lifecycle, decisions, performance, policy },
  };
}
