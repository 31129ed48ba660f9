import path from 'node:path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  APP_NAME: z.string().default('strategy-feedback-engine'),
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8787),
  DATA_DIR: z.string().default('data'),
  STATE_FILE: z.string().optional(),
  LOG_FILE: z.string().optional(),
  LOG_ECHO: booleanFlag.default('true'),
  DATABASE_URL: z.string().optional(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(5),
  BACKTEST_BARS_PER_MONTH: z.coerce.number().int().positive().default(21),
  BACKTEST_MIN_BARS: z.coerce.number().int().min(2).default(20),
  BACKTEST_MAX_LOOKBACK_BARS: z.coerce.number().int().min(2).default(252),
  BACKTEST_BOOTSTRAP_SAMPLES: z.coerce.number().int().min(1).max(10_000).default(200),
  PERFORMANCE_ACCEPTANCE_WINDOW: z.coerce.number().int().positive().default(20),
  PERFORMANCE_FEEDBACK_WEIGHT: z.coerce.number().min(0).max(1).default(0.2),
  POLICY_RANKING: z.string().default('weighted-sum'),
  POLICY_WEIGHTS_FILE: z.string().default(path.join('config', 'ranking-weights.json')),
  POLICY_MAX_STALENESS_MS: z.coerce.number().int().nonnegative().default(30_000),
});

export interface AppConfig {
  app: {
    name: string;
    env: string;
    port: number;
  };
  paths: {
    dataDir: string;
    stateFile: string;
    logFile: string;
  };
  logging: {
    echo: boolean;
  };
  database: {
    connectionString?: string;
    maxConnections: number;
  };
  backtest: {
    barsPerMonth: number;
    minBars: number;
    maxLookbackBars: number;
    bootstrapSamples: number;
  };
  performance: {
    acceptanceWindow: number;
    feedbackWeight: number;
  };
  policy: {
    ranking: string;
    weightsFile: string;
    maxStalenessMs: number;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = EnvSchema.parse(source);

  if (env.BACKTEST_MIN_BARS > env.BACKTEST_MAX_LOOKBACK_BARS) {
    throw new Error('BACKTEST_MIN_BARS must not exceed BACKTEST_MAX_LOOKBACK_BARS');
  }

  const dataDir = path.resolve(env.DATA_DIR);

  return {
    app: {
      name: env.APP_NAME,
      env: env.NODE_ENV,
      port: env.PORT,
    },
    paths: {
      dataDir,
      stateFile: env.STATE_FILE ?? path.join(dataDir, 'state.json'),
      logFile: env.LOG_FILE ?? path.join(dataDir, 'events.ndjson'),
    },
    logging: {
      echo: env.LOG_ECHO,
    },
    database: {
      connectionString: env.DATABASE_URL?.trim() || undefined,
      maxConnections: env.DATABASE_MAX_CONNECTIONS,
    },
    backtest: {
      barsPerMonth: env.BACKTEST_BARS_PER_MONTH,
      minBars: env.BACKTEST_MIN_BARS,
      maxLookbackBars: env.BACKTEST_MAX_LOOKBACK_BARS,
      bootstrapSamples: env.BACKTEST_BOOTSTRAP_SAMPLES,
    },
    performance: {
      acceptanceWindow: env.PERFORMANCE_ACCEPTANCE_WINDOW,
      feedbackWeight: env.PERFORMANCE_FEEDBACK_WEIGHT,
    },
    policy: {
      ranking: env.POLICY_RANKING,
      weightsFile: path.resolve(env.POLICY_WEIGHTS_FILE),
      maxStalenessMs: env.POLICY_MAX_STALENESS_MS,
    },
  };
}

export const config = loadConfig();
