import fs from 'node:fs/promises';
import { z } from 'zod';
import { DEFAULT_RANKING_WEIGHTS, RankingWeights } from '../domain/policy/types.js';

const metricsSchema = z.object({
  alpha: z.number().finite(),
  drawdown: z.number().finite(),
  trustScore: z.number().finite(),
  acceptanceRate: z.number().finite(),
});

const rankingWeightsSchema = z.object({
  version: z.string().min(1),
  weights: metricsSchema,
  priors: metricsSchema.default(DEFAULT_RANKING_WEIGHTS.priors),
});

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads the declared ranking weights. A missing file falls back to the
 * built-in weights; a file that is present but malformed is an error.
 */
export async function loadRankingWeights(filePath: string): Promise<RankingWeights> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return DEFAULT_RANKING_WEIGHTS;
    throw error;
  }

  const parsed = rankingWeightsSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid ranking weights in ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
