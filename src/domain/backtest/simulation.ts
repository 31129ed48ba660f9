import { Allocation, PricePoint } from '../../types.js';

export interface AllocationSimulation {
  curve: number[];
  dailyReturns: number[];
  symbolReturns: Record<string, number>;
}

/**
 * Finite, positive price points in timestamp order, with timestamps normalized
 * to ISO-8601. Points after `asOf` are dropped; a repeated timestamp keeps its
 * last point.
 */
export const usablePoints = (points: PricePoint[] | undefined, asOf?: string): PricePoint[] => {
  const cutoff = asOf !== undefined ? Date.parse(asOf) : Number.POSITIVE_INFINITY;
  const byTs = new Map<string, PricePoint>();
  for (const p of points ?? []) {
    const at = Date.parse(p.ts);
    if (!Number.isFinite(at) || at > cutoff) continue;
    if (!Number.isFinite(p.priceUsd) || p.priceUsd <= 0) continue;
    const ts = new Date(at).toISOString();
    byTs.set(ts, { ts, priceUsd: p.priceUsd });
  }
  return [...byTs.values()].sort((a, b) => a.ts.localeCompare(b.ts));
};

/** Timestamps present in every series, ascending. Empty when there are no series. */
export const commonTimestamps = (series: PricePoint[][]): string[] => {
  if (series.length === 0) return [];
  const [first, ...rest] = series;
  const others = rest.map((points) => new Set(points.map((p) => p.ts)));
  return first.map((p) => p.ts).filter((ts) => others.every((set) => set.has(ts)));
};

/**
 * Constant-weight portfolio rebalanced every bar; the unallocated remainder is
 * cash with zero return. Every series must have the same length (>= 2) and the
 * curve starts at 1.
 */
export function simulateAllocations(
  allocations: Allocation[],
  series: Record<string, number[]>,
): AllocationSimulation {
  if (allocations.length === 0) {
    return { curve: [1], dailyReturns: [], symbolReturns: {} };
  }

  const bars = Math.min(...allocations.map((a) => series[a.symbol]?.length ?? 0));

  const curve: number[] = [1];
  const dailyReturns: number[] = [];

  for (let t = 1; t < bars; t++) {
    let r = 0;
    for (const allocation of allocations) {
      const prices = series[allocation.symbol];
      r += allocation.weight * (prices[t] / prices[t - 1] - 1);
    }
    dailyReturns.push(r);
    curve.push(curve[t - 1] * (1 + r));
  }

  const symbolReturns: Record<string, number> = {};
  for (const allocation of allocations) {
    const prices = series[allocation.symbol];
    symbolReturns[allocation.symbol] = prices[bars - 1] / prices[0] - 1;
  }

  return { curve, dailyReturns, symbolReturns };
}
