export const round8 = (v: number): number => Number(v.toFixed(8));

export const clamp = (v: number, min: number, max: number): number => Math.min(max, Math.max(min, v));

export const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

export const stdDev = (values: number[]): number => {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
};

/** Worst peak-to-trough loss of a value curve, as a positive fraction. */
export const maxDrawdown = (curve: number[]): number => {
  let peak = curve[0] ?? 0;
  let worst = 0;
  for (const value of curve) {
    if (value > peak) peak = value;
    if (peak > 0) {
      const dd = (peak - value) / peak;
      if (dd > worst) worst = dd;
    }
  }
  return worst;
};
