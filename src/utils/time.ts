export const isoNow = (): string => new Date().toISOString();

export const dayKey = (ts: Date | string = new Date()): string => {
  const d = typeof ts === 'string' ? new Date(ts) : ts;
  return d.toISOString().slice(0, 10);
};

export const monthKey = (ts: Date | string = new Date()): string => dayKey(ts).slice(0, 7);

export const isValidTimestamp = (value: string): boolean => Number.isFinite(Date.parse(value));

export const ageMs = (ts: string, now: Date = new Date()): number => now.getTime() - Date.parse(ts);
