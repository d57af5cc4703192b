const UNIT_MS: Record<string, number> = {
  ms: 1,
  millisecond: 1,
  s: 1_000,
  sec: 1_000,
  second: 1_000,
  m: 60_000,
  min: 60_000,
  minute: 60_000,
  h: 3_600_000,
  hour: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  w: 604_800_000,
  week: 604_800_000,
  y: 31_536_000_000,
  year: 31_536_000_000,
};

const DURATION_RX = /^(\d+(?:\.\d+)?)\s*([a-z]+)$/;

/**
 * Parses an interval such as `"7 days"`, `"1 hour"`, `"5m"` or a plain
 * millisecond count. A year is 365 days.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0) throw new Error(`invalid duration: ${input}`);
    return Math.floor(input);
  }
  const raw = input.trim().toLowerCase();
  if (/^\d+$/.test(raw)) return Number(raw);

  const m = DURATION_RX.exec(raw);
  if (!m) throw new Error(`invalid duration: "${input}"`);
  const unit = m[2].endsWith('s') && m[2].length > 2 ? m[2].slice(0, -1) : m[2];
  const factor = UNIT_MS[unit];
  if (factor === undefined) throw new Error(`unknown duration unit: "${m[2]}"`);
  return Math.round(Number(m[1]) * factor);
}

export function formatDuration(ms: number): string {
  for (const [unit, size] of [['d', 86_400_000], ['h', 3_600_000], ['m', 60_000], ['s', 1_000]] as const) {
    if (ms >= size && ms % size === 0) return `${ms / size}${unit}`;
  }
  return `${ms}ms`;
}
