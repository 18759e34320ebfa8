/**
 * 足の長さの表記（'15s', '1m', '4h'）とミリ秒の相互変換。
 */

const UNIT_MS = {
  s: 1000,
  m: 60_000,
  h: 3_600_000,
} as const;

type IntervalUnit = keyof typeof UNIT_MS;

function isIntervalUnit(value: string): value is IntervalUnit {
  return value in UNIT_MS;
}

/**
 * @returns ミリ秒。解釈できない表記は null
 */
export function parseInterval(label: string): number | null {
  const match = /^(\d+)([smh])$/.exec(label.trim());
  if (!match) {
    return null;
  }
  const amount = Number(match[1]);
  const unit = match[2];
  if (amount <= 0 || !isIntervalUnit(unit)) {
    return null;
  }
  return amount * UNIT_MS[unit];
}

/**
 * ミリ秒を最も大きい割り切れる単位で表記する（60000 → '1m'）。
 */
export function formatInterval(ms: number): string {
  if (ms % UNIT_MS.h === 0) {
    return `${ms / UNIT_MS.h}h`;
  }
  if (ms % UNIT_MS.m === 0) {
    return `${ms / UNIT_MS.m}m`;
  }
  if (ms % UNIT_MS.s === 0) {
    return `${ms / UNIT_MS.s}s`;
  }
  return `${ms}ms`;
}

/**
 * 時刻をバケット境界に切り捨てる。
 */
export function bucketStartOf(timestamp: number, interval: number): number {
  return Math.floor(timestamp / interval) * interval;
}
