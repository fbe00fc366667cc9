import type { TimeInterval } from '../types/timeline.types';
import { InvalidIntervalError } from './errors';

/** Round to the nearest millisecond. Every emitted time goes through this. */
export function roundMs(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Round down to the millisecond. The epsilon absorbs binary noise such as
 * 1.15 * 1000 = 1149.9999999999998.
 */
export function floorMs(seconds: number): number {
  return Math.floor(seconds * 1000 + 1e-6) / 1000;
}

export function duration(interval: TimeInterval): number {
  return interval.end - interval.start;
}

/** Build an interval, enforcing 0 <= start < end. */
export function makeInterval(start: number, end: number, label = 'interval'): TimeInterval {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new InvalidIntervalError(`${label} has a non-finite bound [${start}, ${end})`, { start, end });
  }
  if (start < 0) {
    throw new InvalidIntervalError(`${label} starts before 0: [${formatSeconds(start)}, ${formatSeconds(end)})`, {
      start,
      end,
    });
  }
  if (end <= start) {
    throw new InvalidIntervalError(
      `${label} must end after it starts: [${formatSeconds(start)}, ${formatSeconds(end)})`,
      { start, end }
    );
  }
  return { start, end };
}

/** Half-open overlap: [0,1) and [1,2) do not overlap. */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

export function formatInterval(interval: TimeInterval): string {
  return `[${formatSeconds(interval.start)}, ${formatSeconds(interval.end)})`;
}
