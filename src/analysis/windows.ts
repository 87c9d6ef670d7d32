import { InvalidArgumentError } from '../errors.js';
import { Instant, MS_PER_DAY } from '../temporal/timestamp.js';
import type { Window } from './types.js';

/**
 * Cut `[start, end]` into consecutive windows of `sizeDays`. Windows are
 * half-open `[s, e)` except the last, which is closed and ends exactly at
 * `end`. A zero-length span yields one closed window.
 */
export function fixedWindows(start: Instant, end: Instant, sizeDays: number): Window[] {
  if (!(sizeDays > 0) || !Number.isFinite(sizeDays)) {
    throw new InvalidArgumentError(`chunkSizeDays must be a positive number, got ${sizeDays}`);
  }

  const spanMs = end.epochMs - start.epochMs;
  const sizeMs = sizeDays * MS_PER_DAY;
  const count = Math.max(1, Math.ceil(spanMs / sizeMs));

  return Array.from({ length: count }, (_, index) => {
    const last = index === count - 1;
    return {
      index,
      start: start.plusMs(index * sizeMs),
      end: last ? end : start.plusMs((index + 1) * sizeMs),
      closed: last,
    };
  });
}

/** `count` windows of equal length covering `[start, end]` without gaps. */
export function evenWindows(start: Instant, end: Instant, count: number): Window[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidArgumentError(`numChunks must be a positive integer, got ${count}`);
  }

  const spanMs = end.epochMs - start.epochMs;
  const boundary = (i: number): Instant =>
    i === count ? end : Instant.fromEpochMs(start.epochMs + Math.floor((spanMs * i) / count));

  return Array.from({ length: count }, (_, index) => ({
    index,
    start: boundary(index),
    end: boundary(index + 1),
    closed: index === count - 1,
  }));
}

export function windowContains(window: Window, t: Instant): boolean {
  if (t.isBefore(window.start)) return false;
  return window.closed ? !t.isAfter(window.end) : t.isBefore(window.end);
}

/** True for instants at or after the end of a half-open window, after the end of a closed one. */
export function isPastWindow(window: Window, t: Instant): boolean {
  return window.closed ? t.isAfter(window.end) : !t.isBefore(window.end);
}

/** `YYYY-MM-DD to YYYY-MM-DD` */
export function periodLabel(window: Window): string {
  return `${window.start.toISOString().slice(0, 10)} to ${window.end.toISOString().slice(0, 10)}`;
}
