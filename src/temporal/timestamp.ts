import { IncomparableTimestampError, InvalidTimestampError } from '../errors.js';

export const MS_PER_DAY = 86_400_000;

// Largest magnitude a Date can hold
export const MAX_EPOCH_MS = 8.64e15;

/**
 * Canonical, zone-less point in time (UTC epoch milliseconds).
 *
 * Every timestamp enters the graph through {@link normalizeTimestamp}; the
 * store, traversal and analyzer only ever compare `Instant`s.
 */
export class Instant {
  private constructor(readonly epochMs: number) {}

  static fromEpochMs(epochMs: number): Instant {
    if (!Number.isFinite(epochMs) || Math.abs(epochMs) > MAX_EPOCH_MS) {
      throw new InvalidTimestampError(String(epochMs));
    }
    return new Instant(epochMs);
  }

  /**
   * Total order over canonical timestamps. Anything that slipped past the
   * normalizer (a raw string from untyped JSON, say) is rejected here.
   */
  static compare(a: Instant, b: Instant): number {
    if (!(a instanceof Instant) || !(b instanceof Instant)) {
      throw new IncomparableTimestampError(describeTimestamp(a), describeTimestamp(b));
    }
    return a.epochMs - b.epochMs;
  }

  static min(a: Instant, b: Instant): Instant {
    return Instant.compare(a, b) <= 0 ? a : b;
  }

  static max(a: Instant, b: Instant): Instant {
    return Instant.compare(a, b) >= 0 ? a : b;
  }

  isBefore(other: Instant): boolean {
    return Instant.compare(this, other) < 0;
  }

  isAfter(other: Instant): boolean {
    return Instant.compare(this, other) > 0;
  }

  equals(other: Instant): boolean {
    return Instant.compare(this, other) === 0;
  }

  plusDays(days: number): Instant {
    return Instant.fromEpochMs(this.epochMs + days * MS_PER_DAY);
  }

  plusMs(ms: number): Instant {
    return Instant.fromEpochMs(this.epochMs + ms);
  }

  /** Signed distance in (fractional) days from `other` to this instant. */
  daysSince(other: Instant): number {
    return (this.epochMs - other.epochMs) / MS_PER_DAY;
  }

  toISOString(): string {
    return new Date(this.epochMs).toISOString();
  }

  toJSON(): string {
    return this.toISOString();
  }

  toString(): string {
    return this.toISOString();
  }
}

export type TimestampInput = Instant | Date | number | string;

/** Whether a raw timestamp carries its own zone information. */
export type TimestampZone = 'aware' | 'naive';

interface ParsedTimestamp {
  epochMs: number;
  zone: TimestampZone;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function parseIsoTimestamp(input: string): ParsedTimestamp {
  const match = ISO_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidTimestampError(input);
  }

  const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, fraction, offset] = match;
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);
  const hour = hourStr ? Number(hourStr) : 0;
  const minute = minuteStr ? Number(minuteStr) : 0;
  const second = secondStr ? Number(secondStr) : 0;
  const millis = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    throw new InvalidTimestampError(input);
  }

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InvalidTimestampError(input);
  }

  if (!offset) {
    // Naive wall time is read as UTC, never as host-local time
    return { epochMs: date.getTime(), zone: 'naive' };
  }

  if (offset === 'Z' || offset === 'z') {
    return { epochMs: date.getTime(), zone: 'aware' };
  }

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const offsetHours = Number(digits.slice(0, 2));
  const offsetMinutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (offsetHours > 23 || offsetMinutes > 59) {
    throw new InvalidTimestampError(input);
  }

  const offsetMs = sign * (offsetHours * 60 + offsetMinutes) * 60_000;
  return { epochMs: date.getTime() - offsetMs, zone: 'aware' };
}

export function timestampZone(input: TimestampInput): TimestampZone {
  if (typeof input === 'string') {
    return parseIsoTimestamp(input).zone;
  }
  return 'aware';
}

/**
 * The single normalization boundary: any accepted representation becomes an
 * {@link Instant}.
 */
export function normalizeTimestamp(input: TimestampInput): Instant {
  if (input instanceof Instant) {
    return input;
  }
  if (input instanceof Date) {
    const ms = input.getTime();
    if (Number.isNaN(ms)) {
      throw new InvalidTimestampError('Invalid Date');
    }
    return Instant.fromEpochMs(ms);
  }
  if (typeof input === 'number') {
    return Instant.fromEpochMs(input);
  }
  if (typeof input === 'string') {
    return Instant.fromEpochMs(parseIsoTimestamp(input).epochMs);
  }
  throw new InvalidTimestampError(describeTimestamp(input));
}

/**
 * Compare two raw timestamps. Values of the same zone kind are normalized and
 * compared; mixing a zone-aware with a zone-naive value is an error.
 */
export function compareTimestamps(a: TimestampInput, b: TimestampInput): number {
  const zoneA = timestampZone(a);
  const zoneB = timestampZone(b);
  if (zoneA !== zoneB) {
    throw new IncomparableTimestampError(describeTimestamp(a), describeTimestamp(b));
  }
  return Instant.compare(normalizeTimestamp(a), normalizeTimestamp(b));
}

/** Fixed serialization profile: `YYYY-MM-DDTHH:mm:ss.sssZ`. */
export function formatTimestamp(instant: Instant): string {
  return instant.toISOString();
}

/** Layer (time bucket) number of an instant for a given bucket width. */
export function layerOf(instant: Instant, layerDurationDays: number): number {
  return Math.floor(instant.epochMs / (layerDurationDays * MS_PER_DAY));
}

export function describeTimestamp(value: unknown): string {
  if (value instanceof Instant) return value.toISOString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (typeof value === 'string') return value;
  return String(value);
}
