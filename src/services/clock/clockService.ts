/**
 * Clock / Time Service
 *
 * Every deadline and kickoff comparison in the engine happens on UTC
 * instants (`Date`). Values read from storage or the provider pass through
 * `coerceLegacy` first: historically some timestamps were stored without an
 * offset, and those are interpreted as wall-clock time in the configured
 * legacy zone.
 */

import { isValid, parseISO } from 'date-fns';
import { DataIntegrityError } from '../../errors';

// ─────────────────────────────────────────────────────────────────────────────
// Clock
// ─────────────────────────────────────────────────────────────────────────────

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock pinned to one instant, for tests and replays. */
export function fixedClock(instant: Date): Clock {
  const ms = instant.getTime();
  return { now: () => new Date(ms) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Zone arithmetic
// ─────────────────────────────────────────────────────────────────────────────

export interface LocalTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday … 6 = Saturday */
  weekday: number;
  zone: string;
}

const WEEKDAYS: Record<string, number> = { Sun: 0, Mon: 1, Tue: 2, Wed: 3, Thu: 4, Fri: 5, Sat: 6 };

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(zone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      weekday: 'short',
    });
    formatterCache.set(zone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(zone: string): boolean {
  if (!zone) return false;
  try {
    formatterFor(zone);
    return true;
  } catch {
    return false;
  }
}

export function toAppLocal(instant: Date, zone: string): LocalTime {
  const parts: Record<string, string> = {};
  for (const part of formatterFor(zone).formatToParts(instant)) {
    parts[part.type] = part.value;
  }
  return {
    year: Number(parts.year),
    month: Number(parts.month),
    day: Number(parts.day),
    hour: Number(parts.hour),
    minute: Number(parts.minute),
    second: Number(parts.second),
    weekday: WEEKDAYS[parts.weekday] ?? 0,
    zone,
  };
}

/** Offset of `zone` from UTC at `instant`, in ms (east positive). */
function zoneOffsetMs(instant: number, zone: string): number {
  const local = toAppLocal(new Date(instant), zone);
  const asUtc = Date.UTC(local.year, local.month - 1, local.day, local.hour, local.minute, local.second);
  return asUtc - (instant - (((instant % 1000) + 1000) % 1000));
}

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function wallClockToInstant(wall: WallClock, zone: string): Date {
  const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second, wall.millisecond);
  const firstOffset = zoneOffsetMs(guess, zone);
  let candidate = guess - firstOffset;
  // Second pass settles instants near a DST transition.
  const secondOffset = zoneOffsetMs(candidate, zone);
  if (secondOffset !== firstOffset) {
    candidate = guess - secondOffset;
  }
  return new Date(candidate);
}

// ─────────────────────────────────────────────────────────────────────────────
// Legacy coercion
// ─────────────────────────────────────────────────────────────────────────────

const ZONE_AWARE_TIMESTAMP = /[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const NAIVE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

/**
 * Normalize a timestamp of unknown origin to a UTC instant.
 *
 * Zone-aware input (a `Date`, or a string ending in `Z` or an offset) is
 * taken as-is; a naive string gets `assumedZone` attached before conversion.
 */
export function coerceLegacy(ts: Date | string, assumedZone: string): Date {
  if (ts instanceof Date) {
    if (!isValid(ts)) {
      throw new DataIntegrityError('Invalid Date value', 'timestamp');
    }
    return new Date(ts.getTime());
  }

  const text = ts.trim();
  if (ZONE_AWARE_TIMESTAMP.test(text)) {
    const parsed = parseISO(text);
    if (!isValid(parsed)) {
      throw new DataIntegrityError(`Unparseable timestamp "${ts}"`, 'timestamp', ts);
    }
    return parsed;
  }

  const match = NAIVE_TIMESTAMP.exec(text);
  if (!match) {
    throw new DataIntegrityError(`Unparseable timestamp "${ts}"`, 'timestamp', ts);
  }
  const [, year, month, day, hour, minute, second, fraction] = match;
  return wallClockToInstant(
    {
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour),
      minute: Number(minute),
      second: Number(second ?? 0),
      millisecond: Number((fraction ?? '0').padEnd(3, '0').slice(0, 3)),
    },
    assumedZone,
  );
}

/** "Tue 09/09 17:05 America/Los_Angeles"-style label for messages. */
export function formatLocal(instant: Date, zone: string): string {
  const local = toAppLocal(instant, zone);
  const pad = (n: number) => String(n).padStart(2, '0');
  const weekday = Object.keys(WEEKDAYS)[local.weekday];
  return `${weekday} ${pad(local.month)}/${pad(local.day)} ${pad(local.hour)}:${pad(local.minute)} ${zone}`;
}
