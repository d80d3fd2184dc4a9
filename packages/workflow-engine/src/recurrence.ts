import type { Recurrence, Weekday } from './validation.js';

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;
export const WEEK_MS = 7 * DAY_MS;

const WEEKDAY_INDEX: Record<Weekday, number> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timeZone);
  if (cached !== undefined) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
}

export function zonedParts(instantMs: number, timeZone: string): ZonedParts {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(instantMs))) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }

  return {
    year: parts['year'] ?? 1970,
    month: parts['month'] ?? 1,
    day: parts['day'] ?? 1,
    hour: parts['hour'] ?? 0,
    minute: parts['minute'] ?? 0,
    second: parts['second'] ?? 0,
  };
}

function zoneOffsetMs(instantMs: number, timeZone: string): number {
  const wholeSecond = Math.floor(instantMs / 1000) * 1000;
  const parts = zonedParts(wholeSecond, timeZone);
  const localAsUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  return localAsUtc - wholeSecond;
}

/**
 * Converts a wall-clock time in `timeZone` to a UTC instant. A time repeated
 * by a fall-back transition resolves to its first occurrence; a time skipped
 * by a spring-forward transition moves forward by the length of the gap.
 */
export function zonedTimeToInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  timeZone: string,
): number {
  const localAsUtc = Date.UTC(year, month - 1, day, hour, minute);
  const offsetBefore = zoneOffsetMs(localAsUtc - DAY_MS / 2, timeZone);
  const offsetAfter = zoneOffsetMs(localAsUtc + DAY_MS / 2, timeZone);
  const candidates = [localAsUtc - offsetBefore, localAsUtc - offsetAfter].sort((left, right) => left - right);

  const valid = candidates.find((candidate) => zoneOffsetMs(candidate, timeZone) === localAsUtc - candidate);
  return valid ?? localAsUtc - offsetBefore;
}

function parseTimeOfDay(value: string): { hour: number; minute: number } {
  const [hour, minute] = value.split(':').map(Number);
  return { hour: hour ?? 0, minute: minute ?? 0 };
}

type CalendarRecurrence = Exclude<Recurrence, { kind: 'interval' }>;

function nextCalendarOccurrence(
  recurrence: CalendarRecurrence,
  timeZone: string,
  afterMs: number,
  inclusive: boolean,
): number {
  const { hour, minute } = parseTimeOfDay(recurrence.at);
  const start = zonedParts(afterMs, timeZone);

  // Eight days covers a full week plus the day a DST shift can push past.
  for (let offset = 0; offset <= 8; offset += 1) {
    const localDate = new Date(Date.UTC(start.year, start.month - 1, start.day + offset));
    if (recurrence.kind === 'weekly' && localDate.getUTCDay() !== WEEKDAY_INDEX[recurrence.day]) {
      continue;
    }

    const candidate = zonedTimeToInstant(
      localDate.getUTCFullYear(),
      localDate.getUTCMonth() + 1,
      localDate.getUTCDate(),
      hour,
      minute,
      timeZone,
    );
    if (inclusive ? candidate >= afterMs : candidate > afterMs) {
      return candidate;
    }
  }

  throw new Error(`No occurrence found for ${recurrence.kind} recurrence at ${recurrence.at}`);
}

/** First due instant for a schedule registered (or anchored) at `anchorMs`. */
export function initialDueAt(recurrence: Recurrence, timeZone: string, anchorMs: number): number {
  if (recurrence.kind === 'interval') {
    return anchorMs + recurrence.everyMs;
  }

  return nextCalendarOccurrence(recurrence, timeZone, anchorMs, true);
}

/**
 * Next due instant after a fire at `dueMs` observed at `nowMs`.
 * Always strictly after `nowMs`, so a schedule overdue by several periods
 * fires once and then resumes its normal cadence.
 */
export function nextDueAfter(
  recurrence: Recurrence,
  timeZone: string,
  dueMs: number,
  nowMs: number,
): number {
  if (recurrence.kind === 'interval') {
    const elapsedPeriods = Math.floor(Math.max(nowMs - dueMs, 0) / recurrence.everyMs);
    return dueMs + (elapsedPeriods + 1) * recurrence.everyMs;
  }

  return nextCalendarOccurrence(recurrence, timeZone, Math.max(nowMs, dueMs), false);
}

export function recurrencePeriodMs(recurrence: Recurrence): number {
  switch (recurrence.kind) {
    case 'interval':
      return recurrence.everyMs;
    case 'daily':
      return DAY_MS;
    case 'weekly':
      return WEEK_MS;
  }
}
