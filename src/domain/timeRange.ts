import { TimeRange } from './models.js';
import { ValidationError } from './errors/index.js';

const RANGE_PATTERN = /^\s*(\d{1,2})(?::(\d{2}))?\s*-\s*(\d{1,2})(?::(\d{2}))?\s*$/;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function toMinutes(hours: number, minutes: number, source: string): number {
  if (hours > 24 || minutes > 59 || (hours === 24 && minutes > 0)) {
    throw new ValidationError(`Invalid time '${source}'.`);
  }
  return hours * 60 + minutes;
}

// "09:30" -> 570
export function parseClock(value: string): number {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid time '${value}'. Expected HH:MM.`);
  }
  return toMinutes(Number(match[1]), Number(match[2]), value);
}

export function formatClock(minutes: number): string {
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0');
  const mm = String(minutes % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}

/**
 * Accepts "10:00-11:30" as well as the short hour form "10-11".
 */
export function parseTimeRange(value: string): TimeRange {
  const match = RANGE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(
      `Invalid time range '${value}'. Expected HH:MM-HH:MM.`
    );
  }

  const start = toMinutes(Number(match[1]), Number(match[2] ?? '0'), value);
  const end = toMinutes(Number(match[3]), Number(match[4] ?? '0'), value);

  if (end <= start) {
    throw new ValidationError(
      `Invalid time range '${value}'. End must be after start.`
    );
  }

  return { start, end };
}

export function formatTimeRange(range: TimeRange): string {
  return `${formatClock(range.start)}-${formatClock(range.end)}`;
}

// half-open: [10:00, 11:00) and [11:00, 12:00) do not overlap
export function overlaps(a: TimeRange, b: TimeRange): boolean {
  return a.start < b.end && b.start < a.end;
}

export function contains(outer: TimeRange, inner: TimeRange): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

export function validateDate(value: string): string {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid date '${value}'. Expected YYYY-MM-DD.`);
  }

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new ValidationError(`Invalid date '${value}'. No such calendar day.`);
  }

  return value;
}
