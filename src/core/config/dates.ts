// src/core/config/dates.ts
const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAYS_AGO = /^(\d+)_days?_ago$/;

export type DateBoundary = 'start' | 'end';

/**
 * Resolves a date expression from the environment or the command line.
 *
 * Accepts `today`, `N_days_ago`, `YYYY-MM-DD` and full ISO 8601 date-times.
 * Date-only values are read as UTC. For the `end` boundary a date-only value
 * covers the whole day, so `2024-01-31` ends at 23:59:59.999Z. `today` means
 * the start of the current UTC day for `start` and the current instant for
 * `end`.
 *
 * Returns `null` for anything it cannot parse.
 */
export function parseDateSpec(
  value: string,
  boundary: DateBoundary,
  now: Date = new Date()
): Date | null {
  const resolved = resolveDateSpec(value, boundary, now);
  return resolved && !Number.isNaN(resolved.getTime()) ? resolved : null;
}

function resolveDateSpec(value: string, boundary: DateBoundary, now: Date): Date | null {
  const spec = value.trim().toLowerCase();

  if (spec === 'today') {
    return boundary === 'start' ? startOfUtcDay(now) : new Date(now.getTime());
  }

  const daysAgo = DAYS_AGO.exec(spec);
  if (daysAgo) {
    return new Date(now.getTime() - Number(daysAgo[1]) * DAY_MS);
  }

  if (DATE_ONLY.test(spec)) {
    const parsed = new Date(`${spec}T00:00:00.000Z`);
    if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== spec) {
      return null;
    }
    return boundary === 'start' ? parsed : new Date(parsed.getTime() + DAY_MS - 1);
  }

  // Date-times without an offset are taken as UTC
  const hasOffset = /(z|[+-]\d{2}:?\d{2})$/.test(spec);
  return new Date(hasOffset ? value.trim() : `${value.trim()}Z`);
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function formatDateRange(start: Date, end: Date): string {
  return `${formatDateTime(start)} → ${formatDateTime(end)}`;
}
