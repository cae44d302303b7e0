/**
 * Report period resolution.
 *
 * All dates are calendar days in UTC. Weeks are ISO weeks (Monday to
 * Sunday); `week` and `month` are rolling windows ending today.
 */

import { ReportError } from './types.js';
import type { ReportPeriod, ReportType } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Monday of the ISO week containing `date` */
function startOfIsoWeek(date: Date): Date {
  const offset = (date.getUTCDay() + 6) % 7;
  return addDays(startOfDay(date), -offset);
}

function monthBounds(year: number, month: number): [Date, Date] {
  return [new Date(Date.UTC(year, month, 1)), new Date(Date.UTC(year, month + 1, 0))];
}

/**
 * Parse a YYYY-MM-DD string, rejecting impossible dates such as 2024-02-30.
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatDate(date) === value ? date : null;
}

/**
 * Resolve the date range a report type covers.
 *
 * @throws ReportError (`invalid_period`) for a missing or inverted date range.
 */
export function resolveReportPeriod(
  type: ReportType,
  now: Date,
  range?: { startDate?: string; endDate?: string },
): ReportPeriod {
  const today = startOfDay(now);

  const period = (start: Date, end: Date): ReportPeriod => ({
    type,
    start: formatDate(start),
    end: formatDate(end),
  });

  switch (type) {
    case 'day':
      return period(today, today);

    case 'week':
      return period(addDays(today, -6), today);

    case 'month':
      return period(addDays(today, -29), today);

    case 'current_week': {
      const monday = startOfIsoWeek(today);
      return period(monday, addDays(monday, 6));
    }

    case 'last_week': {
      const monday = addDays(startOfIsoWeek(today), -7);
      return period(monday, addDays(monday, 6));
    }

    case 'current_month': {
      const [first, last] = monthBounds(today.getUTCFullYear(), today.getUTCMonth());
      return period(first, last);
    }

    case 'last_month': {
      const [first, last] = monthBounds(today.getUTCFullYear(), today.getUTCMonth() - 1);
      return period(first, last);
    }

    case 'date_range': {
      const startRaw = range?.startDate;
      const endRaw = range?.endDate;
      if (!startRaw || !endRaw) {
        throw new ReportError('invalid_period', 'date_range requires startDate and endDate');
      }
      const start = parseIsoDate(startRaw);
      const end = parseIsoDate(endRaw);
      if (!start || !end) {
        throw new ReportError('invalid_period', `Invalid date in range: ${startRaw}..${endRaw}`);
      }
      if (start.getTime() > end.getTime()) {
        throw new ReportError('invalid_period', `startDate ${startRaw} is after endDate ${endRaw}`);
      }
      return period(start, end);
    }
  }
}

/**
 * File name for a report: `report_from {day}.xlsx` for a single day,
 * `report_from {start}_to_{end}.xlsx` otherwise.
 */
export function reportFileName(period: ReportPeriod): string {
  return period.start === period.end
    ? `report_from ${period.start}.xlsx`
    : `report_from ${period.start}_to_${period.end}.xlsx`;
}
