import {
  addDays,
  addMonths,
  addWeeks,
  format,
  startOfDay,
  startOfISOWeek,
  startOfMonth,
  subDays,
} from 'date-fns';
import { InvalidWindowError } from '../errors.ts';
import type { ReportWindow, WindowKind } from '../../types/report.ts';

const WINDOW_TOKENS = new Map<string, WindowKind>([
  ['daily', 'day'],
  ['day', 'day'],
  ['weekly', 'week'],
  ['week', 'week'],
  ['monthly', 'month'],
  ['month', 'month'],
  ['all', 'all'],
  ['alltime', 'all'],
]);

export function parseWindow(token: string): WindowKind {
  const kind = WINDOW_TOKENS.get(token.trim().toLowerCase());
  if (!kind) throw new InvalidWindowError(token);
  return kind;
}

/**
 * Calendar window containing `now`, in local time. Weeks are ISO weeks
 * (Monday start).
 */
export function resolveWindow(kind: WindowKind, now: Date): ReportWindow {
  switch (kind) {
    case 'day': {
      const start = startOfDay(now);
      return { kind, label: `Today (${format(start, 'yyyy-MM-dd')})`, start, end: addDays(start, 1) };
    }
    case 'week': {
      const start = startOfISOWeek(now);
      const end = addWeeks(start, 1);
      const label = `This Week (${format(start, 'yyyy-MM-dd')} to ${format(subDays(end, 1), 'yyyy-MM-dd')})`;
      return { kind, label, start, end };
    }
    case 'month': {
      const start = startOfMonth(now);
      return { kind, label: `This Month (${format(start, 'MMMM yyyy')})`, start, end: addMonths(start, 1) };
    }
    case 'all':
      return { kind, label: 'All Time', start: null, end: null };
  }
}

/** Start inclusive, end exclusive. */
export function isInWindow(instant: Date, window: ReportWindow): boolean {
  if (window.start && instant.getTime() < window.start.getTime()) return false;
  if (window.end && instant.getTime() >= window.end.getTime()) return false;
  return true;
}
