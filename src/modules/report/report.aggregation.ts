/**
 * Day-by-day series for the monthly reports.
 * Every day of the month gets a slot, zero when nothing happened.
 */

import {
  CalendarDate,
  YearMonth,
  calendarKey,
  dayLabel,
  daysInMonth
} from '../../shared/utils/date.utils';
import { roundMoney } from '../../shared/utils/money.utils';

export interface DailySeries {
  /** `yyyy-MM-dd` per day */
  dates: string[];
  /** `MMM dd` per day */
  labels: string[];
  totals: number[];
  counts: number[];
}

export interface DayHighlight {
  date: string;
  label: string;
  value: number;
}

export interface RankedGroup<T> {
  key: string;
  /** First item of the group */
  sample: T;
  count: number;
  total: number;
  average: number;
}

export function monthDays(month: YearMonth): CalendarDate[] {
  return Array.from({ length: daysInMonth(month) }, (_, index) => ({ ...month, day: index + 1 }));
}

/**
 * Sum amounts into the day (1-based) each item falls on
 */
export function buildDailySeries<T>(
  month: YearMonth,
  items: readonly T[],
  dayOf: (item: T) => number,
  amountOf: (item: T) => number
): DailySeries {
  const days = monthDays(month);
  const totals = days.map(() => 0);
  const counts = days.map(() => 0);

  for (const item of items) {
    const index = dayOf(item) - 1;
    if (index < 0 || index >= days.length) continue;
    totals[index] = roundMoney(totals[index] + amountOf(item));
    counts[index] += 1;
  }

  return {
    dates: days.map(calendarKey),
    labels: days.map(dayLabel),
    totals,
    counts
  };
}

/**
 * First day holding the largest value; null when every day is zero
 */
export function highlightDay(series: Pick<DailySeries, 'dates' | 'labels'>, values: readonly number[]): DayHighlight | null {
  let best = -1;
  values.forEach((value, index) => {
    if (value > 0 && (best === -1 || value > values[best])) best = index;
  });
  if (best === -1) return null;
  return { date: series.dates[best], label: series.labels[best], value: values[best] };
}

export function average(total: number, count: number): number {
  return count > 0 ? roundMoney(total / count) : 0;
}

/**
 * Group, total and rank by total descending
 */
export function rankGroups<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  amountOf: (item: T) => number,
  limit: number
): RankedGroup<T>[] {
  const groups = new Map<string, { sample: T; count: number; total: number }>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key) ?? { sample: item, count: 0, total: 0 };
    group.count += 1;
    group.total = roundMoney(group.total + amountOf(item));
    groups.set(key, group);
  }

  return [...groups.entries()]
    .map(([key, group]) => ({ key, ...group, average: average(group.total, group.count) }))
    .sort((a, b) => b.total - a.total || b.count - a.count)
    .slice(0, limit);
}
