/**
 * Month picker state shared by every month-filtered listing and report.
 */

import {
  CalendarDate,
  YearMonth,
  compareYearMonth,
  monthLabel,
  monthValue,
  parseMonthValue,
  sameYearMonth,
  shiftMonth,
  toYearMonth
} from './date.utils';

export interface MonthOption {
  value: string;
  label: string;
}

export interface MonthNavigation {
  year: number;
  month: number;
  value: string;
  label: string;
  prev: string;
  next: string;
  hasPrev: boolean;
  hasNext: boolean;
  isCurrentMonth: boolean;
}

/**
 * Selected month from a `YYYY-MM` query value, or the fallback
 */
export function resolveMonth(value: string | undefined, fallback: YearMonth): YearMonth {
  return parseMonthValue(value) ?? toYearMonth(fallback);
}

/**
 * Previous/next links are enabled only when that month has data.
 * The next month must also have started already.
 */
export function buildMonthNavigation(
  selected: YearMonth,
  monthsWithData: readonly YearMonth[],
  today: CalendarDate
): MonthNavigation {
  const prev = shiftMonth(selected, -1);
  const next = shiftMonth(selected, 1);
  const hasData = (month: YearMonth) => monthsWithData.some(candidate => sameYearMonth(candidate, month));
  const currentMonth = toYearMonth(today);

  return {
    year: selected.year,
    month: selected.month,
    value: monthValue(selected),
    label: monthLabel(selected),
    prev: monthValue(prev),
    next: monthValue(next),
    hasPrev: hasData(prev),
    hasNext: hasData(next) && compareYearMonth(next, currentMonth) <= 0,
    isCurrentMonth: sameYearMonth(selected, currentMonth)
  };
}

/**
 * Distinct months, newest first
 */
export function mergeMonths(...lists: ReadonlyArray<readonly YearMonth[]>): YearMonth[] {
  const merged: YearMonth[] = [];
  for (const list of lists) {
    for (const month of list) {
      if (!merged.some(existing => sameYearMonth(existing, month))) {
        merged.push(toYearMonth(month));
      }
    }
  }
  return merged.sort((a, b) => compareYearMonth(b, a));
}

export function toMonthOptions(months: readonly YearMonth[]): MonthOption[] {
  return mergeMonths(months).map(month => ({ value: monthValue(month), label: monthLabel(month) }));
}
