/**
 * =============================================================================
 * SHARED UTILITIES - Unit Tests
 * =============================================================================
 */

import { csvEscape, buildCsv } from '../shared/utils/csv.utils';
import {
  addCalendarDays,
  dayLabel,
  daysInMonth,
  formatInstant,
  localDateKey,
  monthLabel,
  monthRange,
  parseMonthValue,
  shiftMonth,
  toCalendarDate,
  zonedTimeToUtc
} from '../shared/utils/date.utils';
import {
  MAX_MONEY_AMOUNT,
  formatCurrency,
  parseMoney,
  roundMoney,
  sumMoney,
  toMoneyString
} from '../shared/utils/money.utils';
import {
  buildMonthNavigation,
  mergeMonths,
  resolveMonth,
  toMonthOptions
} from '../shared/utils/month-navigation.utils';
import {
  hasAtMostTwoDecimals,
  idParamSchema,
  moneySchema,
  monthParamSchema,
  nonNegativeMoneySchema,
  validateSchema
} from '../shared/utils/validation.utils';
import { ValidationError } from '../core/errors/AppError';

describe('csv utils', () => {
  it('quotes only cells that need it', () => {
    expect(csvEscape(null)).toBe('');
    expect(csvEscape(undefined)).toBe('');
    expect(csvEscape(12.5)).toBe('12.5');
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('two\nlines')).toBe('"two\nlines"');
  });

  it('joins rows with CRLF and ends with one', () => {
    expect(buildCsv(['A', 'B'], [[1, 'x,y'], [null, 'z']])).toBe('A,B\r\n1,"x,y"\r\n,z\r\n');
  });

  it('writes the header alone for no rows', () => {
    expect(buildCsv(['Date', 'Amount'], [])).toBe('Date,Amount\r\n');
  });
});

describe('date utils', () => {
  it('converts local midnight to UTC', () => {
    expect(zonedTimeToUtc({ year: 2025, month: 3, day: 1 }).toISOString()).toBe('2025-02-28T16:00:00.000Z');
  });

  it('handles zones with daylight saving time', () => {
    const noon = zonedTimeToUtc({ year: 2025, month: 3, day: 9, hour: 12 }, 'America/New_York');
    expect(noon.toISOString()).toBe('2025-03-09T16:00:00.000Z');
  });

  it('buckets instants by the local day', () => {
    const instant = new Date('2025-03-31T16:30:00.000Z');
    expect(localDateKey(instant)).toBe('2025-04-01');
    expect(toCalendarDate(instant, 'UTC')).toEqual({ year: 2025, month: 3, day: 31 });
  });

  it('formats instants on the local clock', () => {
    expect(formatInstant(new Date('2025-03-15T02:05:00.000Z'), 'yyyy-MM-dd HH:mm')).toBe('2025-03-15 10:05');
  });

  it('spans a month in local time', () => {
    const range = monthRange({ year: 2025, month: 12 });
    expect(range.from.toISOString()).toBe('2025-11-30T16:00:00.000Z');
    expect(range.to.toISOString()).toBe('2025-12-31T16:00:00.000Z');
  });

  it('does calendar arithmetic', () => {
    expect(shiftMonth({ year: 2025, month: 1 }, -1)).toEqual({ year: 2024, month: 12 });
    expect(shiftMonth({ year: 2025, month: 11 }, 3)).toEqual({ year: 2026, month: 2 });
    expect(addCalendarDays({ year: 2024, month: 2, day: 28 }, 1)).toEqual({ year: 2024, month: 2, day: 29 });
    expect(daysInMonth({ year: 2024, month: 2 })).toBe(29);
    expect(daysInMonth({ year: 2025, month: 2 })).toBe(28);
  });

  it('labels months and days', () => {
    expect(monthLabel({ year: 2025, month: 3 })).toBe('March 2025');
    expect(dayLabel({ year: 2025, month: 3, day: 5 })).toBe('Mar 05');
  });

  it('parses YYYY-MM values', () => {
    expect(parseMonthValue('2025-03')).toEqual({ year: 2025, month: 3 });
    expect(parseMonthValue('2025-13')).toBeNull();
    expect(parseMonthValue('March')).toBeNull();
    expect(parseMonthValue(undefined)).toBeNull();
  });

  it('refuses years the Date constructor would read as 19xx', () => {
    expect(parseMonthValue('0099-05')).toBeNull();
    expect(parseMonthValue('1899-12')).toBeNull();
    expect(parseMonthValue('1900-01')).toEqual({ year: 1900, month: 1 });
  });
});

describe('month navigation', () => {
  const today = { year: 2025, month: 3, day: 15 };

  it('enables links only toward months with data', () => {
    const nav = buildMonthNavigation({ year: 2025, month: 3 }, [{ year: 2025, month: 2 }, { year: 2025, month: 4 }], today);

    expect(nav).toEqual({
      year: 2025,
      month: 3,
      value: '2025-03',
      label: 'March 2025',
      prev: '2025-02',
      next: '2025-04',
      hasPrev: true,
      hasNext: false,
      isCurrentMonth: true
    });
  });

  it('allows the next month once it has started', () => {
    const nav = buildMonthNavigation({ year: 2025, month: 1 }, [{ year: 2025, month: 2 }], today);
    expect(nav.hasNext).toBe(true);
    expect(nav.hasPrev).toBe(false);
    expect(nav.isCurrentMonth).toBe(false);
  });

  it('wraps around the year', () => {
    const nav = buildMonthNavigation({ year: 2025, month: 1 }, [], today);
    expect(nav.prev).toBe('2024-12');
  });

  it('resolves the selected month', () => {
    expect(resolveMonth('2025-02', today)).toEqual({ year: 2025, month: 2 });
    expect(resolveMonth(undefined, today)).toEqual({ year: 2025, month: 3 });
    expect(resolveMonth('garbage', today)).toEqual({ year: 2025, month: 3 });
  });

  it('merges month lists newest first', () => {
    const merged = mergeMonths(
      [{ year: 2025, month: 1 }, { year: 2025, month: 3 }],
      [{ year: 2025, month: 3 }, { year: 2024, month: 12 }]
    );
    expect(merged).toEqual([
      { year: 2025, month: 3 },
      { year: 2025, month: 1 },
      { year: 2024, month: 12 }
    ]);
    expect(toMonthOptions(merged)[2]).toEqual({ value: '2024-12', label: 'December 2024' });
  });
});

describe('money utils', () => {
  it('rounds to centavos', () => {
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    expect(sumMoney([0.1, 0.2, 0.3])).toBe(0.6);
    expect(parseMoney('12.50')).toBe(12.5);
    expect(parseMoney(null)).toBe(0);
    expect(toMoneyString(5)).toBe('5.00');
  });

  it('formats with the currency symbol and grouping', () => {
    expect(formatCurrency(1234.5)).toBe('₱1,234.50');
    expect(formatCurrency(0)).toBe('₱0.00');
    expect(formatCurrency(99, '$')).toBe('$99.00');
  });
});

describe('validation utils', () => {
  it('accepts at most two decimals', () => {
    expect(hasAtMostTwoDecimals(10.25)).toBe(true);
    expect(hasAtMostTwoDecimals(10)).toBe(true);
    expect(hasAtMostTwoDecimals(10.255)).toBe(false);
  });

  it('drops malformed month params', () => {
    expect(monthParamSchema.parse('2025-03')).toBe('2025-03');
    expect(monthParamSchema.parse('2025-3')).toBeUndefined();
    expect(monthParamSchema.parse(undefined)).toBeUndefined();
    expect(monthParamSchema.parse('0099-05')).toBeUndefined();
  });

  it('caps amounts at what NUMERIC(12,2) holds', () => {
    expect(moneySchema.parse('9999999999.99')).toBe(MAX_MONEY_AMOUNT);
    expect(nonNegativeMoneySchema.parse(0)).toBe(0);

    const tooLarge = moneySchema.safeParse(1e10);
    expect(tooLarge.success).toBe(false);
    expect(tooLarge.success ? null : tooLarge.error.issues[0]?.message).toBe('Amount is too large');
    expect(nonNegativeMoneySchema.safeParse(1e12).success).toBe(false);
  });

  it('throws ValidationError with field details', () => {
    let thrown: unknown;
    try {
      validateSchema(idParamSchema, { id: 'abc' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    expect(thrown).toMatchObject({ message: 'Validation failed', statusCode: 400 });
    expect(validateSchema(idParamSchema, { id: '42' })).toEqual({ id: 42 });
  });
});
