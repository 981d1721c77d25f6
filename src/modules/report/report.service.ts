/**
 * =============================================================================
 * REPORT MODULE - SERVICE
 * =============================================================================
 *
 * Monthly analytics over deposits and terminal fees, with CSV exports.
 *
 * Deposit figures count credited deposits only (approved, successful).
 * Fee figures come from revenue-counted archive transactions, bucketed by
 * their stored local calendar day.
 * =============================================================================
 */

import { CREDITED_DEPOSIT_STATUSES, LIST_LIMITS } from '../../core/constants';
import { db } from '../../shared/database/db';
import { DepositView, TransactionRecord, driverFullName } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { CsvDocument, buildCsv } from '../../shared/utils/csv.utils';
import {
  CalendarDate,
  Clock,
  YearMonth,
  dayRange,
  formatInstant,
  monthLabel,
  monthRange,
  sameYearMonth,
  systemClock,
  toCalendarDate,
  toYearMonth
} from '../../shared/utils/date.utils';
import { roundMoney, sumMoney } from '../../shared/utils/money.utils';
import {
  MonthNavigation,
  MonthOption,
  buildMonthNavigation,
  mergeMonths,
  resolveMonth,
  toMonthOptions
} from '../../shared/utils/month-navigation.utils';
import { DepositDetail, toDepositDetail } from '../deposit/deposit.service';
import {
  DayHighlight,
  average,
  buildDailySeries,
  highlightDay,
  rankGroups
} from './report.aggregation';

// =============================================================================
// TYPES
// =============================================================================

export interface ReportsHome {
  monthName: string;
  month: {
    depositTotal: number;
    depositCount: number;
    revenue: number;
    transactionCount: number;
  };
  today: {
    depositTotal: number;
    depositCount: number;
    revenue: number;
  };
}

interface MonthlyReport {
  navigation: MonthNavigation;
  availableMonths: MonthOption[];
  isCurrentMonth: boolean;
  /** Index of today in the daily arrays, -1 outside the current month */
  todayIndex: number;
  labels: string[];
}

export interface DepositAnalytics extends MonthlyReport {
  dailyTotals: number[];
  dailyCounts: number[];
  total: number;
  count: number;
  average: number;
  peakDay: DayHighlight | null;
  busiestDay: DayHighlight | null;
  topVehicles: Array<{ licensePlate: string; driverName: string; total: number; count: number }>;
  recentDeposits: DepositDetail[];
}

export interface DepositsVsFees extends MonthlyReport {
  dailyDeposits: number[];
  dailyFees: number[];
  totalDeposits: number;
  totalFees: number;
  net: number;
  /** Fees as a percentage of deposits */
  ratio: number;
  ratioLabel: string;
  peakDepositDay: DayHighlight | null;
  peakFeeDay: DayHighlight | null;
}

export interface ProfitReport extends MonthlyReport {
  dailyRevenue: number[];
  dailyCounts: number[];
  total: number;
  count: number;
  averageFee: number;
  peakDay: DayHighlight | null;
  busiestDay: DayHighlight | null;
  topVehicles: Array<{ licensePlate: string; driverName: string; count: number; total: number; average: number }>;
  routePerformance: Array<{ routeName: string; count: number; total: number; average: number }>;
}

export const DEPOSITS_VS_FEES_CSV_HEADERS = [
  'Date',
  'Day',
  'Deposits (₱)',
  'Terminal Fees (₱)',
  'Net Balance (₱)'
] as const;

export const PROFIT_CSV_HEADERS = [
  'Transaction Date',
  'Entry Time',
  'Exit Time',
  'Vehicle Plate',
  'Driver Name',
  'Route',
  'Terminal Fee',
  'Wallet Balance',
  'Year',
  'Month',
  'Day'
] as const;

const MISSING = '—';

const fixed2 = (value: number): string => roundMoney(value).toFixed(2);
const pad2 = (value: number): string => String(value).padStart(2, '0');

// =============================================================================
// SERVICE
// =============================================================================

export class ReportService {
  constructor(
    private readonly repos: Repositories = db,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Current month and today at a glance
   */
  async getHome(): Promise<ReportsHome> {
    const today = toCalendarDate(this.clock());
    const month = toYearMonth(today);

    const [monthDeposits, monthRevenue, todayDeposits, todayFees] = await Promise.all([
      this.repos.wallets.summarizeDeposits({ range: monthRange(month), statuses: CREDITED_DEPOSIT_STATUSES }),
      this.repos.terminal.summarizeTransactions({ year: month.year, month: month.month, revenueOnly: true }),
      this.repos.wallets.summarizeDeposits({ range: dayRange(today), statuses: CREDITED_DEPOSIT_STATUSES }),
      this.repos.terminal.summarizeEntryFees(dayRange(today))
    ]);

    return {
      monthName: monthLabel(month),
      month: {
        depositTotal: monthDeposits.total,
        depositCount: monthDeposits.count,
        revenue: monthRevenue.total,
        transactionCount: monthRevenue.count
      },
      today: {
        depositTotal: todayDeposits.total,
        depositCount: todayDeposits.count,
        revenue: todayFees.total
      }
    };
  }

  // ---------------------------------------------------------------------------
  // Deposits
  // ---------------------------------------------------------------------------

  async getDepositAnalytics(monthValue: string | undefined): Promise<DepositAnalytics> {
    const today = toCalendarDate(this.clock());
    const selected = resolveMonth(monthValue, today);

    const [deposits, months] = await Promise.all([
      this.creditedDeposits(selected),
      this.repos.wallets.depositMonths({ statuses: CREDITED_DEPOSIT_STATUSES })
    ]);

    const series = buildDailySeries(
      selected,
      deposits,
      ({ deposit }) => toCalendarDate(deposit.createdAt).day,
      ({ deposit }) => deposit.amount
    );
    const total = sumMoney(deposits.map(({ deposit }) => deposit.amount));

    const topVehicles = rankGroups(
      deposits,
      ({ vehicle }) => String(vehicle.id),
      ({ deposit }) => deposit.amount,
      LIST_LIMITS.TOP_DEPOSIT_VEHICLES
    ).map(group => ({
      licensePlate: group.sample.vehicle.licensePlate,
      driverName: driverFullName(group.sample.driver),
      total: group.total,
      count: group.count
    }));

    return {
      ...this.monthlyFrame(selected, today, months, series.labels),
      dailyTotals: series.totals,
      dailyCounts: series.counts,
      total,
      count: deposits.length,
      average: average(total, deposits.length),
      peakDay: highlightDay(series, series.totals),
      busiestDay: highlightDay(series, series.counts),
      topVehicles,
      recentDeposits: deposits.slice(0, LIST_LIMITS.RECENT).map(toDepositDetail)
    };
  }

  // ---------------------------------------------------------------------------
  // Deposits vs terminal fees
  // ---------------------------------------------------------------------------

  async getDepositsVsFees(monthValue: string | undefined): Promise<DepositsVsFees> {
    const today = toCalendarDate(this.clock());
    const selected = resolveMonth(monthValue, today);

    const [deposits, transactions, depositMonths, feeMonths] = await Promise.all([
      this.creditedDeposits(selected),
      this.revenueTransactions(selected),
      this.repos.wallets.depositMonths({ statuses: CREDITED_DEPOSIT_STATUSES }),
      this.repos.terminal.transactionMonths(true)
    ]);

    const depositSeries = buildDailySeries(
      selected,
      deposits,
      ({ deposit }) => toCalendarDate(deposit.createdAt).day,
      ({ deposit }) => deposit.amount
    );
    const feeSeries = buildDailySeries(
      selected,
      transactions,
      transaction => transaction.transactionDay,
      transaction => transaction.feeCharged
    );

    const totalDeposits = sumMoney(depositSeries.totals);
    const totalFees = sumMoney(feeSeries.totals);

    return {
      ...this.monthlyFrame(selected, today, mergeMonths(depositMonths, feeMonths), depositSeries.labels),
      dailyDeposits: depositSeries.totals,
      dailyFees: feeSeries.totals,
      totalDeposits,
      totalFees,
      net: roundMoney(totalDeposits - totalFees),
      ratio: totalDeposits > 0 ? roundMoney((totalFees / totalDeposits) * 100) : 0,
      ratioLabel: totalDeposits > 0 ? 'Revenue ÷ Deposits' : 'No deposits recorded',
      peakDepositDay: highlightDay(depositSeries, depositSeries.totals),
      peakFeeDay: highlightDay(feeSeries, feeSeries.totals)
    };
  }

  /**
   * One row per day of the month, then a TOTAL row
   */
  async exportDepositsVsFeesCsv(monthValue: string | undefined): Promise<CsvDocument> {
    const report = await this.getDepositsVsFees(monthValue);
    const { year, month } = report.navigation;

    const rows: Array<Array<string | number>> = report.dailyDeposits.map((deposits, index) => {
      const fees = report.dailyFees[index];
      return [
        `${year}-${pad2(month)}-${pad2(index + 1)}`,
        index + 1,
        fixed2(deposits),
        fixed2(fees),
        fixed2(deposits - fees)
      ];
    });
    const dayRows = rows.length;
    rows.push(['TOTAL', '', fixed2(report.totalDeposits), fixed2(report.totalFees), fixed2(report.net)]);

    return {
      filename: `deposit_vs_revenue_${year}-${pad2(month)}.csv`,
      content: buildCsv(DEPOSITS_VS_FEES_CSV_HEADERS, rows),
      rowCount: dayRows
    };
  }

  // ---------------------------------------------------------------------------
  // Terminal fee analytics
  // ---------------------------------------------------------------------------

  async getProfitReport(monthValue: string | undefined): Promise<ProfitReport> {
    const today = toCalendarDate(this.clock());
    const months = await this.repos.terminal.transactionMonths(true);
    const selected = resolveMonth(monthValue, months[0] ?? today);
    const transactions = await this.revenueTransactions(selected);

    const series = buildDailySeries(
      selected,
      transactions,
      transaction => transaction.transactionDay,
      transaction => transaction.feeCharged
    );
    const total = sumMoney(transactions.map(transaction => transaction.feeCharged));

    const topVehicles = rankGroups(
      transactions,
      transaction => `${transaction.vehiclePlate}\u0000${transaction.driverName}`,
      transaction => transaction.feeCharged,
      LIST_LIMITS.TOP_FEE_VEHICLES
    ).map(group => ({
      licensePlate: group.sample.vehiclePlate,
      driverName: group.sample.driverName,
      count: group.count,
      total: group.total,
      average: group.average
    }));

    const routePerformance = rankGroups(
      transactions,
      transaction => transaction.routeName,
      transaction => transaction.feeCharged,
      LIST_LIMITS.ROUTE_PERFORMANCE
    ).map(group => ({
      routeName: group.key,
      count: group.count,
      total: group.total,
      average: group.average
    }));

    return {
      ...this.monthlyFrame(selected, today, months, series.labels),
      dailyRevenue: series.totals,
      dailyCounts: series.counts,
      total,
      count: transactions.length,
      averageFee: average(total, transactions.length),
      peakDay: highlightDay(series, series.totals),
      busiestDay: highlightDay(series, series.counts),
      topVehicles,
      routePerformance
    };
  }

  /**
   * One row per revenue-counted transaction of the month, by entry time
   */
  async exportProfitCsv(monthValue: string | undefined): Promise<CsvDocument> {
    const months = await this.repos.terminal.transactionMonths(true);
    const selected = resolveMonth(monthValue, months[0] ?? toCalendarDate(this.clock()));
    const transactions = await this.revenueTransactions(selected);

    const rows = transactions.map(transaction => [
      transaction.transactionDate,
      formatInstant(transaction.entryTimestamp, 'HH:mm:ss'),
      transaction.exitTimestamp ? formatInstant(transaction.exitTimestamp, 'HH:mm:ss') : MISSING,
      transaction.vehiclePlate,
      transaction.driverName,
      transaction.routeName,
      fixed2(transaction.feeCharged),
      transaction.walletBalanceSnapshot === null ? MISSING : fixed2(transaction.walletBalanceSnapshot),
      transaction.transactionYear,
      transaction.transactionMonth,
      transaction.transactionDay
    ]);

    return {
      filename: `terminal_fee_report_${selected.year}-${pad2(selected.month)}.csv`,
      content: buildCsv(PROFIT_CSV_HEADERS, rows),
      rowCount: rows.length
    };
  }

  // ---------------------------------------------------------------------------

  /** Newest first */
  private async creditedDeposits(month: YearMonth): Promise<DepositView[]> {
    return this.repos.wallets.listDeposits(
      { range: monthRange(month), statuses: CREDITED_DEPOSIT_STATUSES },
      'newest'
    );
  }

  /** Oldest first */
  private async revenueTransactions(month: YearMonth): Promise<TransactionRecord[]> {
    return this.repos.terminal.listTransactions(
      { year: month.year, month: month.month, revenueOnly: true },
      'asc'
    );
  }

  private monthlyFrame(
    selected: YearMonth,
    today: CalendarDate,
    months: readonly YearMonth[],
    labels: string[]
  ): MonthlyReport {
    const isCurrentMonth = sameYearMonth(selected, today);
    return {
      navigation: buildMonthNavigation(selected, months, today),
      availableMonths: toMonthOptions(months),
      isCurrentMonth,
      todayIndex: isCurrentMonth ? today.day - 1 : -1,
      labels
    };
  }
}

export const reportService = new ReportService();
