/**
 * =============================================================================
 * DASHBOARD MODULE - SERVICE
 * =============================================================================
 *
 * Landing figures for each role:
 *   admin      fleet counts, profit totals, live 7-day profit chart
 *   staff      fleet counts and the deposit review backlog
 *   treasurer  their own requests, month by month
 *
 * Profit rows carry a local calendar date, so every profit window here is a
 * pair of `yyyy-MM-dd` keys.
 * =============================================================================
 */

import { CREDITED_DEPOSIT_STATUSES, DepositStatus, EntryStatus, LIST_LIMITS } from '../../core/constants';
import { db } from '../../shared/database/db';
import { driverFullName } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import {
  CalendarDate,
  Clock,
  YearMonth,
  addCalendarDays,
  calendarKey,
  dayLabel,
  daysInMonth,
  monthRange,
  systemClock,
  toCalendarDate,
  toYearMonth
} from '../../shared/utils/date.utils';
import { MonthNavigation, buildMonthNavigation } from '../../shared/utils/month-navigation.utils';
import { DepositDetail, toDepositDetail } from '../deposit/deposit.service';
import { TreasurerDashboardQuery } from './dashboard.schema';

// =============================================================================
// TYPES
// =============================================================================

export interface FleetCounts {
  totalDrivers: number;
  totalVehicles: number;
  totalQueue: number;
}

export interface AdminDashboard extends FleetCounts {
  totalProfit: number;
  monthlyRevenue: number;
  annualRevenue: number;
  generatedAt: Date;
}

export interface RecentQueueEntry {
  entryId: number;
  licensePlate: string;
  driverName: string;
  routeName: string | null;
  enteredAt: Date;
}

export interface AdminLiveDashboard extends AdminDashboard {
  totalDeposits: number;
  totalRevenue: number;
  chart: {
    labels: string[];
    values: number[];
  };
  recentQueue: RecentQueueEntry[];
}

export interface StaffDashboard extends FleetCounts {
  pendingDeposits: number;
}

export interface TreasurerDashboard {
  counts: {
    pending: number;
    approved: number;
    rejected: number;
  };
  recentDeposits: DepositDetail[];
  monthDeposits: DepositDetail[];
  navigation: MonthNavigation;
}

// =============================================================================
// SERVICE
// =============================================================================

export class DashboardService {
  constructor(
    private readonly repos: Repositories = db,
    private readonly clock: Clock = systemClock
  ) {}

  async getAdminDashboard(): Promise<AdminDashboard> {
    const now = this.clock();
    const today = toCalendarDate(now);
    const month = toYearMonth(today);

    const [counts, totalProfit, monthlyRevenue, annualRevenue] = await Promise.all([
      this.fleetCounts(),
      this.repos.terminal.sumProfit(),
      this.repos.terminal.sumProfit(...monthKeys(month)),
      this.repos.terminal.sumProfit(
        calendarKey({ year: today.year, month: 1, day: 1 }),
        calendarKey({ year: today.year, month: 12, day: 31 })
      )
    ]);

    return { ...counts, totalProfit, monthlyRevenue, annualRevenue, generatedAt: now };
  }

  /**
   * Polled by the admin home page
   */
  async getAdminLive(): Promise<AdminLiveDashboard> {
    const today = toCalendarDate(this.clock());
    const chartStart = addCalendarDays(today, -(LIST_LIMITS.PROFIT_CHART_DAYS - 1));

    const [admin, deposits, fees, daily, queued] = await Promise.all([
      this.getAdminDashboard(),
      this.repos.wallets.summarizeDeposits({ statuses: CREDITED_DEPOSIT_STATUSES }),
      this.repos.terminal.summarizeEntryFees(),
      this.repos.terminal.dailyProfit(calendarKey(chartStart), calendarKey(today)),
      this.repos.terminal.listEntries({
        activeOnly: true,
        statuses: [EntryStatus.SUCCESS],
        order: 'desc',
        limit: LIST_LIMITS.RECENT
      })
    ]);

    const byDate = new Map(daily.map(point => [point.date, point.total]));
    const days: CalendarDate[] = [];
    for (let offset = 0; offset < LIST_LIMITS.PROFIT_CHART_DAYS; offset++) {
      days.push(addCalendarDays(chartStart, offset));
    }

    return {
      ...admin,
      totalDeposits: deposits.total,
      totalRevenue: fees.total,
      chart: {
        labels: days.map(dayLabel),
        values: days.map(day => byDate.get(calendarKey(day)) ?? 0)
      },
      recentQueue: queued.map(({ entry, vehicle, driver, route }) => ({
        entryId: entry.id,
        licensePlate: vehicle.licensePlate,
        driverName: driverFullName(driver),
        routeName: route?.name ?? null,
        enteredAt: entry.createdAt
      }))
    };
  }

  async getStaffDashboard(): Promise<StaffDashboard> {
    const [counts, pending] = await Promise.all([
      this.fleetCounts(),
      this.repos.wallets.summarizeDeposits({ statuses: [DepositStatus.PENDING] })
    ]);
    return { ...counts, pendingDeposits: pending.count };
  }

  /**
   * The treasurer's workspace: their own requests only
   */
  async getTreasurerDashboard(actor: AuthUser, query: TreasurerDashboardQuery): Promise<TreasurerDashboard> {
    const today = toCalendarDate(this.clock());
    const selected: YearMonth = {
      year: query.year ?? today.year,
      month: query.month ?? today.month
    };
    const mine = { createdById: actor.userId };

    const [pending, approved, rejected, recent, monthDeposits, months] = await Promise.all([
      this.repos.wallets.summarizeDeposits({ ...mine, statuses: [DepositStatus.PENDING] }),
      this.repos.wallets.summarizeDeposits({ ...mine, statuses: [DepositStatus.APPROVED] }),
      this.repos.wallets.summarizeDeposits({ ...mine, statuses: [DepositStatus.REJECTED] }),
      this.repos.wallets.listDeposits(mine, 'newest', LIST_LIMITS.RECENT),
      this.repos.wallets.listDeposits({ ...mine, range: monthRange(selected) }, 'newest'),
      this.repos.wallets.depositMonths(mine)
    ]);

    return {
      counts: {
        pending: pending.count,
        approved: approved.count,
        rejected: rejected.count
      },
      recentDeposits: recent.map(toDepositDetail),
      monthDeposits: monthDeposits.map(toDepositDetail),
      navigation: buildMonthNavigation(selected, months, today)
    };
  }

  private async fleetCounts(): Promise<FleetCounts> {
    const [totalDrivers, totalVehicles, totalQueue] = await Promise.all([
      this.repos.fleet.countDrivers(),
      this.repos.fleet.countVehicles(),
      this.repos.terminal.countQueue()
    ]);
    return { totalDrivers, totalVehicles, totalQueue };
  }
}

/** First and last local date of the month */
function monthKeys(month: YearMonth): [string, string] {
  return [
    calendarKey({ ...month, day: 1 }),
    calendarKey({ ...month, day: daysInMonth(month) })
  ];
}

export const dashboardService = new DashboardService();
