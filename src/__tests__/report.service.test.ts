/**
 * =============================================================================
 * REPORT SERVICE - Unit Tests
 * =============================================================================
 *
 * Monthly deposit and terminal fee analytics over the fixture ledger.
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    log: jest.fn()
  }
}));

import { createMemoryRepositories } from '../shared/database/memory';
import { ReportService } from '../modules/report/report.service';
import {
  average,
  buildDailySeries,
  highlightDay,
  monthDays,
  rankGroups
} from '../modules/report/report.aggregation';
import { fixedClock } from './helpers/fleet';
import { seedLedger } from './helpers/ledger';

describe('report aggregation', () => {
  const february = { year: 2025, month: 2 };

  it('gives every day of the month a slot', () => {
    expect(monthDays(february)).toHaveLength(28);

    const series = buildDailySeries(
      february,
      [{ day: 1, amount: 10 }, { day: 1, amount: 5.5 }, { day: 28, amount: 3 }, { day: 30, amount: 99 }],
      item => item.day,
      item => item.amount
    );

    expect(series.totals[0]).toBe(15.5);
    expect(series.counts[0]).toBe(2);
    expect(series.totals[27]).toBe(3);
    expect(series.totals.reduce((sum, value) => sum + value, 0)).toBe(18.5);
    expect(series.dates[27]).toBe('2025-02-28');
    expect(series.labels[0]).toBe('Feb 01');
  });

  it('highlights the first day with the largest value', () => {
    const series = { dates: ['2025-02-01', '2025-02-02', '2025-02-03'], labels: ['Feb 01', 'Feb 02', 'Feb 03'] };

    expect(highlightDay(series, [5, 9, 9])).toEqual({ date: '2025-02-02', label: 'Feb 02', value: 9 });
    expect(highlightDay(series, [0, 0, 0])).toBeNull();
  });

  it('ranks groups by total, then count', () => {
    const ranked = rankGroups(
      [
        { plate: 'A', fee: 50 },
        { plate: 'B', fee: 100 },
        { plate: 'A', fee: 50 },
        { plate: 'C', fee: 20 }
      ],
      item => item.plate,
      item => item.fee,
      2
    );

    expect(ranked.map(group => [group.key, group.total, group.count, group.average])).toEqual([
      ['A', 100, 2, 50],
      ['B', 100, 1, 100]
    ]);
  });

  it('averages to centavos and guards against empty sets', () => {
    expect(average(1000, 3)).toBe(333.33);
    expect(average(0, 0)).toBe(0);
  });
});

describe('ReportService', () => {
  let service: ReportService;

  beforeEach(async () => {
    const repos = createMemoryRepositories();
    await seedLedger(repos);
    service = new ReportService(repos, fixedClock);
  });

  it('summarizes the current month and today', async () => {
    expect(await service.getHome()).toEqual({
      monthName: 'March 2025',
      month: { depositTotal: 1000, depositCount: 3, revenue: 150, transactionCount: 3 },
      today: { depositTotal: 300, depositCount: 1, revenue: 50 }
    });
  });

  describe('deposit analytics', () => {
    it('counts credited deposits only', async () => {
      const report = await service.getDepositAnalytics(undefined);

      expect(report.total).toBe(1000);
      expect(report.count).toBe(3);
      expect(report.average).toBe(333.33);
      expect(report.labels).toHaveLength(31);
      expect(report.dailyTotals[2]).toBe(700);
      expect(report.dailyCounts[2]).toBe(2);
      expect(report.dailyTotals[14]).toBe(300);
      expect(report.isCurrentMonth).toBe(true);
      expect(report.todayIndex).toBe(14);
    });

    it('highlights days and vehicles', async () => {
      const report = await service.getDepositAnalytics(undefined);

      expect(report.peakDay).toEqual({ date: '2025-03-03', label: 'Mar 03', value: 700 });
      expect(report.busiestDay).toEqual({ date: '2025-03-03', label: 'Mar 03', value: 2 });
      expect(report.topVehicles).toEqual([
        { licensePlate: 'TST-3001', driverName: 'Ana Reyes', total: 800, count: 2 },
        { licensePlate: 'TST-3002', driverName: 'Ben Lopez', total: 200, count: 1 }
      ]);
      expect(report.recentDeposits.map(detail => detail.amount)).toEqual([300, 200, 500]);
    });

    it('offers the months with credited deposits', async () => {
      const report = await service.getDepositAnalytics('2025-02');

      expect(report.total).toBe(400);
      expect(report.isCurrentMonth).toBe(false);
      expect(report.todayIndex).toBe(-1);
      expect(report.navigation).toMatchObject({ hasPrev: false, hasNext: true });
      expect(report.availableMonths).toEqual([
        { value: '2025-03', label: 'March 2025' },
        { value: '2025-02', label: 'February 2025' }
      ]);
    });
  });

  describe('deposits vs fees', () => {
    it('compares the month\'s deposits with its fees', async () => {
      const report = await service.getDepositsVsFees(undefined);

      expect(report.totalDeposits).toBe(1000);
      expect(report.totalFees).toBe(150);
      expect(report.net).toBe(850);
      expect(report.ratio).toBe(15);
      expect(report.ratioLabel).toBe('Revenue ÷ Deposits');
      expect(report.peakFeeDay).toEqual({ date: '2025-03-03', label: 'Mar 03', value: 100 });
      expect(report.availableMonths.map(option => option.value)).toEqual(['2025-03', '2025-02', '2024-12']);
    });

    it('reports a month without deposits', async () => {
      const report = await service.getDepositsVsFees('2024-12');

      expect(report.totalDeposits).toBe(0);
      expect(report.totalFees).toBe(50);
      expect(report.net).toBe(-50);
      expect(report.ratio).toBe(0);
      expect(report.ratioLabel).toBe('No deposits recorded');
    });

    it('exports one row per day and a total', async () => {
      const csv = await service.exportDepositsVsFeesCsv('2025-03');
      const lines = csv.content.trimEnd().split('\r\n');

      expect(csv.filename).toBe('deposit_vs_revenue_2025-03.csv');
      expect(csv.rowCount).toBe(31);
      expect(lines).toHaveLength(33);
      expect(lines[0]).toBe('Date,Day,Deposits (₱),Terminal Fees (₱),Net Balance (₱)');
      expect(lines[1]).toBe('2025-03-01,1,0.00,0.00,0.00');
      expect(lines[3]).toBe('2025-03-03,3,700.00,100.00,600.00');
      expect(lines[15]).toBe('2025-03-15,15,300.00,50.00,250.00');
      expect(lines[32]).toBe('TOTAL,,1000.00,150.00,850.00');
    });
  });

  describe('terminal fee report', () => {
    it('defaults to the latest month with fees', async () => {
      const report = await service.getProfitReport(undefined);

      expect(report.navigation.value).toBe('2025-03');
      expect(report.total).toBe(150);
      expect(report.count).toBe(3);
      expect(report.averageFee).toBe(50);
      expect(report.busiestDay).toEqual({ date: '2025-03-03', label: 'Mar 03', value: 2 });
      expect(report.topVehicles).toEqual([
        { licensePlate: 'TST-3001', driverName: 'Ana Reyes', count: 2, total: 100, average: 50 },
        { licensePlate: 'TST-3002', driverName: 'Ben Lopez', count: 1, total: 50, average: 50 }
      ]);
      expect(report.routePerformance).toEqual([
        { routeName: 'Central - North Harbor', count: 2, total: 100, average: 50 },
        { routeName: 'Unassigned', count: 1, total: 50, average: 50 }
      ]);
    });

    it('reads an older month from the archive', async () => {
      const report = await service.getProfitReport('2024-12');

      expect(report.total).toBe(50);
      expect(report.dailyRevenue[19]).toBe(50);
      expect(report.navigation).toMatchObject({ label: 'December 2024', hasPrev: false, hasNext: false });
    });

    it('exports every transaction of the month', async () => {
      const csv = await service.exportProfitCsv(undefined);
      const lines = csv.content.trimEnd().split('\r\n');

      expect(csv.filename).toBe('terminal_fee_report_2025-03.csv');
      expect(csv.rowCount).toBe(3);
      expect(lines).toEqual([
        'Transaction Date,Entry Time,Exit Time,Vehicle Plate,Driver Name,Route,Terminal Fee,Wallet Balance,Year,Month,Day',
        '2025-03-03,10:00:00,10:30:00,TST-3001,Ana Reyes,Central - North Harbor,50.00,1100.00,2025,3,3',
        '2025-03-03,15:00:00,15:30:00,TST-3002,Ben Lopez,Unassigned,50.00,100.00,2025,3,3',
        '2025-03-15,09:00:00,—,TST-3001,Ana Reyes,Central - North Harbor,50.00,1050.00,2025,3,15'
      ]);
    });
  });
});
