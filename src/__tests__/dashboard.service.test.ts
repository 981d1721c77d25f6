/**
 * =============================================================================
 * DASHBOARD SERVICE - Unit Tests
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
import { DashboardService } from '../modules/dashboard/dashboard.service';
import { treasurerDashboardQuerySchema } from '../modules/dashboard/dashboard.schema';
import { FIXED_NOW, actorFor, fixedClock } from './helpers/fleet';
import { Ledger, seedLedger } from './helpers/ledger';

describe('DashboardService', () => {
  let ledger: Ledger;
  let service: DashboardService;

  beforeEach(async () => {
    const repos = createMemoryRepositories();
    ledger = await seedLedger(repos);
    service = new DashboardService(repos, fixedClock);
  });

  it('totals profit for all time, the month and the year', async () => {
    expect(await service.getAdminDashboard()).toEqual({
      totalDrivers: 2,
      totalVehicles: 2,
      totalQueue: 1,
      totalProfit: 250,
      monthlyRevenue: 150,
      annualRevenue: 200,
      generatedAt: FIXED_NOW
    });
  });

  it('charts the last seven days and lists the queue', async () => {
    const live = await service.getAdminLive();

    expect(live.totalDeposits).toBe(1400);
    expect(live.totalRevenue).toBe(250);
    expect(live.chart).toEqual({
      labels: ['Mar 09', 'Mar 10', 'Mar 11', 'Mar 12', 'Mar 13', 'Mar 14', 'Mar 15'],
      values: [0, 0, 0, 0, 0, 0, 50]
    });
    expect(live.recentQueue).toEqual([
      {
        entryId: 5,
        licensePlate: 'TST-3001',
        driverName: 'Ana Reyes',
        routeName: 'Central - North Harbor',
        enteredAt: new Date('2025-03-15T01:00:00.000Z')
      }
    ]);
  });

  it('shows staff the review backlog', async () => {
    expect(await service.getStaffDashboard()).toEqual({
      totalDrivers: 2,
      totalVehicles: 2,
      totalQueue: 1,
      pendingDeposits: 1
    });
  });

  describe('treasurer dashboard', () => {
    it('covers only the treasurer\'s own requests', async () => {
      const dashboard = await service.getTreasurerDashboard(
        actorFor(ledger.treasurer),
        { year: undefined, month: undefined }
      );

      expect(dashboard.counts).toEqual({ pending: 1, approved: 1, rejected: 1 });
      expect(dashboard.recentDeposits.map(detail => detail.amount)).toEqual([1000, 200, 150]);
      expect(dashboard.monthDeposits.map(detail => detail.amount)).toEqual([1000, 200]);
      expect(dashboard.navigation).toMatchObject({ value: '2025-03', hasPrev: true, hasNext: false });
    });

    it('pages back to an earlier month', async () => {
      const dashboard = await service.getTreasurerDashboard(actorFor(ledger.treasurer), { year: 2025, month: 2 });

      expect(dashboard.monthDeposits.map(detail => detail.amount)).toEqual([150]);
      expect(dashboard.navigation).toMatchObject({ value: '2025-02', hasPrev: false, hasNext: true });
    });

    it('ignores out-of-range query values', () => {
      expect(treasurerDashboardQuerySchema.parse({ year: '2025', month: '2' })).toEqual({ year: 2025, month: 2 });
      expect(treasurerDashboardQuerySchema.parse({ year: '2025', month: '13' })).toEqual({ year: 2025, month: undefined });
    });
  });
});
