/**
 * =============================================================================
 * TERMINAL SERVICE - Unit Tests
 * =============================================================================
 *
 * Gate entry charging, the departure queue, exits and the revenue archive.
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

import { addMinutes } from 'date-fns';
import {
  DepositStatus,
  EntryStatus,
  ErrorCode,
  PaymentMethod,
  UserRole,
  VehicleStatus
} from '../core/constants';
import {
  ConflictError,
  InsufficientBalanceError,
  NotFoundError,
  UnprocessableError
} from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { FleetEntry } from '../shared/database/records';
import { Repositories } from '../shared/database/repository.interface';
import { AuthUser } from '../shared/middleware/auth.middleware';
import { TerminalService } from '../modules/terminal/terminal.service';
import { FIXED_NOW, actorFor, createAccount, createVehicle } from './helpers/fleet';

describe('TerminalService', () => {
  let repos: Repositories;
  let service: TerminalService;
  let staff: AuthUser;
  let now: Date;
  let harbor: FleetEntry;
  let hillside: FleetEntry;

  async function fund(entry: FleetEntry, amount: number): Promise<void> {
    if (!entry.wallet) throw new Error('vehicle created without a wallet');
    await repos.wallets.createDeposit({
      referenceNumber: `DEP-TEST-${entry.vehicle.id}-${amount}`,
      walletId: entry.wallet.id,
      amount,
      orCode: null,
      paymentMethod: PaymentMethod.CASH,
      status: DepositStatus.SUCCESSFUL,
      createdById: null,
      approvedById: null,
      approvedAt: now,
      notes: null,
      createdAt: now
    });
  }

  function qr(entry: FleetEntry): string {
    if (!entry.vehicle.qrValue) throw new Error('vehicle created without a QR value');
    return entry.vehicle.qrValue;
  }

  beforeEach(async () => {
    now = FIXED_NOW;
    repos = createMemoryRepositories();
    service = new TerminalService(repos, () => now);
    staff = actorFor(await createAccount(repos, 'staff', UserRole.STAFF_ADMIN));

    const northHarbor = await repos.fleet.createRoute({
      name: 'Central - North Harbor',
      origin: 'Central',
      destination: 'North Harbor',
      baseFare: 50,
      isActive: true
    });
    const hill = await repos.fleet.createRoute({
      name: 'Central - Hillside',
      origin: 'Central',
      destination: 'Hillside',
      baseFare: 45,
      isActive: true
    });

    harbor = await createVehicle(repos, { plate: 'TST-2001', firstName: 'Ana', lastName: 'Reyes', routeId: northHarbor.id });
    hillside = await createVehicle(repos, { plate: 'TST-2002', firstName: 'Ben', lastName: 'Lopez', routeId: hill.id });
  });

  // ===========================================================================
  // ENTRY
  // ===========================================================================

  describe('scanEntry', () => {
    it('charges the terminal fee and queues the vehicle', async () => {
      await fund(harbor, 500);

      const result = await service.scanEntry(staff, qr(harbor));

      expect(qr(harbor)).toBe('VEH-1-TST-2001');
      expect(result.feeCharged).toBe(50);
      expect(result.balance).toBe(450);
      expect(result.entry).toMatchObject({
        position: 1,
        licensePlate: 'TST-2001',
        driverName: 'Ana Reyes',
        routeName: 'Central - North Harbor',
        status: 'waiting',
        departureTime: addMinutes(FIXED_NOW, 15),
        countdownExpiry: Math.floor(FIXED_NOW.getTime() / 1000) + 15 * 60
      });
      expect((await repos.wallets.findWalletByVehicleId(harbor.vehicle.id))?.balance).toBe(450);
    });

    it('archives the visit and books the profit on the local day', async () => {
      await fund(harbor, 500);
      const result = await service.scanEntry(staff, qr(harbor));

      const [transaction] = await repos.terminal.listTransactions({}, 'asc');
      expect(transaction).toMatchObject({
        id: result.transactionId,
        vehiclePlate: 'TST-2001',
        driverName: 'Ana Reyes',
        routeName: 'Central - North Harbor',
        feeCharged: 50,
        walletBalanceSnapshot: 450,
        transactionDate: '2025-03-15',
        transactionYear: 2025,
        transactionMonth: 3,
        transactionDay: 15,
        exitTimestamp: null,
        isRevenueCounted: true
      });
      expect(await repos.terminal.sumProfit('2025-03-15', '2025-03-15')).toBe(50);
    });

    it('uses the fee from the settings', async () => {
      await fund(harbor, 500);
      await repos.terminal.updateSettings({ terminalFee: 75, departureCountdownMinutes: 30 });

      const result = await service.scanEntry(staff, qr(harbor));

      expect(result.feeCharged).toBe(75);
      expect(result.balance).toBe(425);
      expect(result.entry.departureTime).toEqual(addMinutes(FIXED_NOW, 30));
    });

    it('accepts a typed plate number', async () => {
      await fund(harbor, 500);
      const result = await service.scanEntry(staff, 'TST-2001');
      expect(result.entry.vehicleId).toBe(harbor.vehicle.id);
    });

    it('refuses a vehicle already in the queue', async () => {
      await fund(harbor, 500);
      await service.scanEntry(staff, qr(harbor));

      const again = service.scanEntry(staff, qr(harbor));
      await expect(again).rejects.toBeInstanceOf(ConflictError);
      await expect(again).rejects.toMatchObject({ code: ErrorCode.ALREADY_IN_QUEUE });
      expect((await repos.wallets.findWalletByVehicleId(harbor.vehicle.id))?.balance).toBe(450);
    });

    it('logs an insufficient entry and charges nothing', async () => {
      await fund(harbor, 30);

      const attempt = service.scanEntry(staff, qr(harbor));
      await expect(attempt).rejects.toBeInstanceOf(InsufficientBalanceError);
      await expect(attempt).rejects.toMatchObject({
        code: ErrorCode.INSUFFICIENT_BALANCE,
        statusCode: 422,
        details: { balance: 30, required: 50 }
      });

      expect((await repos.wallets.findWalletByVehicleId(harbor.vehicle.id))?.balance).toBe(30);
      expect(await repos.terminal.countQueue()).toBe(0);
      expect(await repos.terminal.sumProfit()).toBe(0);

      const history = await service.getQueueHistory(undefined);
      expect(history.summary).toEqual({ count: 1, successful: 0, insufficient: 1, feeTotal: 0 });
      expect(history.entries[0]).toMatchObject({
        status: EntryStatus.INSUFFICIENT,
        feeCharged: 0,
        walletBalanceSnapshot: 30,
        isActive: false
      });
    });

    it('refuses an inactive vehicle', async () => {
      await fund(harbor, 500);
      await repos.fleet.updateVehicle(harbor.vehicle.id, { status: VehicleStatus.INACTIVE });

      const attempt = service.scanEntry(staff, qr(harbor));
      await expect(attempt).rejects.toBeInstanceOf(UnprocessableError);
      await expect(attempt).rejects.toMatchObject({ code: ErrorCode.VEHICLE_INACTIVE });
    });

    it('throws NotFoundError for an unknown QR value', async () => {
      await expect(service.scanEntry(staff, 'VEH-99-NOPE')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ===========================================================================
  // QUEUE
  // ===========================================================================

  describe('queue', () => {
    beforeEach(async () => {
      await fund(harbor, 500);
      await fund(hillside, 500);
      await service.scanEntry(staff, qr(harbor));
      now = addMinutes(FIXED_NOW, 5);
      await service.scanEntry(staff, qr(hillside));
    });

    it('lists vehicles first in first out', async () => {
      const queue = await service.getQueue();
      expect(queue.map(item => [item.position, item.licensePlate])).toEqual([
        [1, 'TST-2001'],
        [2, 'TST-2002']
      ]);
    });

    it('filters by route', async () => {
      const queue = await service.getQueue(hillside.vehicle.routeId ?? undefined);
      expect(queue.map(item => [item.position, item.licensePlate])).toEqual([[1, 'TST-2002']]);
    });

    it('restarts the countdown when boarding starts', async () => {
      const [first] = await service.getQueue();
      now = addMinutes(FIXED_NOW, 8);

      const boarding = await service.startBoarding(first.entryId);

      expect(boarding.status).toBe('boarding');
      expect(boarding.boardingStartedAt).toEqual(now);
      expect(boarding.departureTime).toEqual(addMinutes(now, 15));
      expect(boarding.position).toBe(1);
    });

    it('moves the next vehicle up after an exit', async () => {
      now = addMinutes(FIXED_NOW, 20);
      const exited = await service.scanExit(staff, qr(harbor));

      expect(exited).toMatchObject({ licensePlate: 'TST-2001', isActive: false, departedAt: now });
      const queue = await service.getQueue();
      expect(queue.map(item => [item.position, item.licensePlate])).toEqual([[1, 'TST-2002']]);

      const [transaction] = await repos.terminal.listTransactions({}, 'asc');
      expect(transaction.exitTimestamp).toEqual(now);
    });

    it('refuses to depart an entry twice', async () => {
      const [first] = await service.getQueue();
      await service.markDeparted(first.entryId);

      const again = service.markDeparted(first.entryId);
      await expect(again).rejects.toBeInstanceOf(ConflictError);
      await expect(again).rejects.toMatchObject({ code: ErrorCode.ENTRY_NOT_ACTIVE });
    });

    it('reports an exit for a vehicle that is not queued', async () => {
      await service.scanExit(staff, qr(harbor));
      await expect(service.scanExit(staff, qr(harbor))).rejects.toMatchObject({
        message: 'Vehicle is not in the queue'
      });
    });

    it('reschedules a departure', async () => {
      const [, second] = await service.getQueue();
      const departure = addMinutes(FIXED_NOW, 45);

      const item = await service.setDepartureTime(second.entryId, departure);
      expect(item.departureTime).toEqual(departure);
      expect(item.countdownExpiry).toBe(Math.floor(departure.getTime() / 1000));
    });

    it('shows the route queue on the public screen', async () => {
      const screen = await service.getTvDisplay('central-hillside');

      expect(screen.route).toEqual({ id: hillside.vehicle.routeId, name: 'Central - Hillside', slug: 'central-hillside' });
      expect(screen.generatedAt).toEqual(now);
      expect(screen.entries).toEqual([{
        position: 1,
        plate: 'TST-2002',
        driverName: 'Ben Lopez',
        routeName: 'Central - Hillside',
        status: 'waiting',
        countdownExpiry: Math.floor(addMinutes(now, 15).getTime() / 1000)
      }]);
    });

    it('throws NotFoundError for an unknown route slug', async () => {
      await expect(service.getPublicQueue('nowhere')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('totals the month\'s fees', async () => {
      const fees = await service.getEntryFees(undefined);

      expect(fees.total).toBe(100);
      expect(fees.count).toBe(2);
      expect(fees.transactions.map(tx => tx.vehiclePlate)).toEqual(['TST-2002', 'TST-2001']);
      expect(fees.navigation.label).toBe('March 2025');
    });
  });
});
