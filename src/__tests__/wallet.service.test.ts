/**
 * =============================================================================
 * WALLET SERVICE - Unit Tests
 * =============================================================================
 *
 * The wallet board: ordering, per-wallet deposit activity and the totals.
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
import { DepositStatus, PaymentMethod, UserRole } from '../core/constants';
import { NotFoundError } from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { FleetEntry } from '../shared/database/records';
import { Repositories } from '../shared/database/repository.interface';
import { WalletService } from '../modules/deposit/wallet.service';
import { ListWalletsQuery } from '../modules/deposit/deposit.schema';
import { TerminalService } from '../modules/terminal/terminal.service';
import { FIXED_NOW, actorFor, createAccount, createVehicle, fixedClock } from './helpers/fleet';

const BOARD: ListWalletsQuery = { search: undefined, sort: 'newest' };

describe('WalletService', () => {
  let repos: Repositories;
  let service: WalletService;
  let reyes: FleetEntry;

  async function deposit(entry: FleetEntry, amount: number, minutesBefore: number): Promise<void> {
    if (!entry.wallet) throw new Error('vehicle created without a wallet');
    const at = addMinutes(FIXED_NOW, -minutesBefore);
    await repos.wallets.createDeposit({
      referenceNumber: `DEP-TEST-${entry.vehicle.id}-${minutesBefore}`,
      walletId: entry.wallet.id,
      amount,
      orCode: null,
      paymentMethod: PaymentMethod.CASH,
      status: DepositStatus.SUCCESSFUL,
      createdById: null,
      approvedById: null,
      approvedAt: at,
      notes: null,
      createdAt: at
    });
  }

  async function plates(query: ListWalletsQuery): Promise<string[]> {
    return (await service.listWallets(query)).wallets.map(wallet => wallet.licensePlate);
  }

  beforeEach(async () => {
    repos = createMemoryRepositories();
    service = new WalletService(repos);

    reyes = await createVehicle(repos, { plate: 'BBB-222', firstName: 'Ben', lastName: 'Reyes' });
    const bautista = await createVehicle(repos, { plate: 'AAA-111', firstName: 'Ana', lastName: 'Bautista' });
    const dizon = await createVehicle(repos, { plate: 'CCC-333', firstName: 'Carl', lastName: 'Dizon' });
    await createVehicle(repos, { plate: 'DDD-444', firstName: 'Dan', lastName: 'Estrada' });

    await deposit(reyes, 200, 180);
    await deposit(reyes, 300, 120);
    await deposit(bautista, 80, 60);
    await deposit(dizon, 80, 30);

    // The gate fee moves BBB-222's wallet after every deposit
    const staff = actorFor(await createAccount(repos, 'staff', UserRole.STAFF_ADMIN));
    const qrValue = reyes.vehicle.qrValue;
    if (!qrValue) throw new Error('vehicle created without a QR value');
    await new TerminalService(repos, fixedClock).scanEntry(staff, qrValue);
  });

  describe('listWallets', () => {
    it('orders by last deposit, wallets without deposits last', async () => {
      expect(await plates(BOARD)).toEqual(['CCC-333', 'AAA-111', 'BBB-222', 'DDD-444']);
    });

    it('breaks balance ties by last deposit', async () => {
      expect(await plates({ ...BOARD, sort: 'largest' })).toEqual(['BBB-222', 'CCC-333', 'AAA-111', 'DDD-444']);
      expect(await plates({ ...BOARD, sort: 'smallest' })).toEqual(['DDD-444', 'CCC-333', 'AAA-111', 'BBB-222']);
    });

    it('sorts by driver surname', async () => {
      expect(await plates({ ...BOARD, sort: 'driver_asc' })).toEqual(['AAA-111', 'CCC-333', 'DDD-444', 'BBB-222']);
      expect(await plates({ ...BOARD, sort: 'driver_desc' })).toEqual(['BBB-222', 'DDD-444', 'CCC-333', 'AAA-111']);
    });

    it('reports each wallet\'s last deposit and deposit count', async () => {
      const { wallets } = await service.listWallets({ ...BOARD, sort: 'largest' });

      expect(wallets[0]).toMatchObject({
        licensePlate: 'BBB-222',
        balance: 450,
        isLowBalance: false,
        updatedAt: FIXED_NOW,
        lastDepositAmount: 300,
        lastDepositAt: addMinutes(FIXED_NOW, -120),
        depositCount: 2,
        driver: { fullName: 'Ben Reyes', driverCode: 'DRV-0001' }
      });
      expect(wallets[3]).toMatchObject({
        licensePlate: 'DDD-444',
        balance: 0,
        isLowBalance: true,
        lastDepositAmount: null,
        lastDepositAt: null,
        depositCount: 0
      });
    });

    it('totals every wallet on the board', async () => {
      const board = await service.listWallets(BOARD);

      expect(board.minDepositAmount).toBe(100);
      expect(board.stats).toEqual({
        walletCount: 4,
        totalBalance: 610,
        lowBalanceCount: 3,
        totalDeposits: 660
      });
    });

    it('totals only the wallets a search matches', async () => {
      const board = await service.listWallets({ ...BOARD, search: 'reyes' });

      expect(board.wallets.map(wallet => wallet.licensePlate)).toEqual(['BBB-222']);
      expect(board.stats).toEqual({
        walletCount: 1,
        totalBalance: 450,
        lowBalanceCount: 0,
        totalDeposits: 660
      });
    });
  });

  describe('getBalance', () => {
    it('returns the balance after the gate fee', async () => {
      expect(await service.getBalance(reyes.vehicle.id)).toMatchObject({ licensePlate: 'BBB-222', balance: 450 });
    });

    it('throws NotFoundError for an unknown vehicle', async () => {
      await expect(service.getBalance(999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
