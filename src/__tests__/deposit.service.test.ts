/**
 * =============================================================================
 * DEPOSIT SERVICE - Unit Tests
 * =============================================================================
 *
 * Direct deposits, treasurer requests and their review, monthly history and
 * the CSV export, against the in-memory repositories.
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

import { DepositStatus, ErrorCode, PaymentMethod, UserRole } from '../core/constants';
import {
  BalanceLimitError,
  ConflictError,
  DepositNotPendingError,
  NotFoundError,
  ValidationError
} from '../core/errors/AppError';
import { createMemoryRepositories } from '../shared/database/memory';
import { Repositories } from '../shared/database/repository.interface';
import { AuthUser } from '../shared/middleware/auth.middleware';
import { DepositService } from '../modules/deposit/deposit.service';
import {
  DepositHistoryQuery,
  depositHistoryQuerySchema,
  directDepositSchema
} from '../modules/deposit/deposit.schema';
import { validateSchema } from '../shared/utils/validation.utils';
import { actorFor, createAccount, createVehicle, fixedClock } from './helpers/fleet';

const HISTORY: DepositHistoryQuery = { month: undefined, sort: 'newest', search: undefined, export: undefined };

describe('DepositService', () => {
  let repos: Repositories;
  let service: DepositService;
  let admin: AuthUser;
  let treasurer: AuthUser;
  let otherTreasurer: AuthUser;
  let vehicleId: number;
  let walletId: number;

  beforeEach(async () => {
    repos = createMemoryRepositories();
    service = new DepositService(repos, fixedClock);
    admin = actorFor(await createAccount(repos, 'admin', UserRole.ADMIN));
    treasurer = actorFor(await createAccount(repos, 'treasurer', UserRole.TREASURER));
    otherTreasurer = actorFor(await createAccount(repos, 'cashier', UserRole.TREASURER));

    const entry = await createVehicle(repos, { plate: 'TST-1001', firstName: 'Maria', lastName: 'Santos' });
    vehicleId = entry.vehicle.id;
    if (!entry.wallet) throw new Error('vehicle created without a wallet');
    walletId = entry.wallet.id;
  });

  async function balance(): Promise<number | undefined> {
    return (await repos.wallets.findWalletById(walletId))?.balance;
  }

  function request(amount: number, orCode: string) {
    return service.createDepositRequest(treasurer, {
      vehicleId,
      amount,
      orCode,
      paymentMethod: PaymentMethod.CASH,
      notes: null
    });
  }

  // ===========================================================================
  // CREATION
  // ===========================================================================

  describe('creating deposits', () => {
    it('rejects amounts below the minimum deposit', async () => {
      const attempt = request(50, 'OR-0001');

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        message: 'Minimum deposit is ₱100.00',
        code: ErrorCode.BELOW_MINIMUM_DEPOSIT,
        statusCode: 400
      });
      expect(await balance()).toBe(0);
    });

    it('accepts exactly the minimum', async () => {
      const detail = await request(100, 'OR-0001');
      expect(detail.amount).toBe(100);
      expect(detail.status).toBe(DepositStatus.PENDING);
    });

    it('follows the configured minimum', async () => {
      await repos.terminal.updateSettings({ minDepositAmount: 250 });

      await expect(request(200, 'OR-0001')).rejects.toMatchObject({
        message: 'Minimum deposit is ₱250.00'
      });
    });

    it('credits a direct deposit immediately', async () => {
      const detail = await service.createDirectDeposit(admin, {
        vehicleId,
        amount: 300,
        paymentMethod: PaymentMethod.GCASH,
        notes: 'Counter top-up'
      });

      expect(detail.status).toBe(DepositStatus.APPROVED);
      expect(detail.orCode).toBeNull();
      expect(detail.wallet.balance).toBe(300);
      expect(detail.approvedBy?.username).toBe('admin');
      expect(detail.approvedAt).toEqual(fixedClock());
      expect(detail.referenceNumber).toMatch(/^DEP-20250315-[0-9A-F]{8}$/);
      expect(await balance()).toBe(300);
    });

    it('leaves the wallet alone for a treasurer request', async () => {
      const detail = await request(250, 'OR-0001');

      expect(detail.status).toBe(DepositStatus.PENDING);
      expect(detail.createdBy?.username).toBe('treasurer');
      expect(detail.approvedBy).toBeNull();
      expect(await balance()).toBe(0);
    });

    it('refuses an OR code that was already used', async () => {
      await request(250, 'OR-0001');

      const attempt = service.createDirectDeposit(admin, {
        vehicleId,
        amount: 150,
        orCode: 'OR-0001',
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({ code: ErrorCode.DUPLICATE_OR_CODE });
    });

    it('refuses a direct deposit past the largest wallet balance', async () => {
      await service.createDirectDeposit(admin, {
        vehicleId,
        amount: 9_999_999_999.99,
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      const attempt = service.createDirectDeposit(admin, {
        vehicleId,
        amount: 100,
        paymentMethod: PaymentMethod.GCASH,
        notes: null
      });
      await expect(attempt).rejects.toBeInstanceOf(BalanceLimitError);
      expect(await balance()).toBe(9_999_999_999.99);
      expect((await service.getHistory(HISTORY)).count).toBe(1);
    });

    it('throws NotFoundError for an unknown vehicle', async () => {
      const attempt = service.createDepositRequest(treasurer, {
        vehicleId: 999,
        amount: 150,
        orCode: 'OR-0001',
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ message: 'Vehicle not found' });
    });
  });

  // ===========================================================================
  // REVIEW
  // ===========================================================================

  describe('reviewing requests', () => {
    it('credits the wallet once when approved', async () => {
      const pending = await request(250, 'OR-0001');

      const approved = await service.approveDeposit(admin, pending.id, 'Checked receipt');
      expect(approved.status).toBe(DepositStatus.APPROVED);
      expect(approved.notes).toBe('Checked receipt');
      expect(approved.approvedBy?.username).toBe('admin');
      expect(approved.wallet.balance).toBe(250);

      const again = service.approveDeposit(admin, pending.id, null);
      await expect(again).rejects.toBeInstanceOf(DepositNotPendingError);
      await expect(again).rejects.toMatchObject({
        message: 'Deposit has already been approved',
        code: ErrorCode.DEPOSIT_NOT_PENDING,
        statusCode: 409
      });
      expect(await balance()).toBe(250);
    });

    it('never credits a rejected request', async () => {
      const pending = await request(250, 'OR-0001');

      const rejected = await service.rejectDeposit(admin, pending.id, 'Receipt unreadable');
      expect(rejected.status).toBe(DepositStatus.REJECTED);
      expect(rejected.notes).toBe('Receipt unreadable');
      expect(await balance()).toBe(0);

      await expect(service.approveDeposit(admin, pending.id, null)).rejects.toMatchObject({
        message: 'Deposit has already been rejected'
      });
      expect(await balance()).toBe(0);
    });

    it('credits once when two approvals race', async () => {
      const pending = await request(250, 'OR-0001');

      const results = await Promise.allSettled([
        service.approveDeposit(admin, pending.id, null),
        service.approveDeposit(admin, pending.id, null)
      ]);

      expect(results.filter(result => result.status === 'fulfilled')).toHaveLength(1);
      const failures = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []));
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(DepositNotPendingError);
      expect(await balance()).toBe(250);
    });

    it('lets only one of a racing approval and rejection through', async () => {
      const pending = await request(250, 'OR-0001');

      const results = await Promise.allSettled([
        service.approveDeposit(admin, pending.id, null),
        service.rejectDeposit(admin, pending.id, null)
      ]);

      const failures = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []));
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(DepositNotPendingError);

      const detail = await service.getDeposit(admin, pending.id);
      expect(await balance()).toBe(detail.status === DepositStatus.APPROVED ? 250 : 0);
    });

    it('leaves a request pending when approving it would overflow the wallet', async () => {
      await service.createDirectDeposit(admin, {
        vehicleId,
        amount: 9_999_999_999.99,
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });
      const pending = await request(100, 'OR-0001');

      await expect(service.approveDeposit(admin, pending.id, null)).rejects.toMatchObject({
        code: ErrorCode.BALANCE_LIMIT_EXCEEDED,
        statusCode: 422
      });
      expect((await service.getDeposit(admin, pending.id)).status).toBe(DepositStatus.PENDING);
      expect(await balance()).toBe(9_999_999_999.99);
    });

    it('keeps the original notes when the decision has none', async () => {
      const pending = await service.createDepositRequest(treasurer, {
        vehicleId,
        amount: 120,
        orCode: 'OR-0002',
        paymentMethod: PaymentMethod.BANK_TRANSFER,
        notes: 'Paid at branch'
      });

      const approved = await service.approveDeposit(admin, pending.id, null);
      expect(approved.notes).toBe('Paid at branch');
    });

    it('throws NotFoundError for an unknown deposit', async () => {
      await expect(service.approveDeposit(admin, 404, null)).rejects.toMatchObject({
        message: 'Deposit not found',
        statusCode: 404
      });
    });

    it('lists pending requests oldest first', async () => {
      const first = await request(150, 'OR-0001');
      const second = await request(200, 'OR-0002');
      await service.approveDeposit(admin, first.id, null);
      const third = await request(300, 'OR-0003');

      const pending = await service.listPending();
      expect(pending.count).toBe(2);
      expect(pending.requests.map(detail => detail.id)).toEqual([second.id, third.id]);
    });
  });

  // ===========================================================================
  // VISIBILITY
  // ===========================================================================

  describe('visibility', () => {
    it('hides other treasurers\' requests', async () => {
      const pending = await request(150, 'OR-0001');

      await expect(service.getDeposit(otherTreasurer, pending.id)).rejects.toBeInstanceOf(NotFoundError);
      expect((await service.getDeposit(treasurer, pending.id)).id).toBe(pending.id);
      expect((await service.getDeposit(admin, pending.id)).id).toBe(pending.id);
    });

    it('lists only the caller\'s own requests', async () => {
      const mine = await request(150, 'OR-0001');
      await service.createDepositRequest(otherTreasurer, {
        vehicleId,
        amount: 150,
        orCode: 'OR-0002',
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      const own = await service.listMyRequests(treasurer);
      expect(own.map(detail => detail.id)).toEqual([mine.id]);
      expect(await service.listMyRequests(treasurer, DepositStatus.APPROVED)).toEqual([]);
    });
  });

  // ===========================================================================
  // HISTORY
  // ===========================================================================

  describe('history', () => {
    beforeEach(async () => {
      await service.createDirectDeposit(admin, {
        vehicleId,
        amount: 300,
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });
      await request(200, 'OR-0001');
      const rejected = await request(150, 'OR-0002');
      await service.rejectDeposit(admin, rejected.id, null);
    });

    it('counts every status but totals credited deposits only', async () => {
      const history = await service.getHistory(HISTORY);

      expect(history.count).toBe(3);
      expect(history.total).toBe(300);
      expect(history.deposits).toHaveLength(3);
      expect(history.navigation).toMatchObject({
        value: '2025-03',
        label: 'March 2025',
        hasPrev: false,
        hasNext: false,
        isCurrentMonth: true
      });
      expect(history.availableMonths).toEqual([{ value: '2025-03', label: 'March 2025' }]);
    });

    it('sorts by amount on request', async () => {
      const history = await service.getHistory({ ...HISTORY, sort: 'largest' });
      expect(history.deposits.map(detail => detail.amount)).toEqual([300, 200, 150]);
    });

    it('sorts by driver name, newest first within a driver', async () => {
      const other = await createVehicle(repos, { plate: 'TST-2002', firstName: 'Ana', lastName: 'Bautista' });
      await service.createDirectDeposit(admin, {
        vehicleId: other.vehicle.id,
        amount: 500,
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      const ascending = await service.getHistory({ ...HISTORY, sort: 'driver_asc' });
      expect(ascending.deposits.map(detail => detail.amount)).toEqual([500, 150, 200, 300]);

      const descending = await service.getHistory({ ...HISTORY, sort: 'driver_desc' });
      expect(descending.deposits.map(detail => detail.amount)).toEqual([150, 200, 300, 500]);
    });

    it('searches by license number and driver code', async () => {
      const other = await createVehicle(repos, { plate: 'TST-2002', lastName: 'Bautista', license: 'N01-23-456789' });
      await service.createDirectDeposit(admin, {
        vehicleId: other.vehicle.id,
        amount: 500,
        paymentMethod: PaymentMethod.CASH,
        notes: null
      });

      const byLicense = await service.getHistory({ ...HISTORY, search: 'n01-23' });
      expect(byLicense.deposits.map(detail => detail.amount)).toEqual([500]);

      const byCode = await service.getHistory({ ...HISTORY, search: 'DRV-0001' });
      expect(byCode.count).toBe(3);
      expect(byCode.total).toBe(300);
    });

    it('returns an empty month', async () => {
      const history = await service.getHistory({ ...HISTORY, month: '2025-02' });

      expect(history.count).toBe(0);
      expect(history.total).toBe(0);
      expect(history.navigation.hasNext).toBe(true);
      expect(history.navigation.isCurrentMonth).toBe(false);
    });

    it('exports the month as CSV', async () => {
      const csv = await service.exportHistoryCsv({ ...HISTORY, sort: 'smallest' });
      const lines = csv.content.trimEnd().split('\r\n');

      expect(csv.filename).toBe('deposits_2025_03.csv');
      expect(csv.rowCount).toBe(3);
      expect(lines[0]).toBe('Reference Number,Date & Time,Driver Name,License Plate,Amount,Payment Method,Status,Processed By');
      expect(lines[1]).toMatch(/^DEP-20250315-[0-9A-F]{8},2025-03-15 10:00,Maria Santos,TST-1001,₱150\.00,CASH,Rejected,treasurer$/);
      expect(lines[3]).toMatch(/,₱300\.00,CASH,Approved,admin$/);
    });
  });

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  describe('lookups', () => {
    it('checks OR codes', async () => {
      await request(150, 'OR-0001');

      expect(await service.validateOrCode('  ')).toEqual({ valid: false, message: 'OR code is required' });
      expect(await service.validateOrCode('or-0001')).toEqual({ valid: false, message: 'OR code already used' });
      expect(await service.validateOrCode('or-0002')).toEqual({ valid: true, message: 'OR code is available' });
      expect(await service.validateOrCode('x')).toEqual({
        valid: false,
        message: 'OR code must be at least 3 characters'
      });
    });

    it('searches drivers from two characters on', async () => {
      expect(await service.searchDrivers('m')).toEqual([]);

      const results = await service.searchDrivers('santos');
      expect(results).toEqual([{
        vehicleId,
        licensePlate: 'TST-1001',
        driverName: 'Maria Santos',
        driverCode: 'DRV-0001',
        licenseNumber: 'LIC-TST-1001',
        balance: 0,
        routeName: null,
        display: 'Maria Santos · TST-1001'
      }]);
    });
  });
});

describe('deposit schemas', () => {
  it('rejects an amount no wallet column can store', () => {
    let thrown: unknown;
    try {
      validateSchema(directDepositSchema, { vehicleId: 1, amount: 1e12 });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    expect(thrown).toMatchObject({ errors: [{ field: 'amount', message: 'Amount is too large' }] });
  });

  it('keeps the driver sorts for history', () => {
    expect(validateSchema(depositHistoryQuerySchema, { sort: 'driver_asc' }).sort).toBe('driver_asc');
    expect(validateSchema(depositHistoryQuerySchema, { sort: 'driver_desc' }).sort).toBe('driver_desc');
    expect(validateSchema(depositHistoryQuerySchema, { sort: 'sideways' }).sort).toBe('newest');
  });

  it('falls back to the default month for years before 1900', () => {
    expect(validateSchema(depositHistoryQuerySchema, { month: '0099-05' }).month).toBeUndefined();
  });
});
