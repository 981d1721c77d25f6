/**
 * =============================================================================
 * DEPOSIT MODULE - WALLET SERVICE
 * =============================================================================
 *
 * Read side of the prepaid wallets. Balances only move through a credited
 * deposit or a terminal fee debit, both inside the repositories.
 * =============================================================================
 */

import { CREDITED_DEPOSIT_STATUSES, LIST_LIMITS } from '../../core/constants';
import { NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { driverFullName } from '../../shared/database/records';
import { Repositories, WalletBoardEntry } from '../../shared/database/repository.interface';
import { ListWalletsQuery } from './deposit.schema';

export interface WalletView {
  id: number;
  vehicleId: number;
  licensePlate: string;
  balance: number;
  isLowBalance: boolean;
  updatedAt: Date;
  lastDepositAmount: number | null;
  lastDepositAt: Date | null;
  depositCount: number;
  driver: { id: number; driverCode: string; fullName: string; licenseNumber: string };
  routeName: string | null;
}

export interface WalletListResult {
  wallets: WalletView[];
  stats: {
    walletCount: number;
    totalBalance: number;
    lowBalanceCount: number;
    totalDeposits: number;
  };
  minDepositAmount: number;
}

export interface WalletBalance {
  walletId: number;
  vehicleId: number;
  licensePlate: string;
  balance: number;
}

function toWalletView(entry: WalletBoardEntry, minDepositAmount: number): WalletView {
  const { wallet, vehicle, driver, route, lastDeposit } = entry;
  return {
    id: wallet.id,
    vehicleId: vehicle.id,
    licensePlate: vehicle.licensePlate,
    balance: wallet.balance,
    isLowBalance: wallet.balance < minDepositAmount,
    updatedAt: wallet.updatedAt,
    lastDepositAmount: lastDeposit?.amount ?? null,
    lastDepositAt: lastDeposit?.createdAt ?? null,
    depositCount: entry.depositCount,
    driver: {
      id: driver.id,
      driverCode: driver.driverCode,
      fullName: driverFullName(driver),
      licenseNumber: driver.licenseNumber
    },
    routeName: route?.name ?? null
  };
}

export class WalletService {
  constructor(private readonly repos: Repositories = db) {}

  /**
   * Wallet board: up to 80 wallets, most recently topped up first by default.
   * Balance totals cover every wallet the search matches; "low balance" means
   * below the minimum deposit amount.
   */
  async listWallets(query: ListWalletsQuery): Promise<WalletListResult> {
    const { minDepositAmount } = await this.repos.terminal.getSettings();

    const [entries, stats, credited] = await Promise.all([
      this.repos.wallets.listWallets({ search: query.search, sort: query.sort, limit: LIST_LIMITS.WALLETS }),
      this.repos.wallets.walletStats(minDepositAmount, query.search),
      this.repos.wallets.summarizeDeposits({ statuses: CREDITED_DEPOSIT_STATUSES })
    ]);

    return {
      wallets: entries.map(entry => toWalletView(entry, minDepositAmount)),
      stats: { ...stats, totalDeposits: credited.total },
      minDepositAmount
    };
  }

  async getBalance(vehicleId: number): Promise<WalletBalance> {
    const entry = await this.repos.fleet.findVehicle(vehicleId);
    if (!entry) {
      throw new NotFoundError('Vehicle not found');
    }
    if (!entry.wallet) {
      throw new NotFoundError('Wallet not found');
    }
    return {
      walletId: entry.wallet.id,
      vehicleId: entry.vehicle.id,
      licensePlate: entry.vehicle.licensePlate,
      balance: entry.wallet.balance
    };
  }
}

export const walletService = new WalletService();
