/**
 * =============================================================================
 * TERMINAL MODULE - SERVICE
 * =============================================================================
 *
 * Gate operations and the departure queue.
 *
 * ENTRY (QR scan):
 *   resolve vehicle → charge terminal fee → queue with departure countdown
 *   Charging, queueing and the revenue rows are one repository call.
 *
 * EXIT / DEPART:
 *   the entry leaves the queue and its archived transaction gets an exit time
 *
 * Every queue change is pushed to screens as `queue_updated`.
 * =============================================================================
 */

import { addMinutes } from 'date-fns';
import { EntryStatus, ErrorCode, VehicleStatus } from '../../core/constants';
import {
  ConflictError,
  InsufficientBalanceError,
  NotFoundError,
  UnprocessableError
} from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import {
  EntryLogRecord,
  FleetEntry,
  QueueEntry,
  SystemSettingsRecord,
  TransactionRecord,
  driverFullName
} from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { AuthUser } from '../../shared/middleware/auth.middleware';
import { logger } from '../../shared/services/logger.service';
import { QueueUpdate, socketService } from '../../shared/services/socket.service';
import {
  Clock,
  YearMonth,
  calendarKey,
  monthRange,
  systemClock,
  toCalendarDate,
  toEpochSeconds
} from '../../shared/utils/date.utils';
import {
  MonthNavigation,
  MonthOption,
  buildMonthNavigation,
  resolveMonth,
  toMonthOptions
} from '../../shared/utils/month-navigation.utils';
import { RouteView, TransitRouteService } from '../transit-route/transit-route.service';
import { UpdateSettingsInput } from './terminal.schema';

// =============================================================================
// TYPES
// =============================================================================

export type QueueStatus = 'waiting' | 'boarding';

export interface QueueItem {
  entryId: number;
  position: number;
  vehicleId: number;
  licensePlate: string;
  driverName: string;
  driverCode: string;
  routeId: number | null;
  routeName: string | null;
  feeCharged: number;
  status: QueueStatus;
  enteredAt: Date;
  boardingStartedAt: Date | null;
  departureTime: Date | null;
  /** Departure time in epoch seconds, for client countdowns */
  countdownExpiry: number | null;
}

export interface EntryResult {
  entry: QueueItem;
  transactionId: number;
  feeCharged: number;
  balance: number;
}

export interface EntryLogItem {
  id: number;
  vehicleId: number;
  licensePlate: string;
  driverName: string;
  routeName: string | null;
  status: EntryStatus;
  feeCharged: number;
  walletBalanceSnapshot: number | null;
  isActive: boolean;
  createdAt: Date;
  departedAt: Date | null;
}

export interface QueueHistory {
  entries: EntryLogItem[];
  summary: { count: number; successful: number; insufficient: number; feeTotal: number };
  navigation: MonthNavigation;
  availableMonths: MonthOption[];
}

export interface EntryFees {
  transactions: TransactionRecord[];
  total: number;
  count: number;
  navigation: MonthNavigation;
  availableMonths: MonthOption[];
}

export interface PublicQueue {
  route: RouteView | null;
  generatedAt: Date;
  entries: QueueItem[];
}

export interface TvDisplayEntry {
  position: number;
  plate: string;
  driverName: string;
  routeName: string | null;
  status: QueueStatus;
  countdownExpiry: number | null;
}

export interface TvDisplay {
  route: { id: number; name: string; slug: string } | null;
  generatedAt: Date;
  entries: TvDisplayEntry[];
}

const UNASSIGNED_ROUTE = 'Unassigned';

// =============================================================================
// HELPERS
// =============================================================================

export function toQueueItem(queued: QueueEntry, position: number): QueueItem {
  const { entry, vehicle, driver, route } = queued;
  return {
    entryId: entry.id,
    position,
    vehicleId: vehicle.id,
    licensePlate: vehicle.licensePlate,
    driverName: driverFullName(driver),
    driverCode: driver.driverCode,
    routeId: route?.id ?? null,
    routeName: route?.name ?? null,
    feeCharged: entry.feeCharged,
    status: entry.boardingStartedAt ? 'boarding' : 'waiting',
    enteredAt: entry.createdAt,
    boardingStartedAt: entry.boardingStartedAt,
    departureTime: entry.departureTime,
    countdownExpiry: entry.departureTime ? toEpochSeconds(entry.departureTime) : null
  };
}

function toEntryLogItem(queued: QueueEntry): EntryLogItem {
  const { entry, vehicle, driver, route } = queued;
  return {
    id: entry.id,
    vehicleId: vehicle.id,
    licensePlate: vehicle.licensePlate,
    driverName: driverFullName(driver),
    routeName: route?.name ?? null,
    status: entry.status,
    feeCharged: entry.feeCharged,
    walletBalanceSnapshot: entry.walletBalanceSnapshot,
    isActive: entry.isActive,
    createdAt: entry.createdAt,
    departedAt: entry.departedAt
  };
}

// =============================================================================
// SERVICE
// =============================================================================

export class TerminalService {
  private readonly routes: TransitRouteService;

  constructor(
    private readonly repos: Repositories = db,
    private readonly clock: Clock = systemClock
  ) {
    this.routes = new TransitRouteService(repos);
  }

  // ---------------------------------------------------------------------------
  // Gate
  // ---------------------------------------------------------------------------

  /**
   * Admit a vehicle: charge the terminal fee and queue it for departure
   */
  async scanEntry(actor: AuthUser, qrValue: string): Promise<EntryResult> {
    const fleetEntry = await this.resolveVehicle(qrValue);
    const { vehicle, driver, route } = fleetEntry;

    if (vehicle.status !== VehicleStatus.ACTIVE) {
      throw new UnprocessableError('Vehicle is inactive', ErrorCode.VEHICLE_INACTIVE, { vehicleId: vehicle.id });
    }

    const settings = await this.repos.terminal.getSettings();
    const at = this.clock();
    const local = toCalendarDate(at);

    const outcome = await this.repos.terminal.admitVehicle({
      vehicleId: vehicle.id,
      fee: settings.terminalFee,
      at,
      departureTime: addMinutes(at, settings.departureCountdownMinutes),
      archive: {
        vehiclePlate: vehicle.licensePlate,
        driverName: driverFullName(driver),
        routeName: route?.name ?? UNASSIGNED_ROUTE,
        transactionDate: calendarKey(local),
        transactionYear: local.year,
        transactionMonth: local.month,
        transactionDay: local.day
      }
    });

    switch (outcome.status) {
      case 'already_queued':
        throw new ConflictError('Vehicle is already in the queue', ErrorCode.ALREADY_IN_QUEUE, {
          entryId: outcome.entry.id
        });

      case 'insufficient':
        logger.warn('Terminal entry refused, insufficient balance', {
          vehicleId: vehicle.id,
          licensePlate: vehicle.licensePlate,
          balance: outcome.balance,
          fee: settings.terminalFee,
          userId: actor.userId
        });
        throw new InsufficientBalanceError(outcome.balance, settings.terminalFee);

      case 'admitted': {
        logger.info('Vehicle entered terminal', {
          entryId: outcome.entry.id,
          vehicleId: vehicle.id,
          licensePlate: vehicle.licensePlate,
          fee: outcome.entry.feeCharged,
          balance: outcome.balance,
          userId: actor.userId
        });
        await this.announce('entered', outcome.entry, fleetEntry);

        const position = await this.queuePosition(outcome.entry.id);
        return {
          entry: toQueueItem({ entry: outcome.entry, vehicle, driver, route }, position),
          transactionId: outcome.transaction.id,
          feeCharged: outcome.entry.feeCharged,
          balance: outcome.balance
        };
      }
    }
  }

  /**
   * Gate exit: the scanned vehicle leaves the queue
   */
  async scanExit(actor: AuthUser, qrValue: string): Promise<EntryLogItem> {
    const fleetEntry = await this.resolveVehicle(qrValue);
    const active = await this.repos.terminal.findActiveEntryForVehicle(fleetEntry.vehicle.id);
    if (!active) {
      throw new NotFoundError('Vehicle is not in the queue');
    }

    const departed = await this.depart(active.id);
    logger.info('Vehicle exited terminal', {
      entryId: departed.entry.id,
      licensePlate: fleetEntry.vehicle.licensePlate,
      userId: actor.userId
    });
    return toEntryLogItem(departed);
  }

  // ---------------------------------------------------------------------------
  // Queue management
  // ---------------------------------------------------------------------------

  /**
   * Boarding starts; the departure countdown restarts from now
   */
  async startBoarding(id: number): Promise<QueueItem> {
    const { departureCountdownMinutes } = await this.repos.terminal.getSettings();
    const now = this.clock();
    const updated = await this.repos.terminal.updateEntry(id, {
      boardingStartedAt: now,
      departureTime: addMinutes(now, departureCountdownMinutes)
    });
    return this.afterUpdate(id, updated, 'boarding');
  }

  async markDeparted(id: number): Promise<EntryLogItem> {
    const departed = await this.depart(id);
    return toEntryLogItem(departed);
  }

  async setDepartureTime(id: number, departureTime: Date): Promise<QueueItem> {
    const updated = await this.repos.terminal.updateEntry(id, { departureTime });
    return this.afterUpdate(id, updated, 'rescheduled');
  }

  /**
   * Vehicles waiting to depart, first in first out
   */
  async getQueue(routeId?: number): Promise<QueueItem[]> {
    const entries = await this.repos.terminal.listEntries({
      activeOnly: true,
      statuses: [EntryStatus.SUCCESS],
      routeId,
      order: 'asc'
    });
    return entries.map((entry, index) => toQueueItem(entry, index + 1));
  }

  /**
   * Every gate entry of a month, newest first
   */
  async getQueueHistory(month: string | undefined): Promise<QueueHistory> {
    const today = toCalendarDate(this.clock());
    const selected = resolveMonth(month, today);
    const range = monthRange(selected);

    const [entries, fees, months] = await Promise.all([
      this.repos.terminal.listEntries({ range, order: 'desc' }),
      this.repos.terminal.summarizeEntryFees(range),
      this.repos.terminal.entryMonths()
    ]);

    return {
      entries: entries.map(toEntryLogItem),
      summary: {
        count: entries.length,
        successful: entries.filter(({ entry }) => entry.status === EntryStatus.SUCCESS).length,
        insufficient: entries.filter(({ entry }) => entry.status === EntryStatus.INSUFFICIENT).length,
        feeTotal: fees.total
      },
      navigation: buildMonthNavigation(selected, months, today),
      availableMonths: toMonthOptions(months)
    };
  }

  /**
   * Revenue-counted fees of a month. Defaults to the latest month with fees.
   */
  async getEntryFees(month: string | undefined): Promise<EntryFees> {
    const today = toCalendarDate(this.clock());
    const months = await this.repos.terminal.transactionMonths(true);
    const selected: YearMonth = resolveMonth(month, months[0] ?? today);
    const filter = { year: selected.year, month: selected.month, revenueOnly: true };

    const [transactions, summary] = await Promise.all([
      this.repos.terminal.listTransactions(filter, 'desc'),
      this.repos.terminal.summarizeTransactions(filter)
    ]);

    return {
      transactions,
      total: summary.total,
      count: summary.count,
      navigation: buildMonthNavigation(selected, months, today),
      availableMonths: toMonthOptions(months)
    };
  }

  // ---------------------------------------------------------------------------
  // Settings
  // ---------------------------------------------------------------------------

  async getSettings(): Promise<SystemSettingsRecord> {
    return this.repos.terminal.getSettings();
  }

  async updateSettings(actor: AuthUser, input: UpdateSettingsInput): Promise<SystemSettingsRecord> {
    const settings = await this.repos.terminal.updateSettings(input);
    logger.info('System settings updated', { ...input, userId: actor.userId });
    socketService.settingsUpdated(settings);
    return settings;
  }

  // ---------------------------------------------------------------------------
  // Public screens
  // ---------------------------------------------------------------------------

  async getPublicQueue(routeSlug?: string): Promise<PublicQueue> {
    const route = await this.resolveRoute(routeSlug);
    const entries = await this.getQueue(route?.id);
    return { route, generatedAt: this.clock(), entries };
  }

  async getTvDisplay(routeSlug?: string): Promise<TvDisplay> {
    const { route, generatedAt, entries } = await this.getPublicQueue(routeSlug);
    return {
      route: route ? { id: route.id, name: route.name, slug: route.slug } : null,
      generatedAt,
      entries: entries.map(item => ({
        position: item.position,
        plate: item.licensePlate,
        driverName: item.driverName,
        routeName: item.routeName,
        status: item.status,
        countdownExpiry: item.countdownExpiry
      }))
    };
  }

  // ---------------------------------------------------------------------------

  /**
   * QR value first, typed plate number as fallback
   */
  private async resolveVehicle(value: string): Promise<FleetEntry> {
    const entry = (await this.repos.fleet.findVehicleByQrValue(value))
      ?? (await this.repos.fleet.findVehicleByPlate(value));
    if (!entry) {
      throw new NotFoundError('Vehicle not found', { qrValue: value });
    }
    return entry;
  }

  private async resolveRoute(slug: string | undefined): Promise<RouteView | null> {
    if (!slug) return null;
    const route = await this.routes.findBySlug(slug);
    if (!route) {
      throw new NotFoundError('Route not found');
    }
    return route;
  }

  private async depart(id: number): Promise<QueueEntry> {
    const departed = await this.repos.terminal.departEntry(id, this.clock());
    if (!departed) {
      throw await this.entryNotActive(id);
    }
    const queued = await this.requireEntry(id);
    await this.announce('departed', departed, queued);
    return queued;
  }

  private async afterUpdate(
    id: number,
    updated: EntryLogRecord | null,
    action: QueueUpdate['action']
  ): Promise<QueueItem> {
    if (!updated) {
      throw await this.entryNotActive(id);
    }
    const queued = await this.requireEntry(id);
    await this.announce(action, updated, queued);
    return toQueueItem(queued, await this.queuePosition(id));
  }

  private async requireEntry(id: number): Promise<QueueEntry> {
    const queued = await this.repos.terminal.findEntryById(id);
    if (!queued) {
      throw new NotFoundError('Queue entry not found');
    }
    return queued;
  }

  private async entryNotActive(id: number): Promise<Error> {
    const existing = await this.repos.terminal.findEntryById(id);
    if (!existing) {
      return new NotFoundError('Queue entry not found');
    }
    return new ConflictError('Entry is no longer in the queue', ErrorCode.ENTRY_NOT_ACTIVE, { entryId: id });
  }

  /** 1-based place in the queue; 0 once it has left */
  private async queuePosition(entryId: number): Promise<number> {
    const queue = await this.repos.terminal.listEntries({
      activeOnly: true,
      statuses: [EntryStatus.SUCCESS],
      order: 'asc'
    });
    return queue.findIndex(({ entry }) => entry.id === entryId) + 1;
  }

  private async announce(
    action: QueueUpdate['action'],
    entry: EntryLogRecord,
    fleet: Pick<FleetEntry, 'vehicle' | 'route'>
  ): Promise<void> {
    socketService.queueUpdated({
      action,
      entryId: entry.id,
      vehicleId: fleet.vehicle.id,
      routeId: fleet.route?.id ?? null,
      queueLength: await this.repos.terminal.countQueue()
    });
  }
}

export const terminalService = new TerminalService();
