/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// USER ROLES
// =============================================================================

/**
 * Back office roles
 */
export enum UserRole {
  ADMIN = 'admin',
  STAFF_ADMIN = 'staff_admin',
  TREASURER = 'treasurer'
}

export const ALL_ROLES: readonly UserRole[] = [UserRole.ADMIN, UserRole.STAFF_ADMIN, UserRole.TREASURER];

/** Roles allowed to run the terminal and approve deposits */
export const MANAGER_ROLES: readonly UserRole[] = [UserRole.ADMIN, UserRole.STAFF_ADMIN];

export const ROLE_DISPLAY_NAMES: Record<UserRole, string> = {
  [UserRole.ADMIN]: 'Administrator',
  [UserRole.STAFF_ADMIN]: 'Staff Admin',
  [UserRole.TREASURER]: 'Treasurer'
};

/**
 * Home dashboard returned at login
 */
export const ROLE_DASHBOARDS: Record<UserRole, string> = {
  [UserRole.ADMIN]: '/dashboard/admin',
  [UserRole.STAFF_ADMIN]: '/dashboard/staff',
  [UserRole.TREASURER]: '/dashboard/treasurer'
};

// =============================================================================
// DEPOSIT STATUS
// =============================================================================

/**
 * Deposit lifecycle states
 */
export enum DepositStatus {
  PENDING = 'pending',       // Treasurer request awaiting review
  APPROVED = 'approved',     // Reviewed and credited
  REJECTED = 'rejected',     // Reviewed, never credited
  SUCCESSFUL = 'successful'  // Legacy credited status
}

/**
 * Allowed status transitions
 */
export const DEPOSIT_STATUS_TRANSITIONS: Record<DepositStatus, DepositStatus[]> = {
  [DepositStatus.PENDING]: [DepositStatus.APPROVED, DepositStatus.REJECTED],
  [DepositStatus.APPROVED]: [],
  [DepositStatus.REJECTED]: [],
  [DepositStatus.SUCCESSFUL]: []
};

/** Statuses whose amount has been added to the wallet */
export const CREDITED_DEPOSIT_STATUSES: readonly DepositStatus[] = [
  DepositStatus.APPROVED,
  DepositStatus.SUCCESSFUL
];

export function canTransitionDeposit(from: DepositStatus, to: DepositStatus): boolean {
  return DEPOSIT_STATUS_TRANSITIONS[from].includes(to);
}

export function isCreditedStatus(status: DepositStatus): boolean {
  return CREDITED_DEPOSIT_STATUSES.includes(status);
}

export enum PaymentMethod {
  CASH = 'cash',
  GCASH = 'gcash',
  BANK_TRANSFER = 'bank_transfer'
}

// =============================================================================
// FLEET
// =============================================================================

export enum VehicleStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive'
}

export enum VehicleType {
  JEEPNEY = 'jeepney',
  VAN = 'van',
  BUS = 'bus',
  OTHER = 'other'
}

export const LICENSE_TYPE_PROFESSIONAL = 'professional';

/** Earliest accepted vehicle year model */
export const MIN_YEAR_MODEL = 1886;

// =============================================================================
// TERMINAL
// =============================================================================

export enum EntryStatus {
  SUCCESS = 'success',
  INSUFFICIENT = 'insufficient',
  FAILED = 'failed'
}

export const DEFAULT_SYSTEM_SETTINGS = {
  minDepositAmount: 100,
  terminalFee: 50,
  departureCountdownMinutes: 15
} as const;

// =============================================================================
// LIST LIMITS
// =============================================================================

export const LIST_LIMITS = {
  WALLETS: 80,
  DEPOSIT_HISTORY: 200,
  DRIVER_SEARCH: 10,
  RECENT: 10,
  TOP_DEPOSIT_VEHICLES: 5,
  TOP_FEE_VEHICLES: 10,
  ROUTE_PERFORMANCE: 10,
  PROFIT_CHART_DAYS: 7
} as const;

// =============================================================================
// API
// =============================================================================

export const API_PREFIX = '/api/v1';

/**
 * Socket.IO event names
 */
export const SOCKET_EVENTS = {
  CONNECTED: 'connected',
  QUEUE_UPDATED: 'queue_updated',
  DEPOSIT_UPDATED: 'deposit_updated',
  SETTINGS_UPDATED: 'settings_updated'
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

export enum ErrorCode {
  // Auth
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  TOKEN_EXPIRED = 'TOKEN_EXPIRED',
  INVALID_TOKEN = 'INVALID_TOKEN',
  FORBIDDEN = 'FORBIDDEN',

  // Users
  USERNAME_TAKEN = 'USERNAME_TAKEN',

  // Fleet
  LICENSE_TAKEN = 'LICENSE_TAKEN',
  PLATE_TAKEN = 'PLATE_TAKEN',
  DRIVER_HAS_VEHICLE = 'DRIVER_HAS_VEHICLE',
  ROUTE_NAME_TAKEN = 'ROUTE_NAME_TAKEN',

  // Deposits
  DUPLICATE_OR_CODE = 'DUPLICATE_OR_CODE',
  DEPOSIT_NOT_PENDING = 'DEPOSIT_NOT_PENDING',
  BELOW_MINIMUM_DEPOSIT = 'BELOW_MINIMUM_DEPOSIT',
  BALANCE_LIMIT_EXCEEDED = 'BALANCE_LIMIT_EXCEEDED',

  // Terminal
  VEHICLE_INACTIVE = 'VEHICLE_INACTIVE',
  ALREADY_IN_QUEUE = 'ALREADY_IN_QUEUE',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  ENTRY_NOT_ACTIVE = 'ENTRY_NOT_ACTIVE',

  // General
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}
