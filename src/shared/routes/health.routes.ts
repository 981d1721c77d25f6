/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 *   GET /health           200 while the process serves requests
 *   GET /health/live      liveness: pid and uptime
 *   GET /health/ready     readiness: 503 until the database answers
 *   GET /health/detailed  process, storage, queue and socket figures
 *   GET /version          build information
 *
 * Mounted outside /api/v1: no authentication, no rate limit.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import os from 'os';
import { config } from '../../config/environment';
import { DepositStatus } from '../../core/constants';
import { checkDatabaseHealth, db } from '../database/db';
import { logger } from '../services/logger.service';
import { getConnectionCount } from '../services/socket.service';
import { asyncHandler } from '../middleware/error.middleware';

const router = Router();

const bootedAt = Date.now();

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB'] as const;

const UPTIME_UNITS: ReadonlyArray<readonly [string, number]> = [
  ['d', 86400],
  ['h', 3600],
  ['m', 60]
];

function uptimeSeconds(): number {
  return Math.floor((Date.now() - bootedAt) / 1000);
}

router.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'healthy', timestamp: new Date().toISOString() });
});

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'alive', pid: process.pid, uptime: uptimeSeconds() });
});

router.get('/health/ready', asyncHandler(async (_req: Request, res: Response) => {
  const database = await checkDatabaseHealth();
  if (!database.healthy) {
    logger.warn('Readiness check failed', { driver: database.driver, error: database.error });
  }

  res.status(database.healthy ? 200 : 503).json({
    status: database.healthy ? 'ready' : 'not_ready',
    checks: { database },
    timestamp: new Date().toISOString()
  });
}));

/**
 * Queue and backlog sizes are read only when the database answered
 */
router.get('/health/detailed', asyncHandler(async (_req: Request, res: Response) => {
  const database = await checkDatabaseHealth();
  const memory = process.memoryUsage();
  const seconds = uptimeSeconds();

  const terminal = database.healthy
    ? {
        queue: await db.terminal.countQueue(),
        pendingDeposits: (await db.wallets.summarizeDeposits({ statuses: [DepositStatus.PENDING] })).count
      }
    : null;

  res.status(database.healthy ? 200 : 503).json({
    status: database.healthy ? 'healthy' : 'degraded',
    version: config.build.version,
    environment: config.nodeEnv,
    timeZone: config.timeZone,
    uptime: formatUptime(seconds),
    uptimeSeconds: seconds,
    process: {
      pid: process.pid,
      node: process.version,
      heapUsed: formatBytes(memory.heapUsed),
      rss: formatBytes(memory.rss)
    },
    host: {
      cpuCores: os.cpus().length,
      freeMemory: formatBytes(os.freemem()),
      loadAverage: os.loadavg()
    },
    database,
    terminal,
    sockets: getConnectionCount()
  });
}));

router.get('/version', (_req: Request, res: Response) => {
  res.json({
    name: 'terminal-backoffice-api',
    version: config.build.version,
    buildTime: config.build.time,
    commitHash: config.build.commitHash,
    node: process.version
  });
});

// =============================================================================
// FORMATTING
// =============================================================================

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

/** `1d 2h 3m 4s`, leaving out zero days, hours and minutes */
export function formatUptime(seconds: number): string {
  const parts: string[] = [];
  let rest = seconds;
  for (const [suffix, size] of UPTIME_UNITS) {
    const count = Math.floor(rest / size);
    rest -= count * size;
    if (count > 0) parts.push(`${count}${suffix}`);
  }
  parts.push(`${rest}s`);
  return parts.join(' ');
}

export { router as healthRoutes };
