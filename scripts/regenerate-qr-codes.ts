/**
 * Recompute every vehicle's QR value (VEH-{id}-{PLATE}) from its current plate.
 *
 * Usage:
 *   npm run qr:regenerate
 */

import { closeDatabase } from '../src/shared/database/db';
import { logger } from '../src/shared/services/logger.service';
import { vehicleService } from '../src/modules/vehicle/vehicle.service';

async function run(): Promise<void> {
  const { total, updated } = await vehicleService.regenerateQrCodes();
  if (total === 0) {
    logger.warn('No vehicles found');
    return;
  }
  logger.info(`Regenerated QR values: ${updated} changed, ${total - updated} already current`);
}

run()
  .then(() => closeDatabase())
  .catch(async (error: unknown) => {
    logger.error('QR regeneration failed', { error: error instanceof Error ? error.message : String(error) });
    await closeDatabase();
    process.exitCode = 1;
  });
