import 'dotenv/config';
import { closeDatabase } from '../db';
import { initializeReconciler, type Reconciler } from '../services/reconciler';
import { DAY_MS } from '../utils/helpers';
import { logger } from '../utils/logger';

/**
 * Delete processed-event records older than EVENT_RETENTION_DAYS. The worker runs the
 * same cleanup daily; this script is for one-off runs.
 */
export async function cleanupRetention(reconciler: Reconciler, now: Date = new Date()): Promise<number> {
  const retentionDays = reconciler.config.eventRetentionDays;
  const cutoffDate = new Date(now.getTime() - retentionDays * DAY_MS);

  logger.info(`[Retention] Removing processed events older than ${retentionDays} days (before ${cutoffDate.toISOString()})`);

  return reconciler.deduplicator.purgeOlderThan(cutoffDate);
}

async function main() {
  try {
    const deleted = await cleanupRetention(initializeReconciler());
    logger.info('[Retention] Cleanup job completed successfully', { deleted });
    await closeDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('[Retention] Cleanup job failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
