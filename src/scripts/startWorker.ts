import 'dotenv/config';
import { closeDatabase } from '../db';
import { closeRedis, initializeRedis } from '../config/redis';
import { closeAllQueues, getMaintenanceQueue } from '../services/queueService';
import { initializeReconciler } from '../services/reconciler';
import { enqueueCatchUpJobs, registerJobSchedulers } from '../services/schedulerService';
import { isValidTimeZone } from '../utils/time';
import { createMaintenanceWorker } from '../workers/maintenanceWorker';
import { logger } from '../utils/logger';

async function main() {
  try {
    logger.info('=== Starting Maintenance Worker ===');

    const reconciler = initializeReconciler();
    if (!isValidTimeZone(reconciler.config.timezone)) {
      throw new Error(`Invalid TIMEZONE: ${reconciler.config.timezone}`);
    }

    await initializeRedis();
    logger.info('Redis connected');

    const queue = getMaintenanceQueue();
    await registerJobSchedulers(queue, reconciler.config);
    await enqueueCatchUpJobs(queue, reconciler.config);

    const worker = createMaintenanceWorker();
    logger.info('Maintenance worker started and waiting for jobs...');

    const shutdown = async () => {
      logger.info('Shutting down maintenance worker...');
      await worker.close();
      await closeAllQueues();
      await closeRedis();
      await closeDatabase();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());
  } catch (error) {
    logger.error('Failed to start maintenance worker:', error);
    process.exit(1);
  }
}

void main();
