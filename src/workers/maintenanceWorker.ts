import { Worker, Job } from 'bullmq';
import { getRedisClient } from '../config/redis';
import {
  MAINTENANCE_QUEUE_NAME,
  type MaintenanceJobData,
  type MaintenanceJobName,
} from '../services/queueService';
import { getReconciler, type Reconciler } from '../services/reconciler';
import { sendSlackMessage } from '../services/slackService';
import { DAY_MS } from '../utils/helpers';
import { logger } from '../utils/logger';
import { recordHeartbeat, recordJobDuration } from '../utils/metrics';

export type MaintenanceJobResult =
  | { job: 'removal-sweep'; result: Awaited<ReturnType<Reconciler['sweep']['run']>> }
  | { job: 'expiry-warnings'; result: Awaited<ReturnType<Reconciler['warnings']['run']>> }
  | { job: 'heartbeat'; at: string; gracePeriod: number }
  | { job: 'event-retention'; deleted: number };

/**
 * Run one maintenance job against the engine. Exported apart from the worker so the
 * dispatch can be exercised without Redis.
 */
export async function runMaintenanceJob(
  reconciler: Reconciler,
  name: MaintenanceJobName,
  data: MaintenanceJobData,
  now: Date = new Date()
): Promise<MaintenanceJobResult> {
  switch (name) {
    case 'removal-sweep':
      return { job: name, result: await reconciler.sweep.run(data.trigger) };

    case 'expiry-warnings':
      return { job: name, result: await reconciler.warnings.run() };

    case 'heartbeat': {
      recordHeartbeat(now);
      const gracePeriod = await reconciler.sweep.listGracePeriod();
      logger.info('[Worker] Heartbeat', { gracePeriod: gracePeriod.length, sweepRunning: reconciler.sweep.isRunning });
      return { job: name, at: now.toISOString(), gracePeriod: gracePeriod.length };
    }

    case 'event-retention': {
      const cutoff = new Date(now.getTime() - reconciler.config.eventRetentionDays * DAY_MS);
      const deleted = await reconciler.deduplicator.purgeOlderThan(cutoff);
      return { job: name, deleted };
    }
  }
}

export function createMaintenanceWorker() {
  const connection = getRedisClient();

  // Concurrency 1: scheduled jobs never overlap inside one worker
  const worker = new Worker<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName>(
    MAINTENANCE_QUEUE_NAME,
    async (job: Job<MaintenanceJobData, MaintenanceJobResult, MaintenanceJobName>) => {
      const startTime = Date.now();
      logger.info(`Processing ${job.name} job ${job.id}`, { trigger: job.data.trigger });

      try {
        const result = await runMaintenanceJob(getReconciler(), job.name, job.data);
        recordJobDuration(job.name, 'completed', Date.now() - startTime);
        return result;
      } catch (error) {
        recordJobDuration(job.name, 'failed', Date.now() - startTime);
        logger.error(`${job.name} job ${job.id} failed:`, error);
        throw error;
      }
    },
    { connection, concurrency: 1 }
  );

  worker.on('completed', (job) => {
    logger.info(`${job.name} job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`${job?.name ?? 'maintenance'} job ${job?.id} failed:`, err);
    void sendSlackMessage(`❗ Maintenance job ${job?.name ?? 'unknown'} failed: ${err.message}`);
  });

  return worker;
}
