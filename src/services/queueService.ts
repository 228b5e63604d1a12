import { Queue, QueueOptions } from 'bullmq';
import { getRedisClient } from '../config/redis';
import { config } from '../config';

export const MAINTENANCE_QUEUE_NAME = 'maintenance';

export const MAINTENANCE_JOBS = ['removal-sweep', 'expiry-warnings', 'heartbeat', 'event-retention'] as const;

export type MaintenanceJobName = (typeof MAINTENANCE_JOBS)[number];

export type MaintenanceTrigger = 'scheduled' | 'catch_up' | 'manual';

export interface MaintenanceJobData {
  trigger: MaintenanceTrigger;
}

export type MaintenanceQueue = Queue<MaintenanceJobData, unknown, MaintenanceJobName>;

let maintenanceQueue: MaintenanceQueue | null = null;

export function getMaintenanceQueue(): MaintenanceQueue {
  if (!maintenanceQueue) {
    const connection = getRedisClient();

    const queueOptions: QueueOptions = {
      connection,
      defaultJobOptions: config.bullmq.defaultJobOptions,
    };

    maintenanceQueue = new Queue<MaintenanceJobData, unknown, MaintenanceJobName>(
      MAINTENANCE_QUEUE_NAME,
      queueOptions
    );
  }

  return maintenanceQueue;
}

export async function closeAllQueues() {
  if (maintenanceQueue) {
    await maintenanceQueue.close();
    maintenanceQueue = null;
  }
}
