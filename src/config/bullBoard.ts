import { createBullBoard } from '@bull-board/api';
import { BullMQAdapter } from '@bull-board/api/bullMQAdapter';
import { ExpressAdapter } from '@bull-board/express';
import { getMaintenanceQueue } from '../services/queueService';
import { logger } from '../utils/logger';

const serverAdapter = new ExpressAdapter();
serverAdapter.setBasePath('/admin/queues');

/**
 * Mount the maintenance queue on the Bull Board dashboard
 */
export function initializeBullBoard() {
  try {
    createBullBoard({
      queues: [new BullMQAdapter(getMaintenanceQueue())],
      serverAdapter,
    });

    logger.info('Bull Board initialized successfully');
    return serverAdapter;
  } catch (error) {
    logger.error('Failed to initialize Bull Board:', error);
    throw error;
  }
}

export function getBullBoardAdapter() {
  return serverAdapter;
}
