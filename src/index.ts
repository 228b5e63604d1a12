import 'dotenv/config';
import type { RequestHandler } from 'express';
import { createApp } from './app';
import { config } from './config';
import { initializeRedis } from './config/redis';
import { initializeBullBoard, getBullBoardAdapter } from './config/bullBoard';
import { initializeReconciler } from './services/reconciler';
import { logger } from './utils/logger';

const port = config.port;

async function startServer() {
  try {
    initializeReconciler();

    // Redis backs the queue dashboard and manual triggers here; the worker process runs the jobs
    await initializeRedis();
    let queueDashboard: RequestHandler | undefined;
    try {
      initializeBullBoard();
      queueDashboard = getBullBoardAdapter().getRouter();
      logger.info('Bull Board dashboard available at /admin/queues');
    } catch (error) {
      logger.error('Failed to initialize Bull Board:', error);
    }

    const app = createApp({ queueDashboard });

    app.listen(port, () => {
      logger.info(`Membership gate listening on port ${port}`);
      logger.info(`Environment: ${config.nodeEnv}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  logger.info('SIGTERM signal received: closing HTTP server');
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT signal received: closing HTTP server');
  process.exit(0);
});

void startServer();
