import express, { type Express, type RequestHandler } from 'express';
import morgan from 'morgan';
import { config } from './config';
import apiRoutes from './api/index';
import stripeRouter from './api/routes/stripe';
import { errorHandler } from './api/middleware/errorHandler';
import { bullBoardAuth } from './api/middleware/bullBoardAuth';
import { logger } from './utils/logger';
import { getMetrics } from './utils/metrics';

export interface AppOptions {
  /** Bull Board router, served behind admin auth at /admin/queues */
  queueDashboard?: RequestHandler;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }

  // Raw body for Stripe signature verification; must come before express.json()
  app.use('/api/stripe', stripeRouter);

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Prometheus metrics endpoint
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', 'text/plain; version=0.0.4');
      const metrics = await getMetrics();
      res.send(metrics);
    } catch (error) {
      logger.error('Error generating metrics:', error);
      res.status(500).send('Error generating metrics');
    }
  });

  app.use('/api', apiRoutes);

  if (options.queueDashboard) {
    app.use('/admin/queues', bullBoardAuth, options.queueDashboard);
  }

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
