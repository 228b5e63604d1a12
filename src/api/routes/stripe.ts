import express, { Router, Request, Response, NextFunction } from 'express';
import type { Router as RouterType } from 'express';
import { getReconciler } from '../../services/reconciler';
import { getStripeHealth, handleStripeWebhook, WebhookSignatureError } from '../../services/stripeService';
import { logger } from '../../utils/logger';

const router: RouterType = Router();

/**
 * GET /api/stripe/health
 * Whether webhook verification is configured
 */
router.get('/health', (_req: Request, res: Response) => {
  res.json(getStripeHealth());
});

/**
 * POST /api/stripe/webhook
 * Needs the raw body for signature verification, so this router is mounted before the
 * JSON body parser. 400 on a bad signature, 200 once the event is handled or dropped,
 * 500 on storage errors so Stripe re-delivers.
 */
router.post(
  '/webhook',
  express.raw({ type: 'application/json' }),
  async (req: Request, res: Response, next: NextFunction) => {
    const signature = req.headers['stripe-signature'];
    const rawBody: Buffer | string = Buffer.isBuffer(req.body) ? req.body : '';

    try {
      const result = await handleStripeWebhook(
        rawBody,
        typeof signature === 'string' ? signature : undefined,
        getReconciler().billingEvents
      );
      res.status(200).json(result);
    } catch (error) {
      if (error instanceof WebhookSignatureError) {
        res.status(error.statusCode).json({ error: error.message });
        return;
      }

      logger.error('stripe.webhook handling failed', {
        error: error instanceof Error ? error.message : 'unknown',
      });
      next(error);
    }
  }
);

export default router;
