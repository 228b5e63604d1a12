import express, { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { pickState } from '../../services/eventReducer';
import { getMaintenanceQueue } from '../../services/queueService';
import { getReconciler } from '../../services/reconciler';
import { enqueueManualRun } from '../../services/schedulerService';
import { WhitelistError } from '../../services/whitelistService';
import { PLAN_TYPES, SUBSCRIPTION_STATUSES, normalizeEmail, type SubscriptionState } from '../../types/subscription';
import { logger } from '../../utils/logger';
import { HttpError } from '../middleware/errorHandler';
import { parseBasicAuth } from '../middleware/adminAuth';

const router: Router = Router();

const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const subscriptionListSchema = paginationSchema.extend({
  status: z.enum(SUBSCRIPTION_STATUSES).optional(),
});

const memberIdSchema = z.string().regex(/^\d+$/, 'must be digits');

const subscriptionBodySchema = z.object({
  email: z.string().email(),
  fullName: z.string().nullable().optional(),
  memberId: memberIdSchema.nullable().optional(),
  plan: z.enum(PLAN_TYPES).nullable().optional(),
  status: z.enum(SUBSCRIPTION_STATUSES).optional(),
  expiresAt: z.coerce.date().nullable().optional(),
  stripeCustomerId: z.string().nullable().optional(),
  stripeSubscriptionId: z.string().nullable().optional(),
});

const subscriptionPatchSchema = subscriptionBodySchema.partial();

const whitelistBodySchema = z.object({
  memberId: z.union([z.string(), z.number()]).transform((value) => String(value)),
  email: z.string().email().nullable().optional(),
  reason: z.string().optional(),
});

const removalLogQuerySchema = paginationSchema.extend({
  runId: z.string().optional(),
  subscriptionId: z.coerce.number().int().optional(),
});

const notificationLogQuerySchema = paginationSchema.extend({
  subscriptionId: z.coerce.number().int().optional(),
});

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) {
    throw new HttpError(400, 'Invalid subscription id');
  }
  return id;
}

function adminName(req: Request): string {
  return parseBasicAuth(req.headers.authorization)?.username ?? 'admin';
}

// ===== Subscriptions =====

/**
 * GET /api/admin/subscriptions?status=&limit=&offset=
 */
router.get('/subscriptions', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = subscriptionListSchema.parse(req.query);
    const subscriptions = await getReconciler().repositories.subscriptions.list(query);
    res.json({ total: subscriptions.length, limit: query.limit, offset: query.offset, subscriptions });
  } catch (error) {
    next(error);
  }
});

router.get('/subscriptions/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const subscription = await getReconciler().repositories.subscriptions.findById(parseId(req.params.id));
    if (!subscription) {
      throw new HttpError(404, 'Subscription not found');
    }
    res.json(subscription);
  } catch (error) {
    next(error);
  }
});

/**
 * POST /api/admin/subscriptions
 * Manual entry for members who paid outside Stripe. One record per email.
 */
router.post('/subscriptions', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = subscriptionBodySchema.parse(req.body);
    const { subscriptions } = getReconciler().repositories;

    const email = normalizeEmail(body.email);
    if (await subscriptions.findByEmail(email)) {
      throw new HttpError(409, 'A subscription with this email already exists');
    }

    const created = await subscriptions.create({
      email,
      fullName: body.fullName ?? null,
      memberId: body.memberId ?? null,
      stripeCustomerId: body.stripeCustomerId ?? null,
      stripeSessionId: null,
      stripeSubscriptionId: body.stripeSubscriptionId ?? null,
      lastInvoiceId: null,
      plan: body.plan ?? null,
      status: body.status ?? 'active',
      expiresAt: body.expiresAt ?? null,
    });

    logger.info(`[Admin] Subscription ${created.id} created`, { by: adminName(req) });
    res.status(201).json(created);
  } catch (error) {
    next(error);
  }
});

/**
 * PATCH /api/admin/subscriptions/:id
 * Setting status to manually_removed takes the record out of billing updates until
 * the next paid invoice.
 */
router.patch('/subscriptions/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const patch = subscriptionPatchSchema.parse(req.body);
    const { subscriptions } = getReconciler().repositories;

    const existing = await subscriptions.findById(id);
    if (!existing) {
      throw new HttpError(404, 'Subscription not found');
    }

    const updatedState: SubscriptionState = { ...pickState(existing) };
    if (patch.email !== undefined) updatedState.email = normalizeEmail(patch.email);
    if (patch.fullName !== undefined) updatedState.fullName = patch.fullName;
    if (patch.memberId !== undefined) updatedState.memberId = patch.memberId;
    if (patch.plan !== undefined) updatedState.plan = patch.plan;
    if (patch.status !== undefined) updatedState.status = patch.status;
    if (patch.expiresAt !== undefined) updatedState.expiresAt = patch.expiresAt;
    if (patch.stripeCustomerId !== undefined) updatedState.stripeCustomerId = patch.stripeCustomerId;
    if (patch.stripeSubscriptionId !== undefined) updatedState.stripeSubscriptionId = patch.stripeSubscriptionId;

    const updated = await subscriptions.update(id, updatedState);
    logger.info(`[Admin] Subscription ${id} updated`, { by: adminName(req), fields: Object.keys(patch) });
    res.json(updated);
  } catch (error) {
    next(error);
  }
});

router.delete('/subscriptions/:id', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const id = parseId(req.params.id);
    const deleted = await getReconciler().repositories.subscriptions.delete(id);
    if (!deleted) {
      throw new HttpError(404, 'Subscription not found');
    }
    logger.info(`[Admin] Subscription ${id} deleted`, { by: adminName(req) });
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

// ===== Whitelist =====

router.get('/whitelist', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const entries = await getReconciler().whitelist.list();
    res.json({ total: entries.length, entries });
  } catch (error) {
    next(error);
  }
});

router.post('/whitelist', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const body = whitelistBodySchema.parse(req.body);
    const entry = await getReconciler().whitelist.add({ ...body, addedBy: adminName(req) });
    res.status(201).json(entry);
  } catch (error) {
    next(error instanceof WhitelistError ? new HttpError(400, error.message) : error);
  }
});

/**
 * POST /api/admin/whitelist/import
 * text/csv body with a `member_id,email,reason` header
 */
router.post(
  '/whitelist/import',
  express.text({ type: ['text/csv', 'text/plain'], limit: '1mb' }),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (typeof req.body !== 'string' || req.body.trim() === '') {
        throw new HttpError(400, 'Expected a text/csv body');
      }
      const result = await getReconciler().whitelist.importCsv(req.body, adminName(req));
      res.json(result);
    } catch (error) {
      next(error instanceof WhitelistError ? new HttpError(400, error.message) : error);
    }
  }
);

router.delete('/whitelist/:memberId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const removed = await getReconciler().whitelist.remove(req.params.memberId);
    if (!removed) {
      throw new HttpError(404, 'Whitelist entry not found');
    }
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

// ===== Logs =====

router.get('/logs/removals', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = removalLogQuerySchema.parse(req.query);
    const entries = await getReconciler().logs.listRemovals(query);
    res.json({ total: entries.length, entries });
  } catch (error) {
    next(error);
  }
});

router.get('/logs/notifications', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const query = notificationLogQuerySchema.parse(req.query);
    const entries = await getReconciler().logs.listNotifications(query);
    res.json({ total: entries.length, entries });
  } catch (error) {
    next(error);
  }
});

router.get('/logs/last-run', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const summary = await getReconciler().logs.lastRunSummary();
    if (!summary) {
      throw new HttpError(404, 'No sweep has logged anything yet');
    }
    res.json(summary);
  } catch (error) {
    next(error);
  }
});

// ===== Sweep & warnings =====

/**
 * POST /api/admin/sweep
 * Queues a sweep for the maintenance worker: 202 when queued, 409 when one is already
 * running or waiting.
 */
router.post('/sweep', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await enqueueManualRun(getMaintenanceQueue(), 'removal-sweep', adminName(req));
    res.status(result.status === 'queued' ? 202 : 409).json(result);
  } catch (error) {
    next(error);
  }
});

router.post('/warnings', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const result = await enqueueManualRun(getMaintenanceQueue(), 'expiry-warnings', adminName(req));
    res.status(result.status === 'queued' ? 202 : 409).json(result);
  } catch (error) {
    next(error);
  }
});

router.get('/grace-period', async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const reconciler = getReconciler();
    const entries = await reconciler.sweep.listGracePeriod();
    res.json({ gracePeriodDays: reconciler.config.gracePeriodDays, total: entries.length, entries });
  } catch (error) {
    next(error);
  }
});

export default router;
