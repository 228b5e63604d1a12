import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { UnlockFailureReason } from '../../services/accessService';
import { getReconciler } from '../../services/reconciler';
import { renderAccessApology } from '../../services/messages';
import { logger } from '../../utils/logger';

const router: Router = Router();

const unlockSchema = z.object({
  email: z.string().min(1),
  memberId: z.union([z.string(), z.number()]).transform((value) => String(value)),
});

const FAILURE_STATUS: Record<UnlockFailureReason, number> = {
  invalid_email: 400,
  invalid_member_id: 400,
  not_found: 404,
  inactive: 403,
  expired: 403,
  member_mismatch: 409,
  no_invites: 502,
};

/**
 * POST /api/access/unlock
 * Body: { email, memberId }. Hands out single-use invite links for an active subscription.
 */
router.post('/unlock', async (req: Request, res: Response) => {
  const body = unlockSchema.safeParse(req.body);
  if (!body.success) {
    return res.status(400).json({ ok: false, reason: 'invalid_request', message: 'email and memberId are required' });
  }

  let messageConfig = { renewUrl: '', supportContact: '' };
  try {
    const reconciler = getReconciler();
    messageConfig = reconciler.config;

    const result = await reconciler.access.unlock(body.data.email, body.data.memberId);
    if (!result.ok) {
      return res.status(FAILURE_STATUS[result.reason]).json(result);
    }
    return res.json(result);
  } catch (error) {
    logger.error('[Access] Unlock failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return res
      .status(500)
      .json({ ok: false, reason: 'internal_error', message: renderAccessApology(messageConfig) });
  }
});

export default router;
