import { Router } from 'express';
import accessRouter from './routes/access';
import adminRouter from './routes/admin';
import { adminAuth, requireAdminEnabled } from './middleware/adminAuth';

/**
 * JSON API. The Stripe webhook router is mounted separately, ahead of the JSON body
 * parser, because signature checks need the raw body.
 */
const router: Router = Router();

router.use('/access', accessRouter);
router.use('/admin', requireAdminEnabled, adminAuth, adminRouter);

export default router;
