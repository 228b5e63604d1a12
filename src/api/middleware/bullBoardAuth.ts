import { Request, Response, NextFunction } from 'express';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { isAdminCredentials, parseBasicAuth } from './adminAuth';

/**
 * The queue dashboard is only served to the admin, and only when admin routes are enabled.
 */
export function bullBoardAuth(req: Request, res: Response, next: NextFunction) {
  if (!config.admin.enabled) {
    return res.status(404).json({ error: 'Not found' });
  }

  if (isAdminCredentials(parseBasicAuth(req.headers.authorization))) {
    return next();
  }

  logger.warn(`Failed Bull Board authentication attempt from ${req.ip}`);
  res.setHeader('WWW-Authenticate', 'Basic realm="Bull Board"');
  return res.status(401).json({ error: 'Authentication required' });
}
