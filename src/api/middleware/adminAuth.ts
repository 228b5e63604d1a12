import { Request, Response, NextFunction } from 'express';
import { config } from '../../config';
import { logger } from '../../utils/logger';

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Decode a `Basic` Authorization header. Passwords may contain ':'.
 */
export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(header.substring('Basic '.length), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    return null;
  }

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

export function isAdminCredentials(credentials: BasicCredentials | null): boolean {
  return (
    credentials !== null &&
    credentials.username === config.admin.username &&
    credentials.password === config.admin.password
  );
}

/**
 * Admin routes answer 404 unless ADMIN_ENABLED=true, checked per request.
 */
export function requireAdminEnabled(_req: Request, res: Response, next: NextFunction): void {
  if (!config.admin.enabled) {
    res.status(404).json({ error: 'Not found' });
    return;
  }
  next();
}

/**
 * Basic authentication for /api/admin/* with ADMIN_USERNAME and ADMIN_PASSWORD.
 */
export function adminAuth(req: Request, res: Response, next: NextFunction): void {
  const credentials = parseBasicAuth(req.headers.authorization);

  if (!credentials) {
    logger.warn('admin.auth_missing', { path: req.path });
    res.set('WWW-Authenticate', 'Basic realm="Admin Area"');
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  if (isAdminCredentials(credentials)) {
    logger.debug('admin.auth_success', { username: credentials.username, path: req.path });
    return next();
  }

  logger.warn('admin.auth_failed', { username: credentials.username, path: req.path });
  res.set('WWW-Authenticate', 'Basic realm="Admin Area"');
  res.status(401).json({ error: 'Invalid credentials' });
}
