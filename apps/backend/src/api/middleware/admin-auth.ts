import type { NextFunction, Request, Response } from 'express';

/**
 * Creates the admin authentication middleware for operator endpoints.
 *
 * The token is accepted from the `x-admin-token` header or as
 * `Authorization: Bearer {token}`; never from the query string, which ends up
 * in access logs. Without a configured token the admin API answers 503.
 *
 * @param token - Expected admin token (`ADMIN_API_TOKEN`)
 */
export function requireAdmin(token: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) {
      res.status(503).json({ success: false, error: 'Admin API disabled' });
      return;
    }

    const xAdminToken = req.headers['x-admin-token'];
    let candidate = Array.isArray(xAdminToken) ? xAdminToken[0] : xAdminToken;

    if (!candidate) {
      const authHeader = req.headers.authorization;
      if (authHeader?.startsWith('Bearer ')) {
        candidate = authHeader.substring(7);
      }
    }

    if (candidate !== token) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }

    next();
  };
}
