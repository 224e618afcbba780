import type { NextFunction, Request, Response } from 'express';
import { env } from '../../config/env.js';

/**
 * Admin authentication middleware guarding every write and every listing
 * that exposes participant data.
 *
 * Compares the presented token with ADMIN_API_TOKEN. Tokens in query
 * parameters are not accepted.
 *
 * Supported authentication methods:
 * - x-admin-token header
 * - Authorization: Bearer {token} header
 */
export function requireAdmin(req: Request, res: Response, next: NextFunction) {
    if (!env.ADMIN_API_TOKEN) {
        res.status(503).json({ success: false, error: 'Admin API disabled' });
        return;
    }

    const xAdminToken = req.headers['x-admin-token'];
    let candidate = Array.isArray(xAdminToken) ? xAdminToken[0] : xAdminToken;

    if (!candidate) {
        const authHeader = req.headers['authorization'];
        if (authHeader && authHeader.startsWith('Bearer ')) {
            candidate = authHeader.substring(7);
        }
    }

    if (candidate !== env.ADMIN_API_TOKEN) {
        res.status(401).json({ success: false, error: 'Unauthorized' });
        return;
    }

    next();
}
