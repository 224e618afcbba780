import { Router } from 'express';
import type { DashboardController } from './dashboard.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for dashboard endpoints, mounted at /api/dashboard.
 */
export function createDashboardRouter(controller: DashboardController): Router {
    const router = Router();

    /**
     * GET /api/dashboard/event/:eventId
     * Per-day participant lists and event statistics
     */
    router.get('/event/:eventId', requireAdmin, asyncHandler(controller.getEventDashboard.bind(controller)));

    return router;
}
