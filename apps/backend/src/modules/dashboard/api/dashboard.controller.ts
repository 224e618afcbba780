import type { Request, Response } from 'express';
import type { DashboardService } from '../services/dashboard.service.js';

/**
 * Controller for dashboard endpoints mounted at /api/dashboard.
 */
export class DashboardController {
    constructor(private readonly dashboardService: DashboardService) {}

    /**
     * GET /api/dashboard/event/:eventId
     *
     * Response: `{ success: true, dashboard }`
     */
    async getEventDashboard(req: Request, res: Response): Promise<void> {
        const dashboard = await this.dashboardService.getEventDashboard(req.params.eventId);
        res.json({ success: true, dashboard });
    }
}
