import { Router } from 'express';
import type { HostController } from './host.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for host endpoints, mounted at /api/hosts.
 *
 * Every route requires the admin token.
 *
 * @param controller - Host controller instance
 * @returns Express router
 */
export function createHostRouter(controller: HostController): Router {
    const router = Router();

    router.use(requireAdmin);

    /**
     * POST /api/hosts
     * Create a host for one event day
     */
    router.post('/', asyncHandler(controller.createHost.bind(controller)));

    /**
     * GET /api/hosts/event/:eventId/grouped
     * Hosts of an event grouped by event day
     */
    router.get('/event/:eventId/grouped', asyncHandler(controller.listHostsGroupedByEventDay.bind(controller)));

    /**
     * GET /api/hosts/event/:eventId
     * Filtered, paginated hosts of an event
     */
    router.get('/event/:eventId', asyncHandler(controller.listHosts.bind(controller)));

    /**
     * GET /api/hosts/:hostId
     * Host with assigned participants and capacity
     */
    router.get('/:hostId', asyncHandler(controller.getHost.bind(controller)));

    /**
     * PUT /api/hosts/:hostId
     * Update host details
     */
    router.put('/:hostId', asyncHandler(controller.updateHost.bind(controller)));

    /**
     * DELETE /api/hosts/:hostId
     * Delete a host without assignments
     */
    router.delete('/:hostId', asyncHandler(controller.deleteHost.bind(controller)));

    return router;
}
