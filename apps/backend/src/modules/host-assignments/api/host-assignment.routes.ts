import { Router } from 'express';
import type { HostAssignmentController } from './host-assignment.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for host assignment endpoints, mounted at
 * /api/host-assignments. Every route requires the admin token.
 *
 * @param controller - Host assignment controller instance
 * @returns Express router
 */
export function createHostAssignmentRouter(controller: HostAssignmentController): Router {
    const router = Router();

    router.use(requireAdmin);

    /**
     * POST /api/host-assignments
     * Assign one member to a host for one event day
     */
    router.post('/', asyncHandler(controller.createAssignment.bind(controller)));

    /**
     * POST /api/host-assignments/bulk
     * Assign several members to one host for one event day
     */
    router.post('/bulk', asyncHandler(controller.bulkAssign.bind(controller)));

    /**
     * GET /api/host-assignments
     * Filtered, paginated assignments
     */
    router.get('/', asyncHandler(controller.listAssignments.bind(controller)));

    /**
     * GET /api/host-assignments/:assignmentId
     */
    router.get('/:assignmentId', asyncHandler(controller.getAssignment.bind(controller)));

    /**
     * PUT /api/host-assignments/:assignmentId
     * Update assignment notes
     */
    router.put('/:assignmentId', asyncHandler(controller.updateAssignment.bind(controller)));

    /**
     * DELETE /api/host-assignments/:assignmentId
     */
    router.delete('/:assignmentId', asyncHandler(controller.deleteAssignment.bind(controller)));

    return router;
}
