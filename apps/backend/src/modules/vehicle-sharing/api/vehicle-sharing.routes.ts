import { Router } from 'express';
import type { VehicleSharingController } from './vehicle-sharing.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for vehicle sharing endpoints, mounted at
 * /api/vehicle-sharing. Every route requires the admin token.
 */
export function createVehicleSharingRouter(controller: VehicleSharingController): Router {
    const router = Router();

    router.use(requireAdmin);

    router.post('/', asyncHandler(controller.createArrangement.bind(controller)));
    router.get('/', asyncHandler(controller.listArrangements.bind(controller)));
    router.get('/:arrangementId', asyncHandler(controller.getArrangement.bind(controller)));
    router.put('/:arrangementId', asyncHandler(controller.updateArrangement.bind(controller)));
    router.delete('/:arrangementId', asyncHandler(controller.deleteArrangement.bind(controller)));

    return router;
}
