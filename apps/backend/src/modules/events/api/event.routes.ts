import { Router } from 'express';
import type { EventController } from './event.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for event endpoints, mounted at /api/events.
 *
 * Reads are public; creating an event requires the admin token.
 *
 * @param controller - Event controller instance
 * @returns Express router
 */
export function createEventRouter(controller: EventController): Router {
    const router = Router();

    /**
     * GET /api/events
     * List events with their days
     */
    router.get('/', asyncHandler(controller.listEvents.bind(controller)));

    /**
     * POST /api/events
     * Create an event and its days
     */
    router.post('/', requireAdmin, asyncHandler(controller.createEvent.bind(controller)));

    /**
     * GET /api/events/:eventId
     * Get one event with its days
     */
    router.get('/:eventId', asyncHandler(controller.getEvent.bind(controller)));

    return router;
}
