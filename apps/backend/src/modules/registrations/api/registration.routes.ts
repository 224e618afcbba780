import { Router } from 'express';
import type { RegistrationController } from './registration.controller.js';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { requireAdmin } from '../../../api/middleware/admin-auth.js';

/**
 * Create Express router for registration endpoints, mounted at
 * /api/registrations.
 *
 * Signing up and looking up one's own registration by phone number are
 * public. Fixed paths are registered before `/:registrationId` so they are
 * not captured as ids.
 *
 * @param controller - Registration controller instance
 * @returns Express router
 */
export function createRegistrationRouter(controller: RegistrationController): Router {
    const router = Router();

    // ============================================================================
    // Registrations
    // ============================================================================

    /**
     * POST /api/registrations
     * Create a registration with members and daily preferences
     */
    router.post('/', asyncHandler(controller.createRegistration.bind(controller)));

    /**
     * GET /api/registrations
     * List registrations, optionally for one event
     */
    router.get('/', requireAdmin, asyncHandler(controller.listRegistrations.bind(controller)));

    /**
     * GET /api/registrations/search/participant
     * Find a participant's registration by phone number
     */
    router.get('/search/participant', asyncHandler(controller.searchParticipant.bind(controller)));

    // ============================================================================
    // Members
    // ============================================================================

    /**
     * PUT /api/registrations/members/:memberId
     * Update member details
     */
    router.put('/members/:memberId', requireAdmin, asyncHandler(controller.updateMember.bind(controller)));

    /**
     * PUT /api/registrations/members/:memberId/status
     * Change a member's registration status
     */
    router.put(
        '/members/:memberId/status',
        requireAdmin,
        asyncHandler(controller.updateMemberStatus.bind(controller))
    );

    /**
     * GET /api/registrations/members/registration/:registrationId
     * Members of one registration
     */
    router.get(
        '/members/registration/:registrationId',
        requireAdmin,
        asyncHandler(controller.listMembersByRegistration.bind(controller))
    );

    /**
     * GET /api/registrations/members/status/:status
     * Members with a given status, optionally for one event
     */
    router.get(
        '/members/status/:status',
        requireAdmin,
        asyncHandler(controller.listMembersByStatus.bind(controller))
    );

    /**
     * GET /api/registrations/:registrationId
     * Get one registration with members and preferences
     */
    router.get('/:registrationId', requireAdmin, asyncHandler(controller.getRegistration.bind(controller)));

    return router;
}
