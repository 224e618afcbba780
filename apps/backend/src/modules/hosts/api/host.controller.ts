import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import { GENDER_PREFERENCES, TOILET_FACILITIES, type ILogger } from '@event-suite/types';
import type { HostService } from '../services/host.service.js';
import { optionalTextSchema, patchTextSchema, queryBooleanSchema } from '../../../lib/schemas.js';

/**
 * Zod schema for POST /api/hosts.
 */
const createHostSchema = z.object({
    eventId: z.string().min(1),
    eventDaysId: z.string().min(1),
    /**
     * Host's name (2-255 characters)
     */
    name: z.string().trim().min(2).max(255),
    phoneNo: z.number().int().positive(),
    /**
     * Address or locality of the lodging
     */
    placeName: z.string().trim().min(2).max(255),
    maxParticipants: z.number().int().positive(),
    toiletFacilities: z.enum(TOILET_FACILITIES),
    genderPreference: z.enum(GENDER_PREFERENCES),
    facilitiesDescription: optionalTextSchema
});

/**
 * Zod schema for PUT /api/hosts/:hostId. All fields optional.
 */
const updateHostSchema = z.object({
    eventDaysId: z.string().min(1).optional(),
    name: z.string().trim().min(2).max(255).optional(),
    phoneNo: z.number().int().positive().optional(),
    placeName: z.string().trim().min(2).max(255).optional(),
    maxParticipants: z.number().int().positive().optional(),
    toiletFacilities: z.enum(TOILET_FACILITIES).optional(),
    genderPreference: z.enum(GENDER_PREFERENCES).optional(),
    facilitiesDescription: patchTextSchema
});

/**
 * Zod schema for GET /api/hosts/event/:eventId query parameters.
 */
const listHostsQuerySchema = z.object({
    eventDaysId: z.string().min(1).optional(),
    name: z.string().trim().min(1).optional(),
    phoneNo: z.coerce.number().int().positive().optional(),
    placeName: z.string().trim().min(1).optional(),
    minCapacity: z.coerce.number().int().min(0).optional(),
    maxCapacity: z.coerce.number().int().min(0).optional(),
    toiletFacilities: z.enum(TOILET_FACILITIES).optional(),
    genderPreference: z.enum(GENDER_PREFERENCES).optional(),
    hasFacilitiesDescription: queryBooleanSchema.optional(),
    page: z.coerce.number().int().optional(),
    pageSize: z.coerce.number().int().optional()
});

/**
 * Controller for host endpoints mounted at /api/hosts.
 */
export class HostController {
    constructor(
        private readonly hostService: HostService,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/hosts
     */
    async createHost(req: Request, res: Response): Promise<void> {
        const input = createHostSchema.parse(req.body);
        const host = await this.hostService.createHost(input);
        res.status(StatusCodes.CREATED).json({ success: true, host });
    }

    /**
     * GET /api/hosts/:hostId
     */
    async getHost(req: Request, res: Response): Promise<void> {
        const host = await this.hostService.getHost(req.params.hostId);
        res.json({ success: true, host });
    }

    /**
     * PUT /api/hosts/:hostId
     */
    async updateHost(req: Request, res: Response): Promise<void> {
        const patch = updateHostSchema.parse(req.body);
        const host = await this.hostService.updateHost(req.params.hostId, patch);
        res.json({ success: true, host });
    }

    /**
     * DELETE /api/hosts/:hostId
     */
    async deleteHost(req: Request, res: Response): Promise<void> {
        const result = await this.hostService.deleteHost(req.params.hostId);
        res.json({ success: true, ...result });
    }

    /**
     * GET /api/hosts/event/:eventId
     *
     * Query: filters plus `page` and `pageSize` (max 100)
     * Response: `{ success, hosts, totalCount, page, pageSize, totalPages }`
     */
    async listHosts(req: Request, res: Response): Promise<void> {
        const { page, pageSize, ...filters } = listHostsQuerySchema.parse(req.query);
        const result = await this.hostService.listHosts({ ...filters, eventId: req.params.eventId }, page, pageSize);
        this.logger.debug(
            { eventId: req.params.eventId, totalCount: result.totalCount, requestId: req.id },
            'Host listing served'
        );
        res.json({ success: true, ...result });
    }

    /**
     * GET /api/hosts/event/:eventId/grouped
     */
    async listHostsGroupedByEventDay(req: Request, res: Response): Promise<void> {
        const result = await this.hostService.listHostsGroupedByEventDay(req.params.eventId);
        res.json({ success: true, ...result });
    }
}
