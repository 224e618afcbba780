import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { VehicleSharingService } from '../services/vehicle-sharing.service.js';
import { optionalTextSchema, patchTextSchema, queryBooleanSchema } from '../../../lib/schemas.js';

const createArrangementSchema = z.object({
    vehicleOwnerMemberId: z.string().min(1),
    coTravelerMemberId: z.string().min(1),
    sharingNotes: optionalTextSchema
});

const updateArrangementSchema = z.object({
    sharingNotes: patchTextSchema
});

const listArrangementsQuerySchema = z.object({
    vehicleOwnerMemberId: z.string().min(1).optional(),
    coTravelerMemberId: z.string().min(1).optional(),
    hasNotes: queryBooleanSchema.optional(),
    page: z.coerce.number().int().optional(),
    pageSize: z.coerce.number().int().optional()
});

/**
 * Controller for vehicle sharing endpoints mounted at /api/vehicle-sharing.
 */
export class VehicleSharingController {
    constructor(private readonly vehicleSharingService: VehicleSharingService) {}

    /**
     * POST /api/vehicle-sharing
     */
    async createArrangement(req: Request, res: Response): Promise<void> {
        const input = createArrangementSchema.parse(req.body);
        const arrangement = await this.vehicleSharingService.createArrangement(input);
        res.status(StatusCodes.CREATED).json({ success: true, arrangement });
    }

    /**
     * GET /api/vehicle-sharing
     *
     * Query: `vehicleOwnerMemberId`, `coTravelerMemberId`, `hasNotes`, `page`, `pageSize` (max 100)
     */
    async listArrangements(req: Request, res: Response): Promise<void> {
        const { page, pageSize, ...filters } = listArrangementsQuerySchema.parse(req.query);
        const result = await this.vehicleSharingService.listArrangements(filters, page, pageSize);
        res.json({ success: true, ...result });
    }

    async getArrangement(req: Request, res: Response): Promise<void> {
        const arrangement = await this.vehicleSharingService.getArrangement(req.params.arrangementId);
        res.json({ success: true, arrangement });
    }

    async updateArrangement(req: Request, res: Response): Promise<void> {
        const patch = updateArrangementSchema.parse(req.body);
        const arrangement = await this.vehicleSharingService.updateArrangement(req.params.arrangementId, patch);
        res.json({ success: true, arrangement });
    }

    async deleteArrangement(req: Request, res: Response): Promise<void> {
        const result = await this.vehicleSharingService.deleteArrangement(req.params.arrangementId);
        res.json({ success: true, ...result });
    }
}
