import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { ILogger } from '@event-suite/types';
import type { HostAssignmentService } from '../services/host-assignment.service.js';
import { optionalTextSchema, patchTextSchema, queryBooleanSchema } from '../../../lib/schemas.js';

/**
 * Zod schema for POST /api/host-assignments.
 */
const createAssignmentSchema = z.object({
    hostId: z.string().min(1),
    registrationMemberId: z.string().min(1),
    eventDayId: z.string().min(1),
    assignmentNotes: optionalTextSchema,
    /**
     * Operator reference stored with the assignment
     */
    assignedBy: optionalTextSchema
});

/**
 * Zod schema for POST /api/host-assignments/bulk.
 */
const bulkAssignSchema = z.object({
    hostId: z.string().min(1),
    registrationMemberIds: z.array(z.string().min(1)).min(1),
    eventDayId: z.string().min(1),
    assignmentNotes: optionalTextSchema,
    assignedBy: optionalTextSchema
});

const updateAssignmentSchema = z.object({
    assignmentNotes: patchTextSchema
});

const listAssignmentsQuerySchema = z.object({
    hostId: z.string().min(1).optional(),
    registrationMemberId: z.string().min(1).optional(),
    eventDayId: z.string().min(1).optional(),
    assignedBy: z.string().min(1).optional(),
    hasNotes: queryBooleanSchema.optional(),
    page: z.coerce.number().int().optional(),
    pageSize: z.coerce.number().int().optional()
});

/**
 * Controller for host assignment endpoints mounted at /api/host-assignments.
 */
export class HostAssignmentController {
    constructor(
        private readonly assignmentService: HostAssignmentService,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/host-assignments
     */
    async createAssignment(req: Request, res: Response): Promise<void> {
        const { assignedBy, ...input } = createAssignmentSchema.parse(req.body);
        const assignment = await this.assignmentService.createAssignment(input, assignedBy);
        res.status(StatusCodes.CREATED).json({ success: true, assignment });
    }

    /**
     * POST /api/host-assignments/bulk
     *
     * Response: 201 `{ success, successfulAssignments, failedAssignments, errors, assignments }`
     */
    async bulkAssign(req: Request, res: Response): Promise<void> {
        const input = bulkAssignSchema.parse(req.body);
        const result = await this.assignmentService.bulkAssign(input);
        if (result.failedAssignments > 0) {
            this.logger.warn(
                { hostId: input.hostId, errors: result.errors, requestId: req.id },
                'Bulk assignment finished with failures'
            );
        }
        res.status(StatusCodes.CREATED).json({ success: true, ...result });
    }

    /**
     * GET /api/host-assignments
     *
     * Query: filters plus `page` and `pageSize` (max 5000)
     */
    async listAssignments(req: Request, res: Response): Promise<void> {
        const { page, pageSize, ...filters } = listAssignmentsQuerySchema.parse(req.query);
        const result = await this.assignmentService.listAssignments(filters, page, pageSize);
        res.json({ success: true, ...result });
    }

    /**
     * GET /api/host-assignments/:assignmentId
     */
    async getAssignment(req: Request, res: Response): Promise<void> {
        const assignment = await this.assignmentService.getAssignment(req.params.assignmentId);
        res.json({ success: true, assignment });
    }

    /**
     * PUT /api/host-assignments/:assignmentId
     *
     * Body: `{ assignmentNotes }`
     */
    async updateAssignment(req: Request, res: Response): Promise<void> {
        const patch = updateAssignmentSchema.parse(req.body);
        const assignment = await this.assignmentService.updateAssignment(req.params.assignmentId, patch);
        res.json({ success: true, assignment });
    }

    /**
     * DELETE /api/host-assignments/:assignmentId
     */
    async deleteAssignment(req: Request, res: Response): Promise<void> {
        const result = await this.assignmentService.deleteAssignment(req.params.assignmentId);
        res.json({ success: true, ...result });
    }
}
