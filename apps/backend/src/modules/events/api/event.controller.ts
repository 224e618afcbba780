import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import type { ILogger } from '@event-suite/types';
import type { EventService } from '../services/event.service.js';
import { isoDateSchema, optionalTextSchema } from '../../../lib/schemas.js';

/**
 * Zod schema for one day of a new event.
 */
const eventDaySchema = z.object({
    eventDate: isoDateSchema,
    breakfastProvided: z.boolean().default(false),
    lunchProvided: z.boolean().default(false),
    dinnerProvided: z.boolean().default(false),
    locationName: optionalTextSchema,
    dailyNotes: optionalTextSchema
});

/**
 * Zod schema for POST /api/events.
 */
const createEventSchema = z.object({
    eventName: z.string().trim().min(1).max(255),
    startDate: isoDateSchema,
    endDate: isoDateSchema,
    locationName: z.string().trim().min(1).max(255),
    locationMapLink: optionalTextSchema,
    description: optionalTextSchema,
    ngo: optionalTextSchema,
    isActive: z.boolean().default(true),
    /**
     * Seat limit; omitted or null means unlimited.
     */
    allowedRegistration: z.number().int().positive().nullish(),
    registrationStartDate: isoDateSchema.nullish(),
    eventDays: z.array(eventDaySchema).default([])
});

/**
 * Controller for event endpoints mounted at /api/events.
 */
export class EventController {
    constructor(
        private readonly eventService: EventService,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/events
     *
     * Body: event fields plus `eventDays[]`
     * Response: 201 `{ success: true, event }`
     */
    async createEvent(req: Request, res: Response): Promise<void> {
        const input = createEventSchema.parse(req.body);
        const event = await this.eventService.createEvent(input);
        this.logger.debug({ eventId: event.id, requestId: req.id }, 'Create event request served');
        res.status(StatusCodes.CREATED).json({ success: true, event });
    }

    /**
     * GET /api/events
     */
    async listEvents(_req: Request, res: Response): Promise<void> {
        const events = await this.eventService.listEvents();
        res.json({ success: true, events });
    }

    /**
     * GET /api/events/:eventId
     */
    async getEvent(req: Request, res: Response): Promise<void> {
        const event = await this.eventService.getEvent(req.params.eventId);
        res.json({ success: true, event });
    }
}
