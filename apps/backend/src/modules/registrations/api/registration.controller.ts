import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { z } from 'zod';
import {
    GENDERS,
    REGISTRATION_STATUSES,
    REGISTRATION_TYPES,
    TOILET_PREFERENCES,
    TRANSPORTATION_MODES,
    type ILogger
} from '@event-suite/types';
import type { RegistrationService } from '../services/registration.service.js';
import type { MemberService } from '../services/member.service.js';
import { optionalTextSchema, patchTextSchema } from '../../../lib/schemas.js';

const phoneNumberSchema = z.string().trim().min(1).max(20);

/**
 * Zod schema for one member of a new registration.
 *
 * A `status` sent by the client is accepted and ignored; the service
 * allocates it from the seat limit.
 */
const memberSchema = z.object({
    name: z.string().trim().min(1).max(255),
    phoneNumber: phoneNumberSchema,
    email: optionalTextSchema,
    city: optionalTextSchema,
    age: z.number().int().min(0).max(150).nullish(),
    gender: z.enum(GENDERS),
    language: optionalTextSchema,
    floorPreference: optionalTextSchema,
    specialRequirements: optionalTextSchema,
    status: z.enum(REGISTRATION_STATUSES).optional()
});

const dailyPreferenceSchema = z.object({
    eventDayId: z.string().min(1),
    stayingWithYatra: z.boolean().optional(),
    dinnerAtHost: z.boolean().optional(),
    breakfastAtHost: z.boolean().optional(),
    lunchWithYatra: z.boolean().optional(),
    physicalLimitations: optionalTextSchema,
    toiletPreference: z.enum(TOILET_PREFERENCES).optional()
});

/**
 * Zod schema for POST /api/registrations.
 */
const createRegistrationSchema = z.object({
    eventId: z.string().min(1),
    registrationType: z.enum(REGISTRATION_TYPES),
    numberOfMembers: z.number().int().positive(),
    transportationMode: z.enum(TRANSPORTATION_MODES),
    hasEmptySeats: z.boolean().optional(),
    availableSeatsCount: z.number().int().min(0).optional(),
    notes: optionalTextSchema,
    members: z.array(memberSchema),
    dailyPreferences: z.array(dailyPreferenceSchema).default([])
});

/**
 * Zod schema for GET /api/registrations query parameters.
 */
const listRegistrationsQuerySchema = z.object({
    eventId: z.string().min(1).optional(),
    skip: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).default(100)
});

const searchParticipantQuerySchema = z.object({
    phoneNumber: phoneNumberSchema
});

/**
 * Zod schema for PUT /api/registrations/members/:memberId.
 *
 * Every field is optional; only the fields present are changed.
 */
const updateMemberSchema = z.object({
    name: z.string().trim().min(1).max(255).optional(),
    phoneNumber: phoneNumberSchema.optional(),
    email: patchTextSchema,
    city: patchTextSchema,
    age: z.number().int().min(0).max(150).nullable().optional(),
    gender: z.enum(GENDERS).optional(),
    language: patchTextSchema,
    floorPreference: patchTextSchema,
    specialRequirements: patchTextSchema,
    status: z.enum(REGISTRATION_STATUSES).optional()
});

const updateMemberStatusSchema = z.object({
    status: z.enum(REGISTRATION_STATUSES)
});

const memberStatusParamSchema = z.enum(REGISTRATION_STATUSES);

const listByStatusQuerySchema = z.object({
    eventId: z.string().min(1).optional()
});

/**
 * Controller for registration and member endpoints mounted at
 * /api/registrations.
 */
export class RegistrationController {
    constructor(
        private readonly registrationService: RegistrationService,
        private readonly memberService: MemberService,
        private readonly logger: ILogger
    ) {}

    /**
     * POST /api/registrations
     *
     * Response: 201 with the registration, its members and daily preferences
     */
    async createRegistration(req: Request, res: Response): Promise<void> {
        const input = createRegistrationSchema.parse(req.body);
        const registration = await this.registrationService.createRegistration(input);
        res.status(StatusCodes.CREATED).json({ success: true, registration });
    }

    /**
     * GET /api/registrations
     *
     * Query: `eventId`, `skip`, `limit` (capped at 1000)
     */
    async listRegistrations(req: Request, res: Response): Promise<void> {
        const query = listRegistrationsQuerySchema.parse(req.query);
        const registrations = await this.registrationService.listRegistrations(query);
        res.json({ success: true, registrations });
    }

    /**
     * GET /api/registrations/:registrationId
     */
    async getRegistration(req: Request, res: Response): Promise<void> {
        const registration = await this.registrationService.getRegistration(req.params.registrationId);
        res.json({ success: true, registration });
    }

    /**
     * GET /api/registrations/search/participant?phoneNumber=
     */
    async searchParticipant(req: Request, res: Response): Promise<void> {
        const { phoneNumber } = searchParticipantQuerySchema.parse(req.query);
        const participant = await this.registrationService.searchParticipant(phoneNumber);
        this.logger.debug({ registrationId: participant.registrationId, requestId: req.id }, 'Participant search matched');
        res.json({ success: true, participant });
    }

    /**
     * PUT /api/registrations/members/:memberId
     */
    async updateMember(req: Request, res: Response): Promise<void> {
        const patch = updateMemberSchema.parse(req.body);
        const member = await this.memberService.updateMember(req.params.memberId, patch);
        res.json({ success: true, member });
    }

    /**
     * PUT /api/registrations/members/:memberId/status
     *
     * Body: `{ status }`
     */
    async updateMemberStatus(req: Request, res: Response): Promise<void> {
        const { status } = updateMemberStatusSchema.parse(req.body);
        const member = await this.memberService.updateMemberStatus(req.params.memberId, status);
        res.json({ success: true, member });
    }

    /**
     * GET /api/registrations/members/registration/:registrationId
     */
    async listMembersByRegistration(req: Request, res: Response): Promise<void> {
        const members = await this.memberService.listMembersByRegistration(req.params.registrationId);
        res.json({ success: true, members });
    }

    /**
     * GET /api/registrations/members/status/:status?eventId=
     */
    async listMembersByStatus(req: Request, res: Response): Promise<void> {
        const status = memberStatusParamSchema.parse(req.params.status);
        const { eventId } = listByStatusQuerySchema.parse(req.query);
        const members = await this.memberService.listMembersByStatus(status, eventId);
        res.json({ success: true, members });
    }
}
