/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { RegistrationController } from '../api/registration.controller.js';
import { RegistrationService } from '../services/registration.service.js';
import { MemberService } from '../services/member.service.js';
import { createMockDatabaseService, type IMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createMockRequest, createMockResponse } from '../../../tests/vitest/helpers/express.js';
import { buildEvent, buildMember, buildRegistration } from '../../../tests/vitest/helpers/fixtures.js';

describe('RegistrationController', () => {
    let mockDb: IMockDatabaseService;
    let controller: RegistrationController;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        const logger = createMockLogger();
        controller = new RegistrationController(
            new RegistrationService(mockDb, null, logger),
            new MemberService(mockDb, null, logger),
            logger
        );
        mockDb.seed('events', [buildEvent()]);
    });

    // ============================================================================
    // Registration Endpoints
    // ============================================================================

    describe('createRegistration', () => {
        it('should respond 201 with the new registration', async () => {
            const req = createMockRequest({
                body: {
                    eventId: 'event-1',
                    registrationType: 'individual',
                    numberOfMembers: 1,
                    transportationMode: 'public',
                    notes: '   ',
                    members: [{ name: ' Asha ', phoneNumber: '9000000001', gender: 'F', status: 'confirmed' }]
                }
            });
            const { res, response } = createMockResponse();

            await controller.createRegistration(req, response);

            expect(res.status).toHaveBeenCalledWith(201);
            const [payload] = res.json.mock.calls[0];
            expect(payload.success).toBe(true);
            expect(payload.registration.notes).toBeNull();
            expect(payload.registration.members[0].name).toBe('Asha');
            expect(payload.registration.members[0].status).toBe('registered');
        });

        it('should reject a body with an unknown gender', async () => {
            const req = createMockRequest({
                body: {
                    eventId: 'event-1',
                    registrationType: 'individual',
                    numberOfMembers: 1,
                    transportationMode: 'public',
                    members: [{ name: 'Asha', phoneNumber: '9000000001', gender: 'X' }]
                }
            });
            const { response } = createMockResponse();

            await expect(controller.createRegistration(req, response)).rejects.toBeInstanceOf(ZodError);
        });
    });

    describe('listRegistrations', () => {
        it('should coerce paging parameters from the query string', async () => {
            mockDb.seed('registrations', [
                buildRegistration({ id: 'r-1' }),
                buildRegistration({ id: 'r-2' })
            ]);
            const req = createMockRequest({ query: { skip: '1', limit: '5' } });
            const { res, response } = createMockResponse();

            await controller.listRegistrations(req, response);

            const [payload] = res.json.mock.calls[0];
            expect(payload.registrations.map((registration: { id: string }) => registration.id)).toEqual(['r-2']);
        });
    });

    describe('searchParticipant', () => {
        it('should require a phone number', async () => {
            const req = createMockRequest({ query: {} });
            const { response } = createMockResponse();

            await expect(controller.searchParticipant(req, response)).rejects.toBeInstanceOf(ZodError);
        });
    });

    // ============================================================================
    // Member Endpoints
    // ============================================================================

    describe('updateMemberStatus', () => {
        it('should respond with the updated member', async () => {
            mockDb.seed('registration_members', [buildMember()]);
            const req = createMockRequest({ params: { memberId: 'member-1' }, body: { status: 'confirmed' } });
            const { res, response } = createMockResponse();

            await controller.updateMemberStatus(req, response);

            const [payload] = res.json.mock.calls[0];
            expect(payload.success).toBe(true);
            expect(payload.member.status).toBe('confirmed');
        });
    });

    describe('listMembersByStatus', () => {
        it('should reject an unknown status', async () => {
            const req = createMockRequest({ params: { status: 'pending' } });
            const { response } = createMockResponse();

            await expect(controller.listMembersByStatus(req, response)).rejects.toBeInstanceOf(ZodError);
        });

        it('should list members with the requested status', async () => {
            mockDb.seed('registration_members', [
                buildMember({ id: 'member-1', status: 'waiting' }),
                buildMember({ id: 'member-2', status: 'registered' })
            ]);
            const req = createMockRequest({ params: { status: 'waiting' }, query: { eventId: 'event-1' } });
            const { res, response } = createMockResponse();

            await controller.listMembersByStatus(req, response);

            const [payload] = res.json.mock.calls[0];
            expect(payload.members.map((member: { id: string }) => member.id)).toEqual(['member-1']);
        });
    });
});
