/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { HostController } from '../api/host.controller.js';
import { HostService } from '../services/host.service.js';
import { createMockDatabaseService, type IMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createMockRequest, createMockResponse } from '../../../tests/vitest/helpers/express.js';
import { buildEvent, buildEventDay, buildHost } from '../../../tests/vitest/helpers/fixtures.js';

describe('HostController', () => {
    let mockDb: IMockDatabaseService;
    let controller: HostController;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        const logger = createMockLogger();
        controller = new HostController(new HostService(mockDb, null, logger), logger);

        mockDb.seed('events', [buildEvent()]);
        mockDb.seed('event_days', [buildEventDay()]);
    });

    describe('createHost', () => {
        it('should respond 201 with the host and its event date', async () => {
            const req = createMockRequest({
                body: {
                    eventId: 'event-1',
                    eventDaysId: 'day-1',
                    name: 'Meena',
                    phoneNo: 9100000001,
                    placeName: 'Lake Road',
                    maxParticipants: 4,
                    toiletFacilities: 'both',
                    genderPreference: 'female',
                    facilitiesDescription: ''
                }
            });
            const { res, response } = createMockResponse();

            await controller.createHost(req, response);

            expect(res.status).toHaveBeenCalledWith(201);
            const [payload] = res.json.mock.calls[0];
            expect(payload.host.eventDate).toBe('2025-02-01');
            expect(payload.host.facilitiesDescription).toBeNull();
        });

        it('should reject a one-letter name', async () => {
            const req = createMockRequest({
                body: {
                    eventId: 'event-1',
                    eventDaysId: 'day-1',
                    name: 'M',
                    phoneNo: 9100000001,
                    placeName: 'Lake Road',
                    maxParticipants: 4,
                    toiletFacilities: 'both',
                    genderPreference: 'female'
                }
            });
            const { response } = createMockResponse();

            await expect(controller.createHost(req, response)).rejects.toBeInstanceOf(ZodError);
        });
    });

    describe('listHosts', () => {
        it('should read filters and paging from the query string', async () => {
            mockDb.seed('hosts', [
                buildHost({ id: 'h-1', name: 'Anil', maxParticipants: 2 }),
                buildHost({ id: 'h-2', name: 'Bina', maxParticipants: 6 }),
                buildHost({ id: 'h-3', name: 'Chitra', maxParticipants: 8 })
            ]);
            const req = createMockRequest({
                params: { eventId: 'event-1' },
                query: { minCapacity: '5', page: '2', pageSize: '1', hasFacilitiesDescription: 'false' }
            });
            const { res, response } = createMockResponse();

            await controller.listHosts(req, response);

            expect(res.json).toHaveBeenCalledWith(
                expect.objectContaining({ success: true, totalCount: 2, page: 2, pageSize: 1, totalPages: 2 })
            );
            const [payload] = res.json.mock.calls[0];
            expect(payload.hosts.map((host: { id: string }) => host.id)).toEqual(['h-3']);
        });
    });

    describe('deleteHost', () => {
        it('should respond with the deletion message', async () => {
            mockDb.seed('hosts', [buildHost()]);
            const req = createMockRequest({ params: { hostId: 'host-1' } });
            const { res, response } = createMockResponse();

            await controller.deleteHost(req, response);

            expect(res.json).toHaveBeenCalledWith({
                success: true,
                message: 'Host deleted successfully',
                deletedHostId: 'host-1'
            });
        });
    });
});
