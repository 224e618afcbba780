/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { DashboardService } from '../services/dashboard.service.js';
import { RegistrationService } from '../../registrations/services/registration.service.js';
import { createMockDatabaseService, type IMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockCacheService, type IMockCacheService } from '../../../tests/vitest/mocks/cache-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { buildEvent, buildEventDay, buildMember, buildRegistration } from '../../../tests/vitest/helpers/fixtures.js';

describe('DashboardService', () => {
    let mockDb: IMockDatabaseService;
    let mockCache: IMockCacheService;
    let mockLogger: ReturnType<typeof createMockLogger>;
    let service: DashboardService;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        mockCache = createMockCacheService();
        mockLogger = createMockLogger();
        service = new DashboardService(mockDb, mockCache, mockLogger, 30);

        mockDb.seed('events', [buildEvent()]);
        mockDb.seed('event_days', [buildEventDay()]);
        mockDb.seed('registrations', [buildRegistration()]);
        mockDb.seed('registration_members', [buildMember()]);
    });

    it('should compute the dashboard and cache it under the event tag', async () => {
        const dashboard = await service.getEventDashboard('event-1');

        expect(dashboard.totalParticipants).toBe(1);
        expect(mockCache.set).toHaveBeenCalledWith('dashboard:event:event-1', dashboard, 30, ['dashboard:event-1']);
    });

    it('should serve a cached dashboard without reading the database again', async () => {
        await service.getEventDashboard('event-1');
        mockDb.seed('registrations', [buildRegistration({ id: 'registration-2' })]);

        const cached = await service.getEventDashboard('event-1');

        expect(cached.totalRegistrations).toBe(1);
        expect(mockCache.set).toHaveBeenCalledTimes(1);
    });

    it('should recompute after a registration invalidates the cache', async () => {
        const registrations = new RegistrationService(mockDb, mockCache, mockLogger);
        await service.getEventDashboard('event-1');

        await registrations.createRegistration({
            eventId: 'event-1',
            registrationType: 'individual',
            numberOfMembers: 1,
            transportationMode: 'public',
            members: [{ name: 'Ravi', phoneNumber: '9000000101', gender: 'M' }]
        });
        const fresh = await service.getEventDashboard('event-1');

        expect(fresh.totalRegistrations).toBe(2);
        expect(fresh.totalParticipants).toBe(2);
    });

    it('should compute the dashboard when the cache read fails', async () => {
        vi.mocked(mockCache.get).mockRejectedValueOnce(new Error('connection refused'));

        const dashboard = await service.getEventDashboard('event-1');

        expect(dashboard.totalParticipants).toBe(1);
        expect(mockLogger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ eventId: 'event-1' }),
            'Dashboard cache read failed'
        );
    });

    it('should return the dashboard when the cache write fails', async () => {
        vi.mocked(mockCache.set).mockRejectedValueOnce(new Error('connection refused'));

        const dashboard = await service.getEventDashboard('event-1');

        expect(dashboard.totalParticipants).toBe(1);
        expect(mockLogger.warn).toHaveBeenCalledWith(
            expect.objectContaining({ eventId: 'event-1' }),
            'Dashboard cache write failed'
        );
    });

    it('should work without a cache', async () => {
        const uncached = new DashboardService(mockDb, null, mockLogger, 30);
        mockDb.seed('registration_members', [buildMember({ id: 'member-2', status: 'waiting' })]);

        const dashboard = await uncached.getEventDashboard('event-1');

        expect(dashboard.totalParticipants).toBe(2);
        expect(dashboard.waitingParticipants).toBe(1);
    });

    it('should throw for an unknown event', async () => {
        await expect(service.getEventDashboard('missing')).rejects.toThrow('Event not found');
    });
});
