/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { HostService, type ICreateHostInput } from '../services/host.service.js';
import { createMockDatabaseService, type IMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockCacheService, type IMockCacheService } from '../../../tests/vitest/mocks/cache-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import {
    buildAssignment,
    buildEvent,
    buildEventDay,
    buildHost,
    buildMember,
    minutesLater
} from '../../../tests/vitest/helpers/fixtures.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';

function hostInput(overrides: Partial<ICreateHostInput> = {}): ICreateHostInput {
    return {
        eventId: 'event-1',
        eventDaysId: 'day-1',
        name: 'Meena',
        phoneNo: 9100000001,
        placeName: 'Lake Road',
        maxParticipants: 3,
        toiletFacilities: 'western',
        genderPreference: 'female',
        ...overrides
    };
}

describe('HostService', () => {
    let mockDb: IMockDatabaseService;
    let mockCache: IMockCacheService;
    let service: HostService;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        mockCache = createMockCacheService();
        service = new HostService(mockDb, mockCache, createMockLogger());

        mockDb.seed('events', [buildEvent(), buildEvent({ id: 'event-2' })]);
        mockDb.seed('event_days', [
            buildEventDay({ id: 'day-1', eventDate: '2025-02-01' }),
            buildEventDay({ id: 'day-2', eventDate: '2025-02-02' }),
            buildEventDay({ id: 'day-9', eventId: 'event-2', eventDate: '2025-03-01' })
        ]);
    });

    // ============================================================================
    // createHost
    // ============================================================================

    describe('createHost', () => {
        it('should store the host and return it with its event date', async () => {
            const result = await service.createHost(hostInput());

            expect(result.eventDate).toBe('2025-02-01');
            expect(result.facilitiesDescription).toBeNull();
            expect(mockDb.getCollectionData('hosts')).toHaveLength(1);
        });

        it('should throw NotFoundError for an unknown event', async () => {
            await expect(service.createHost(hostInput({ eventId: 'missing' }))).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should reject a day belonging to another event', async () => {
            await expect(service.createHost(hostInput({ eventDaysId: 'day-9' }))).rejects.toThrow(
                'Invalid event_days_id provided'
            );
        });

        it('should reject a phone number already used on the same day', async () => {
            await service.createHost(hostInput());

            await expect(service.createHost(hostInput({ name: 'Other' }))).rejects.toBeInstanceOf(ConflictError);
        });

        it('should allow the same phone number on another day', async () => {
            await service.createHost(hostInput());
            const second = await service.createHost(hostInput({ eventDaysId: 'day-2' }));

            expect(second.eventDate).toBe('2025-02-02');
        });
    });

    // ============================================================================
    // getHost / updateHost / deleteHost
    // ============================================================================

    describe('getHost', () => {
        it('should attach assigned participants and capacity', async () => {
            mockDb.seed('hosts', [buildHost({ maxParticipants: 3 })]);
            mockDb.seed('registration_members', [buildMember()]);
            mockDb.seed('host_assignments', [buildAssignment({ assignmentNotes: 'ground floor' })]);

            const result = await service.getHost('host-1');

            expect(result.eventDate).toBe('2025-02-01');
            expect(result.currentCapacity).toBe(1);
            expect(result.availableCapacity).toBe(2);
            expect(result.assignedParticipants).toEqual([
                {
                    id: 'member-1',
                    assignmentId: 'assignment-1',
                    name: 'Asha',
                    phoneNumber: '9000000001',
                    age: 28,
                    gender: 'F',
                    city: 'Pune',
                    specialRequirements: null,
                    assignmentNotes: 'ground floor',
                    assignedAt: minutesLater(0)
                }
            ]);
        });

        it('should throw for an unknown host', async () => {
            await expect(service.getHost('missing')).rejects.toThrow('Host not found');
        });
    });

    describe('updateHost', () => {
        beforeEach(() => {
            mockDb.seed('hosts', [
                buildHost({ id: 'host-1', phoneNo: 9100000001 }),
                buildHost({ id: 'host-2', phoneNo: 9100000002, eventDaysId: 'day-2' })
            ]);
        });

        it('should apply the patch and invalidate the dashboard', async () => {
            const result = await service.updateHost('host-1', { placeName: 'Hill Road' });

            expect(result.placeName).toBe('Hill Road');
            expect(result.eventDate).toBe('2025-02-01');
            expect(mockCache.invalidate).toHaveBeenCalledWith('dashboard:event-1');
        });

        it('should move a host without assignments to another day', async () => {
            const result = await service.updateHost('host-1', { eventDaysId: 'day-2' });

            expect(result.eventDaysId).toBe('day-2');
            expect(result.eventDate).toBe('2025-02-02');
        });

        it('should re-check the phone number on the target day', async () => {
            await expect(
                service.updateHost('host-1', { eventDaysId: 'day-2', phoneNo: 9100000002 })
            ).rejects.toThrow('Phone number already registered for this event day');
        });

        it('should not conflict with its own phone number', async () => {
            const result = await service.updateHost('host-1', { phoneNo: 9100000001, name: 'Meena K' });

            expect(result.name).toBe('Meena K');
        });

        it('should refuse to move a host that lodges members', async () => {
            mockDb.seed('host_assignments', [buildAssignment()]);

            await expect(service.updateHost('host-1', { eventDaysId: 'day-2' })).rejects.toThrow(
                'Cannot move host with existing assignments to another event day'
            );
        });

        it('should refuse a capacity below the lodged members', async () => {
            mockDb.seed('host_assignments', [
                buildAssignment({ id: 'a-1', registrationMemberId: 'member-1' }),
                buildAssignment({ id: 'a-2', registrationMemberId: 'member-2' })
            ]);

            const promise = service.updateHost('host-1', { maxParticipants: 1 });

            await expect(promise).rejects.toBeInstanceOf(ValidationError);
            await expect(promise).rejects.toThrow('Max participants cannot be lower than the 2 members already assigned');
        });
    });

    describe('deleteHost', () => {
        it('should delete a host without assignments', async () => {
            mockDb.seed('hosts', [buildHost()]);

            const result = await service.deleteHost('host-1');

            expect(result).toEqual({ message: 'Host deleted successfully', deletedHostId: 'host-1' });
            expect(mockDb.getCollectionData('hosts')).toHaveLength(0);
            expect(mockCache.invalidate).toHaveBeenCalledWith('dashboard:event-1');
        });

        it('should leave the dashboard cached when the delete is refused', async () => {
            mockDb.seed('hosts', [buildHost()]);
            mockDb.seed('host_assignments', [buildAssignment()]);

            await expect(service.deleteHost('host-1')).rejects.toBeInstanceOf(ConflictError);
            expect(mockCache.invalidate).not.toHaveBeenCalled();
        });

        it('should refuse to delete a host with assignments', async () => {
            mockDb.seed('hosts', [buildHost()]);
            mockDb.seed('host_assignments', [buildAssignment()]);

            await expect(service.deleteHost('host-1')).rejects.toThrow(
                'Cannot delete host with existing assignments. Please remove assignments first.'
            );
            expect(mockDb.getCollectionData('hosts')).toHaveLength(1);
        });
    });

    // ============================================================================
    // Listings
    // ============================================================================

    describe('listHosts', () => {
        beforeEach(() => {
            mockDb.seed('hosts', [
                buildHost({ id: 'h-c', name: 'Chitra', maxParticipants: 5, facilitiesDescription: 'AC room' }),
                buildHost({ id: 'h-a', name: 'Anil', maxParticipants: 2, eventDaysId: 'day-2', toiletFacilities: 'indian' }),
                buildHost({ id: 'h-b', name: 'Bina', maxParticipants: 4 }),
                buildHost({ id: 'h-x', name: 'Xavier', eventId: 'event-2', eventDaysId: 'day-9' })
            ]);
        });

        it('should list the hosts of an event sorted by name with page info', async () => {
            const result = await service.listHosts({ eventId: 'event-1' });

            expect(result.hosts.map(host => host.id)).toEqual(['h-a', 'h-b', 'h-c']);
            expect(result.hosts[0].eventDate).toBe('2025-02-02');
            expect(result.totalCount).toBe(3);
            expect(result.page).toBe(1);
            expect(result.pageSize).toBe(10);
            expect(result.totalPages).toBe(1);
        });

        it('should paginate', async () => {
            const result = await service.listHosts({ eventId: 'event-1' }, 2, 2);

            expect(result.hosts.map(host => host.id)).toEqual(['h-c']);
            expect(result.totalPages).toBe(2);
        });

        it('should filter by a case-insensitive name fragment', async () => {
            const result = await service.listHosts({ eventId: 'event-1', name: 'BI' });
            expect(result.hosts.map(host => host.id)).toEqual(['h-b']);
        });

        it('should filter by capacity range', async () => {
            const result = await service.listHosts({ eventId: 'event-1', minCapacity: 3, maxCapacity: 4 });
            expect(result.hosts.map(host => host.id)).toEqual(['h-b']);
        });

        it('should filter by presence of a facilities description', async () => {
            const withDescription = await service.listHosts({ eventId: 'event-1', hasFacilitiesDescription: true });
            const withoutDescription = await service.listHosts({ eventId: 'event-1', hasFacilitiesDescription: false });

            expect(withDescription.hosts.map(host => host.id)).toEqual(['h-c']);
            expect(withoutDescription.hosts.map(host => host.id)).toEqual(['h-a', 'h-b']);
        });

        it('should filter by toilet facilities and day', async () => {
            const result = await service.listHosts({ eventId: 'event-1', toiletFacilities: 'indian', eventDaysId: 'day-2' });
            expect(result.hosts.map(host => host.id)).toEqual(['h-a']);
        });
    });

    describe('listHostsGroupedByEventDay', () => {
        it('should group hosts under every day of the event in date order', async () => {
            mockDb.seed('hosts', [
                buildHost({ id: 'h-b', name: 'Bina', eventDaysId: 'day-2' }),
                buildHost({ id: 'h-a', name: 'Anil', eventDaysId: 'day-2' })
            ]);

            const result = await service.listHostsGroupedByEventDay('event-1');

            expect(result.totalHosts).toBe(2);
            expect(result.eventDays.map(day => [day.eventDate, day.totalHosts])).toEqual([
                ['2025-02-01', 0],
                ['2025-02-02', 2]
            ]);
            expect(result.eventDays[1].hosts.map(host => host.id)).toEqual(['h-a', 'h-b']);
            expect(result.eventDays[1].hosts[0].availableCapacity).toBe(2);
        });
    });
});
