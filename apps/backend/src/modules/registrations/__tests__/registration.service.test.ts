/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import type { IDailyPreference, IRegistrationMember } from '@event-suite/types';
import { RegistrationService, allocateStatus, type ICreateRegistrationInput } from '../services/registration.service.js';
import { createMockDatabaseService, type IMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockCacheService, type IMockCacheService } from '../../../tests/vitest/mocks/cache-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import {
    buildAssignment,
    buildEvent,
    buildEventDay,
    buildHost,
    buildMember,
    buildPreference,
    buildRegistration,
    minutesLater
} from '../../../tests/vitest/helpers/fixtures.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';

function groupInput(overrides: Partial<ICreateRegistrationInput> = {}): ICreateRegistrationInput {
    return {
        eventId: 'event-1',
        registrationType: 'group',
        numberOfMembers: 2,
        transportationMode: 'private',
        hasEmptySeats: true,
        availableSeatsCount: 2,
        members: [
            { name: 'Ravi', phoneNumber: '9000000101', gender: 'M', age: 40 },
            { name: 'Sita', phoneNumber: '9000000102', gender: 'F', age: 38 }
        ],
        ...overrides
    };
}

describe('RegistrationService', () => {
    let mockDb: IMockDatabaseService;
    let mockCache: IMockCacheService;
    let service: RegistrationService;

    beforeEach(() => {
        mockDb = createMockDatabaseService();
        mockCache = createMockCacheService();
        service = new RegistrationService(mockDb, mockCache, createMockLogger());

        mockDb.seed('events', [buildEvent()]);
        mockDb.seed('event_days', [
            buildEventDay({ id: 'day-1', eventDate: '2025-02-01' }),
            buildEventDay({ id: 'day-2', eventDate: '2025-02-02' })
        ]);
    });

    // ============================================================================
    // Seat Allocation
    // ============================================================================

    describe('allocateStatus', () => {
        it('should register everyone when the event has no limit', () => {
            expect(allocateStatus(null, 500, 1)).toBe('registered');
        });

        it('should register members up to the limit and wait-list the rest', () => {
            expect(allocateStatus(3, 2, 1)).toBe('registered');
            expect(allocateStatus(3, 2, 2)).toBe('waiting');
        });

        it('should treat a zero limit as unlimited', () => {
            expect(allocateStatus(0, 10, 1)).toBe('registered');
        });
    });

    // ============================================================================
    // createRegistration
    // ============================================================================

    describe('createRegistration', () => {
        it('should store the registration, its members and its daily preferences', async () => {
            const result = await service.createRegistration(
                groupInput({ dailyPreferences: [{ eventDayId: 'day-2', dinnerAtHost: false }] })
            );

            expect(result.eventId).toBe('event-1');
            expect(result.numberOfMembers).toBe(2);
            expect(result.notes).toBeNull();
            expect(result.members.map(member => member.name)).toEqual(['Ravi', 'Sita']);
            expect(result.members.every(member => member.registrationId === result.id)).toBe(true);
            expect(result.members.every(member => member.status === 'registered')).toBe(true);

            expect(mockDb.getCollectionData('registrations')).toHaveLength(1);
            expect(mockDb.getCollectionData('registration_members')).toHaveLength(2);
            expect(mockDb.getCollectionData('daily_preferences')).toHaveLength(1);
        });

        it('should fill preference defaults', async () => {
            const result = await service.createRegistration(
                groupInput({ dailyPreferences: [{ eventDayId: 'day-1' }] })
            );

            const [preference] = result.dailyPreferences;
            expect(preference.stayingWithYatra).toBe(true);
            expect(preference.dinnerAtHost).toBe(true);
            expect(preference.breakfastAtHost).toBe(true);
            expect(preference.lunchWithYatra).toBe(true);
            expect(preference.physicalLimitations).toBeNull();
            expect(preference.toiletPreference).toBe('indian');
        });

        it('should split a group across the registration limit', async () => {
            mockDb.seed('events', [buildEvent({ id: 'event-2', allowedRegistration: 3 })]);
            mockDb.seed('registration_members', [
                buildMember({ id: 'm-a', eventId: 'event-2', status: 'registered' }),
                buildMember({ id: 'm-b', eventId: 'event-2', status: 'confirmed' }),
                buildMember({ id: 'm-c', eventId: 'event-2', status: 'waiting' }),
                buildMember({ id: 'm-d', eventId: 'event-2', status: 'cancelled' })
            ]);

            const result = await service.createRegistration(groupInput({ eventId: 'event-2' }));

            expect(result.members.map(member => member.status)).toEqual(['registered', 'waiting']);
        });

        it('should reject an individual registration with more than one member', async () => {
            await expect(
                service.createRegistration(groupInput({ registrationType: 'individual' }))
            ).rejects.toThrow('Individual registration must have exactly one member');
        });

        it('should reject a member count that does not match the members', async () => {
            await expect(
                service.createRegistration(groupInput({ numberOfMembers: 3 }))
            ).rejects.toThrow('Number of members must match the members array length');
        });

        it('should throw NotFoundError for an unknown event', async () => {
            await expect(
                service.createRegistration(groupInput({ eventId: 'missing' }))
            ).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should reject a preference for a day of another event', async () => {
            mockDb.seed('event_days', [buildEventDay({ id: 'day-x', eventId: 'event-9' })]);

            const promise = service.createRegistration(
                groupInput({ dailyPreferences: [{ eventDayId: 'day-x' }] })
            );

            await expect(promise).rejects.toBeInstanceOf(ValidationError);
            await expect(promise).rejects.toThrow('Invalid event day for this event: day-x');
            expect(mockDb.getCollectionData('registrations')).toHaveLength(0);
        });

        it('should invalidate the event dashboard', async () => {
            await service.createRegistration(groupInput());

            expect(mockCache.invalidate).toHaveBeenCalledWith('dashboard:event-1');
        });
    });

    // ============================================================================
    // Reads
    // ============================================================================

    describe('getRegistration', () => {
        it('should attach members and preferences', async () => {
            mockDb.seed('registrations', [buildRegistration()]);
            mockDb.seed('registration_members', [buildMember()]);
            mockDb.seed('daily_preferences', [buildPreference()]);

            const result = await service.getRegistration('registration-1');

            expect(result.members.map(member => member.id)).toEqual(['member-1']);
            expect(result.dailyPreferences.map(preference => preference.id)).toEqual(['preference-1']);
        });

        it('should throw with the registration id for an unknown registration', async () => {
            await expect(service.getRegistration('nope')).rejects.toThrow('Registration with id nope not found');
        });
    });

    describe('listRegistrations', () => {
        beforeEach(() => {
            mockDb.seed('registrations', [
                buildRegistration({ id: 'r-2', createdAt: minutesLater(2) }),
                buildRegistration({ id: 'r-1', createdAt: minutesLater(1) }),
                buildRegistration({ id: 'r-3', eventId: 'event-2', createdAt: minutesLater(3) })
            ]);
        });

        it('should list in creation order', async () => {
            const result = await service.listRegistrations();
            expect(result.map(registration => registration.id)).toEqual(['r-1', 'r-2', 'r-3']);
        });

        it('should filter by event and page with skip and limit', async () => {
            const result = await service.listRegistrations({ eventId: 'event-1', skip: 1, limit: 1 });
            expect(result.map(registration => registration.id)).toEqual(['r-2']);
        });
    });

    // ============================================================================
    // searchParticipant
    // ============================================================================

    describe('searchParticipant', () => {
        beforeEach(() => {
            mockDb.seed('registrations', [buildRegistration({ registrationType: 'group', numberOfMembers: 2 })]);
            const members: IRegistrationMember[] = [
                buildMember({ id: 'member-1', phoneNumber: '9000000001', status: 'confirmed' }),
                buildMember({ id: 'member-2', phoneNumber: '9000000002', status: 'waiting', createdAt: minutesLater(1) })
            ];
            mockDb.seed('registration_members', members);
            const preferences: IDailyPreference[] = [
                buildPreference({ id: 'pref-2', eventDayId: 'day-2', toiletPreference: 'western' }),
                buildPreference({ id: 'pref-1', eventDayId: 'day-1', createdAt: minutesLater(1) })
            ];
            mockDb.seed('daily_preferences', preferences);
            mockDb.seed('hosts', [buildHost()]);
            mockDb.seed('host_assignments', [
                buildAssignment({ id: 'a-1', registrationMemberId: 'member-1' }),
                buildAssignment({ id: 'a-2', registrationMemberId: 'member-2' })
            ]);
        });

        it('should return the whole registration found through any member phone', async () => {
            const result = await service.searchParticipant('9000000002');

            expect(result.registrationId).toBe('registration-1');
            expect(result.members.map(member => member.id)).toEqual(['member-1', 'member-2']);
        });

        it('should list hosts only for members holding a seat', async () => {
            const result = await service.searchParticipant('9000000001');

            expect(result.members[0].hostAssignments).toEqual([
                { eventDayId: 'day-1', hostName: 'Meena', hostPhone: '9100000001', hostLocation: 'Lake Road' }
            ]);
            expect(result.members[1].hostAssignments).toEqual([]);
        });

        it('should order the schedule by event date', async () => {
            const result = await service.searchParticipant('9000000001');

            expect(result.dailySchedule.map(item => [item.eventDate, item.preferenceId, item.toiletPreference])).toEqual([
                ['2025-02-01', 'pref-1', 'indian'],
                ['2025-02-02', 'pref-2', 'western']
            ]);
        });

        it('should throw NotFoundError for an unknown phone number', async () => {
            await expect(service.searchParticipant('123')).rejects.toThrow(
                'No participant found with phone number: 123'
            );
        });
    });
});
