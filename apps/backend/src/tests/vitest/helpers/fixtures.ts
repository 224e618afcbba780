import type {
    IDailyPreference,
    IEvent,
    IEventDay,
    IHost,
    IHostAssignment,
    IRegistration,
    IRegistrationMember,
    IVehicleSharing
} from '@event-suite/types';

/**
 * Record builders for tests. Each returns a complete document with fixed
 * timestamps; pass overrides for the fields a test cares about.
 */

const CREATED_AT = new Date('2025-01-01T00:00:00.000Z');

/**
 * Timestamp `minutes` after the fixtures' base time, for ordering records.
 */
export function minutesLater(minutes: number): Date {
    return new Date(CREATED_AT.getTime() + minutes * 60_000);
}

export function buildEvent(overrides: Partial<IEvent> = {}): IEvent {
    return {
        id: 'event-1',
        eventName: 'Winter Walk',
        startDate: '2025-02-01',
        endDate: '2025-02-03',
        locationName: 'Riverside',
        locationMapLink: null,
        description: null,
        ngo: null,
        isActive: true,
        allowedRegistration: null,
        registrationStartDate: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildEventDay(overrides: Partial<IEventDay> = {}): IEventDay {
    return {
        id: 'day-1',
        eventId: 'event-1',
        eventDate: '2025-02-01',
        breakfastProvided: true,
        lunchProvided: false,
        dinnerProvided: true,
        locationName: 'Riverside camp',
        dailyNotes: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildRegistration(overrides: Partial<IRegistration> = {}): IRegistration {
    return {
        id: 'registration-1',
        eventId: 'event-1',
        registrationType: 'individual',
        numberOfMembers: 1,
        transportationMode: 'public',
        hasEmptySeats: false,
        availableSeatsCount: 0,
        notes: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildMember(overrides: Partial<IRegistrationMember> = {}): IRegistrationMember {
    return {
        id: 'member-1',
        registrationId: 'registration-1',
        eventId: 'event-1',
        name: 'Asha',
        phoneNumber: '9000000001',
        email: null,
        city: 'Pune',
        age: 28,
        gender: 'F',
        language: null,
        floorPreference: null,
        specialRequirements: null,
        status: 'registered',
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildPreference(overrides: Partial<IDailyPreference> = {}): IDailyPreference {
    return {
        id: 'preference-1',
        registrationId: 'registration-1',
        eventDayId: 'day-1',
        stayingWithYatra: true,
        dinnerAtHost: true,
        breakfastAtHost: true,
        lunchWithYatra: true,
        physicalLimitations: null,
        toiletPreference: 'indian',
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildHost(overrides: Partial<IHost> = {}): IHost {
    return {
        id: 'host-1',
        eventId: 'event-1',
        eventDaysId: 'day-1',
        name: 'Meena',
        phoneNo: 9100000001,
        placeName: 'Lake Road',
        maxParticipants: 2,
        toiletFacilities: 'both',
        genderPreference: 'both',
        facilitiesDescription: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildAssignment(overrides: Partial<IHostAssignment> = {}): IHostAssignment {
    return {
        id: 'assignment-1',
        hostId: 'host-1',
        registrationMemberId: 'member-1',
        eventDayId: 'day-1',
        assignmentNotes: null,
        assignedBy: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}

export function buildVehicleSharing(overrides: Partial<IVehicleSharing> = {}): IVehicleSharing {
    return {
        id: 'sharing-1',
        vehicleOwnerMemberId: 'member-1',
        coTravelerMemberId: 'member-2',
        sharingNotes: null,
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
        ...overrides
    };
}
