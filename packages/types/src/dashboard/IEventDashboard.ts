import type {
    Gender,
    RegistrationStatus,
    RegistrationType,
    ToiletPreference,
    TransportationMode
} from '../enums/index.js';

export interface IToiletPreferenceCounts {
    indian: number;
    western: number;
}

/**
 * A member as seen on one day of the dashboard: member fields, the group's
 * preference for the day, group fields and the assigned host.
 */
export interface IDashboardParticipant {
    id: string;
    name: string;
    phoneNumber: string;
    email: string | null;
    city: string | null;
    age: number | null;
    gender: Gender;
    language: string | null;
    floorPreference: string | null;
    specialRequirements: string | null;
    status: RegistrationStatus;
    createdAt: Date;
    updatedAt: Date;

    stayingWithYatra: boolean;
    dinnerAtHost: boolean;
    breakfastAtHost: boolean;
    lunchWithYatra: boolean;
    physicalLimitations: string | null;
    toiletPreference: ToiletPreference;

    groupId: string;
    registrationType: RegistrationType;
    transportationMode: TransportationMode;
    hasEmptySeats: boolean;
    availableSeatsCount: number;
    notes: string | null;

    hostId: string | null;
    hostName: string | null;
    hostPlaceName: string | null;
    hostPhoneNo: number | null;
}

export interface IDashboardDay {
    eventDayId: string;
    eventDate: string;
    locationName: string | null;
    breakfastProvided: boolean;
    lunchProvided: boolean;
    dinnerProvided: boolean;
    dailyNotes: string | null;
    participants: IDashboardParticipant[];
    /** Counted over fully attending groups only */
    toiletPreferences: IToiletPreferenceCounts;
}

export interface IAgeGroups {
    '0-18': number;
    '19-30': number;
    '31-50': number;
    '51+': number;
}

export interface IDashboardSummary {
    totalGroups: number;
    individualRegistrations: number;
    groupRegistrations: number;
    publicTransport: number;
    privateTransport: number;
    groupsWithEmptySeats: number;
    totalEmptySeats: number;
    genderDistribution: Record<Gender, number>;
    ageGroups: IAgeGroups;
    cityDistribution: Record<string, number>;
    toiletPreferences: IToiletPreferenceCounts;
    /** Keyed by event date */
    dailyToiletPreferences: Record<string, IToiletPreferenceCounts>;
}

export interface IEventDashboard {
    eventId: string;
    eventName: string;
    eventStartDate: string;
    eventEndDate: string;
    totalRegistrations: number;
    totalParticipants: number;
    confirmedParticipants: number;
    waitingParticipants: number;
    dailySchedule: IDashboardDay[];
    summary: IDashboardSummary;
}
