import type { RegistrationType, TransportationMode, ToiletPreference } from '../enums/index.js';
import type { IRegistrationMember } from './IRegistrationMember.js';

/**
 * Host details shown to a participant for one event day.
 */
export interface IParticipantHostAssignment {
    eventDayId: string;
    hostName: string;
    hostPhone: string;
    hostLocation: string;
}

export interface IParticipantMember extends IRegistrationMember {
    /** Empty unless the member holds a seat (registered or confirmed) */
    hostAssignments: IParticipantHostAssignment[];
}

/**
 * Event-day fields merged with the registration's preference for that day.
 */
export interface IParticipantScheduleItem {
    eventDayId: string;
    eventDate: string;
    locationName: string | null;
    breakfastProvided: boolean;
    lunchProvided: boolean;
    dinnerProvided: boolean;
    dailyNotes: string | null;
    preferenceId: string;
    stayingWithYatra: boolean;
    dinnerAtHost: boolean;
    breakfastAtHost: boolean;
    lunchWithYatra: boolean;
    physicalLimitations: string | null;
    toiletPreference: ToiletPreference;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Everything a participant needs to see about their registration, found
 * from one member's phone number.
 */
export interface IParticipantSearchResult {
    registrationId: string;
    eventId: string;
    registrationType: RegistrationType;
    transportationMode: TransportationMode;
    hasEmptySeats: boolean;
    availableSeatsCount: number;
    notes: string | null;
    createdAt: Date;
    updatedAt: Date;
    members: IParticipantMember[];
    dailySchedule: IParticipantScheduleItem[];
}
