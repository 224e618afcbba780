import type { RegistrationType, TransportationMode } from '../enums/index.js';
import type { IRegistrationMember } from './IRegistrationMember.js';
import type { IDailyPreference } from './IDailyPreference.js';

/**
 * A signup for an event. Individual registrations have exactly one member;
 * group registrations have `numberOfMembers` members.
 */
export interface IRegistration {
    id: string;
    eventId: string;
    registrationType: RegistrationType;
    numberOfMembers: number;
    transportationMode: TransportationMode;
    /** Whether the group's private vehicle has free seats to offer */
    hasEmptySeats: boolean;
    availableSeatsCount: number;
    notes: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface IRegistrationWithDetails extends IRegistration {
    members: IRegistrationMember[];
    dailyPreferences: IDailyPreference[];
}
