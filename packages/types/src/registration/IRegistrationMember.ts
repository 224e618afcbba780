import type { Gender, RegistrationStatus } from '../enums/index.js';

/**
 * A single participant belonging to a registration.
 *
 * `eventId` is copied from the registration so seat counts and status
 * listings can be answered from this collection alone.
 */
export interface IRegistrationMember {
    id: string;
    registrationId: string;
    eventId: string;
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
}
