import type { Gender, GenderPreference, ToiletFacilities } from '../enums/index.js';

/**
 * A local housing provider offering beds for one event day.
 */
export interface IHost {
    id: string;
    eventId: string;
    eventDaysId: string;
    name: string;
    phoneNo: number;
    placeName: string;
    maxParticipants: number;
    toiletFacilities: ToiletFacilities;
    genderPreference: GenderPreference;
    facilitiesDescription: string | null;
    createdAt: Date;
    updatedAt: Date;
}

export interface IHostWithDate extends IHost {
    eventDate: string | null;
}

/**
 * Member currently lodged with a host.
 */
export interface IAssignedParticipant {
    id: string;
    assignmentId: string;
    name: string;
    phoneNumber: string;
    age: number | null;
    gender: Gender;
    city: string | null;
    specialRequirements: string | null;
    assignmentNotes: string | null;
    assignedAt: Date;
}

export interface IHostWithParticipants extends IHostWithDate {
    assignedParticipants: IAssignedParticipant[];
    currentCapacity: number;
    availableCapacity: number;
}

export interface IHostsForEventDay {
    eventDate: string;
    eventDayId: string;
    hosts: IHostWithParticipants[];
    totalHosts: number;
}

export interface IHostsByEvent {
    eventId: string;
    eventDays: IHostsForEventDay[];
    totalHosts: number;
}
