import type { IEventDay } from './IEventDay.js';

/**
 * A multi-day community event.
 *
 * Dates are calendar dates in ISO `YYYY-MM-DD` form.
 */
export interface IEvent {
    id: string;
    eventName: string;
    startDate: string;
    endDate: string;
    locationName: string;
    locationMapLink: string | null;
    description: string | null;
    /** Organising NGO, free text */
    ngo: string | null;
    isActive: boolean;
    /**
     * Seat limit across all registrations. Members beyond it are put on the
     * waiting list. Null means unlimited.
     */
    allowedRegistration: number | null;
    registrationStartDate: string | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Event as returned by the API, with its days attached.
 */
export interface IEventWithDays extends IEvent {
    eventDays: IEventDay[];
}
