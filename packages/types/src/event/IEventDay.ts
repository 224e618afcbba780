/**
 * One calendar day of an event with its catering and location details.
 */
export interface IEventDay {
    id: string;
    eventId: string;
    eventDate: string;
    breakfastProvided: boolean;
    lunchProvided: boolean;
    dinnerProvided: boolean;
    locationName: string | null;
    dailyNotes: string | null;
    createdAt: Date;
    updatedAt: Date;
}
