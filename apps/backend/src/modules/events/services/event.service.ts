import { v4 as uuidv4 } from 'uuid';
import type { IDatabaseService, IEvent, IEventDay, IEventWithDays, ILogger } from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';

export interface ICreateEventDayInput {
    eventDate: string;
    breakfastProvided?: boolean;
    lunchProvided?: boolean;
    dinnerProvided?: boolean;
    locationName?: string | null;
    dailyNotes?: string | null;
}

export interface ICreateEventInput {
    eventName: string;
    startDate: string;
    endDate: string;
    locationName: string;
    locationMapLink?: string | null;
    description?: string | null;
    ngo?: string | null;
    isActive?: boolean;
    allowedRegistration?: number | null;
    registrationStartDate?: string | null;
    eventDays: ICreateEventDayInput[];
}

/**
 * Service for events and their event days.
 *
 * Event days are stored in their own collection and always returned attached
 * to their event, sorted by date.
 */
export class EventService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger
    ) {}

    async createIndexes(): Promise<void> {
        await this.database.createIndex(COLLECTIONS.events, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.eventDays, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.eventDays, { eventId: 1, eventDate: 1 });
    }

    /**
     * Create an event together with its days.
     *
     * @throws ValidationError if the end date precedes the start date
     */
    async createEvent(input: ICreateEventInput): Promise<IEventWithDays> {
        if (input.endDate < input.startDate) {
            throw new ValidationError('End date must not be before start date');
        }

        const now = new Date();
        const event: IEvent = {
            id: uuidv4(),
            eventName: input.eventName,
            startDate: input.startDate,
            endDate: input.endDate,
            locationName: input.locationName,
            locationMapLink: input.locationMapLink ?? null,
            description: input.description ?? null,
            ngo: input.ngo ?? null,
            isActive: input.isActive ?? true,
            allowedRegistration: input.allowedRegistration ?? null,
            registrationStartDate: input.registrationStartDate ?? null,
            createdAt: now,
            updatedAt: now
        };

        const eventDays: IEventDay[] = input.eventDays.map(day => ({
            id: uuidv4(),
            eventId: event.id,
            eventDate: day.eventDate,
            breakfastProvided: day.breakfastProvided ?? false,
            lunchProvided: day.lunchProvided ?? false,
            dinnerProvided: day.dinnerProvided ?? false,
            locationName: day.locationName ?? null,
            dailyNotes: day.dailyNotes ?? null,
            createdAt: now,
            updatedAt: now
        }));

        await this.database.insertOne(COLLECTIONS.events, event);
        await this.database.insertMany(COLLECTIONS.eventDays, eventDays);

        this.logger.info({ eventId: event.id, days: eventDays.length }, 'Event created');

        return { ...event, eventDays: sortByDate(eventDays) };
    }

    /**
     * All events ordered by start date, each with its days.
     */
    async listEvents(): Promise<IEventWithDays[]> {
        const events = await this.database.find<IEvent>(COLLECTIONS.events, {}, { sort: { startDate: 1 } });
        if (events.length === 0) {
            return [];
        }

        const days = await this.database.find<IEventDay>(COLLECTIONS.eventDays, {
            eventId: { $in: events.map(event => event.id) }
        });

        const daysByEvent = new Map<string, IEventDay[]>();
        for (const day of days) {
            const list = daysByEvent.get(day.eventId) ?? [];
            list.push(day);
            daysByEvent.set(day.eventId, list);
        }

        return events.map(event => ({ ...event, eventDays: sortByDate(daysByEvent.get(event.id) ?? []) }));
    }

    /**
     * @throws NotFoundError if the event does not exist
     */
    async getEvent(id: string): Promise<IEventWithDays> {
        const event = await this.database.findOne<IEvent>(COLLECTIONS.events, { id });
        if (!event) {
            throw new NotFoundError('Event not found');
        }
        const days = await this.getEventDays(id);
        return { ...event, eventDays: days };
    }

    async getEventDays(eventId: string): Promise<IEventDay[]> {
        return await this.database.find<IEventDay>(COLLECTIONS.eventDays, { eventId }, { sort: { eventDate: 1 } });
    }
}

function sortByDate(days: IEventDay[]): IEventDay[] {
    return [...days].sort((a, b) => a.eventDate.localeCompare(b.eventDate));
}
