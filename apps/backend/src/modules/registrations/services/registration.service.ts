import { v4 as uuidv4 } from 'uuid';
import {
    ATTENDING_STATUSES,
    type Gender,
    type ICacheService,
    type IDailyPreference,
    type IDatabaseService,
    type IEvent,
    type IEventDay,
    type IHost,
    type IHostAssignment,
    type ILogger,
    type IParticipantHostAssignment,
    type IParticipantScheduleItem,
    type IParticipantSearchResult,
    type IRegistration,
    type IRegistrationMember,
    type IRegistrationWithDetails,
    type RegistrationStatus,
    type RegistrationType,
    type ToiletPreference,
    type TransportationMode
} from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import { invalidateDashboard } from '../../../lib/dashboard-cache.js';

export interface ICreateMemberInput {
    name: string;
    phoneNumber: string;
    email?: string | null;
    city?: string | null;
    age?: number | null;
    gender: Gender;
    language?: string | null;
    floorPreference?: string | null;
    specialRequirements?: string | null;
}

export interface ICreateDailyPreferenceInput {
    eventDayId: string;
    stayingWithYatra?: boolean;
    dinnerAtHost?: boolean;
    breakfastAtHost?: boolean;
    lunchWithYatra?: boolean;
    physicalLimitations?: string | null;
    toiletPreference?: ToiletPreference;
}

export interface ICreateRegistrationInput {
    eventId: string;
    registrationType: RegistrationType;
    numberOfMembers: number;
    transportationMode: TransportationMode;
    hasEmptySeats?: boolean;
    availableSeatsCount?: number;
    notes?: string | null;
    members: ICreateMemberInput[];
    dailyPreferences?: ICreateDailyPreferenceInput[];
}

export interface IListRegistrationsOptions {
    eventId?: string;
    skip?: number;
    limit?: number;
}

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 1000;

/**
 * Service for registrations, their members and daily preferences.
 *
 * ## Seat allocation
 *
 * An event's `allowedRegistration` caps the members holding a seat
 * (status `registered` or `confirmed`). When a registration arrives, member
 * number i (1-based, in request order) is `waiting` if the seats already held
 * plus i exceed the cap, and `registered` otherwise. A group can therefore be
 * split across the limit.
 */
export class RegistrationService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly cacheService: ICacheService | null,
        private readonly logger: ILogger
    ) {}

    async createIndexes(): Promise<void> {
        await this.database.createIndex(COLLECTIONS.registrations, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.registrations, { eventId: 1, createdAt: 1 });
        await this.database.createIndex(COLLECTIONS.members, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.members, { registrationId: 1 });
        await this.database.createIndex(COLLECTIONS.members, { phoneNumber: 1 });
        await this.database.createIndex(COLLECTIONS.members, { eventId: 1, status: 1 });
        await this.database.createIndex(COLLECTIONS.dailyPreferences, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.dailyPreferences, { registrationId: 1 });
    }

    /**
     * Create a registration with its members and daily preferences.
     *
     * @throws ValidationError if the member count is inconsistent or a
     *   preference names a day of another event
     * @throws NotFoundError if the event does not exist
     */
    async createRegistration(input: ICreateRegistrationInput): Promise<IRegistrationWithDetails> {
        if (input.registrationType === 'individual' && input.numberOfMembers !== 1) {
            throw new ValidationError('Individual registration must have exactly one member');
        }
        if (input.members.length !== input.numberOfMembers) {
            throw new ValidationError('Number of members must match the members array length');
        }

        const event = await this.database.findOne<IEvent>(COLLECTIONS.events, { id: input.eventId });
        if (!event) {
            throw new NotFoundError('Event not found');
        }

        const preferencesInput = input.dailyPreferences ?? [];
        if (preferencesInput.length > 0) {
            const days = await this.database.find<IEventDay>(COLLECTIONS.eventDays, { eventId: event.id });
            const dayIds = new Set(days.map(day => day.id));
            for (const preference of preferencesInput) {
                if (!dayIds.has(preference.eventDayId)) {
                    throw new ValidationError(`Invalid event day for this event: ${preference.eventDayId}`);
                }
            }
        }

        const currentCount = await this.countSeatsTaken(event.id);
        const now = new Date();

        const registration: IRegistration = {
            id: uuidv4(),
            eventId: event.id,
            registrationType: input.registrationType,
            numberOfMembers: input.numberOfMembers,
            transportationMode: input.transportationMode,
            hasEmptySeats: input.hasEmptySeats ?? false,
            availableSeatsCount: input.availableSeatsCount ?? 0,
            notes: input.notes ?? null,
            createdAt: now,
            updatedAt: now
        };

        const members: IRegistrationMember[] = input.members.map((member, index) => ({
            id: uuidv4(),
            registrationId: registration.id,
            eventId: event.id,
            name: member.name,
            phoneNumber: member.phoneNumber,
            email: member.email ?? null,
            city: member.city ?? null,
            age: member.age ?? null,
            gender: member.gender,
            language: member.language ?? null,
            floorPreference: member.floorPreference ?? null,
            specialRequirements: member.specialRequirements ?? null,
            status: allocateStatus(event.allowedRegistration, currentCount, index + 1),
            createdAt: now,
            updatedAt: now
        }));

        const dailyPreferences: IDailyPreference[] = preferencesInput.map(preference => ({
            id: uuidv4(),
            registrationId: registration.id,
            eventDayId: preference.eventDayId,
            stayingWithYatra: preference.stayingWithYatra ?? true,
            dinnerAtHost: preference.dinnerAtHost ?? true,
            breakfastAtHost: preference.breakfastAtHost ?? true,
            lunchWithYatra: preference.lunchWithYatra ?? true,
            physicalLimitations: preference.physicalLimitations ?? null,
            toiletPreference: preference.toiletPreference ?? 'indian',
            createdAt: now,
            updatedAt: now
        }));

        await this.database.insertOne(COLLECTIONS.registrations, registration);
        await this.database.insertMany(COLLECTIONS.members, members);
        await this.database.insertMany(COLLECTIONS.dailyPreferences, dailyPreferences);
        await invalidateDashboard(this.cacheService, event.id, this.logger);

        const waiting = members.filter(member => member.status === 'waiting').length;
        this.logger.info(
            { registrationId: registration.id, eventId: event.id, members: members.length, waiting },
            'Registration created'
        );

        return { ...registration, members, dailyPreferences };
    }

    /**
     * @throws NotFoundError if the registration does not exist
     */
    async getRegistration(id: string): Promise<IRegistrationWithDetails> {
        const registration = await this.database.findOne<IRegistration>(COLLECTIONS.registrations, { id });
        if (!registration) {
            throw new NotFoundError(`Registration with id ${id} not found`);
        }
        const [withDetails] = await this.attachDetails([registration]);
        return withDetails;
    }

    /**
     * Registrations in creation order, optionally for one event.
     */
    async listRegistrations(options: IListRegistrationsOptions = {}): Promise<IRegistrationWithDetails[]> {
        const limit = Math.min(options.limit ?? DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT);
        const filter = options.eventId ? { eventId: options.eventId } : {};
        const registrations = await this.database.find<IRegistration>(COLLECTIONS.registrations, filter, {
            sort: { createdAt: 1 },
            skip: options.skip ?? 0,
            limit
        });
        return await this.attachDetails(registrations);
    }

    /**
     * Look a participant up by phone number and return their whole
     * registration: all members, their hosts, and the day-by-day schedule.
     *
     * Host assignments are listed only for members holding a seat.
     *
     * @throws NotFoundError if no member has this phone number
     */
    async searchParticipant(phoneNumber: string): Promise<IParticipantSearchResult> {
        const notFound = new NotFoundError(`No participant found with phone number: ${phoneNumber}`);

        const [match] = await this.database.find<IRegistrationMember>(
            COLLECTIONS.members,
            { phoneNumber },
            { sort: { createdAt: 1 }, limit: 1 }
        );
        if (!match) {
            throw notFound;
        }

        const registration = await this.database.findOne<IRegistration>(COLLECTIONS.registrations, {
            id: match.registrationId
        });
        if (!registration) {
            throw notFound;
        }

        const members = await this.database.find<IRegistrationMember>(
            COLLECTIONS.members,
            { registrationId: registration.id },
            { sort: { createdAt: 1 } }
        );
        const preferences = await this.database.find<IDailyPreference>(
            COLLECTIONS.dailyPreferences,
            { registrationId: registration.id },
            { sort: { createdAt: 1 } }
        );

        const hostAssignments = await this.loadHostAssignments(
            members.filter(member => ATTENDING_STATUSES.includes(member.status)).map(member => member.id)
        );

        const days = await this.database.find<IEventDay>(COLLECTIONS.eventDays, {
            id: { $in: preferences.map(preference => preference.eventDayId) }
        });
        const dayById = new Map(days.map(day => [day.id, day]));

        const dailySchedule: IParticipantScheduleItem[] = [];
        for (const preference of preferences) {
            const day = dayById.get(preference.eventDayId);
            if (!day) {
                continue;
            }
            dailySchedule.push({
                eventDayId: day.id,
                eventDate: day.eventDate,
                locationName: day.locationName,
                breakfastProvided: day.breakfastProvided,
                lunchProvided: day.lunchProvided,
                dinnerProvided: day.dinnerProvided,
                dailyNotes: day.dailyNotes,
                preferenceId: preference.id,
                stayingWithYatra: preference.stayingWithYatra,
                dinnerAtHost: preference.dinnerAtHost,
                breakfastAtHost: preference.breakfastAtHost,
                lunchWithYatra: preference.lunchWithYatra,
                physicalLimitations: preference.physicalLimitations,
                toiletPreference: preference.toiletPreference,
                createdAt: preference.createdAt,
                updatedAt: preference.updatedAt
            });
        }
        dailySchedule.sort((a, b) => a.eventDate.localeCompare(b.eventDate));

        return {
            registrationId: registration.id,
            eventId: registration.eventId,
            registrationType: registration.registrationType,
            transportationMode: registration.transportationMode,
            hasEmptySeats: registration.hasEmptySeats,
            availableSeatsCount: registration.availableSeatsCount,
            notes: registration.notes,
            createdAt: registration.createdAt,
            updatedAt: registration.updatedAt,
            members: members.map(member => ({
                ...member,
                hostAssignments: hostAssignments.get(member.id) ?? []
            })),
            dailySchedule
        };
    }

    /**
     * Members of an event currently holding a seat.
     */
    async countSeatsTaken(eventId: string): Promise<number> {
        return await this.database.count(COLLECTIONS.members, {
            eventId,
            status: { $in: [...ATTENDING_STATUSES] }
        });
    }

    private async attachDetails(registrations: IRegistration[]): Promise<IRegistrationWithDetails[]> {
        if (registrations.length === 0) {
            return [];
        }
        const ids = registrations.map(registration => registration.id);
        const members = await this.database.find<IRegistrationMember>(
            COLLECTIONS.members,
            { registrationId: { $in: ids } },
            { sort: { createdAt: 1 } }
        );
        const preferences = await this.database.find<IDailyPreference>(
            COLLECTIONS.dailyPreferences,
            { registrationId: { $in: ids } },
            { sort: { createdAt: 1 } }
        );

        return registrations.map(registration => ({
            ...registration,
            members: members.filter(member => member.registrationId === registration.id),
            dailyPreferences: preferences.filter(preference => preference.registrationId === registration.id)
        }));
    }

    /**
     * Host details per member, for members whose assignments may be shown.
     */
    private async loadHostAssignments(memberIds: string[]): Promise<Map<string, IParticipantHostAssignment[]>> {
        const result = new Map<string, IParticipantHostAssignment[]>();
        if (memberIds.length === 0) {
            return result;
        }

        const assignments = await this.database.find<IHostAssignment>(COLLECTIONS.hostAssignments, {
            registrationMemberId: { $in: memberIds }
        });
        if (assignments.length === 0) {
            return result;
        }

        const hosts = await this.database.find<IHost>(COLLECTIONS.hosts, {
            id: { $in: [...new Set(assignments.map(assignment => assignment.hostId))] }
        });
        const hostById = new Map(hosts.map(host => [host.id, host]));

        for (const assignment of assignments) {
            const host = hostById.get(assignment.hostId);
            if (!host) {
                continue;
            }
            const list = result.get(assignment.registrationMemberId) ?? [];
            list.push({
                eventDayId: assignment.eventDayId,
                hostName: host.name,
                hostPhone: String(host.phoneNo),
                hostLocation: host.placeName
            });
            result.set(assignment.registrationMemberId, list);
        }
        return result;
    }
}

/**
 * Status of the `position`-th member (1-based) of an incoming registration.
 */
export function allocateStatus(
    allowedRegistration: number | null,
    seatsTaken: number,
    position: number
): RegistrationStatus {
    if (allowedRegistration && seatsTaken + position > allowedRegistration) {
        return 'waiting';
    }
    return 'registered';
}
