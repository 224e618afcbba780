import { v4 as uuidv4 } from 'uuid';
import type { Document, Filter } from 'mongodb';
import type {
    GenderPreference,
    IAssignedParticipant,
    ICacheService,
    IDatabaseService,
    IEvent,
    IEventDay,
    IHost,
    IHostAssignment,
    IHostsByEvent,
    IHostWithDate,
    IHostWithParticipants,
    ILogger,
    IPageInfo,
    IRegistrationMember,
    ToiletFacilities
} from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { buildPageInfo, normalizePage, pageOffset } from '../../../lib/pagination.js';
import { containsIgnoreCase, definedFields, presenceFilter } from '../../../lib/query.js';
import { invalidateDashboard } from '../../../lib/dashboard-cache.js';

export const MAX_HOST_PAGE_SIZE = 100;

export interface ICreateHostInput {
    eventId: string;
    eventDaysId: string;
    name: string;
    phoneNo: number;
    placeName: string;
    maxParticipants: number;
    toiletFacilities: ToiletFacilities;
    genderPreference: GenderPreference;
    facilitiesDescription?: string | null;
}

export interface IUpdateHostInput {
    eventDaysId?: string;
    name?: string;
    phoneNo?: number;
    placeName?: string;
    maxParticipants?: number;
    toiletFacilities?: ToiletFacilities;
    genderPreference?: GenderPreference;
    facilitiesDescription?: string | null;
}

export interface IHostFilters {
    eventId: string;
    eventDaysId?: string;
    name?: string;
    phoneNo?: number;
    placeName?: string;
    minCapacity?: number;
    maxCapacity?: number;
    toiletFacilities?: ToiletFacilities;
    genderPreference?: GenderPreference;
    hasFacilitiesDescription?: boolean;
}

export interface IHostListResult extends IPageInfo {
    hosts: IHostWithDate[];
}

/**
 * Service for hosts offering beds on one event day.
 *
 * A phone number identifies a host within an event day: two hosts of the
 * same day may not share it.
 */
export class HostService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly cacheService: ICacheService | null,
        private readonly logger: ILogger
    ) {}

    async createIndexes(): Promise<void> {
        await this.database.createIndex(COLLECTIONS.hosts, { id: 1 }, { unique: true });
        await this.database.createIndex(COLLECTIONS.hosts, { eventId: 1, name: 1 });
        await this.database.createIndex(COLLECTIONS.hosts, { eventDaysId: 1, phoneNo: 1 });
    }

    /**
     * @throws NotFoundError if the event does not exist
     * @throws ValidationError if the event day is unknown or belongs to another event
     * @throws ConflictError if the phone number is taken on that event day
     */
    async createHost(input: ICreateHostInput): Promise<IHostWithDate> {
        const event = await this.database.findOne<IEvent>(COLLECTIONS.events, { id: input.eventId });
        if (!event) {
            throw new NotFoundError('Event not found');
        }

        const eventDay = await this.requireEventDay(input.eventDaysId, event.id);
        await this.assertPhoneAvailable(input.eventDaysId, input.phoneNo);

        const now = new Date();
        const host: IHost = {
            id: uuidv4(),
            eventId: event.id,
            eventDaysId: eventDay.id,
            name: input.name,
            phoneNo: input.phoneNo,
            placeName: input.placeName,
            maxParticipants: input.maxParticipants,
            toiletFacilities: input.toiletFacilities,
            genderPreference: input.genderPreference,
            facilitiesDescription: input.facilitiesDescription ?? null,
            createdAt: now,
            updatedAt: now
        };

        await this.database.insertOne(COLLECTIONS.hosts, host);
        this.logger.info({ hostId: host.id, eventId: host.eventId, eventDayId: host.eventDaysId }, 'Host created');

        return { ...host, eventDate: eventDay.eventDate };
    }

    /**
     * Host with its event date, lodged participants and capacity.
     *
     * @throws NotFoundError if the host does not exist
     */
    async getHost(id: string): Promise<IHostWithParticipants> {
        const host = await this.requireHost(id);
        const eventDay = await this.database.findOne<IEventDay>(COLLECTIONS.eventDays, { id: host.eventDaysId });
        const [withParticipants] = await this.attachParticipants([host], eventDay?.eventDate ?? null);
        return withParticipants;
    }

    /**
     * Partial update.
     *
     * Moving a host to another day or changing its phone number re-checks
     * the phone number against the hosts of the target day. Capacity may not
     * drop below the number of members already lodged.
     *
     * @throws NotFoundError if the host does not exist
     */
    async updateHost(id: string, patch: IUpdateHostInput): Promise<IHostWithDate> {
        const host = await this.requireHost(id);
        const assignmentCount = await this.database.count(COLLECTIONS.hostAssignments, { hostId: id });

        const targetDayId = patch.eventDaysId ?? host.eventDaysId;
        let eventDay: IEventDay | null = null;
        if (patch.eventDaysId !== undefined && patch.eventDaysId !== host.eventDaysId) {
            eventDay = await this.requireEventDay(patch.eventDaysId, host.eventId);
            if (assignmentCount > 0) {
                throw new ConflictError('Cannot move host with existing assignments to another event day');
            }
        }

        const targetPhone = patch.phoneNo ?? host.phoneNo;
        if (targetPhone !== host.phoneNo || targetDayId !== host.eventDaysId) {
            await this.assertPhoneAvailable(targetDayId, targetPhone, id);
        }

        if (patch.maxParticipants !== undefined && patch.maxParticipants < assignmentCount) {
            throw new ValidationError(
                `Max participants cannot be lower than the ${assignmentCount} members already assigned`
            );
        }

        await this.database.updateOne(
            COLLECTIONS.hosts,
            { id },
            { $set: { ...definedFields(patch), updatedAt: new Date() } }
        );
        await invalidateDashboard(this.cacheService, host.eventId, this.logger);

        const updated = await this.requireHost(id);
        eventDay ??= await this.database.findOne<IEventDay>(COLLECTIONS.eventDays, { id: updated.eventDaysId });
        return { ...updated, eventDate: eventDay?.eventDate ?? null };
    }

    /**
     * @throws ConflictError if members are still assigned to the host
     */
    async deleteHost(id: string): Promise<{ message: string; deletedHostId: string }> {
        const host = await this.requireHost(id);

        const assignments = await this.database.count(COLLECTIONS.hostAssignments, { hostId: id });
        if (assignments > 0) {
            throw new ConflictError('Cannot delete host with existing assignments. Please remove assignments first.');
        }

        await this.database.deleteOne(COLLECTIONS.hosts, { id });
        await invalidateDashboard(this.cacheService, host.eventId, this.logger);
        this.logger.info({ hostId: id }, 'Host deleted');

        return { message: 'Host deleted successfully', deletedHostId: id };
    }

    /**
     * Filtered, paginated host listing of one event, sorted by name.
     */
    async listHosts(filters: IHostFilters, page?: number, pageSize?: number): Promise<IHostListResult> {
        const request = normalizePage(page, pageSize, MAX_HOST_PAGE_SIZE);
        const filter = buildHostFilter(filters);

        const totalCount = await this.database.count(COLLECTIONS.hosts, filter);
        const hosts = await this.database.find<IHost>(COLLECTIONS.hosts, filter, {
            sort: { name: 1 },
            skip: pageOffset(request),
            limit: request.pageSize
        });

        const days = await this.database.find<IEventDay>(COLLECTIONS.eventDays, {
            id: { $in: [...new Set(hosts.map(host => host.eventDaysId))] }
        });
        const dateByDay = new Map(days.map(day => [day.id, day.eventDate]));

        return {
            hosts: hosts.map(host => ({ ...host, eventDate: dateByDay.get(host.eventDaysId) ?? null })),
            ...buildPageInfo(totalCount, request)
        };
    }

    /**
     * Every host of an event, grouped under its event day.
     *
     * Days without hosts are listed with an empty host list.
     */
    async listHostsGroupedByEventDay(eventId: string): Promise<IHostsByEvent> {
        const days = await this.database.find<IEventDay>(
            COLLECTIONS.eventDays,
            { eventId },
            { sort: { eventDate: 1 } }
        );

        const eventDays: IHostsByEvent['eventDays'] = [];
        let totalHosts = 0;

        for (const day of days) {
            const hosts = await this.database.find<IHost>(
                COLLECTIONS.hosts,
                { eventDaysId: day.id },
                { sort: { name: 1 } }
            );
            const withParticipants = await this.attachParticipants(hosts, day.eventDate);
            eventDays.push({
                eventDate: day.eventDate,
                eventDayId: day.id,
                hosts: withParticipants,
                totalHosts: withParticipants.length
            });
            totalHosts += withParticipants.length;
        }

        return { eventId, eventDays, totalHosts };
    }

    private async requireHost(id: string): Promise<IHost> {
        const host = await this.database.findOne<IHost>(COLLECTIONS.hosts, { id });
        if (!host) {
            throw new NotFoundError('Host not found');
        }
        return host;
    }

    private async requireEventDay(eventDayId: string, eventId: string): Promise<IEventDay> {
        const eventDay = await this.database.findOne<IEventDay>(COLLECTIONS.eventDays, { id: eventDayId });
        if (!eventDay || eventDay.eventId !== eventId) {
            throw new ValidationError('Invalid event_days_id provided');
        }
        return eventDay;
    }

    private async assertPhoneAvailable(eventDayId: string, phoneNo: number, excludeHostId?: string): Promise<void> {
        const filter: Filter<Document> = { eventDaysId: eventDayId, phoneNo };
        if (excludeHostId) {
            filter.id = { $ne: excludeHostId };
        }
        const existing = await this.database.findOne<IHost>(COLLECTIONS.hosts, filter);
        if (existing) {
            throw new ConflictError('Phone number already registered for this event day');
        }
    }

    private async attachParticipants(hosts: IHost[], eventDate: string | null): Promise<IHostWithParticipants[]> {
        if (hosts.length === 0) {
            return [];
        }

        const assignments = await this.database.find<IHostAssignment>(
            COLLECTIONS.hostAssignments,
            { hostId: { $in: hosts.map(host => host.id) } },
            { sort: { createdAt: 1 } }
        );
        const members = await this.database.find<IRegistrationMember>(COLLECTIONS.members, {
            id: { $in: assignments.map(assignment => assignment.registrationMemberId) }
        });
        const memberById = new Map(members.map(member => [member.id, member]));

        return hosts.map(host => {
            const assignedParticipants: IAssignedParticipant[] = [];
            for (const assignment of assignments) {
                const member = memberById.get(assignment.registrationMemberId);
                if (assignment.hostId !== host.id || !member) {
                    continue;
                }
                assignedParticipants.push({
                    id: member.id,
                    assignmentId: assignment.id,
                    name: member.name,
                    phoneNumber: member.phoneNumber,
                    age: member.age,
                    gender: member.gender,
                    city: member.city,
                    specialRequirements: member.specialRequirements,
                    assignmentNotes: assignment.assignmentNotes,
                    assignedAt: assignment.createdAt
                });
            }
            return {
                ...host,
                eventDate,
                assignedParticipants,
                currentCapacity: assignedParticipants.length,
                availableCapacity: host.maxParticipants - assignedParticipants.length
            };
        });
    }
}

function buildHostFilter(filters: IHostFilters): Filter<Document> {
    const filter: Filter<Document> = { eventId: filters.eventId };

    if (filters.eventDaysId) {
        filter.eventDaysId = filters.eventDaysId;
    }
    if (filters.name) {
        filter.name = containsIgnoreCase(filters.name);
    }
    if (filters.phoneNo !== undefined) {
        filter.phoneNo = filters.phoneNo;
    }
    if (filters.placeName) {
        filter.placeName = containsIgnoreCase(filters.placeName);
    }

    const capacity: { $gte?: number; $lte?: number } = {};
    if (filters.minCapacity !== undefined) {
        capacity.$gte = filters.minCapacity;
    }
    if (filters.maxCapacity !== undefined) {
        capacity.$lte = filters.maxCapacity;
    }
    if (Object.keys(capacity).length > 0) {
        filter.maxParticipants = capacity;
    }

    if (filters.toiletFacilities) {
        filter.toiletFacilities = filters.toiletFacilities;
    }
    if (filters.genderPreference) {
        filter.genderPreference = filters.genderPreference;
    }
    if (filters.hasFacilitiesDescription !== undefined) {
        filter.facilitiesDescription = presenceFilter(filters.hasFacilitiesDescription);
    }

    return filter;
}
