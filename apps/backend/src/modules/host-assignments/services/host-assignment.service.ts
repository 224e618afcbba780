import { v4 as uuidv4 } from 'uuid';
import type { Document, Filter } from 'mongodb';
import type {
    IBulkAssignmentResult,
    ICacheService,
    IDatabaseService,
    IEventDay,
    IHost,
    IHostAssignment,
    ILogger,
    IPageInfo,
    IRegistrationMember
} from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { buildPageInfo, normalizePage, pageOffset } from '../../../lib/pagination.js';
import { presenceFilter } from '../../../lib/query.js';
import { invalidateDashboard } from '../../../lib/dashboard-cache.js';

export const MAX_ASSIGNMENT_PAGE_SIZE = 5000;

const ALREADY_ASSIGNED = 'Member already has an assignment for this event day';
const HOST_FULL = 'Host has reached maximum capacity for this event day';
const WRONG_DAY = 'Host does not lodge members on this event day';

export interface ICreateAssignmentInput {
    hostId: string;
    registrationMemberId: string;
    eventDayId: string;
    assignmentNotes?: string | null;
}

export interface IBulkAssignInput {
    hostId: string;
    registrationMemberIds: string[];
    eventDayId: string;
    assignmentNotes?: string | null;
    assignedBy?: string | null;
}

export interface IAssignmentFilters {
    hostId?: string;
    registrationMemberId?: string;
    eventDayId?: string;
    assignedBy?: string;
    hasNotes?: boolean;
}

export interface IAssignmentListResult extends IPageInfo {
    assignments: IHostAssignment[];
}

/**
 * Service placing registration members with hosts.
 *
 * A host lodges members only on its own event day, never more than
 * `maxParticipants` of them, and a member has at most one host per event day.
 */
export class HostAssignmentService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly cacheService: ICacheService | null,
        private readonly logger: ILogger
    ) {}

    async createIndexes(): Promise<void> {
        await this.database.createIndex(COLLECTIONS.hostAssignments, { id: 1 }, { unique: true });
        await this.database.createIndex(
            COLLECTIONS.hostAssignments,
            { registrationMemberId: 1, eventDayId: 1 },
            { unique: true }
        );
        await this.database.createIndex(COLLECTIONS.hostAssignments, { hostId: 1, eventDayId: 1 });
    }

    /**
     * Assign one member to a host for one event day.
     *
     * @param assignedBy - Free-text reference of the operator making the assignment
     * @throws NotFoundError if the host, member or event day does not exist
     * @throws ValidationError if the day is not the host's day, or the member is cancelled or of another event
     * @throws ConflictError if the member is already placed that day or the host is full
     */
    async createAssignment(input: ICreateAssignmentInput, assignedBy?: string | null): Promise<IHostAssignment> {
        const host = await this.requireHost(input.hostId);

        const member = await this.database.findOne<IRegistrationMember>(COLLECTIONS.members, {
            id: input.registrationMemberId
        });
        if (!member) {
            throw new NotFoundError('Registration member not found');
        }

        const eventDay = await this.requireEventDay(input.eventDayId);

        if (member.eventId !== host.eventId || eventDay.eventId !== host.eventId) {
            throw new ValidationError('Member, host and event day must belong to the same event');
        }
        if (eventDay.id !== host.eventDaysId) {
            throw new ValidationError(WRONG_DAY);
        }
        if (member.status === 'cancelled') {
            throw new ValidationError('Member is cancelled');
        }

        const existing = await this.database.count(COLLECTIONS.hostAssignments, {
            registrationMemberId: member.id,
            eventDayId: eventDay.id
        });
        if (existing > 0) {
            throw new ConflictError(ALREADY_ASSIGNED);
        }

        const occupied = await this.countOccupied(host.id, eventDay.id);
        if (occupied >= host.maxParticipants) {
            throw new ConflictError(HOST_FULL);
        }

        const assignment = buildAssignment(host.id, member.id, eventDay.id, input.assignmentNotes, assignedBy);
        await this.database.insertOne(COLLECTIONS.hostAssignments, assignment);
        const released = await this.releaseOverflow(host, [assignment]);
        if (released.has(assignment.id)) {
            throw new ConflictError(HOST_FULL);
        }
        await invalidateDashboard(this.cacheService, host.eventId, this.logger);

        this.logger.info(
            { assignmentId: assignment.id, hostId: host.id, memberId: member.id, eventDayId: eventDay.id },
            'Host assignment created'
        );
        return assignment;
    }

    /**
     * Assign several members to one host for one event day.
     *
     * Members are taken in request order, repeated ids once. A member that
     * cannot be placed is reported in `errors` and does not stop the others;
     * once the host is full every remaining member fails with a capacity
     * error.
     *
     * @throws NotFoundError if the host or event day does not exist
     */
    async bulkAssign(input: IBulkAssignInput): Promise<IBulkAssignmentResult> {
        const host = await this.requireHost(input.hostId);
        const eventDay = await this.requireEventDay(input.eventDayId);
        if (eventDay.eventId !== host.eventId) {
            throw new ValidationError('Member, host and event day must belong to the same event');
        }

        const memberIds = [...new Set(input.registrationMemberIds)];
        const members = await this.database.find<IRegistrationMember>(COLLECTIONS.members, {
            id: { $in: memberIds }
        });
        const memberById = new Map(members.map(member => [member.id, member]));

        const alreadyAssigned = await this.database.find<IHostAssignment>(COLLECTIONS.hostAssignments, {
            registrationMemberId: { $in: memberIds },
            eventDayId: eventDay.id
        });
        const assignedIds = new Set(alreadyAssigned.map(assignment => assignment.registrationMemberId));

        const occupied = await this.countOccupied(host.id, eventDay.id);

        const errors: string[] = [];
        const candidates: IHostAssignment[] = [];

        for (const memberId of memberIds) {
            const member = memberById.get(memberId);
            if (!member) {
                errors.push(`Member ${memberId}: Registration member not found`);
                continue;
            }
            if (member.eventId !== host.eventId) {
                errors.push(`Member ${memberId}: Member does not belong to this event`);
                continue;
            }
            if (eventDay.id !== host.eventDaysId) {
                errors.push(`Member ${memberId}: ${WRONG_DAY}`);
                continue;
            }
            if (member.status === 'cancelled') {
                errors.push(`Member ${memberId}: Member is cancelled`);
                continue;
            }
            if (assignedIds.has(memberId)) {
                errors.push(`Member ${memberId}: ${ALREADY_ASSIGNED}`);
                continue;
            }
            if (occupied + candidates.length >= host.maxParticipants) {
                errors.push(`Member ${memberId}: ${HOST_FULL}`);
                continue;
            }
            candidates.push(
                buildAssignment(host.id, memberId, eventDay.id, input.assignmentNotes, input.assignedBy)
            );
        }

        await this.database.insertMany(COLLECTIONS.hostAssignments, candidates);
        const released = await this.releaseOverflow(host, candidates);
        const assignments = candidates.filter(assignment => {
            if (released.has(assignment.id)) {
                errors.push(`Member ${assignment.registrationMemberId}: ${HOST_FULL}`);
                return false;
            }
            return true;
        });

        if (assignments.length > 0) {
            await invalidateDashboard(this.cacheService, host.eventId, this.logger);
        }

        this.logger.info(
            { hostId: host.id, eventDayId: eventDay.id, successful: assignments.length, failed: errors.length },
            'Bulk host assignment processed'
        );

        return {
            successfulAssignments: assignments.length,
            failedAssignments: errors.length,
            errors,
            assignments
        };
    }

    /**
     * Filtered, paginated assignment listing, newest first.
     */
    async listAssignments(filters: IAssignmentFilters, page?: number, pageSize?: number): Promise<IAssignmentListResult> {
        const request = normalizePage(page, pageSize, MAX_ASSIGNMENT_PAGE_SIZE);

        const filter: Filter<Document> = {};
        if (filters.hostId) {
            filter.hostId = filters.hostId;
        }
        if (filters.registrationMemberId) {
            filter.registrationMemberId = filters.registrationMemberId;
        }
        if (filters.eventDayId) {
            filter.eventDayId = filters.eventDayId;
        }
        if (filters.assignedBy) {
            filter.assignedBy = filters.assignedBy;
        }
        if (filters.hasNotes !== undefined) {
            filter.assignmentNotes = presenceFilter(filters.hasNotes);
        }

        const totalCount = await this.database.count(COLLECTIONS.hostAssignments, filter);
        const assignments = await this.database.find<IHostAssignment>(COLLECTIONS.hostAssignments, filter, {
            sort: { createdAt: -1 },
            skip: pageOffset(request),
            limit: request.pageSize
        });

        return { assignments, ...buildPageInfo(totalCount, request) };
    }

    /**
     * @throws NotFoundError if the assignment does not exist
     */
    async getAssignment(id: string): Promise<IHostAssignment> {
        const assignment = await this.database.findOne<IHostAssignment>(COLLECTIONS.hostAssignments, { id });
        if (!assignment) {
            throw new NotFoundError('Assignment not found');
        }
        return assignment;
    }

    /**
     * Only the notes of an assignment can change; move a member by deleting
     * and re-creating the assignment.
     */
    async updateAssignment(id: string, patch: { assignmentNotes?: string | null }): Promise<IHostAssignment> {
        await this.getAssignment(id);
        if (patch.assignmentNotes !== undefined) {
            await this.database.updateOne(
                COLLECTIONS.hostAssignments,
                { id },
                { $set: { assignmentNotes: patch.assignmentNotes, updatedAt: new Date() } }
            );
        }
        return await this.getAssignment(id);
    }

    async deleteAssignment(id: string): Promise<{ message: string; deletedAssignmentId: string }> {
        const assignment = await this.getAssignment(id);
        await this.database.deleteOne(COLLECTIONS.hostAssignments, { id });

        const host = await this.database.findOne<IHost>(COLLECTIONS.hosts, { id: assignment.hostId });
        if (host) {
            await invalidateDashboard(this.cacheService, host.eventId, this.logger);
        }

        this.logger.info({ assignmentId: id, hostId: assignment.hostId }, 'Host assignment deleted');
        return { message: 'Assignment deleted successfully', deletedAssignmentId: id };
    }

    private async requireHost(id: string): Promise<IHost> {
        const host = await this.database.findOne<IHost>(COLLECTIONS.hosts, { id });
        if (!host) {
            throw new NotFoundError('Host not found');
        }
        return host;
    }

    private async requireEventDay(id: string): Promise<IEventDay> {
        const eventDay = await this.database.findOne<IEventDay>(COLLECTIONS.eventDays, { id });
        if (!eventDay) {
            throw new NotFoundError('Event day not found');
        }
        return eventDay;
    }

    /**
     * Re-count the host after an insert. When concurrent writers pushed it past
     * `maxParticipants`, the earliest assignments (by `createdAt`, then `id`)
     * keep their places and the given ones beyond capacity are deleted.
     *
     * @returns Ids of the given assignments that were deleted
     */
    private async releaseOverflow(host: IHost, inserted: IHostAssignment[]): Promise<Set<string>> {
        const released = new Set<string>();
        if (inserted.length === 0) {
            return released;
        }

        const eventDayId = inserted[0].eventDayId;
        const occupied = await this.countOccupied(host.id, eventDayId);
        if (occupied <= host.maxParticipants) {
            return released;
        }

        const placed = await this.database.find<IHostAssignment>(
            COLLECTIONS.hostAssignments,
            { hostId: host.id, eventDayId },
            { sort: { createdAt: 1, id: 1 } }
        );
        const kept = new Set(placed.slice(0, host.maxParticipants).map(assignment => assignment.id));

        for (const assignment of inserted) {
            if (!kept.has(assignment.id)) {
                await this.database.deleteOne(COLLECTIONS.hostAssignments, { id: assignment.id });
                released.add(assignment.id);
            }
        }

        this.logger.warn(
            { hostId: host.id, eventDayId, released: [...released] },
            'Concurrent assignments exceeded host capacity'
        );
        return released;
    }

    private async countOccupied(hostId: string, eventDayId: string): Promise<number> {
        return await this.database.count(COLLECTIONS.hostAssignments, { hostId, eventDayId });
    }
}

function buildAssignment(
    hostId: string,
    registrationMemberId: string,
    eventDayId: string,
    assignmentNotes: string | null | undefined,
    assignedBy: string | null | undefined
): IHostAssignment {
    const now = new Date();
    return {
        id: uuidv4(),
        hostId,
        registrationMemberId,
        eventDayId,
        assignmentNotes: assignmentNotes ?? null,
        assignedBy: assignedBy ?? null,
        createdAt: now,
        updatedAt: now
    };
}
