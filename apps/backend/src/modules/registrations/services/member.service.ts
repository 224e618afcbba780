import type {
    Gender,
    ICacheService,
    IDatabaseService,
    ILogger,
    IRegistrationMember,
    RegistrationStatus
} from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { NotFoundError } from '../../../lib/errors.js';
import { definedFields } from '../../../lib/query.js';
import { invalidateDashboard } from '../../../lib/dashboard-cache.js';

export interface IUpdateMemberInput {
    name?: string;
    phoneNumber?: string;
    email?: string | null;
    city?: string | null;
    age?: number | null;
    gender?: Gender;
    language?: string | null;
    floorPreference?: string | null;
    specialRequirements?: string | null;
    status?: RegistrationStatus;
}

/**
 * Service for individual registration members.
 *
 * Cancelling a member releases their beds: every host assignment of the
 * member is deleted in the same operation.
 */
export class MemberService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly cacheService: ICacheService | null,
        private readonly logger: ILogger
    ) {}

    /**
     * @throws NotFoundError if the member does not exist
     */
    async updateMember(id: string, patch: IUpdateMemberInput): Promise<IRegistrationMember> {
        const member = await this.requireMember(id);
        const changes = definedFields(patch);

        await this.database.updateOne(
            COLLECTIONS.members,
            { id },
            { $set: { ...changes, updatedAt: new Date() } }
        );

        if (patch.status === 'cancelled' && member.status !== 'cancelled') {
            await this.releaseAssignments(id);
        }
        await invalidateDashboard(this.cacheService, member.eventId, this.logger);

        return await this.requireMember(id);
    }

    async updateMemberStatus(id: string, status: RegistrationStatus): Promise<IRegistrationMember> {
        return await this.updateMember(id, { status });
    }

    async listMembersByRegistration(registrationId: string): Promise<IRegistrationMember[]> {
        return await this.database.find<IRegistrationMember>(
            COLLECTIONS.members,
            { registrationId },
            { sort: { createdAt: 1 } }
        );
    }

    async listMembersByStatus(status: RegistrationStatus, eventId?: string): Promise<IRegistrationMember[]> {
        const filter = eventId ? { status, eventId } : { status };
        return await this.database.find<IRegistrationMember>(COLLECTIONS.members, filter, {
            sort: { createdAt: 1 }
        });
    }

    private async requireMember(id: string): Promise<IRegistrationMember> {
        const member = await this.database.findOne<IRegistrationMember>(COLLECTIONS.members, { id });
        if (!member) {
            throw new NotFoundError('Registration member not found');
        }
        return member;
    }

    private async releaseAssignments(memberId: string): Promise<void> {
        const removed = await this.database.deleteMany(COLLECTIONS.hostAssignments, {
            registrationMemberId: memberId
        });
        this.logger.info({ memberId, removedAssignments: removed }, 'Member cancelled, host assignments released');
    }
}
