import { v4 as uuidv4 } from 'uuid';
import type { Document, Filter } from 'mongodb';
import type { IDatabaseService, ILogger, IPageInfo, IRegistrationMember, IVehicleSharing } from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../lib/errors.js';
import { buildPageInfo, normalizePage, pageOffset } from '../../../lib/pagination.js';
import { presenceFilter } from '../../../lib/query.js';

export const MAX_ARRANGEMENT_PAGE_SIZE = 100;

export interface ICreateArrangementInput {
    vehicleOwnerMemberId: string;
    coTravelerMemberId: string;
    sharingNotes?: string | null;
}

export interface IArrangementFilters {
    vehicleOwnerMemberId?: string;
    coTravelerMemberId?: string;
    hasNotes?: boolean;
}

export interface IArrangementListResult extends IPageInfo {
    arrangements: IVehicleSharing[];
}

/**
 * Service for carpool pairings between members.
 *
 * A pair of members shares at most one arrangement, in either direction.
 */
export class VehicleSharingService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger
    ) {}

    async createIndexes(): Promise<void> {
        await this.database.createIndex(COLLECTIONS.vehicleSharing, { id: 1 }, { unique: true });
        await this.database.createIndex(
            COLLECTIONS.vehicleSharing,
            { vehicleOwnerMemberId: 1, coTravelerMemberId: 1 },
            { unique: true }
        );
        await this.database.createIndex(COLLECTIONS.vehicleSharing, { coTravelerMemberId: 1 });
    }

    /**
     * @throws ValidationError if owner and co-traveller are the same member
     * @throws NotFoundError if either member does not exist
     * @throws ConflictError if the pair already shares a vehicle
     */
    async createArrangement(input: ICreateArrangementInput): Promise<IVehicleSharing> {
        if (input.vehicleOwnerMemberId === input.coTravelerMemberId) {
            throw new ValidationError('A member cannot share a vehicle with themselves');
        }

        if (!(await this.memberExists(input.vehicleOwnerMemberId))) {
            throw new NotFoundError('Vehicle owner not found');
        }
        if (!(await this.memberExists(input.coTravelerMemberId))) {
            throw new NotFoundError('Co-traveler not found');
        }

        const sameDirection = await this.database.count(COLLECTIONS.vehicleSharing, {
            vehicleOwnerMemberId: input.vehicleOwnerMemberId,
            coTravelerMemberId: input.coTravelerMemberId
        });
        if (sameDirection > 0) {
            throw new ConflictError('Vehicle sharing arrangement already exists between these members');
        }

        const reverse = await this.database.count(COLLECTIONS.vehicleSharing, {
            vehicleOwnerMemberId: input.coTravelerMemberId,
            coTravelerMemberId: input.vehicleOwnerMemberId
        });
        if (reverse > 0) {
            throw new ConflictError('Reverse vehicle sharing arrangement already exists');
        }

        const now = new Date();
        const arrangement: IVehicleSharing = {
            id: uuidv4(),
            vehicleOwnerMemberId: input.vehicleOwnerMemberId,
            coTravelerMemberId: input.coTravelerMemberId,
            sharingNotes: input.sharingNotes ?? null,
            createdAt: now,
            updatedAt: now
        };

        await this.database.insertOne(COLLECTIONS.vehicleSharing, arrangement);
        this.logger.info({ arrangementId: arrangement.id }, 'Vehicle sharing arrangement created');
        return arrangement;
    }

    async listArrangements(filters: IArrangementFilters, page?: number, pageSize?: number): Promise<IArrangementListResult> {
        const request = normalizePage(page, pageSize, MAX_ARRANGEMENT_PAGE_SIZE);

        const filter: Filter<Document> = {};
        if (filters.vehicleOwnerMemberId) {
            filter.vehicleOwnerMemberId = filters.vehicleOwnerMemberId;
        }
        if (filters.coTravelerMemberId) {
            filter.coTravelerMemberId = filters.coTravelerMemberId;
        }
        if (filters.hasNotes !== undefined) {
            filter.sharingNotes = presenceFilter(filters.hasNotes);
        }

        const totalCount = await this.database.count(COLLECTIONS.vehicleSharing, filter);
        const arrangements = await this.database.find<IVehicleSharing>(COLLECTIONS.vehicleSharing, filter, {
            sort: { createdAt: -1 },
            skip: pageOffset(request),
            limit: request.pageSize
        });

        return { arrangements, ...buildPageInfo(totalCount, request) };
    }

    /**
     * @throws NotFoundError if the arrangement does not exist
     */
    async getArrangement(id: string): Promise<IVehicleSharing> {
        const arrangement = await this.database.findOne<IVehicleSharing>(COLLECTIONS.vehicleSharing, { id });
        if (!arrangement) {
            throw new NotFoundError('Vehicle sharing arrangement not found');
        }
        return arrangement;
    }

    async updateArrangement(id: string, patch: { sharingNotes?: string | null }): Promise<IVehicleSharing> {
        await this.getArrangement(id);
        if (patch.sharingNotes !== undefined) {
            await this.database.updateOne(
                COLLECTIONS.vehicleSharing,
                { id },
                { $set: { sharingNotes: patch.sharingNotes, updatedAt: new Date() } }
            );
        }
        return await this.getArrangement(id);
    }

    async deleteArrangement(id: string): Promise<{ message: string; deletedArrangementId: string }> {
        await this.getArrangement(id);
        await this.database.deleteOne(COLLECTIONS.vehicleSharing, { id });
        this.logger.info({ arrangementId: id }, 'Vehicle sharing arrangement deleted');
        return { message: 'Vehicle sharing arrangement deleted successfully', deletedArrangementId: id };
    }

    private async memberExists(id: string): Promise<boolean> {
        const member = await this.database.findOne<IRegistrationMember>(COLLECTIONS.members, { id });
        return member !== null;
    }
}
