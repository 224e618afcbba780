/**
 * Shared types for the event-suite backend and its clients.
 */

export type { IDatabaseService, IFindOptions, ICreateIndexOptions } from './database/index.js';
export type { ICacheService } from './services/ICacheService.js';
export type { ILogger } from './logging/ILogger.js';
export type { IModule, IModuleMetadata } from './module/index.js';
export type { IPageInfo, IPageRequest } from './pagination/index.js';

export {
    REGISTRATION_TYPES,
    TRANSPORTATION_MODES,
    GENDERS,
    REGISTRATION_STATUSES,
    ATTENDING_STATUSES,
    TOILET_PREFERENCES,
    TOILET_FACILITIES,
    GENDER_PREFERENCES
} from './enums/index.js';
export type {
    RegistrationType,
    TransportationMode,
    Gender,
    RegistrationStatus,
    ToiletPreference,
    ToiletFacilities,
    GenderPreference
} from './enums/index.js';

export type * from './event/index.js';
export type * from './registration/index.js';
export type * from './host/index.js';
export type * from './vehicle-sharing/index.js';
export type * from './dashboard/index.js';
