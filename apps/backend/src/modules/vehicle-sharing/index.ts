export { VehicleSharingModule } from './VehicleSharingModule.js';
export type { IVehicleSharingModuleDependencies } from './VehicleSharingModule.js';
export { VehicleSharingService, MAX_ARRANGEMENT_PAGE_SIZE } from './services/vehicle-sharing.service.js';
export type {
    ICreateArrangementInput,
    IArrangementFilters,
    IArrangementListResult
} from './services/vehicle-sharing.service.js';
