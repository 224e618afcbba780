export { HostAssignmentsModule } from './HostAssignmentsModule.js';
export type { IHostAssignmentsModuleDependencies } from './HostAssignmentsModule.js';
export { HostAssignmentService, MAX_ASSIGNMENT_PAGE_SIZE } from './services/host-assignment.service.js';
export type {
    ICreateAssignmentInput,
    IBulkAssignInput,
    IAssignmentFilters,
    IAssignmentListResult
} from './services/host-assignment.service.js';
