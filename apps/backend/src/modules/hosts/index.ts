export { HostsModule } from './HostsModule.js';
export type { IHostsModuleDependencies } from './HostsModule.js';
export { HostService, MAX_HOST_PAGE_SIZE } from './services/host.service.js';
export type { ICreateHostInput, IUpdateHostInput, IHostFilters, IHostListResult } from './services/host.service.js';
