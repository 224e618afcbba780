export { DashboardModule } from './DashboardModule.js';
export type { IDashboardModuleDependencies } from './DashboardModule.js';
export { DashboardService } from './services/dashboard.service.js';
export { buildEventDashboard } from './services/dashboard-aggregation.js';
export type { IEventSnapshot } from './services/dashboard-aggregation.js';
