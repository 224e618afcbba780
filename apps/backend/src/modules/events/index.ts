export { EventsModule } from './EventsModule.js';
export type { IEventsModuleDependencies } from './EventsModule.js';
export { EventService } from './services/event.service.js';
export type { ICreateEventInput, ICreateEventDayInput } from './services/event.service.js';
