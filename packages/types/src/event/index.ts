export type { IEvent, IEventWithDays } from './IEvent.js';
export type { IEventDay } from './IEventDay.js';
