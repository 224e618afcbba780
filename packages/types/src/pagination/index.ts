export type { IPageInfo, IPageRequest } from './IPaginated.js';
