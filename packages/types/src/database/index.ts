export type { IDatabaseService, IFindOptions, ICreateIndexOptions } from './IDatabaseService.js';
