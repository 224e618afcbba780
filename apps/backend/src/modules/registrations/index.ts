export { RegistrationsModule } from './RegistrationsModule.js';
export type { IRegistrationsModuleDependencies } from './RegistrationsModule.js';
export { RegistrationService, allocateStatus } from './services/registration.service.js';
export type {
    ICreateRegistrationInput,
    ICreateMemberInput,
    ICreateDailyPreferenceInput,
    IListRegistrationsOptions
} from './services/registration.service.js';
export { MemberService } from './services/member.service.js';
export type { IUpdateMemberInput } from './services/member.service.js';
