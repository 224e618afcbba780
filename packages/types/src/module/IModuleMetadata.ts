/**
 * Static description of a backend module.
 */
export interface IModuleMetadata {
    /** Kebab-case identifier, also used as the logger's `module` binding */
    id: string;

    name: string;

    version: string;

    description?: string;
}
