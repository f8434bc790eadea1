/**
 * Module metadata for introspection and logging.
 *
 * Modules are permanent backend components that live for the whole process.
 * The metadata identifies them in startup and shutdown logs.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module.
     *
     * Lowercase kebab-case matching the module directory name.
     *
     * @example 'state', 'auth'
     */
    id: string;

    /**
     * Human-readable module name.
     *
     * @example 'Widget State'
     */
    name: string;

    /**
     * Semantic version string (major.minor.patch).
     */
    version: string;

    /**
     * Optional description of what the module provides.
     */
    description?: string;
}
