/**
 * Module system type exports.
 *
 * Core interfaces for backend modules - permanent components that initialize
 * during process bootstrap.
 */

export type { IModule } from './IModule.js';
export type { IModuleMetadata } from './IModuleMetadata.js';
