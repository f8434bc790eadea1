/**
 * Connection ownership type definitions.
 */

export type { IConnectionInfo } from './IConnectionInfo.js';
export type { IConnectionRouter } from './IConnectionRouter.js';
export type { ILiveConnection } from './ILiveConnection.js';
