/**
 * Session and RBAC type definitions.
 */

export { DEFAULT_PERMISSION_POLICY, DEFAULT_ROLE_PERMISSIONS } from './permissions.js';
export type { IPermissionPolicy, Permission, ResourceGrantPolicy, ResourceType } from './permissions.js';
export type { IUserSession, IUserSessionUpdate } from './IUserSession.js';
export type { ISessionStore } from './ISessionStore.js';
