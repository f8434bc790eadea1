/**
 * Permission names understood by the default role table.
 *
 * Any other string is accepted as a custom permission.
 */
export type Permission = 'read' | 'write' | 'admin' | 'delete' | 'manage_users' | (string & {});

/**
 * Resource families permissions can be scoped to.
 */
export type ResourceType = 'widget' | 'session' | 'user' | 'system' | (string & {});

/**
 * How resource-scoped grants combine with role permissions.
 *
 * - `union`: access is granted when either the session's roles or the
 *   resource-scoped grant for the exact resource carries the permission.
 * - `scoped`: when the session carries an explicit grant entry for the
 *   resource, that entry alone decides, unless the session holds one of the
 *   privileged roles.
 */
export type ResourceGrantPolicy = 'union' | 'scoped';

/**
 * Permission policy applied by session stores.
 */
export interface IPermissionPolicy {
    resourceGrants: ResourceGrantPolicy;

    /**
     * Roles whose permissions always apply, even to resources with explicit
     * grants under the `scoped` policy.
     */
    privilegedRoles: string[];
}

/**
 * Role to permission table seeded into every session store.
 */
export const DEFAULT_ROLE_PERMISSIONS: Readonly<Record<string, readonly Permission[]>> = {
    admin: ['read', 'write', 'admin', 'delete', 'manage_users'],
    editor: ['read', 'write'],
    viewer: ['read'],
    anonymous: []
};

export const DEFAULT_PERMISSION_POLICY: Readonly<IPermissionPolicy> = {
    resourceGrants: 'union',
    privilegedRoles: ['admin']
};
