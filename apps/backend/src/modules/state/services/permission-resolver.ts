import { z } from 'zod';
import type { IPermissionPolicy, IUserSession, Permission, ResourceType } from '@meshstate/types';

const resourceGrantsSchema = z.record(z.array(z.string()));

/**
 * Key under `metadata.permissions` that grants access to one resource.
 */
export function resourceKey(resourceType: ResourceType, resourceId: string): string {
    return `${resourceType}:${resourceId}`;
}

/**
 * Explicit grant list stored on the session for a resource, if any.
 */
export function resourceGrantFor(
    session: IUserSession,
    resourceType: ResourceType,
    resourceId: string
): Permission[] | null {
    const parsed = resourceGrantsSchema.safeParse(session.metadata['permissions']);
    if (!parsed.success) {
        return null;
    }
    return parsed.data[resourceKey(resourceType, resourceId)] ?? null;
}

export interface IPermissionCheck {
    session: IUserSession;
    resourceType: ResourceType;
    resourceId: string;
    permission: Permission;
    /** Permissions granted to each of the session's roles. */
    rolePermissions: ReadonlyMap<string, ReadonlySet<Permission>>;
    policy: IPermissionPolicy;
}

/**
 * Resolve a permission against role grants and per-resource grants.
 *
 * Under `union` either layer grants access. Under `scoped` a resource with an
 * explicit grant list is decided by that list alone, unless the session
 * holds a privileged role.
 */
export function resolvePermission(check: IPermissionCheck): boolean {
    const { session, permission, policy } = check;
    const grant = resourceGrantFor(session, check.resourceType, check.resourceId);
    const byRole = session.roles.some(role => check.rolePermissions.get(role)?.has(permission) ?? false);

    if (policy.resourceGrants === 'scoped' && grant !== null) {
        const privileged = session.roles.some(role => policy.privilegedRoles.includes(role));
        if (!privileged) {
            return grant.includes(permission);
        }
    }

    return byRole || (grant?.includes(permission) ?? false);
}
