import { DEFAULT_ROLE_PERMISSIONS, type ISessionStore, type IUserSession, type Permission } from '@meshstate/types';

/**
 * Whether any of the session's roles carries the permission under the
 * built-in role table. Per-resource grants are not consulted; use
 * `checkWidgetPermission` for those.
 */
export function hasPermission(session: IUserSession | null, permission: Permission): boolean {
    if (!session) {
        return false;
    }
    return session.roles.some(role => DEFAULT_ROLE_PERMISSIONS[role]?.includes(permission) ?? false);
}

export function isAdmin(session: IUserSession | null): boolean {
    return session?.roles.includes('admin') ?? false;
}

/**
 * Check access to a widget through the session store, so configured role
 * permissions and per-widget grants apply.
 */
export async function checkWidgetPermission(
    session: IUserSession | null,
    widgetId: string,
    permission: Permission,
    sessionStore: Pick<ISessionStore, 'checkPermission'>
): Promise<boolean> {
    if (!session) {
        return false;
    }
    return sessionStore.checkPermission(session.sessionId, 'widget', widgetId, permission);
}
