/**
 * Key layout shared by every Redis-backed store of one deployment.
 *
 * Workers must agree on the prefix to see each other's state.
 */
export class RedisKeys {
    constructor(readonly prefix: string) {}

    widget(widgetId: string): string {
        return `${this.prefix}:widget:${widgetId}`;
    }

    get activeWidgets(): string {
        return `${this.prefix}:widgets:active`;
    }

    connection(widgetId: string): string {
        return `${this.prefix}:conn:${widgetId}`;
    }

    workerConnections(workerId: string): string {
        return `${this.prefix}:worker:${workerId}:connections`;
    }

    session(sessionId: string): string {
        return `${this.prefix}:session:${sessionId}`;
    }

    userSessions(userId: string): string {
        return `${this.prefix}:user:${userId}:sessions`;
    }

    get rolePermissions(): string {
        return `${this.prefix}:role_permissions`;
    }

    channel(name: string): string {
        return `${this.prefix}:channel:${name}`;
    }
}
