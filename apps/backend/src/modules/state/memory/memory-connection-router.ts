import type { IConnectionInfo, IConnectionRouter } from '@meshstate/types';
import { AsyncLock } from '../../../lib/async-lock.js';
import { nowSeconds } from '../../../lib/clock.js';

/**
 * Connection ownership for a single process. Entries never expire; they are
 * removed by `unregisterConnection` or replaced by a newer registration.
 */
export class MemoryConnectionRouter implements IConnectionRouter {
    private readonly connections = new Map<string, IConnectionInfo>();
    private readonly workerConnections = new Map<string, Set<string>>();
    private readonly lock = new AsyncLock();

    async registerConnection(
        widgetId: string,
        workerId: string,
        userId: string | null = null,
        sessionId: string | null = null
    ): Promise<void> {
        await this.lock.run(() => {
            const previous = this.connections.get(widgetId);
            if (previous && previous.workerId !== workerId) {
                this.detach(previous.workerId, widgetId);
            }

            const now = nowSeconds();
            this.connections.set(widgetId, {
                widgetId,
                workerId,
                connectedAt: now,
                lastHeartbeat: now,
                userId,
                sessionId
            });

            let widgets = this.workerConnections.get(workerId);
            if (!widgets) {
                widgets = new Set();
                this.workerConnections.set(workerId, widgets);
            }
            widgets.add(widgetId);
        });
    }

    async getConnectionInfo(widgetId: string): Promise<IConnectionInfo | null> {
        return this.lock.run(() => {
            const info = this.connections.get(widgetId);
            return info ? { ...info } : null;
        });
    }

    async getOwner(widgetId: string): Promise<string | null> {
        return this.lock.run(() => this.connections.get(widgetId)?.workerId ?? null);
    }

    async refreshHeartbeat(widgetId: string): Promise<boolean> {
        return this.lock.run(() => {
            const info = this.connections.get(widgetId);
            if (!info) {
                return false;
            }
            info.lastHeartbeat = nowSeconds();
            return true;
        });
    }

    async unregisterConnection(widgetId: string): Promise<boolean> {
        return this.lock.run(() => {
            const info = this.connections.get(widgetId);
            if (!info) {
                return false;
            }
            this.connections.delete(widgetId);
            this.detach(info.workerId, widgetId);
            return true;
        });
    }

    async listWorkerConnections(workerId: string): Promise<string[]> {
        return this.lock.run(() => Array.from(this.workerConnections.get(workerId) ?? []));
    }

    private detach(workerId: string, widgetId: string): void {
        const widgets = this.workerConnections.get(workerId);
        if (!widgets) {
            return;
        }
        widgets.delete(widgetId);
        if (widgets.size === 0) {
            this.workerConnections.delete(workerId);
        }
    }
}
