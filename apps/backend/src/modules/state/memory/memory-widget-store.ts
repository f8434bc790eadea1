import type { IWidgetRecord, IWidgetStore } from '@meshstate/types';
import { AsyncLock } from '../../../lib/async-lock.js';
import { nowSeconds } from '../../../lib/clock.js';

function copyRecord(record: IWidgetRecord): IWidgetRecord {
    return { ...record, metadata: { ...record.metadata } };
}

/**
 * Widget registry held in process memory. Records live until deleted.
 */
export class MemoryWidgetStore implements IWidgetStore {
    private readonly widgets = new Map<string, IWidgetRecord>();
    private readonly lock = new AsyncLock();

    async register(
        widgetId: string,
        html: string,
        token: string | null = null,
        ownerWorkerId: string | null = null,
        metadata: Record<string, unknown> | null = null
    ): Promise<void> {
        await this.lock.run(() => {
            this.widgets.set(widgetId, {
                widgetId,
                html,
                token,
                createdAt: nowSeconds(),
                ownerWorkerId,
                metadata: { ...(metadata ?? {}) }
            });
        });
    }

    async get(widgetId: string): Promise<IWidgetRecord | null> {
        return this.lock.run(() => {
            const record = this.widgets.get(widgetId);
            return record ? copyRecord(record) : null;
        });
    }

    async getHtml(widgetId: string): Promise<string | null> {
        return this.lock.run(() => this.widgets.get(widgetId)?.html ?? null);
    }

    async getToken(widgetId: string): Promise<string | null> {
        return this.lock.run(() => this.widgets.get(widgetId)?.token ?? null);
    }

    async exists(widgetId: string): Promise<boolean> {
        return this.lock.run(() => this.widgets.has(widgetId));
    }

    async updateHtml(widgetId: string, html: string): Promise<boolean> {
        return this.lock.run(() => {
            const record = this.widgets.get(widgetId);
            if (!record) {
                return false;
            }
            record.html = html;
            return true;
        });
    }

    async updateToken(widgetId: string, token: string): Promise<boolean> {
        return this.lock.run(() => {
            const record = this.widgets.get(widgetId);
            if (!record) {
                return false;
            }
            record.token = token;
            return true;
        });
    }

    async delete(widgetId: string): Promise<boolean> {
        return this.lock.run(() => this.widgets.delete(widgetId));
    }

    async listActive(): Promise<string[]> {
        return this.lock.run(() => Array.from(this.widgets.keys()));
    }

    async count(): Promise<number> {
        return this.lock.run(() => this.widgets.size);
    }
}
