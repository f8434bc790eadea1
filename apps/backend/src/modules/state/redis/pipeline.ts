import type { ChainableCommander } from 'ioredis';
import { StateBackendError } from '../../../lib/errors.js';

/**
 * Execute a MULTI or pipeline and unwrap its replies.
 *
 * ioredis reports per-command failures inside the result tuples instead of
 * rejecting; any such failure is raised here with the driver error as cause.
 */
export async function execPipeline(pipeline: ChainableCommander, operation: string): Promise<unknown[]> {
    let replies: Array<[Error | null, unknown]> | null;
    try {
        replies = await pipeline.exec();
    } catch (error) {
        throw new StateBackendError(`Redis ${operation} failed`, { cause: error, details: { operation } });
    }

    if (!replies) {
        throw new StateBackendError(`Redis ${operation} was aborted`, { details: { operation } });
    }

    return replies.map(([error, reply], index) => {
        if (error) {
            throw new StateBackendError(`Redis ${operation} failed`, { cause: error, details: { operation, index } });
        }
        return reply;
    });
}

/**
 * Parse a stored JSON object, tolerating missing or malformed values.
 */
export function parseJsonObject(raw: string | null | undefined): Record<string, unknown> {
    if (!raw) {
        return {};
    }
    try {
        const value: unknown = JSON.parse(raw);
        if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
            return { ...value };
        }
    } catch {
        return {};
    }
    return {};
}

/**
 * Parse a stored JSON array of strings.
 */
export function parseStringList(raw: string | null | undefined): string[] {
    if (!raw) {
        return [];
    }
    try {
        const value: unknown = JSON.parse(raw);
        return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
    } catch {
        return [];
    }
}

/** Optional string field; an empty string stands for `null`. */
export function optionalField(value: string | undefined): string | null {
    return value === undefined || value === '' ? null : value;
}

export function numberField(value: string | undefined): number {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
}

/** TTL in whole seconds as EXPIRE takes it. */
export function ttlSeconds(ttl: number): number {
    return Math.max(1, Math.ceil(ttl));
}
