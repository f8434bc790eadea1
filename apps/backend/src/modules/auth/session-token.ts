import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { env } from '../../config/env.js';
import { ValidationError } from '../../lib/errors.js';

/**
 * Signed bearer tokens of the form `subject:issuedAt:expiresAt:signature`.
 *
 * Timestamps are whole Unix seconds; an expiry of `0` means the token never
 * expires. The signature is the hex HMAC-SHA256 of the first three parts.
 */

export type TokenValidation =
    | { valid: true; userId: string; error: null }
    | { valid: false; userId: null; error: string };

const INTEGER = /^-?\d+$/;

function sign(payload: string, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('hex');
}

function invalid(error: string): TokenValidation {
    return { valid: false, userId: null, error };
}

/**
 * Secret for signing tokens: the configured one, or a random one that lives
 * as long as the process (tokens then stop validating after a restart).
 */
export function resolveTokenSecret(configured?: string | null): string {
    return configured ? configured : randomBytes(32).toString('hex');
}

let processSecret: string | null = null;

/**
 * Signing secret used when a caller passes none: `AUTH_TOKEN_SECRET`, or a
 * random secret fixed for the life of the process.
 */
export function getTokenSecret(): string {
    if (processSecret === null) {
        processSecret = resolveTokenSecret(env.AUTH_TOKEN_SECRET);
    }
    return processSecret;
}

/**
 * @param expiresAt - Unix seconds; omit for a token that never expires
 * @throws ValidationError when the user id contains the `:` separator
 */
export function generateSessionToken(userId: string, secret = getTokenSecret(), expiresAt?: number | null): string {
    if (userId.includes(':')) {
        throw new ValidationError('Token subject must not contain ":"', { userId });
    }
    const issuedAt = Math.floor(Date.now() / 1000);
    const expiry = expiresAt ? Math.floor(expiresAt) : 0;
    const payload = `${userId}:${issuedAt}:${expiry}`;
    return `${payload}:${sign(payload, secret)}`;
}

export function validateSessionToken(token: string, secret = getTokenSecret()): TokenValidation {
    const parts = token.split(':');
    if (parts.length !== 4) {
        return invalid('Invalid token format');
    }

    const [userId, issuedAt, expiry, signature] = parts;
    if (!INTEGER.test(issuedAt) || !INTEGER.test(expiry)) {
        return invalid('Token parse error: timestamps must be integers');
    }

    const expiresAt = Number(expiry);
    if (expiresAt > 0 && expiresAt < Date.now() / 1000) {
        return invalid('Token expired');
    }

    const expected = Buffer.from(sign(`${userId}:${issuedAt}:${expiry}`, secret), 'utf8');
    const received = Buffer.from(signature, 'utf8');
    if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
        return invalid('Invalid signature');
    }

    return { valid: true, userId, error: null };
}

/**
 * Short-lived token binding a browser to one widget.
 *
 * @param ttl - Lifetime in seconds
 */
export function generateWidgetToken(widgetId: string, secret = getTokenSecret(), ttl = 300): string {
    return generateSessionToken(widgetId, secret, Date.now() / 1000 + ttl);
}

export function validateWidgetToken(token: string, widgetId: string, secret = getTokenSecret()): boolean {
    const result = validateSessionToken(token, secret);
    return result.valid && result.userId === widgetId;
}
