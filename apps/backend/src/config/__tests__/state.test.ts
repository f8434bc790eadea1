/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';
import { isDeployMode, loadStateConfig } from '../state.js';
import { ConfigurationError } from '../../lib/errors.js';

describe('parseEnv', () => {
    it('should apply defaults', () => {
        const env = parseEnv({});

        expect(env.STATE_DEPLOY_MODE).toBe(false);
        expect(env.STATE_BACKEND).toBeUndefined();
        expect(env.STATE_REDIS_URL).toBe('redis://localhost:6379/0');
        expect(env.STATE_REDIS_PREFIX).toBe('meshstate');
        expect(env.STATE_WIDGET_TTL).toBe(86_400);
        expect(env.STATE_CONNECTION_TTL).toBe(300);
        expect(env.STATE_SESSION_TTL).toBe(86_400);
        expect(env.STATE_EVENT_QUEUE_SIZE).toBe(1000);
        expect(env.STATE_PRIVILEGED_ROLES).toEqual(['admin']);
    });

    it.each(['1', 'true', 'YES', ' on '])('should read %j as a true flag', value => {
        expect(parseEnv({ STATE_DEPLOY_MODE: value }).STATE_DEPLOY_MODE).toBe(true);
    });

    it.each(['0', 'false', 'no', ''])('should read %j as a false flag', value => {
        expect(parseEnv({ STATE_DEPLOY_MODE: value }).STATE_DEPLOY_MODE).toBe(false);
    });

    it('should normalize the backend name', () => {
        expect(parseEnv({ STATE_BACKEND: ' Redis ' }).STATE_BACKEND).toBe('redis');
    });

    it('should reject an unknown backend', () => {
        expect(() => parseEnv({ STATE_BACKEND: 'postgres' })).toThrow(ConfigurationError);
    });

    it('should reject a connection TTL below the minimum', () => {
        expect(() => parseEnv({ STATE_CONNECTION_TTL: '5' })).toThrow('Invalid environment configuration');
    });

    it('should split privileged roles', () => {
        expect(parseEnv({ STATE_PRIVILEGED_ROLES: 'admin, owner,,' }).STATE_PRIVILEGED_ROLES).toEqual(['admin', 'owner']);
    });
});

describe('isDeployMode', () => {
    it('should be off by default', () => {
        expect(isDeployMode(parseEnv({}))).toBe(false);
    });

    it('should follow the explicit flag', () => {
        expect(isDeployMode(parseEnv({ STATE_DEPLOY_MODE: 'true' }))).toBe(true);
    });

    it('should be implied by the redis backend', () => {
        expect(isDeployMode(parseEnv({ STATE_BACKEND: 'redis' }))).toBe(true);
    });

    it('should be implied by headless mode with a backend configured', () => {
        expect(isDeployMode(parseEnv({ STATE_HEADLESS: '1', STATE_BACKEND: 'memory' }))).toBe(true);
        expect(isDeployMode(parseEnv({ STATE_HEADLESS: '1' }))).toBe(false);
    });
});

describe('loadStateConfig', () => {
    it('should build a memory configuration outside deploy mode', () => {
        const config = loadStateConfig(parseEnv({}));

        expect(config).toEqual({
            deployMode: false,
            backend: 'memory',
            workerId: null,
            redis: { url: 'redis://localhost:6379/0', prefix: 'meshstate', maxRetriesPerRequest: 3 },
            ttl: { widget: 86_400, connection: 300, session: 86_400 },
            eventQueueSize: 1000,
            syncBridgeTimeoutMs: 5000,
            permissions: { resourceGrants: 'union', privilegedRoles: ['admin'] }
        });
    });

    it('should select redis when the backend is redis', () => {
        const config = loadStateConfig(parseEnv({
            STATE_BACKEND: 'redis',
            STATE_WORKER_ID: 'worker-a',
            STATE_REDIS_PREFIX: 'fleet',
            STATE_RESOURCE_GRANTS: 'scoped'
        }));

        expect(config.deployMode).toBe(true);
        expect(config.backend).toBe('redis');
        expect(config.workerId).toBe('worker-a');
        expect(config.redis.prefix).toBe('fleet');
        expect(config.permissions.resourceGrants).toBe('scoped');
    });

    it('should keep memory in deploy mode without a redis backend', () => {
        const config = loadStateConfig(parseEnv({ STATE_DEPLOY_MODE: 'on' }));

        expect(config.deployMode).toBe(true);
        expect(config.backend).toBe('memory');
    });
});
