/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { StateModule } from '../StateModule.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createRedisMock } from '../../../tests/vitest/mocks/redis.js';
import { createMockConnection, createTestStateConfig } from '../../../tests/vitest/mocks/state-config.js';

describe('StateModule', () => {
    it('should describe itself', () => {
        const stateModule = new StateModule();

        expect(stateModule.metadata).toEqual({
            id: 'state',
            name: 'State',
            version: '1.0.0',
            description: 'Widget, connection, callback and session state shared across workers'
        });
    });

    it('should refuse to hand out the manager before init', () => {
        const stateModule = new StateModule();

        expect(() => stateModule.getManager()).toThrow('State module has not been initialized');
    });

    it('should create the manager on init and its stores on run', async () => {
        const stateModule = new StateModule();
        const logger = new MockLogger();

        await stateModule.init({ config: createTestStateConfig({ workerId: 'worker-1' }), logger });
        const manager = stateModule.getManager();
        expect(manager.workerId).toBe('worker-1');
        expect(manager.initialized).toBe(false);

        await stateModule.run();
        expect(manager.initialized).toBe(true);
        expect(logger.info).toHaveBeenCalledWith({ workerId: 'worker-1' }, 'State module running');

        await stateModule.stop();
    });

    it('should shut the manager down on stop', async () => {
        const stateModule = new StateModule();
        await stateModule.init({ config: createTestStateConfig(), logger: new MockLogger() });
        await stateModule.run();
        const connection = createMockConnection();
        await stateModule.getManager().registerConnection('w1', connection);

        await stateModule.stop();

        expect(connection.close).toHaveBeenCalledWith(1001, 'worker shutting down');
        await expect(stateModule.getManager().listWidgets()).rejects.toMatchObject({ code: 'STATE_MANAGER_SHUTDOWN' });
    });

    it('should use an injected redis client in deploy mode', async () => {
        const stateModule = new StateModule();
        await stateModule.init({
            config: createTestStateConfig({ deployMode: true, backend: 'redis' }),
            logger: new MockLogger(),
            redisClient: createRedisMock()
        });
        await stateModule.run();

        const manager = stateModule.getManager();
        await manager.registerWidget('w1', '<p/>');
        expect(manager.backend).toBe('redis');
        expect(await manager.listWidgets()).toEqual(['w1']);

        await stateModule.stop();
    });

    it('should tolerate stop without init', async () => {
        await expect(new StateModule().stop()).resolves.toBeUndefined();
    });
});
