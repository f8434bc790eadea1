/**
 * @fileoverview Process entry point.
 *
 * Loads configuration, starts the state module with the two-phase
 * init/run lifecycle and shuts it down on SIGINT or SIGTERM. Embedders that
 * run their own server construct `StateModule` directly instead.
 *
 * @module index
 */

import { loadStateConfig } from './config/state.js';
import { logger } from './lib/logger.js';
import { StateModule } from './modules/state/index.js';

async function bootstrap(): Promise<void> {
    const stateModule = new StateModule();

    try {
        await stateModule.init({ config: loadStateConfig(), logger });
        await stateModule.run();
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap state layer');
        process.exit(1);
    }

    let stopping = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (stopping) {
            return;
        }
        stopping = true;
        logger.info({ signal }, 'Received shutdown signal');
        try {
            await stateModule.stop();
            process.exit(0);
        } catch (error) {
            logger.error({ error }, 'Shutdown failed');
            process.exit(1);
        }
    };

    process.on('SIGINT', signal => void shutdown(signal));
    process.on('SIGTERM', signal => void shutdown(signal));
}

void bootstrap();
