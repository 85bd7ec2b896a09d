import { config, ConfigManager } from './config.js';
import { createServer } from './index.js';
import { X402Engine } from './services/engine.js';
import { SessionSweeper } from './services/cleanup.js';
import { chainKey } from './domain/chain.js';
import { errorMessage } from './domain/errors.js';
import { logger } from './logger.js';

async function start() {
    const configManager = ConfigManager.fromEnv();
    const engine = new X402Engine(configManager);

    await engine.registerConfiguredChains();

    const sweeper = new SessionSweeper(engine.getStorage(), configManager.getConfig().cache, config.cleanupIntervalMs);

    const app = createServer({ engine, sweeper });
    app.listen(config.port, () => {
        logger.info(
            { port: config.port, chains: engine.getRegistry().supportedChains().map(chainKey) },
            'x402 payment gate started'
        );
    });
}

start().catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Failed to start server');
    process.exit(1);
});
