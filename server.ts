// server.ts
import config from './utils/config';
import logger from './utils/logger';
import redisClient, { initRedis } from './utils/redisClient';
import { registerShutdownHandler } from './utils/shutdownHandler';
import { getErrorMessage } from './utils/helpers';
import { createServices } from './services/container';
import { createApp } from './app';

const startServer = async () => {
    try {
        logger.info('🚀 Starting Server Initialization...');

        // 1. Connect to Infrastructure (Redis only when it backs the cache)
        if (config.cache.enabled && config.cache.backend === 'redis') {
            await initRedis(config.redisUrl);
        }

        // 2. Compose services and the HTTP app
        const services = createServices(config);
        const app = createApp(services, config);

        // 3. Start HTTP Server
        const PORT = config.port;
        const HOST = '0.0.0.0';

        const server = app.listen(PORT, HOST, () => {
            logger.info(`✅ Server running on http://${HOST}:${PORT}`);
        });

        // 4. Register Graceful Shutdown
        registerShutdownHandler('API Server', [
            () => new Promise<void>((resolve, reject) => {
                server.close((err) => {
                    if (err) reject(err);
                    else {
                        logger.info('Http server closed.');
                        resolve();
                    }
                });
            }),
            async () => { await redisClient.disconnect(); }
        ]);

    } catch (err) {
        logger.error(`❌ Critical Startup Error: ${getErrorMessage(err)}`);
        process.exit(1);
    }
};

void startServer();
