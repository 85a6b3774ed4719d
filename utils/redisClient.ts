// utils/redisClient.ts
import { createClient } from 'redis';
import logger from './logger';
import { getErrorMessage } from './helpers';
import type { IKeyValueClient } from '../services/cache/ICacheStore';

type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;
let connectionPromise: Promise<RedisClient | null> | null = null;
let isHealthy = false;

/**
 * Initialize Redis Connection
 * Only called when the research cache is configured to live in Redis.
 */
export const initRedis = async (redisUrl: string | undefined): Promise<RedisClient | null> => {
    if (client && (client.isOpen || client.isReady)) {
        return client;
    }

    if (connectionPromise) {
        return connectionPromise;
    }

    connectionPromise = (async () => {
        if (!redisUrl) {
            logger.warn("⚠️ REDIS_URL not set. Research caching will be disabled.");
            return null;
        }

        try {
            const newClient = createClient({
                url: redisUrl,
                socket: {
                    reconnectStrategy: (retries) => {
                        if (retries > 20) {
                             logger.error("❌ Redis: Max Retries Reached. Waiting 5s...");
                             return 5000;
                        }
                        return Math.min(retries * 100, 3000);
                    },
                    connectTimeout: 15000,
                    keepAlive: 15000
                }
            });

            newClient.on('error', (err: Error) => {
                isHealthy = false;
                if (!err.message.includes('ECONNREFUSED') && !err.message.includes('Socket closed')) {
                    logger.warn(`Redis Client Warning: ${err.message}`);
                }
            });

            newClient.on('ready', () => {
                if (!isHealthy) logger.info('✅ Redis Client Ready & Connected');
                isHealthy = true;
            });

            newClient.on('end', () => {
                isHealthy = false;
                logger.warn('Redis Client Disconnected');
            });

            await newClient.connect();
            client = newClient;
            return client;

        } catch (err) {
            logger.error(`❌ Redis Initialization Failed: ${getErrorMessage(err)}`);
            client = null;
            isHealthy = false;
            return null;
        } finally {
            connectionPromise = null;
        }
    })();

    return connectionPromise;
};

// Every operation degrades to an empty answer while Redis is away.
const redisClient: IKeyValueClient & { disconnect(): Promise<void> } = {
    isReady: () => client !== null && isHealthy,

    get: async (key: string): Promise<string | null> => {
        if (!client || !isHealthy) return null;
        try {
            return await client.get(key);
        } catch (e) {
            logger.warn(`Redis Get Error: ${getErrorMessage(e)}`);
            return null;
        }
    },

    set: async (key: string, value: string): Promise<boolean> => {
        if (!client || !isHealthy) return false;
        try {
            const reply = await client.set(key, value);
            return reply === 'OK';
        } catch (e) {
            logger.warn(`Redis Set Error: ${getErrorMessage(e)}`);
            return false;
        }
    },

    del: async (key: string): Promise<number> => {
        if (!client || !isHealthy) return 0;
        try {
            return await client.del(key);
        } catch (e) {
            logger.warn(`Redis Del Error: ${getErrorMessage(e)}`);
            return 0;
        }
    },

    keys: async (pattern: string): Promise<string[]> => {
        if (!client || !isHealthy) return [];
        try {
            return await client.keys(pattern);
        } catch (e) {
            logger.warn(`Redis Keys Error: ${getErrorMessage(e)}`);
            return [];
        }
    },

    disconnect: async (): Promise<void> => {
        if (client) {
            try {
                if (client.isOpen) await client.quit();
                logger.info('✅ Redis Connection Closed');
            } catch (e) {
                logger.error(`Error closing Redis connection: ${getErrorMessage(e)}`);
            } finally {
                client = null;
                isHealthy = false;
            }
        }
    },
};

export default redisClient;
