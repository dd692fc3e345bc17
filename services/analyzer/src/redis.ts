/**
 * Optional Redis connection for insight fan-out
 */

import Redis from 'ioredis';
import type { LoggerLike } from '@lanecoach/shared';

export interface Connectable {
    connect(): Promise<void>;
    disconnect(): void;
}

export function createRedisClient(url: string, logger: LoggerLike): Redis {
    const client = new Redis(url, {
        lazyConnect: true,
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => Math.min(times * 100, 3000),
    });

    client.on('error', (err) => {
        logger.error('Redis connection error', { error: String(err) });
    });

    client.on('connect', () => {
        logger.info('Connected to Redis');
    });

    return client;
}

/**
 * Connect, or give the client up when the server is unreachable.
 * The service then runs without publishing.
 */
export async function connectOptional<T extends Connectable>(
    client: T,
    logger: LoggerLike
): Promise<T | undefined> {
    try {
        await client.connect();
        return client;
    } catch (error) {
        logger.warn('Redis unavailable, insight publishing disabled', { error: String(error) });
        client.disconnect();
        return undefined;
    }
}
