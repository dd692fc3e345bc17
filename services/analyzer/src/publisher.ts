/**
 * Insight Publisher
 * Pushes composed insights to Redis pub/sub for remote renderers
 */

import type { Redis } from 'ioredis';
import type { InsightUpdateMessage } from '@lanecoach/shared';
import { REDIS_KEYS } from '@lanecoach/shared';

/** Channel suffix when the feed reports no match id */
export const LOCAL_MATCH_ID = 'local';

export interface InsightPublisher {
    publish(matchId: string | undefined, gameTime: number, insights: string[]): Promise<number>;
}

export function createInsightPublisher(redis: Pick<Redis, 'publish'>): InsightPublisher {

    async function publish(matchId: string | undefined, gameTime: number, insights: string[]): Promise<number> {
        const id = matchId ?? LOCAL_MATCH_ID;
        const message: InsightUpdateMessage = {
            match_id: id,
            game_time: gameTime,
            insights,
            timestamp: new Date().toISOString(),
        };
        return redis.publish(REDIS_KEYS.insightUpdates(id), JSON.stringify(message));
    }

    return { publish };
}
