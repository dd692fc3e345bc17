/**
 * Analyzer Service Configuration
 */

import { GSI_LIMITS, parseLogLevel } from '@lanecoach/shared';

function parseIntOr(value: string | undefined, fallback: number): number {
    const parsed = parseInt(value ?? '', 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
    // Server (the game client posts to this address)
    port: parseIntOr(process.env.PORT, 3000),
    host: process.env.HOST ?? '127.0.0.1',

    // Ingestion
    ingest: {
        maxPayloadBytes: parseIntOr(process.env.MAX_PAYLOAD_BYTES, GSI_LIMITS.MAX_PAYLOAD_BYTES),
    },

    // Console reporter
    reporter: {
        enabled: process.env.REPORTER_ENABLED !== 'false',
        intervalMs: parseIntOr(process.env.REPORT_INTERVAL_MS, 1000),
    },

    // Redis (optional insight pub/sub)
    redis: {
        url: process.env.REDIS_URL,
    },

    // Logging
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
} as const;

export type Config = typeof config;
