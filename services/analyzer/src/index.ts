/**
 * Analyzer Service
 *
 * Receives game state pushes from the local game client and turns them
 * into coaching insights.
 * Features:
 * - Payload validation and size limits
 * - Enemy position tracking and short-horizon prediction
 * - Team fight detection
 * - Performance trend sampling
 * - Periodic insight reporting (log + optional Redis pub/sub)
 * - Health checks (/healthz, /health) and Prometheus metrics
 * - Graceful shutdown
 */

import { serve } from '@hono/node-server';
import type Redis from 'ioredis';
import { createHealthChecks, createLogger, type HealthCheck } from '@lanecoach/shared';
import { config } from './config';
import { MatchAnalyzer } from './engine/MatchAnalyzer';
import { createAnalyzerMetrics } from './metrics';
import { createInsightPublisher, type InsightPublisher } from './publisher';
import { connectOptional, createRedisClient } from './redis';
import { createInsightReporter } from './reporter';
import { createRoutes } from './routes';

const logger = createLogger('analyzer', config.logLevel);
const metrics = createAnalyzerMetrics();
const SERVICE_VERSION = '1.0.0';

let isShuttingDown = false;

async function main() {
    logger.info('Starting Analyzer Service', {
        version: SERVICE_VERSION,
        port: config.port,
        redis: config.redis.url ?? 'disabled',
        max_payload_bytes: config.ingest.maxPayloadBytes,
    });

    // Optional Redis for insight fan-out
    let redis: Redis | undefined;
    let publisher: InsightPublisher | undefined;
    const checks: HealthCheck[] = [];

    if (config.redis.url) {
        const client = await connectOptional(createRedisClient(config.redis.url, logger), logger);
        if (client) {
            redis = client;
            publisher = createInsightPublisher(client);
            checks.push({
                name: 'redis',
                check: async () => (await client.ping()) === 'PONG',
            });
        }
    }

    const health = createHealthChecks(SERVICE_VERSION, checks);

    const analyzer = new MatchAnalyzer({
        logger: logger.child({ component: 'engine' }),
        metrics,
    });

    const reporter = createInsightReporter({
        analyzer,
        logger: logger.child({ component: 'reporter' }),
        metrics,
        publisher,
    });

    if (config.reporter.enabled) {
        reporter.start(config.reporter.intervalMs);
    }

    logger.info('Components initialized');

    const app = createRoutes({
        analyzer,
        metrics,
        health,
        logger,
        maxPayloadBytes: config.ingest.maxPayloadBytes,
    });

    // =====================================
    // Start Server
    // =====================================

    const server = serve({
        fetch: app.fetch,
        port: config.port,
        hostname: config.host,
    });

    logger.info(`Analyzer Service listening on ${config.host}:${config.port}`, {
        endpoints: [
            '/',
            '/gsi',
            '/insights',
            '/enemies',
            '/engagement',
            '/performance',
            '/health',
            '/healthz',
            '/metrics',
        ],
    });

    // =====================================
    // Graceful Shutdown
    // =====================================

    const shutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        logger.info('Graceful shutdown started', { signal });

        reporter.stop();

        await new Promise<void>((resolve) => {
            server.close(() => resolve());
        });

        if (redis) {
            await redis.quit();
        }

        logger.info('Shutdown complete');
        process.exit(0);
    };

    const onSignal = (signal: string) => {
        shutdown(signal).catch((error: unknown) => {
            logger.error('Shutdown failed', { error: String(error) });
            process.exit(1);
        });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error) => {
    console.error('Failed to start service:', error);
    process.exit(1);
});
