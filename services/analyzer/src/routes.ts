/**
 * Analyzer HTTP Routes
 *
 * Ingestion endpoint for the game client plus the pull-style query surface.
 */

import { Hono, type Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import type {
    ApiResponse,
    EnemiesResponse,
    EngagementResponse,
    HealthChecks,
    IngestResponse,
    InsightsResponse,
    LoggerLike,
    PerformanceResponse,
    Snapshot,
} from '@lanecoach/shared';
import { GSI_LIMITS, validateGsiPayload } from '@lanecoach/shared';
import { formatEngagement } from './engine/EngagementDetector';
import type { MatchAnalyzer } from './engine/MatchAnalyzer';
import { toSnapshot } from './gsi';
import type { AnalyzerMetrics } from './metrics';

export interface RouteDeps {
    analyzer: MatchAnalyzer;
    metrics: AnalyzerMetrics;
    health: HealthChecks;
    logger: LoggerLike;
    maxPayloadBytes?: number;
}

/** Paths served by the app; anything else shares one metric label */
const ROUTE_PATHS = new Set([
    '/',
    '/gsi',
    '/insights',
    '/enemies',
    '/engagement',
    '/performance',
    '/health',
    '/healthz',
    '/metrics',
]);

export const UNMATCHED_ROUTE = 'unmatched';

export function routeLabel(path: string): string {
    return ROUTE_PATHS.has(path) ? path : UNMATCHED_ROUTE;
}

function noData(c: Context) {
    const body: ApiResponse<never> = {
        success: false,
        error: { code: 'NO_DATA', message: 'No game state received yet' },
    };
    return c.json(body, 404);
}

export function createRoutes(deps: RouteDeps): Hono {
    const { analyzer, metrics, health, logger } = deps;
    const maxPayloadBytes = deps.maxPayloadBytes ?? GSI_LIMITS.MAX_PAYLOAD_BYTES;
    const app = new Hono();

    // Request tracking
    app.use('*', async (c, next) => {
        await next();
        metrics.requests.inc({
            method: c.req.method,
            path: routeLabel(c.req.path),
            status: String(c.res.status),
        });
    });

    // =====================================
    // Health & Metrics
    // =====================================

    app.onError((error, c) => {
        logger.error('Unhandled request error', { path: c.req.path, error: String(error) });
        const body: ApiResponse<never> = {
            success: false,
            error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
        };
        return c.json(body, 500);
    });

    app.get('/healthz', async (c) => {
        const result = await health.healthz();
        return c.json(result.body, result.status);
    });

    app.get('/health', async (c) => {
        const result = await health.health();
        return c.json({
            ...result.body,
            game_time: analyzer.current?.clock ?? null,
            tracked_enemies: analyzer.tracker.trackedNames().length,
            combat_events: analyzer.detector.eventCount(),
        }, result.status);
    });

    app.get('/metrics', (c) => {
        c.header('Content-Type', 'text/plain; version=0.0.4');
        return c.text(metrics.registry.getMetrics());
    });

    // =====================================
    // Ingestion
    // =====================================

    // Checked against Content-Length, or counted as the body streams in
    const limit = bodyLimit({
        maxSize: maxPayloadBytes,
        onError: (c) => {
            metrics.snapshotsReceived.inc();
            metrics.snapshotsDropped.inc({ reason: 'too_large' });
            const body: ApiResponse<never> = {
                success: false,
                error: {
                    code: 'PAYLOAD_TOO_LARGE',
                    message: `Payload exceeds ${maxPayloadBytes} bytes`,
                },
            };
            return c.json(body, 413);
        },
    });

    const ingest = async (c: Context) => {
        // A body over the limit throws here and is answered by `limit`
        const raw = await c.req.text();
        metrics.snapshotsReceived.inc();

        try {
            let parsed: unknown;
            try {
                parsed = JSON.parse(raw);
            } catch (error) {
                metrics.snapshotsDropped.inc({ reason: 'invalid_json' });
                logger.warn('Unparseable payload', { error: String(error) });
                const body: ApiResponse<never> = {
                    success: false,
                    error: { code: 'INVALID_JSON', message: 'Body is not valid JSON' },
                };
                return c.json(body, 400);
            }

            const validation = validateGsiPayload(parsed, maxPayloadBytes);
            if (!validation.success) {
                metrics.snapshotsDropped.inc({ reason: 'validation' });
                logger.warn('Invalid payload', { issues: validation.error.errors.length });
                const body: ApiResponse<never> = {
                    success: false,
                    error: {
                        code: 'VALIDATION_ERROR',
                        message: 'Invalid game state format',
                        details: validation.error.errors,
                    },
                };
                return c.json(body, 400);
            }

            const snapshot = toSnapshot(validation.data);
            if (!snapshot) {
                metrics.snapshotsDropped.inc({ reason: 'no_clock' });
                const body: ApiResponse<IngestResponse> = {
                    success: true,
                    data: { accepted: false, reason: 'no_clock' },
                };
                return c.json(body, 202);
            }

            const result = analyzer.ingest(snapshot);
            const data: IngestResponse = result.accepted
                ? { accepted: true, game_time: result.clock }
                : { accepted: false, game_time: result.clock, reason: result.reason };

            return c.json({ success: true, data } satisfies ApiResponse<IngestResponse>);
        } catch (error) {
            logger.error('Ingestion error', { error: String(error) });
            const body: ApiResponse<never> = {
                success: false,
                error: { code: 'INTERNAL_ERROR', message: 'Failed to process game state' },
            };
            return c.json(body, 500);
        }
    };

    app.post('/', limit, ingest);
    app.post('/gsi', limit, ingest);

    // =====================================
    // Queries
    // =====================================

    const withSnapshot = (handler: (c: Context, snapshot: Snapshot) => Response) =>
        (c: Context) => {
            const snapshot = analyzer.current;
            return snapshot ? handler(c, snapshot) : noData(c);
        };

    app.get('/insights', withSnapshot((c, snapshot) => {
        const data: InsightsResponse = {
            match_id: snapshot.match_id,
            game_time: snapshot.clock,
            insights: analyzer.insights(),
        };
        return c.json({ success: true, data } satisfies ApiResponse<InsightsResponse>);
    }));

    app.get('/enemies', withSnapshot((c, snapshot) => {
        const { clock, movements, predictions } = analyzer.enemies(snapshot.clock);
        const data: EnemiesResponse = { game_time: clock, movements, predictions };
        return c.json({ success: true, data } satisfies ApiResponse<EnemiesResponse>);
    }));

    app.get('/engagement', withSnapshot((c, snapshot) => {
        const status = analyzer.engagement(snapshot.clock);
        const data: EngagementResponse = {
            game_time: snapshot.clock,
            ...status,
            total_events: analyzer.detector.eventCount(),
            advisory: formatEngagement(status),
        };
        return c.json({ success: true, data } satisfies ApiResponse<EngagementResponse>);
    }));

    app.get('/performance', withSnapshot((c, snapshot) => {
        const data: PerformanceResponse = {
            game_time: snapshot.clock,
            lines: analyzer.performance(snapshot.clock),
            deaths: analyzer.deaths().count,
        };
        return c.json({ success: true, data } satisfies ApiResponse<PerformanceResponse>);
    }));

    return app;
}
