/**
 * Analyzer HTTP Route Tests
 */

import { createHealthChecks } from '@lanecoach/shared';
import type { Hono } from 'hono';
import { MatchAnalyzer } from '../src/engine/MatchAnalyzer';
import { createAnalyzerMetrics, type AnalyzerMetrics } from '../src/metrics';
import { createRoutes, routeLabel } from '../src/routes';
import { silentLogger } from './fixtures';

function post(app: Hono, path: string, body: string) {
    return app.request(path, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
    });
}

function gameState(gameTime: number, extra: Record<string, unknown> = {}): string {
    return JSON.stringify({ map: { matchid: 'm-1', game_time: gameTime }, ...extra });
}

describe('Analyzer routes', () => {
    let metrics: AnalyzerMetrics;
    let app: Hono;

    beforeEach(() => {
        const logger = silentLogger();
        metrics = createAnalyzerMetrics();
        app = createRoutes({
            analyzer: new MatchAnalyzer({ logger, metrics }),
            metrics,
            health: createHealthChecks('test'),
            logger,
            maxPayloadBytes: 512,
        });
    });

    describe('POST /gsi', () => {
        it('should accept a game state with a clock', async () => {
            const res = await post(app, '/gsi', gameState(100));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ success: true, data: { accepted: true, game_time: 100 } });
        });

        it('should also accept posts on the root path', async () => {
            const res = await post(app, '/', gameState(100));
            expect(res.status).toBe(200);
        });

        it('should report a replayed game state as stale', async () => {
            await post(app, '/gsi', gameState(100));
            const res = await post(app, '/gsi', gameState(100));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                success: true,
                data: { accepted: false, game_time: 100, reason: 'stale' },
            });
        });

        it('should acknowledge a state without a clock', async () => {
            const res = await post(app, '/gsi', JSON.stringify({ provider: { name: 'client' } }));

            expect(res.status).toBe(202);
            expect(await res.json()).toEqual({ success: true, data: { accepted: false, reason: 'no_clock' } });
            expect(metrics.snapshotsDropped.get({ reason: 'no_clock' })).toBe(1);
        });

        it('should reject a body that is not JSON', async () => {
            const res = await post(app, '/gsi', '{"map":');

            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                success: false,
                error: { code: 'INVALID_JSON', message: 'Body is not valid JSON' },
            });
        });

        it('should reject a malformed game state', async () => {
            const res = await post(app, '/gsi', JSON.stringify({ map: { game_time: 'soon' } }));

            expect(res.status).toBe(400);
            const body = await res.json();
            expect(body).toMatchObject({
                success: false,
                error: { code: 'VALIDATION_ERROR', message: 'Invalid game state format' },
            });
        });

        it('should reject an oversized body', async () => {
            const res = await post(app, '/gsi', gameState(100, { padding: 'x'.repeat(600) }));

            expect(res.status).toBe(413);
            expect(await res.json()).toMatchObject({ success: false, error: { code: 'PAYLOAD_TOO_LARGE' } });
            expect(metrics.snapshotsDropped.get({ reason: 'too_large' })).toBe(1);
            expect(metrics.snapshotsReceived.get()).toBe(1);
        });

        it('should not ingest an oversized body', async () => {
            await post(app, '/gsi', gameState(100, { padding: 'x'.repeat(600) }));

            const res = await app.request('/insights');

            expect(res.status).toBe(404);
        });

        it('should accept a body just under the limit after an oversized one', async () => {
            await post(app, '/gsi', gameState(100, { padding: 'x'.repeat(600) }));
            const res = await post(app, '/gsi', gameState(110, { padding: 'x'.repeat(400) }));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ success: true, data: { accepted: true, game_time: 110 } });
        });
    });

    describe('queries', () => {
        it('should answer 404 before the first game state', async () => {
            for (const path of ['/insights', '/enemies', '/engagement', '/performance']) {
                const res = await app.request(path);
                expect(res.status).toBe(404);
                expect(await res.json()).toEqual({
                    success: false,
                    error: { code: 'NO_DATA', message: 'No game state received yet' },
                });
            }
        });

        it('should serve insights for the current game state', async () => {
            await post(app, '/gsi', gameState(300, { player: { last_hits: 10 } }));

            const res = await app.request('/insights');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                success: true,
                data: {
                    match_id: 'm-1',
                    game_time: 300,
                    insights: [
                        'Deaths: 0 - Excellent survival!',
                        'Early Game Phase (5:00)',
                        'Your last hits are low (10). Focus more on last hitting.',
                    ],
                },
            });
        });

        it('should serve enemy movements and predictions', async () => {
            const marker = (x: number) => ({
                minimap: { o1: { image: 'minimap_enemyicon', name: 'npc_dota_hero_axe', team: 3, xpos: x, ypos: 0 } },
            });
            await post(app, '/gsi', gameState(100, marker(0)));
            await post(app, '/gsi', gameState(110, marker(-50)));

            const res = await app.request('/enemies');

            expect(await res.json()).toEqual({
                success: true,
                data: {
                    game_time: 110,
                    movements: [{
                        name: 'Axe',
                        last_seen: 110,
                        seconds_ago: 0,
                        position: { x: -50, y: 0 },
                        direction: 'West',
                        times_spotted: 2,
                        estimated_level: 1,
                    }],
                    predictions: [{ name: 'Axe', position: { x: -50, y: 0 } }],
                },
            });
        });

        it('should serve the engagement state', async () => {
            await post(app, '/gsi', gameState(100));

            const res = await app.request('/engagement');

            expect(await res.json()).toEqual({
                success: true,
                data: { game_time: 100, state: 'calm', total_events: 0, advisory: null },
            });
        });

        it('should serve performance lines', async () => {
            await post(app, '/gsi', gameState(60, { player: { gpm: 300 } }));
            await post(app, '/gsi', gameState(120, { player: { gpm: 320 } }));

            const res = await app.request('/performance');

            expect(await res.json()).toEqual({
                success: true,
                data: { game_time: 120, lines: ['GPM: 320 (avg 310)'], deaths: 0 },
            });
        });
    });

    describe('operations', () => {
        it('should report health with engine state', async () => {
            await post(app, '/gsi', gameState(100));

            const res = await app.request('/health');
            const body = await res.json();

            expect(res.status).toBe(200);
            expect(body).toMatchObject({
                status: 'healthy',
                version: 'test',
                game_time: 100,
                tracked_enemies: 0,
                combat_events: 0,
            });
        });

        it('should answer liveness checks', async () => {
            const res = await app.request('/healthz');
            expect(res.status).toBe(200);
        });

        it('should expose Prometheus metrics', async () => {
            await post(app, '/gsi', gameState(100));

            const res = await app.request('/metrics');
            const text = await res.text();

            expect(res.headers.get('Content-Type')).toContain('text/plain');
            expect(text.split('\n')).toContain('analyzer_snapshots_accepted_total 1');
            expect(text.split('\n')).toContain('analyzer_requests_total{method="POST",path="/gsi",status="200"} 1');
        });

        it('should count unknown paths under one request series', async () => {
            for (let i = 0; i < 50; i++) {
                const res = await app.request(`/scan/${i}`);
                expect(res.status).toBe(404);
            }

            const text = await (await app.request('/metrics')).text();
            const series = text.split('\n').filter((line) => line.startsWith('analyzer_requests_total{'));

            expect(series).toEqual(['analyzer_requests_total{method="GET",path="unmatched",status="404"} 50']);
        });

        it('should label served paths by name and anything else as unmatched', () => {
            expect(routeLabel('/gsi')).toBe('/gsi');
            expect(routeLabel('/metrics')).toBe('/metrics');
            expect(routeLabel('/gsi/extra')).toBe('unmatched');
            expect(routeLabel('/wp-login.php')).toBe('unmatched');
        });
    });
});
