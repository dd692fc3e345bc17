/**
 * Analyzer Service Metrics
 */

import { MetricsRegistry } from '@lanecoach/shared';

export function createAnalyzerMetrics(registry: MetricsRegistry = new MetricsRegistry()) {
    return {
        registry,

        // Counters
        snapshotsReceived: registry.createCounter(
            'analyzer_snapshots_received_total',
            'Total number of state payloads received',
            []
        ),

        snapshotsAccepted: registry.createCounter(
            'analyzer_snapshots_accepted_total',
            'Total number of snapshots applied to the engine',
            []
        ),

        snapshotsDropped: registry.createCounter(
            'analyzer_snapshots_dropped_total',
            'Total number of payloads not applied',
            ['reason']
        ),

        combatEvents: registry.createCounter(
            'analyzer_combat_events_total',
            'Total number of detected combat events',
            ['kind']
        ),

        componentErrors: registry.createCounter(
            'analyzer_component_errors_total',
            'Total number of component update failures',
            ['component']
        ),

        publishErrors: registry.createCounter(
            'analyzer_publish_errors_total',
            'Total number of failed insight publishes',
            []
        ),

        requests: registry.createCounter(
            'analyzer_requests_total',
            'Total HTTP requests',
            ['method', 'path', 'status']
        ),

        // Histograms
        ingestLatency: registry.createHistogram(
            'analyzer_ingest_latency_ms',
            'Snapshot ingestion latency in milliseconds',
            [],
            [0.1, 0.25, 0.5, 1, 2.5, 5, 10]
        ),

        // Gauges
        trackedEnemies: registry.createGauge(
            'analyzer_tracked_enemies',
            'Number of enemy heroes with a position history',
            []
        ),

        gameClock: registry.createGauge(
            'analyzer_game_clock_seconds',
            'Game clock of the current snapshot',
            []
        ),

        engaged: registry.createGauge(
            'analyzer_engagement_active',
            '1 while a team fight is detected',
            []
        ),
    };
}

export type AnalyzerMetrics = ReturnType<typeof createAnalyzerMetrics>;
