import type { IngestRejectReason, LoggerLike, Snapshot } from '@lanecoach/shared';
import { createLogger } from '@lanecoach/shared';
import { createAnalyzerMetrics, type AnalyzerMetrics } from '../metrics';
import { EngagementDetector } from './EngagementDetector';
import { composeInsights } from './InsightCompositor';
import { MetricSampler } from './MetricSampler';
import { PositionTracker } from './PositionTracker';
import { SnapshotStore } from './SnapshotStore';
import type {
    CombatEvent,
    DeathRecord,
    EngagementStatus,
    MovementDescription,
    PositionPrediction,
} from './types';

export type IngestResult =
    | { accepted: true; clock: number; events: CombatEvent[] }
    | { accepted: false; clock: number; reason: IngestRejectReason };

export interface MatchAnalyzerOptions {
    logger?: LoggerLike;
    metrics?: AnalyzerMetrics;
    store?: SnapshotStore;
    tracker?: PositionTracker;
    detector?: EngagementDetector;
    sampler?: MetricSampler;
}

export interface EnemyOverview {
    clock: number;
    movements: MovementDescription[];
    predictions: PositionPrediction[];
}

/**
 * Owns the snapshot store and the three analytical components of one
 * match and applies each accepted snapshot to all of them in one step.
 */
export class MatchAnalyzer {
    readonly store: SnapshotStore;
    readonly tracker: PositionTracker;
    readonly detector: EngagementDetector;
    readonly sampler: MetricSampler;

    private readonly logger: LoggerLike;
    private readonly metrics: AnalyzerMetrics;

    constructor(options: MatchAnalyzerOptions = {}) {
        this.store = options.store ?? new SnapshotStore();
        this.tracker = options.tracker ?? new PositionTracker();
        this.detector = options.detector ?? new EngagementDetector();
        this.sampler = options.sampler ?? new MetricSampler();
        this.logger = options.logger ?? createLogger('analyzer:engine');
        this.metrics = options.metrics ?? createAnalyzerMetrics();
    }

    /**
     * Apply a snapshot. One whose clock does not advance past the current
     * snapshot is dropped and leaves every component untouched.
     */
    ingest(snapshot: Snapshot): IngestResult {
        const stop = this.metrics.ingestLatency.startTimer();
        const held = this.store.current;

        if (held && snapshot.clock <= held.clock) {
            this.metrics.snapshotsDropped.inc({ reason: 'stale' });
            this.logger.debug('Stale snapshot dropped', {
                game_time: snapshot.clock,
                current_game_time: held.clock,
            });
            return { accepted: false, clock: snapshot.clock, reason: 'stale' };
        }

        const { current, previous } = this.store.ingest(snapshot);
        const applied = current ?? snapshot;

        let events: CombatEvent[] = [];
        this.guard('tracker', () => this.tracker.update(applied));
        this.guard('detector', () => {
            events = this.detector.update(applied, previous);
        });
        this.guard('sampler', () => this.sampler.update(applied));

        for (const event of events) {
            this.metrics.combatEvents.inc({ kind: event.kind });
            this.logger.info('Combat event', {
                game_time: event.clock,
                kind: event.kind,
                victim: event.victim,
            });
        }

        this.metrics.snapshotsAccepted.inc();
        this.metrics.gameClock.set(applied.clock);
        this.metrics.trackedEnemies.set(this.tracker.trackedNames().length);
        this.metrics.engaged.set(this.detector.isEngaged() ? 1 : 0);
        stop();

        return { accepted: true, clock: applied.clock, events };
    }

    private guard(component: string, update: () => void): void {
        try {
            update();
        } catch (error) {
            this.metrics.componentErrors.inc({ component });
            this.logger.error('Component update failed', { component, error: String(error) });
        }
    }

    get current(): Snapshot | undefined {
        return this.store.current;
    }

    engagement(now: number): EngagementStatus {
        return this.detector.statusAt(now);
    }

    enemies(now: number): EnemyOverview {
        return {
            clock: now,
            movements: this.tracker.describeRecent(now),
            predictions: this.tracker.predict(now),
        };
    }

    performance(now: number): string[] {
        return this.sampler.report(now);
    }

    deaths(): DeathRecord {
        return this.detector.deaths();
    }

    /**
     * Advisory lines for the current snapshot; empty before the first one
     */
    insights(): string[] {
        const snapshot = this.store.current;
        if (!snapshot) return [];

        const now = snapshot.clock;
        const { movements, predictions } = this.enemies(now);
        return composeInsights({
            snapshot,
            engagement: this.engagement(now),
            movements,
            predictions,
            performance: this.performance(now),
            deaths: this.deaths(),
        });
    }
}
