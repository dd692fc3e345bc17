import type { Position, Snapshot } from '@lanecoach/shared';

// ============================================
// Position Tracking
// ============================================

export type Direction = 'North' | 'South' | 'East' | 'West';

export interface PositionSample {
    clock: number;
    position: Position;
}

export interface MovementDescription {
    name: string;
    last_seen: number;
    seconds_ago: number;
    position: Position;
    /** Dominant direction of the last displacement; null without one */
    direction: Direction | null;
    times_spotted: number;
    /** Level guessed from the clock of the last sighting */
    estimated_level: number;
}

export interface PositionPrediction {
    name: string;
    position: Position;
}

// ============================================
// Combat Events
// ============================================

export type CombatEventKind = 'death' | 'elimination';

export interface CombatEvent {
    clock: number;
    kind: CombatEventKind;
    /** Who scored it: `self` for eliminations, `enemy` for the local death */
    subject: string;
    victim: string;
}

export type EngagementStatus =
    | { state: 'engaged'; started_at: number; duration_sec: number }
    | { state: 'skirmish'; recent_events: number }
    | { state: 'calm' };

// ============================================
// Performance Metrics
// ============================================

export type MetricName = 'gpm' | 'xpm' | 'last_hits';

export type Trend = 'up_significant' | 'up' | 'flat' | 'down' | 'down_significant';

export interface MetricSample {
    clock: number;
    value: number;
}

export interface SeriesSummary {
    metric: MetricName;
    latest: number;
    mean: number;
    trend: Trend;
}

export type LastHitRating = 'excellent' | 'good' | 'average' | 'poor';

export interface LastHitRate {
    per_minute: number;
    phase: 'early' | 'late';
    rating: LastHitRating;
}

export interface DeathRecord {
    count: number;
    last_at?: number;
}

// ============================================
// Insight Composition
// ============================================

export interface InsightInput {
    snapshot: Snapshot;
    engagement: EngagementStatus;
    movements: readonly MovementDescription[];
    predictions: readonly PositionPrediction[];
    performance: readonly string[];
    deaths: DeathRecord;
}
