/**
 * API Types
 * Response shapes of the analyzer's HTTP surface
 */

import type { Position } from './snapshot';

// ============================================
// Common Response Wrappers
// ============================================

export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: ApiError;
}

export interface ApiError {
    code: string;
    message: string;
    details?: unknown;
}

// ============================================
// Ingestion
// ============================================

export type IngestRejectReason = 'no_clock' | 'stale';

export interface IngestResponse {
    accepted: boolean;
    game_time?: number;
    reason?: IngestRejectReason;
}

// ============================================
// Queries
// ============================================

export interface InsightsResponse {
    match_id?: string;
    game_time: number;
    insights: string[];
}

export interface EnemyMovementResponse {
    name: string;
    last_seen: number;
    seconds_ago: number;
    position: Position;
    direction: string | null;
    times_spotted: number;
    estimated_level: number;
}

export interface EnemyPredictionResponse {
    name: string;
    position: Position;
}

export interface EnemiesResponse {
    game_time: number;
    movements: EnemyMovementResponse[];
    predictions: EnemyPredictionResponse[];
}

export interface EngagementResponse {
    game_time: number;
    state: 'calm' | 'skirmish' | 'engaged';
    started_at?: number;
    duration_sec?: number;
    recent_events?: number;
    total_events: number;
    advisory: string | null;
}

export interface PerformanceResponse {
    game_time: number;
    lines: string[];
    deaths: number;
}

// ============================================
// Pub/Sub
// ============================================

export interface InsightUpdateMessage {
    match_id: string;
    game_time: number;
    insights: string[];
    timestamp: string;
}
