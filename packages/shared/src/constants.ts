/**
 * Shared Constants
 */

// ============================================
// Redis Keys
// ============================================

export const REDIS_KEYS = {
    // Pub/Sub channel for composed insights
    insightUpdates: (matchId: string) => `updates:insights:${matchId}`,
} as const;

// ============================================
// Minimap
// ============================================

export const MINIMAP = {
    /** Image tag of the hostile hero icon */
    ENEMY_HERO_ICON: 'minimap_enemyicon',

    TEAM_ID_RADIANT: 2,
    TEAM_ID_DIRE: 3,

    /** Enemy team assumed when the local team is unknown */
    DEFAULT_ENEMY_TEAM_ID: 3,

    HERO_NAME_PREFIX: 'npc_dota_hero_',
    VICTIM_ID_PREFIX: 'victimid_',
} as const;

// ============================================
// Tracking
// ============================================

export const TRACKING = {
    MAX_POSITION_HISTORY: 100,

    /** Seconds since last sighting for a movement description */
    DESCRIBE_WINDOW_SEC: 60,

    /** Seconds since last sighting for a position prediction */
    PREDICT_WINDOW_SEC: 30,

    /** Map units below which a predicted enemy is a threat */
    PROXIMITY_WARNING_UNITS: 2000,

    DISTANCE: {
        VERY_CLOSE: 1000,
        NEARBY: 2000,
        MEDIUM: 4000,
    },
} as const;

// ============================================
// Buildings
// ============================================

export const BUILDINGS = {
    NAME_PREFIXES: ['dota_goodguys_', 'dota_badguys_'],
} as const;

// ============================================
// Engagement Detection
// ============================================

export const ENGAGEMENT = {
    /** Engagement starts only while the last event is this recent */
    ACTIVE_GAP_SEC: 15,

    /** Trailing window and event count that open an engagement */
    START_WINDOW_SEC: 30,
    START_MIN_EVENTS: 3,

    /** Trailing window and event count for the skirmish advisory */
    SKIRMISH_WINDOW_SEC: 60,
    SKIRMISH_MIN_EVENTS: 2,
} as const;

// ============================================
// Performance Metrics
// ============================================

export const PERFORMANCE = {
    MAX_SAMPLES: 20,

    TREND_SIGNIFICANT: 100,
    TREND_MILD: 20,

    /** Last-hit rate benchmarks per phase (CS per minute) */
    CS_BENCHMARKS: {
        early: { excellent: 7, good: 5, poor: 3 },
        late: { excellent: 8, good: 6, poor: 4 },
    },
    CS_PHASE_BOUNDARY_MIN: 10,

    /** Deaths per minute considered high */
    HIGH_DEATH_RATE: 0.2,
    SURVIVAL_STREAK_SEC: 300,
} as const;

// ============================================
// Game Phases
// ============================================

export type GamePhase = 'early' | 'mid' | 'late';

export const PHASES = {
    EARLY_END_SEC: 10 * 60,
    MID_END_SEC: 25 * 60,
} as const;

export function getGamePhase(clock: number): GamePhase {
    if (clock < PHASES.EARLY_END_SEC) return 'early';
    if (clock < PHASES.MID_END_SEC) return 'mid';
    return 'late';
}

// ============================================
// Coaching Heuristics
// ============================================

export const COACHING = {
    /** Expected last hits per minute in the laning phase */
    EXPECTED_CS_PER_MIN: 10,

    STACK_WINDOW: { FROM_SEC: 45, TO_SEC: 48 },
    RUNE_WARNING_FROM_SEC: 55,

    GOLD_TIERS: [
        { min: 4000, advice: 'You have sufficient gold for major items (BKB, Blink, etc.)' },
        { min: 2000, advice: 'You have gold for mid-tier items (Force Staff, Eul\'s, etc.)' },
        { min: 1000, advice: 'Consider purchasing support/utility items' },
    ],

    /** Net worth benchmarks for a core position */
    ITEM_BENCHMARKS: [
        { minute: 10, net_worth: 4000, items: 'Power Treads + Wraith Bands' },
        { minute: 15, net_worth: 7000, items: 'Core farming item (Battlefury/Maelstrom)' },
        { minute: 20, net_worth: 11000, items: 'Second major item (BKB/Desolator)' },
        { minute: 30, net_worth: 18000, items: 'Third major item (Satanic/Butterfly)' },
    ],
    ITEM_TIMING_TOLERANCE: 1000,
} as const;

// ============================================
// Team Fight Readiness
// ============================================

export type ReadinessTier = 'excellent' | 'good' | 'caution' | 'not_ready';

export const READINESS = {
    HEALTH: { HIGH: 80, MID: 50 },
    MANA: { HIGH: 70, MID: 40 },
    ULTIMATE_READY_POINTS: 2,
    ABILITIES_READY_POINTS: 1,
    TIERS: { EXCELLENT: 4, GOOD: 2, CAUTION: 1 },
} as const;

export function getReadinessTier(score: number): ReadinessTier {
    if (score >= READINESS.TIERS.EXCELLENT) return 'excellent';
    if (score >= READINESS.TIERS.GOOD) return 'good';
    if (score >= READINESS.TIERS.CAUTION) return 'caution';
    return 'not_ready';
}
