/**
 * Match Snapshot Types
 * Normalized view of one game-state integration update
 */

// ============================================
// Teams & Positions
// ============================================
export type TeamName = 'radiant' | 'dire';

export interface Position {
    x: number;
    y: number;
}

// ============================================
// Minimap Markers
// ============================================

/**
 * Classification of a minimap marker.
 * `enemy_hero` is the hostile hero icon; everything else is `other`.
 */
export type MarkerKind = 'enemy_hero' | 'other';

export interface MinimapMarker {
    /** Unit name, e.g. npc_dota_hero_bounty_hunter */
    name?: string;
    team: number;
    kind: MarkerKind;
    position: Position;
}

// ============================================
// Local Player & Hero
// ============================================
export interface PlayerState {
    team?: TeamName;
    gold?: number;
    net_worth?: number;
    /** Gold per minute */
    gpm?: number;
    /** Experience per minute */
    xpm?: number;
    last_hits?: number;
    denies?: number;
    kills?: number;
    deaths?: number;
    assists?: number;

    /** Elimination counters keyed by victim id (victimid_N) */
    kill_list?: Readonly<Record<string, number>>;
}

export interface HeroState {
    name?: string;
    level?: number;
    alive?: boolean;
    health_percent?: number;
    mana_percent?: number;
    buyback_cost?: number;
    position?: Position;
}

export interface AbilityState {
    name?: string;
    level?: number;
    can_cast?: boolean;
    passive?: boolean;
    ultimate?: boolean;
}

export interface BuildingState {
    health: number;
    max_health: number;
}

// ============================================
// Snapshot
// ============================================
export interface Snapshot {
    /** In-match elapsed time, integer seconds */
    clock: number;

    match_id?: string;
    game_state?: string;
    paused?: boolean;
    daytime?: boolean;

    player: PlayerState;
    hero: HeroState;
    abilities: readonly AbilityState[];

    /** Minimap markers keyed by slot id */
    markers: Readonly<Record<string, MinimapMarker>>;

    buildings?: Partial<Record<TeamName, Readonly<Record<string, BuildingState>>>>;
}

/** Pair held by the snapshot store after one ingestion step */
export interface SnapshotPair {
    current?: Snapshot;
    previous?: Snapshot;
}
