/**
 * Game State Integration -> Snapshot mapping
 */

import type {
    AbilityState,
    BuildingState,
    GsiMinimapObject,
    GsiPayload,
    MarkerKind,
    MinimapMarker,
    Position,
    Snapshot,
    TeamName,
} from '@lanecoach/shared';
import { MINIMAP } from '@lanecoach/shared';

export function classifyMarker(image: string): MarkerKind {
    return image === MINIMAP.ENEMY_HERO_ICON ? 'enemy_hero' : 'other';
}

export function parseTeamName(teamName: string | undefined): TeamName | undefined {
    switch (teamName?.toLowerCase()) {
        case 'radiant':
            return 'radiant';
        case 'dire':
            return 'dire';
        default:
            return undefined;
    }
}

function toMarker(obj: GsiMinimapObject): MinimapMarker {
    return {
        name: obj.name,
        team: obj.team,
        kind: classifyMarker(obj.image),
        position: { x: obj.xpos, y: obj.ypos },
    };
}

function mapRecord<T, U>(record: Record<string, T>, fn: (value: T) => U): Record<string, U> {
    return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, fn(v)]));
}

/**
 * Build a Snapshot from a validated payload.
 * Returns undefined when the payload carries no game clock (menus, draft).
 */
export function toSnapshot(payload: GsiPayload): Snapshot | undefined {
    const clock = payload.map?.game_time;
    if (clock === undefined) return undefined;

    const { map, player, hero } = payload;

    const position: Position | undefined =
        hero?.xpos !== undefined && hero.ypos !== undefined
            ? { x: hero.xpos, y: hero.ypos }
            : undefined;

    const abilities: AbilityState[] = Object.values(payload.abilities ?? {}).map((a) => ({
        name: a.name,
        level: a.level,
        can_cast: a.can_cast,
        passive: a.passive,
        ultimate: a.ultimate,
    }));

    let buildings: Snapshot['buildings'];
    if (payload.buildings) {
        buildings = {};
        for (const [team, group] of Object.entries(payload.buildings)) {
            const name = parseTeamName(team);
            if (!name) continue;
            buildings[name] = mapRecord(group, (b): BuildingState => ({
                health: b.health,
                max_health: b.max_health,
            }));
        }
    }

    return {
        clock,
        match_id: map?.matchid,
        game_state: map?.game_state,
        paused: map?.paused,
        daytime: map?.daytime,
        player: {
            team: parseTeamName(player?.team_name),
            gold: player?.gold,
            net_worth: player?.net_worth,
            gpm: player?.gpm,
            xpm: player?.xpm,
            last_hits: player?.last_hits,
            denies: player?.denies,
            kills: player?.kills,
            deaths: player?.deaths,
            assists: player?.assists,
            kill_list: player?.kill_list ? { ...player.kill_list } : undefined,
        },
        hero: {
            name: hero?.name,
            level: hero?.level,
            alive: hero?.alive,
            health_percent: hero?.health_percent,
            mana_percent: hero?.mana_percent,
            buyback_cost: hero?.buyback_cost,
            position,
        },
        abilities,
        markers: mapRecord(payload.minimap ?? {}, toMarker),
        buildings,
    };
}
