/**
 * Time & Naming Utilities
 *
 * Formatting helpers for game clocks, unit names and map distances.
 */

import { BUILDINGS, MINIMAP } from '../constants';
import type { Position } from '../types/snapshot';

/**
 * Format a game clock as M:SS ("Unknown" when absent).
 * Negative clocks (pre-horn) keep their sign: -0:30.
 */
export function formatGameTime(seconds: number | undefined): string {
    if (seconds === undefined) return 'Unknown';

    const sign = seconds < 0 ? '-' : '';
    const abs = Math.abs(seconds);
    const minutes = Math.floor(abs / 60);
    const remaining = abs % 60;
    return `${sign}${minutes}:${String(remaining).padStart(2, '0')}`;
}

/**
 * Whole minutes elapsed on the game clock
 */
export function clockMinutes(clock: number): number {
    return Math.trunc(clock / 60);
}

/**
 * npc_dota_hero_bounty_hunter -> Bounty Hunter
 */
export function formatHeroName(name: string): string {
    return name
        .replace(MINIMAP.HERO_NAME_PREFIX, '')
        .split('_')
        .map((word) => (word ? word.charAt(0).toUpperCase() + word.slice(1) : ''))
        .join(' ');
}

/**
 * victimid_4 -> Enemy 4
 */
export function formatVictimName(victimId: string): string {
    return `Enemy ${victimId.replace(MINIMAP.VICTIM_ID_PREFIX, '')}`;
}

/**
 * Rough hero level for a game clock, for enemies whose level is not visible
 */
export function estimateHeroLevel(clock: number): number {
    const minutes = Math.max(0, clockMinutes(clock));
    if (minutes < 10) return Math.trunc(minutes / 2) + 1;
    if (minutes < 20) return Math.trunc(minutes / 3) + 5;
    return Math.trunc(minutes / 5) + 10;
}

/**
 * dota_goodguys_tower1_mid -> tower1 mid
 */
export function formatBuildingName(name: string): string {
    const prefix = BUILDINGS.NAME_PREFIXES.find((p) => name.startsWith(p));
    return (prefix ? name.slice(prefix.length) : name).split('_').join(' ');
}

export function distance(a: Position, b: Position): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return Math.sqrt(dx * dx + dy * dy);
}

export function formatPosition(p: Position): string {
    return `(${p.x}, ${p.y})`;
}
