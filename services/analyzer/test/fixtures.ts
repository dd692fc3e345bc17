/**
 * Snapshot builders for engine tests
 */

import type { MinimapMarker, Snapshot } from '@lanecoach/shared';

export function makeSnapshot(clock: number, overrides: Partial<Omit<Snapshot, 'clock'>> = {}): Snapshot {
    return {
        clock,
        player: {},
        hero: {},
        abilities: [],
        markers: {},
        ...overrides,
    };
}

export function enemyMarker(name: string, x: number, y: number, team = 3): MinimapMarker {
    return { name, team, kind: 'enemy_hero', position: { x, y } };
}

export function silentLogger() {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}
