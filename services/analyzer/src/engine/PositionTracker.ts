import type { Snapshot } from '@lanecoach/shared';
import { MINIMAP, TRACKING, estimateHeroLevel, formatHeroName, formatPosition } from '@lanecoach/shared';
import type {
    Direction,
    MovementDescription,
    PositionPrediction,
    PositionSample,
} from './types';

/**
 * Team id whose hero icons count as hostile for the local player
 */
export function enemyTeamId(snapshot: Snapshot): number {
    switch (snapshot.player.team) {
        case 'radiant':
            return MINIMAP.TEAM_ID_DIRE;
        case 'dire':
            return MINIMAP.TEAM_ID_RADIANT;
        default:
            return MINIMAP.DEFAULT_ENEMY_TEAM_ID;
    }
}

/**
 * Dominant cardinal direction of a displacement. Ties go to the
 * horizontal axis; no displacement has no direction.
 */
export function dominantDirection(dx: number, dy: number): Direction | null {
    if (dx === 0 && dy === 0) return null;
    if (Math.abs(dx) >= Math.abs(dy)) {
        return dx > 0 ? 'East' : 'West';
    }
    return dy > 0 ? 'North' : 'South';
}

export function formatMovement(m: MovementDescription): string {
    const base = `${m.name}: last seen ${m.seconds_ago} seconds ago at ${formatPosition(m.position)}`;
    return m.direction ? `${base}, moving ${m.direction}` : base;
}

interface TrackedEntity {
    samples: PositionSample[];
    times_spotted: number;
}

/**
 * Bounded position history per visible enemy hero, with movement
 * descriptions and linear extrapolation of where each is heading.
 */
export class PositionTracker {
    private entities = new Map<string, TrackedEntity>();
    private lastClock: number | undefined;

    constructor(private readonly maxHistory: number = TRACKING.MAX_POSITION_HISTORY) { }

    update(snapshot: Snapshot): void {
        const clock = snapshot.clock;
        if (this.lastClock !== undefined && clock <= this.lastClock) return;

        const enemyTeam = enemyTeamId(snapshot);
        const seen = new Set<string>();

        for (const marker of Object.values(snapshot.markers)) {
            if (marker.kind !== 'enemy_hero' || marker.team !== enemyTeam) continue;
            if (!marker.name) continue;

            const name = formatHeroName(marker.name);
            if (seen.has(name)) continue;
            seen.add(name);

            let entity = this.entities.get(name);
            if (!entity) {
                entity = { samples: [], times_spotted: 0 };
                this.entities.set(name, entity);
            }

            entity.samples.push({ clock, position: { ...marker.position } });
            entity.times_spotted++;
            if (entity.samples.length > this.maxHistory) {
                entity.samples.shift();
            }
        }

        this.lastClock = clock;
    }

    describeRecent(now: number): MovementDescription[] {
        const descriptions: MovementDescription[] = [];

        for (const [name, entity] of this.entities) {
            const latest = entity.samples.at(-1);
            if (!latest) continue;

            const secondsAgo = now - latest.clock;
            if (secondsAgo > TRACKING.DESCRIBE_WINDOW_SEC) continue;

            const prior = entity.samples.at(-2);
            const direction = prior
                ? dominantDirection(
                    latest.position.x - prior.position.x,
                    latest.position.y - prior.position.y
                )
                : null;

            descriptions.push({
                name,
                last_seen: latest.clock,
                seconds_ago: secondsAgo,
                position: { ...latest.position },
                direction,
                times_spotted: entity.times_spotted,
                estimated_level: estimateHeroLevel(latest.clock),
            });
        }

        // Most recently seen first; equal clocks keep tracking order
        return descriptions.sort((a, b) => b.last_seen - a.last_seen);
    }

    predict(now: number): PositionPrediction[] {
        const predictions: PositionPrediction[] = [];

        for (const [name, entity] of this.entities) {
            const latest = entity.samples.at(-1);
            const prior = entity.samples.at(-2);
            if (!latest || !prior) continue;

            const sinceSeen = now - latest.clock;
            if (sinceSeen > TRACKING.PREDICT_WINDOW_SEC) continue;

            const dt = latest.clock - prior.clock;
            if (dt <= 0) continue;

            const factor = sinceSeen / dt;
            predictions.push({
                name,
                position: {
                    x: latest.position.x + Math.trunc((latest.position.x - prior.position.x) * factor),
                    y: latest.position.y + Math.trunc((latest.position.y - prior.position.y) * factor),
                },
            });
        }

        return predictions;
    }

    history(name: string): readonly PositionSample[] {
        return this.entities.get(name)?.samples.map((s) => ({ clock: s.clock, position: { ...s.position } })) ?? [];
    }

    trackedNames(): string[] {
        return [...this.entities.keys()];
    }

    get lastProcessedClock(): number | undefined {
        return this.lastClock;
    }
}
