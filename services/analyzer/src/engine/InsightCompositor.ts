import type { AbilityState, BuildingState, HeroState, Position, Snapshot, TeamName } from '@lanecoach/shared';
import {
    COACHING,
    PERFORMANCE,
    READINESS,
    TRACKING,
    clockMinutes,
    distance,
    formatBuildingName,
    formatGameTime,
    formatPosition,
    getGamePhase,
    getReadinessTier,
    type ReadinessTier,
} from '@lanecoach/shared';
import { formatEngagement } from './EngagementDetector';
import { formatMovement } from './PositionTracker';
import type { DeathRecord, InsightInput, MovementDescription, PositionPrediction } from './types';

const READINESS_TEXT: Record<ReadinessTier, string> = {
    excellent: 'Excellent! All systems ready for team fight.',
    good: 'Good. Most resources available.',
    caution: 'Caution advised. Limited resources.',
    not_ready: 'Not ready for team fight. Consider retreating.',
};

export function describeDistance(units: number): string {
    if (units < TRACKING.DISTANCE.VERY_CLOSE) return 'VERY CLOSE!';
    if (units < TRACKING.DISTANCE.NEARBY) return 'Nearby';
    if (units < TRACKING.DISTANCE.MEDIUM) return 'Medium distance';
    return 'Far away';
}

// ============================================
// Readiness
// ============================================

/**
 * 0-7 team fight readiness from health, mana and castable abilities.
 * Unknown percentages contribute nothing.
 */
export function readinessScore(hero: HeroState, abilities: readonly AbilityState[]): number {
    let score = 0;

    const health = hero.health_percent;
    if (health !== undefined) {
        if (health > READINESS.HEALTH.HIGH) score += 2;
        else if (health > READINESS.HEALTH.MID) score += 1;
    }

    const mana = hero.mana_percent;
    if (mana !== undefined) {
        if (mana > READINESS.MANA.HIGH) score += 2;
        else if (mana > READINESS.MANA.MID) score += 1;
    }

    if (abilities.length > 0) {
        if (abilities.some((a) => a.ultimate === true && a.can_cast === true)) {
            score += READINESS.ULTIMATE_READY_POINTS;
        }

        // An ability of unknown kind is treated as passive
        const actives = abilities.filter((a) => a.passive === false);
        if (actives.every((a) => a.can_cast === true)) {
            score += READINESS.ABILITIES_READY_POINTS;
        }
    }

    return score;
}

// ============================================
// Sections
// ============================================

function trackingInsights(
    movements: readonly MovementDescription[],
    predictions: readonly PositionPrediction[],
    self: Position | undefined
): string[] {
    const lines: string[] = [];

    for (const m of movements) {
        lines.push(formatMovement(m));
        if (self) {
            const units = distance(self, m.position);
            lines.push(`  Distance from you: ${describeDistance(units)} (${Math.round(units)} units)`);
        }
    }

    for (const p of predictions) {
        lines.push(`${p.name} likely at ${formatPosition(p.position)}`);
        if (self && distance(self, p.position) < TRACKING.PROXIMITY_WARNING_UNITS) {
            lines.push(`  WARNING: ${p.name} may be very close to you!`);
        }
    }

    return lines;
}

function deathInsights(deaths: DeathRecord, clock: number): string[] {
    if (deaths.count === 0) {
        return ['Deaths: 0 - Excellent survival!'];
    }

    const lines = [`Deaths: ${deaths.count}`];
    const minutes = clockMinutes(clock);
    if (minutes > 0 && deaths.count / minutes > PERFORMANCE.HIGH_DEATH_RATE) {
        lines.push('High death rate, play more cautiously');
    }

    if (deaths.last_at !== undefined) {
        const survived = clock - deaths.last_at;
        if (survived > PERFORMANCE.SURVIVAL_STREAK_SEC) {
            lines.push(`Good survival streak: ${clockMinutes(survived)} minutes without dying`);
        }
    }

    return lines;
}

function earlyGameInsights(snapshot: Snapshot): string[] {
    const lines: string[] = [];
    const minutes = clockMinutes(snapshot.clock);
    const seconds = snapshot.clock % 60;

    const lastHits = snapshot.player.last_hits;
    if (lastHits !== undefined && minutes > 0) {
        const expected = minutes * COACHING.EXPECTED_CS_PER_MIN;
        if (lastHits < expected / 2) {
            lines.push(`Your last hits are low (${lastHits}). Focus more on last hitting.`);
        } else if (lastHits >= expected) {
            lines.push(`Good job on last hitting! You have ${lastHits} CS.`);
        }
    }

    if (seconds >= COACHING.STACK_WINDOW.FROM_SEC && seconds <= COACHING.STACK_WINDOW.TO_SEC) {
        lines.push('Stack camps now! Pull at X:53.');
    }

    if (minutes > 0 && minutes % 2 === 0 && seconds >= COACHING.RUNE_WARNING_FROM_SEC) {
        lines.push('Water runes spawning in a few seconds!');
    }

    return lines;
}

function midGameInsights(snapshot: Snapshot, movements: readonly MovementDescription[]): string[] {
    const lines: string[] = [];

    const gold = snapshot.player.gold;
    if (gold !== undefined) {
        const tier = COACHING.GOLD_TIERS.find((t) => gold >= t.min);
        if (tier) lines.push(tier.advice);
    }

    const self = snapshot.hero.position;
    if (self) {
        for (const m of movements) {
            if (m.seconds_ago < TRACKING.PREDICT_WINDOW_SEC && distance(self, m.position) < TRACKING.PROXIMITY_WARNING_UNITS) {
                lines.push(`${m.name} was recently spotted nearby - be careful!`);
            }
        }
    }

    lines.push('Roshan is available. Consider checking/taking with team coordination.');
    return lines;
}

function lateGameInsights(snapshot: Snapshot): string[] {
    const lines: string[] = [];

    const { buyback_cost } = snapshot.hero;
    const { gold } = snapshot.player;
    if (buyback_cost !== undefined && gold !== undefined) {
        if (gold < buyback_cost) {
            lines.push(`You don't have buyback gold! Need ${buyback_cost - gold} more gold.`);
        } else {
            lines.push(`You have buyback available (${buyback_cost} gold).`);
        }
    }

    const score = readinessScore(snapshot.hero, snapshot.abilities);
    lines.push(`Team fight readiness (${score}): ${READINESS_TEXT[getReadinessTier(score)]}`);
    return lines;
}

function itemTimingInsights(snapshot: Snapshot): string[] {
    const netWorth = snapshot.player.net_worth;
    if (netWorth === undefined) return [];

    const minutes = clockMinutes(snapshot.clock);
    const benchmarks = COACHING.ITEM_BENCHMARKS;
    const current = benchmarks.filter((b) => b.minute <= minutes).at(-1);
    if (!current) return [];

    const lines: string[] = [];
    const diff = netWorth - current.net_worth;
    if (diff >= COACHING.ITEM_TIMING_TOLERANCE) {
        lines.push(`You're ahead of item timings! +${diff} gold`);
    } else if (diff >= -COACHING.ITEM_TIMING_TOLERANCE) {
        lines.push('You\'re on track with item timings');
    } else {
        lines.push(`You're behind on item timings: ${diff} gold`);
    }
    lines.push(`Current benchmark (${current.minute} min): ${current.items}`);

    const next = benchmarks.find((b) => b.minute > minutes);
    if (next) {
        const timeLeft = next.minute - minutes;
        const goldNeeded = next.net_worth - netWorth;
        lines.push(`Next goal (${next.minute} min): ${next.items}`);
        lines.push(`Need ${goldNeeded} gold in ${timeLeft} minutes (${Math.trunc(goldNeeded / timeLeft)} GPM)`);
    }

    return lines;
}

function countTowers(snapshot: Snapshot, team: TeamName): number {
    const buildings = snapshot.buildings?.[team];
    if (!buildings) return 0;
    return Object.keys(buildings).filter((name) => name.includes('tower')).length;
}

function mapControlInsights(snapshot: Snapshot): string[] {
    const team = snapshot.player.team;
    if (!snapshot.buildings || !team) return [];

    const enemy: TeamName = team === 'radiant' ? 'dire' : 'radiant';
    const ours = countTowers(snapshot, team);
    const theirs = countTowers(snapshot, enemy);
    const diff = ours - theirs;

    const lines = [`Your team has ${ours} towers, enemy has ${theirs} towers`];
    if (diff >= 3) {
        lines.push('Strong map control advantage. Consider aggressive warding.');
    } else if (diff >= 1) {
        lines.push('Slight map control advantage. Maintain pressure.');
    } else if (diff === 0) {
        lines.push('Even map control. Focus on objectives.');
    } else if (diff >= -2) {
        lines.push('Losing map control. Defend remaining towers.');
    } else {
        lines.push('Significant map control disadvantage. Play defensively.');
    }

    if (diff < 0) {
        lines.push('Tip: When behind in towers, focus on smoke ganks and pick-offs.');
    } else if (diff > 0) {
        lines.push('Tip: Use your map control to secure Roshan and invade jungle.');
    }

    return lines;
}

/**
 * "tower1 mid 55%" per building. Buildings without a max health are skipped.
 */
function formatBuildingHealth(buildings: Readonly<Record<string, BuildingState>> | undefined): string {
    const parts = Object.entries(buildings ?? {})
        .filter(([, b]) => b.max_health > 0)
        .map(([name, b]) => `${formatBuildingName(name)} ${Math.trunc((b.health / b.max_health) * 100)}%`);
    return parts.length > 0 ? parts.join(', ') : 'No building data available';
}

function buildingStatusInsights(snapshot: Snapshot): string[] {
    const team = snapshot.player.team;
    if (!snapshot.buildings || !team) return [];

    const enemy: TeamName = team === 'radiant' ? 'dire' : 'radiant';
    return [
        `Your buildings: ${formatBuildingHealth(snapshot.buildings[team])}`,
        `Enemy buildings: ${formatBuildingHealth(snapshot.buildings[enemy])}`,
    ];
}

// ============================================
// Composition
// ============================================

/**
 * Ordered advisory lines: engagement, enemy tracking, performance,
 * phase advice, item timings, map control, building health.
 */
export function composeInsights(input: InsightInput): string[] {
    const { snapshot, engagement, movements, predictions, performance, deaths } = input;
    const lines: string[] = [];

    const fight = formatEngagement(engagement);
    if (fight) lines.push(fight);

    lines.push(...trackingInsights(movements, predictions, snapshot.hero.position));

    lines.push(...performance);
    lines.push(...deathInsights(deaths, snapshot.clock));

    const phase = getGamePhase(snapshot.clock);
    const clock = formatGameTime(snapshot.clock);
    switch (phase) {
        case 'early':
            lines.push(`Early Game Phase (${clock})`, ...earlyGameInsights(snapshot));
            break;
        case 'mid':
            lines.push(`Mid Game Phase (${clock})`, ...midGameInsights(snapshot, movements));
            break;
        case 'late':
            lines.push(`Late Game Phase (${clock})`, ...lateGameInsights(snapshot));
            break;
    }

    lines.push(...itemTimingInsights(snapshot));
    lines.push(...mapControlInsights(snapshot));
    lines.push(...buildingStatusInsights(snapshot));

    return lines;
}
