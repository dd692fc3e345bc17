import type { Snapshot } from '@lanecoach/shared';
import { ENGAGEMENT, formatVictimName } from '@lanecoach/shared';
import type { CombatEvent, DeathRecord, EngagementStatus } from './types';

export const LOCAL_PLAYER = 'self';
export const UNKNOWN_KILLER = 'enemy';

export function formatEngagement(status: EngagementStatus): string | null {
    switch (status.state) {
        case 'engaged':
            return `TEAM FIGHT IN PROGRESS! Started ${status.duration_sec} seconds ago`;
        case 'skirmish':
            return 'Skirmishes detected - team fight may be developing!';
        case 'calm':
            return null;
    }
}

/**
 * Diffs consecutive snapshots into combat events (local deaths and
 * eliminations) and classifies bursts of them as team fights.
 *
 * Calm -> Engaged when the last event is under 15s old and the trailing
 * 30s hold at least 3 events; Engaged -> Calm once 15s pass without one.
 */
export class EngagementDetector {
    private localDeaths: number[] = [];
    private eliminations = new Map<string, number[]>();
    private log: CombatEvent[] = [];

    private lastEventClock: number | undefined;
    private lastClock: number | undefined;

    private engaged = false;
    private engagedSince = 0;

    update(current: Snapshot, previous: Snapshot | undefined): CombatEvent[] {
        const clock = current.clock;
        if (this.lastClock !== undefined && clock <= this.lastClock) return [];
        this.lastClock = clock;

        const emitted = previous ? this.diff(current, previous) : [];
        for (const event of emitted) {
            this.record(event);
        }

        this.transition(clock);
        return emitted;
    }

    private diff(current: Snapshot, previous: Snapshot): CombatEvent[] {
        const clock = current.clock;
        const events: CombatEvent[] = [];

        if (previous.hero.alive === true && current.hero.alive === false) {
            events.push({ clock, kind: 'death', subject: UNKNOWN_KILLER, victim: LOCAL_PLAYER });
        }

        const currentKills = current.player.kill_list;
        const previousKills = previous.player.kill_list;
        if (currentKills && previousKills) {
            for (const [victimId, count] of Object.entries(currentKills)) {
                const increase = count - (previousKills[victimId] ?? 0);
                const victim = formatVictimName(victimId);
                // A jump of N between snapshots is N eliminations at this clock
                for (let i = 0; i < increase; i++) {
                    events.push({ clock, kind: 'elimination', subject: LOCAL_PLAYER, victim });
                }
            }
        }

        return events;
    }

    private record(event: CombatEvent): void {
        if (event.kind === 'death') {
            this.localDeaths.push(event.clock);
        } else {
            const times = this.eliminations.get(event.victim) ?? [];
            times.push(event.clock);
            this.eliminations.set(event.victim, times);
        }
        this.log.push(event);
        this.lastEventClock = event.clock;
    }

    private transition(now: number): void {
        if (this.lastEventClock === undefined) return;
        const sinceLast = now - this.lastEventClock;

        if (!this.engaged) {
            if (
                sinceLast < ENGAGEMENT.ACTIVE_GAP_SEC &&
                this.countInWindow(now, ENGAGEMENT.START_WINDOW_SEC) >= ENGAGEMENT.START_MIN_EVENTS
            ) {
                this.engaged = true;
                this.engagedSince = now;
            }
        } else if (sinceLast >= ENGAGEMENT.ACTIVE_GAP_SEC) {
            this.engaged = false;
        }
    }

    /**
     * Events with clock >= now - window, across every subject
     */
    countInWindow(now: number, windowSec: number): number {
        const start = now - windowSec;
        let count = this.localDeaths.filter((t) => t >= start).length;
        for (const times of this.eliminations.values()) {
            count += times.filter((t) => t >= start).length;
        }
        return count;
    }

    statusAt(now: number): EngagementStatus {
        if (this.engaged) {
            return {
                state: 'engaged',
                started_at: this.engagedSince,
                duration_sec: now - this.engagedSince,
            };
        }

        const recent = this.countInWindow(now, ENGAGEMENT.SKIRMISH_WINDOW_SEC);
        if (recent >= ENGAGEMENT.SKIRMISH_MIN_EVENTS) {
            return { state: 'skirmish', recent_events: recent };
        }

        return { state: 'calm' };
    }

    isEngaged(): boolean {
        return this.engaged;
    }

    events(): readonly CombatEvent[] {
        return [...this.log];
    }

    eventCount(): number {
        return this.log.length;
    }

    eliminationsOf(victim: string): readonly number[] {
        return [...(this.eliminations.get(victim) ?? [])];
    }

    deaths(): DeathRecord {
        return { count: this.localDeaths.length, last_at: this.localDeaths.at(-1) };
    }
}
