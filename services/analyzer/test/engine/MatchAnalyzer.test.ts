/**
 * Match Analyzer Tests
 */

import { MatchAnalyzer } from '../../src/engine/MatchAnalyzer';
import { PositionTracker } from '../../src/engine/PositionTracker';
import { createAnalyzerMetrics, type AnalyzerMetrics } from '../../src/metrics';
import { enemyMarker, makeSnapshot, silentLogger } from '../fixtures';

const first = makeSnapshot(100, {
    player: { gpm: 300, kill_list: {} },
    hero: { alive: true },
    markers: { o1: enemyMarker('npc_dota_hero_axe', 0, 0) },
});

const second = makeSnapshot(110, {
    player: { gpm: 500, kill_list: { victimid_1: 1 } },
    hero: { alive: true },
    markers: { o1: enemyMarker('npc_dota_hero_axe', 10, 0) },
});

class FailingTracker extends PositionTracker {
    update(): void {
        throw new Error('marker table corrupted');
    }
}

describe('MatchAnalyzer', () => {
    let metrics: AnalyzerMetrics;
    let logger: ReturnType<typeof silentLogger>;
    let analyzer: MatchAnalyzer;

    beforeEach(() => {
        metrics = createAnalyzerMetrics();
        logger = silentLogger();
        analyzer = new MatchAnalyzer({ logger, metrics });
    });

    it('should have no insights before the first snapshot', () => {
        expect(analyzer.current).toBeUndefined();
        expect(analyzer.insights()).toEqual([]);
    });

    it('should apply snapshots to every component', () => {
        expect(analyzer.ingest(first)).toEqual({ accepted: true, clock: 100, events: [] });
        const result = analyzer.ingest(second);

        expect(result).toEqual({
            accepted: true,
            clock: 110,
            events: [{ clock: 110, kind: 'elimination', subject: 'self', victim: 'Enemy 1' }],
        });
        expect(analyzer.current).toBe(second);
        expect(analyzer.store.read().previous).toBe(first);
        expect(analyzer.tracker.history('Axe')).toHaveLength(2);
        expect(analyzer.sampler.samples('gpm')).toHaveLength(2);
        expect(metrics.combatEvents.get({ kind: 'elimination' })).toBe(1);
        expect(metrics.gameClock.get()).toBe(110);
        expect(metrics.trackedEnemies.get()).toBe(1);
    });

    it('should drop a duplicate snapshot without touching any component', () => {
        analyzer.ingest(first);
        analyzer.ingest(second);

        expect(analyzer.ingest(second)).toEqual({ accepted: false, clock: 110, reason: 'stale' });
        expect(analyzer.ingest(first)).toEqual({ accepted: false, clock: 100, reason: 'stale' });

        expect(analyzer.sampler.samples('gpm')).toHaveLength(2);
        expect(analyzer.detector.eventCount()).toBe(1);
        expect(analyzer.store.read().previous).toBe(first);
        expect(metrics.snapshotsDropped.get({ reason: 'stale' })).toBe(2);
        expect(metrics.snapshotsAccepted.get()).toBe(2);
    });

    it('should compose insights from the current snapshot', () => {
        analyzer.ingest(first);
        analyzer.ingest(second);

        expect(analyzer.insights()).toEqual([
            'Axe: last seen 0 seconds ago at (10, 0), moving East',
            'Axe likely at (10, 0)',
            'GPM: 500 (avg 400)',
            'GPM trending up significantly',
            'Deaths: 0 - Excellent survival!',
            'Early Game Phase (1:50)',
        ]);
    });

    it('should expose per-component queries', () => {
        analyzer.ingest(first);
        analyzer.ingest(second);

        expect(analyzer.engagement(110)).toEqual({ state: 'calm' });
        expect(analyzer.enemies(110).predictions).toEqual([{ name: 'Axe', position: { x: 10, y: 0 } }]);
        expect(analyzer.performance(110)).toEqual(['GPM: 500 (avg 400)', 'GPM trending up significantly']);
        expect(analyzer.deaths()).toEqual({ count: 0, last_at: undefined });
    });

    it('should keep the other components running when one fails', () => {
        const guarded = new MatchAnalyzer({ logger, metrics, tracker: new FailingTracker() });

        const result = guarded.ingest(first);

        expect(result.accepted).toBe(true);
        expect(guarded.sampler.samples('gpm')).toHaveLength(1);
        expect(metrics.componentErrors.get({ component: 'tracker' })).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('Component update failed', {
            component: 'tracker',
            error: 'Error: marker table corrupted',
        });
    });
});
