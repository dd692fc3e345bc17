import type { Snapshot } from '@lanecoach/shared';
import { PERFORMANCE, clockMinutes } from '@lanecoach/shared';
import type {
    LastHitRate,
    LastHitRating,
    MetricName,
    MetricSample,
    SeriesSummary,
    Trend,
} from './types';

const METRICS: readonly MetricName[] = ['gpm', 'xpm', 'last_hits'];

const METRIC_LABELS: Record<MetricName, string> = {
    gpm: 'GPM',
    xpm: 'XPM',
    last_hits: 'Last hits',
};

const TREND_TEXT: Record<Exclude<Trend, 'flat'>, string> = {
    up_significant: 'trending up significantly',
    up: 'trending up',
    down: 'trending down',
    down_significant: 'trending down significantly',
};

const RATING_TEXT: Record<LastHitRate['phase'], Partial<Record<LastHitRating, string>>> = {
    early: {
        excellent: 'Excellent early game CS',
        good: 'Good early game CS',
        poor: 'Early game CS needs improvement',
    },
    late: {
        excellent: 'Excellent CS',
        good: 'Good CS',
        poor: 'CS needs improvement',
    },
};

export function classifyTrend(latest: number, mean: number): Trend {
    const delta = latest - mean;
    if (delta >= PERFORMANCE.TREND_SIGNIFICANT) return 'up_significant';
    if (delta >= PERFORMANCE.TREND_MILD) return 'up';
    if (delta <= -PERFORMANCE.TREND_SIGNIFICANT) return 'down_significant';
    if (delta <= -PERFORMANCE.TREND_MILD) return 'down';
    return 'flat';
}

export function rateLastHits(perMinute: number, minutes: number): LastHitRate {
    const phase = minutes < PERFORMANCE.CS_PHASE_BOUNDARY_MIN ? 'early' : 'late';
    const bench = PERFORMANCE.CS_BENCHMARKS[phase];

    let rating: LastHitRating = 'average';
    if (perMinute >= bench.excellent) rating = 'excellent';
    else if (perMinute >= bench.good) rating = 'good';
    else if (perMinute < bench.poor) rating = 'poor';

    return { per_minute: perMinute, phase, rating };
}

/**
 * Bounded time series of the local hero's economy counters, compared
 * against their rolling mean and fixed last-hit benchmarks.
 */
export class MetricSampler {
    private series: Record<MetricName, MetricSample[]> = {
        gpm: [],
        xpm: [],
        last_hits: [],
    };
    private lastClock: number | undefined;

    constructor(private readonly maxSamples: number = PERFORMANCE.MAX_SAMPLES) { }

    update(current: Snapshot): void {
        const clock = current.clock;
        if (this.lastClock !== undefined && clock <= this.lastClock) return;
        this.lastClock = clock;

        const { gpm, xpm, last_hits } = current.player;
        this.append('gpm', clock, gpm);
        this.append('xpm', clock, xpm);
        this.append('last_hits', clock, last_hits);
    }

    private append(metric: MetricName, clock: number, value: number | undefined): void {
        if (value === undefined) return;
        const samples = this.series[metric];
        samples.push({ clock, value });
        if (samples.length > this.maxSamples) {
            samples.shift();
        }
    }

    samples(metric: MetricName): readonly MetricSample[] {
        return this.series[metric].map((s) => ({ ...s }));
    }

    summarize(metric: MetricName): SeriesSummary | undefined {
        const samples = this.series[metric];
        const latest = samples.at(-1);
        if (samples.length < 2 || !latest) return undefined;

        const mean = samples.reduce((sum, s) => sum + s.value, 0) / samples.length;
        return {
            metric,
            latest: latest.value,
            mean,
            trend: classifyTrend(latest.value, mean),
        };
    }

    summaries(): SeriesSummary[] {
        const out: SeriesSummary[] = [];
        for (const metric of METRICS) {
            const summary = this.summarize(metric);
            if (summary) out.push(summary);
        }
        return out;
    }

    lastHitRate(now: number): LastHitRate | undefined {
        const samples = this.series.last_hits;
        const latest = samples.at(-1);
        if (samples.length < 2 || !latest) return undefined;

        const minutes = clockMinutes(now);
        if (minutes <= 0) return undefined;

        return rateLastHits(latest.value / minutes, minutes);
    }

    report(now: number): string[] {
        const lines: string[] = [];

        for (const s of this.summaries()) {
            const label = METRIC_LABELS[s.metric];
            lines.push(`${label}: ${s.latest} (avg ${Math.round(s.mean)})`);
            if (s.trend !== 'flat') {
                lines.push(`${label} ${TREND_TEXT[s.trend]}`);
            }
        }

        const rate = this.lastHitRate(now);
        if (rate) {
            lines.push(`CS/min: ${rate.per_minute.toFixed(1)}`);
            const verdict = RATING_TEXT[rate.phase][rate.rating];
            if (verdict) lines.push(verdict);
        }

        return lines;
    }
}
