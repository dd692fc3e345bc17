/**
 * Prometheus Metrics Helpers
 * In-process registry rendered in the Prometheus text format
 */

// ============================================
// Metric Types
// ============================================

type Labels = Record<string, string>;

interface CounterMetric {
    type: 'counter';
    name: string;
    help: string;
    labels: string[];
    values: Map<string, number>;
}

interface GaugeMetric {
    type: 'gauge';
    name: string;
    help: string;
    labels: string[];
    values: Map<string, number>;
}

interface HistogramObservation {
    count: number;
    sum: number;
    /** Per-bucket hit counts, cumulated when rendered */
    buckets: number[];
}

interface HistogramMetric {
    type: 'histogram';
    name: string;
    help: string;
    labels: string[];
    buckets: number[];
    observations: Map<string, HistogramObservation>;
}

type Metric = CounterMetric | GaugeMetric | HistogramMetric;

function labelsToString(labels: Labels): string {
    return Object.entries(labels)
        .map(([k, v]) => `${k}="${v}"`)
        .join(',');
}

// ============================================
// Registry
// ============================================

export class MetricsRegistry {
    private metrics: Map<string, Metric> = new Map();

    createCounter(name: string, help: string, labels: string[] = []): Counter {
        const metric: CounterMetric = {
            type: 'counter',
            name,
            help,
            labels,
            values: new Map(),
        };
        this.metrics.set(name, metric);
        return new Counter(metric);
    }

    createGauge(name: string, help: string, labels: string[] = []): Gauge {
        const metric: GaugeMetric = {
            type: 'gauge',
            name,
            help,
            labels,
            values: new Map(),
        };
        this.metrics.set(name, metric);
        return new Gauge(metric);
    }

    createHistogram(
        name: string,
        help: string,
        labels: string[] = [],
        buckets: number[] = [0.1, 0.5, 1, 2.5, 5, 10, 25, 50, 100]
    ): Histogram {
        const metric: HistogramMetric = {
            type: 'histogram',
            name,
            help,
            labels,
            buckets,
            observations: new Map(),
        };
        this.metrics.set(name, metric);
        return new Histogram(metric);
    }

    // Output Prometheus format
    getMetrics(): string {
        const lines: string[] = [];

        for (const metric of this.metrics.values()) {
            lines.push(`# HELP ${metric.name} ${metric.help}`);
            lines.push(`# TYPE ${metric.name} ${metric.type}`);

            if (metric.type === 'histogram') {
                for (const [labelStr, obs] of metric.observations) {
                    const labelPrefix = labelStr ? `${labelStr},` : '';
                    let cumulative = 0;
                    metric.buckets.forEach((le, i) => {
                        cumulative += obs.buckets[i] ?? 0;
                        lines.push(`${metric.name}_bucket{${labelPrefix}le="${le}"} ${cumulative}`);
                    });
                    const suffix = labelStr ? `{${labelStr}}` : '';
                    lines.push(`${metric.name}_bucket{${labelPrefix}le="+Inf"} ${obs.count}`);
                    lines.push(`${metric.name}_sum${suffix} ${obs.sum}`);
                    lines.push(`${metric.name}_count${suffix} ${obs.count}`);
                }
            } else {
                for (const [labelStr, value] of metric.values) {
                    const labels = labelStr ? `{${labelStr}}` : '';
                    lines.push(`${metric.name}${labels} ${value}`);
                }
            }

            lines.push('');
        }

        return lines.join('\n');
    }

    // Reset all metrics (for testing)
    reset(): void {
        for (const metric of this.metrics.values()) {
            if (metric.type === 'histogram') {
                metric.observations.clear();
            } else {
                metric.values.clear();
            }
        }
    }
}

// ============================================
// Metric Classes
// ============================================

export class Counter {
    constructor(private metric: CounterMetric) { }

    inc(labels: Labels = {}, value = 1): void {
        const key = labelsToString(labels);
        const current = this.metric.values.get(key) ?? 0;
        this.metric.values.set(key, current + value);
    }

    get(labels: Labels = {}): number {
        return this.metric.values.get(labelsToString(labels)) ?? 0;
    }
}

export class Gauge {
    constructor(private metric: GaugeMetric) { }

    set(value: number, labels: Labels = {}): void {
        this.metric.values.set(labelsToString(labels), value);
    }

    get(labels: Labels = {}): number {
        return this.metric.values.get(labelsToString(labels)) ?? 0;
    }
}

export class Histogram {
    constructor(private metric: HistogramMetric) { }

    observe(value: number, labels: Labels = {}): void {
        const key = labelsToString(labels);

        let obs = this.metric.observations.get(key);
        if (!obs) {
            obs = { count: 0, sum: 0, buckets: new Array<number>(this.metric.buckets.length).fill(0) };
            this.metric.observations.set(key, obs);
        }

        obs.count++;
        obs.sum += value;

        // Only the first bucket the value fits in; rendering cumulates
        const index = this.metric.buckets.findIndex((le) => value <= le);
        if (index >= 0) {
            obs.buckets[index] = (obs.buckets[index] ?? 0) + 1;
        }
    }

    // Timer helper
    startTimer(labels: Labels = {}): () => number {
        const start = performance.now();
        return () => {
            const duration = performance.now() - start;
            this.observe(duration, labels);
            return duration;
        };
    }
}
