/**
 * Insight Reporter
 *
 * Polls the analyzer on a fixed cadence, independent of how often the
 * game client posts, and hands each new set of insights to the log and
 * the optional publisher.
 */

import type { LoggerLike } from '@lanecoach/shared';
import type { MatchAnalyzer } from './engine/MatchAnalyzer';
import type { AnalyzerMetrics } from './metrics';
import type { InsightPublisher } from './publisher';

export interface ReporterDeps {
    analyzer: MatchAnalyzer;
    logger: LoggerLike;
    metrics: AnalyzerMetrics;
    publisher?: InsightPublisher;
}

export interface InsightReporter {
    /** Report once if the game clock moved since the last report */
    tick(): Promise<boolean>;
    start(intervalMs: number): void;
    stop(): void;
}

export function createInsightReporter(deps: ReporterDeps): InsightReporter {
    const { analyzer, logger, metrics, publisher } = deps;
    let lastReported: number | undefined;
    let timer: NodeJS.Timeout | undefined;

    async function tick(): Promise<boolean> {
        const snapshot = analyzer.current;
        if (!snapshot || snapshot.clock === lastReported) return false;
        lastReported = snapshot.clock;

        const insights = analyzer.insights();
        logger.info('Coach insights', { game_time: snapshot.clock, insights });

        if (publisher) {
            try {
                await publisher.publish(snapshot.match_id, snapshot.clock, insights);
            } catch (error) {
                metrics.publishErrors.inc();
                logger.warn('Insight publish failed', { error: String(error) });
            }
        }

        return true;
    }

    function start(intervalMs: number): void {
        if (timer) return;
        timer = setInterval(() => {
            tick().catch((error: unknown) => {
                logger.error('Reporter tick failed', { error: String(error) });
            });
        }, intervalMs);
        timer.unref();
    }

    function stop(): void {
        if (timer) {
            clearInterval(timer);
            timer = undefined;
        }
    }

    return { tick, start, stop };
}
