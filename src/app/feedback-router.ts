import { rootLogger, type Logger } from 'util/log';
import type { AnalyticsEventKind, AnalyticsParams, AnalyticsSink, FeedbackCue, FeedbackNotifier } from './contracts';
import type { AnyEventEnvelope, SimulationEventBus } from './events';

export const cueForEvent = (event: AnyEventEnvelope): FeedbackCue | null => {
    switch (event.type) {
        case 'RunStarted':
            return 'run-start';
        case 'RingFlipped':
            return 'flip';
        case 'NearMiss':
            return 'near-miss';
        case 'SafePass':
            return 'safe-pass';
        case 'MilestoneReached':
            return 'milestone';
        case 'PowerUpActivated':
            return 'power-up';
        case 'ShieldAbsorbed':
            return 'shield-absorb';
        case 'RunEnded':
            return 'collision';
        case 'SpecialEventStarted':
            return 'special-event';
        case 'LevelUp':
            return 'level-up';
        case 'RingsUnlocked':
        case 'SpecialEventEnded':
        case 'PowerUpExpired':
        case 'Revived':
            return null;
    }
};

export interface AnalyticsRecord {
    readonly kind: AnalyticsEventKind;
    readonly params: AnalyticsParams;
}

export const analyticsForEvent = (event: AnyEventEnvelope): AnalyticsRecord | null => {
    switch (event.type) {
        case 'RunStarted':
            return {
                kind: 'run_start',
                params: {
                    seed: event.payload.seed,
                    highScore: event.payload.highScore,
                    challenge: event.payload.targetScore !== null,
                },
            };
        case 'RunEnded':
            return {
                kind: 'run_end',
                params: {
                    score: event.payload.score,
                    durationSeconds: event.payload.durationSeconds,
                    nearMisses: event.payload.nearMisses,
                    newHighScore: event.payload.isNewHighScore,
                },
            };
        case 'NearMiss':
            return {
                kind: 'near_miss',
                params: { count: event.payload.count, multiplier: event.payload.multiplier },
            };
        case 'PowerUpActivated':
            return {
                kind: 'power_up_used',
                params: { type: event.payload.type, source: event.payload.source },
            };
        default:
            return null;
    }
};

export interface FeedbackRouterOptions {
    readonly notifier: FeedbackNotifier;
    readonly analytics: AnalyticsSink;
    readonly logger?: Logger;
}

/**
 * Forwards simulation events to audio/haptic cues and analytics. A failing
 * collaborator is logged and skipped.
 *
 * @returns unsubscribe
 */
export const attachFeedbackRouter = (bus: SimulationEventBus, options: FeedbackRouterOptions): (() => void) => {
    const logger = options.logger ?? rootLogger.child('feedback');

    const route = (event: AnyEventEnvelope) => {
        const cue = cueForEvent(event);
        if (cue) {
            try {
                options.notifier.notify(cue);
            } catch (error) {
                logger.warn('Feedback notifier failed', {
                    cue,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }

        const record = analyticsForEvent(event);
        if (record) {
            try {
                options.analytics.record(record.kind, record.params);
            } catch (error) {
                logger.warn('Analytics sink failed', {
                    kind: record.kind,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }
    };

    return bus.subscribeAll(route);
};
