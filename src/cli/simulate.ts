import { writeFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { parseChallenge, type Challenge } from 'app/challenge';
import type { FeedbackNotifier } from 'app/contracts';
import { attachFeedbackRouter } from 'app/feedback-router';
import { createGameLoopController, type HudSnapshot, type RunResult } from 'app/game-loop-controller';
import type { AnyEventEnvelope, SimulationEventName } from 'app/events';
import { createProgressStore } from 'app/progress-store';
import { createFrameRasterizer } from 'render/frame-rasterizer';
import { createLogger, silentLogWriter } from 'util/log';
import { chooseFlip } from './autopilot';

export interface SimulationInput {
    readonly seed?: number;
    readonly durationSec?: number;
    /** Dodge with the autopilot; off means the player never flips */
    readonly bot?: boolean;
    /** Write the encoded replay here when the run ends */
    readonly replayOut?: string;
    /** Deep link or share link to replay a challenge */
    readonly challenge?: string;
    readonly tickRate?: number;
}

export interface SimulationResult {
    readonly ok: true;
    readonly seed: number;
    readonly ended: boolean;
    readonly score: number;
    readonly level: number;
    readonly nearMisses: number;
    readonly durationSeconds: number;
    readonly ticks: number;
    readonly flips: number;
    readonly events: Partial<Record<SimulationEventName, number>>;
    readonly cues: number;
    readonly specialEvents: RunResult['specialEvents'];
    readonly challenge: Challenge | null;
    readonly challengeMet: boolean | null;
    readonly replayBytes: number;
    readonly replayPath: string | null;
}

const DEFAULT_SEED = 1;
const DEFAULT_DURATION_SEC = 120;
const DEFAULT_TICK_RATE = 60;

const countEvents = (counts: Partial<Record<SimulationEventName, number>>, event: AnyEventEnvelope) => {
    counts[event.type] = (counts[event.type] ?? 0) + 1;
};

const summarize = (
    snapshot: HudSnapshot,
    result: RunResult | null,
    challenge: Challenge | null,
): Pick<
    SimulationResult,
    'ended' | 'score' | 'level' | 'nearMisses' | 'durationSeconds' | 'specialEvents' | 'challengeMet'
> => {
    if (result) {
        return {
            ended: true,
            score: result.score,
            level: result.level,
            nearMisses: result.nearMisses,
            durationSeconds: result.durationSeconds,
            specialEvents: result.specialEvents,
            challengeMet: result.challengeMet,
        };
    }
    return {
        ended: false,
        score: snapshot.score,
        level: snapshot.level,
        nearMisses: snapshot.nearMisses,
        durationSeconds: snapshot.elapsed,
        specialEvents: [],
        challengeMet: challenge ? snapshot.score >= challenge.targetScore : null,
    };
};

/**
 * Run one headless game at a fixed tick rate until the player is hit or the
 * duration runs out. Same input, same output.
 */
export const runHeadlessSimulation = async (input: SimulationInput = {}): Promise<SimulationResult> => {
    const challenge = input.challenge ? parseChallenge(input.challenge) : null;
    if (input.challenge && !challenge) {
        throw new Error(`Invalid challenge link: ${input.challenge}`);
    }

    const seed = challenge?.seed ?? (typeof input.seed === 'number' ? input.seed : DEFAULT_SEED);
    const durationSec = typeof input.durationSec === 'number' ? Math.max(1, input.durationSec) : DEFAULT_DURATION_SEC;
    const tickRate = typeof input.tickRate === 'number' && input.tickRate > 0 ? input.tickRate : DEFAULT_TICK_RATE;
    const useBot = input.bot ?? true;
    const replayPath = input.replayOut ? resolvePath(process.cwd(), input.replayOut) : null;

    const logger = createLogger('cli', { writer: silentLogWriter });
    const controller = createGameLoopController({
        logger,
        store: createProgressStore({ storage: null }),
        replayTier: replayPath ? 'standard' : 'disabled',
        frameSource: replayPath ? createFrameRasterizer() : null,
    });

    const counts: Partial<Record<SimulationEventName, number>> = {};
    let cues = 0;
    const notifier: FeedbackNotifier = {
        notify: () => {
            cues += 1;
        },
    };
    controller.bus.subscribeAll((event) => countEvents(counts, event));
    const detach = attachFeedbackRouter(controller.bus, { notifier, analytics: { record: () => undefined }, logger });

    controller.start({ seed, challenge });

    const totalTicks = Math.ceil(durationSec * tickRate);
    let ticks = 0;
    let flips = 0;
    try {
        while (ticks <= totalTicks && controller.status() === 'running') {
            if (useBot) {
                const steps = chooseFlip(controller.sceneView());
                if (steps !== null && controller.flip(steps)) {
                    flips += 1;
                }
            }
            controller.tick(ticks / tickRate);
            ticks += 1;
        }
    } finally {
        detach();
    }

    const result = controller.result();
    const replay = result?.replay ?? null;
    if (replayPath && replay) {
        await writeFile(replayPath, replay);
    }

    return {
        ok: true,
        seed: result?.seed ?? seed,
        ...summarize(controller.snapshot(), result, challenge),
        ticks,
        flips,
        events: counts,
        cues,
        challenge,
        replayBytes: replay?.byteLength ?? 0,
        replayPath: replayPath && replay ? replayPath : null,
    };
};
