import { Application, Container } from 'pixi.js';
import { createToneNotifier } from 'audio/tone-notifier';
import { createFrameRasterizer } from 'render/frame-rasterizer';
import { createPixiVisualProvider } from 'render/pixi-visuals';
import { rootLogger, type Logger } from 'util/log';
import { createChallenge, parseChallenge, shareChallenge, type ChallengeLinks } from './challenge';
import type { AnalyticsSink } from './contracts';
import { noopAnalytics } from './contracts';
import { attachFeedbackRouter } from './feedback-router';
import { createGameLoopController, type FlipSteps, type GameLoopController } from './game-loop-controller';
import { createSimulationLoop } from './loop';

export interface OrbitalDodgeOptions {
    readonly container?: HTMLElement;
    readonly seed?: number;
    /** Deep link or share link that opened the game */
    readonly challengeLink?: string;
    readonly analytics?: AnalyticsSink;
    readonly logger?: Logger;
}

export interface OrbitalDodgeHandle {
    readonly controller: GameLoopController;
    /** Start a fresh run; keeps the challenge when the seed is omitted. */
    readonly restart: (seed?: number) => void;
    /** Links that dare a friend to beat the ended run on its seed; null before the run ends. */
    readonly shareResult: () => ChallengeLinks | null;
    readonly destroy: () => void;
}

const FLIP_KEYS: Readonly<Record<string, FlipSteps>> = {
    Space: 1,
    ArrowUp: 1,
    ArrowDown: 2,
};

const configureCanvas = (canvas: HTMLCanvasElement) => {
    canvas.style.width = '100%';
    canvas.style.height = '100%';
    canvas.style.display = 'block';
    canvas.style.touchAction = 'none';
    canvas.style.userSelect = 'none';
};

export async function bootstrapOrbitalDodge(options: OrbitalDodgeOptions = {}): Promise<OrbitalDodgeHandle> {
    const container = options.container ?? document.body;
    const logger = options.logger ?? rootLogger.child('app');

    const app = new Application();
    await app.init({ resizeTo: container, background: '#080a1c', antialias: true });
    configureCanvas(app.canvas);
    container.appendChild(app.canvas);

    const layer = new Container();
    app.stage.addChild(layer);
    const visuals = createPixiVisualProvider(layer, {
        origin: { x: app.screen.width / 2, y: app.screen.height / 2 },
    });

    const notifier = createToneNotifier({ logger: logger.child('audio') });
    const controller = createGameLoopController({
        visuals,
        frameSource: createFrameRasterizer(),
        logger: logger.child('loop'),
    });
    const analytics = options.analytics ?? noopAnalytics;
    const detachFeedback = attachFeedbackRouter(controller.bus, { notifier, analytics, logger });
    const loop = createSimulationLoop(controller);

    const challenge = options.challengeLink ? parseChallenge(options.challengeLink) : null;
    if (options.challengeLink && !challenge) {
        logger.warn('Ignoring malformed challenge link', { link: options.challengeLink });
    }

    let audioUnlocked = false;
    const unlockAudio = () => {
        if (audioUnlocked) {
            return;
        }
        audioUnlocked = true;
        notifier.unlock().catch((error: unknown) => {
            audioUnlocked = false;
            logger.warn('Audio unlock deferred until the next interaction', {
                error: error instanceof Error ? error.message : String(error),
            });
        });
    };

    const handleKeyDown = (event: KeyboardEvent) => {
        unlockAudio();
        const steps = FLIP_KEYS[event.code];
        if (steps !== undefined) {
            event.preventDefault();
            controller.enqueue({ type: 'flip', steps });
        }
    };

    const handlePointerDown = () => {
        unlockAudio();
        controller.enqueue({ type: 'flip', steps: 1 });
    };

    const docRef = container.ownerDocument;
    docRef.addEventListener('keydown', handleKeyDown);
    app.canvas.addEventListener('pointerdown', handlePointerDown);

    controller.start({ seed: options.seed ?? null, challenge });
    loop.start();
    logger.info('Orbital Dodge ready', { replayTier: controller.replayTier, challenge: challenge !== null });

    return {
        controller,
        restart: (seed) => {
            controller.start({ seed: seed ?? null, challenge: seed === undefined ? challenge : null });
        },
        shareResult: () => {
            const result = controller.result();
            return result ? shareChallenge(createChallenge(result.seed, result.score), analytics) : null;
        },
        destroy: () => {
            loop.stop();
            detachFeedback();
            docRef.removeEventListener('keydown', handleKeyDown);
            app.canvas.removeEventListener('pointerdown', handlePointerDown);
            notifier.dispose();
            visuals.destroy();
            app.destroy(true);
        },
    };
}
