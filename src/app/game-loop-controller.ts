import { gameConfig, type GameConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import { angularDistance, distanceBetween, polarToCartesian, type Point } from 'util/math';
import { createInvariantReporter, type InvariantReporter } from 'util/invariant';
import { createValueSubject, type Observable } from 'util/observable';
import {
    createPowerUpEffect,
    PowerupTimerRegistry,
    selectRandomPowerUpType,
    type PowerUpType,
} from 'util/power-ups';
import { createRandomManager, type RandomManager } from 'util/random';
import { createScoringEngine, type ScoringEngine } from 'util/scoring';
import type { Challenge } from './challenge';
import { createCollisionResolver, type CollisionContext, type CollisionResolver } from './collisions';
import { createCommandQueue, type CommandQueue, type SimulationCommand } from './command-queue';
import type {
    EntityView,
    FrameSource,
    OperationResult,
    ProgressStore,
    RingView,
    SceneView,
    VisualHandle,
    VisualProvider,
} from './contracts';
import { headlessVisuals } from './contracts';
import { detectDeviceProfile, resolveReplayTier, type DeviceProfile, type ReplayTier } from './device-profile';
import type { RunStatus } from './economy';
import { createEventBus, createTickEventList, type SafePassReason, type SimulationEventBus } from './events';
import { ObstaclePool, type EntitySlot } from './obstacle-pool';
import {
    activeRingCountForLevel,
    advance,
    flipTarget,
    isExpired,
    ringRadius,
    rotateWithRing,
    selectSpawn,
    spawnInterval,
    speedFactorFor,
} from './orbital-motion';
import { createProgressStore } from './progress-store';
import { createReplayFrameBuffer, type ReplayEncoder, type ReplayFrameBuffer } from './replay-buffer';
import { createSpecialEventTracker, type SpecialEventKind, type SpecialEventTracker } from './special-events';

/** Longest simulated step a single tick may take, seconds */
const MAX_TICK_DELTA = 0.25;

export type FlipSteps = 1 | 2;

export interface StartOptions {
    /** Spawn seed; generated when absent. A challenge's seed wins over this. */
    readonly seed?: number | null;
    readonly challenge?: Challenge | null;
}

export interface PowerUpStatus {
    readonly type: PowerUpType;
    readonly remaining: number;
    readonly strength: number;
}

export interface HudSnapshot {
    readonly status: RunStatus;
    readonly score: number;
    readonly multiplier: number;
    readonly level: number;
    readonly nearMisses: number;
    readonly activeRings: number;
    readonly playerRing: number;
    readonly elapsed: number;
    readonly powerUps: readonly PowerUpStatus[];
    readonly specialEvents: readonly SpecialEventKind[];
    readonly graceActive: boolean;
}

export interface RunResult {
    readonly score: number;
    readonly durationSeconds: number;
    readonly nearMisses: number;
    readonly replay: Uint8Array | null;
    readonly specialEvents: readonly SpecialEventKind[];
    readonly seed: number;
    readonly level: number;
    readonly challenge: Challenge | null;
    /** null when the run was not a challenge */
    readonly challengeMet: boolean | null;
    readonly highScore: number;
    readonly isNewHighScore: boolean;
}

export type ReviveResult = OperationResult<'not-ended'>;

export interface GameLoopControllerOptions {
    readonly config?: GameConfig;
    readonly visuals?: VisualProvider;
    readonly frameSource?: FrameSource | null;
    readonly store?: ProgressStore;
    readonly replayTier?: ReplayTier;
    readonly deviceProfile?: DeviceProfile;
    readonly encoder?: ReplayEncoder;
    readonly invariants?: InvariantReporter;
    readonly logger?: Logger;
    readonly bus?: SimulationEventBus;
    /** Builds the spawn stream for a run from its seed */
    readonly createRandom?: (seed: number | null) => RandomManager;
}

export interface GameLoopController {
    readonly bus: SimulationEventBus;
    readonly hud: Observable<HudSnapshot>;
    readonly replayTier: ReplayTier;
    readonly start: (options?: StartOptions) => void;
    /** Advance the run to the given monotonic time in seconds. */
    readonly tick: (now: number) => void;
    readonly flip: (steps?: FlipSteps) => boolean;
    readonly revive: (withShield: boolean) => ReviveResult;
    readonly enqueue: (command: SimulationCommand) => void;
    readonly revivePending: () => boolean;
    readonly status: () => RunStatus;
    readonly snapshot: () => HudSnapshot;
    readonly sceneView: () => SceneView;
    /** Summary of the ended run; null while a run is idle or in progress. */
    readonly result: () => RunResult | null;
}

interface PlayerState {
    ring: number;
    angle: number;
}

export const createGameLoopController = (options: GameLoopControllerOptions = {}): GameLoopController => {
    const config = options.config ?? gameConfig;
    const logger = options.logger ?? rootLogger.child('loop');
    const invariants = options.invariants ?? createInvariantReporter({ logger: logger.child('invariant') });
    const visuals = options.visuals ?? headlessVisuals;
    const frameSource = options.frameSource ?? null;
    const store = options.store ?? createProgressStore({ storage: null });
    const bus = options.bus ?? createEventBus();
    const createRandom = options.createRandom ?? createRandomManager;
    const replayTier =
        options.replayTier ?? resolveReplayTier(options.deviceProfile ?? detectDeviceProfile(), config.replay);

    const events = createTickEventList();
    const commands: CommandQueue = createCommandQueue();
    const pool = new ObstaclePool({ capacity: config.pool.capacity, visuals, invariants });
    const registry = new PowerupTimerRegistry();
    const specialEvents: SpecialEventTracker = createSpecialEventTracker(config.specialEvents);
    const scoring: ScoringEngine = createScoringEngine({ scoring: config.scoring, collisions: config.collisions });
    const collisions: CollisionResolver = createCollisionResolver({
        collisions: config.collisions,
        powerUps: config.powerUps,
    });
    const replay: ReplayFrameBuffer = createReplayFrameBuffer({
        tier: replayTier,
        config: config.replay,
        encoder: options.encoder,
        logger: logger.child('replay'),
    });

    const playerVisual: VisualHandle = visuals.acquire('player');
    const ringVisuals: VisualHandle[] = config.rings.radii.map(() => visuals.acquire('ring'));

    const player: PlayerState = { ring: 0, angle: 0 };
    let status: RunStatus = 'idle';
    let rng: RandomManager = createRandom(null);
    let challenge: Challenge | null = null;
    let activeRings = 1;
    let pendingStart = false;
    let startedAt = 0;
    let endedAt = 0;
    let lastNow: number | null = null;
    let lastSpawnAt = 0;
    let flipReadyAt = Number.NEGATIVE_INFINITY;
    let isNewHighScore = false;
    let cachedResult: RunResult | null = null;

    const currentTime = (): number => lastNow ?? 0;

    const positionOf = (ring: number, angle: number): Point => polarToCartesian(ringRadius(ring, config.rings), angle);

    const playerPosition = (): Point => positionOf(player.ring, player.angle);

    const snapshot: GameLoopController['snapshot'] = () => {
        const now = currentTime();
        const score = scoring.snapshot();
        return {
            status,
            score: score.score,
            multiplier: score.multiplier,
            level: score.level,
            nearMisses: score.nearMisses,
            activeRings,
            playerRing: player.ring,
            elapsed: status === 'idle' || pendingStart ? 0 : (status === 'ended' ? endedAt : now) - startedAt,
            powerUps: registry.activeTypes().map((type) => ({
                type,
                remaining: registry.timeRemaining(type, now) ?? 0,
                strength: registry.normalizedStrength(type, now),
            })),
            specialEvents: specialEvents
                .active()
                .filter((window) => now < window.endsAt)
                .map((window) => window.kind),
            graceActive: collisions.isInGrace(now),
        };
    };

    const hudSubject = createValueSubject<HudSnapshot>(snapshot(), { label: 'hud', logger });

    const sceneView: GameLoopController['sceneView'] = () => {
        const rings: RingView[] = config.rings.radii.map((radius, index) => ({
            index,
            radius,
            active: index < activeRings,
        }));
        const entities: EntityView[] = pool.active().map((entity) => ({
            id: entity.id,
            kind: entity.kind,
            ring: entity.ring,
            angle: entity.angle,
            position: positionOf(entity.ring, entity.angle),
        }));
        return {
            rings,
            player: { ring: player.ring, angle: player.angle, position: playerPosition() },
            entities,
            inverted: specialEvents.isActive('color-inversion', currentTime()),
        };
    };

    const flushEvents = () => {
        for (const event of events.drain()) {
            bus.publish(event);
        }
        hudSubject.next(snapshot());
    };

    const activatePowerUp = (type: PowerUpType, source: 'purchase' | 'revive', now: number) => {
        const entry = registry.activate(createPowerUpEffect(type, config.powerUps), now);
        events.push({
            type: 'PowerUpActivated',
            timestamp: now,
            payload: { type, source, expiresAt: entry.expiresAt },
        });
    };

    const flipAt = (steps: FlipSteps, now: number): boolean => {
        if (status !== 'running' || now < flipReadyAt) {
            return false;
        }
        const ring = flipTarget(player.ring, steps, activeRings);
        if (ring === null) {
            return false;
        }

        const from = player.ring;

        flipReadyAt = now + config.input.flipCooldown;
        player.ring = ring;
        events.push({ type: 'RingFlipped', timestamp: now, payload: { from, to: ring } });
        return true;
    };

    const reviveAt = (withShield: boolean, now: number): ReviveResult => {
        if (status !== 'ended') {
            return { ok: false, reason: 'not-ended' };
        }

        pool.recycleAll();
        specialEvents.endWindows();
        status = 'running';
        cachedResult = null;
        lastSpawnAt = now;
        collisions.startGrace(now);
        if (withShield) {
            activatePowerUp('shield', 'revive', now);
        }
        events.push({ type: 'Revived', timestamp: now, payload: { withShield } });
        logger.info('Run revived', { withShield, score: scoring.snapshot().score });
        return { ok: true };
    };

    const applyCommand = (command: SimulationCommand, now: number) => {
        switch (command.type) {
            case 'flip':
                flipAt(command.steps, now);
                return;
            case 'revive':
                reviveAt(command.withShield, now);
                return;
            case 'activate-power-up':
                if (status === 'running') {
                    activatePowerUp(command.powerUp, command.source, now);
                }
                return;
            case 'grant-gems':
                store.grantGems(command.amount);
                return;
        }
    };

    const spawnHazard = (now: number, allowPickup: boolean) => {
        const level = scoring.snapshot().level;
        const request = selectSpawn(rng, activeRings, level, now, config.motion);
        const hazard = pool.spawn(request);
        if (!hazard || !allowPickup || !rng.chance(config.spawn.pickupChance)) {
            return;
        }
        pool.spawn({
            ...request,
            kind: selectRandomPowerUpType(rng.next),
            angle: request.angle + config.spawn.pickupAngleOffset,
        });
    };

    const awardPass = (entity: EntitySlot, now: number, reason: SafePassReason) => {
        const award = scoring.awardSafePass();
        events.push({
            type: 'SafePass',
            timestamp: now,
            payload: {
                entityId: entity.id,
                points: award.points,
                score: award.score,
                multiplier: award.multiplier,
                reason,
            },
        });

        if (!award.leveledUp) {
            return;
        }
        events.push({ type: 'LevelUp', timestamp: now, payload: { level: award.level } });
        const unlocked = activeRingCountForLevel(award.level, config.rings);
        if (unlocked > activeRings) {
            activeRings = unlocked;
            events.push({ type: 'RingsUnlocked', timestamp: now, payload: { activeRings } });
        }
    };

    const expireTimers = (now: number) => {
        for (const type of registry.update(now)) {
            events.push({ type: 'PowerUpExpired', timestamp: now, payload: { type } });
        }
        for (const kind of specialEvents.expire(now)) {
            events.push({ type: 'SpecialEventEnded', timestamp: now, payload: { kind } });
        }
    };

    const advanceBodies = (dt: number, now: number) => {
        const speedFactor = speedFactorFor(registry, specialEvents, now);
        const level = scoring.snapshot().level;
        rotateWithRing(player, level, dt, speedFactor, config);
        for (const entity of pool.active()) {
            rotateWithRing(entity, level, dt, speedFactor, config);
            advance(entity, dt, speedFactor);
        }
    };

    const endRun = (now: number, entity: EntitySlot) => {
        status = 'ended';
        endedAt = now;
        const score = scoring.snapshot();
        isNewHighScore = store.recordHighScore(score.score) || isNewHighScore;
        cachedResult = null;
        events.push({
            type: 'RunEnded',
            timestamp: now,
            payload: {
                score: score.score,
                durationSeconds: endedAt - startedAt,
                nearMisses: score.nearMisses,
                isNewHighScore,
            },
        });
        logger.info('Run ended', { score: score.score, level: score.level, hazard: entity.id, seed: rng.seed() });
    };

    const scoreEntities = (now: number) => {
        const origin = playerPosition();
        for (const entity of pool.active()) {
            if (isExpired(entity, now, config.motion)) {
                if (entity.kind === 'hazard' && !entity.flags.awardedPass) {
                    entity.flags.awardedPass = true;
                    awardPass(entity, now, 'expired');
                }
                pool.recycle(entity);
                continue;
            }
            if (entity.kind !== 'hazard') {
                continue;
            }

            const evaluation = scoring.evaluateEntity(entity.flags, {
                sameRing: entity.ring === player.ring,
                angularDelta: angularDistance(entity.angle, player.angle),
                distance: distanceBetween(positionOf(entity.ring, entity.angle), origin),
            });
            if (evaluation.nearMiss) {
                const award = scoring.awardNearMiss();
                events.push({
                    type: 'NearMiss',
                    timestamp: now,
                    payload: { entityId: entity.id, count: award.count, multiplier: award.multiplier },
                });
            }
            if (evaluation.safePass) {
                awardPass(entity, now, 'cleared');
            }
        }

        const score = scoring.snapshot().score;
        for (const hit of scoring.checkMilestones()) {
            events.push({
                type: 'MilestoneReached',
                timestamp: now,
                payload: { checkpoint: hit.checkpoint, score, next: hit.next },
            });
        }

        for (const window of specialEvents.evaluate(score, now)) {
            events.push({
                type: 'SpecialEventStarted',
                timestamp: now,
                payload: { kind: window.kind, endsAt: window.endsAt },
            });
            if (window.kind === 'meteor-shower') {
                for (let index = 0; index < config.specialEvents.meteorShower.burst; index += 1) {
                    spawnHazard(now, false);
                }
            }
        }
    };

    const spawnIfDue = (now: number) => {
        const interval = spawnInterval(
            scoring.snapshot().level,
            {
                slowMo: registry.isActive('slow-mo', now),
                meteorShower: specialEvents.isActive('meteor-shower', now),
            },
            config,
        );
        if (now - lastSpawnAt >= interval) {
            lastSpawnAt = now;
            spawnHazard(now, true);
        }
    };

    const captureReplay = (now: number) => {
        if (!frameSource || !replay.isDue(now)) {
            return;
        }
        const image = frameSource.capture(sceneView());
        if (image) {
            replay.capture(image, now);
        }
    };

    const syncVisuals = () => {
        for (const entity of pool.active()) {
            entity.visual?.setPosition(positionOf(entity.ring, entity.angle));
            entity.visual?.setRotation(entity.angle);
        }
        playerVisual.setPosition(playerPosition());
        playerVisual.setRotation(player.angle);
        ringVisuals.forEach((visual, index) => {
            visual.setVisible(index < activeRings);
        });
    };

    const collisionContext = (now: number, dt: number): CollisionContext => ({
        now,
        dt,
        player: { ring: player.ring, angle: player.angle, position: playerPosition() },
        pool,
        registry,
        positionOf: (entity) => positionOf(entity.ring, entity.angle),
        events,
    });

    const tick: GameLoopController['tick'] = (now) => {
        if (!Number.isFinite(now)) {
            invariants.report('tick with non-finite timestamp', { now });
            return;
        }

        if (pendingStart) {
            pendingStart = false;
            startedAt = now;
            lastSpawnAt = now;
            lastNow = now;
            events.push({
                type: 'RunStarted',
                timestamp: now,
                payload: {
                    seed: rng.seed(),
                    highScore: store.highScore(),
                    targetScore: challenge?.targetScore ?? null,
                },
            });
        }

        const previous = lastNow ?? now;
        const dt = Math.min(MAX_TICK_DELTA, Math.max(0, now - previous));
        lastNow = Math.max(previous, now);

        for (const command of commands.drain()) {
            applyCommand(command, now);
        }

        if (status !== 'running') {
            flushEvents();
            return;
        }

        expireTimers(now);
        advanceBodies(dt, now);

        const context = collisionContext(now, dt);
        collisions.applyMagnet(context);
        const outcome = collisions.resolve(context);
        if (outcome.lethal) {
            endRun(now, outcome.lethal);
            captureReplay(now);
            syncVisuals();
            flushEvents();
            return;
        }

        scoreEntities(now);
        spawnIfDue(now);
        captureReplay(now);
        syncVisuals();
        flushEvents();
    };

    const start: GameLoopController['start'] = (startOptions = {}) => {
        challenge = startOptions.challenge ?? null;
        rng = createRandom(challenge?.seed ?? startOptions.seed ?? null);
        pool.recycleAll();
        registry.reset();
        specialEvents.reset();
        scoring.reset();
        collisions.reset();
        replay.clear();
        commands.clear();
        events.drain();
        player.ring = 0;
        player.angle = 0;
        activeRings = activeRingCountForLevel(1, config.rings);
        flipReadyAt = Number.NEGATIVE_INFINITY;
        isNewHighScore = false;
        cachedResult = null;
        lastNow = null;
        startedAt = 0;
        endedAt = 0;
        pendingStart = true;
        status = 'running';
        logger.info('Run started', { seed: rng.seed(), challenge: challenge?.targetScore ?? null, replayTier });
    };

    const result: GameLoopController['result'] = () => {
        if (status !== 'ended') {
            return null;
        }
        if (cachedResult) {
            return cachedResult;
        }
        const score = scoring.snapshot();
        cachedResult = {
            score: score.score,
            durationSeconds: endedAt - startedAt,
            nearMisses: score.nearMisses,
            replay: replay.finalize(),
            specialEvents: specialEvents.fired(),
            seed: rng.seed(),
            level: score.level,
            challenge,
            challengeMet: challenge ? score.score >= challenge.targetScore : null,
            highScore: store.highScore(),
            isNewHighScore,
        };
        return cachedResult;
    };

    return {
        bus,
        hud: hudSubject,
        replayTier,
        start,
        tick,
        flip: (steps = 1) => flipAt(steps, currentTime()),
        revive: (withShield) => reviveAt(withShield, currentTime()),
        enqueue: commands.enqueue,
        revivePending: () => commands.has('revive'),
        status: () => status,
        snapshot,
        sceneView,
        result,
    };
};
