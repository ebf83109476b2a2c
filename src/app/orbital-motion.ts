import { gameConfig, type GameConfig, type MotionConfig, type RingConfig, type SpawnConfig } from 'config/game';
import { normalizeAngle, TAU } from 'util/math';
import type { PowerupTimerRegistry } from 'util/power-ups';
import type { RandomManager } from 'util/random';
import type { EntityKind } from './contracts';
import type { SpawnRequest } from './obstacle-pool';
import type { SpecialEventTracker } from './special-events';

export { polarToCartesian } from 'util/math';

/** Anything with an angular position that the motion system can advance. */
export interface AngularBody {
    angle: number;
    readonly angularVelocity: number;
}

/** Anything that sits on a ring and turns with it. */
export interface RingBody {
    angle: number;
    readonly ring: number;
}

export interface TimedEntity {
    readonly kind: EntityKind;
    readonly spawnedAt: number;
}

/**
 * Drift a body by its angular velocity within its ring's frame. Bodies drift
 * towards decreasing angles; a negative speed factor reverses them.
 */
export const advance = (body: AngularBody, dt: number, speedFactor: number): void => {
    body.angle = normalizeAngle(body.angle - body.angularVelocity * dt * speedFactor);
};

/**
 * Number of rings open at a level: one, plus one for every unlock level the
 * run has passed, capped by the ring count.
 */
export const activeRingCountForLevel = (level: number, rings: RingConfig = gameConfig.rings): number => {
    const unlocked = rings.unlockLevels.filter((threshold) => level > threshold).length;
    return Math.max(1, Math.min(rings.maxActive, rings.radii.length, 1 + unlocked));
};

/**
 * Ring reached by flipping outward `steps` times from `ring`, bouncing back
 * inward off the outermost active ring. Null when only one ring is open.
 */
export const flipTarget = (ring: number, steps: number, activeRings: number): number | null => {
    const outermost = activeRings - 1;
    if (outermost <= 0) {
        return null;
    }
    let target = Math.min(Math.max(0, ring), outermost);
    let direction = 1;
    for (let step = 0; step < steps; step += 1) {
        if (target + direction > outermost || target + direction < 0) {
            direction = -direction;
        }
        target += direction;
    }
    return target;
};

export const ringRadius = (ring: number, rings: RingConfig = gameConfig.rings): number => {
    const index = Math.max(0, Math.min(rings.radii.length - 1, Math.floor(ring)));
    return rings.radii[index] ?? 0;
};

export const ringDirection = (ring: number, rings: RingConfig = gameConfig.rings): number =>
    rings.directions[ring] ?? 1;

/**
 * Signed spin of a ring's frame at a level. The player token and everything
 * spawned on the ring ride this frame, so the token keeps the same linear
 * speed on every ring.
 */
export const ringAngularVelocity = (level: number, ring: number, config: GameConfig = gameConfig): number => {
    const radius = ringRadius(ring, config.rings);
    if (radius <= 0) {
        return 0;
    }
    const speed = config.motion.playerBaseSpeed * Math.pow(config.motion.playerSpeedGrowth, Math.max(0, level - 1));
    return (speed / radius) * ringDirection(ring, config.rings);
};

/** Carry a body along with the spin of the ring it sits on. */
export const rotateWithRing = (
    body: RingBody,
    level: number,
    dt: number,
    speedFactor: number,
    config: GameConfig = gameConfig,
): void => {
    body.angle = normalizeAngle(body.angle + ringAngularVelocity(level, body.ring, config) * dt * speedFactor);
};

/** Drift of a freshly spawned hazard relative to its ring's frame. */
export const hazardAngularVelocity = (level: number, motion: MotionConfig = gameConfig.motion): number =>
    motion.hazardBaseAngularVelocity * (1 + motion.hazardVelocityGrowth * Math.max(0, level - 1));

/**
 * Speed factor applied to every moving body: slowed while SlowMo runs, sign
 * flipped while gravity reversal runs.
 */
export const speedFactorFor = (
    registry: PowerupTimerRegistry,
    specialEvents: SpecialEventTracker,
    now: number,
): number => {
    let factor = 1;
    if (registry.isActive('slow-mo', now)) {
        const entry = registry.current('slow-mo');
        if (entry && entry.effect.type === 'slow-mo') {
            factor = entry.effect.factor;
        }
    }
    return specialEvents.isActive('gravity-reversal', now) ? -factor : factor;
};

/** Hazard placement: uniform ring among the active ones, uniform angle. */
export const selectSpawn = (
    rng: RandomManager,
    activeRings: number,
    level: number,
    now: number,
    motion: MotionConfig = gameConfig.motion,
): SpawnRequest => {
    const ring = rng.nextInt(Math.max(1, activeRings));
    const angle = rng.next() * TAU;
    return {
        kind: 'hazard',
        ring,
        angle,
        angularVelocity: hazardAngularVelocity(level, motion),
        spawnedAt: now,
    };
};

export const lifetimeFor = (kind: EntityKind, motion: MotionConfig = gameConfig.motion): number =>
    kind === 'hazard' ? motion.hazardLifetime : motion.pickupLifetime;

export const isExpired = (entity: TimedEntity, now: number, motion: MotionConfig = gameConfig.motion): boolean =>
    now - entity.spawnedAt >= lifetimeFor(entity.kind, motion);

export interface SpawnIntervalModifiers {
    readonly slowMo: boolean;
    readonly meteorShower: boolean;
}

export const spawnInterval = (
    level: number,
    modifiers: SpawnIntervalModifiers,
    config: GameConfig = gameConfig,
): number => {
    const spawn: SpawnConfig = config.spawn;
    let interval = Math.max(
        spawn.minimumInterval,
        spawn.baseInterval - spawn.intervalReductionPerLevel * Math.max(0, level - 1),
    );
    if (modifiers.slowMo) {
        interval *= spawn.slowMoIntervalScale;
    }
    if (modifiers.meteorShower) {
        const shower = config.specialEvents.meteorShower;
        interval = Math.max(shower.minimumInterval, interval * shower.intervalScale);
    }
    return interval;
};
