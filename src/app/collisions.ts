import { gameConfig, type CollisionConfig, type PowerUpConfig } from 'config/game';
import { distanceBetween, normalizeAngle, shortestAngleDelta, type Point } from 'util/math';
import { createPowerUpEffect, type PowerupTimerRegistry } from 'util/power-ups';
import type { TickEventList } from './events';
import type { EntitySlot, ObstaclePool } from './obstacle-pool';

export interface PlayerPose {
    readonly ring: number;
    readonly angle: number;
    readonly position: Point;
}

export interface CollisionContext {
    readonly now: number;
    readonly dt: number;
    readonly player: PlayerPose;
    readonly pool: ObstaclePool;
    readonly registry: PowerupTimerRegistry;
    readonly positionOf: (entity: EntitySlot) => Point;
    readonly events: TickEventList;
}

export interface CollisionOutcome {
    /** Hazard that ended the run, if any */
    readonly lethal: EntitySlot | null;
    readonly absorbed: number;
    readonly collected: number;
}

export interface CollisionResolver {
    readonly resolve: (context: CollisionContext) => CollisionOutcome;
    /** Push nearby hazards away from the player while a magnet runs; returns how many moved. */
    readonly applyMagnet: (context: CollisionContext) => number;
    readonly isInGrace: (now: number) => boolean;
    readonly startGrace: (now: number) => number;
    readonly reset: () => void;
}

export interface CollisionResolverOptions {
    readonly collisions?: CollisionConfig;
    readonly powerUps?: PowerUpConfig;
}

export const createCollisionResolver = (options: CollisionResolverOptions = {}): CollisionResolver => {
    const collisions = options.collisions ?? gameConfig.collisions;
    const powerUps = options.powerUps ?? gameConfig.powerUps;
    let graceUntil = Number.NEGATIVE_INFINITY;

    const isInGrace: CollisionResolver['isInGrace'] = (now) => now < graceUntil;

    const startGrace: CollisionResolver['startGrace'] = (now) => {
        graceUntil = now + collisions.graceWindow;
        return graceUntil;
    };

    const collectPickup = (context: CollisionContext, entity: EntitySlot): void => {
        if (entity.kind === 'hazard') {
            return;
        }
        const type = entity.kind;
        context.pool.recycle(entity);
        const entry = context.registry.activate(createPowerUpEffect(type, powerUps), context.now);
        context.events.push({
            type: 'PowerUpActivated',
            timestamp: context.now,
            payload: { type, source: 'pickup', expiresAt: entry.expiresAt },
        });
    };

    const resolve: CollisionResolver['resolve'] = (context) => {
        const { now, player, pool, registry } = context;
        let absorbed = 0;
        let collected = 0;

        for (const entity of pool.active()) {
            if (!entity.active) {
                continue;
            }
            const distance = distanceBetween(context.positionOf(entity), player.position);

            if (entity.kind !== 'hazard') {
                if (distance < collisions.pickupRadius) {
                    collectPickup(context, entity);
                    collected += 1;
                }
                continue;
            }

            if (distance >= collisions.contactRadius || isInGrace(now)) {
                continue;
            }

            if (registry.isActive('shield', now)) {
                registry.deactivate('shield');
                const until = startGrace(now);
                const entityId = entity.id;
                pool.recycle(entity);
                absorbed += 1;
                context.events.push({
                    type: 'ShieldAbsorbed',
                    timestamp: now,
                    payload: { entityId, graceUntil: until },
                });
                continue;
            }

            if (entity.flags.neutralizedUntil > now) {
                continue;
            }

            return { lethal: entity, absorbed, collected };
        }

        return { lethal: null, absorbed, collected };
    };

    const applyMagnet: CollisionResolver['applyMagnet'] = (context) => {
        const { now, dt, player, registry } = context;
        if (!registry.isActive('magnet', now)) {
            return 0;
        }
        const entry = registry.current('magnet');
        const strength = entry && entry.effect.type === 'magnet' ? entry.effect.strength : powerUps.magnetStrength;
        const normalized = registry.normalizedStrength('magnet', now);

        let moved = 0;
        for (const entity of context.pool.active()) {
            if (entity.kind !== 'hazard') {
                continue;
            }
            const distance = distanceBetween(context.positionOf(entity), player.position);
            if (distance > powerUps.magnetSafeZoneRadius) {
                continue;
            }
            const away = shortestAngleDelta(player.angle, entity.angle) >= 0 ? 1 : -1;
            const push = (strength * normalized) / Math.max(distance, 1) * dt;
            entity.angle = normalizeAngle(entity.angle + away * push);
            entity.flags.neutralizedUntil = now + powerUps.magnetCooldown;
            moved += 1;
        }
        return moved;
    };

    return {
        resolve,
        applyMagnet,
        isInGrace,
        startGrace,
        reset: () => {
            graceUntil = Number.NEGATIVE_INFINITY;
        },
    };
};
