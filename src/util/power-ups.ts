import type { PowerUpConfig } from 'config/game';
import { gameConfig } from 'config/game';
import type { RandomSource } from './random';
import { clampUnit } from './math';

/**
 * Timed power-up effects
 *
 * Each effect type holds at most one active entry. Activating a type that is
 * already running replaces the entry outright: the new duration and magnitude
 * win, nothing is carried over from the old one.
 */

export type PowerUpType = 'shield' | 'slow-mo' | 'magnet';

export const POWER_UP_TYPES: readonly PowerUpType[] = ['shield', 'slow-mo', 'magnet'];

export interface ShieldEffect {
    readonly type: 'shield';
    readonly duration: number;
}

export interface SlowMoEffect {
    readonly type: 'slow-mo';
    /** Multiplier applied to motion and spawn timing (0-1 slows down) */
    readonly factor: number;
    readonly duration: number;
}

export interface MagnetEffect {
    readonly type: 'magnet';
    /** Deflection strength, decays with the remaining normalized time */
    readonly strength: number;
    readonly duration: number;
}

export type PowerUpEffect = ShieldEffect | SlowMoEffect | MagnetEffect;

export interface ActivePowerUp {
    readonly effect: PowerUpEffect;
    readonly startedAt: number;
    readonly expiresAt: number;
}

const DEFAULTS: PowerUpConfig = gameConfig.powerUps;

/**
 * Build the effect a pickup or purchase of the given type grants.
 */
export function createPowerUpEffect(type: PowerUpType, config: PowerUpConfig = DEFAULTS): PowerUpEffect {
    switch (type) {
        case 'shield':
            return { type, duration: config.shieldDuration };
        case 'slow-mo':
            return { type, factor: config.slowMoFactor, duration: config.slowMoDuration };
        case 'magnet':
            return { type, strength: config.magnetStrength, duration: config.magnetDuration };
    }
}

export function selectRandomPowerUpType(rng: RandomSource): PowerUpType {
    const index = Math.min(POWER_UP_TYPES.length - 1, Math.floor(rng() * POWER_UP_TYPES.length));
    return POWER_UP_TYPES[index];
}

/**
 * Registry of running timed effects, queried with the simulation timestamp.
 * Expiry is lazy: every query first drops entries whose `expiresAt` has passed.
 */
export class PowerupTimerRegistry {
    private readonly entries = new Map<PowerUpType, ActivePowerUp>();

    activate(effect: PowerUpEffect, now: number): ActivePowerUp {
        const duration = Number.isFinite(effect.duration) ? Math.max(0, effect.duration) : 0;
        const entry: ActivePowerUp = {
            effect,
            startedAt: now,
            expiresAt: now + duration,
        };
        this.entries.delete(effect.type);
        this.entries.set(effect.type, entry);
        return entry;
    }

    isActive(type: PowerUpType, now: number): boolean {
        this.update(now);
        return this.entries.has(type);
    }

    /**
     * Remaining fraction of the effect's duration in [0, 1]; 0 when not running.
     */
    normalizedStrength(type: PowerUpType, now: number): number {
        this.update(now);
        const entry = this.entries.get(type);
        if (!entry) {
            return 0;
        }
        const total = entry.expiresAt - entry.startedAt;
        if (total <= 0) {
            return 0;
        }
        return clampUnit((entry.expiresAt - now) / total);
    }

    timeRemaining(type: PowerUpType, now: number): number | null {
        this.update(now);
        const entry = this.entries.get(type);
        return entry ? Math.max(0, entry.expiresAt - now) : null;
    }

    /** Entry of the given type without expiring anything. */
    current(type: PowerUpType): ActivePowerUp | null {
        return this.entries.get(type) ?? null;
    }

    /**
     * Drop expired entries and report which types expired.
     */
    update(now: number): PowerUpType[] {
        const expired: PowerUpType[] = [];
        for (const [type, entry] of this.entries) {
            if (now >= entry.expiresAt) {
                this.entries.delete(type);
                expired.push(type);
            }
        }
        return expired;
    }

    deactivate(type: PowerUpType): boolean {
        return this.entries.delete(type);
    }

    reset(): void {
        this.entries.clear();
    }

    activeTypes(): PowerUpType[] {
        return Array.from(this.entries.keys());
    }
}
