export interface RingConfig {
    readonly radii: readonly number[];
    /** Spin direction of each ring's frame (+1 / -1) */
    readonly directions: readonly number[];
    readonly maxActive: number;
    /** Each level a run must pass to open one more ring; 0 opens it from the start */
    readonly unlockLevels: readonly number[];
}

export interface MotionConfig {
    /** Linear speed of the player token at level 1 (units per second) */
    readonly playerBaseSpeed: number;
    /** Per-level compound growth of the player speed */
    readonly playerSpeedGrowth: number;
    /** Hazard drift against its ring's spin at level 1 (radians per second) */
    readonly hazardBaseAngularVelocity: number;
    /** Linear per-level growth of hazard angular velocity */
    readonly hazardVelocityGrowth: number;
    readonly hazardLifetime: number;
    readonly pickupLifetime: number;
}

export interface SpawnConfig {
    readonly baseInterval: number;
    readonly minimumInterval: number;
    readonly intervalReductionPerLevel: number;
    readonly slowMoIntervalScale: number;
    readonly pickupChance: number;
    readonly pickupAngleOffset: number;
}

export interface ScoringConfig {
    readonly basePoints: number;
    readonly nearMissMultiplierGain: number;
    readonly multiplierDecayFactor: number;
    readonly actionsPerLevel: number;
    readonly milestones: readonly number[];
    readonly milestoneStep: number;
    readonly threatArc: number;
    readonly threatDistance: number;
    readonly nearMissArc: number;
    readonly nearMissDistance: number;
    readonly releaseArc: number;
}

export interface PowerUpConfig {
    readonly shieldDuration: number;
    readonly slowMoDuration: number;
    readonly slowMoFactor: number;
    readonly magnetDuration: number;
    readonly magnetStrength: number;
    readonly magnetSafeZoneRadius: number;
    readonly magnetCooldown: number;
}

export interface CollisionConfig {
    readonly contactRadius: number;
    readonly collisionPadding: number;
    readonly pickupRadius: number;
    readonly graceWindow: number;
}

export interface SpecialEventConfig {
    readonly colorInversion: { readonly threshold: number; readonly duration: number };
    readonly meteorShower: {
        readonly threshold: number;
        readonly duration: number;
        readonly burst: number;
        readonly intervalScale: number;
        readonly minimumInterval: number;
    };
    readonly gravityReversal: { readonly threshold: number; readonly duration: number };
}

export interface ReplayTierConfig {
    readonly capacity: number;
    readonly maxDimension: number;
}

export interface ReplayConfig {
    readonly captureInterval: number;
    readonly trailingWindow: number;
    readonly standard: ReplayTierConfig;
    readonly reduced: ReplayTierConfig;
    /** Devices at or below this much memory (GB) capture at the reduced tier */
    readonly reducedMemoryThresholdGb: number;
    /** Devices at or below this much memory (GB) do not capture at all */
    readonly disabledMemoryThresholdGb: number;
}

export interface EconomyConfig {
    readonly reviveGemCost: number;
    readonly shieldGemCost: number;
}

export interface InputConfig {
    readonly flipCooldown: number;
}

export interface PoolConfig {
    readonly capacity: number;
}

export interface GameConfig {
    readonly rings: RingConfig;
    readonly motion: MotionConfig;
    readonly spawn: SpawnConfig;
    readonly scoring: ScoringConfig;
    readonly powerUps: PowerUpConfig;
    readonly collisions: CollisionConfig;
    readonly specialEvents: SpecialEventConfig;
    readonly replay: ReplayConfig;
    readonly economy: EconomyConfig;
    readonly input: InputConfig;
    readonly pool: PoolConfig;
}

export const gameConfig = {
    rings: {
        radii: [90, 140, 190],
        directions: [1, -1, 1],
        maxActive: 3,
        unlockLevels: [0, 3],
    },
    motion: {
        playerBaseSpeed: 100,
        playerSpeedGrowth: 1.02,
        hazardBaseAngularVelocity: 0.9,
        hazardVelocityGrowth: 0.05,
        hazardLifetime: 6,
        pickupLifetime: 5,
    },
    spawn: {
        baseInterval: 1.5,
        minimumInterval: 0.6,
        intervalReductionPerLevel: 0.05,
        slowMoIntervalScale: 1.5,
        pickupChance: 0.08,
        pickupAngleOffset: Math.PI / 4,
    },
    scoring: {
        basePoints: 10,
        nearMissMultiplierGain: 0.2,
        multiplierDecayFactor: 0.5,
        actionsPerLevel: 20,
        milestones: [10, 25, 50, 100],
        milestoneStep: 100,
        threatArc: 0.6,
        threatDistance: 80,
        nearMissArc: 0.35,
        nearMissDistance: 40,
        releaseArc: 0.9,
    },
    powerUps: {
        shieldDuration: 3,
        slowMoDuration: 3,
        slowMoFactor: 0.5,
        magnetDuration: 3,
        magnetStrength: 50,
        magnetSafeZoneRadius: 60,
        magnetCooldown: 0.5,
    },
    collisions: {
        contactRadius: 16,
        collisionPadding: 2,
        pickupRadius: 36,
        graceWindow: 0.75,
    },
    specialEvents: {
        colorInversion: { threshold: 69, duration: 5 },
        meteorShower: { threshold: 420, duration: 6, burst: 10, intervalScale: 0.6, minimumInterval: 0.2 },
        gravityReversal: { threshold: 999, duration: 8 },
    },
    replay: {
        captureInterval: 0.1,
        trailingWindow: 3,
        standard: { capacity: 30, maxDimension: 160 },
        reduced: { capacity: 15, maxDimension: 96 },
        reducedMemoryThresholdGb: 3,
        disabledMemoryThresholdGb: 1,
    },
    economy: {
        reviveGemCost: 150,
        shieldGemCost: 120,
    },
    input: {
        flipCooldown: 0.15,
    },
    pool: {
        capacity: 48,
    },
} as const satisfies GameConfig;

export type DeepPartial<T> = {
    [Key in keyof T]?: T[Key] extends readonly unknown[]
        ? T[Key]
        : T[Key] extends object
            ? DeepPartial<T[Key]>
            : T[Key];
};

/**
 * Build a config from the defaults with partial overrides applied.
 * Arrays are replaced wholesale rather than merged index by index.
 */
export const createGameConfig = (overrides: DeepPartial<GameConfig> = {}): GameConfig => {
    const base: GameConfig = gameConfig;
    return {
        rings: { ...base.rings, ...overrides.rings },
        motion: { ...base.motion, ...overrides.motion },
        spawn: { ...base.spawn, ...overrides.spawn },
        scoring: { ...base.scoring, ...overrides.scoring },
        powerUps: { ...base.powerUps, ...overrides.powerUps },
        collisions: { ...base.collisions, ...overrides.collisions },
        specialEvents: {
            colorInversion: { ...base.specialEvents.colorInversion, ...overrides.specialEvents?.colorInversion },
            meteorShower: { ...base.specialEvents.meteorShower, ...overrides.specialEvents?.meteorShower },
            gravityReversal: { ...base.specialEvents.gravityReversal, ...overrides.specialEvents?.gravityReversal },
        },
        replay: {
            ...base.replay,
            ...overrides.replay,
            standard: { ...base.replay.standard, ...overrides.replay?.standard },
            reduced: { ...base.replay.reduced, ...overrides.replay?.reduced },
        },
        economy: { ...base.economy, ...overrides.economy },
        input: { ...base.input, ...overrides.input },
        pool: { ...base.pool, ...overrides.pool },
    };
};
