export type RandomSource = () => number;

const UINT32_MAX = 0xffffffff;
const DEFAULT_SEED = 1;

export const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = seed >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

/** Fresh non-zero 32-bit seed for runs that were not given one. */
export const generateSeed = (): number => {
    if (typeof crypto !== 'undefined' && typeof crypto.getRandomValues === 'function') {
        const buffer = new Uint32Array(1);
        crypto.getRandomValues(buffer);
        return buffer[0] === 0 ? DEFAULT_SEED : buffer[0];
    }

    const random = Math.floor(Math.random() * UINT32_MAX);
    return random === 0 ? DEFAULT_SEED : random;
};

export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface RandomManager {
    readonly seed: () => number;
    readonly reset: () => void;
    readonly next: RandomSource;
    readonly nextInt: (maxExclusive: number) => number;
    readonly range: (min: number, max: number) => number;
    readonly chance: (probability: number) => boolean;
}

/**
 * Seeded random stream driving entity spawns. A run started with the same seed
 * replays the exact same ring/angle/velocity sequence.
 */
export const createRandomManager = (seed?: number | null): RandomManager => {
    const currentSeed = seed === null || seed === undefined ? generateSeed() : normalizeSeed(seed);
    let generator = mulberry32(currentSeed);

    const next: RandomSource = () => generator();

    const nextInt = (maxExclusive: number): number => {
        if (!Number.isFinite(maxExclusive) || maxExclusive < 1) {
            throw new RangeError('maxExclusive must be a positive finite number');
        }
        return Math.min(maxExclusive - 1, Math.floor(next() * maxExclusive));
    };

    const range = (min: number, max: number): number => min + (max - min) * next();

    const chance = (probability: number): boolean => {
        const clamped = Math.max(0, Math.min(1, probability));
        return next() < clamped;
    };

    return {
        seed: () => currentSeed,
        reset: () => {
            generator = mulberry32(currentSeed);
        },
        next,
        nextInt,
        range,
        chance,
    };
};
