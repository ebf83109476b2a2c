import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRandomManager, mulberry32, normalizeSeed } from 'util/random';

const sample = (source: () => number, count: number): number[] => {
    return Array.from({ length: count }, () => source());
};

afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
});

describe('mulberry32', () => {
    it('produces deterministic sequences for the same seed', () => {
        expect(sample(mulberry32(1234), 5)).toEqual(sample(mulberry32(1234), 5));
    });

    it('produces distinct sequences for different seeds', () => {
        expect(sample(mulberry32(1), 3)).not.toEqual(sample(mulberry32(2), 3));
    });

    it('stays inside the unit interval', () => {
        for (const value of sample(mulberry32(99), 200)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('normalizeSeed', () => {
    it('maps zero and non-finite seeds to the default seed', () => {
        expect(normalizeSeed(0)).toBe(1);
        expect(normalizeSeed(Number.NaN)).toBe(1);
        expect(normalizeSeed(Number.POSITIVE_INFINITY)).toBe(1);
    });

    it('wraps into unsigned 32 bits', () => {
        expect(normalizeSeed(-1)).toBe(0xffffffff);
        expect(normalizeSeed(0x1_0000_0005)).toBe(5);
        expect(normalizeSeed(42.9)).toBe(42);
    });
});

describe('createRandomManager', () => {
    it('resets to the same sequence when requested', () => {
        const manager = createRandomManager(42);
        const firstRun = [manager.next(), manager.next(), manager.next()];
        manager.reset();
        expect([manager.next(), manager.next(), manager.next()]).toEqual(firstRun);
    });

    it('follows the mulberry32 stream of its seed', () => {
        const manager = createRandomManager(42);
        expect(sample(manager.next, 4)).toEqual(sample(mulberry32(42), 4));
        expect(manager.seed()).toBe(42);
    });

    it('generates bounded integers within range', () => {
        const manager = createRandomManager(123);
        for (let i = 0; i < 50; i += 1) {
            const value = manager.nextInt(3);
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(3);
        }
    });

    it('throws for invalid nextInt bounds', () => {
        const manager = createRandomManager(11);
        expect(() => manager.nextInt(0)).toThrow(RangeError);
        expect(() => manager.nextInt(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });

    it('clamps chance probabilities outside the unit interval', () => {
        const manager = createRandomManager(77);
        expect(manager.chance(2)).toBe(true);
        expect(manager.chance(-5)).toBe(false);
    });

    it('keeps range results between the bounds', () => {
        const manager = createRandomManager(5);
        const value = manager.range(10, 20);
        expect(value).toBeGreaterThanOrEqual(10);
        expect(value).toBeLessThan(20);
    });

    it('falls back to the default seed when crypto returns zero', () => {
        vi.stubGlobal('crypto', {
            getRandomValues: (array: Uint32Array) => {
                array.fill(0);
                return array;
            },
        });

        expect(createRandomManager(undefined).seed()).toBe(1);
    });

    it('uses Math.random when crypto is unavailable', () => {
        vi.stubGlobal('crypto', undefined);
        vi.spyOn(Math, 'random').mockReturnValue(0.5);

        expect(createRandomManager(null).seed()).toBe(Math.floor(0.5 * 0xffffffff));
    });
});
