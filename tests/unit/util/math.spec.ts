import { describe, expect, it } from 'vitest';
import {
    angularDistance,
    clamp,
    clampUnit,
    distanceBetween,
    normalizeAngle,
    polarToCartesian,
    shortestAngleDelta,
    TAU,
} from 'util/math';

describe('math helpers', () => {
    it('clamps values and tolerates swapped bounds', () => {
        expect(clamp(5, 0, 3)).toBe(3);
        expect(clamp(-1, 0, 3)).toBe(0);
        expect(clamp(2, 3, 0)).toBe(2);
        expect(clamp(Number.NaN, 1, 4)).toBe(1);
        expect(clampUnit(1.5)).toBe(1);
    });

    it('wraps angles into [0, 2π)', () => {
        expect(normalizeAngle(0)).toBe(0);
        expect(normalizeAngle(TAU)).toBe(0);
        expect(normalizeAngle(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2, 12);
        expect(normalizeAngle(5 * Math.PI)).toBeCloseTo(Math.PI, 12);
        expect(normalizeAngle(Number.POSITIVE_INFINITY)).toBe(0);
    });

    it('never returns 2π for tiny negative angles', () => {
        const wrapped = normalizeAngle(-1e-17);
        expect(wrapped).toBeLessThan(TAU);
        expect(wrapped).toBeGreaterThanOrEqual(0);
    });

    it('measures the signed shortest rotation across the seam', () => {
        expect(shortestAngleDelta(0.1, TAU - 0.1)).toBeCloseTo(-0.2, 12);
        expect(shortestAngleDelta(TAU - 0.1, 0.1)).toBeCloseTo(0.2, 12);
        expect(shortestAngleDelta(0, Math.PI)).toBeCloseTo(Math.PI, 12);
        expect(angularDistance(0.1, TAU - 0.1)).toBeCloseTo(0.2, 12);
    });

    it('converts polar ring positions to cartesian points', () => {
        expect(polarToCartesian(10, 0)).toEqual({ x: 10, y: 0 });
        const quarter = polarToCartesian(10, Math.PI / 2);
        expect(quarter.x).toBeCloseTo(0, 12);
        expect(quarter.y).toBeCloseTo(10, 12);
        const offset = polarToCartesian(10, 0, Math.PI);
        expect(offset.x).toBeCloseTo(-10, 12);
    });

    it('computes euclidean distance', () => {
        expect(distanceBetween({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });
});
