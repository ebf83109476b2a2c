export const TAU = Math.PI * 2;

export interface Point {
    readonly x: number;
    readonly y: number;
}

export const clamp = (value: number, min: number, max: number): number => {
    if (Number.isNaN(value)) {
        return min;
    }
    if (min > max) {
        return clamp(value, max, min);
    }
    if (value < min) {
        return min;
    }
    if (value > max) {
        return max;
    }
    return value;
};

export const clampUnit = (value: number): number => clamp(value, 0, 1);

/** Wrap any finite angle into [0, 2π). Non-finite input collapses to 0. */
export const normalizeAngle = (angle: number): number => {
    if (!Number.isFinite(angle)) {
        return 0;
    }
    const wrapped = angle % TAU;
    const positive = wrapped < 0 ? wrapped + TAU : wrapped;
    // -1e-17 % TAU + TAU rounds to exactly TAU in floating point
    return positive >= TAU ? 0 : positive;
};

/** Signed shortest rotation taking `from` onto `to`, in (-π, π]. */
export const shortestAngleDelta = (from: number, to: number): number => {
    let difference = normalizeAngle(to) - normalizeAngle(from);
    if (difference > Math.PI) {
        difference -= TAU;
    } else if (difference <= -Math.PI) {
        difference += TAU;
    }
    return difference;
};

export const angularDistance = (a: number, b: number): number => Math.abs(shortestAngleDelta(a, b));

/**
 * Position on a ring of the given radius, in playfield coordinates centred on
 * the orbit origin. `rotationOffset` is a global rotation applied to every ring.
 */
export const polarToCartesian = (radius: number, angle: number, rotationOffset = 0): Point => {
    const theta = angle + rotationOffset;
    return {
        x: Math.cos(theta) * radius,
        y: Math.sin(theta) * radius,
    };
};

export const distanceBetween = (a: Point, b: Point): number => Math.hypot(a.x - b.x, a.y - b.y);
