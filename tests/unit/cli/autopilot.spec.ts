import { describe, expect, it } from 'vitest';
import type { EntityView, SceneView } from 'app/contracts';
import { chooseFlip } from 'cli/autopilot';

const hazard = (id: number, ring: number, angle: number): EntityView => ({
    id,
    kind: 'hazard',
    ring,
    angle,
    position: { x: 0, y: 0 },
});

const createView = (activeRings: number, entities: EntityView[], playerRing = 0): SceneView => ({
    rings: [90, 140, 190].map((radius, index) => ({ index, radius, active: index < activeRings })),
    player: { ring: playerRing, angle: 0, position: { x: 0, y: 0 } },
    entities,
    inverted: false,
});

describe('chooseFlip', () => {
    it('holds position while the ring is clear', () => {
        expect(chooseFlip(createView(2, [hazard(0, 0, 1.2), hazard(1, 1, 0.1)]))).toBeNull();
    });

    it('flips away from a hazard closing in on the player ring', () => {
        expect(chooseFlip(createView(2, [hazard(0, 0, 0.3)]))).toBe(1);
    });

    it('prefers the ring with the most room', () => {
        const view = createView(3, [hazard(0, 0, 0.2), hazard(1, 1, 0.1)]);

        expect(chooseFlip(view)).toBe(2);
    });

    it('ignores pickups', () => {
        const pickup: EntityView = { ...hazard(0, 0, 0.1), kind: 'shield' };

        expect(chooseFlip(createView(2, [pickup]))).toBeNull();
    });

    it('cannot flip with a single ring open', () => {
        expect(chooseFlip(createView(1, [hazard(0, 0, 0.1)]))).toBeNull();
    });

    it('honours a custom danger arc', () => {
        const view = createView(2, [hazard(0, 0, 0.4)]);

        expect(chooseFlip(view, { dangerArc: 0.3 })).toBeNull();
        expect(chooseFlip(view, { dangerArc: 0.45 })).toBe(1);
    });
});
