import { Graphics, type Container } from 'pixi.js';
import type { VisualHandle, VisualKind, VisualProvider } from 'app/contracts';
import { gameConfig } from 'config/game';
import type { Point } from 'util/math';

export interface PixiVisualPalette {
    readonly ring: number;
    readonly player: number;
    readonly hazard: number;
    readonly shield: number;
    readonly slowMo: number;
    readonly magnet: number;
}

export interface PixiVisualProviderOptions {
    /** Centre of the orbit in layer coordinates */
    readonly origin?: Point;
    /** Radii handed to ring visuals in acquisition order, innermost first */
    readonly ringRadii?: readonly number[];
    readonly palette?: PixiVisualPalette;
}

export interface PixiVisualProvider extends VisualProvider {
    readonly layer: Container;
    /** Graphics held for reuse, per kind */
    readonly idleCount: (kind: VisualKind) => number;
    readonly destroy: () => void;
}

const PLAYER_RADIUS = 12;
const ENTITY_RADIUS = 10;
const RING_STROKE = 2;

export const defaultPixiPalette: PixiVisualPalette = {
    ring: 0x5a6ec8,
    player: 0xffffff,
    hazard: 0xff465a,
    shield: 0x50c8ff,
    slowMo: 0xb478ff,
    magnet: 0xffd246,
};

const fillFor = (kind: Exclude<VisualKind, 'ring'>, palette: PixiVisualPalette): number => {
    switch (kind) {
        case 'player':
            return palette.player;
        case 'hazard':
            return palette.hazard;
        case 'shield':
            return palette.shield;
        case 'slow-mo':
            return palette.slowMo;
        case 'magnet':
            return palette.magnet;
    }
};

const drawVisual = (graphics: Graphics, kind: VisualKind, palette: PixiVisualPalette, ringRadius: number) => {
    graphics.clear();
    if (kind === 'ring') {
        graphics.circle(0, 0, ringRadius).stroke({ width: RING_STROKE, color: palette.ring, alpha: 0.8 });
        return;
    }
    const radius = kind === 'player' ? PLAYER_RADIUS : ENTITY_RADIUS;
    graphics.circle(0, 0, radius).fill({ color: fillFor(kind, palette), alpha: 1 });
    if (kind !== 'hazard' && kind !== 'player') {
        graphics.circle(0, 0, radius + 4).stroke({ width: 2, color: fillFor(kind, palette), alpha: 0.5 });
    }
};

/**
 * Visual provider on a pixi Container. Released graphics are hidden, detached
 * and kept per kind for the next acquire.
 */
export const createPixiVisualProvider = (
    layer: Container,
    options: PixiVisualProviderOptions = {},
): PixiVisualProvider => {
    const origin = options.origin ?? { x: 0, y: 0 };
    const ringRadii = options.ringRadii ?? gameConfig.rings.radii;
    const palette = options.palette ?? defaultPixiPalette;
    const idle = new Map<VisualKind, Graphics[]>();
    let ringsAcquired = 0;

    const take = (kind: VisualKind): Graphics => {
        const reused = idle.get(kind)?.pop();
        if (reused) {
            return reused;
        }
        const graphics = new Graphics();
        graphics.eventMode = 'none';
        if (kind !== 'ring') {
            drawVisual(graphics, kind, palette, 0);
        }
        return graphics;
    };

    const acquire = (kind: VisualKind): VisualHandle => {
        const graphics = take(kind);
        if (kind === 'ring') {
            const radius = ringRadii[ringsAcquired % Math.max(1, ringRadii.length)] ?? 0;
            ringsAcquired += 1;
            drawVisual(graphics, kind, palette, radius);
        }
        graphics.position.set(origin.x, origin.y);
        graphics.rotation = 0;
        graphics.visible = true;
        layer.addChild(graphics);

        let released = false;
        return {
            setPosition: (position) => {
                graphics.position.set(origin.x + position.x, origin.y + position.y);
            },
            setRotation: (radians) => {
                graphics.rotation = radians;
            },
            setVisible: (visible) => {
                graphics.visible = visible;
            },
            release: () => {
                if (released) {
                    return;
                }
                released = true;
                graphics.visible = false;
                layer.removeChild(graphics);
                const bucket = idle.get(kind) ?? [];
                bucket.push(graphics);
                idle.set(kind, bucket);
            },
        };
    };

    return {
        layer,
        acquire,
        idleCount: (kind) => idle.get(kind)?.length ?? 0,
        destroy: () => {
            for (const bucket of idle.values()) {
                bucket.forEach((graphics) => graphics.destroy());
            }
            idle.clear();
            layer.removeChildren().forEach((child) => child.destroy());
        },
    };
};
