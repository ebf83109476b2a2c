import type { EntityKind, FrameSource, RgbaImage, SceneView } from 'app/contracts';
import { TAU, type Point } from 'util/math';

export type Rgb = readonly [number, number, number];

export interface RasterPalette {
    readonly background: Rgb;
    readonly ring: Rgb;
    readonly inactiveRing: Rgb;
    readonly player: Rgb;
    readonly entities: Readonly<Record<EntityKind, Rgb>>;
}

export interface FrameRasterizerOptions {
    /** Output is square, this many pixels a side */
    readonly size?: number;
    /** Playfield units visible from the centre to the edge */
    readonly extent?: number;
    readonly palette?: RasterPalette;
    readonly playerRadius?: number;
    readonly entityRadius?: number;
}

export const defaultRasterPalette: RasterPalette = {
    background: [8, 10, 28],
    ring: [90, 110, 200],
    inactiveRing: [30, 34, 60],
    player: [255, 255, 255],
    entities: {
        hazard: [255, 70, 90],
        shield: [80, 200, 255],
        'slow-mo': [180, 120, 255],
        magnet: [255, 210, 70],
    },
};

const invert = (color: Rgb): Rgb => [255 - color[0], 255 - color[1], 255 - color[2]];

/**
 * Software renderer for replay frames: rings as outlines, bodies as filled
 * discs. Used where no GPU canvas is available to read back from.
 */
export const createFrameRasterizer = (options: FrameRasterizerOptions = {}): FrameSource => {
    const size = Math.max(1, Math.floor(options.size ?? 200));
    const extent = options.extent ?? 210;
    const palette = options.palette ?? defaultRasterPalette;
    const scale = size / 2 / extent;
    const playerRadius = (options.playerRadius ?? 12) * scale;
    const entityRadius = (options.entityRadius ?? 10) * scale;

    const capture = (view: SceneView): RgbaImage => {
        const data = new Uint8ClampedArray(size * size * 4);
        const paint = (color: Rgb): Rgb => (view.inverted ? invert(color) : color);

        const plot = (x: number, y: number, color: Rgb) => {
            const px = Math.round(x);
            const py = Math.round(y);
            if (px < 0 || py < 0 || px >= size || py >= size) {
                return;
            }
            const offset = (py * size + px) * 4;
            data[offset] = color[0];
            data[offset + 1] = color[1];
            data[offset + 2] = color[2];
            data[offset + 3] = 255;
        };

        const toPixel = (point: Point): Point => ({ x: size / 2 + point.x * scale, y: size / 2 + point.y * scale });

        const disc = (center: Point, radius: number, color: Rgb) => {
            const { x: cx, y: cy } = toPixel(center);
            const reach = Math.ceil(radius);
            for (let dy = -reach; dy <= reach; dy += 1) {
                for (let dx = -reach; dx <= reach; dx += 1) {
                    if (dx * dx + dy * dy <= radius * radius) {
                        plot(cx + dx, cy + dy, color);
                    }
                }
            }
        };

        const background = paint(palette.background);
        for (let pixel = 0; pixel < size * size; pixel += 1) {
            const offset = pixel * 4;
            data[offset] = background[0];
            data[offset + 1] = background[1];
            data[offset + 2] = background[2];
            data[offset + 3] = 255;
        }

        for (const ring of view.rings) {
            const color = paint(ring.active ? palette.ring : palette.inactiveRing);
            const radius = ring.radius * scale;
            const steps = Math.max(16, Math.ceil(TAU * radius));
            for (let step = 0; step < steps; step += 1) {
                const theta = (step / steps) * TAU;
                plot(size / 2 + Math.cos(theta) * radius, size / 2 + Math.sin(theta) * radius, color);
            }
        }

        for (const entity of view.entities) {
            disc(entity.position, entityRadius, paint(palette.entities[entity.kind]));
        }
        disc(view.player.position, playerRadius, paint(palette.player));

        return { width: size, height: size, data };
    };

    return { capture };
};
