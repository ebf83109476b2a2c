import { describe, expect, it } from 'vitest';
import type { RgbaImage } from 'app/contracts';
import { createUniformPalette, encodeLoopingGif, quantizeImage, quantizePixel } from 'app/replay-encoder';

const solidImage = (width: number, height: number, rgb: readonly [number, number, number]): RgbaImage => {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let pixel = 0; pixel < width * height; pixel += 1) {
        data.set([rgb[0], rgb[1], rgb[2], 255], pixel * 4);
    }
    return { width, height, data };
};

describe('uniform palette', () => {
    it('covers black to white in 256 entries', () => {
        const palette = createUniformPalette();

        expect(palette).toHaveLength(256);
        expect(palette[0]).toBe(0x000000);
        expect(palette[255]).toBe(0xffffff);
        expect(palette[224]).toBe(0xff0000);
        expect(palette[3]).toBe(0x0000ff);
    });

    it('quantizes pixels onto the 3-3-2 palette', () => {
        expect(quantizePixel(255, 255, 255)).toBe(255);
        expect(quantizePixel(255, 0, 0)).toBe(224);
        expect(quantizePixel(0, 255, 0)).toBe(28);
        expect(quantizePixel(0, 0, 255)).toBe(3);
        expect(quantizePixel(31, 31, 63)).toBe(0);
    });

    it('quantizes whole images pixel by pixel', () => {
        const image: RgbaImage = {
            width: 2,
            height: 1,
            data: new Uint8ClampedArray([255, 0, 0, 255, 0, 0, 255, 255]),
        };

        expect(Array.from(quantizeImage(image))).toEqual([224, 3]);
    });
});

describe('encodeLoopingGif', () => {
    it('writes a GIF89a stream with a trailer', () => {
        const frames = [{ image: solidImage(4, 4, [255, 0, 0]) }, { image: solidImage(4, 4, [0, 0, 255]) }];

        const bytes = encodeLoopingGif(frames, 0.1);

        expect(Array.from(bytes.slice(0, 6))).toEqual([71, 73, 70, 56, 57, 97]);
        expect(Array.from(bytes.slice(6, 10))).toEqual([4, 0, 4, 0]);
        expect(bytes[bytes.length - 1]).toBe(0x3b);
    });

    it('rejects an empty replay', () => {
        expect(() => encodeLoopingGif([], 0.1)).toThrow('cannot encode an empty replay');
    });

    it('rejects frames whose size differs from the first', () => {
        const frames = [{ image: solidImage(4, 4, [0, 0, 0]) }, { image: solidImage(2, 2, [0, 0, 0]) }];

        expect(() => encodeLoopingGif(frames, 0.1)).toThrow('replay frame 1 is 2x2, expected 4x4');
    });
});
