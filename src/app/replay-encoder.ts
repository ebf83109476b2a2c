import omggif from 'omggif';
import type { RgbaImage } from './contracts';

const PALETTE_SIZE = 256;
const GIF_HEADER_BYTES = 1024;
const FRAME_OVERHEAD_BYTES = 1024;
/** Worst-case LZW output stays under two bytes per pixel */
const BYTES_PER_PIXEL_BOUND = 2;

export interface EncodableFrame {
    readonly image: RgbaImage;
}

/** Fixed 3-3-2 palette: 8 red levels, 8 green levels, 4 blue levels. */
export const createUniformPalette = (): number[] => {
    const palette: number[] = [];
    for (let index = 0; index < PALETTE_SIZE; index += 1) {
        const red = Math.round((((index >> 5) & 0x07) * 255) / 7);
        const green = Math.round((((index >> 2) & 0x07) * 255) / 7);
        const blue = Math.round(((index & 0x03) * 255) / 3);
        palette.push((red << 16) | (green << 8) | blue);
    }
    return palette;
};

export const quantizePixel = (red: number, green: number, blue: number): number =>
    ((red >> 5) << 5) | ((green >> 5) << 2) | (blue >> 6);

export const quantizeImage = (image: RgbaImage): Uint8Array => {
    const pixelCount = image.width * image.height;
    const indexed = new Uint8Array(pixelCount);
    for (let pixel = 0; pixel < pixelCount; pixel += 1) {
        const offset = pixel * 4;
        indexed[pixel] = quantizePixel(image.data[offset] ?? 0, image.data[offset + 1] ?? 0, image.data[offset + 2] ?? 0);
    }
    return indexed;
};

/**
 * Encode frames as a looping GIF with a uniform frame delay. All frames must
 * share the first frame's dimensions.
 *
 * @throws Error when there are no frames or a frame does not match
 */
export const encodeLoopingGif = (frames: readonly EncodableFrame[], frameDelaySeconds: number): Uint8Array => {
    const first = frames[0];
    if (!first) {
        throw new Error('cannot encode an empty replay');
    }
    const { width, height } = first.image;
    if (width <= 0 || height <= 0) {
        throw new Error(`invalid replay frame size ${width}x${height}`);
    }

    const capacity =
        GIF_HEADER_BYTES + PALETTE_SIZE * 3 + frames.length * (width * height * BYTES_PER_PIXEL_BOUND + FRAME_OVERHEAD_BYTES);
    const buffer = new Uint8Array(capacity);
    const writer = new omggif.GifWriter(buffer, width, height, { loop: 0, palette: createUniformPalette() });
    // GIF delays are in hundredths of a second
    const delay = Math.max(1, Math.round(frameDelaySeconds * 100));

    frames.forEach((frame, index) => {
        if (frame.image.width !== width || frame.image.height !== height) {
            throw new Error(
                `replay frame ${index} is ${frame.image.width}x${frame.image.height}, expected ${width}x${height}`,
            );
        }
        writer.addFrame(0, 0, width, height, Array.from(quantizeImage(frame.image)), { delay });
    });

    const length = writer.end();
    return buffer.slice(0, length);
};
