import { gameConfig, type ReplayConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import type { RgbaImage } from './contracts';
import { replayTierSettings, type ReplayTier } from './device-profile';
import { encodeLoopingGif, type EncodableFrame } from './replay-encoder';

export interface ReplayFrame {
    readonly image: RgbaImage;
    readonly timestamp: number;
}

export type ReplayEncoder = (frames: readonly EncodableFrame[], frameDelaySeconds: number) => Uint8Array;

export interface ReplayFrameBuffer {
    readonly capacity: number;
    readonly tier: ReplayTier;
    isDue(now: number): boolean;
    /** Store a downsampled copy of the image; returns false when capture is off. */
    capture(image: RgbaImage, now: number): boolean;
    /** Drop frames older than the trailing window behind the newest frame. */
    purge(): number;
    frames(): ReplayFrame[];
    /** Encoded looping GIF of the surviving frames, or null when there is nothing to encode. */
    finalize(): Uint8Array | null;
    clear(): void;
}

export interface ReplayFrameBufferOptions {
    readonly tier?: ReplayTier;
    readonly config?: ReplayConfig;
    readonly encoder?: ReplayEncoder;
    readonly logger?: Logger;
}

const DUE_EPSILON = 1e-9;

/**
 * Nearest-neighbour downsample so the longer side is at most `maxDimension`.
 * Images already within bounds are copied unchanged.
 */
export const downsample = (image: RgbaImage, maxDimension: number): RgbaImage => {
    const longest = Math.max(image.width, image.height);
    const scale = longest > maxDimension && maxDimension > 0 ? maxDimension / longest : 1;
    const width = Math.max(1, Math.round(image.width * scale));
    const height = Math.max(1, Math.round(image.height * scale));
    const data = new Uint8ClampedArray(width * height * 4);

    for (let y = 0; y < height; y += 1) {
        const sourceY = Math.min(image.height - 1, Math.floor(y / scale));
        for (let x = 0; x < width; x += 1) {
            const sourceX = Math.min(image.width - 1, Math.floor(x / scale));
            const from = (sourceY * image.width + sourceX) * 4;
            const to = (y * width + x) * 4;
            data[to] = image.data[from] ?? 0;
            data[to + 1] = image.data[from + 1] ?? 0;
            data[to + 2] = image.data[from + 2] ?? 0;
            data[to + 3] = image.data[from + 3] ?? 0;
        }
    }

    return { width, height, data };
};

export const createReplayFrameBuffer = (options: ReplayFrameBufferOptions = {}): ReplayFrameBuffer => {
    const config = options.config ?? gameConfig.replay;
    const tier = options.tier ?? 'standard';
    const settings = replayTierSettings(tier, config);
    const capacity = Math.max(0, Math.floor(settings.capacity));
    const encoder = options.encoder ?? encodeLoopingGif;
    const logger = options.logger ?? rootLogger.child('replay');

    const slots: (ReplayFrame | null)[] = new Array<ReplayFrame | null>(capacity).fill(null);
    let head = 0;
    let count = 0;
    let lastWrite = Number.NEGATIVE_INFINITY;

    const oldest = (): ReplayFrame | null => (count === 0 ? null : slots[head] ?? null);

    const newest = (): ReplayFrame | null => {
        if (count === 0) {
            return null;
        }
        return slots[(head + count - 1) % capacity] ?? null;
    };

    const dropOldest = () => {
        slots[head] = null;
        head = (head + 1) % capacity;
        count -= 1;
    };

    const purge: ReplayFrameBuffer['purge'] = () => {
        const latest = newest();
        if (!latest) {
            return 0;
        }
        const cutoff = latest.timestamp - config.trailingWindow;
        let dropped = 0;
        let candidate = oldest();
        while (candidate && candidate.timestamp < cutoff) {
            dropOldest();
            dropped += 1;
            candidate = oldest();
        }
        return dropped;
    };

    const isDue: ReplayFrameBuffer['isDue'] = (now) =>
        capacity > 0 && now - lastWrite + DUE_EPSILON >= config.captureInterval;

    const capture: ReplayFrameBuffer['capture'] = (image, now) => {
        if (capacity === 0) {
            return false;
        }
        const frame: ReplayFrame = { image: downsample(image, settings.maxDimension), timestamp: now };
        if (count === capacity) {
            dropOldest();
        }
        slots[(head + count) % capacity] = frame;
        count += 1;
        lastWrite = now;
        purge();
        return true;
    };

    const frames: ReplayFrameBuffer['frames'] = () => {
        const ordered: ReplayFrame[] = [];
        for (let offset = 0; offset < count; offset += 1) {
            const frame = slots[(head + offset) % capacity];
            if (frame) {
                ordered.push(frame);
            }
        }
        return ordered.sort((a, b) => a.timestamp - b.timestamp);
    };

    const finalize: ReplayFrameBuffer['finalize'] = () => {
        const ordered = frames();
        if (ordered.length === 0) {
            return null;
        }
        try {
            return encoder(ordered, config.captureInterval);
        } catch (error) {
            logger.warn('Replay encoding failed', {
                frames: ordered.length,
                error: error instanceof Error ? error.message : String(error),
            });
            return null;
        }
    };

    const clear: ReplayFrameBuffer['clear'] = () => {
        slots.fill(null);
        head = 0;
        count = 0;
        lastWrite = Number.NEGATIVE_INFINITY;
    };

    return {
        capacity,
        tier,
        isDue,
        capture,
        purge,
        frames,
        finalize,
        clear,
    };
};
