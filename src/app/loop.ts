export const DEFAULT_FIXED_DELTA = 1 / 60;
const DEFAULT_MAX_STEPS_PER_FRAME = 5;
const DEFAULT_MAX_FRAME_DELTA_MS = 100;

type FrameCallback = (timestamp: number) => void;

export type StepCallback = (nowSeconds: number, deltaSeconds: number) => void;
export type RenderCallback = (alpha: number) => void;

export interface LoopOptions {
    readonly fixedDelta?: number;
    readonly maxStepsPerFrame?: number;
    readonly maxFrameDeltaMs?: number;
    /** Monotonic clock in milliseconds */
    readonly now?: () => number;
    readonly raf?: (callback: FrameCallback) => number;
    readonly cancelRaf?: (handle: number) => void;
    readonly render?: RenderCallback;
}

export interface SimulationLoop {
    start(): void;
    stop(): void;
    isRunning(): boolean;
    /** Simulated seconds since the loop was created */
    elapsed(): number;
}

const resolveNow = (): (() => number) => {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
        return () => performance.now();
    }
    return () => Date.now();
};

const timerScheduler = (frameMs: number, now: () => number) => {
    const timers = new Map<number, ReturnType<typeof setTimeout>>();
    let nextHandle = 1;

    const request = (callback: FrameCallback): number => {
        const handle = nextHandle++;
        timers.set(
            handle,
            setTimeout(() => {
                timers.delete(handle);
                callback(now());
            }, frameMs),
        );
        return handle;
    };

    const cancel = (handle: number): void => {
        const timer = timers.get(handle);
        if (timer !== undefined) {
            clearTimeout(timer);
            timers.delete(handle);
        }
    };

    return { request, cancel };
};

/**
 * Fixed-step driver: accumulates wall-clock frame time and feeds the step
 * callback a monotonic simulated timestamp in whole fixed steps. Uses
 * requestAnimationFrame when the host has it, a timer otherwise.
 */
export class FixedStepLoop implements SimulationLoop {
    private readonly fixedDelta: number;

    private readonly stepMs: number;

    private readonly maxStepsPerFrame: number;

    private readonly maxFrameDeltaMs: number;

    private readonly now: () => number;

    private readonly raf: (callback: FrameCallback) => number;

    private readonly cancelRaf: (handle: number) => void;

    private readonly render: RenderCallback | undefined;

    private accumulatorMs = 0;

    private lastTime = 0;

    private steps = 0;

    private frameHandle: number | undefined;

    private running = false;

    constructor(
        private readonly step: StepCallback,
        options: LoopOptions = {},
    ) {
        const configuredDelta = options.fixedDelta ?? DEFAULT_FIXED_DELTA;
        this.fixedDelta = configuredDelta > 0 ? configuredDelta : DEFAULT_FIXED_DELTA;
        this.stepMs = this.fixedDelta * 1000;
        this.maxStepsPerFrame = Math.max(1, Math.floor(options.maxStepsPerFrame ?? DEFAULT_MAX_STEPS_PER_FRAME));
        this.maxFrameDeltaMs = Math.max(this.stepMs, options.maxFrameDeltaMs ?? DEFAULT_MAX_FRAME_DELTA_MS);
        this.now = options.now ?? resolveNow();
        this.render = options.render;

        if (options.raf) {
            this.raf = options.raf;
            this.cancelRaf = options.cancelRaf ?? (() => undefined);
        } else if (typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function') {
            this.raf = (callback) => window.requestAnimationFrame(callback);
            this.cancelRaf = (handle) => window.cancelAnimationFrame(handle);
        } else {
            const fallback = timerScheduler(this.stepMs, this.now);
            this.raf = fallback.request;
            this.cancelRaf = fallback.cancel;
        }
    }

    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.accumulatorMs = 0;
        this.lastTime = this.now();
        this.scheduleNext();
    }

    stop(): void {
        if (!this.running) {
            return;
        }
        this.running = false;
        if (this.frameHandle !== undefined) {
            this.cancelRaf(this.frameHandle);
            this.frameHandle = undefined;
        }
    }

    isRunning(): boolean {
        return this.running;
    }

    elapsed(): number {
        return this.steps * this.fixedDelta;
    }

    private scheduleNext(): void {
        this.frameHandle = this.raf(this.frame);
    }

    private readonly frame: FrameCallback = () => {
        if (!this.running) {
            return;
        }

        const currentTime = this.now();
        const frameDeltaMs = Math.min(this.maxFrameDeltaMs, Math.max(0, currentTime - this.lastTime));
        this.lastTime = currentTime;
        this.accumulatorMs += frameDeltaMs;

        let stepsThisFrame = 0;
        while (this.accumulatorMs >= this.stepMs && stepsThisFrame < this.maxStepsPerFrame) {
            this.steps += 1;
            this.step(this.elapsed(), this.fixedDelta);
            this.accumulatorMs -= this.stepMs;
            stepsThisFrame += 1;
        }

        if (stepsThisFrame === this.maxStepsPerFrame && this.accumulatorMs > this.stepMs) {
            // drop the backlog instead of spiralling
            this.accumulatorMs = this.stepMs;
        }

        this.render?.(Math.min(1, this.accumulatorMs / this.stepMs));

        if (this.running) {
            this.scheduleNext();
        }
    };
}

export interface TickTarget {
    readonly tick: (now: number) => void;
}

export const createSimulationLoop = (target: TickTarget, options?: LoopOptions): SimulationLoop =>
    new FixedStepLoop((now) => target.tick(now), options);
