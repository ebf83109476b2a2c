import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSimulationLoop, DEFAULT_FIXED_DELTA, FixedStepLoop } from 'app/loop';

type RafHandle = number;

type FrameCallback = (timestamp: number) => void;

interface FakeRaf {
    request: (callback: FrameCallback) => RafHandle;
    cancel: (handle: RafHandle) => void;
    flush: (deltaMs: number) => void;
    pending(): number;
}

const createFakeRaf = (getTime: () => number, setTime: (next: number) => void): FakeRaf => {
    let nextId = 1;
    const callbacks = new Map<RafHandle, FrameCallback>();

    return {
        request: (callback) => {
            const handle = nextId++;
            callbacks.set(handle, callback);
            return handle;
        },
        cancel: (handle) => {
            callbacks.delete(handle);
        },
        flush: (deltaMs) => {
            const scheduled = [...callbacks.entries()];
            callbacks.clear();
            setTime(getTime() + deltaMs);
            scheduled.forEach(([, callback]) => callback(getTime()));
        },
        pending: () => callbacks.size,
    };
};

describe('FixedStepLoop', () => {
    let currentTime: number;
    let fakeRaf: FakeRaf;

    beforeEach(() => {
        currentTime = 0;
        fakeRaf = createFakeRaf(
            () => currentTime,
            (next) => {
                currentTime = next;
            },
        );
    });

    const createLoop = (step: (now: number, dt: number) => void, render?: (alpha: number) => void) =>
        new FixedStepLoop(step, {
            fixedDelta: 0.01,
            now: () => currentTime,
            raf: fakeRaf.request,
            cancelRaf: fakeRaf.cancel,
            render,
        });

    it('runs whole fixed steps and carries the remainder', () => {
        const step = vi.fn();
        const render = vi.fn();
        const loop = createLoop(step, render);

        loop.start();
        fakeRaf.flush(25);

        expect(step).toHaveBeenCalledTimes(2);
        expect(step.mock.calls[0]).toEqual([0.01, 0.01]);
        expect(step.mock.calls[1]).toEqual([0.02, 0.01]);
        expect(render).toHaveBeenLastCalledWith(0.5);

        fakeRaf.flush(5);
        expect(step).toHaveBeenCalledTimes(3);
        expect(loop.elapsed()).toBeCloseTo(0.03, 12);
    });

    it('feeds a monotonic simulated clock', () => {
        const times: number[] = [];
        const loop = createLoop((now) => times.push(now));

        loop.start();
        [16, 3, 40, 9, 27].forEach((delta) => fakeRaf.flush(delta));

        for (let index = 1; index < times.length; index += 1) {
            expect(times[index]).toBeGreaterThan(times[index - 1] ?? 0);
        }
    });

    it('caps the steps taken after a long stall', () => {
        const step = vi.fn();
        const render = vi.fn();
        const loop = createLoop(step, render);

        loop.start();
        fakeRaf.flush(1000);

        expect(step).toHaveBeenCalledTimes(5);
        expect(render).toHaveBeenLastCalledWith(1);
    });

    it('stops scheduling frames once stopped', () => {
        const step = vi.fn();
        const loop = createLoop(step);

        loop.start();
        expect(loop.isRunning()).toBe(true);
        expect(fakeRaf.pending()).toBe(1);

        loop.stop();
        fakeRaf.flush(50);

        expect(loop.isRunning()).toBe(false);
        expect(fakeRaf.pending()).toBe(0);
        expect(step).not.toHaveBeenCalled();
    });

    it('ignores repeated start calls', () => {
        const loop = createLoop(vi.fn());
        loop.start();
        loop.start();

        expect(fakeRaf.pending()).toBe(1);
    });

    it('defaults to sixty steps per second', () => {
        expect(DEFAULT_FIXED_DELTA).toBe(1 / 60);
    });
});

describe('createSimulationLoop', () => {
    it('ticks the target with the simulated time', () => {
        let time = 0;
        const raf = createFakeRaf(
            () => time,
            (next) => {
                time = next;
            },
        );
        const tick = vi.fn();
        const loop = createSimulationLoop(
            { tick },
            { fixedDelta: 0.02, now: () => time, raf: raf.request, cancelRaf: raf.cancel },
        );

        loop.start();
        raf.flush(40);

        expect(tick.mock.calls).toEqual([[0.02], [0.04]]);
        loop.stop();
    });
});
