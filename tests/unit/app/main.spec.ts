import { afterEach, describe, expect, it, vi } from 'vitest';
import { bootstrapOrbitalDodge, type OrbitalDodgeHandle } from 'app/main';
import { createLogger, type LogEntry } from 'util/log';

const pixiState = vi.hoisted(() => {
    const applications: { destroy: (removeView: boolean) => void }[] = [];
    return { applications };
});

const toneState = vi.hoisted(() => ({
    start: vi.fn(() => Promise.resolve()),
}));

vi.mock('pixi.js', () => {
    class MockContainer {
        public children: unknown[] = [];

        addChild<T>(child: T): T {
            this.children.push(child);
            return child;
        }

        removeChild(child: unknown): void {
            this.children = this.children.filter((candidate) => candidate !== child);
        }

        removeChildren(): { destroy: () => void }[] {
            this.children = [];
            return [];
        }
    }

    class MockGraphics {
        public eventMode: string | undefined;
        public visible = true;
        public rotation = 0;
        public position = { x: 0, y: 0, set: (x: number, y: number) => Object.assign(this.position, { x, y }) };

        clear(): this {
            return this;
        }

        circle(): this {
            return this;
        }

        fill(): this {
            return this;
        }

        stroke(): this {
            return this;
        }

        destroy(): void {}
    }

    class MockApplication {
        public readonly canvas = document.createElement('canvas');
        public readonly stage = new MockContainer();
        public readonly screen = { width: 400, height: 300 };
        public readonly destroy = vi.fn();

        constructor() {
            pixiState.applications.push(this);
        }

        async init(): Promise<void> {}
    }

    return { Application: MockApplication, Container: MockContainer, Graphics: MockGraphics };
});

vi.mock('tone', () => {
    class Synth {
        toDestination(): this {
            return this;
        }

        triggerAttackRelease(): void {}

        dispose(): void {}
    }
    return { Synth, now: () => 0, start: toneState.start };
});

const silentLogger = () => createLogger('app', { writer: () => undefined });

describe('bootstrapOrbitalDodge', () => {
    let handle: OrbitalDodgeHandle | null = null;

    afterEach(() => {
        handle?.destroy();
        handle = null;
        pixiState.applications.length = 0;
        document.body.innerHTML = '';
    });

    it('mounts the canvas and starts a run', async () => {
        const container = document.createElement('div');
        document.body.appendChild(container);

        handle = await bootstrapOrbitalDodge({ container, seed: 9, logger: silentLogger() });

        expect(container.querySelector('canvas')).not.toBeNull();
        expect(container.querySelector('canvas')?.style.touchAction).toBe('none');
        expect(handle.controller.status()).toBe('running');
    });

    it('queues flips on arrow keys and unlocks audio on the first gesture', async () => {
        handle = await bootstrapOrbitalDodge({ logger: silentLogger() });
        const enqueue = vi.spyOn(handle.controller, 'enqueue');
        const flip = vi.spyOn(handle.controller, 'flip');

        document.dispatchEvent(new KeyboardEvent('keydown', { code: 'ArrowDown' }));
        document.dispatchEvent(new KeyboardEvent('keydown', { code: 'KeyQ' }));

        expect(enqueue).toHaveBeenCalledTimes(1);
        expect(enqueue).toHaveBeenCalledWith({ type: 'flip', steps: 2 });
        expect(flip).not.toHaveBeenCalled();
        expect(toneState.start).toHaveBeenCalledTimes(1);
    });

    it('queues a one-ring flip on a tap', async () => {
        handle = await bootstrapOrbitalDodge({ logger: silentLogger() });
        const enqueue = vi.spyOn(handle.controller, 'enqueue');

        document.querySelector('canvas')?.dispatchEvent(new Event('pointerdown'));

        expect(enqueue).toHaveBeenCalledWith({ type: 'flip', steps: 1 });
    });

    it('shares the ended run as a challenge on its seed and score', async () => {
        const record = vi.fn();
        handle = await bootstrapOrbitalDodge({ seed: 9, analytics: { record }, logger: silentLogger() });

        expect(handle.shareResult()).toBeNull();

        vi.spyOn(handle.controller, 'result').mockReturnValue({
            score: 64,
            durationSeconds: 12,
            nearMisses: 3,
            replay: null,
            specialEvents: [],
            seed: 9,
            level: 1,
            challenge: null,
            challengeMet: null,
            highScore: 64,
            isNewHighScore: true,
        });

        expect(handle.shareResult()?.deepLink).toBe('orbitdodge://challenge?seed=9&score=64');
        expect(record).toHaveBeenCalledWith('share_initiated', { seed: 9, targetScore: 64 });
    });

    it('warns about a malformed challenge link and plays a normal run', async () => {
        const entries: LogEntry[] = [];
        handle = await bootstrapOrbitalDodge({
            challengeLink: 'orbitdodge://challenge?seed=abc',
            logger: createLogger('app', { writer: (entry) => entries.push(entry) }),
        });

        expect(entries.map((entry) => entry.message)).toContain('Ignoring malformed challenge link');
        expect(handle.controller.status()).toBe('running');
    });

    it('releases input and the renderer on destroy', async () => {
        const current = await bootstrapOrbitalDodge({ logger: silentLogger() });
        const enqueue = vi.spyOn(current.controller, 'enqueue');

        current.destroy();
        document.dispatchEvent(new KeyboardEvent('keydown', { code: 'Space' }));

        expect(enqueue).not.toHaveBeenCalled();
        expect(pixiState.applications[0]?.destroy).toHaveBeenCalledWith(true);
    });
});
