import { resolve as resolvePath } from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:fs/promises', () => ({
    writeFile: vi.fn(() => Promise.resolve()),
}));

import { writeFile } from 'node:fs/promises';
import { runHeadlessSimulation } from 'cli/simulate';

describe('runHeadlessSimulation', () => {
    beforeEach(() => {
        vi.mocked(writeFile).mockClear();
    });

    it('reproduces the same run for the same seed', async () => {
        const first = await runHeadlessSimulation({ seed: 5, durationSec: 20 });
        const second = await runHeadlessSimulation({ seed: 5, durationSec: 20 });

        expect(second).toEqual(first);
        expect(first.seed).toBe(5);
        expect(first.events.RunStarted).toBe(1);
        expect(first.ticks).toBeLessThanOrEqual(20 * 60 + 1);
    });

    it('stops at the requested duration when the run survives', async () => {
        const result = await runHeadlessSimulation({ seed: 3, durationSec: 1, tickRate: 10 });

        expect(result.ended).toBe(false);
        expect(result.ticks).toBe(11);
        expect(result.durationSeconds).toBe(1);
        expect(result.replayPath).toBeNull();
    });

    it('plays the seed of a challenge link', async () => {
        const result = await runHeadlessSimulation({
            seed: 5,
            durationSec: 10,
            challenge: 'orbitdodge://challenge?seed=42&score=100',
        });

        expect(result.seed).toBe(42);
        expect(result.challenge).toEqual({ seed: 42, targetScore: 100 });
        expect(result.challengeMet).toBe(result.score >= 100);
    });

    it('rejects a malformed challenge link', async () => {
        await expect(runHeadlessSimulation({ challenge: 'not-a-link' })).rejects.toThrow(
            'Invalid challenge link: not-a-link',
        );
    });

    it('writes the replay of a run that ends', async () => {
        const result = await runHeadlessSimulation({ seed: 8, durationSec: 60, bot: false, replayOut: 'replay.gif' });

        expect(result.ended).toBe(true);
        expect(result.flips).toBe(0);
        expect(result.replayBytes).toBeGreaterThan(0);
        expect(result.replayPath).toBe(resolvePath(process.cwd(), 'replay.gif'));
        expect(writeFile).toHaveBeenCalledWith(result.replayPath, expect.any(Uint8Array));
    });
});
