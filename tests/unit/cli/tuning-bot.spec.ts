import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('cli/simulate', () => ({
    runHeadlessSimulation: vi.fn(),
}));

import { runHeadlessSimulation, type SimulationInput, type SimulationResult } from 'cli/simulate';
import { runTuningBot } from 'cli/tuning-bot';

const createResult = (seed: number): SimulationResult => ({
    ok: true,
    seed,
    ended: seed % 2 === 0,
    score: seed * 10,
    level: 2,
    nearMisses: seed - 10,
    durationSeconds: seed,
    ticks: seed * 60,
    flips: 3,
    events: { RunStarted: 1 },
    cues: 5,
    specialEvents: [],
    challenge: null,
    challengeMet: null,
    replayBytes: 0,
    replayPath: null,
});

const seedOf = (input: SimulationInput | undefined): number => input?.seed ?? 1;

describe('runTuningBot', () => {
    beforeEach(() => {
        vi.mocked(runHeadlessSimulation).mockReset();
        vi.mocked(runHeadlessSimulation).mockImplementation(async (input) => createResult(seedOf(input)));
    });

    it('plays consecutive seeds and summarizes them', async () => {
        const { summary, runs } = await runTuningBot({ runs: 3, durationSec: 30, seed: 10 });

        expect(runs.map((run) => run.seed)).toEqual([10, 11, 12]);
        expect(summary).toEqual({
            runCount: 3,
            averageScore: 110,
            bestScore: 120,
            averageDurationSeconds: 11,
            averageNearMisses: 1,
            averageLevel: 2,
            scoreStdDev: 8.16,
            survivalRate: 0.333,
            deterministicCheck: true,
        });
    });

    it('replays the first seed once more with the same settings', async () => {
        await runTuningBot({ runs: 2, durationSec: 45, seed: 10, bot: false });

        expect(vi.mocked(runHeadlessSimulation).mock.calls.map(([input]) => input)).toEqual([
            { seed: 10, durationSec: 45, bot: false },
            { seed: 11, durationSec: 45, bot: false },
            { seed: 10, durationSec: 45, bot: false },
        ]);
    });

    it('flags a replay that does not reproduce the first run', async () => {
        let calls = 0;
        vi.mocked(runHeadlessSimulation).mockImplementation(async (input) => {
            calls += 1;
            const result = createResult(seedOf(input));
            return calls === 2 ? { ...result, score: result.score + 1 } : result;
        });

        const { summary } = await runTuningBot({ runs: 1, durationSec: 30, seed: 10 });

        expect(summary.deterministicCheck).toBe(false);
    });

    it('starts from seed 1 with the autopilot when unset', async () => {
        await runTuningBot({ runs: 1, durationSec: 30 });

        expect(runHeadlessSimulation).toHaveBeenNthCalledWith(1, { seed: 1, durationSec: 30, bot: true });
    });

    it('clamps the number of runs', async () => {
        const none = await runTuningBot({ runs: 0, durationSec: 10, seed: 10 });
        const many = await runTuningBot({ runs: 500, durationSec: 10, seed: 10 });

        expect(none.summary.runCount).toBe(1);
        expect(many.summary.runCount).toBe(50);
    });
});
