import { describe, expect, it } from 'vitest';
import { createSpecialEventTracker } from 'app/special-events';

describe('createSpecialEventTracker', () => {
    it('fires an event once its threshold is reached', () => {
        const tracker = createSpecialEventTracker();

        expect(tracker.evaluate(68, 0)).toEqual([]);
        expect(tracker.evaluate(69, 10)).toEqual([{ kind: 'color-inversion', startedAt: 10, endsAt: 15 }]);
        expect(tracker.isActive('color-inversion', 14.9)).toBe(true);
        expect(tracker.isActive('color-inversion', 15)).toBe(false);
    });

    it('fires each event at most once per run', () => {
        const tracker = createSpecialEventTracker();
        tracker.evaluate(100, 0);

        expect(tracker.evaluate(500, 1).map((window) => window.kind)).toEqual(['meteor-shower']);
        expect(tracker.evaluate(1200, 2).map((window) => window.kind)).toEqual(['gravity-reversal']);
        expect(tracker.evaluate(5000, 3)).toEqual([]);
        expect(tracker.fired()).toEqual(['color-inversion', 'meteor-shower', 'gravity-reversal']);
    });

    it('fires every passed threshold together when the score jumps', () => {
        const tracker = createSpecialEventTracker();

        expect(tracker.evaluate(999, 4).map((window) => window.kind)).toEqual([
            'color-inversion',
            'meteor-shower',
            'gravity-reversal',
        ]);
    });

    it('expires windows and reports which ended', () => {
        const tracker = createSpecialEventTracker();
        tracker.evaluate(420, 0);

        expect(tracker.expire(5)).toEqual(['color-inversion']);
        expect(tracker.active().map((window) => window.kind)).toEqual(['meteor-shower']);
        expect(tracker.expire(6)).toEqual(['meteor-shower']);
        expect(tracker.active()).toEqual([]);
    });

    it('ending windows keeps the fired set while reset re-arms', () => {
        const tracker = createSpecialEventTracker();
        tracker.evaluate(69, 0);

        tracker.endWindows();
        expect(tracker.isActive('color-inversion', 1)).toBe(false);
        expect(tracker.evaluate(69, 2)).toEqual([]);

        tracker.reset();
        expect(tracker.fired()).toEqual([]);
        expect(tracker.evaluate(69, 3)).toHaveLength(1);
    });

    it('uses the configured thresholds', () => {
        const tracker = createSpecialEventTracker({
            colorInversion: { threshold: 5, duration: 1 },
            meteorShower: { threshold: 10, duration: 2, burst: 3, intervalScale: 0.5, minimumInterval: 0.1 },
            gravityReversal: { threshold: 15, duration: 3 },
        });

        expect(tracker.evaluate(10, 0)).toEqual([
            { kind: 'color-inversion', startedAt: 0, endsAt: 1 },
            { kind: 'meteor-shower', startedAt: 0, endsAt: 2 },
        ]);
    });
});
