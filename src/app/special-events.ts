import { gameConfig, type SpecialEventConfig } from 'config/game';

export type SpecialEventKind = 'color-inversion' | 'meteor-shower' | 'gravity-reversal';

export const SPECIAL_EVENT_KINDS: readonly SpecialEventKind[] = [
    'color-inversion',
    'meteor-shower',
    'gravity-reversal',
];

export interface SpecialEventWindow {
    readonly kind: SpecialEventKind;
    readonly startedAt: number;
    readonly endsAt: number;
}

interface Trigger {
    readonly threshold: number;
    readonly duration: number;
}

const triggerFor = (kind: SpecialEventKind, config: SpecialEventConfig): Trigger => {
    switch (kind) {
        case 'color-inversion':
            return config.colorInversion;
        case 'meteor-shower':
            return config.meteorShower;
        case 'gravity-reversal':
            return config.gravityReversal;
    }
};

export interface SpecialEventTracker {
    /** Fire every event whose threshold the score has reached and that has not fired this run. */
    readonly evaluate: (score: number, now: number) => SpecialEventWindow[];
    readonly isActive: (kind: SpecialEventKind, now: number) => boolean;
    /** Drop windows that have ended and report their kinds. */
    readonly expire: (now: number) => SpecialEventKind[];
    readonly active: () => SpecialEventWindow[];
    /** Kinds fired this run, in firing order. */
    readonly fired: () => SpecialEventKind[];
    readonly reset: () => void;
    /** Clear running windows but keep the fired set; a revived run does not re-arm events. */
    readonly endWindows: () => void;
}

export const createSpecialEventTracker = (
    config: SpecialEventConfig = gameConfig.specialEvents,
): SpecialEventTracker => {
    const firedKinds: SpecialEventKind[] = [];
    const windows = new Map<SpecialEventKind, SpecialEventWindow>();

    const evaluate: SpecialEventTracker['evaluate'] = (score, now) => {
        const started: SpecialEventWindow[] = [];
        for (const kind of SPECIAL_EVENT_KINDS) {
            if (firedKinds.includes(kind)) {
                continue;
            }
            const trigger = triggerFor(kind, config);
            if (score < trigger.threshold) {
                continue;
            }
            const window: SpecialEventWindow = { kind, startedAt: now, endsAt: now + trigger.duration };
            firedKinds.push(kind);
            windows.set(kind, window);
            started.push(window);
        }
        return started;
    };

    const expire: SpecialEventTracker['expire'] = (now) => {
        const ended: SpecialEventKind[] = [];
        for (const [kind, window] of windows) {
            if (now >= window.endsAt) {
                windows.delete(kind);
                ended.push(kind);
            }
        }
        return ended;
    };

    const isActive: SpecialEventTracker['isActive'] = (kind, now) => {
        const window = windows.get(kind);
        return window !== undefined && now < window.endsAt;
    };

    return {
        evaluate,
        isActive,
        expire,
        active: () => Array.from(windows.values()),
        fired: () => [...firedKinds],
        reset: () => {
            firedKinds.length = 0;
            windows.clear();
        },
        endWindows: () => {
            windows.clear();
        },
    };
};
