/**
 * Narrow one-way contracts to the collaborators around the simulation.
 * The simulation core only ever calls out through these.
 */

import type { Point } from 'util/math';

export type EntityKind = 'hazard' | 'shield' | 'slow-mo' | 'magnet';

export type VisualKind = EntityKind | 'player' | 'ring';

/** Opaque render binding; the core only moves, rotates and hides it. */
export interface VisualHandle {
    setPosition(position: Point): void;
    setRotation(radians: number): void;
    setVisible(visible: boolean): void;
    release(): void;
}

export interface VisualProvider {
    acquire(kind: VisualKind): VisualHandle;
}

export type FeedbackCue =
    | 'run-start'
    | 'flip'
    | 'near-miss'
    | 'safe-pass'
    | 'milestone'
    | 'power-up'
    | 'shield-absorb'
    | 'collision'
    | 'special-event'
    | 'level-up';

/** Audio and haptic cues; fire-and-forget. */
export interface FeedbackNotifier {
    notify(cue: FeedbackCue): void;
}

export type AnalyticsEventKind =
    | 'run_start'
    | 'run_end'
    | 'near_miss'
    | 'power_up_used'
    | 'ad_watched'
    | 'gems_spent'
    | 'share_initiated';

export type AnalyticsParams = Readonly<Record<string, string | number | boolean>>;

export interface AnalyticsSink {
    record(kind: AnalyticsEventKind, params: AnalyticsParams): void;
}

export interface RewardedAdProvider {
    isReady(): boolean;
    /** Resolves true when the viewer earned the reward. */
    show(placement: string): Promise<boolean>;
}

export interface ProgressStore {
    readonly highScore: () => number;
    readonly gems: () => number;
    /** Persist the score when it beats the stored one; returns true when it did. */
    readonly recordHighScore: (score: number) => boolean;
    readonly spendGems: (amount: number) => boolean;
    readonly grantGems: (amount: number) => void;
}

export interface RgbaImage {
    readonly width: number;
    readonly height: number;
    readonly data: Uint8ClampedArray;
}

export interface RingView {
    readonly index: number;
    readonly radius: number;
    readonly active: boolean;
}

export interface EntityView {
    readonly id: number;
    readonly kind: EntityKind;
    readonly ring: number;
    readonly angle: number;
    readonly position: Point;
}

export interface SceneView {
    readonly rings: readonly RingView[];
    readonly player: { readonly ring: number; readonly angle: number; readonly position: Point };
    readonly entities: readonly EntityView[];
    readonly inverted: boolean;
}

/** Supplies the current frame for replay capture. */
export interface FrameSource {
    capture(view: SceneView): RgbaImage | null;
}

export const noopNotifier: FeedbackNotifier = {
    notify: () => undefined,
};

export const noopAnalytics: AnalyticsSink = {
    record: () => undefined,
};

const hiddenHandle: VisualHandle = {
    setPosition: () => undefined,
    setRotation: () => undefined,
    setVisible: () => undefined,
    release: () => undefined,
};

export const headlessVisuals: VisualProvider = {
    acquire: () => hiddenHandle,
};

export type OperationResult<Reason extends string> = { readonly ok: true } | { readonly ok: false; readonly reason: Reason };
