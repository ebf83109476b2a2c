import { Synth, now as toneNow, start as startTone } from 'tone';
import type { FeedbackCue, FeedbackNotifier } from 'app/contracts';
import { rootLogger, type Logger } from 'util/log';

export interface CueNote {
    /** Hz */
    readonly frequency: number;
    /** Seconds */
    readonly duration: number;
}

/** Minimal synth surface the notifier plays through. */
export interface ToneVoice {
    triggerAttackRelease(frequency: number, duration: number, time: number): unknown;
    dispose(): unknown;
}

export interface ToneNotifierOptions {
    readonly createVoice?: () => ToneVoice;
    readonly now?: () => number;
    readonly logger?: Logger;
    readonly sequences?: Partial<Record<FeedbackCue, readonly CueNote[]>>;
}

export interface ToneNotifier extends FeedbackNotifier {
    /** Resume the audio context; browsers only allow this from a user gesture. */
    readonly unlock: () => Promise<void>;
    readonly dispose: () => void;
}

const notes = (frequencies: readonly number[], duration: number): CueNote[] =>
    frequencies.map((frequency) => ({ frequency, duration }));

const rampFrom = (start: number, end: number, step: number): number[] => {
    const values: number[] = [];
    for (let value = start; value <= end; value += step) {
        values.push(Number(value.toFixed(2)));
    }
    return values;
};

const C_MAJOR = [261.63, 329.63, 392.0];

export const DEFAULT_CUE_SEQUENCES: Readonly<Record<FeedbackCue, readonly CueNote[]>> = {
    'run-start': notes(rampFrom(130.81, 392.0, 30), 0.05),
    flip: notes([440], 0.1),
    'near-miss': notes([2000, 2100, 2200], 0.05),
    collision: notes([80, 60], 0.1),
    milestone: notes([...C_MAJOR, 523.25], 0.1),
    'power-up': notes(C_MAJOR, 0.1),
    'shield-absorb': notes([392.0, 261.63], 0.08),
    'special-event': notes([523.25, 392.0, 523.25], 0.08),
    'level-up': notes([329.63, 392.0, 523.25], 0.08),
    'safe-pass': [],
};

const createSineVoice = (): ToneVoice =>
    new Synth({
        oscillator: { type: 'sine' },
        envelope: { attack: 0.005, decay: 0.01, sustain: 0.9, release: 0.02 },
    }).toDestination();

/**
 * Plays short note sequences for simulation cues. Each cue restarts on the
 * shared voice, so a new cue cuts off whatever was playing.
 */
export const createToneNotifier = (options: ToneNotifierOptions = {}): ToneNotifier => {
    const createVoice = options.createVoice ?? createSineVoice;
    const now = options.now ?? toneNow;
    const logger = options.logger ?? rootLogger.child('audio');
    const sequences = { ...DEFAULT_CUE_SEQUENCES, ...options.sequences };
    let voice: ToneVoice | null = null;

    const ensureVoice = (): ToneVoice => {
        if (!voice) {
            voice = createVoice();
        }
        return voice;
    };

    const notify: ToneNotifier['notify'] = (cue) => {
        const sequence = sequences[cue] ?? [];
        if (sequence.length === 0) {
            return;
        }
        try {
            const target = ensureVoice();
            let time = now();
            for (const note of sequence) {
                target.triggerAttackRelease(note.frequency, note.duration, time);
                time += note.duration;
            }
        } catch (error) {
            logger.warn('Cue playback failed', {
                cue,
                error: error instanceof Error ? error.message : String(error),
            });
        }
    };

    return {
        notify,
        unlock: async () => {
            await startTone();
        },
        dispose: () => {
            voice?.dispose();
            voice = null;
        },
    };
};
