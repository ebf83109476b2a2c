import { rootLogger } from 'util/log';
import type { ProgressStore } from './contracts';

const STORAGE_KEY = 'orbital-dodge::progress::v1';

type MaybeStorage = Pick<Storage, 'getItem' | 'setItem'> | null;

interface ProgressRecord {
    highScore: number;
    gems: number;
}

export interface ProgressStoreOptions {
    /** Storage to persist into; defaults to window.localStorage when present. */
    readonly storage?: MaybeStorage;
    readonly initial?: Partial<ProgressRecord>;
}

const logger = rootLogger.child('progress');

const accessLocalStorage = (): MaybeStorage => {
    if (typeof window === 'undefined' || !window?.localStorage) {
        return null;
    }

    try {
        return window.localStorage;
    } catch (error) {
        logger.warn('Progress storage unavailable, falling back to memory', {
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }
};

const toCount = (value: unknown): number =>
    typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;

const readRecord = (storage: MaybeStorage): ProgressRecord | null => {
    const serialized = storage?.getItem(STORAGE_KEY);
    if (!serialized) {
        return null;
    }

    try {
        const parsed: unknown = JSON.parse(serialized);
        if (typeof parsed !== 'object' || parsed === null) {
            return null;
        }
        return {
            highScore: toCount(Reflect.get(parsed, 'highScore')),
            gems: toCount(Reflect.get(parsed, 'gems')),
        };
    } catch (error) {
        logger.warn('Failed to parse progress storage, starting fresh', {
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }
};

/**
 * High score and gem balance, kept in memory and mirrored to storage when one
 * is available.
 */
export const createProgressStore = (options: ProgressStoreOptions = {}): ProgressStore => {
    const storage = options.storage === undefined ? accessLocalStorage() : options.storage;
    const record: ProgressRecord = readRecord(storage) ?? {
        highScore: toCount(options.initial?.highScore),
        gems: toCount(options.initial?.gems),
    };

    const persist = () => {
        if (!storage) {
            return;
        }
        try {
            storage.setItem(STORAGE_KEY, JSON.stringify(record));
        } catch (error) {
            logger.warn('Failed to persist progress, retaining in memory only', {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    };

    return {
        highScore: () => record.highScore,
        gems: () => record.gems,
        recordHighScore: (score) => {
            const normalized = toCount(score);
            if (normalized <= record.highScore) {
                return false;
            }
            record.highScore = normalized;
            persist();
            return true;
        },
        spendGems: (amount) => {
            const cost = toCount(amount);
            if (cost > record.gems) {
                return false;
            }
            record.gems -= cost;
            persist();
            return true;
        },
        grantGems: (amount) => {
            const granted = toCount(amount);
            if (granted === 0) {
                return;
            }
            record.gems += granted;
            persist();
        },
    };
};
