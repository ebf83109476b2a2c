import { rootLogger, type Logger } from 'util/log';

export interface Subscription {
    unsubscribe(this: void): void;
}

export interface Observable<T> {
    subscribe(this: void, observer: (value: T) => void): Subscription;
}

/** Holds the latest value and replays it to each new subscriber. */
export interface ValueSubject<T> extends Observable<T> {
    next(this: void, value: T): void;
    value(this: void): T;
    complete(this: void): void;
}

export interface ValueSubjectOptions {
    readonly label?: string;
    readonly logger?: Logger;
}

const closedSubscription: Subscription = {
    unsubscribe: () => undefined,
};

export const createValueSubject = <T>(initial: T, options: ValueSubjectOptions = {}): ValueSubject<T> => {
    const observers = new Set<(value: T) => void>();
    const logger = (options.logger ?? rootLogger).child(`observable:${options.label?.trim() || 'anonymous'}`);
    let current = initial;
    let isComplete = false;

    const deliver = (observer: (value: T) => void, value: T) => {
        try {
            observer(value);
        } catch (error) {
            logger.warn('observer-error', {
                error: error instanceof Error ? error.message : String(error),
            });
        }
    };

    const subscribe: ValueSubject<T>['subscribe'] = (observer) => {
        if (isComplete) {
            return closedSubscription;
        }

        observers.add(observer);
        deliver(observer, current);
        return {
            unsubscribe: () => {
                observers.delete(observer);
            },
        };
    };

    const next: ValueSubject<T>['next'] = (value) => {
        if (isComplete) {
            logger.debug('next-after-complete');
            return;
        }

        current = value;
        for (const observer of [...observers]) {
            deliver(observer, value);
        }
    };

    return {
        subscribe,
        next,
        value: () => current,
        complete: () => {
            isComplete = true;
            observers.clear();
        },
    };
};
