import { describe, expect, it, vi } from 'vitest';
import { createValueSubject } from 'util/observable';
import type { Logger } from 'util/log';

const createLoggerStub = () => {
    const warn = vi.fn();
    const debug = vi.fn();
    const child = vi.fn<(suffix: string) => Logger>();
    const logger: Logger = {
        debug,
        info: vi.fn(),
        warn,
        error: vi.fn(),
        child: (suffix) => child(suffix),
    };
    child.mockReturnValue(logger);
    return { logger, warn, debug, child };
};

describe('createValueSubject', () => {
    it('replays the current value to new subscribers', () => {
        const subject = createValueSubject(1);
        const listener = vi.fn();

        subject.next(2);
        subject.subscribe(listener);

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith(2);
        expect(subject.value()).toBe(2);
    });

    it('broadcasts values until unsubscribe', () => {
        const subject = createValueSubject(0);
        const first = vi.fn();
        const second = vi.fn();

        const sub1 = subject.subscribe(first);
        subject.subscribe(second);
        subject.next(1);
        sub1.unsubscribe();
        sub1.unsubscribe();
        subject.next(2);

        expect(first.mock.calls).toEqual([[0], [1]]);
        expect(second.mock.calls).toEqual([[0], [1], [2]]);
    });

    it('ignores emissions and subscriptions after completion', () => {
        const stub = createLoggerStub();
        const subject = createValueSubject('idle', { label: 'hud', logger: stub.logger });
        const listener = vi.fn();
        subject.subscribe(listener);

        subject.complete();
        subject.next('running');
        const late = vi.fn();
        subject.subscribe(late);

        expect(listener).toHaveBeenCalledTimes(1);
        expect(late).not.toHaveBeenCalled();
        expect(subject.value()).toBe('idle');
        expect(stub.debug).toHaveBeenCalledWith('next-after-complete');
    });

    it('logs a throwing observer and keeps delivering to the rest', () => {
        const stub = createLoggerStub();
        const subject = createValueSubject(0, { label: 'hud', logger: stub.logger });
        const healthy = vi.fn();

        subject.subscribe((value) => {
            if (value > 0) {
                throw new Error('render failed');
            }
        });
        subject.subscribe(healthy);
        subject.next(5);

        expect(stub.child).toHaveBeenCalledWith('observable:hud');
        expect(stub.warn).toHaveBeenCalledWith('observer-error', { error: 'render failed' });
        expect(healthy).toHaveBeenLastCalledWith(5);
    });
});
