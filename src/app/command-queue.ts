import type { PowerUpType } from 'util/power-ups';

/**
 * Requests from outside the tick (ad callbacks, purchases, input) that the
 * controller applies at the start of the next tick.
 */
export type SimulationCommand =
    | { readonly type: 'flip'; readonly steps: 1 | 2 }
    | { readonly type: 'revive'; readonly withShield: boolean }
    | { readonly type: 'activate-power-up'; readonly powerUp: PowerUpType; readonly source: 'purchase' | 'revive' }
    | { readonly type: 'grant-gems'; readonly amount: number };

export interface CommandQueue {
    readonly enqueue: (command: SimulationCommand) => void;
    /** Take every queued command in arrival order. */
    readonly drain: () => SimulationCommand[];
    readonly size: () => number;
    /** Whether a command of the given type is waiting for the next drain. */
    readonly has: (type: SimulationCommand['type']) => boolean;
    readonly clear: () => void;
}

export const createCommandQueue = (): CommandQueue => {
    let queued: SimulationCommand[] = [];

    return {
        enqueue: (command) => {
            queued.push(command);
        },
        drain: () => {
            const drained = queued;
            queued = [];
            return drained;
        },
        size: () => queued.length,
        has: (type) => queued.some((command) => command.type === type),
        clear: () => {
            queued = [];
        },
    };
};
