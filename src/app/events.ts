import type { PowerUpType } from 'util/power-ups';
import type { SpecialEventKind } from './special-events';

export type SafePassReason = 'cleared' | 'expired';
export type PowerUpSource = 'pickup' | 'purchase' | 'revive';

export interface RunStartedPayload {
    readonly seed: number;
    readonly highScore: number;
    readonly targetScore: number | null;
}

export interface RingFlippedPayload {
    readonly from: number;
    readonly to: number;
}

export interface NearMissPayload {
    readonly entityId: number;
    readonly count: number;
    readonly multiplier: number;
}

export interface SafePassPayload {
    readonly entityId: number;
    readonly points: number;
    readonly score: number;
    readonly multiplier: number;
    readonly reason: SafePassReason;
}

export interface LevelUpPayload {
    readonly level: number;
}

export interface RingsUnlockedPayload {
    readonly activeRings: number;
}

export interface MilestonePayload {
    readonly checkpoint: number;
    readonly score: number;
    readonly next: number;
}

export interface SpecialEventStartedPayload {
    readonly kind: SpecialEventKind;
    readonly endsAt: number;
}

export interface SpecialEventEndedPayload {
    readonly kind: SpecialEventKind;
}

export interface PowerUpActivatedPayload {
    readonly type: PowerUpType;
    readonly source: PowerUpSource;
    readonly expiresAt: number;
}

export interface PowerUpExpiredPayload {
    readonly type: PowerUpType;
}

export interface ShieldAbsorbedPayload {
    readonly entityId: number;
    readonly graceUntil: number;
}

export interface RunEndedPayload {
    readonly score: number;
    readonly durationSeconds: number;
    readonly nearMisses: number;
    readonly isNewHighScore: boolean;
}

export interface RevivedPayload {
    readonly withShield: boolean;
}

export interface SimulationEventMap {
    readonly RunStarted: RunStartedPayload;
    readonly RingFlipped: RingFlippedPayload;
    readonly NearMiss: NearMissPayload;
    readonly SafePass: SafePassPayload;
    readonly LevelUp: LevelUpPayload;
    readonly RingsUnlocked: RingsUnlockedPayload;
    readonly MilestoneReached: MilestonePayload;
    readonly SpecialEventStarted: SpecialEventStartedPayload;
    readonly SpecialEventEnded: SpecialEventEndedPayload;
    readonly PowerUpActivated: PowerUpActivatedPayload;
    readonly PowerUpExpired: PowerUpExpiredPayload;
    readonly ShieldAbsorbed: ShieldAbsorbedPayload;
    readonly RunEnded: RunEndedPayload;
    readonly Revived: RevivedPayload;
}

export type SimulationEventName = keyof SimulationEventMap;

export interface EventEnvelope<EventName extends SimulationEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: SimulationEventMap[EventName];
}

export type AnyEventEnvelope = {
    [EventName in SimulationEventName]: EventEnvelope<EventName>;
}[SimulationEventName];

export type EventListener<EventName extends SimulationEventName> = (event: EventEnvelope<EventName>) => void;

export interface SimulationEventBus {
    publish(this: void, event: AnyEventEnvelope): void;
    subscribe<EventName extends SimulationEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    subscribeAll(this: void, listener: (event: AnyEventEnvelope) => void): () => void;
    clear(this: void): void;
}

type InternalListener = EventListener<SimulationEventName>;
type WildcardListener = (event: AnyEventEnvelope) => void;

type ListenerRegistry = Map<SimulationEventName, Set<InternalListener>>;

const ensureListenerSet = (registry: ListenerRegistry, type: SimulationEventName): Set<InternalListener> => {
    const existing = registry.get(type);
    if (existing) {
        return existing;
    }

    const created = new Set<InternalListener>();
    registry.set(type, created);
    return created;
};

export const createEventBus = (): SimulationEventBus => {
    const registry: ListenerRegistry = new Map();
    const wildcards = new Set<WildcardListener>();

    const publish: SimulationEventBus['publish'] = (event) => {
        const listeners = registry.get(event.type);
        if (listeners) {
            for (const listener of [...listeners]) {
                listener(event);
            }
        }
        for (const listener of [...wildcards]) {
            listener(event);
        }
    };

    const subscribe: SimulationEventBus['subscribe'] = (type, listener) => {
        const listeners = ensureListenerSet(registry, type);
        const internal = listener as InternalListener;
        listeners.add(internal);
        return () => {
            listeners.delete(internal);
            if (listeners.size === 0) {
                registry.delete(type);
            }
        };
    };

    const subscribeAll: SimulationEventBus['subscribeAll'] = (listener) => {
        wildcards.add(listener);
        return () => {
            wildcards.delete(listener);
        };
    };

    const clear: SimulationEventBus['clear'] = () => {
        registry.clear();
        wildcards.clear();
    };

    return {
        publish,
        subscribe,
        subscribeAll,
        clear,
    };
};

/**
 * Events raised while a tick runs. Producers push; the loop drains the list
 * into the bus once, after every system has finished for the tick.
 */
export interface TickEventList {
    push(this: void, event: AnyEventEnvelope): void;
    drain(this: void): AnyEventEnvelope[];
    size(this: void): number;
}

export const createTickEventList = (): TickEventList => {
    let pending: AnyEventEnvelope[] = [];

    return {
        push: (event) => {
            pending.push(event);
        },
        drain: () => {
            const drained = pending;
            pending = [];
            return drained;
        },
        size: () => pending.length,
    };
};
