import { gameConfig } from 'config/game';
import { createInvariantReporter, type InvariantReporter } from 'util/invariant';
import { normalizeAngle } from 'util/math';
import type { EntityKind, VisualHandle, VisualProvider } from './contracts';

export interface EntityFlags {
    threatened: boolean;
    awardedPass: boolean;
    awardedNearMiss: boolean;
    /** Simulation time until which a magnet-deflected hazard cannot collide */
    neutralizedUntil: number;
}

/** Identifies one tenancy of a pool slot; stale once the slot is recycled. */
export interface EntityHandle {
    readonly id: number;
    readonly generation: number;
}

export interface EntitySlot extends EntityHandle {
    generation: number;
    active: boolean;
    kind: EntityKind;
    ring: number;
    angle: number;
    angularVelocity: number;
    spawnedAt: number;
    readonly flags: EntityFlags;
    visual: VisualHandle | null;
}

export interface SpawnRequest {
    readonly kind: EntityKind;
    readonly ring: number;
    readonly angle: number;
    readonly angularVelocity: number;
    readonly spawnedAt: number;
}

export interface ObstaclePoolOptions {
    readonly capacity?: number;
    readonly visuals?: VisualProvider;
    readonly invariants?: InvariantReporter;
}

const clearFlags = (flags: EntityFlags): void => {
    flags.threatened = false;
    flags.awardedPass = false;
    flags.awardedNearMiss = false;
    flags.neutralizedUntil = 0;
};

const createSlot = (id: number): EntitySlot => ({
    id,
    generation: 0,
    active: false,
    kind: 'hazard',
    ring: 0,
    angle: 0,
    angularVelocity: 0,
    spawnedAt: 0,
    flags: {
        threatened: false,
        awardedPass: false,
        awardedNearMiss: false,
        neutralizedUntil: 0,
    },
    visual: null,
});

/**
 * Reusable slot allocator for hazards and pickups.
 *
 * Slots live in an arena indexed by id and are never freed; recycling returns
 * a slot to the free list and bumps its generation so handles taken before the
 * recycle no longer resolve.
 */
export class ObstaclePool {
    readonly capacity: number;

    private readonly slots: EntitySlot[] = [];

    private readonly free: number[] = [];

    private readonly live = new Set<EntitySlot>();

    private readonly visuals: VisualProvider | null;

    private readonly invariants: InvariantReporter;

    constructor(options: ObstaclePoolOptions = {}) {
        const capacity = options.capacity ?? gameConfig.pool.capacity;
        this.capacity = Number.isFinite(capacity) ? Math.max(1, Math.floor(capacity)) : gameConfig.pool.capacity;
        this.visuals = options.visuals ?? null;
        this.invariants = options.invariants ?? createInvariantReporter();
    }

    /**
     * Take a recycled slot, or allocate a new one while under capacity.
     * Returns null when the pool is exhausted.
     */
    spawn(request: SpawnRequest): EntitySlot | null {
        const slot = this.acquireSlot();
        if (!slot) {
            this.invariants.report('obstacle pool exhausted', { capacity: this.capacity, kind: request.kind });
            return null;
        }

        slot.active = true;
        slot.kind = request.kind;
        slot.ring = request.ring;
        slot.angle = normalizeAngle(request.angle);
        slot.angularVelocity = request.angularVelocity;
        slot.spawnedAt = request.spawnedAt;
        clearFlags(slot.flags);
        slot.visual = this.visuals?.acquire(request.kind) ?? null;
        this.live.add(slot);
        return slot;
    }

    /**
     * Return a slot to the free list. Recycling an inactive slot or a stale
     * handle is reported as an invariant violation and otherwise ignored.
     */
    recycle(handle: EntityHandle): boolean {
        const slot = this.slots[handle.id];
        if (!slot || !slot.active || slot.generation !== handle.generation) {
            return this.invariants.report('recycle of inactive or stale entity handle', {
                id: handle.id,
                generation: handle.generation,
                currentGeneration: slot?.generation ?? null,
            });
        }

        slot.visual?.release();
        slot.visual = null;
        clearFlags(slot.flags);
        slot.active = false;
        slot.generation += 1;
        this.live.delete(slot);
        this.free.push(slot.id);
        return true;
    }

    recycleAll(): number {
        const active = this.active();
        for (const slot of active) {
            this.recycle(slot);
        }
        return active.length;
    }

    /** Snapshot of the active slots, safe to iterate while recycling. */
    active(): EntitySlot[] {
        return Array.from(this.live);
    }

    get(handle: EntityHandle): EntitySlot | null {
        const slot = this.slots[handle.id];
        if (!slot || !slot.active || slot.generation !== handle.generation) {
            return null;
        }
        return slot;
    }

    isActive(handle: EntityHandle): boolean {
        return this.get(handle) !== null;
    }

    activeCount(): number {
        return this.live.size;
    }

    allocatedCount(): number {
        return this.slots.length;
    }

    private acquireSlot(): EntitySlot | null {
        const reusedId = this.free.pop();
        if (reusedId !== undefined) {
            return this.slots[reusedId] ?? null;
        }

        if (this.slots.length >= this.capacity) {
            return null;
        }

        const slot = createSlot(this.slots.length);
        this.slots.push(slot);
        return slot;
    }
}
