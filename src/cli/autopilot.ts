import type { SceneView } from 'app/contracts';
import type { FlipSteps } from 'app/game-loop-controller';
import { flipTarget } from 'app/orbital-motion';
import { angularDistance } from 'util/math';

export interface AutopilotOptions {
    /** Hazards closer than this on the player's ring trigger a flip, radians */
    readonly dangerArc?: number;
}

const DEFAULT_DANGER_ARC = 0.5;

const closestHazard = (view: SceneView, ring: number): number => {
    let closest = Number.POSITIVE_INFINITY;
    for (const entity of view.entities) {
        if (entity.kind === 'hazard' && entity.ring === ring) {
            closest = Math.min(closest, angularDistance(entity.angle, view.player.angle));
        }
    }
    return closest;
};

/**
 * Greedy dodge policy: when a hazard crowds the player's ring, flip to
 * whichever reachable ring has the most room around the player.
 */
export const chooseFlip = (view: SceneView, options: AutopilotOptions = {}): FlipSteps | null => {
    const dangerArc = options.dangerArc ?? DEFAULT_DANGER_ARC;
    const { ring } = view.player;
    if (closestHazard(view, ring) > dangerArc) {
        return null;
    }

    const activeRings = view.rings.filter((candidate) => candidate.active).length;
    let best: { steps: FlipSteps; room: number } | null = null;
    const candidates: readonly FlipSteps[] = [1, 2];
    for (const steps of candidates) {
        const target = flipTarget(ring, steps, activeRings);
        if (target === null || target === ring) {
            continue;
        }
        const room = closestHazard(view, target);
        if (!best || room > best.room) {
            best = { steps, room };
        }
    }
    return best ? best.steps : null;
};
