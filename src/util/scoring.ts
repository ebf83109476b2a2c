/**
 * Near-miss scoring
 *
 * Hazards walk a small state machine against the player token:
 * approaching -> threatened -> near miss and/or safe pass. Near misses raise
 * the multiplier; a safe pass cashes it in and decays it.
 */
import { gameConfig, type CollisionConfig, type ScoringConfig } from 'config/game';

const MULTIPLIER_PRECISION = 1e6;

const roundMultiplier = (value: number): number => Math.round(value * MULTIPLIER_PRECISION) / MULTIPLIER_PRECISION;

export interface ScoreState {
    score: number;
    /** Always >= 1 */
    multiplier: number;
    level: number;
    /** Safe passes awarded; every `actionsPerLevel` of them raises the level */
    actions: number;
    nearMisses: number;
    /** Pending milestone checkpoints */
    milestones: Set<number>;
}

export type ScoreSnapshot = Readonly<Omit<ScoreState, 'milestones'>> & {
    readonly milestones: readonly number[];
};

/** Hazard position relative to the player token for one tick. */
export interface EntityGeometry {
    readonly sameRing: boolean;
    /** Absolute shortest angular separation, radians */
    readonly angularDelta: number;
    /** Cartesian distance between the two centres */
    readonly distance: number;
}

/** Per-hazard flags the engine reads and advances. */
export interface ScoringFlags {
    threatened: boolean;
    awardedPass: boolean;
    awardedNearMiss: boolean;
}

export interface EntityEvaluation {
    readonly nearMiss: boolean;
    readonly safePass: boolean;
}

export interface NearMissAward {
    readonly count: number;
    readonly multiplier: number;
}

export interface SafePassAward {
    readonly points: number;
    readonly score: number;
    /** Multiplier after decay */
    readonly multiplier: number;
    readonly level: number;
    readonly leveledUp: boolean;
}

export interface MilestoneHit {
    readonly checkpoint: number;
    readonly next: number;
}

export interface ScoringEngine {
    readonly evaluateEntity: (flags: ScoringFlags, geometry: EntityGeometry) => EntityEvaluation;
    readonly awardNearMiss: () => NearMissAward;
    readonly awardSafePass: () => SafePassAward;
    readonly checkMilestones: () => MilestoneHit[];
    readonly reset: () => void;
    readonly snapshot: () => ScoreSnapshot;
}

export interface ScoringEngineOptions {
    readonly scoring?: ScoringConfig;
    readonly collisions?: CollisionConfig;
}

export function createScoreState(config: ScoringConfig = gameConfig.scoring): ScoreState {
    return {
        score: 0,
        multiplier: 1,
        level: 1,
        actions: 0,
        nearMisses: 0,
        milestones: new Set(config.milestones),
    };
}

export function createScoringEngine(options: ScoringEngineOptions = {}): ScoringEngine {
    const scoring = options.scoring ?? gameConfig.scoring;
    const collisions = options.collisions ?? gameConfig.collisions;
    const nearMissFloor = collisions.contactRadius + collisions.collisionPadding;
    let state = createScoreState(scoring);

    const evaluateEntity: ScoringEngine['evaluateEntity'] = (flags, geometry) => {
        const { sameRing, angularDelta, distance } = geometry;

        if (sameRing && angularDelta <= scoring.threatArc && distance <= scoring.threatDistance) {
            flags.threatened = true;
        }

        let nearMiss = false;
        if (
            !flags.awardedNearMiss &&
            angularDelta < scoring.nearMissArc &&
            distance > nearMissFloor &&
            distance < scoring.nearMissDistance
        ) {
            flags.awardedNearMiss = true;
            nearMiss = true;
        }

        let safePass = false;
        if (flags.threatened && !flags.awardedPass && angularDelta > scoring.releaseArc) {
            flags.awardedPass = true;
            safePass = true;
        }

        return { nearMiss, safePass };
    };

    const awardNearMiss: ScoringEngine['awardNearMiss'] = () => {
        state.nearMisses += 1;
        state.multiplier = roundMultiplier(state.multiplier + scoring.nearMissMultiplierGain);
        return { count: state.nearMisses, multiplier: state.multiplier };
    };

    const awardSafePass: ScoringEngine['awardSafePass'] = () => {
        const points = Math.floor(scoring.basePoints * state.multiplier);
        state.score += points;
        state.multiplier = Math.max(1, roundMultiplier(state.multiplier * scoring.multiplierDecayFactor));
        state.actions += 1;

        const leveledUp = scoring.actionsPerLevel > 0 && state.actions % scoring.actionsPerLevel === 0;
        if (leveledUp) {
            state.level += 1;
        }

        return {
            points,
            score: state.score,
            multiplier: state.multiplier,
            level: state.level,
            leveledUp,
        };
    };

    const checkMilestones: ScoringEngine['checkMilestones'] = () => {
        const pending = Array.from(state.milestones).sort((a, b) => a - b);
        const hits: MilestoneHit[] = [];
        for (const checkpoint of pending) {
            if (checkpoint > state.score) {
                break;
            }
            const next = checkpoint + scoring.milestoneStep;
            state.milestones.delete(checkpoint);
            state.milestones.add(next);
            hits.push({ checkpoint, next });
        }
        return hits;
    };

    const snapshot: ScoringEngine['snapshot'] = () => ({
        score: state.score,
        multiplier: state.multiplier,
        level: state.level,
        actions: state.actions,
        nearMisses: state.nearMisses,
        milestones: Array.from(state.milestones).sort((a, b) => a - b),
    });

    return {
        evaluateEntity,
        awardNearMiss,
        awardSafePass,
        checkMilestones,
        reset: () => {
            state = createScoreState(scoring);
        },
        snapshot,
    };
}
