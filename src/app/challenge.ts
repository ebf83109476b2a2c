import { normalizeSeed } from 'util/random';
import type { AnalyticsSink } from './contracts';

export interface Challenge {
    readonly seed: number;
    readonly targetScore: number;
}

export interface ChallengeLinks {
    readonly deepLink: string;
    readonly shareLink: string;
}

const DEEP_LINK_SCHEME = 'orbitdodge:';
const DEEP_LINK_HOST = 'challenge';
const SHARE_ORIGIN = 'https://orbitdodge.example';

const UNSIGNED_INTEGER = /^\d+$/;
const SIGNED_INTEGER = /^-?\d+$/;

export const createChallenge = (seed: number, targetScore: number): Challenge => ({
    seed: normalizeSeed(seed),
    targetScore: Number.isFinite(targetScore) ? Math.max(0, Math.floor(targetScore)) : 0,
});

const readParams = (link: string): URLSearchParams | null => {
    let url: URL;
    try {
        url = new URL(link);
    } catch {
        return null;
    }

    if (url.protocol === DEEP_LINK_SCHEME) {
        // custom schemes put the host into the pathname ("//challenge")
        const target = url.host || url.pathname.replace(/^\/+/, '');
        return target === DEEP_LINK_HOST ? url.searchParams : null;
    }

    if (url.protocol === 'https:' && url.pathname === `/${DEEP_LINK_HOST}`) {
        return url.searchParams;
    }

    return null;
};

/**
 * Read a challenge from a deep link or share link. Returns null when either
 * parameter is missing or not an integer, or the seed is outside 32 bits.
 */
export const parseChallenge = (link: string): Challenge | null => {
    const params = readParams(link);
    if (!params) {
        return null;
    }

    const seedValue = params.get('seed');
    const scoreValue = params.get('score');
    if (seedValue === null || scoreValue === null) {
        return null;
    }
    if (!UNSIGNED_INTEGER.test(seedValue) || !SIGNED_INTEGER.test(scoreValue)) {
        return null;
    }

    const seed = Number(seedValue);
    if (seed > 0xffffffff) {
        return null;
    }

    return createChallenge(seed, Number(scoreValue));
};

export const challengeLinks = (challenge: Challenge): ChallengeLinks => {
    const query = new URLSearchParams({
        seed: String(challenge.seed),
        score: String(challenge.targetScore),
    });
    const deepLink = `${DEEP_LINK_SCHEME}//${DEEP_LINK_HOST}?${query.toString()}`;
    query.set('deepLink', deepLink);
    const shareLink = `${SHARE_ORIGIN}/${DEEP_LINK_HOST}?${query.toString()}`;
    return { deepLink, shareLink };
};

/** Links for a share sheet; records the share in analytics. */
export const shareChallenge = (challenge: Challenge, analytics: AnalyticsSink): ChallengeLinks => {
    const links = challengeLinks(challenge);
    analytics.record('share_initiated', { seed: challenge.seed, targetScore: challenge.targetScore });
    return links;
};
