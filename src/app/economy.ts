import { gameConfig, type EconomyConfig } from 'config/game';
import { rootLogger, type Logger } from 'util/log';
import type { SimulationCommand } from './command-queue';
import type { AnalyticsSink, OperationResult, ProgressStore, RewardedAdProvider } from './contracts';
import { noopAnalytics } from './contracts';

export type RunStatus = 'idle' | 'running' | 'ended';

export type EconomyFailure =
    | 'insufficient-gems'
    | 'ad-not-ready'
    | 'ad-declined'
    | 'not-ended'
    | 'revive-pending'
    | 'no-active-run';

export type EconomyResult = OperationResult<EconomyFailure>;

/** The slice of the controller that purchases and ad rewards talk to. */
export interface EconomyTarget {
    readonly status: () => RunStatus;
    readonly enqueue: (command: SimulationCommand) => void;
    /** True while a queued revive has not reached a tick yet */
    readonly revivePending: () => boolean;
}

export interface EconomyOptions {
    readonly store: ProgressStore;
    readonly ads?: RewardedAdProvider;
    readonly analytics?: AnalyticsSink;
    readonly config?: EconomyConfig;
    readonly logger?: Logger;
}

export interface Economy {
    readonly reviveWithGems: (target: EconomyTarget) => EconomyResult;
    readonly reviveWithAd: (target: EconomyTarget, placement?: string) => Promise<EconomyResult>;
    readonly purchaseShield: (target: EconomyTarget) => EconomyResult;
}

const REVIVE_PLACEMENT = 'revive';

export const createEconomy = (options: EconomyOptions): Economy => {
    const { store } = options;
    const analytics = options.analytics ?? noopAnalytics;
    const config = options.config ?? gameConfig.economy;
    const logger = options.logger ?? rootLogger.child('economy');

    const spend = (amount: number, item: string): boolean => {
        if (!store.spendGems(amount)) {
            return false;
        }
        analytics.record('gems_spent', { amount, item });
        return true;
    };

    const reviveBlocker = (target: EconomyTarget): EconomyFailure | null => {
        if (target.status() !== 'ended') {
            return 'not-ended';
        }
        return target.revivePending() ? 'revive-pending' : null;
    };

    const reviveWithGems: Economy['reviveWithGems'] = (target) => {
        const blocker = reviveBlocker(target);
        if (blocker) {
            return { ok: false, reason: blocker };
        }
        if (!spend(config.reviveGemCost, 'revive')) {
            return { ok: false, reason: 'insufficient-gems' };
        }
        target.enqueue({ type: 'revive', withShield: false });
        return { ok: true };
    };

    const reviveWithAd: Economy['reviveWithAd'] = async (target, placement = REVIVE_PLACEMENT) => {
        const blocker = reviveBlocker(target);
        if (blocker) {
            return { ok: false, reason: blocker };
        }
        const ads = options.ads;
        if (!ads || !ads.isReady()) {
            return { ok: false, reason: 'ad-not-ready' };
        }

        let rewarded: boolean;
        try {
            rewarded = await ads.show(placement);
        } catch (error) {
            logger.warn('Rewarded ad failed', {
                placement,
                error: error instanceof Error ? error.message : String(error),
            });
            rewarded = false;
        }

        analytics.record('ad_watched', { placement, rewarded });
        if (!rewarded) {
            return { ok: false, reason: 'ad-declined' };
        }
        const lateBlocker = reviveBlocker(target);
        if (lateBlocker) {
            logger.info('Rewarded revive dropped', { placement, reason: lateBlocker });
            return { ok: false, reason: lateBlocker };
        }
        target.enqueue({ type: 'revive', withShield: true });
        return { ok: true };
    };

    const purchaseShield: Economy['purchaseShield'] = (target) => {
        if (target.status() !== 'running') {
            return { ok: false, reason: 'no-active-run' };
        }
        if (!spend(config.shieldGemCost, 'shield')) {
            return { ok: false, reason: 'insufficient-gems' };
        }
        target.enqueue({ type: 'activate-power-up', powerUp: 'shield', source: 'purchase' });
        return { ok: true };
    };

    return {
        reviveWithGems,
        reviveWithAd,
        purchaseShield,
    };
};
