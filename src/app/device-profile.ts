import { gameConfig, type ReplayConfig, type ReplayTierConfig } from 'config/game';

export type ReplayTier = 'standard' | 'reduced' | 'disabled';

export interface DeviceProfile {
    /** Approximate device memory in GB, null when the host does not say */
    readonly memoryGb: number | null;
}

const readNavigatorMemory = (): number | null => {
    if (typeof navigator === 'undefined') {
        return null;
    }
    const memory: unknown = Reflect.get(navigator, 'deviceMemory');
    return typeof memory === 'number' && Number.isFinite(memory) && memory > 0 ? memory : null;
};

export const detectDeviceProfile = (): DeviceProfile => ({
    memoryGb: readNavigatorMemory(),
});

/** Unknown memory captures at the standard tier. */
export const resolveReplayTier = (profile: DeviceProfile, config: ReplayConfig = gameConfig.replay): ReplayTier => {
    const memory = profile.memoryGb;
    if (memory === null) {
        return 'standard';
    }
    if (memory <= config.disabledMemoryThresholdGb) {
        return 'disabled';
    }
    if (memory <= config.reducedMemoryThresholdGb) {
        return 'reduced';
    }
    return 'standard';
};

export const replayTierSettings = (
    tier: ReplayTier,
    config: ReplayConfig = gameConfig.replay,
): ReplayTierConfig => {
    switch (tier) {
        case 'standard':
            return config.standard;
        case 'reduced':
            return config.reduced;
        case 'disabled':
            return { capacity: 0, maxDimension: 0 };
    }
};
