import { afterEach, describe, expect, it, vi } from 'vitest';
import { detectDeviceProfile, replayTierSettings, resolveReplayTier } from 'app/device-profile';

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('detectDeviceProfile', () => {
    it('reads navigator.deviceMemory when the host reports it', () => {
        vi.stubGlobal('navigator', { deviceMemory: 2 });
        expect(detectDeviceProfile()).toEqual({ memoryGb: 2 });
    });

    it('reports unknown memory otherwise', () => {
        vi.stubGlobal('navigator', { deviceMemory: 'lots' });
        expect(detectDeviceProfile()).toEqual({ memoryGb: null });

        vi.stubGlobal('navigator', {});
        expect(detectDeviceProfile()).toEqual({ memoryGb: null });
    });
});

describe('resolveReplayTier', () => {
    it('maps device memory onto a capture tier', () => {
        expect(resolveReplayTier({ memoryGb: null })).toBe('standard');
        expect(resolveReplayTier({ memoryGb: 0.5 })).toBe('disabled');
        expect(resolveReplayTier({ memoryGb: 1 })).toBe('disabled');
        expect(resolveReplayTier({ memoryGb: 2 })).toBe('reduced');
        expect(resolveReplayTier({ memoryGb: 3 })).toBe('reduced');
        expect(resolveReplayTier({ memoryGb: 8 })).toBe('standard');
    });

    it('returns the tier settings', () => {
        expect(replayTierSettings('standard')).toEqual({ capacity: 30, maxDimension: 160 });
        expect(replayTierSettings('reduced')).toEqual({ capacity: 15, maxDimension: 96 });
        expect(replayTierSettings('disabled')).toEqual({ capacity: 0, maxDimension: 0 });
    });
});
