import { mergeParams, parseParams, thresholdParamsSchema } from '../../src/checks/params';
import { CheckConfigError } from '../../src/lib/errors';

describe('mergeParams', () => {
    it('should replace defaults per key', () => {
        expect(mergeParams({ threshold_pct: 90, window_minutes: 5 }, { threshold_pct: 80 })).toEqual({
            threshold_pct: 80,
            window_minutes: 5,
        });
    });

    it('should keep the default when the override leaves a key undefined', () => {
        expect(mergeParams({ threshold_pct: 90 }, { threshold_pct: undefined })).toEqual({ threshold_pct: 90 });
    });

    it('should return a copy of the defaults without an override', () => {
        const defaults = { threshold_pct: 90 };
        const merged = mergeParams(defaults, null);

        expect(merged).toEqual(defaults);
        expect(merged).not.toBe(defaults);
    });
});

describe('parseParams', () => {
    it('should validate the merged parameters', () => {
        expect(parseParams('disk_space', thresholdParamsSchema, { threshold_pct: 90 }, { threshold_pct: 75 })).toEqual({
            threshold_pct: 75,
        });
    });

    it('should reject a null override value', () => {
        expect(() => parseParams('disk_space', thresholdParamsSchema, { threshold_pct: 90 }, { threshold_pct: null }))
            .toThrow(CheckConfigError);
    });

    it('should reject percentages outside 0-100', () => {
        expect(() => parseParams('cpu_usage', thresholdParamsSchema, { threshold_pct: 150 }, null))
            .toThrow(/Invalid parameters for check 'cpu_usage': threshold_pct:/);
    });

    it('should reject non-object defaults', () => {
        expect(() => parseParams('cpu_usage', thresholdParamsSchema, 'ninety', null))
            .toThrow("The default parameters for check 'cpu_usage' must be an object");
    });
});
