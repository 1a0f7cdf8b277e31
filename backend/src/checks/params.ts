import { z } from 'zod';
import { CheckConfigError } from '../lib/errors';
import { CheckParams } from '../types';

export const hostOnlineParamsSchema = z.object({
    offline_threshold_minutes: z.number().finite().positive().default(60),
});

export const thresholdParamsSchema = z.object({
    threshold_pct: z.number().finite().min(0).max(100).default(90),
});

export type HostOnlineParams = z.infer<typeof hostOnlineParamsSchema>;
export type ThresholdParams = z.infer<typeof thresholdParamsSchema>;

/**
 * Host override replaces the check-type default per key. Keys the override
 * leaves undefined fall back to the default.
 */
export const mergeParams = (defaults: CheckParams, override: CheckParams | null): CheckParams => {
    const merged: CheckParams = { ...defaults };
    if (!override) return merged;

    for (const [key, value] of Object.entries(override)) {
        if (value !== undefined) merged[key] = value;
    }
    return merged;
};

const toParamsObject = (checkKey: string, source: 'default' | 'override', value: unknown): CheckParams | null => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'object' && !Array.isArray(value)) return Object.fromEntries(Object.entries(value));
    throw new CheckConfigError(`The ${source} parameters for check '${checkKey}' must be an object`, { source });
};

/** Merges stored defaults and host overrides, then validates them against the check's schema. */
export const parseParams = <S extends z.ZodTypeAny>(
    checkKey: string,
    schema: S,
    defaults: unknown,
    override: unknown
): z.infer<S> => {
    const merged = mergeParams(
        toParamsObject(checkKey, 'default', defaults) ?? {},
        toParamsObject(checkKey, 'override', override)
    );
    const result = schema.safeParse(merged);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`);
        throw new CheckConfigError(`Invalid parameters for check '${checkKey}': ${issues.join('; ')}`, { issues });
    }
    return result.data;
};
