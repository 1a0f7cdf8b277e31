import { HostSnapshot, LatestReading } from '../types';
import { HostOnlineParams, ThresholdParams, hostOnlineParamsSchema, parseParams, thresholdParamsSchema } from './params';

const MINUTE_MS = 60 * 1000;

export interface CheckVerdict {
    alerting: boolean;
    message: string;
}

export interface EvaluationContext {
    host: HostSnapshot;
    reading: LatestReading | null;
    now: Date;
}

/** A check with its parameters already resolved and validated. */
export interface PreparedCheck {
    usesReading: boolean;
    /** `null` means the check cannot be evaluated with the data at hand. */
    evaluate(context: EvaluationContext): CheckVerdict | null;
}

export interface CheckEvaluator {
    key: string;
    prepare(defaults: unknown, override: unknown): PreparedCheck;
}

interface CheckDefinition<P> {
    key: string;
    usesReading: boolean;
    parse(defaults: unknown, override: unknown): P;
    evaluate(context: EvaluationContext, params: P): CheckVerdict | null;
}

const defineCheck = <P>(definition: CheckDefinition<P>): CheckEvaluator => ({
    key: definition.key,
    prepare: (defaults, override) => {
        const params = definition.parse(defaults, override);
        return {
            usesReading: definition.usesReading,
            evaluate: (context) => definition.evaluate(context, params),
        };
    },
});

const latestOf = (a: Date | null, b: Date) => (a && a.getTime() > b.getTime() ? a : b);

const minutesSince = (since: Date, now: Date) => Math.floor((now.getTime() - since.getTime()) / MINUTE_MS);

export const hostOnlineCheck = defineCheck<HostOnlineParams>({
    key: 'host_online',
    usesReading: false,
    parse: (defaults, override) => parseParams('host_online', hostOnlineParamsSchema, defaults, override),
    evaluate: ({ host, reading, now }, { offline_threshold_minutes }) => {
        // No stored reading is alerting, even when the registry saw the host
        if (!reading) {
            const message = host.last_seen
                ? `Host '${host.host_name}' has no readings (last seen ${minutesSince(host.last_seen, now)} minutes ago)`
                : `Host '${host.host_name}' has never reported data`;
            return { alerting: true, message };
        }

        const lastSeen = latestOf(host.last_seen, reading.collected_at);
        const elapsedMs = now.getTime() - lastSeen.getTime();

        // Exactly at the threshold still counts as online
        if (elapsedMs > offline_threshold_minutes * MINUTE_MS) {
            return {
                alerting: true,
                message: `Host '${host.host_name}' offline for ${minutesSince(lastSeen, now)} minutes (threshold: ${offline_threshold_minutes})`,
            };
        }

        return { alerting: false, message: `Host '${host.host_name}' is online` };
    },
});

type MetricField = 'cpu_pct' | 'mem_pct' | 'disk_pct';

const metricThresholdCheck = (key: string, field: MetricField, label: string) => defineCheck<ThresholdParams>({
    key,
    usesReading: true,
    parse: (defaults, override) => parseParams(key, thresholdParamsSchema, defaults, override),
    evaluate: ({ host, reading }, { threshold_pct }) => {
        const value = reading ? reading[field] : null;
        if (value === null || !Number.isFinite(value)) return null;

        if (value >= threshold_pct) {
            return {
                alerting: true,
                message: `Host '${host.host_name}' ${label} usage critical: ${value}% (threshold: ${threshold_pct}%)`,
            };
        }

        return { alerting: false, message: `Host '${host.host_name}' ${label} usage normal: ${value}%` };
    },
});

export const diskSpaceCheck = metricThresholdCheck('disk_space', 'disk_pct', 'disk');
export const memoryUsageCheck = metricThresholdCheck('memory_usage', 'mem_pct', 'memory');
export const cpuUsageCheck = metricThresholdCheck('cpu_usage', 'cpu_pct', 'CPU');

export const CHECK_EVALUATORS: ReadonlyMap<string, CheckEvaluator> = new Map(
    [hostOnlineCheck, diskSpaceCheck, memoryUsageCheck, cpuUsageCheck].map((check) => [check.key, check])
);

export const getCheckEvaluator = (checkKey: string) => CHECK_EVALUATORS.get(checkKey) ?? null;
