import {
    cpuUsageCheck,
    diskSpaceCheck,
    getCheckEvaluator,
    hostOnlineCheck,
    memoryUsageCheck,
} from '../../src/checks/evaluators';
import { CheckConfigError } from '../../src/lib/errors';
import { HostSnapshot, LatestReading } from '../../src/types';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60 * 1000);

const host = (lastSeen: Date | null = NOW): HostSnapshot => ({ host_id: 'h1', host_name: 'web-01', last_seen: lastSeen });

const reading = (values: Partial<LatestReading> = {}): LatestReading => ({
    reading_id: 'r1',
    host_id: 'h1',
    collected_at: NOW,
    cpu_pct: null,
    mem_pct: null,
    disk_pct: null,
    ...values,
});

describe('metric threshold checks', () => {
    it('should alert when disk usage is above the threshold', () => {
        const verdict = diskSpaceCheck
            .prepare({ threshold_pct: 90 }, null)
            .evaluate({ host: host(), reading: reading({ disk_pct: 92 }), now: NOW });

        expect(verdict).toEqual({
            alerting: true,
            message: "Host 'web-01' disk usage critical: 92% (threshold: 90%)",
        });
    });

    it('should alert when the value equals the threshold', () => {
        const verdict = memoryUsageCheck
            .prepare({ threshold_pct: 85 }, null)
            .evaluate({ host: host(), reading: reading({ mem_pct: 85 }), now: NOW });

        expect(verdict?.alerting).toBe(true);
    });

    it('should report normal usage below the threshold', () => {
        const verdict = cpuUsageCheck
            .prepare({ threshold_pct: 90 }, null)
            .evaluate({ host: host(), reading: reading({ cpu_pct: 89.5 }), now: NOW });

        expect(verdict).toEqual({ alerting: false, message: "Host 'web-01' CPU usage normal: 89.5%" });
    });

    it('should give no verdict without a reading', () => {
        const verdict = diskSpaceCheck
            .prepare({ threshold_pct: 90 }, null)
            .evaluate({ host: host(), reading: null, now: NOW });

        expect(verdict).toBeNull();
    });

    it('should give no verdict when the reading lacks the metric', () => {
        const verdict = diskSpaceCheck
            .prepare({ threshold_pct: 90 }, null)
            .evaluate({ host: host(), reading: reading({ cpu_pct: 99 }), now: NOW });

        expect(verdict).toBeNull();
    });

    it('should let the host override win over the default', () => {
        const verdict = memoryUsageCheck
            .prepare({ threshold_pct: 90 }, { threshold_pct: 80 })
            .evaluate({ host: host(), reading: reading({ mem_pct: 85 }), now: NOW });

        expect(verdict).toEqual({
            alerting: true,
            message: "Host 'web-01' memory usage critical: 85% (threshold: 80%)",
        });
    });

    it('should fall back to 90% when neither default nor override sets a threshold', () => {
        const prepared = diskSpaceCheck.prepare(null, null);

        expect(prepared.evaluate({ host: host(), reading: reading({ disk_pct: 90 }), now: NOW })?.alerting).toBe(true);
        expect(prepared.evaluate({ host: host(), reading: reading({ disk_pct: 89.9 }), now: NOW })?.alerting).toBe(false);
    });

    it('should reject malformed parameters', () => {
        expect(() => diskSpaceCheck.prepare({ threshold_pct: 90 }, { threshold_pct: 'high' })).toThrow(CheckConfigError);
        expect(() => diskSpaceCheck.prepare({ threshold_pct: 90 }, ['threshold_pct'])).toThrow(
            "The override parameters for check 'disk_space' must be an object"
        );
    });

    it('should mark metric checks as reading-based', () => {
        expect(diskSpaceCheck.prepare({}, null).usesReading).toBe(true);
        expect(hostOnlineCheck.prepare({}, null).usesReading).toBe(false);
        expect(diskSpaceCheck).not.toHaveProperty('usesReading');
    });
});

describe('host_online check', () => {
    const prepared = hostOnlineCheck.prepare({ offline_threshold_minutes: 60 }, null);

    it('should not alert exactly at the offline threshold', () => {
        const lastSeen = minutesAgo(60);
        const verdict = prepared.evaluate({ host: host(lastSeen), reading: reading({ collected_at: lastSeen }), now: NOW });

        expect(verdict).toEqual({ alerting: false, message: "Host 'web-01' is online" });
    });

    it('should alert once the threshold is exceeded', () => {
        const lastSeen = minutesAgo(61);
        const verdict = prepared.evaluate({ host: host(lastSeen), reading: reading({ collected_at: lastSeen }), now: NOW });

        expect(verdict).toEqual({
            alerting: true,
            message: "Host 'web-01' offline for 61 minutes (threshold: 60)",
        });
    });

    it('should alert for a host that has never reported', () => {
        const verdict = prepared.evaluate({ host: host(null), reading: null, now: NOW });

        expect(verdict).toEqual({ alerting: true, message: "Host 'web-01' has never reported data" });
    });

    it('should alert when the registry saw the host but no reading is stored', () => {
        const verdict = prepared.evaluate({ host: host(minutesAgo(1)), reading: null, now: NOW });

        expect(verdict).toEqual({ alerting: true, message: "Host 'web-01' has no readings (last seen 1 minutes ago)" });
    });

    it('should use the most recent of last_seen and the reading time', () => {
        const verdict = prepared.evaluate({
            host: host(minutesAgo(10)),
            reading: reading({ collected_at: minutesAgo(90) }),
            now: NOW,
        });

        expect(verdict?.alerting).toBe(false);
    });

    it('should honour a per-host offline window', () => {
        const strict = hostOnlineCheck.prepare({ offline_threshold_minutes: 60 }, { offline_threshold_minutes: 5 });
        const lastSeen = minutesAgo(6);

        expect(strict.evaluate({ host: host(lastSeen), reading: reading({ collected_at: lastSeen }), now: NOW })).toEqual({
            alerting: true,
            message: "Host 'web-01' offline for 6 minutes (threshold: 5)",
        });
    });
});

describe('getCheckEvaluator', () => {
    it('should return registered kinds', () => {
        expect(getCheckEvaluator('disk_space')).toBe(diskSpaceCheck);
        expect(getCheckEvaluator('host_online')).toBe(hostOnlineCheck);
    });

    it('should return null for unknown kinds', () => {
        expect(getCheckEvaluator('unknown_check')).toBeNull();
    });
});
