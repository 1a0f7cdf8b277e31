import { AlertSeverity, CheckParams } from '../types';

export interface CheckTypeDefinition {
    check_key: string;
    check_name: string;
    params: CheckParams;
    severity: AlertSeverity;
    cooldown_minutes: number;
    notes: string;
}

export const DEFAULT_COOLDOWN_MINUTES = 60;

/**
 * Built-in check catalog, inserted on first start. Operators may edit the
 * stored rows afterwards; seeding never overwrites them.
 */
export const DEFAULT_CHECK_TYPES: CheckTypeDefinition[] = [
    {
        check_key: 'host_online',
        check_name: 'Host Online',
        params: { offline_threshold_minutes: 60 },
        severity: 'L1',
        cooldown_minutes: DEFAULT_COOLDOWN_MINUTES,
        notes: 'Checks if host has sent data recently',
    },
    {
        check_key: 'disk_space',
        check_name: 'Disk Space',
        params: { threshold_pct: 90 },
        severity: 'L2',
        cooldown_minutes: DEFAULT_COOLDOWN_MINUTES,
        notes: 'Alerts when disk usage exceeds threshold',
    },
    {
        check_key: 'memory_usage',
        check_name: 'Memory Usage',
        params: { threshold_pct: 90 },
        severity: 'L2',
        cooldown_minutes: DEFAULT_COOLDOWN_MINUTES,
        notes: 'Alerts when memory usage exceeds threshold',
    },
    {
        check_key: 'cpu_usage',
        check_name: 'CPU Usage',
        params: { threshold_pct: 90 },
        severity: 'L2',
        cooldown_minutes: DEFAULT_COOLDOWN_MINUTES,
        notes: 'Alerts when CPU usage exceeds threshold',
    },
];
