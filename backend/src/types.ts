export const ALERT_SEVERITIES = ['L1', 'L2', 'L3'] as const;
export type AlertSeverity = typeof ALERT_SEVERITIES[number];

export const ALERT_STATUSES = ['open', 'acknowledged', 'resolved'] as const;
export type AlertStatus = typeof ALERT_STATUSES[number];

// Statuses that make an alert the "currently active" one for its pair
export const ACTIVE_ALERT_STATUSES: AlertStatus[] = ['open', 'acknowledged'];

export const isActiveStatus = (status: AlertStatus) => ACTIVE_ALERT_STATUSES.includes(status);

export type CheckParams = Record<string, unknown>;

export interface HostSnapshot {
    host_id: string;
    host_name: string;
    last_seen: Date | null;
}

export interface LatestReading {
    reading_id: string;
    host_id: string;
    collected_at: Date;
    cpu_pct: number | null;
    mem_pct: number | null;
    disk_pct: number | null;
}

/** An enabled HostCheckConfig joined with its enabled CheckType. */
export interface EnabledCheck {
    check_key: string;
    check_name: string;
    severity: AlertSeverity;
    cooldown_minutes: number;
    // Stored as loosely typed documents; validated per check kind at evaluation
    default_params: unknown;
    override_params: unknown;
}

export interface AlertRecordView {
    alert_id: string;
    host_id: string;
    check_key: string;
    severity: AlertSeverity;
    reading_id: string | null;
    message: string;
    status: AlertStatus;
    triggered_at: Date;
    last_notified_at: Date | null;
    resolved_at: Date | null;
    created_at: Date;
    updated_at: Date;
}

export interface NewAlertInput {
    host_id: string;
    check_key: string;
    severity: AlertSeverity;
    reading_id: string | null;
    message: string;
    triggered_at: Date;
}
