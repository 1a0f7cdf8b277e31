import { AlertRecordView, EnabledCheck, HostSnapshot, LatestReading, NewAlertInput } from '../types';

export interface HostRepository {
    findActiveHosts(): Promise<HostSnapshot[]>;
}

export interface ReadingRepository {
    findLatestForHost(hostId: string): Promise<LatestReading | null>;
}

export interface CheckConfigRepository {
    /** Enabled configs for the host whose check type is also enabled. */
    findEnabledChecksForHost(hostId: string): Promise<EnabledCheck[]>;
}

export interface AlertHistoryQuery {
    host_id: string;
    check_key?: string;
    limit: number;
}

export interface AlertRepository {
    findActive(hostId: string, checkKey: string): Promise<AlertRecordView | null>;
    findById(alertId: string): Promise<AlertRecordView | null>;
    /**
     * Inserts a new `open` record. Rejects with AlertIntegrityError when the
     * pair already has an active record.
     */
    openAlert(input: NewAlertInput): Promise<AlertRecordView>;
    /**
     * Moves an active record to `resolved`. Resolves to null when the record
     * was no longer active by the time of the write.
     */
    resolveAlert(alertId: string, message: string, now: Date): Promise<AlertRecordView | null>;
    /**
     * Stamps `last_notified_at` if the record is still active and the last
     * stamp is at least `cooldownMinutes` old. Resolves to whether it wrote.
     */
    touchNotified(alertId: string, now: Date, cooldownMinutes: number): Promise<boolean>;
    /** `open -> acknowledged`; null when the record is not currently open. */
    acknowledge(alertId: string, now: Date): Promise<AlertRecordView | null>;
    listActive(hostId?: string): Promise<AlertRecordView[]>;
    listHistory(query: AlertHistoryQuery): Promise<AlertRecordView[]>;
}

export interface EngineRepositories {
    hosts: HostRepository;
    readings: ReadingRepository;
    checks: CheckConfigRepository;
    alerts: AlertRepository;
}
